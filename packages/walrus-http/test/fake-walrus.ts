// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { createHash } from 'node:crypto';

import { encodeBlobId, encodeQuiltPatchId } from '../src/ids.js';
import type { BlockingHttpTransport, HttpTransport } from '../src/transport/transport.js';
import type { HttpRequestSpec, HttpResponse } from '../src/types.js';

export const AGGREGATOR_URL = 'https://aggregator.test';
export const PUBLISHER_URL = 'https://publisher.test';

const CURRENT_EPOCH = 10;

interface StoredBlob {
	data: Uint8Array;
	objectId: string;
	endEpoch: number;
}

/**
 * In-process stand-in for a publisher/aggregator pair. Content addressed like the real
 * network: storing the same bytes twice reports `alreadyCertified` the second time, and
 * quilt patches come back sorted by identifier.
 */
export class FakeWalrusNetwork implements HttpTransport, BlockingHttpTransport {
	readonly requests: HttpRequestSpec[] = [];
	#blobs = new Map<string, StoredBlob>();
	#objects = new Map<string, string>();
	#patches = new Map<string, Uint8Array>();
	#quiltFiles = new Map<string, Uint8Array>();

	async send(request: HttpRequestSpec): Promise<HttpResponse> {
		return this.sendSync(request);
	}

	sendSync(request: HttpRequestSpec): HttpResponse {
		this.requests.push(request);
		const url = new URL(request.url);

		if (url.origin === new URL(PUBLISHER_URL).origin && request.method === 'PUT') {
			if (url.pathname === '/v1/blobs') {
				return this.#storeBlob(request, url);
			}
			if (url.pathname === '/v1/quilts') {
				return this.#storeQuilt(request, url);
			}
		}

		if (url.origin === new URL(AGGREGATOR_URL).origin) {
			return this.#read(request, url.pathname);
		}

		return text(404, 'no such route');
	}

	#storeBlob(request: HttpRequestSpec, url: URL): HttpResponse {
		if (request.body?.kind !== 'bytes') {
			return text(400, 'expected a raw body');
		}
		return json(200, this.#register(request.body.data, url.searchParams));
	}

	#storeQuilt(request: HttpRequestSpec, url: URL): HttpResponse {
		if (request.body?.kind !== 'multipart') {
			return text(400, 'expected a multipart body');
		}

		const files = request.body.parts.flatMap((part) =>
			part.kind === 'file' ? [{ identifier: part.name, data: part.data }] : [],
		);
		if (new Set(files.map((file) => file.identifier)).size !== files.length) {
			return text(400, 'duplicate identifiers in quilt');
		}

		const sorted = [...files].sort((a, b) => (a.identifier < b.identifier ? -1 : 1));
		const encoder = new TextEncoder();
		const packed = concat(
			sorted.flatMap((file) => [encoder.encode(`${file.identifier}\0`), file.data]),
		);
		const blobStoreResult = this.#register(packed, url.searchParams);
		const quiltId = digest(packed);

		const storedQuiltBlobs = sorted.map((file, i) => {
			const quiltPatchId = encodeQuiltPatchId({
				quiltId,
				version: 1,
				startIndex: i + 1,
				endIndex: i + 2,
			});
			this.#patches.set(quiltPatchId, file.data);
			this.#quiltFiles.set(`${quiltId}/${file.identifier}`, file.data);
			return { identifier: file.identifier, quiltPatchId, range: [i + 1, i + 2] };
		});

		return json(200, { blobStoreResult, storedQuiltBlobs });
	}

	#register(data: Uint8Array, query: URLSearchParams): unknown {
		const blobId = digest(data);
		const existing = this.#blobs.get(blobId);
		if (existing && query.get('force') !== 'true') {
			return {
				alreadyCertified: {
					blobId,
					event: { txDigest: 'fake-tx-digest', eventSeq: '0' },
					endEpoch: existing.endEpoch,
				},
			};
		}

		const epochs = Number(query.get('epochs') ?? '1');
		const objectId = `0x${createHash('sha256').update(blobId).digest('hex')}`;
		const endEpoch = CURRENT_EPOCH + epochs;
		this.#blobs.set(blobId, { data, objectId, endEpoch });
		this.#objects.set(objectId, blobId);

		return {
			newlyCreated: {
				blobObject: {
					id: objectId,
					registeredEpoch: CURRENT_EPOCH,
					blobId,
					size: data.length,
					encodingType: 'RS2',
					certifiedEpoch: CURRENT_EPOCH,
					storage: {
						id: `${objectId.slice(0, -4)}5707`,
						startEpoch: CURRENT_EPOCH,
						endEpoch,
						storageSize: data.length * 5,
					},
					deletable: query.get('deletable') === 'true',
				},
				resourceOperation: {
					registerFromScratch: { encodedLength: data.length * 5, epochsAhead: epochs },
				},
				cost: 1000 * epochs,
			},
		};
	}

	#read(request: HttpRequestSpec, pathname: string): HttpResponse {
		const segments = pathname.split('/').slice(1).map(decodeURIComponent);
		let data: Uint8Array | undefined;

		if (segments[2] === 'by-quilt-patch-id') {
			data = this.#patches.get(segments[3]);
		} else if (segments[2] === 'by-quilt-id') {
			data = this.#quiltFiles.get(`${segments[3]}/${segments[4]}`);
		} else if (segments[2] === 'by-object-id') {
			const blobId = this.#objects.get(segments[3]);
			data = blobId === undefined ? undefined : this.#blobs.get(blobId)?.data;
		} else if (segments.length === 3) {
			data = this.#blobs.get(segments[2])?.data;
		}

		if (data === undefined) {
			return text(404, 'blob not found');
		}
		if (request.method === 'HEAD') {
			return {
				status: 200,
				headers: {
					'content-length': String(data.length),
					'content-type': 'application/octet-stream',
					etag: `"${segments[segments.length - 1]}"`,
				},
				body: new Uint8Array(),
			};
		}
		return { status: 200, headers: { 'content-type': 'application/octet-stream' }, body: data };
	}
}

export function digest(data: Uint8Array): string {
	return encodeBlobId(new Uint8Array(createHash('sha256').update(data).digest()));
}

export function json(status: number, value: unknown): HttpResponse {
	return {
		status,
		headers: { 'content-type': 'application/json' },
		body: new TextEncoder().encode(JSON.stringify(value)),
	};
}

export function text(status: number, value: string): HttpResponse {
	return {
		status,
		headers: { 'content-type': 'text/plain' },
		body: new TextEncoder().encode(value),
	};
}

function concat(chunks: Uint8Array[]): Uint8Array {
	const result = new Uint8Array(chunks.reduce((length, chunk) => length + chunk.length, 0));
	let offset = 0;
	for (const chunk of chunks) {
		result.set(chunk, offset);
		offset += chunk.length;
	}
	return result;
}
