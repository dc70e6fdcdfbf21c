// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { TransportError } from '../error.js';
import type { HttpRequestSpec, HttpResponse } from '../types.js';
import type { HttpTransport, TransportOptions } from './transport.js';
import { headersToRecord, toFetchBody } from './transport.js';

export interface FetchTransportOptions extends TransportOptions {
	fetch?: typeof fetch;
}

export class FetchTransport implements HttpTransport {
	#fetch: typeof fetch;
	#timeoutMs?: number;

	constructor({ fetch: fetchFn = globalThis.fetch, timeoutMs }: FetchTransportOptions = {}) {
		this.#fetch = fetchFn;
		this.#timeoutMs = timeoutMs;
	}

	async send(request: HttpRequestSpec): Promise<HttpResponse> {
		try {
			const response = await this.#fetch(request.url, {
				method: request.method,
				headers: request.headers,
				body: toFetchBody(request.body),
				signal: this.#timeoutMs === undefined ? undefined : AbortSignal.timeout(this.#timeoutMs),
			});

			return {
				status: response.status,
				headers: headersToRecord(response.headers),
				body: new Uint8Array(await response.arrayBuffer()),
			};
		} catch (error) {
			throw new TransportError(`${request.method} ${request.url} failed: ${describe(error)}`, {
				cause: error,
			});
		}
	}
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
