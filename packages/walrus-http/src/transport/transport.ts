// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { HttpRequestBody, HttpRequestSpec, HttpResponse } from '../types.js';

/** Sends one request and resolves with whatever status the server answered */
export interface HttpTransport {
	send(request: HttpRequestSpec): Promise<HttpResponse>;
}

/** Same contract as {@link HttpTransport}, but occupies the calling thread until the exchange completes */
export interface BlockingHttpTransport {
	sendSync(request: HttpRequestSpec): HttpResponse;
}

export interface TransportOptions {
	/** Abort the exchange after this many milliseconds. No limit when absent */
	timeoutMs?: number;
}

export function toFetchBody(body: HttpRequestBody | undefined): Uint8Array | FormData | undefined {
	if (!body) {
		return undefined;
	}
	if (body.kind === 'bytes') {
		return new Uint8Array(body.data);
	}

	const formData = new FormData();
	for (const part of body.parts) {
		if (part.kind === 'file') {
			formData.append(part.name, new Blob([new Uint8Array(part.data)]));
		} else {
			formData.append(part.name, part.value);
		}
	}
	return formData;
}

export function headersToRecord(headers: Headers): Record<string, string> {
	const record: Record<string, string> = {};
	headers.forEach((value, key) => {
		record[key.toLowerCase()] = value;
	});
	return record;
}
