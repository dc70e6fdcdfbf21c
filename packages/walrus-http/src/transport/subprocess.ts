// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { execFileSync } from 'node:child_process';

import { fromBase64, toBase64 } from '@mysten/sui/utils';
import { z } from 'zod';

import { TransportError } from '../error.js';
import type { HttpRequestSpec, HttpResponse } from '../types.js';
import type { BlockingHttpTransport, TransportOptions } from './transport.js';

const DEFAULT_MAX_BUFFER = 1024 * 1024 * 1024;

// Runs in a child process: reads a serialized request from stdin, performs it with fetch
// and writes the serialized response (or the failure) to stdout.
const EXCHANGE_SCRIPT = `
const chunks = [];
for await (const chunk of process.stdin) chunks.push(chunk);
const request = JSON.parse(Buffer.concat(chunks).toString('utf8'));
let body;
if (request.body?.kind === 'bytes') {
	body = Buffer.from(request.body.data, 'base64');
} else if (request.body?.kind === 'multipart') {
	body = new FormData();
	for (const part of request.body.parts) {
		if (part.kind === 'file') body.append(part.name, new Blob([Buffer.from(part.data, 'base64')]));
		else body.append(part.name, part.value);
	}
}
try {
	const response = await fetch(request.url, { method: request.method, headers: request.headers, body });
	const headers = {};
	response.headers.forEach((value, key) => { headers[key.toLowerCase()] = value; });
	const payload = Buffer.from(await response.arrayBuffer()).toString('base64');
	process.stdout.write(JSON.stringify({ ok: true, status: response.status, headers, body: payload }));
} catch (error) {
	process.stdout.write(JSON.stringify({ ok: false, message: String(error?.cause?.message ?? error?.message ?? error) }));
}
`;

const ExchangeResultSchema = z.discriminatedUnion('ok', [
	z.object({
		ok: z.literal(true),
		status: z.number().int(),
		headers: z.record(z.string(), z.string()),
		body: z.string(),
	}),
	z.object({ ok: z.literal(false), message: z.string() }),
]);

export interface SubprocessTransportOptions extends TransportOptions {
	/** Node.js binary used for the exchange, the current one by default */
	execPath?: string;
	maxBuffer?: number;
}

/**
 * Performs each exchange in a short-lived Node.js child process and waits for it
 * synchronously, so the calling thread stays blocked until the response has arrived.
 */
export class SubprocessTransport implements BlockingHttpTransport {
	#execPath: string;
	#timeoutMs?: number;
	#maxBuffer: number;

	constructor({ execPath = process.execPath, timeoutMs, maxBuffer }: SubprocessTransportOptions = {}) {
		this.#execPath = execPath;
		this.#timeoutMs = timeoutMs;
		this.#maxBuffer = maxBuffer ?? DEFAULT_MAX_BUFFER;
	}

	sendSync(request: HttpRequestSpec): HttpResponse {
		let output: string;
		try {
			output = execFileSync(this.#execPath, ['--input-type=module', '--eval', EXCHANGE_SCRIPT], {
				input: serializeRequest(request),
				encoding: 'utf8',
				timeout: this.#timeoutMs,
				maxBuffer: this.#maxBuffer,
				stdio: ['pipe', 'pipe', 'pipe'],
			});
		} catch (error) {
			throw new TransportError(`${request.method} ${request.url} failed: exchange process did not complete`, {
				cause: error,
			});
		}

		return parseExchangeOutput(request, output);
	}
}

export function serializeRequest(request: HttpRequestSpec): string {
	const { body } = request;
	return JSON.stringify({
		method: request.method,
		url: request.url,
		headers: request.headers,
		body:
			body === undefined
				? undefined
				: body.kind === 'bytes'
					? { kind: 'bytes', data: toBase64(body.data) }
					: {
							kind: 'multipart',
							parts: body.parts.map((part) =>
								part.kind === 'file'
									? { kind: 'file', name: part.name, data: toBase64(part.data) }
									: part,
							),
						},
	});
}

export function parseExchangeOutput(request: HttpRequestSpec, output: string): HttpResponse {
	let json: unknown;
	try {
		json = JSON.parse(output);
	} catch (error) {
		throw new TransportError(`${request.method} ${request.url} failed: unreadable exchange output`, {
			cause: error,
		});
	}

	const result = ExchangeResultSchema.safeParse(json);
	if (!result.success) {
		throw new TransportError(
			`${request.method} ${request.url} failed: unexpected exchange output: ${result.error.message}`,
		);
	}
	if (!result.data.ok) {
		throw new TransportError(`${request.method} ${request.url} failed: ${result.data.message}`);
	}

	return {
		status: result.data.status,
		headers: result.data.headers,
		body: fromBase64(result.data.body),
	};
}
