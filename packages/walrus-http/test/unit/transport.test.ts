// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { describe, expect, it, vi } from 'vitest';

import { TransportError } from '../../src/error.js';
import { FetchTransport } from '../../src/transport/fetch.js';
import {
	parseExchangeOutput,
	serializeRequest,
	SubprocessTransport,
} from '../../src/transport/subprocess.js';
import type { HttpRequestSpec } from '../../src/types.js';

const encode = (value: string) => new TextEncoder().encode(value);

const storeRequest: HttpRequestSpec = {
	method: 'PUT',
	url: 'https://publisher.test/v1/blobs?epochs=1',
	headers: { 'content-type': 'application/octet-stream' },
	body: { kind: 'bytes', data: encode('hello') },
};

const quiltRequest: HttpRequestSpec = {
	method: 'PUT',
	url: 'https://publisher.test/v1/quilts',
	headers: {},
	body: {
		kind: 'multipart',
		parts: [
			{ kind: 'file', name: 'a.txt', data: encode('AAA') },
			{ kind: 'text', name: '_metadata', value: '[]' },
		],
	},
};

describe('FetchTransport', () => {
	it('should send raw bodies and collect the response', async () => {
		const fetchFn = vi.fn<typeof fetch>(
			async () =>
				new Response('{"ok":true}', { status: 200, headers: { 'Content-Type': 'application/json' } }),
		);
		const transport = new FetchTransport({ fetch: fetchFn });

		const response = await transport.send(storeRequest);

		expect(response.status).toBe(200);
		expect(response.headers['content-type']).toBe('application/json');
		expect(new TextDecoder().decode(response.body)).toBe('{"ok":true}');

		const [url, init] = fetchFn.mock.calls[0];
		expect(url).toBe('https://publisher.test/v1/blobs?epochs=1');
		expect(init?.method).toBe('PUT');
		expect(init?.headers).toEqual({ 'content-type': 'application/octet-stream' });
		expect(init?.body).toEqual(encode('hello'));
		expect(init?.signal).toBeUndefined();
	});

	it('should send quilt files as multipart form data', async () => {
		const fetchFn = vi.fn<typeof fetch>(async () => new Response('{}', { status: 200 }));
		await new FetchTransport({ fetch: fetchFn }).send(quiltRequest);

		const body = fetchFn.mock.calls[0][1]?.body;
		expect(body).toBeInstanceOf(FormData);
		if (!(body instanceof FormData)) {
			throw new Error('expected form data');
		}

		const file = body.get('a.txt');
		expect(file).toBeInstanceOf(Blob);
		if (!(file instanceof Blob)) {
			throw new Error('expected a file part');
		}
		expect(await file.text()).toBe('AAA');
		expect(body.get('_metadata')).toBe('[]');
	});

	it('should hand non-2xx responses back instead of throwing', async () => {
		const fetchFn = vi.fn<typeof fetch>(async () => new Response('missing', { status: 404 }));
		const response = await new FetchTransport({ fetch: fetchFn }).send(storeRequest);
		expect(response.status).toBe(404);
	});

	it('should attach a timeout signal when configured', async () => {
		const fetchFn = vi.fn<typeof fetch>(async () => new Response('', { status: 200 }));
		await new FetchTransport({ fetch: fetchFn, timeoutMs: 5000 }).send(storeRequest);
		expect(fetchFn.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
	});

	it('should wrap network failures in TransportError', async () => {
		const cause = new TypeError('fetch failed');
		const fetchFn = vi.fn<typeof fetch>(async () => {
			throw cause;
		});

		const error = await new FetchTransport({ fetch: fetchFn }).send(storeRequest).catch((e) => e);

		expect(error).toBeInstanceOf(TransportError);
		expect(error).toHaveProperty('cause', cause);
		expect(error).toHaveProperty(
			'message',
			'PUT https://publisher.test/v1/blobs?epochs=1 failed: fetch failed',
		);
	});
});

describe('SubprocessTransport', () => {
	it('should serialize binary parts as base64', () => {
		expect(JSON.parse(serializeRequest(storeRequest))).toEqual({
			method: 'PUT',
			url: 'https://publisher.test/v1/blobs?epochs=1',
			headers: { 'content-type': 'application/octet-stream' },
			body: { kind: 'bytes', data: 'aGVsbG8=' },
		});
		expect(JSON.parse(serializeRequest(quiltRequest)).body).toEqual({
			kind: 'multipart',
			parts: [
				{ kind: 'file', name: 'a.txt', data: 'QUFB' },
				{ kind: 'text', name: '_metadata', value: '[]' },
			],
		});
	});

	it('should leave the body out of GET requests', () => {
		const serialized = JSON.parse(
			serializeRequest({ method: 'GET', url: 'https://aggregator.test/v1/blobs/x', headers: {} }),
		);
		expect(serialized).toEqual({ method: 'GET', url: 'https://aggregator.test/v1/blobs/x', headers: {} });
	});

	it('should decode the exchange output', () => {
		const output = JSON.stringify({
			ok: true,
			status: 200,
			headers: { 'content-type': 'application/octet-stream' },
			body: 'aGVsbG8=',
		});
		expect(parseExchangeOutput(storeRequest, output)).toEqual({
			status: 200,
			headers: { 'content-type': 'application/octet-stream' },
			body: encode('hello'),
		});
	});

	it('should turn a failed exchange into TransportError', () => {
		const output = JSON.stringify({ ok: false, message: 'getaddrinfo ENOTFOUND publisher.test' });
		expect(() => parseExchangeOutput(storeRequest, output)).toThrow(
			'PUT https://publisher.test/v1/blobs?epochs=1 failed: getaddrinfo ENOTFOUND publisher.test',
		);
	});

	it('should reject output it cannot read', () => {
		expect(() => parseExchangeOutput(storeRequest, 'Segmentation fault')).toThrow(TransportError);
		expect(() => parseExchangeOutput(storeRequest, '{"ok":true}')).toThrow(TransportError);
	});

	it('should run a real exchange in a child process', () => {
		const transport = new SubprocessTransport({ timeoutMs: 20_000 });

		const response = transport.sendSync({
			method: 'GET',
			url: 'data:application/octet-stream;base64,aGVsbG8=',
			headers: {},
		});

		expect(response.status).toBe(200);
		expect(response.headers['content-type']).toBe('application/octet-stream');
		expect(response.body).toEqual(encode('hello'));
	}, 30_000);

	it('should turn a refused connection in the child into TransportError', () => {
		const transport = new SubprocessTransport({ timeoutMs: 20_000 });
		const request: HttpRequestSpec = { method: 'GET', url: 'http://127.0.0.1:1/', headers: {} };

		expect(() => transport.sendSync(request)).toThrow(TransportError);
		expect(() => transport.sendSync(request)).toThrow(/^GET http:\/\/127\.0\.0\.1:1\/ failed: /);
	}, 30_000);

	it('should report a child process that cannot start', () => {
		const transport = new SubprocessTransport({ execPath: '/nonexistent/node-binary' });
		expect(() => transport.sendSync(storeRequest)).toThrow(TransportError);
	});
});
