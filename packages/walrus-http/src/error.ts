// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { HttpResponse } from './types.js';

const BODY_EXCERPT_LENGTH = 512;

export class WalrusClientError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class UserError extends WalrusClientError {}

/** A base URL handed to the client is not an absolute http(s) URL */
export class InvalidConfigurationError extends UserError {}

export class InvalidParameterError extends UserError {}

export class EmptyQuiltInputError extends UserError {
	constructor() {
		super('A quilt must contain at least one file');
	}
}

export class InvalidIdentifierError extends UserError {
	constructor(
		message: string,
		public readonly identifier: string,
	) {
		super(message);
	}
}

/** A non-2xx answer from the publisher or the aggregator */
export class WalrusAPIError extends WalrusClientError {
	constructor(
		message: string,
		public readonly status: number,
		public readonly bodyExcerpt: string,
	) {
		super(message);
	}

	static fromResponse(response: HttpResponse): WalrusAPIError {
		const bodyExcerpt = excerpt(response.body);
		return new WalrusAPIError(
			`Request failed with status ${response.status}${bodyExcerpt ? `: ${bodyExcerpt}` : ''}`,
			response.status,
			bodyExcerpt,
		);
	}
}

export class NotFoundError extends WalrusAPIError {
	constructor(bodyExcerpt = '') {
		super('Not found', 404, bodyExcerpt);
	}
}

export class ResponseParseError extends WalrusClientError {}

export class UnexpectedResponseShapeError extends ResponseParseError {}

export class QuiltPatchCountMismatchError extends ResponseParseError {
	constructor(
		public readonly expected: number,
		public readonly actual: number,
	) {
		super(`Expected ${expected} quilt patches in the response, got ${actual}`);
	}
}

/** The exchange never produced an HTTP response (DNS, socket, timeout, ...) */
export class TransportError extends WalrusClientError {}

export function excerpt(body: Uint8Array): string {
	// stream mode holds back a sequence cut at the end instead of emitting U+FFFD
	const text = new TextDecoder().decode(body.subarray(0, BODY_EXCERPT_LENGTH * 4), {
		stream: true,
	});
	return text.length > BODY_EXCERPT_LENGTH ? text.slice(0, BODY_EXCERPT_LENGTH) : text;
}
