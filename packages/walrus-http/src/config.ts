// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { InvalidConfigurationError } from './error.js';
import type { WalrusConfig, WalrusConfigInput } from './types.js';

export function createWalrusConfig({ aggregatorUrl, publisherUrl }: WalrusConfigInput): WalrusConfig {
	return Object.freeze({
		aggregatorUrl: parseBaseUrl('aggregator', aggregatorUrl),
		publisherUrl: parseBaseUrl('publisher', publisherUrl),
	});
}

/**
 * Endpoint paths are resolved relative to the base URL, so a base such as
 * `https://host/walrus` must keep its last segment: the path always ends with a slash.
 */
function parseBaseUrl(role: 'aggregator' | 'publisher', input: string | URL): string {
	let url: URL;
	try {
		url = new URL(input);
	} catch (error) {
		throw new InvalidConfigurationError(`Invalid ${role} URL: ${String(input)}`, { cause: error });
	}

	if (url.protocol !== 'http:' && url.protocol !== 'https:') {
		throw new InvalidConfigurationError(
			`Invalid ${role} URL: unsupported protocol ${url.protocol} in ${url.href}`,
		);
	}

	url.search = '';
	url.hash = '';
	if (!url.pathname.endsWith('/')) {
		url.pathname = `${url.pathname}/`;
	}
	return url.href;
}

export function resolveUrl(base: string, path: string, query?: URLSearchParams): string {
	const url = new URL(path, base);
	if (query) {
		url.search = query.toString();
	}
	return url.toString();
}
