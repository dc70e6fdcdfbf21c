// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import {
	buildReadQuiltFileRequest,
	buildReadQuiltPatchRequest,
	buildStoreQuiltRequest,
} from '../requests.js';
import { parseQuiltStoreResponse, parseReadResponse } from '../responses.js';
import type {
	QuiltFile,
	QuiltStoreResult,
	StoreOptions,
	WalrusConfig,
	WalrusOperation,
} from '../types.js';

export interface StoreQuiltOptions extends StoreOptions {
	files: QuiltFile[];
}

export interface ReadQuiltPatchOptions {
	quiltPatchId: string;
}

export interface ReadQuiltFileOptions {
	quiltId: string;
	identifier: string;
}

/**
 * Packs the files into one quilt. The result lists one patch id per file in the order the
 * files were given; a response that cannot account for every file fails the whole call.
 */
export function storeQuilt(
	config: WalrusConfig,
	{ files, ...options }: StoreQuiltOptions,
): WalrusOperation<QuiltStoreResult> {
	return {
		request: buildStoreQuiltRequest(config, files, options),
		parse: (response) => parseQuiltStoreResponse(response, files),
	};
}

export function readQuiltBlobByPatchId(
	config: WalrusConfig,
	{ quiltPatchId }: ReadQuiltPatchOptions,
): WalrusOperation<Uint8Array> {
	return {
		request: buildReadQuiltPatchRequest(config, quiltPatchId),
		parse: parseReadResponse,
	};
}

export function readQuiltBlobByQuiltIdAndIdentifier(
	config: WalrusConfig,
	{ quiltId, identifier }: ReadQuiltFileOptions,
): WalrusOperation<Uint8Array> {
	return {
		request: buildReadQuiltFileRequest(config, quiltId, identifier),
		parse: parseReadResponse,
	};
}
