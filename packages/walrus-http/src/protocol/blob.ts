// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import {
	buildBlobMetadataRequest,
	buildReadBlobByObjectIdRequest,
	buildReadBlobRequest,
	buildStoreBlobRequest,
} from '../requests.js';
import { parseBlobMetadataResponse, parseReadResponse, parseStoreResponse } from '../responses.js';
import type {
	BlobMetadata,
	StoreOptions,
	StoreResult,
	WalrusConfig,
	WalrusOperation,
} from '../types.js';

export interface StoreBlobOptions extends StoreOptions {
	data: Uint8Array;
}

export interface ReadBlobOptions {
	blobId: string;
}

export interface ReadBlobByObjectIdOptions {
	objectId: string;
}

export function storeBlob(
	config: WalrusConfig,
	{ data, ...options }: StoreBlobOptions,
): WalrusOperation<StoreResult> {
	return {
		request: buildStoreBlobRequest(config, data, options),
		parse: parseStoreResponse,
	};
}

export function readBlobById(
	config: WalrusConfig,
	{ blobId }: ReadBlobOptions,
): WalrusOperation<Uint8Array> {
	return {
		request: buildReadBlobRequest(config, blobId),
		parse: parseReadResponse,
	};
}

export function readBlobByObjectId(
	config: WalrusConfig,
	{ objectId }: ReadBlobByObjectIdOptions,
): WalrusOperation<Uint8Array> {
	return {
		request: buildReadBlobByObjectIdRequest(config, objectId),
		parse: parseReadResponse,
	};
}

export function getBlobMetadata(
	config: WalrusConfig,
	{ blobId }: ReadBlobOptions,
): WalrusOperation<BlobMetadata> {
	return {
		request: buildBlobMetadataRequest(config, blobId),
		parse: parseBlobMetadataResponse,
	};
}
