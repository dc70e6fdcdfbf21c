// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export { WalrusHttpClient } from './client.js';
export type { WalrusHttpClientOptions } from './client.js';
export { BlockingWalrusHttpClient } from './blockingClient.js';
export type { BlockingWalrusHttpClientOptions } from './blockingClient.js';
export { createWalrusConfig } from './config.js';
export * from './error.js';
export {
	assertUrlSafeIdentifier,
	decodeBlobId,
	encodeBlobId,
	encodeQuiltPatchId,
	fromBase64Url,
	isQuiltPatchId,
	parseQuiltPatchId,
	toBase64Url,
} from './ids.js';
export * from './requests.js';
export * from './responses.js';
export * as blobProtocol from './protocol/blob.js';
export * as quiltProtocol from './protocol/quilt.js';
export type { ReadBlobByObjectIdOptions, ReadBlobOptions, StoreBlobOptions } from './protocol/blob.js';
export type { ReadQuiltFileOptions, ReadQuiltPatchOptions, StoreQuiltOptions } from './protocol/quilt.js';
export { FetchTransport } from './transport/fetch.js';
export type { FetchTransportOptions } from './transport/fetch.js';
export { SubprocessTransport } from './transport/subprocess.js';
export type { SubprocessTransportOptions } from './transport/subprocess.js';
export type { BlockingHttpTransport, HttpTransport, TransportOptions } from './transport/transport.js';
export type { StorageAdapter, StorageConfig, StorageOptions } from './storage/adapters/storage.js';
export { WalrusStorageAdapter } from './storage/adapters/walrus/walrus.js';
export type * from './types.js';
