// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { createWalrusConfig } from './config.js';
import * as blob from './protocol/blob.js';
import type {
	ReadBlobByObjectIdOptions,
	ReadBlobOptions,
	StoreBlobOptions,
} from './protocol/blob.js';
import * as quilt from './protocol/quilt.js';
import type {
	ReadQuiltFileOptions,
	ReadQuiltPatchOptions,
	StoreQuiltOptions,
} from './protocol/quilt.js';
import { FetchTransport } from './transport/fetch.js';
import type { HttpTransport, TransportOptions } from './transport/transport.js';
import type {
	BlobMetadata,
	QuiltStoreResult,
	StoreResult,
	WalrusConfig,
	WalrusConfigInput,
	WalrusOperation,
} from './types.js';

export interface WalrusHttpClientOptions extends WalrusConfigInput, TransportOptions {
	/** Defaults to a {@link FetchTransport} honouring `timeoutMs` */
	transport?: HttpTransport;
}

/**
 * Promise based client for a Walrus publisher (writes) and aggregator (reads).
 *
 * Every call is a single request/response exchange with no retries and no state kept
 * between calls, so any number of calls may be in flight at once.
 */
export class WalrusHttpClient {
	readonly config: WalrusConfig;
	#transport: HttpTransport;

	constructor({ transport, timeoutMs, ...urls }: WalrusHttpClientOptions) {
		this.config = createWalrusConfig(urls);
		this.#transport = transport ?? new FetchTransport({ timeoutMs });
	}

	/**
	 * Stores a single blob through the publisher.
	 * @returns `newlyCreated` when storage was registered, `alreadyCertified` when the
	 * network already holds a certified copy of the same bytes.
	 */
	async storeBlob(options: StoreBlobOptions): Promise<StoreResult> {
		return this.#run(blob.storeBlob(this.config, options));
	}

	async readBlobById(options: ReadBlobOptions): Promise<Uint8Array> {
		return this.#run(blob.readBlobById(this.config, options));
	}

	async readBlobByObjectId(options: ReadBlobByObjectIdOptions): Promise<Uint8Array> {
		return this.#run(blob.readBlobByObjectId(this.config, options));
	}

	async getBlobMetadata(options: ReadBlobOptions): Promise<BlobMetadata> {
		return this.#run(blob.getBlobMetadata(this.config, options));
	}

	/**
	 * Stores several files as one quilt.
	 * @returns the store result of the quilt blob, and one patch id per file in input order
	 */
	async storeQuilt(options: StoreQuiltOptions): Promise<QuiltStoreResult> {
		return this.#run(quilt.storeQuilt(this.config, options));
	}

	async readQuiltBlobByPatchId(options: ReadQuiltPatchOptions): Promise<Uint8Array> {
		return this.#run(quilt.readQuiltBlobByPatchId(this.config, options));
	}

	async readQuiltBlobByQuiltIdAndIdentifier(options: ReadQuiltFileOptions): Promise<Uint8Array> {
		return this.#run(quilt.readQuiltBlobByQuiltIdAndIdentifier(this.config, options));
	}

	async #run<T>({ request, parse }: WalrusOperation<T>): Promise<T> {
		return parse(await this.#transport.send(request));
	}
}
