// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { WalrusHttpClient } from '../../../client.js';
import { isQuiltPatchId } from '../../../ids.js';
import type { HttpTransport } from '../../../transport/transport.js';
import type { StoreResult } from '../../../types.js';
import type { StorageAdapter, StorageConfig, StorageOptions } from '../storage.js';

export class WalrusStorageAdapter implements StorageAdapter {
	readonly #client: WalrusHttpClient;

	constructor(
		private readonly config: StorageConfig,
		transport?: HttpTransport,
	) {
		this.#client = new WalrusHttpClient({
			publisherUrl: config.publisher,
			aggregatorUrl: config.aggregator,
			transport,
		});
	}

	async upload(data: Uint8Array[], options: StorageOptions = {}): Promise<{ ids: string[] }> {
		const { mode = 'quilt', ...storeOptions } = options;
		const epochs = storeOptions.epochs ?? this.config.epochs;

		try {
			return mode === 'blob'
				? await this.#uploadBlobs(data, { ...storeOptions, epochs })
				: await this.#uploadQuilt(data, { ...storeOptions, epochs });
		} catch (error) {
			console.error('Walrus upload failed:', error);
			throw error;
		}
	}

	async download(id: string): Promise<Uint8Array> {
		return isQuiltPatchId(id)
			? this.#client.readQuiltBlobByPatchId({ quiltPatchId: id })
			: this.#client.readBlobById({ blobId: id });
	}

	async #uploadQuilt(
		data: Uint8Array[],
		options: Omit<StorageOptions, 'mode'>,
	): Promise<{ ids: string[] }> {
		const { storedQuiltBlobs } = await this.#client.storeQuilt({
			...options,
			files: data.map((contents, i) => ({ identifier: `attachment${i}`, contents })),
		});
		return { ids: storedQuiltBlobs.map((stored) => stored.quiltPatchId) };
	}

	async #uploadBlobs(
		data: Uint8Array[],
		options: Omit<StorageOptions, 'mode'>,
	): Promise<{ ids: string[] }> {
		const results = await Promise.all(
			data.map((contents) => this.#client.storeBlob({ ...options, data: contents })),
		);
		return { ids: results.map(blobIdOf) };
	}
}

function blobIdOf(result: StoreResult): string {
	return result.kind === 'newlyCreated' ? result.blobObject.blobId : result.blobId;
}
