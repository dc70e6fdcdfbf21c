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
import { SubprocessTransport } from './transport/subprocess.js';
import type { BlockingHttpTransport, TransportOptions } from './transport/transport.js';
import type {
	BlobMetadata,
	QuiltStoreResult,
	StoreResult,
	WalrusConfig,
	WalrusConfigInput,
	WalrusOperation,
} from './types.js';

export interface BlockingWalrusHttpClientOptions extends WalrusConfigInput, TransportOptions {
	/** Defaults to a {@link SubprocessTransport} honouring `timeoutMs` */
	transport?: BlockingHttpTransport;
}

/**
 * Synchronous counterpart of {@link WalrusHttpClient}. Sends exactly the same requests,
 * but each call blocks the calling thread until the exchange has completed.
 */
export class BlockingWalrusHttpClient {
	readonly config: WalrusConfig;
	#transport: BlockingHttpTransport;

	constructor({ transport, timeoutMs, ...urls }: BlockingWalrusHttpClientOptions) {
		this.config = createWalrusConfig(urls);
		this.#transport = transport ?? new SubprocessTransport({ timeoutMs });
	}

	storeBlob(options: StoreBlobOptions): StoreResult {
		return this.#run(blob.storeBlob(this.config, options));
	}

	readBlobById(options: ReadBlobOptions): Uint8Array {
		return this.#run(blob.readBlobById(this.config, options));
	}

	readBlobByObjectId(options: ReadBlobByObjectIdOptions): Uint8Array {
		return this.#run(blob.readBlobByObjectId(this.config, options));
	}

	getBlobMetadata(options: ReadBlobOptions): BlobMetadata {
		return this.#run(blob.getBlobMetadata(this.config, options));
	}

	storeQuilt(options: StoreQuiltOptions): QuiltStoreResult {
		return this.#run(quilt.storeQuilt(this.config, options));
	}

	readQuiltBlobByPatchId(options: ReadQuiltPatchOptions): Uint8Array {
		return this.#run(quilt.readQuiltBlobByPatchId(this.config, options));
	}

	readQuiltBlobByQuiltIdAndIdentifier(options: ReadQuiltFileOptions): Uint8Array {
		return this.#run(quilt.readQuiltBlobByQuiltIdAndIdentifier(this.config, options));
	}

	#run<T>({ request, parse }: WalrusOperation<T>): T {
		return parse(this.#transport.sendSync(request));
	}
}
