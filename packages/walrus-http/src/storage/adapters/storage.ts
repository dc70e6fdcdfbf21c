// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { StoreOptions } from '../../types.js';

export type StorageOptions = StoreOptions & {
	/** Store all payloads as one quilt (default), or each as its own blob */
	mode?: 'quilt' | 'blob';
};

export type StorageConfig = {
	publisher: string;
	aggregator: string;
	epochs?: number;
};

export interface StorageAdapter {
	upload(data: Uint8Array[], options?: StorageOptions): Promise<{ ids: string[] }>;
	download(id: string): Promise<Uint8Array>;
}
