// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export const BLOB_ID_LENGTH = 32;

export const QUILT_PATCH_ID_VERSION = 1;

/** Multipart field carrying per-file tags of a quilt upload */
export const QUILT_METADATA_FIELD = '_metadata';

export const PUBLISHER_PATHS = {
	blobs: 'v1/blobs',
	quilts: 'v1/quilts',
} as const;

export const AGGREGATOR_PATHS = {
	blob: (blobId: string) => `v1/blobs/${blobId}`,
	blobByObjectId: (objectId: string) => `v1/blobs/by-object-id/${objectId}`,
	blobByQuiltPatchId: (quiltPatchId: string) => `v1/blobs/by-quilt-patch-id/${quiltPatchId}`,
	blobByQuiltIdAndIdentifier: (quiltId: string, identifier: string) =>
		`v1/blobs/by-quilt-id/${quiltId}/${encodeURIComponent(identifier)}`,
} as const;

export const OCTET_STREAM = 'application/octet-stream';
