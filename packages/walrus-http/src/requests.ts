// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import {
	isValidSuiAddress,
	isValidSuiObjectId,
	normalizeSuiAddress,
	normalizeSuiObjectId,
} from '@mysten/sui/utils';

import { resolveUrl } from './config.js';
import {
	AGGREGATOR_PATHS,
	OCTET_STREAM,
	PUBLISHER_PATHS,
	QUILT_METADATA_FIELD,
} from './constants.js';
import { EmptyQuiltInputError, InvalidIdentifierError, InvalidParameterError } from './error.js';
import { assertUrlSafeIdentifier, decodeBlobId, parseQuiltPatchId } from './ids.js';
import type {
	HttpRequestSpec,
	MultipartPart,
	QuiltFile,
	StoreOptions,
	WalrusConfig,
} from './types.js';

export function buildStoreBlobRequest(
	config: WalrusConfig,
	data: Uint8Array,
	options: StoreOptions = {},
): HttpRequestSpec {
	return {
		method: 'PUT',
		url: resolveUrl(config.publisherUrl, PUBLISHER_PATHS.blobs, storeQuery(options)),
		headers: { 'content-type': OCTET_STREAM },
		body: { kind: 'bytes', data },
	};
}

/**
 * One file part per quilt file, named by its identifier and kept in input order.
 * Identifiers are sent as given: the publisher decides what to do with duplicates.
 */
export function buildStoreQuiltRequest(
	config: WalrusConfig,
	files: QuiltFile[],
	options: StoreOptions = {},
): HttpRequestSpec {
	if (files.length === 0) {
		throw new EmptyQuiltInputError();
	}

	const parts = files.map((file): MultipartPart => ({
		kind: 'file',
		name: file.identifier,
		data: file.contents,
	}));

	if (files.some((file) => file.tags !== undefined)) {
		const metadata = files
			.filter((file) => file.tags !== undefined)
			.map((file) => ({ identifier: file.identifier, tags: file.tags }));
		parts.push({ kind: 'text', name: QUILT_METADATA_FIELD, value: JSON.stringify(metadata) });
	}

	return {
		method: 'PUT',
		url: resolveUrl(config.publisherUrl, PUBLISHER_PATHS.quilts, storeQuery(options)),
		headers: {},
		body: { kind: 'multipart', parts },
	};
}

export function buildReadBlobRequest(config: WalrusConfig, blobId: string): HttpRequestSpec {
	assertUrlSafeIdentifier(blobId);
	return get(config, AGGREGATOR_PATHS.blob(blobId));
}

export function buildBlobMetadataRequest(config: WalrusConfig, blobId: string): HttpRequestSpec {
	assertUrlSafeIdentifier(blobId);
	return { ...get(config, AGGREGATOR_PATHS.blob(blobId)), method: 'HEAD' };
}

export function buildReadBlobByObjectIdRequest(
	config: WalrusConfig,
	objectId: string,
): HttpRequestSpec {
	const normalized = normalizeSuiObjectId(objectId);
	if (!isValidSuiObjectId(normalized)) {
		throw new InvalidIdentifierError(`Invalid Sui object id: ${objectId}`, objectId);
	}
	return get(config, AGGREGATOR_PATHS.blobByObjectId(normalized));
}

export function buildReadQuiltPatchRequest(
	config: WalrusConfig,
	quiltPatchId: string,
): HttpRequestSpec {
	parseQuiltPatchId(quiltPatchId);
	return get(config, AGGREGATOR_PATHS.blobByQuiltPatchId(quiltPatchId));
}

export function buildReadQuiltFileRequest(
	config: WalrusConfig,
	quiltId: string,
	identifier: string,
): HttpRequestSpec {
	decodeBlobId(quiltId);
	return get(config, AGGREGATOR_PATHS.blobByQuiltIdAndIdentifier(quiltId, identifier));
}

function get(config: WalrusConfig, path: string): HttpRequestSpec {
	return {
		method: 'GET',
		url: resolveUrl(config.aggregatorUrl, path),
		headers: {},
	};
}

function storeQuery({
	epochs,
	deletable,
	permanent,
	sendObjectTo,
	force,
}: StoreOptions): URLSearchParams {
	const query = new URLSearchParams();

	if (epochs !== undefined) {
		if (!Number.isSafeInteger(epochs) || epochs <= 0) {
			throw new InvalidParameterError(`epochs must be a positive integer, got ${epochs}`);
		}
		query.append('epochs', epochs.toString());
	}
	if (deletable !== undefined) {
		query.append('deletable', String(deletable));
	}
	if (permanent !== undefined) {
		query.append('permanent', String(permanent));
	}
	if (sendObjectTo !== undefined) {
		const address = normalizeSuiAddress(sendObjectTo);
		if (!isValidSuiAddress(address)) {
			throw new InvalidParameterError(`sendObjectTo is not a Sui address: ${sendObjectTo}`);
		}
		query.append('send_object_to', address);
	}
	if (force !== undefined) {
		query.append('force', String(force));
	}

	return query;
}
