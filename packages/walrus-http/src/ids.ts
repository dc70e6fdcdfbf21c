// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { bcs } from '@mysten/sui/bcs';
import { fromBase64, toBase64 } from '@mysten/sui/utils';

import { BLOB_ID_LENGTH, QUILT_PATCH_ID_VERSION } from './constants.js';
import { InvalidIdentifierError } from './error.js';
import type { QuiltPatchIdParts } from './types.js';

const BASE64_URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

const QuiltPatchId = bcs.struct('QuiltPatchId', {
	quiltId: bcs.bytes(BLOB_ID_LENGTH),
	version: bcs.u8(),
	startIndex: bcs.u16(),
	endIndex: bcs.u16(),
});

// 32 byte quilt id, u8 version, two u16 indices
const QUILT_PATCH_ID_LENGTH = BLOB_ID_LENGTH + 5;

export function toBase64Url(bytes: Uint8Array): string {
	return toBase64(bytes).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/**
 * Decodes unpadded base64url. Padding, characters outside the URL-safe alphabet and
 * encodings that do not round-trip (stray trailing bits) are rejected.
 */
export function fromBase64Url(value: string): Uint8Array {
	if (!BASE64_URL_ALPHABET.test(value)) {
		throw new InvalidIdentifierError(
			`Identifier contains characters outside the base64url alphabet: ${value}`,
			value,
		);
	}
	if (value.length % 4 === 1) {
		throw new InvalidIdentifierError(`Identifier has an impossible base64 length: ${value}`, value);
	}

	const padded = value.replace(/-/g, '+').replace(/_/g, '/') + '='.repeat((4 - (value.length % 4)) % 4);
	const bytes = fromBase64(padded);
	if (toBase64Url(bytes) !== value) {
		throw new InvalidIdentifierError(`Identifier is not canonically encoded: ${value}`, value);
	}
	return bytes;
}

export function encodeBlobId(bytes: Uint8Array): string {
	if (bytes.length !== BLOB_ID_LENGTH) {
		throw new InvalidIdentifierError(
			`A blob id is ${BLOB_ID_LENGTH} bytes long, got ${bytes.length}`,
			toBase64Url(bytes),
		);
	}
	return toBase64Url(bytes);
}

export function decodeBlobId(blobId: string): Uint8Array {
	const bytes = fromBase64Url(blobId);
	if (bytes.length !== BLOB_ID_LENGTH) {
		throw new InvalidIdentifierError(
			`A blob id decodes to ${BLOB_ID_LENGTH} bytes, got ${bytes.length}`,
			blobId,
		);
	}
	return bytes;
}

/** Checks only that the id can be placed in a URL path as is */
export function assertUrlSafeIdentifier(value: string): void {
	if (value.length === 0 || !BASE64_URL_ALPHABET.test(value)) {
		throw new InvalidIdentifierError(`Not a base64url identifier: ${value}`, value);
	}
}

export function encodeQuiltPatchId({ quiltId, version, startIndex, endIndex }: QuiltPatchIdParts): string {
	return toBase64Url(
		QuiltPatchId.serialize({
			quiltId: decodeBlobId(quiltId),
			version,
			startIndex,
			endIndex,
		}).toBytes(),
	);
}

export function parseQuiltPatchId(quiltPatchId: string): QuiltPatchIdParts {
	const bytes = fromBase64Url(quiltPatchId);
	if (bytes.length !== QUILT_PATCH_ID_LENGTH) {
		throw new InvalidIdentifierError(
			`A quilt patch id decodes to ${QUILT_PATCH_ID_LENGTH} bytes, got ${bytes.length}`,
			quiltPatchId,
		);
	}

	const parsed = QuiltPatchId.parse(bytes);
	if (parsed.version !== QUILT_PATCH_ID_VERSION) {
		throw new InvalidIdentifierError(
			`Unsupported quilt patch id version ${parsed.version}`,
			quiltPatchId,
		);
	}

	return {
		quiltId: toBase64Url(parsed.quiltId),
		version: parsed.version,
		startIndex: parsed.startIndex,
		endIndex: parsed.endIndex,
	};
}

export function isQuiltPatchId(value: string): boolean {
	try {
		parseQuiltPatchId(value);
		return true;
	} catch (error) {
		if (error instanceof InvalidIdentifierError) {
			return false;
		}
		throw error;
	}
}
