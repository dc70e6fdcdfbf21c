// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';

import {
	NotFoundError,
	QuiltPatchCountMismatchError,
	ResponseParseError,
	UnexpectedResponseShapeError,
	WalrusAPIError,
	excerpt,
} from './error.js';
import type {
	AlreadyCertified,
	BlobMetadata,
	HttpResponse,
	NewlyCreated,
	QuiltFile,
	QuiltStoreResult,
	StoreResult,
	StoredQuiltBlob,
} from './types.js';

const BlobObjectSchema = z.object({
	id: z.string(),
	registeredEpoch: z.number(),
	blobId: z.string(),
	size: z.number(),
	encodingType: z.string(),
	certifiedEpoch: z.number().nullable(),
	storage: z.object({
		id: z.string(),
		startEpoch: z.number(),
		endEpoch: z.number(),
		storageSize: z.number(),
	}),
	deletable: z.boolean(),
});

const ResourceOperationSchema = z.union([
	z
		.object({
			registerFromScratch: z.object({ encodedLength: z.number(), epochsAhead: z.number() }),
		})
		.transform(({ registerFromScratch }) => ({
			kind: 'registerFromScratch' as const,
			...registerFromScratch,
		})),
	z
		.object({ reuseStorage: z.object({ encodedLength: z.number() }) })
		.transform(({ reuseStorage }) => ({ kind: 'reuseStorage' as const, ...reuseStorage })),
	z
		.object({ reuseRegistration: z.object({ encodedLength: z.number() }) })
		.transform(({ reuseRegistration }) => ({
			kind: 'reuseRegistration' as const,
			...reuseRegistration,
		})),
	z.record(z.string(), z.unknown()).transform((raw) => ({ kind: 'other' as const, raw })),
]);

const NewlyCreatedSchema = z
	.object({
		blobObject: BlobObjectSchema,
		resourceOperation: ResourceOperationSchema,
		cost: z.number(),
	})
	.transform((value): NewlyCreated => ({ kind: 'newlyCreated', ...value }));

const AlreadyCertifiedSchema = z
	.object({
		blobId: z.string(),
		event: z.object({ txDigest: z.string(), eventSeq: z.string() }).optional(),
		object: z.string().optional(),
		endEpoch: z.number(),
	})
	.transform((value, ctx): AlreadyCertified => {
		const { blobId, event, object, endEpoch } = value;
		if (event !== undefined && object === undefined) {
			return { kind: 'alreadyCertified', blobId, certifiedBy: { kind: 'event', ...event }, endEpoch };
		}
		if (object !== undefined && event === undefined) {
			return {
				kind: 'alreadyCertified',
				blobId,
				certifiedBy: { kind: 'object', objectId: object },
				endEpoch,
			};
		}
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: 'expected exactly one of "event" and "object"',
		});
		return z.NEVER;
	});

const StoreResponseFieldsSchema = z.record(z.string(), z.unknown());

const QuiltStoreResponseSchema = z.object({
	blobStoreResult: z.unknown(),
	storedQuiltBlobs: z.array(z.object({ identifier: z.string(), quiltPatchId: z.string() })),
});

export function isSuccess(status: number): boolean {
	return status >= 200 && status < 300;
}

/**
 * Interprets a publisher answer to a blob store. The body carries exactly one of
 * `newlyCreated` and `alreadyCertified`; anything else is rejected rather than guessed at.
 */
export function parseStoreResponse(response: HttpResponse): StoreResult {
	if (!isSuccess(response.status)) {
		throw WalrusAPIError.fromResponse(response);
	}
	return toStoreResult(parseJson(response));
}

export function parseQuiltStoreResponse(
	response: HttpResponse,
	files: QuiltFile[],
): QuiltStoreResult {
	if (!isSuccess(response.status)) {
		throw WalrusAPIError.fromResponse(response);
	}

	const parsed = QuiltStoreResponseSchema.safeParse(parseJson(response));
	if (!parsed.success) {
		throw new UnexpectedResponseShapeError(
			`Unexpected quilt store response: ${parsed.error.message}`,
		);
	}

	return {
		blobStoreResult: toStoreResult(parsed.data.blobStoreResult),
		storedQuiltBlobs: restoreInputOrder(files, parsed.data.storedQuiltBlobs),
	};
}

export function parseReadResponse(response: HttpResponse): Uint8Array {
	assertReadable(response);
	return response.body;
}

export function parseBlobMetadataResponse(response: HttpResponse): BlobMetadata {
	assertReadable(response);

	const contentLength = Number(requireHeader(response, 'content-length'));
	if (!Number.isSafeInteger(contentLength) || contentLength < 0) {
		throw new ResponseParseError(
			`Invalid content-length header: ${response.headers['content-length']}`,
		);
	}

	return {
		contentLength,
		contentType: requireHeader(response, 'content-type'),
		etag: requireHeader(response, 'etag'),
	};
}

function assertReadable(response: HttpResponse) {
	if (response.status === 404) {
		throw new NotFoundError(excerpt(response.body));
	}
	if (!isSuccess(response.status)) {
		throw WalrusAPIError.fromResponse(response);
	}
}

function requireHeader(response: HttpResponse, name: string): string {
	const value = response.headers[name];
	if (value === undefined) {
		throw new ResponseParseError(`Missing header: ${name}`);
	}
	return value;
}

function parseJson(response: HttpResponse): unknown {
	try {
		return JSON.parse(new TextDecoder().decode(response.body));
	} catch (error) {
		throw new UnexpectedResponseShapeError(
			`Response body is not JSON: ${excerpt(response.body)}`,
			{ cause: error },
		);
	}
}

function toStoreResult(value: unknown): StoreResult {
	const fields = StoreResponseFieldsSchema.safeParse(value);
	if (!fields.success) {
		throw new UnexpectedResponseShapeError('Store response is not a JSON object');
	}

	const isNewlyCreated = 'newlyCreated' in fields.data;
	const isAlreadyCertified = 'alreadyCertified' in fields.data;
	if (isNewlyCreated === isAlreadyCertified) {
		throw new UnexpectedResponseShapeError(
			isNewlyCreated
				? 'Store response contains both "newlyCreated" and "alreadyCertified"'
				: `Store response contains neither "newlyCreated" nor "alreadyCertified": ${Object.keys(fields.data).join(', ')}`,
		);
	}

	const parsed = isNewlyCreated
		? NewlyCreatedSchema.safeParse(fields.data.newlyCreated)
		: AlreadyCertifiedSchema.safeParse(fields.data.alreadyCertified);
	if (!parsed.success) {
		throw new UnexpectedResponseShapeError(
			`Malformed ${isNewlyCreated ? 'newlyCreated' : 'alreadyCertified'} result: ${parsed.error.message}`,
		);
	}
	return parsed.data;
}

/**
 * The publisher returns patches sorted by identifier, not in upload order. With unique
 * identifiers the entries are matched by name; with duplicates only position is left.
 */
function restoreInputOrder(files: QuiltFile[], stored: StoredQuiltBlob[]): StoredQuiltBlob[] {
	if (stored.length !== files.length) {
		throw new QuiltPatchCountMismatchError(files.length, stored.length);
	}

	const identifiers = files.map((file) => file.identifier);
	if (new Set(identifiers).size !== identifiers.length) {
		return identifiers.map((identifier, i) => ({
			identifier,
			quiltPatchId: stored[i].quiltPatchId,
		}));
	}

	const patchIds = new Map(stored.map((blob) => [blob.identifier, blob.quiltPatchId]));
	return identifiers.map((identifier) => {
		const quiltPatchId = patchIds.get(identifier);
		if (quiltPatchId === undefined) {
			throw new UnexpectedResponseShapeError(
				`Quilt store response has no patch for identifier "${identifier}"`,
			);
		}
		return { identifier, quiltPatchId };
	});
}
