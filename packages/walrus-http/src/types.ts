// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export interface WalrusConfig {
	/** Normalized base URL, always ending with a slash */
	readonly aggregatorUrl: string;
	readonly publisherUrl: string;
}

export interface WalrusConfigInput {
	aggregatorUrl: string | URL;
	publisherUrl: string | URL;
}

// --- Store options ---

export interface StoreOptions {
	/** Number of epochs the blob is stored for. The publisher picks its default when absent */
	epochs?: number;
	deletable?: boolean;
	permanent?: boolean;
	/** Sui address that receives the created Blob object */
	sendObjectTo?: string;
	/** Store again even if the blob is already certified */
	force?: boolean;
}

// --- Store results ---

export interface StorageResource {
	id: string;
	startEpoch: number;
	endEpoch: number;
	storageSize: number;
}

export interface BlobObject {
	id: string;
	registeredEpoch: number;
	blobId: string;
	size: number;
	encodingType: string;
	certifiedEpoch: number | null;
	storage: StorageResource;
	deletable: boolean;
}

export type ResourceOperation =
	| { kind: 'registerFromScratch'; encodedLength: number; epochsAhead: number }
	| { kind: 'reuseStorage'; encodedLength: number }
	| { kind: 'reuseRegistration'; encodedLength: number }
	| { kind: 'other'; raw: Record<string, unknown> };

export type CertifiedBy =
	| { kind: 'event'; txDigest: string; eventSeq: string }
	| { kind: 'object'; objectId: string };

export interface NewlyCreated {
	kind: 'newlyCreated';
	blobObject: BlobObject;
	resourceOperation: ResourceOperation;
	cost: number;
}

export interface AlreadyCertified {
	kind: 'alreadyCertified';
	blobId: string;
	certifiedBy: CertifiedBy;
	endEpoch: number;
}

export type StoreResult = NewlyCreated | AlreadyCertified;

// --- Quilts ---

export interface QuiltFile {
	/** Name of the file inside the quilt, used to read it back by identifier */
	identifier: string;
	contents: Uint8Array;
	tags?: Record<string, string>;
}

export interface StoredQuiltBlob {
	identifier: string;
	quiltPatchId: string;
}

export interface QuiltStoreResult {
	blobStoreResult: StoreResult;
	/** One entry per stored file, in the order the files were given */
	storedQuiltBlobs: StoredQuiltBlob[];
}

export interface QuiltPatchIdParts {
	quiltId: string;
	version: number;
	startIndex: number;
	endIndex: number;
}

export interface BlobMetadata {
	contentLength: number;
	contentType: string;
	etag: string;
}

// --- HTTP exchange ---

export type HttpMethod = 'GET' | 'HEAD' | 'PUT';

export type MultipartPart =
	| { kind: 'file'; name: string; data: Uint8Array }
	| { kind: 'text'; name: string; value: string };

export type HttpRequestBody =
	| { kind: 'bytes'; data: Uint8Array }
	| { kind: 'multipart'; parts: MultipartPart[] };

export interface HttpRequestSpec {
	method: HttpMethod;
	url: string;
	headers: Record<string, string>;
	body?: HttpRequestBody;
}

export interface HttpResponse {
	status: number;
	/** Header names are lower-case */
	headers: Record<string, string>;
	body: Uint8Array;
}

/**
 * One request/response cycle: the request to send, and how to turn the response into a
 * result or a typed error. Both client flavours run the same operations.
 */
export interface WalrusOperation<T> {
	request: HttpRequestSpec;
	parse: (response: HttpResponse) => T;
}
