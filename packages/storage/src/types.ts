/**
 * Types for storage operations
 */

import type { Readable } from 'stream';
import type { S3ClientConfig } from '@aws-sdk/client-s3';

/** Anything that produces the bytes of an upload */
export type ByteSource = Uint8Array | string | Readable | AsyncIterable<Uint8Array>;

export interface S3Credentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

interface BaseClientOptions {
  /** Base URL of the backend, e.g. http://localhost:9000 */
  url: string;
  region?: string;
  /** Attempts made by the SDK per call (its own retry policy); the client adds none */
  maxAttempts?: number;
  /** HTTP transport override */
  requestHandler?: S3ClientConfig['requestHandler'];
}

export interface ProjectClientOptions extends BaseClientOptions {
  apiKey: string;
  projectId: number;
  organisationId?: number;
}

export interface S3CredentialClientOptions extends BaseClientOptions {
  credentials: S3Credentials;
}

export interface ProjectScope {
  organisationId: number;
  projectId: number;
}

export interface ObjectRef {
  bucket: string;
  key: string;
}

export interface CallOptions {
  abortSignal?: AbortSignal;
}

export interface ListObjectsOptions extends CallOptions {
  /** `nextContinuationToken` of the previous page */
  continuationToken?: string;
}

export interface PutObjectOptions extends CallOptions {
  contentType?: string;
  /** Required by most backends for streamed bodies; computed for files, buffers and strings */
  contentLength?: number;
  metadata?: Record<string, string>;
}

export interface BucketSummary {
  name: string;
  createdAt?: Date;
}

export interface ObjectSummary {
  key: string;
  size?: number;
  lastModified?: Date;
  etag?: string;
}

/** One page of a bucket listing; pagination is left to the caller */
export interface ObjectListing {
  objects: ObjectSummary[];
  isTruncated: boolean;
  nextContinuationToken?: string;
}

export interface ObjectMetadata {
  size: number;
  contentType?: string;
  lastModified?: Date;
  etag?: string;
  metadata: Record<string, string>;
}

export interface GetObjectResult extends ObjectMetadata {
  /** Lazy body; failures while reading it are TransportError */
  body: Readable;
}

export interface PutObjectResult {
  etag?: string;
  versionId?: string;
}

export interface CopyObjectResult {
  etag?: string;
  lastModified?: Date;
}

export interface DownloadResult extends ObjectMetadata {
  bytesWritten: number;
}

export interface ProjectStorageClient {
  readonly endpoint: string;
  /** null when the client uses native S3 credentials */
  readonly scope: ProjectScope | null;

  createBucket(name: string, options?: CallOptions): Promise<void>;
  deleteBucket(name: string, options?: CallOptions): Promise<void>;
  listBuckets(options?: CallOptions): Promise<BucketSummary[]>;

  putObject(bucket: string, key: string, source: ByteSource, options?: PutObjectOptions): Promise<PutObjectResult>;
  putObjectFromFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: Omit<PutObjectOptions, 'contentLength'>
  ): Promise<PutObjectResult>;
  getObject(bucket: string, key: string, options?: CallOptions): Promise<GetObjectResult>;
  getObjectToFile(bucket: string, key: string, filePath: string, options?: CallOptions): Promise<DownloadResult>;
  copyObject(source: ObjectRef, target: ObjectRef, options?: CallOptions): Promise<CopyObjectResult>;
  deleteObject(bucket: string, key: string, options?: CallOptions): Promise<void>;
  listObjects(bucket: string, options?: ListObjectsOptions): Promise<ObjectListing>;
  headObject(bucket: string, key: string, options?: CallOptions): Promise<ObjectMetadata>;

  /** Release pooled sockets held by the transport */
  destroy(): void;
}
