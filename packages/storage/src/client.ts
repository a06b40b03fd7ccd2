/**
 * Project-scoped S3-compatible storage client
 *
 * Features:
 * - Exact endpoint, path-style addressing
 * - API key + organisation/project routing on every request
 * - Streaming uploads and downloads
 * - Classified errors, no retries of its own (the SDK's maxAttempts applies)
 * - Structured logging (no secrets)
 */

import {
  S3Client,
  CopyObjectCommand,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  S3ServiceException,
  PutObjectCommand,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { Readable } from 'stream';
import { createLogger } from '@scoped-s3/config';
import { createApiKeyCredentials, createStaticCredentials, passThroughSigner } from './credentials.js';
import { endpointClientConfig, resolveEndpoint, type ResolvedEndpoint } from './endpoint.js';
import { classifyError, ConfigurationError, type StorageErrorContext } from './errors.js';
import { getProjectRoutingPlugin } from './project-routing.js';
import { guardBody, toRequestBody, withFileSource, writeBodyToFile } from './transfer.js';
import type {
  BucketSummary,
  ByteSource,
  CallOptions,
  CopyObjectResult,
  DownloadResult,
  GetObjectResult,
  ObjectListing,
  ObjectMetadata,
  ObjectRef,
  ObjectSummary,
  ProjectClientOptions,
  ProjectScope,
  ProjectStorageClient,
  PutObjectOptions,
  PutObjectResult,
  S3CredentialClientOptions,
} from './types.js';

const logger = createLogger('storage');

/**
 * Validate and freeze the organisation/project pair
 */
function resolveScope(options: ProjectClientOptions): ProjectScope {
  const { projectId, organisationId = 0 } = options;

  if (!Number.isSafeInteger(projectId) || projectId <= 0) {
    throw new ConfigurationError(`Project id must be a positive integer. Got: ${projectId}`);
  }
  if (!Number.isSafeInteger(organisationId) || organisationId < 0) {
    throw new ConfigurationError(`Organisation id must be a non-negative integer. Got: ${organisationId}`);
  }

  return Object.freeze({ organisationId, projectId });
}

function transportConfig(options: ProjectClientOptions | S3CredentialClientOptions): Partial<S3ClientConfig> {
  const config: Partial<S3ClientConfig> = {
    // Third-party backends reject the default CRC32 trailers on streamed bodies
    requestChecksumCalculation: 'WHEN_REQUIRED',
    responseChecksumValidation: 'WHEN_REQUIRED',
  };
  if (options.maxAttempts !== undefined) {
    config.maxAttempts = options.maxAttempts;
  }
  if (options.requestHandler !== undefined) {
    config.requestHandler = options.requestHandler;
  }
  return config;
}

/**
 * Create a client that authenticates with an API key and scopes every call
 * to one organisation/project. Nothing is sent over the network here.
 *
 * @throws ConfigurationError for an unparsable URL, empty API key or bad ids
 */
export function createProjectStorageClient(options: ProjectClientOptions): ProjectStorageClient {
  const endpoint = resolveEndpoint(options.url);
  const { apiKey, provider } = createApiKeyCredentials(options.apiKey);
  const scope = resolveScope(options);

  const s3 = new S3Client({
    ...endpointClientConfig(endpoint, options.region),
    ...transportConfig(options),
    credentials: provider,
    signer: passThroughSigner,
  });
  s3.middlewareStack.use(getProjectRoutingPlugin({ ...scope, apiKey, basePath: endpoint.basePath }));

  logger.debug(
    {
      event: 'storage.client.created',
      endpointHost: endpoint.host,
      organisationId: scope.organisationId,
      projectId: scope.projectId,
    },
    'Project storage client created'
  );

  return buildClient(s3, endpoint, scope);
}

/**
 * Create a client that signs requests with native S3 credentials and
 * talks to the endpoint directly, without project routing.
 */
export function createS3CredentialStorageClient(options: S3CredentialClientOptions): ProjectStorageClient {
  const endpoint = resolveEndpoint(options.url);
  const credentials = createStaticCredentials(options.credentials);

  const s3 = new S3Client({
    ...endpointClientConfig(endpoint, options.region),
    ...transportConfig(options),
    credentials,
  });

  logger.debug({ event: 'storage.client.created', endpointHost: endpoint.host }, 'S3 credential storage client created');

  return buildClient(s3, endpoint, null);
}

function toMetadata(output: {
  ContentLength?: number;
  ContentType?: string;
  LastModified?: Date;
  ETag?: string;
  Metadata?: Record<string, string>;
}): ObjectMetadata {
  return {
    size: output.ContentLength ?? 0,
    contentType: output.ContentType,
    lastModified: output.LastModified,
    etag: output.ETag,
    metadata: { ...(output.Metadata ?? {}) },
  };
}

/** `bucket/key` with the key URI-encoded segment by segment */
export function copySource(source: ObjectRef): string {
  const key = source.key.split('/').map(encodeURIComponent).join('/');
  return `${source.bucket}/${key}`;
}

function buildClient(s3: S3Client, endpoint: ResolvedEndpoint, scope: ProjectScope | null): ProjectStorageClient {
  const scopeFields = scope ? { organisationId: scope.organisationId, projectId: scope.projectId } : {};

  /**
   * Run one SDK call with logging and error classification
   */
  async function run<T>(context: StorageErrorContext & { operation: string }, call: () => Promise<T>): Promise<T> {
    const event = `storage.${context.operation.replace(/ /g, '_')}`;
    const startTime = Date.now();
    const logContext = { bucket: context.bucket, key: context.key, ...scopeFields };

    logger.debug({ event: `${event}.start`, ...logContext });

    try {
      const result = await call();
      logger.debug({ event: `${event}.success`, ...logContext, durationMs: Date.now() - startTime });
      return result;
    } catch (error) {
      const classified = classifyError(error, context);
      logger.warn(
        {
          event: `${event}.fail`,
          ...logContext,
          kind: classified.kind,
          statusCode: classified.statusCode,
          code: classified.code,
          durationMs: Date.now() - startTime,
        },
        classified.message
      );
      throw classified;
    }
  }

  async function putObject(
    bucket: string,
    key: string,
    source: ByteSource,
    options: PutObjectOptions = {}
  ): Promise<PutObjectResult> {
    const { body, contentLength } = toRequestBody(source);
    const length = options.contentLength ?? contentLength;

    return run({ operation: 'put object', bucket, key }, async () => {
      const output = await s3.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentLength: length,
          ContentType: options.contentType,
          Metadata: options.metadata,
        }),
        { abortSignal: options.abortSignal }
      );
      return { etag: output.ETag, versionId: output.VersionId };
    });
  }

  async function getObject(bucket: string, key: string, options: CallOptions = {}): Promise<GetObjectResult> {
    const context = { operation: 'get object', bucket, key };

    return run(context, async () => {
      const output = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }), {
        abortSignal: options.abortSignal,
      });
      const body = output.Body instanceof Readable ? output.Body : Readable.from([]);
      return { ...toMetadata(output), body: guardBody(body, context) };
    });
  }

  const client: ProjectStorageClient = {
    endpoint: endpoint.url,
    scope,

    async createBucket(name, options = {}) {
      await run({ operation: 'create bucket', bucket: name }, () =>
        s3.send(new CreateBucketCommand({ Bucket: name }), { abortSignal: options.abortSignal })
      );
    },

    async deleteBucket(name, options = {}) {
      await run({ operation: 'delete bucket', bucket: name }, () =>
        s3.send(new DeleteBucketCommand({ Bucket: name }), { abortSignal: options.abortSignal })
      );
    },

    async listBuckets(options = {}) {
      return run({ operation: 'list buckets' }, async () => {
        const output = await s3.send(new ListBucketsCommand({}), { abortSignal: options.abortSignal });
        const buckets: BucketSummary[] = [];
        for (const bucket of output.Buckets ?? []) {
          if (bucket.Name) {
            buckets.push({ name: bucket.Name, createdAt: bucket.CreationDate });
          }
        }
        return buckets;
      });
    },

    putObject,

    async putObjectFromFile(bucket, key, filePath, options = {}) {
      const context = { operation: 'put object', bucket, key };
      return withFileSource(
        filePath,
        ({ stream, size }) => putObject(bucket, key, stream, { ...options, contentLength: size }),
        context
      );
    },

    getObject,

    async getObjectToFile(bucket, key, filePath, options = {}): Promise<DownloadResult> {
      const { body, ...metadata } = await getObject(bucket, key, options);
      const bytesWritten = await writeBodyToFile(body, filePath, {
        signal: options.abortSignal,
        operation: 'get object',
        bucket,
        key,
      });
      logger.debug({ event: 'storage.get_object.saved', bucket, key, bytesWritten, ...scopeFields });
      return { ...metadata, bytesWritten };
    },

    async copyObject(source, target, options = {}): Promise<CopyObjectResult> {
      return run({ operation: 'copy object', bucket: target.bucket, key: target.key }, async () => {
        const output = await s3.send(
          new CopyObjectCommand({ Bucket: target.bucket, Key: target.key, CopySource: copySource(source) }),
          { abortSignal: options.abortSignal }
        );
        return {
          etag: output.CopyObjectResult?.ETag,
          lastModified: output.CopyObjectResult?.LastModified,
        };
      });
    },

    async deleteObject(bucket, key, options = {}) {
      await run({ operation: 'delete object', bucket, key }, async () => {
        try {
          await s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }), { abortSignal: options.abortSignal });
        } catch (error) {
          // Deleting a missing key is a success, whatever status the backend used to say so
          if (error instanceof S3ServiceException && error.name === 'NoSuchKey') {
            logger.debug({ event: 'storage.delete_object.missing', bucket, key, ...scopeFields });
            return;
          }
          throw error;
        }
      });
    },

    async listObjects(bucket, options = {}): Promise<ObjectListing> {
      return run({ operation: 'list objects', bucket }, async () => {
        const output = await s3.send(
          new ListObjectsV2Command({ Bucket: bucket, ContinuationToken: options.continuationToken }),
          { abortSignal: options.abortSignal }
        );
        const objects: ObjectSummary[] = [];
        for (const object of output.Contents ?? []) {
          if (object.Key !== undefined) {
            objects.push({ key: object.Key, size: object.Size, lastModified: object.LastModified, etag: object.ETag });
          }
        }
        return {
          objects,
          isTruncated: output.IsTruncated ?? false,
          nextContinuationToken: output.NextContinuationToken,
        };
      });
    },

    async headObject(bucket, key, options = {}) {
      return run({ operation: 'head object', bucket, key }, async () => {
        const output = await s3.send(new HeadObjectCommand({ Bucket: bucket, Key: key }), {
          abortSignal: options.abortSignal,
        });
        return toMetadata(output);
      });
    },

    destroy() {
      s3.destroy();
    },
  };

  return Object.freeze(client);
}
