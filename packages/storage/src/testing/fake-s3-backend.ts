/**
 * In-process S3-compatible backend for tests
 *
 * Plugs into the SDK as its `requestHandler`, so requests go through the
 * real serializers, middleware and deserializers without opening a socket.
 * Implements just the bucket/object calls the client issues and records
 * every request it sees.
 */

import { createHash } from 'crypto';
import { Readable } from 'stream';
import { HttpResponse, type HttpHandler, type HttpRequest } from '@smithy/protocol-http';
import type { HeaderBag, HttpHandlerOptions, QueryParameterBag } from '@smithy/types';

export interface RecordedRequest {
  method: string;
  protocol: string;
  hostname: string;
  port?: number;
  path: string;
  query: QueryParameterBag;
  headers: HeaderBag;
  body: unknown;
}

export interface FakeS3BackendOptions {
  /** When set, requests must carry this x-api-key and the project path prefix */
  apiKey?: string;
  /** Endpoint mount path, '' for the root */
  basePath?: string;
  /** Size of response body chunks */
  chunkSize?: number;
  /** Answer DELETE of a missing key with 404 NoSuchKey instead of 204 */
  strictDeletes?: boolean;
  /** Keys per ListObjectsV2 page (default 1000) */
  pageSize?: number;
}

interface FakeHandlerConfig {
  chunkSize?: number;
}

interface StoredObject {
  data: Buffer;
  contentType?: string;
  metadata: Record<string, string>;
  lastModified: Date;
  etag: string;
}

interface StoredBucket {
  createdAt: Date;
  objects: Map<string, StoredObject>;
}

interface Target {
  scope: string;
  bucket: string;
  key: string;
}

const DEFAULT_SCOPE = 'default';
const FIXED_DATE = new Date('2024-05-01T12:00:00.000Z');

function abortError(): Error {
  return Object.assign(new Error('Request aborted'), { name: 'AbortError' });
}

function waitForAbort(options?: HttpHandlerOptions): Promise<never> {
  return new Promise((_resolve, reject) => {
    const signal = options?.abortSignal;
    if (!(signal instanceof AbortSignal)) return;
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    signal.addEventListener('abort', () => reject(abortError()), { once: true });
  });
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function lowerCaseHeaders(headers: HeaderBag): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name.toLowerCase()] = value;
  }
  return result;
}

async function readBody(body: unknown): Promise<Buffer> {
  if (body === undefined || body === null) {
    return Buffer.alloc(0);
  }
  if (typeof body === 'string') {
    return Buffer.from(body);
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  if (body instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }
  throw new Error(`FakeS3Backend cannot read request body of type ${typeof body}`);
}

export class FakeS3Backend implements HttpHandler<FakeHandlerConfig> {
  readonly requests: RecordedRequest[] = [];
  /** Response body bytes handed to the client so far */
  bodyBytesServed = 0;

  private readonly apiKey?: string;
  private readonly basePath: string;
  private readonly strictDeletes: boolean;
  private readonly pageSize: number;
  private chunkSize: number;
  private readonly scopes = new Map<string, Map<string, StoredBucket>>();
  private readonly stalledDownloads = new Map<string, () => void>();
  private readonly failingDownloads = new Set<string>();
  private readonly stalledUploads = new Map<string, (body: Readable) => void>();

  constructor(options: FakeS3BackendOptions = {}) {
    this.apiKey = options.apiKey;
    this.basePath = options.basePath ?? '';
    this.chunkSize = options.chunkSize ?? 16 * 1024;
    this.strictDeletes = options.strictDeletes ?? false;
    this.pageSize = options.pageSize ?? 1000;
  }

  updateHttpClientConfig(key: keyof FakeHandlerConfig, value: FakeHandlerConfig[typeof key]): void {
    if (key === 'chunkSize' && value !== undefined) {
      this.chunkSize = value;
    }
  }

  httpHandlerConfigs(): FakeHandlerConfig {
    return { chunkSize: this.chunkSize };
  }

  /**
   * Serve the first chunk of `key`, then hang until the client gives up.
   * Resolves once the first chunk is out.
   */
  stallDownloadOf(key: string): Promise<void> {
    return new Promise((resolve) => this.stalledDownloads.set(key, resolve));
  }

  /** Serve the first chunk of `key`, then break the stream */
  failDownloadOf(key: string): void {
    this.failingDownloads.add(key);
  }

  /**
   * Accept the upload of `key` but never finish reading it.
   * Resolves with the request body stream once it has data.
   */
  stallUploadOf(key: string): Promise<Readable> {
    return new Promise((resolve) => this.stalledUploads.set(key, resolve));
  }

  bucketNames(scope: string = DEFAULT_SCOPE): string[] {
    return [...(this.scopes.get(scope)?.keys() ?? [])];
  }

  storedObject(bucket: string, key: string, scope: string = DEFAULT_SCOPE): Buffer | undefined {
    return this.scopes.get(scope)?.get(bucket)?.objects.get(key)?.data;
  }

  async handle(request: HttpRequest, options?: HttpHandlerOptions): Promise<{ response: HttpResponse }> {
    this.requests.push({
      method: request.method,
      protocol: request.protocol,
      hostname: request.hostname,
      port: request.port,
      path: request.path,
      query: { ...request.query },
      headers: { ...request.headers },
      body: request.body,
    });

    if (options?.abortSignal?.aborted) {
      throw abortError();
    }

    const headers = lowerCaseHeaders(request.headers);
    const target = this.resolveTarget(request.path, headers);
    if (!target) {
      await readBody(request.body);
      return this.error(request.method, 403, 'AccessDenied', 'Access Denied');
    }

    const buckets = this.scopeBuckets(target.scope);
    const { bucket, key } = target;

    if (!bucket) {
      if (request.method === 'GET') return this.listBuckets(buckets);
      return this.error(request.method, 405, 'MethodNotAllowed', 'The specified method is not allowed');
    }

    if (!key) {
      switch (request.method) {
        case 'PUT':
          await readBody(request.body);
          return this.createBucket(buckets, bucket);
        case 'DELETE':
          return this.deleteBucket(buckets, bucket);
        case 'GET':
          return this.listObjects(buckets, bucket, request.query['continuation-token']);
        case 'HEAD':
          return buckets.has(bucket) ? this.ok(200, {}) : this.error('HEAD', 404, 'NotFound', '');
        default:
          return this.error(request.method, 405, 'MethodNotAllowed', 'The specified method is not allowed');
      }
    }

    const stored = buckets.get(bucket);
    if (!stored) {
      await readBody(request.body);
      return this.error(request.method, 404, 'NoSuchBucket', 'The specified bucket does not exist');
    }

    switch (request.method) {
      case 'PUT':
        if (headers['x-amz-copy-source']) {
          return this.copyObject(buckets, stored, key, headers['x-amz-copy-source']);
        }
        return this.putObject(stored, key, request.body, headers, options);
      case 'GET':
        return this.getObject(stored, key);
      case 'HEAD':
        return this.headObject(stored, key);
      case 'DELETE':
        if (!stored.objects.delete(key) && this.strictDeletes) {
          return this.error('DELETE', 404, 'NoSuchKey', 'The specified key does not exist.');
        }
        return this.ok(204, {});
      default:
        return this.error(request.method, 405, 'MethodNotAllowed', 'The specified method is not allowed');
    }
  }

  destroy(): void {
    this.stalledDownloads.clear();
    this.stalledUploads.clear();
  }

  private resolveTarget(path: string, headers: Record<string, string>): Target | null {
    if (this.basePath && path !== this.basePath && !path.startsWith(`${this.basePath}/`)) {
      return null;
    }
    let rest = path.slice(this.basePath.length);
    let scope = DEFAULT_SCOPE;

    if (this.apiKey !== undefined) {
      if (headers['x-api-key'] !== this.apiKey) {
        return null;
      }
      const match = /^\/api\/v1\/organisations\/(\d+)\/projects\/(\d+)\/s3(\/.*)?$/.exec(rest);
      if (!match) {
        return null;
      }
      scope = `${match[1]}/${match[2]}`;
      rest = match[3] ?? '';
    }

    if (rest === '' || rest === '/') {
      return { scope, bucket: '', key: '' };
    }

    const slash = rest.indexOf('/', 1);
    const bucket = decodeURIComponent(slash === -1 ? rest.slice(1) : rest.slice(1, slash));
    const key = slash === -1 ? '' : decodeURIComponent(rest.slice(slash + 1));
    return { scope, bucket, key };
  }

  private scopeBuckets(scope: string): Map<string, StoredBucket> {
    let buckets = this.scopes.get(scope);
    if (!buckets) {
      buckets = new Map();
      this.scopes.set(scope, buckets);
    }
    return buckets;
  }

  private listBuckets(buckets: Map<string, StoredBucket>): { response: HttpResponse } {
    const entries = [...buckets.entries()]
      .map(
        ([name, bucket]) =>
          `<Bucket><Name>${escapeXml(name)}</Name><CreationDate>${bucket.createdAt.toISOString()}</CreationDate></Bucket>`
      )
      .join('');
    return this.xml(
      200,
      `<ListAllMyBucketsResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/"><Owner><ID>fake-owner</ID></Owner><Buckets>${entries}</Buckets></ListAllMyBucketsResult>`
    );
  }

  private createBucket(buckets: Map<string, StoredBucket>, name: string): { response: HttpResponse } {
    if (buckets.has(name)) {
      return this.error('PUT', 409, 'BucketAlreadyOwnedByYou', 'Your previous request to create the named bucket succeeded and you already own it.');
    }
    buckets.set(name, { createdAt: FIXED_DATE, objects: new Map() });
    return this.ok(200, { location: `/${name}` });
  }

  private deleteBucket(buckets: Map<string, StoredBucket>, name: string): { response: HttpResponse } {
    const bucket = buckets.get(name);
    if (!bucket) {
      return this.error('DELETE', 404, 'NoSuchBucket', 'The specified bucket does not exist');
    }
    if (bucket.objects.size > 0) {
      return this.error('DELETE', 409, 'BucketNotEmpty', 'The bucket you tried to delete is not empty');
    }
    buckets.delete(name);
    return this.ok(204, {});
  }

  private listObjects(
    buckets: Map<string, StoredBucket>,
    name: string,
    continuationToken: QueryParameterBag[string] | undefined
  ): { response: HttpResponse } {
    const bucket = buckets.get(name);
    if (!bucket) {
      return this.error('GET', 404, 'NoSuchBucket', 'The specified bucket does not exist');
    }
    // The token is the last key of the previous page
    const after = typeof continuationToken === 'string' ? continuationToken : undefined;
    const remaining = [...bucket.objects.keys()].sort().filter((key) => after === undefined || key > after);
    const keys = remaining.slice(0, this.pageSize);
    const truncated = remaining.length > keys.length;
    const lastKey = keys[keys.length - 1];

    const contents = keys
      .map((key) => {
        const object = bucket.objects.get(key);
        if (!object) return '';
        return (
          `<Contents><Key>${escapeXml(key)}</Key><LastModified>${object.lastModified.toISOString()}</LastModified>` +
          `<ETag>${escapeXml(object.etag)}</ETag><Size>${object.data.length}</Size><StorageClass>STANDARD</StorageClass></Contents>`
        );
      })
      .join('');
    const next = truncated && lastKey !== undefined ? `<NextContinuationToken>${escapeXml(lastKey)}</NextContinuationToken>` : '';
    return this.xml(
      200,
      `<ListBucketResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/"><Name>${escapeXml(name)}</Name><Prefix></Prefix>` +
        `<KeyCount>${keys.length}</KeyCount><MaxKeys>${this.pageSize}</MaxKeys><IsTruncated>${truncated}</IsTruncated>${next}${contents}</ListBucketResult>`
    );
  }

  private async putObject(
    bucket: StoredBucket,
    key: string,
    body: unknown,
    headers: Record<string, string>,
    options?: HttpHandlerOptions
  ): Promise<{ response: HttpResponse }> {
    const stall = this.stalledUploads.get(key);
    if (stall && body instanceof Readable) {
      await new Promise<void>((resolve) => body.once('readable', () => resolve()));
      stall(body);
      return waitForAbort(options);
    }

    const data = await readBody(body);
    const metadata: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
      if (name.startsWith('x-amz-meta-')) {
        metadata[name.slice('x-amz-meta-'.length)] = value;
      }
    }
    const object: StoredObject = {
      data,
      contentType: headers['content-type'],
      metadata,
      lastModified: FIXED_DATE,
      etag: `"${createHash('md5').update(data).digest('hex')}"`,
    };
    bucket.objects.set(key, object);
    return this.ok(200, { etag: object.etag });
  }

  private copyObject(
    buckets: Map<string, StoredBucket>,
    target: StoredBucket,
    key: string,
    copySource: string
  ): { response: HttpResponse } {
    const source = decodeURIComponent(copySource.replace(/^\//, ''));
    const slash = source.indexOf('/');
    const sourceObject = slash === -1 ? undefined : buckets.get(source.slice(0, slash))?.objects.get(source.slice(slash + 1));
    if (!sourceObject) {
      return this.error('PUT', 404, 'NoSuchKey', 'The specified key does not exist.');
    }
    target.objects.set(key, { ...sourceObject, metadata: { ...sourceObject.metadata } });
    return this.xml(
      200,
      `<CopyObjectResult><LastModified>${FIXED_DATE.toISOString()}</LastModified><ETag>${escapeXml(sourceObject.etag)}</ETag></CopyObjectResult>`
    );
  }

  private getObject(bucket: StoredBucket, key: string): { response: HttpResponse } {
    const object = bucket.objects.get(key);
    if (!object) {
      return this.error('GET', 404, 'NoSuchKey', 'The specified key does not exist.');
    }
    return {
      response: new HttpResponse({
        statusCode: 200,
        headers: this.objectHeaders(object),
        body: this.objectBody(key, object.data),
      }),
    };
  }

  private headObject(bucket: StoredBucket, key: string): { response: HttpResponse } {
    const object = bucket.objects.get(key);
    if (!object) {
      return this.error('HEAD', 404, 'NotFound', '');
    }
    return { response: new HttpResponse({ statusCode: 200, headers: this.objectHeaders(object), body: Readable.from([]) }) };
  }

  private objectHeaders(object: StoredObject): HeaderBag {
    const headers: HeaderBag = {
      'content-length': String(object.data.length),
      'content-type': object.contentType ?? 'application/octet-stream',
      etag: object.etag,
      'last-modified': object.lastModified.toUTCString(),
    };
    for (const [name, value] of Object.entries(object.metadata)) {
      headers[`x-amz-meta-${name}`] = value;
    }
    return headers;
  }

  private objectBody(key: string, data: Buffer): Readable {
    const first = data.subarray(0, this.chunkSize);

    const stalled = this.stalledDownloads.get(key);
    if (stalled) {
      const body = new Readable({ read() {} });
      body.push(first);
      this.bodyBytesServed += first.length;
      stalled();
      return body;
    }

    if (this.failingDownloads.has(key)) {
      let sent = false;
      const onServed = (bytes: number) => {
        this.bodyBytesServed += bytes;
      };
      return new Readable({
        read() {
          if (!sent) {
            sent = true;
            onServed(first.length);
            this.push(first);
          } else {
            this.destroy(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }));
          }
        },
      });
    }

    const chunks: Buffer[] = [];
    for (let offset = 0; offset < data.length; offset += this.chunkSize) {
      chunks.push(data.subarray(offset, offset + this.chunkSize));
    }
    const onServed = (bytes: number) => {
      this.bodyBytesServed += bytes;
    };
    async function* serve(): AsyncGenerator<Buffer> {
      for (const chunk of chunks) {
        onServed(chunk.length);
        yield chunk;
      }
    }
    return Readable.from(serve(), { objectMode: false });
  }

  private ok(statusCode: number, headers: HeaderBag): { response: HttpResponse } {
    return { response: new HttpResponse({ statusCode, headers, body: Readable.from([]) }) };
  }

  private xml(statusCode: number, body: string): { response: HttpResponse } {
    const payload = Buffer.from(`<?xml version="1.0" encoding="UTF-8"?>\n${body}`);
    return {
      response: new HttpResponse({
        statusCode,
        headers: { 'content-type': 'application/xml', 'content-length': String(payload.length) },
        body: Readable.from([payload]),
      }),
    };
  }

  private error(method: string, statusCode: number, code: string, message: string): { response: HttpResponse } {
    const headers: HeaderBag = { 'x-amz-request-id': 'fake-request-id' };
    if (method === 'HEAD') {
      return { response: new HttpResponse({ statusCode, headers, body: Readable.from([]) }) };
    }
    const payload = Buffer.from(
      `<?xml version="1.0" encoding="UTF-8"?>\n<Error><Code>${code}</Code><Message>${escapeXml(message)}</Message><RequestId>fake-request-id</RequestId></Error>`
    );
    return {
      response: new HttpResponse({
        statusCode,
        headers: { ...headers, 'content-type': 'application/xml', 'content-length': String(payload.length) },
        body: Readable.from([payload]),
      }),
    };
  }
}
