/**
 * Transfer adapter: local byte sources and sinks <-> SDK streaming bodies
 *
 * Local failures surface as LocalIoError; failures of the response stream
 * surface as TransportError. File handles are opened and closed in one
 * scope so they are released on success, error and abort alike.
 */

import { open, type FileHandle } from 'fs/promises';
import { PassThrough, Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { classifyError, isAbortError, toLocalIoError, type StorageErrorContext } from './errors.js';
import type { ByteSource } from './types.js';

export interface RequestBody {
  body: Readable | Uint8Array | string;
  /** Known length in bytes; undefined for streams */
  contentLength?: number;
}

export interface FileSource {
  stream: Readable;
  size: number;
}

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

/**
 * Normalize a byte source into an SDK request body without buffering streams
 */
export function toRequestBody(source: ByteSource): RequestBody {
  if (typeof source === 'string') {
    return { body: source, contentLength: Buffer.byteLength(source) };
  }
  if (source instanceof Uint8Array) {
    return { body: source, contentLength: source.byteLength };
  }
  if (source instanceof Readable) {
    return { body: source };
  }
  if (isAsyncIterable(source)) {
    return { body: Readable.from(source, { objectMode: false }) };
  }
  throw new TypeError('Unsupported byte source');
}

/**
 * Open a local file for upload, run `use`, then release the handle.
 */
export async function withFileSource<T>(
  path: string,
  use: (source: FileSource) => Promise<T>,
  context: StorageErrorContext = {}
): Promise<T> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw toLocalIoError(error, path, context);
  }

  let stream: Readable | undefined;
  let readFailure: unknown;

  try {
    let size: number;
    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw Object.assign(new Error('not a regular file'), { code: 'EISDIR' });
      }
      size = stats.size;
    } catch (error) {
      throw toLocalIoError(error, path, context);
    }

    const fileStream = handle.createReadStream({ autoClose: false });
    fileStream.once('error', (error) => {
      readFailure = error;
    });
    stream = fileStream;

    return await use({ stream: fileStream, size });
  } catch (error) {
    // A read failure wins over whatever the request reported afterwards
    if (readFailure !== undefined && !isAbortError(readFailure)) {
      throw toLocalIoError(readFailure, path, context);
    }
    throw error;
  } finally {
    stream?.destroy();
    await handle.close();
  }
}

/**
 * Relay a response body, turning stream failures into TransportError.
 * Destroying the returned stream destroys the response body too.
 */
export function guardBody(body: Readable, context: StorageErrorContext = {}): Readable {
  const guarded = new PassThrough();

  body.on('error', (error) => {
    guarded.destroy(classifyError(error, context));
  });
  body.on('close', () => {
    if (!body.readableEnded && !guarded.destroyed) {
      guarded.destroy(classifyError(new Error('response body closed before end'), context));
    }
  });
  guarded.on('close', () => {
    if (!body.destroyed) body.destroy();
  });

  body.pipe(guarded);
  return guarded;
}

/**
 * Read a body to the end
 */
export async function collectBody(body: AsyncIterable<Uint8Array>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Stream a response body into a local file.
 * The partial file is left in place when the transfer fails.
 * @returns bytes written
 */
export async function writeBodyToFile(
  body: Readable,
  path: string,
  options: { signal?: AbortSignal } & StorageErrorContext = {}
): Promise<number> {
  const { signal, ...context } = options;

  let handle: FileHandle;
  try {
    handle = await open(path, 'w');
  } catch (error) {
    body.destroy();
    throw toLocalIoError(error, path, context);
  }

  let written = 0;
  // Whichever side fails first is the origin; the pipeline then tears down the other
  const failure: { origin?: 'source' | 'sink'; error?: unknown } = {};
  const sink = handle.createWriteStream({ autoClose: false });
  body.once('error', (error) => {
    if (!failure.origin) Object.assign(failure, { origin: 'source', error });
  });
  sink.once('error', (error) => {
    if (!failure.origin) Object.assign(failure, { origin: 'sink', error });
  });

  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      written += chunk.length;
      callback(null, chunk);
    },
  });

  try {
    await pipeline(body, counter, sink, signal ? { signal } : {});
    return written;
  } catch (error) {
    if (!isAbortError(error) && failure.origin === 'sink') {
      throw toLocalIoError(failure.error, path, context);
    }
    throw classifyError(error, context);
  } finally {
    body.destroy();
    sink.destroy();
    await handle.close();
  }
}
