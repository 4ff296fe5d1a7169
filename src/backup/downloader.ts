import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as fs from 'fs-extra';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { commitTempFile, discardTempFile, tempPathFor } from '../storage/jsonStore';
import { NetworkError, StorageError, describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface DownloadOptions {
  client: AxiosInstance;
  /** Site name, used to label errors. */
  site: string;
  timeoutMs: number;
  userAgent: string;
  snippetBytes: number;
  /** Run-wide cancellation. Independent of the per-request deadline. */
  signal?: AbortSignal;
}

export interface DownloadResult {
  path: string;
  bytes: number;
}

/**
 * Reads at most `limit` bytes of a response body for diagnostics and then
 * drops the rest of the stream.
 */
export async function readSnippet(stream: Readable, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  try {
    for await (const chunk of stream) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      chunks.push(buffer);
      size += buffer.length;
      if (size >= limit) break;
    }
  } catch (error) {
    logger.debug(`Could not read error body: ${describeError(error)}`);
  } finally {
    stream.destroy();
  }

  return Buffer.concat(chunks).subarray(0, limit).toString('utf-8').trim();
}

function errorCode(error: unknown): string | undefined {
  if (axios.isAxiosError(error)) return error.code;
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

/**
 * Streams `url` into `finalPath` through `<finalPath>.tmp`.
 *
 * The final path only ever appears complete: the body is written to the temp
 * file, fsync'ed and renamed. Any failure removes the temp file. Non-2xx
 * responses become a NetworkError carrying the status and a short body excerpt.
 */
export async function downloadToFile(url: string, finalPath: string, options: DownloadOptions): Promise<DownloadResult> {
  const { client, site, timeoutMs, userAgent, snippetBytes, signal } = options;
  const tempPath = tempPathFor(finalPath);

  const deadline = new AbortController();
  const timer = setTimeout(() => deadline.abort(), timeoutMs);
  const onCancel = () => deadline.abort();
  signal?.addEventListener('abort', onCancel, { once: true });
  if (signal?.aborted) {
    deadline.abort();
  }

  const interruption = (cause: unknown): NetworkError | null => {
    if (signal?.aborted) {
      return new NetworkError('download cancelled', site, 'CANCELLED', undefined, undefined, { cause });
    }
    if (deadline.signal.aborted) {
      return new NetworkError(`timed out after ${timeoutMs}ms`, site, 'TIMEOUT', undefined, undefined, { cause });
    }
    return null;
  };

  try {
    let response: AxiosResponse<Readable>;
    try {
      response = await client.get<Readable>(url, {
        responseType: 'stream',
        timeout: timeoutMs,
        signal: deadline.signal,
        headers: { 'User-Agent': userAgent },
        validateStatus: () => true,
      });
    } catch (error) {
      const interrupted = interruption(error);
      if (interrupted) throw interrupted;

      const code = errorCode(error);
      if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
        throw new NetworkError(`timed out after ${timeoutMs}ms`, site, 'TIMEOUT', undefined, undefined, { cause: error });
      }
      throw new NetworkError(`http get: ${describeError(error)}`, site, 'NETWORK', undefined, undefined, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      const snippet = await readSnippet(response.data, snippetBytes);
      throw new NetworkError(`http status ${response.status}: ${snippet}`, site, 'HTTP_STATUS', response.status, snippet);
    }

    // pipeline() forwards a source failure into the writer, so a writer error
    // only counts as a disk problem when the body was still intact
    const body = response.data;
    let sourceFailed = false;
    let writeFailed = false;
    body.once('error', () => {
      sourceFailed = true;
    });
    body.once('close', () => {
      if (!body.readableEnded) sourceFailed = true;
    });

    const writer = fs.createWriteStream(tempPath);
    writer.once('error', () => {
      if (!sourceFailed) writeFailed = true;
    });

    try {
      await pipeline(body, writer, { signal: deadline.signal });
    } catch (error) {
      await discardTempFile(tempPath);

      const interrupted = interruption(error);
      if (interrupted) throw interrupted;
      if (writeFailed) {
        throw new StorageError(`write ${tempPath}: ${describeError(error)}`, site, { cause: error });
      }
      throw new NetworkError(`reading body: ${describeError(error)}`, site, 'NETWORK', undefined, undefined, { cause: error });
    }

    const bytes = writer.bytesWritten;

    try {
      await commitTempFile(tempPath, finalPath);
    } catch (error) {
      await discardTempFile(tempPath);
      throw new StorageError(`commit ${finalPath}: ${describeError(error)}`, site, { cause: error });
    }

    return { path: finalPath, bytes };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onCancel);
  }
}
