/**
 * Asset transports: open a byte stream for an asset locator.
 *
 * Transports only open the source. Retries, timeouts and integrity checks
 * belong to the fetcher, which decides what to do with a TransportError
 * from its `retryable` flag.
 */

import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { fileURLToPath } from 'url';
import { errorMessage } from '../domain/errors';
import { errnoCode } from '../workspace/fs-utils';

/** An opened asset body. */
export interface AssetSource {
  stream: Readable;
  /** Size the source declares, if any. */
  contentLength?: number;
}

export interface AssetTransport {
  open(locator: string, signal: AbortSignal): Promise<AssetSource>;
}

/** A failure to open or read a source, classified for the retry loop. */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** Statuses in the 4xx range that are still worth retrying. */
const RETRYABLE_CLIENT_STATUSES = new Set([408, 429]);

export function isRetryableStatus(status: number): boolean {
  if (status >= 500) return true;
  return RETRYABLE_CLIENT_STATUSES.has(status);
}

function parseContentLength(header: string | null): number | undefined {
  if (header === null || !/^\d+$/.test(header.trim())) return undefined;
  return Number(header.trim());
}

/**
 * fetch decodes gzip and br bodies while content-length still counts the
 * encoded bytes, so an encoded response has no usable declared size.
 */
function declaredLength(headers: Headers): number | undefined {
  const encoding = headers.get('content-encoding');
  if (encoding !== null && encoding.trim() !== '' && encoding.trim().toLowerCase() !== 'identity') {
    return undefined;
  }
  return parseContentLength(headers.get('content-length'));
}

export type FetchFn = typeof fetch;

/** http(s) sources via fetch. */
export class HttpAssetTransport implements AssetTransport {
  constructor(
    private fetchImpl: FetchFn = fetch,
    private userAgent = 'draftpack-fetcher/1.0',
  ) {}

  async open(locator: string, signal: AbortSignal): Promise<AssetSource> {
    let response: Response;
    try {
      response = await this.fetchImpl(locator, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent, Accept: '*/*' },
        signal,
      });
    } catch (err) {
      if (signal.aborted) throw err;
      throw new TransportError(`Request to ${locator} failed: ${errorMessage(err)}`, true);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new TransportError(
        `GET ${locator} returned HTTP ${response.status}`,
        isRetryableStatus(response.status),
        response.status,
      );
    }
    if (!response.body) {
      return { stream: Readable.from([]), contentLength: 0 };
    }

    return {
      stream: Readable.fromWeb(response.body),
      contentLength: declaredLength(response.headers),
    };
  }
}

/** Local sources: `file://` URLs and absolute paths. Copied, never moved. */
export class LocalFileTransport implements AssetTransport {
  static handles(locator: string): boolean {
    return locator.startsWith('file://') || path.isAbsolute(locator);
  }

  async open(locator: string, _signal: AbortSignal): Promise<AssetSource> {
    let filePath: string;
    try {
      filePath = locator.startsWith('file://') ? fileURLToPath(locator) : locator;
    } catch (err) {
      throw new TransportError(`Invalid file locator ${locator}: ${errorMessage(err)}`, false);
    }

    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        throw new TransportError(`Not a regular file: ${filePath}`, false);
      }
      return { stream: createReadStream(filePath), contentLength: info.size };
    } catch (err) {
      if (err instanceof TransportError) throw err;
      const code = errnoCode(err);
      const retryable = code !== 'ENOENT' && code !== 'EACCES' && code !== 'EPERM';
      throw new TransportError(`Cannot read ${filePath}: ${errorMessage(err)}`, retryable);
    }
  }
}

/** Routes each locator to the transport for its scheme. */
export class DefaultAssetTransport implements AssetTransport {
  constructor(
    private http: AssetTransport = new HttpAssetTransport(),
    private local: AssetTransport = new LocalFileTransport(),
  ) {}

  open(locator: string, signal: AbortSignal): Promise<AssetSource> {
    if (/^https?:\/\//i.test(locator)) {
      return this.http.open(locator, signal);
    }
    if (LocalFileTransport.handles(locator)) {
      return this.local.open(locator, signal);
    }
    return Promise.reject(new TransportError(`Unsupported asset locator: ${locator}`, false));
  }
}
