/**
 * Remote PDF fetcher.
 *
 * Redirects are followed by hand, one hop at a time, so the SSRF guard sees
 * every target before a connection is made to it. The body is streamed with
 * a running byte budget and only written to the cache once it is complete
 * and looks like a PDF.
 */
import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { CACHE_FILE_MODE, type DownloadCache } from '../cache/download-cache.js';
import { DEFAULT_MAX_DOWNLOAD_BYTES, DEFAULT_MAX_REDIRECTS, DEFAULT_TIMEOUT_SEC } from '../config.js';
import {
  CacheWriteError,
  NotAPdfError,
  PdfCacheError,
  TooLargeError,
  TooManyRedirectsError,
  TransportError,
  errorMessage,
} from '../errors.js';
import { logger } from '../logger.js';
import { validateUrl } from './ssrf-guard.js';

/** Subset of the WHATWG fetch signature the fetcher relies on. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type UrlValidator = (url: string) => Promise<void>;

export interface RemoteFetcherOptions {
  downloadCache: DownloadCache;
  /** Inactivity limit: reset by every response and every body chunk. */
  timeoutMs?: number;
  maxBytes?: number;
  maxRedirects?: number;
  fetchFn?: FetchLike;
  validate?: UrlValidator;
}

export interface FetchOptions {
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const PDF_MAGIC = Buffer.from('%PDF');

interface DownloadedBody {
  body: Buffer;
  contentType: string | null;
  finalUrl: string;
}

interface InFlightDownload {
  promise: Promise<string>;
  controller: AbortController;
  /** Callers still waiting; the transfer is cancelled when this drops to zero. */
  waiters: number;
}

/** Aborts its signal once `touch()` has not been called for `ms`. */
class InactivityTimeout {
  private readonly controller = new AbortController();
  private readonly ms: number;
  private timer: NodeJS.Timeout | undefined;

  constructor(ms: number) {
    this.ms = ms;
    this.touch();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  touch(): void {
    clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.controller.abort(new Error(`No progress for ${this.ms}ms`));
    }, this.ms);
  }

  clear(): void {
    clearTimeout(this.timer);
  }
}

function abortedError(url: string, signal: AbortSignal): TransportError {
  return new TransportError(url, `Download aborted for ${url}`, undefined, { cause: signal.reason });
}

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

/** Content-Type mentions pdf, or the body starts with the %PDF marker. */
export function looksLikePdf(contentType: string | null, body: Uint8Array): boolean {
  if (contentType?.toLowerCase().includes('pdf')) return true;
  return body.length >= PDF_MAGIC.length && PDF_MAGIC.equals(body.subarray(0, PDF_MAGIC.length));
}

/** Discard an unread body so the connection can be released. */
async function discardBody(response: Response): Promise<void> {
  if (!response.body) return;
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug({ error: errorMessage(error) }, 'Failed to cancel response body');
  }
}

export class RemoteFetcher {
  private readonly downloadCache: DownloadCache;
  private readonly timeoutMs: number;
  private readonly maxBytes: number;
  private readonly maxRedirects: number;
  private readonly fetchFn: FetchLike;
  private readonly validate: UrlValidator;

  /** Downloads in progress, keyed by URL, so concurrent callers share one transfer. */
  private readonly inFlight = new Map<string, InFlightDownload>();

  constructor(options: RemoteFetcherOptions) {
    this.downloadCache = options.downloadCache;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_SEC * 1000;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_DOWNLOAD_BYTES;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.validate = options.validate ?? validateUrl;
  }

  /**
   * Resolve a URL to a local PDF path, downloading it unless cached.
   * Rejects with BlockedUrlError, TooLargeError, NotAPdfError,
   * TooManyRedirectsError, TransportError or CacheWriteError.
   *
   * `signal` only ends this caller's wait. A shared download keeps running
   * while any other caller still waits on it.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<string> {
    await this.validate(url);

    if (!options.forceRefresh) {
      const cached = this.downloadCache.lookup(url);
      if (cached) {
        logger.debug({ url, path: cached }, 'Download cache hit');
        return cached;
      }
    }

    if (options.signal?.aborted) throw abortedError(url, options.signal);

    let entry = this.inFlight.get(url);
    if (entry) {
      logger.debug({ url }, 'Joining in-flight download');
    } else {
      entry = this.startDownload(url);
    }
    return this.wait(url, entry, options.signal);
  }

  private startDownload(url: string): InFlightDownload {
    const controller = new AbortController();
    const entry: InFlightDownload = {
      controller,
      waiters: 0,
      promise: this.downloadAndStore(url, controller.signal).finally(() => {
        if (this.inFlight.get(url) === entry) this.inFlight.delete(url);
      }),
    };
    this.inFlight.set(url, entry);
    return entry;
  }

  private wait(url: string, entry: InFlightDownload, signal?: AbortSignal): Promise<string> {
    entry.waiters++;
    if (!signal) return entry.promise;

    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        this.leave(url, entry);
        reject(abortedError(url, signal));
      };
      entry.promise.then(
        (localPath) => {
          signal.removeEventListener('abort', onAbort);
          resolve(localPath);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Drop one waiter; cancel the transfer when nobody is left. */
  private leave(url: string, entry: InFlightDownload): void {
    entry.waiters--;
    if (entry.waiters > 0) return;

    logger.debug({ url }, 'All callers aborted, cancelling download');
    entry.controller.abort();
    if (this.inFlight.get(url) === entry) this.inFlight.delete(url);
  }

  private async downloadAndStore(url: string, signal: AbortSignal): Promise<string> {
    const startTime = Date.now();
    const { body, finalUrl } = await this.download(url, signal);
    const localPath = await this.persist(url, body);

    logger.info(
      { url, finalUrl, path: localPath, bytes: body.length, latencyMs: Date.now() - startTime },
      'PDF downloaded'
    );
    return localPath;
  }

  private async download(url: string, signal: AbortSignal): Promise<DownloadedBody> {
    const idle = new InactivityTimeout(this.timeoutMs);
    const requestSignal = AbortSignal.any([signal, idle.signal]);
    let currentUrl = url;

    try {
      for (let hop = 0; hop < this.maxRedirects; hop++) {
        idle.touch();
        const response = await this.fetchFn(currentUrl, {
          method: 'GET',
          redirect: 'manual',
          headers: { Accept: 'application/pdf,*/*' },
          signal: requestSignal,
        });

        if (isRedirectStatus(response.status)) {
          const location = response.headers.get('location');
          await discardBody(response);
          if (!location) {
            throw new TransportError(currentUrl, 'Redirect with no target URL', response.status);
          }

          const nextUrl = new URL(location, currentUrl).toString();
          await this.validate(nextUrl);
          logger.debug({ url, from: currentUrl, to: nextUrl, hop: hop + 1 }, 'Following redirect');
          currentUrl = nextUrl;
          continue;
        }

        if (!response.ok) {
          await discardBody(response);
          throw new TransportError(
            currentUrl,
            `HTTP ${response.status} fetching ${currentUrl}`,
            response.status
          );
        }

        const contentType = response.headers.get('content-type');
        const body = await this.readBody(currentUrl, response, requestSignal, () => idle.touch());
        if (!looksLikePdf(contentType, body)) {
          throw new NotAPdfError(url, contentType);
        }

        return { body, contentType, finalUrl: currentUrl };
      }
    } catch (error) {
      throw this.toFetchError(currentUrl, error, signal, idle.signal);
    } finally {
      idle.clear();
    }

    throw new TooManyRedirectsError(url, this.maxRedirects);
  }

  /**
   * Read the body under the size budget. A declared Content-Length over the
   * limit fails before any byte is read; the running total is enforced too,
   * since the header can be absent or wrong.
   */
  private async readBody(
    url: string,
    response: Response,
    signal: AbortSignal,
    onProgress: () => void
  ): Promise<Buffer> {
    const contentLength = response.headers.get('content-length');
    if (contentLength) {
      const declared = parseInt(contentLength, 10);
      if (!isNaN(declared) && declared > this.maxBytes) {
        await discardBody(response);
        logger.warn({ url, contentLength: declared, limit: this.maxBytes }, 'Content-Length exceeds size limit');
        throw new TooLargeError(url, this.maxBytes, declared, true);
      }
    }

    if (!response.body) return Buffer.alloc(0);
    signal.throwIfAborted();

    const reader = response.body.getReader();
    // Unblocks a pending read on transports that do not tie the body to the signal
    const onAbort = (): void => {
      reader.cancel(signal.reason).catch((cancelError: unknown) => {
        logger.debug({ url, error: errorMessage(cancelError) }, 'Failed to cancel body stream');
      });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    const chunks: Uint8Array[] = [];
    let total = 0;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        signal.throwIfAborted();
        if (done) break;
        onProgress();
        total += value.byteLength;
        if (total > this.maxBytes) {
          logger.warn({ url, received: total, limit: this.maxBytes }, 'Download exceeds size limit');
          throw new TooLargeError(url, this.maxBytes, total, false);
        }
        chunks.push(value);
      }
    } catch (error) {
      await reader.cancel().catch((cancelError: unknown) => {
        logger.debug({ url, error: errorMessage(cancelError) }, 'Failed to cancel body stream');
      });
      throw error;
    } finally {
      signal.removeEventListener('abort', onAbort);
      reader.releaseLock();
    }

    return Buffer.concat(chunks, total);
  }

  /**
   * Write to a private temp file and rename it into place, so a cache path
   * never points at a partially written file.
   */
  private async persist(url: string, body: Buffer): Promise<string> {
    const finalPath = this.downloadCache.pathFor(url);
    const tempPath = `${finalPath}.${randomUUID()}.tmp`;

    try {
      await fs.writeFile(tempPath, body, { mode: CACHE_FILE_MODE });
      await fs.rename(tempPath, finalPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      logger.error({ url, path: finalPath, error: errorMessage(error) }, 'Failed to store download');
      throw new CacheWriteError(url, finalPath, `Failed to store download for ${url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.downloadCache.register(url, finalPath);
    return finalPath;
  }

  private toFetchError(
    url: string,
    error: unknown,
    abortSignal: AbortSignal,
    idleSignal: AbortSignal
  ): PdfCacheError {
    if (error instanceof PdfCacheError) return error;

    if (abortSignal.aborted) return abortedError(url, abortSignal);
    if (idleSignal.aborted) {
      return new TransportError(url, `Request timeout after ${this.timeoutMs}ms for ${url}`, undefined, {
        cause: error,
      });
    }

    return new TransportError(url, `Request failed for ${url}: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  }
}
