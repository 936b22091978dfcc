/**
 * Error taxonomy for fetching and caching.
 *
 * Every error carries a stable string `code` so callers (and the CLI's JSON
 * output) can branch on the kind of failure without instanceof checks.
 */

export type PdfCacheErrorCode =
  | 'blocked_url'
  | 'response_too_large'
  | 'not_a_pdf'
  | 'too_many_redirects'
  | 'network_error'
  | 'cache_write_failed'
  | 'document_not_found'
  | 'parse_failed';

export type BlockedUrlReason = 'scheme' | 'no-host' | 'localhost' | 'unresolvable' | 'private-address';

export abstract class PdfCacheError extends Error {
  abstract readonly code: PdfCacheErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class BlockedUrlError extends PdfCacheError {
  readonly code = 'blocked_url';

  constructor(
    readonly url: string,
    readonly reason: BlockedUrlReason,
    message: string
  ) {
    super(message);
  }
}

export class TooLargeError extends PdfCacheError {
  readonly code = 'response_too_large';

  /** `size` is the declared Content-Length, or the byte count when streaming stopped. */
  constructor(
    readonly url: string,
    readonly limit: number,
    readonly size: number,
    readonly declared: boolean
  ) {
    super(
      declared
        ? `PDF file too large: ${size} bytes (max ${limit} bytes)`
        : `PDF download exceeded maximum size of ${limit} bytes`
    );
  }
}

export class NotAPdfError extends PdfCacheError {
  readonly code = 'not_a_pdf';

  constructor(
    readonly url: string,
    readonly contentType: string | null
  ) {
    super(`URL does not appear to be a PDF: ${url}`);
  }
}

export class TooManyRedirectsError extends PdfCacheError {
  readonly code = 'too_many_redirects';

  constructor(
    readonly url: string,
    readonly maxRedirects: number
  ) {
    super(`Too many redirects (max ${maxRedirects})`);
  }
}

export class TransportError extends PdfCacheError {
  readonly code = 'network_error';

  constructor(
    readonly url: string,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The download completed but could not be stored in the cache directory. */
export class CacheWriteError extends PdfCacheError {
  readonly code = 'cache_write_failed';

  constructor(
    readonly url: string,
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class DocumentNotFoundError extends PdfCacheError {
  readonly code = 'document_not_found';

  constructor(readonly path: string) {
    super(`File not found: ${path}`);
  }
}

export class DocumentParseError extends PdfCacheError {
  readonly code = 'parse_failed';

  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function isPdfCacheError(value: unknown): value is PdfCacheError {
  return value instanceof PdfCacheError;
}

/** Message of an unknown thrown value, for logs and wrapped errors. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
