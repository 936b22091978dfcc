/**
 * pdf-fetch-cache - SSRF-guarded PDF downloads with download and content caches.
 *
 * @module pdf-fetch-cache
 */
export { validateUrl, isPrivateHost, isBlockedAddress } from './fetch/ssrf-guard.js';
export { RemoteFetcher, looksLikePdf, isRedirectStatus } from './fetch/remote-fetcher.js';
export { DownloadCache, cacheFilenameFor } from './cache/download-cache.js';
export { DocumentCache, identify, identityKey } from './cache/document-cache.js';
export { PdfParseParser } from './extract/pdf-extractor.js';
export { PdfReader } from './reader/pdf-reader.js';
export { parsePageRange } from './reader/page-range.js';
export { isUrl } from './reader/source.js';
export { createRuntime } from './runtime.js';
export { loadConfig, ConfigError } from './config.js';
export {
  PdfCacheError,
  BlockedUrlError,
  TooLargeError,
  NotAPdfError,
  TooManyRedirectsError,
  TransportError,
  CacheWriteError,
  DocumentNotFoundError,
  DocumentParseError,
  isPdfCacheError,
} from './errors.js';
export type { FetchLike, FetchOptions, RemoteFetcherOptions } from './fetch/remote-fetcher.js';
export type { DownloadCacheStats } from './cache/download-cache.js';
export type {
  DocumentIdentity,
  DocumentCacheRecord,
  DocumentCacheStats,
  DocumentCacheOptions,
} from './cache/document-cache.js';
export type {
  DocumentHandle,
  DocumentParser,
  DocumentMetadata,
  MetadataValue,
  TocEntry,
} from './extract/types.js';
export type {
  DocumentInfo,
  PageText,
  ReadPagesResult,
  ReadOptions,
  ReadPagesOptions,
  CacheStats,
} from './reader/pdf-reader.js';
export type { PageSelector } from './reader/page-range.js';
export type { Runtime, RuntimeOverrides } from './runtime.js';
export type { Config } from './config.js';
export type { PdfCacheErrorCode, BlockedUrlReason } from './errors.js';
