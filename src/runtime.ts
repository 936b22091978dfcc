/**
 * Process-wide cache objects, built once from config and handed to callers.
 */
import { DownloadCache } from './cache/download-cache.js';
import { DocumentCache } from './cache/document-cache.js';
import { loadConfig, type Config } from './config.js';
import { PdfParseParser, type PdfParseHandle } from './extract/pdf-extractor.js';
import { RemoteFetcher, type FetchLike } from './fetch/remote-fetcher.js';
import { logger } from './logger.js';
import { PdfReader } from './reader/pdf-reader.js';

export interface Runtime {
  config: Config;
  downloadCache: DownloadCache;
  documentCache: DocumentCache;
  fetcher: RemoteFetcher;
  reader: PdfReader<PdfParseHandle>;
  /** Persist and release the document cache. Idempotent. */
  close(): void;
}

export interface RuntimeOverrides {
  /** Transport override, e.g. an in-process stub. */
  fetchFn?: FetchLike;
}

export async function createRuntime(
  config: Config = loadConfig(),
  overrides: RuntimeOverrides = {}
): Promise<Runtime> {
  const downloadCache = new DownloadCache(config.downloadDir);
  const documentCache = await DocumentCache.open({
    cacheDir: config.contentCacheDir,
    ttlHours: config.ttlHours,
  });
  const fetcher = new RemoteFetcher({
    downloadCache,
    timeoutMs: config.timeoutSec * 1000,
    maxBytes: config.maxDownloadBytes,
    maxRedirects: config.maxRedirects,
    fetchFn: overrides.fetchFn,
  });
  const reader = new PdfReader({
    fetcher,
    downloadCache,
    documentCache,
    parser: new PdfParseParser(),
  });

  logger.debug(
    { downloadDir: downloadCache.cacheDir, contentCache: documentCache.cacheFile },
    'Runtime initialized'
  );

  return {
    config,
    downloadCache,
    documentCache,
    fetcher,
    reader,
    close: () => documentCache.close(),
  };
}
