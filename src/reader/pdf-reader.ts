/**
 * Cached PDF reads: source -> local path -> content cache -> parser.
 *
 * Only cache misses reach the parser, and everything the parser produces is
 * written back, so a second read of the same unchanged document never opens
 * it again.
 */
import type { DownloadCache, DownloadCacheStats } from '../cache/download-cache.js';
import {
  identify,
  type DocumentCache,
  type DocumentCacheStats,
  type DocumentIdentity,
} from '../cache/document-cache.js';
import type { RemoteFetcher } from '../fetch/remote-fetcher.js';
import type { DocumentHandle, DocumentMetadata, DocumentParser, TocEntry } from '../extract/types.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { parsePageRange, type PageSelector } from './page-range.js';
import { isUrl } from './source.js';

export interface PdfReaderOptions<H extends DocumentHandle> {
  fetcher: RemoteFetcher;
  downloadCache: DownloadCache;
  documentCache: DocumentCache;
  parser: DocumentParser<H>;
}

export interface ReadOptions {
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

export interface ReadPagesOptions extends ReadOptions {
  pages?: PageSelector;
}

export interface DocumentInfo {
  source: string;
  path: string;
  pageCount: number;
  metadata: DocumentMetadata;
  toc: TocEntry[];
  fromCache: boolean;
}

export interface PageText {
  /** 1-based page number */
  page: number;
  text: string;
}

export interface ReadPagesResult {
  source: string;
  path: string;
  pageCount: number;
  pages: PageText[];
  cachedPages: number;
  extractedPages: number;
}

export interface CacheStats {
  downloads: DownloadCacheStats;
  documents: DocumentCacheStats;
}

export class PdfReader<H extends DocumentHandle = DocumentHandle> {
  private readonly fetcher: RemoteFetcher;
  private readonly downloadCache: DownloadCache;
  private readonly documentCache: DocumentCache;
  private readonly parser: DocumentParser<H>;

  constructor(options: PdfReaderOptions<H>) {
    this.fetcher = options.fetcher;
    this.downloadCache = options.downloadCache;
    this.documentCache = options.documentCache;
    this.parser = options.parser;
  }

  /** Local path for a source; URLs go through the fetcher and download cache. */
  async resolveSource(source: string, options: ReadOptions = {}): Promise<string> {
    if (isUrl(source)) {
      return this.fetcher.fetch(source, { forceRefresh: options.forceRefresh, signal: options.signal });
    }
    return (await identify(source)).path;
  }

  private async withDocument<T>(identity: DocumentIdentity, task: (handle: H) => Promise<T>): Promise<T> {
    const handle = await this.parser.open(identity.path);
    try {
      return await task(handle);
    } finally {
      await this.parser.close(handle).catch((error: unknown) => {
        logger.warn({ path: identity.path, error: errorMessage(error) }, 'Failed to close document');
      });
    }
  }

  async getInfo(source: string, options: ReadOptions = {}): Promise<DocumentInfo> {
    const identity = await identify(await this.resolveSource(source, options));

    const cached = this.documentCache.getMetadata(identity);
    if (cached) {
      logger.debug({ source, path: identity.path }, 'Document metadata cache hit');
      return {
        source,
        path: identity.path,
        pageCount: cached.pageCount,
        metadata: cached.metadata,
        toc: cached.toc,
        fromCache: true,
      };
    }

    const { pageCount, metadata, toc } = await this.withDocument(identity, async (handle) => ({
      pageCount: handle.pageCount,
      metadata: await this.parser.extractMetadata(handle),
      toc: await this.parser.extractToc(handle),
    }));
    this.documentCache.saveMetadata(identity, pageCount, metadata, toc);

    return { source, path: identity.path, pageCount, metadata, toc, fromCache: false };
  }

  /**
   * Text of the selected pages (all pages when no selector is given).
   * Cached pages are served as-is; only the missing ones are extracted.
   */
  async readPages(source: string, options: ReadPagesOptions = {}): Promise<ReadPagesResult> {
    const identity = await identify(await this.resolveSource(source, options));

    const record = this.documentCache.getMetadata(identity);
    if (record) {
      const indices = parsePageRange(options.pages, record.pageCount);
      const hits = this.documentCache.getPagesText(identity, indices);
      if (indices.every((index) => hits.has(index))) {
        return this.pagesResult(source, identity, record.pageCount, indices, hits, new Map());
      }
    }

    const { pageCount, indices, hits, texts } = await this.withDocument(identity, async (handle) => {
      const selected = parsePageRange(options.pages, handle.pageCount);
      const cachedTexts = this.documentCache.getPagesText(identity, selected);

      const extractedTexts = new Map<number, string>();
      for (const index of selected) {
        if (!cachedTexts.has(index)) {
          extractedTexts.set(index, await this.parser.extractText(handle, index));
        }
      }

      // Metadata is cheap to take while the document is open
      if (!record) {
        this.documentCache.saveMetadata(
          identity,
          handle.pageCount,
          await this.parser.extractMetadata(handle),
          await this.parser.extractToc(handle)
        );
      }
      return {
        pageCount: handle.pageCount,
        indices: selected,
        hits: cachedTexts,
        texts: extractedTexts,
      };
    });

    this.documentCache.savePagesText(identity, texts);
    return this.pagesResult(source, identity, pageCount, indices, hits, texts);
  }

  private pagesResult(
    source: string,
    identity: DocumentIdentity,
    pageCount: number,
    indices: number[],
    cached: Map<number, string>,
    extracted: Map<number, string>
  ): ReadPagesResult {
    const pages: PageText[] = [];
    for (const index of indices) {
      const text = cached.get(index) ?? extracted.get(index);
      if (text !== undefined) pages.push({ page: index + 1, text });
    }

    logger.debug(
      { source, path: identity.path, cachedPages: cached.size, extractedPages: extracted.size },
      'Pages read'
    );

    return {
      source,
      path: identity.path,
      pageCount,
      pages,
      cachedPages: cached.size,
      extractedPages: extracted.size,
    };
  }

  async clearCaches(): Promise<{ downloadsDeleted: number }> {
    const downloadsDeleted = await this.downloadCache.clear();
    this.documentCache.clearAll();
    return { downloadsDeleted };
  }

  async cacheStats(): Promise<CacheStats> {
    return {
      downloads: await this.downloadCache.stats(),
      documents: this.documentCache.stats(),
    };
  }
}
