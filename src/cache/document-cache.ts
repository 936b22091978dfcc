/**
 * Document content cache: extracted metadata, outline and per-page text,
 * keyed by document identity, with TTL expiry.
 *
 * Uses sql.js (pure JavaScript SQLite) persisted to a single database file.
 * Expiry is checked on every read; expired rows are purged on writes and on
 * stats/clear, so no background sweeper is needed.
 */
import {
  chmodSync,
  existsSync,
  mkdirSync,
  readFileSync,
  statSync,
  writeFileSync,
  promises as fs,
  type Stats,
} from 'node:fs';
import path from 'node:path';
import initSqlJs, { type BindParams, type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import { z } from 'zod';
import { DEFAULT_TTL_HOURS } from '../config.js';
import { DocumentNotFoundError, errorMessage } from '../errors.js';
import type { DocumentMetadata, TocEntry } from '../extract/types.js';
import { logger } from '../logger.js';
import { CACHE_DIR_MODE, CACHE_FILE_MODE } from './download-cache.js';

export const DOCUMENT_CACHE_FILENAME = 'document-cache.db';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Cache key for a local file. Includes mtime and size so an edited file gets
 * a new identity and never serves text extracted from its previous version.
 */
export interface DocumentIdentity {
  path: string;
  mtimeMs: number;
  size: number;
  key: string;
}

export interface DocumentCacheRecord {
  identity: string;
  path: string;
  pageCount: number;
  metadata: DocumentMetadata;
  toc: TocEntry[];
  createdAt: number;
}

export interface DocumentCacheStats {
  totalFiles: number;
  totalPages: number;
  cacheSizeBytes: number;
  cacheFile: string;
}

export interface DocumentCacheOptions {
  cacheDir: string;
  ttlHours?: number;
  /** Milliseconds since epoch; injectable for expiry tests. */
  clock?: () => number;
}

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const TocSchema = z.array(
  z.object({
    level: z.number().int(),
    title: z.string(),
    page: z.number().int().nullable(),
  })
);

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS documents (
    identity TEXT PRIMARY KEY,
    path TEXT NOT NULL,
    page_count INTEGER NOT NULL,
    metadata TEXT NOT NULL,
    toc TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_documents_path ON documents(path);
  CREATE INDEX IF NOT EXISTS idx_documents_created_at ON documents(created_at);

  CREATE TABLE IF NOT EXISTS page_texts (
    identity TEXT NOT NULL,
    path TEXT NOT NULL,
    page_index INTEGER NOT NULL,
    text TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    PRIMARY KEY (identity, page_index)
  );

  CREATE INDEX IF NOT EXISTS idx_page_texts_path ON page_texts(path);
  CREATE INDEX IF NOT EXISTS idx_page_texts_created_at ON page_texts(created_at);
`;

export function identityKey(filePath: string, mtimeMs: number, size: number): string {
  return `${filePath}|${Math.trunc(mtimeMs)}|${size}`;
}

/** Build the identity of a local file from its resolved path, mtime and size. */
export async function identify(filePath: string): Promise<DocumentIdentity> {
  const resolved = path.resolve(filePath);
  let stat: Stats;
  try {
    stat = await fs.stat(resolved);
  } catch {
    throw new DocumentNotFoundError(resolved);
  }
  if (!stat.isFile()) throw new DocumentNotFoundError(resolved);

  return {
    path: resolved,
    mtimeMs: stat.mtimeMs,
    size: stat.size,
    key: identityKey(resolved, stat.mtimeMs, stat.size),
  };
}

function parseJsonColumn<T>(raw: SqlValue, schema: z.ZodType<T>): T | null {
  if (typeof raw !== 'string') return null;
  try {
    const result = schema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

function toNumber(value: SqlValue | undefined): number {
  return typeof value === 'number' ? value : Number(value ?? 0);
}

export class DocumentCache {
  readonly cacheFile: string;
  private readonly db: SqlJsDatabase;
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private closed = false;

  private constructor(db: SqlJsDatabase, cacheFile: string, ttlHours: number, clock: () => number) {
    this.db = db;
    this.cacheFile = cacheFile;
    this.ttlMs = ttlHours * HOUR_MS;
    this.clock = clock;
  }

  /**
   * Open (or create) the cache database under `cacheDir`.
   * An unreadable database file is replaced by an empty one.
   */
  static async open(options: DocumentCacheOptions): Promise<DocumentCache> {
    const cacheDir = path.resolve(options.cacheDir);
    mkdirSync(cacheDir, { recursive: true, mode: CACHE_DIR_MODE });
    chmodSync(cacheDir, CACHE_DIR_MODE);
    const cacheFile = path.join(cacheDir, DOCUMENT_CACHE_FILENAME);

    const SQL = await initSqlJs();
    let db: SqlJsDatabase;
    if (existsSync(cacheFile)) {
      try {
        db = new SQL.Database(readFileSync(cacheFile));
        db.run(SCHEMA_SQL);
      } catch (error) {
        logger.warn({ cacheFile, error: errorMessage(error) }, 'Document cache unreadable, starting fresh');
        db = new SQL.Database();
        db.run(SCHEMA_SQL);
      }
    } else {
      db = new SQL.Database();
      db.run(SCHEMA_SQL);
    }

    const cache = new DocumentCache(
      db,
      cacheFile,
      options.ttlHours ?? DEFAULT_TTL_HOURS,
      options.clock ?? Date.now
    );
    cache.persist();
    return cache;
  }

  /** Oldest created_at that is still fresh. */
  private freshnessCutoff(): number {
    return this.clock() - this.ttlMs;
  }

  private query(sql: string, params?: BindParams): SqlValue[][] {
    const [result] = this.db.exec(sql, params);
    return result?.values ?? [];
  }

  private persist(): void {
    writeFileSync(this.cacheFile, this.db.export(), { mode: CACHE_FILE_MODE });
  }

  /** Drop expired rows. Returns how many were removed. */
  private purgeExpired(): number {
    const cutoff = this.freshnessCutoff();
    this.db.run('DELETE FROM documents WHERE created_at <= ?', [cutoff]);
    let removed = this.db.getRowsModified();
    this.db.run('DELETE FROM page_texts WHERE created_at <= ?', [cutoff]);
    removed += this.db.getRowsModified();
    if (removed > 0) logger.debug({ removed }, 'Purged expired document cache rows');
    return removed;
  }

  /** Rows cached for an older version of the same file can never hit again. */
  private purgeSupersededVersions(identity: DocumentIdentity): void {
    this.db.run('DELETE FROM documents WHERE path = ? AND identity != ?', [identity.path, identity.key]);
    this.db.run('DELETE FROM page_texts WHERE path = ? AND identity != ?', [identity.path, identity.key]);
  }

  saveMetadata(
    identity: DocumentIdentity,
    pageCount: number,
    metadata: DocumentMetadata,
    toc: TocEntry[]
  ): void {
    this.purgeExpired();
    this.purgeSupersededVersions(identity);
    this.db.run(
      `INSERT OR REPLACE INTO documents (identity, path, page_count, metadata, toc, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [identity.key, identity.path, pageCount, JSON.stringify(metadata), JSON.stringify(toc), this.clock()]
    );
    this.persist();
  }

  /** Cached metadata and outline, or null on a miss or once the TTL has passed. */
  getMetadata(identity: DocumentIdentity): DocumentCacheRecord | null {
    const [row] = this.query(
      `SELECT path, page_count, metadata, toc, created_at FROM documents
       WHERE identity = ? AND created_at > ?`,
      [identity.key, this.freshnessCutoff()]
    );
    if (!row) return null;

    const [rowPath, pageCount, rawMetadata, rawToc, createdAt] = row;
    const metadata = parseJsonColumn(rawMetadata, MetadataSchema);
    const toc = parseJsonColumn(rawToc, TocSchema);
    if (metadata === null || toc === null) {
      logger.warn({ identity: identity.key }, 'Discarding corrupt document cache row');
      return null;
    }

    return {
      identity: identity.key,
      path: String(rowPath),
      pageCount: toNumber(pageCount),
      metadata,
      toc,
      createdAt: toNumber(createdAt),
    };
  }

  savePageText(identity: DocumentIdentity, pageIndex: number, text: string): void {
    this.savePagesText(identity, new Map([[pageIndex, text]]));
  }

  /** Save several pages in one transaction and one write to disk. */
  savePagesText(identity: DocumentIdentity, pages: ReadonlyMap<number, string>): void {
    if (pages.size === 0) return;
    this.purgeExpired();
    this.purgeSupersededVersions(identity);

    const now = this.clock();
    const statement = this.db.prepare(
      `INSERT OR REPLACE INTO page_texts (identity, path, page_index, text, created_at)
       VALUES (?, ?, ?, ?, ?)`
    );
    try {
      this.db.run('BEGIN');
      for (const [pageIndex, text] of pages) {
        statement.run([identity.key, identity.path, pageIndex, text, now]);
      }
      this.db.run('COMMIT');
    } catch (error) {
      this.db.run('ROLLBACK');
      throw error;
    } finally {
      statement.free();
    }
    this.persist();
  }

  getPageText(identity: DocumentIdentity, pageIndex: number): string | null {
    return this.getPagesText(identity, [pageIndex]).get(pageIndex) ?? null;
  }

  /**
   * Text for the requested pages that are cached and fresh. Pages that are
   * missing or expired are simply absent from the result.
   */
  getPagesText(identity: DocumentIdentity, pageIndices: readonly number[]): Map<number, string> {
    const pages = new Map<number, string>();
    const wanted = [...new Set(pageIndices)].filter((index) => Number.isInteger(index));
    if (wanted.length === 0) return pages;

    const placeholders = wanted.map(() => '?').join(', ');
    const rows = this.query(
      `SELECT page_index, text FROM page_texts
       WHERE identity = ? AND created_at > ? AND page_index IN (${placeholders})`,
      [identity.key, this.freshnessCutoff(), ...wanted]
    );

    for (const [pageIndex, text] of rows) {
      if (typeof text === 'string') pages.set(toNumber(pageIndex), text);
    }
    return pages;
  }

  stats(): DocumentCacheStats {
    if (this.purgeExpired() > 0) this.persist();

    const [[totalFiles] = [0]] = this.query(
      'SELECT COUNT(*) FROM (SELECT identity FROM documents UNION SELECT identity FROM page_texts)'
    );
    const [[totalPages] = [0]] = this.query('SELECT COUNT(*) FROM page_texts');

    let cacheSizeBytes = 0;
    try {
      cacheSizeBytes = statSync(this.cacheFile).size;
    } catch (error) {
      logger.warn({ cacheFile: this.cacheFile, error: errorMessage(error) }, 'Cannot stat document cache file');
    }

    return {
      totalFiles: toNumber(totalFiles),
      totalPages: toNumber(totalPages),
      cacheSizeBytes,
      cacheFile: this.cacheFile,
    };
  }

  clearAll(): void {
    this.db.run('DELETE FROM documents');
    this.db.run('DELETE FROM page_texts');
    this.persist();
    logger.info('Document cache cleared');
  }

  close(): void {
    if (this.closed) return;
    this.persist();
    this.db.close();
    this.closed = true;
  }
}
