/**
 * Download cache: URL -> previously fetched local PDF.
 *
 * Two tiers: an in-memory index for repeat hits, and a deterministic filename
 * per URL so files downloaded by an earlier process are found again without a
 * persistent index. The directory is owner-only (0700), files are 0600.
 */
import { createHash } from 'node:crypto';
import { chmodSync, existsSync, mkdirSync, promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';

export const CACHE_DIR_MODE = 0o700;
export const CACHE_FILE_MODE = 0o600;

const HASH_LENGTH = 16;

export interface DownloadCacheStats {
  fileCount: number;
  totalBytes: number;
  totalMb: number;
  cacheDir: string;
}

/**
 * Deterministic cache filename for a URL:
 * `<16 hex of sha256(url)>_<sanitized basename>` when the URL path ends in
 * .pdf, otherwise `<16 hex>.pdf`. Stable across processes (no salt).
 */
export function cacheFilenameFor(url: string): string {
  const urlHash = createHash('sha256').update(url).digest('hex').slice(0, HASH_LENGTH);

  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return `${urlHash}.pdf`;
  }

  if (pathname.endsWith('.pdf')) {
    const originalName = path.posix.basename(pathname);
    const safeName = originalName.replace(/[^A-Za-z0-9._-]/g, '');
    return `${urlHash}_${safeName}`;
  }

  return `${urlHash}.pdf`;
}

export class DownloadCache {
  readonly cacheDir: string;
  private readonly index = new Map<string, string>();

  constructor(cacheDir: string) {
    this.cacheDir = path.resolve(cacheDir);
    mkdirSync(this.cacheDir, { recursive: true, mode: CACHE_DIR_MODE });
    // mkdir's mode is filtered by umask and ignored for existing directories
    chmodSync(this.cacheDir, CACHE_DIR_MODE);
  }

  /** Where the download for `url` lives (whether or not it exists yet). */
  pathFor(url: string): string {
    return path.join(this.cacheDir, cacheFilenameFor(url));
  }

  /**
   * Local path of a cached download, or null.
   * Index entries whose file was removed externally count as misses.
   * Must stay synchronous: the check and the backfill happen in one tick.
   */
  lookup(url: string): string | null {
    const indexed = this.index.get(url);
    if (indexed !== undefined) {
      if (existsSync(indexed)) return indexed;
      this.index.delete(url);
      logger.debug({ url, path: indexed }, 'Dropping stale download cache entry');
    }

    const onDisk = this.pathFor(url);
    if (existsSync(onDisk)) {
      this.index.set(url, onDisk);
      return onDisk;
    }

    return null;
  }

  /** Record `url` -> `filePath`; the most recent registration wins. */
  register(url: string, filePath: string): void {
    this.index.set(url, filePath);
  }

  /** Number of URLs currently held in the in-memory index. */
  get indexedCount(): number {
    return this.index.size;
  }

  private async listCachedFiles(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.cacheDir, { withFileTypes: true });
    } catch (error) {
      logger.warn({ cacheDir: this.cacheDir, error: errorMessage(error) }, 'Cannot read download cache directory');
      return [];
    }
    return entries
      .filter((entry) => entry.name.endsWith('.pdf'))
      .map((entry) => path.join(this.cacheDir, entry.name));
  }

  /**
   * Delete every cached PDF. Best-effort: a file that cannot be removed is
   * logged and left out of the count. Never throws.
   */
  async clear(): Promise<number> {
    let count = 0;
    for (const filePath of await this.listCachedFiles()) {
      try {
        await fs.unlink(filePath);
        count++;
      } catch (error) {
        logger.warn({ path: filePath, error: errorMessage(error) }, 'Failed to delete cached download');
      }
    }

    this.index.clear();
    logger.info({ deleted: count }, 'Download cache cleared');
    return count;
  }

  /** Scan the directory itself so external changes are reflected. */
  async stats(): Promise<DownloadCacheStats> {
    let fileCount = 0;
    let totalBytes = 0;

    for (const filePath of await this.listCachedFiles()) {
      try {
        const stat = await fs.stat(filePath);
        if (!stat.isFile()) continue;
        fileCount++;
        totalBytes += stat.size;
      } catch {
        // Removed between readdir and stat
        continue;
      }
    }

    return {
      fileCount,
      totalBytes,
      totalMb: Math.round((totalBytes / (1024 * 1024)) * 100) / 100,
      cacheDir: this.cacheDir,
    };
  }
}
