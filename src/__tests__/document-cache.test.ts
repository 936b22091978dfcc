import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { chmod, mkdtemp, rm, stat, writeFile, utimes } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import {
  DOCUMENT_CACHE_FILENAME,
  DocumentCache,
  identify,
  identityKey,
  type DocumentIdentity,
} from '../cache/document-cache.js';
import { DocumentNotFoundError } from '../errors.js';
import { logger } from '../logger.js';

const HOUR = 60 * 60 * 1000;
const T0 = 1_700_000_000_000;

function makeIdentity(filePath: string, mtimeMs = 1000, size = 2048): DocumentIdentity {
  return { path: filePath, mtimeMs, size, key: identityKey(filePath, mtimeMs, size) };
}

describe('cache/document-cache', () => {
  let cacheDir: string;
  let now: number;
  let cache: DocumentCache;

  function openCache(ttlHours = 24): Promise<DocumentCache> {
    return DocumentCache.open({ cacheDir, ttlHours, clock: () => now });
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    cacheDir = await mkdtemp(path.join(tmpdir(), 'document-cache-test-'));
    now = T0;
    cache = await openCache();
  });

  afterEach(async () => {
    cache.close();
    await rm(cacheDir, { recursive: true, force: true });
  });

  describe('identityKey', () => {
    it('joins path, whole-millisecond mtime and size', () => {
      expect(identityKey('/docs/a.pdf', 1700000000123.75, 42)).toBe('/docs/a.pdf|1700000000123|42');
    });
  });

  describe('identify', () => {
    it('builds the identity from the file on disk', async () => {
      const filePath = path.join(cacheDir, 'doc.pdf');
      await writeFile(filePath, '%PDF-1.4 body');
      await utimes(filePath, new Date(T0), new Date(T0));

      const identity = await identify(filePath);

      expect(identity).toEqual({
        path: filePath,
        mtimeMs: T0,
        size: 13,
        key: `${filePath}|${T0}|13`,
      });
    });

    it('resolves relative paths', async () => {
      const filePath = path.join(cacheDir, 'doc.pdf');
      await writeFile(filePath, '%PDF');

      const identity = await identify(path.relative(process.cwd(), filePath));

      expect(identity.path).toBe(filePath);
    });

    it('changes when the file is modified', async () => {
      const filePath = path.join(cacheDir, 'doc.pdf');
      await writeFile(filePath, '%PDF v1');
      const before = await identify(filePath);

      await writeFile(filePath, '%PDF version 2');
      const after = await identify(filePath);

      expect(after.key).not.toBe(before.key);
    });

    it('rejects a missing file', async () => {
      const missing = path.join(cacheDir, 'missing.pdf');
      const error = await identify(missing).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DocumentNotFoundError);
      expect(error).toMatchObject({ code: 'document_not_found', message: `File not found: ${missing}` });
    });

    it('rejects a directory', async () => {
      await expect(identify(cacheDir)).rejects.toBeInstanceOf(DocumentNotFoundError);
    });
  });

  describe('open', () => {
    it('creates an owner-only database file', async () => {
      const fileStat = await stat(path.join(cacheDir, DOCUMENT_CACHE_FILENAME));
      expect(fileStat.mode & 0o777).toBe(0o600);
      expect(cache.cacheFile).toBe(path.join(cacheDir, DOCUMENT_CACHE_FILENAME));
    });

    it('restricts an existing cache directory to its owner', async () => {
      cache.close();
      await chmod(cacheDir, 0o755);

      cache = await openCache();

      expect((await stat(cacheDir)).mode & 0o777).toBe(0o700);
    });

    it('persists entries across instances', async () => {
      const identity = makeIdentity('/docs/a.pdf');
      cache.saveMetadata(identity, 3, { title: 'Quarterly' }, []);
      cache.savePageText(identity, 0, 'first page');
      cache.close();

      cache = await openCache();

      expect(cache.getMetadata(identity)?.metadata).toEqual({ title: 'Quarterly' });
      expect(cache.getPageText(identity, 0)).toBe('first page');
    });

    it('starts fresh when the database file is unreadable', async () => {
      cache.close();
      await writeFile(path.join(cacheDir, DOCUMENT_CACHE_FILENAME), Buffer.alloc(4096, 'x'));

      cache = await openCache();

      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ cacheFile: cache.cacheFile }),
        'Document cache unreadable, starting fresh'
      );
      expect(cache.stats().totalFiles).toBe(0);
    });
  });

  describe('metadata', () => {
    it('round-trips metadata and outline', () => {
      const identity = makeIdentity('/docs/a.pdf');
      const toc = [
        { level: 1, title: 'Intro', page: 1 },
        { level: 2, title: 'Scope', page: null },
      ];

      cache.saveMetadata(identity, 12, { title: 'Annual Report', author: null, encrypted: false }, toc);

      expect(cache.getMetadata(identity)).toEqual({
        identity: identity.key,
        path: '/docs/a.pdf',
        pageCount: 12,
        metadata: { title: 'Annual Report', author: null, encrypted: false },
        toc,
        createdAt: T0,
      });
    });

    it('misses for an unknown document', () => {
      expect(cache.getMetadata(makeIdentity('/docs/unknown.pdf'))).toBeNull();
    });

    it('misses once the file identity changes', () => {
      cache.saveMetadata(makeIdentity('/docs/a.pdf', 1000), 3, {}, []);
      expect(cache.getMetadata(makeIdentity('/docs/a.pdf', 2000))).toBeNull();
    });

    it('expires after the TTL', async () => {
      cache.close();
      cache = await openCache(1);
      const identity = makeIdentity('/docs/a.pdf');
      cache.saveMetadata(identity, 3, {}, []);

      now = T0 + HOUR - 1;
      expect(cache.getMetadata(identity)).not.toBeNull();

      now = T0 + HOUR;
      expect(cache.getMetadata(identity)).toBeNull();
    });
  });

  describe('page text', () => {
    it('returns only the pages that are cached', () => {
      const identity = makeIdentity('/docs/a.pdf');
      cache.savePagesText(
        identity,
        new Map([
          [0, 'zero'],
          [1, 'one'],
          [2, 'two'],
        ])
      );

      const pages = cache.getPagesText(identity, [0, 1, 2, 3]);

      expect(pages).toEqual(
        new Map([
          [0, 'zero'],
          [1, 'one'],
          [2, 'two'],
        ])
      );
    });

    it('returns null for a single missing page', () => {
      expect(cache.getPageText(makeIdentity('/docs/a.pdf'), 5)).toBeNull();
    });

    it('overwrites a page saved twice', () => {
      const identity = makeIdentity('/docs/a.pdf');
      cache.savePageText(identity, 0, 'draft');
      cache.savePageText(identity, 0, 'final');
      expect(cache.getPageText(identity, 0)).toBe('final');
    });

    it('keeps empty page text as a hit', () => {
      const identity = makeIdentity('/docs/a.pdf');
      cache.savePageText(identity, 4, '');
      expect(cache.getPageText(identity, 4)).toBe('');
    });

    it('expires pages after the TTL', async () => {
      cache.close();
      cache = await openCache(2);
      const identity = makeIdentity('/docs/a.pdf');
      cache.savePageText(identity, 0, 'zero');

      now = T0 + 2 * HOUR + 1;

      expect(cache.getPagesText(identity, [0]).size).toBe(0);
    });

    it('drops rows of an older version of the same file on save', () => {
      const v1 = makeIdentity('/docs/a.pdf', 1000);
      const v2 = makeIdentity('/docs/a.pdf', 2000);
      cache.saveMetadata(v1, 2, {}, []);
      cache.savePageText(v1, 0, 'old text');

      cache.savePageText(v2, 0, 'new text');

      expect(cache.getPageText(v1, 0)).toBeNull();
      expect(cache.getMetadata(v1)).toBeNull();
      expect(cache.stats()).toMatchObject({ totalFiles: 1, totalPages: 1 });
    });
  });

  describe('stats and clearAll', () => {
    it('counts documents and pages', () => {
      const a = makeIdentity('/docs/a.pdf');
      const b = makeIdentity('/docs/b.pdf');
      cache.saveMetadata(a, 2, {}, []);
      cache.savePagesText(
        a,
        new Map([
          [0, 'a0'],
          [1, 'a1'],
        ])
      );
      cache.savePageText(b, 0, 'b0');

      const stats = cache.stats();

      expect(stats.totalFiles).toBe(2);
      expect(stats.totalPages).toBe(3);
      expect(stats.cacheSizeBytes).toBeGreaterThan(0);
      expect(stats.cacheFile).toBe(path.join(cacheDir, DOCUMENT_CACHE_FILENAME));
    });

    it('leaves expired rows out', () => {
      cache.saveMetadata(makeIdentity('/docs/a.pdf'), 1, {}, []);
      cache.savePageText(makeIdentity('/docs/a.pdf'), 0, 'text');

      now = T0 + 25 * HOUR;

      expect(cache.stats()).toMatchObject({ totalFiles: 0, totalPages: 0 });
    });

    it('clears everything', () => {
      const identity = makeIdentity('/docs/a.pdf');
      cache.saveMetadata(identity, 1, {}, []);
      cache.savePageText(identity, 0, 'text');

      cache.clearAll();

      expect(cache.getMetadata(identity)).toBeNull();
      expect(cache.stats()).toMatchObject({ totalFiles: 0, totalPages: 0 });
    });
  });

  it('can be closed more than once', () => {
    cache.close();
    expect(() => cache.close()).not.toThrow();
  });
});
