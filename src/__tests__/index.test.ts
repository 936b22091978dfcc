import { describe, it, expect } from 'vitest';

const EXPECTED_EXPORTS = [
  'validateUrl',
  'isPrivateHost',
  'isBlockedAddress',
  'RemoteFetcher',
  'looksLikePdf',
  'DownloadCache',
  'cacheFilenameFor',
  'DocumentCache',
  'identify',
  'PdfParseParser',
  'PdfReader',
  'parsePageRange',
  'createRuntime',
  'loadConfig',
  'BlockedUrlError',
  'TooLargeError',
  'NotAPdfError',
  'TooManyRedirectsError',
  'TransportError',
  'CacheWriteError',
  'isPdfCacheError',
] as const;

describe('public API exports', () => {
  it.each(EXPECTED_EXPORTS)('exports %s as a function', async (name) => {
    const mod = await import('../index.js');
    expect(typeof Reflect.get(mod, name)).toBe('function');
  });
});
