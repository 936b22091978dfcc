import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PdfParseParser } from '../extract/pdf-extractor.js';
import { DocumentParseError } from '../errors.js';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// Minimal valid PDF (one page containing "Hello World")
function createMinimalPdf(): Buffer {
  const pdf = [
    '%PDF-1.4',
    '1 0 obj<</Type/Catalog/Pages 2 0 R>>endobj',
    '2 0 obj<</Type/Pages/Kids[3 0 R]/Count 1>>endobj',
    '3 0 obj<</Type/Page/MediaBox[0 0 612 792]/Parent 2 0 R/Contents 4 0 R/Resources<</Font<</F1 5 0 R>>>>>>endobj',
    '4 0 obj<</Length 44>>stream',
    'BT /F1 12 Tf 100 700 Td (Hello World) Tj ET',
    'endstream endobj',
    '5 0 obj<</Type/Font/Subtype/Type1/BaseFont/Helvetica>>endobj',
    'xref',
    '0 6',
    '0000000000 65535 f ',
    '0000000009 00000 n ',
    '0000000058 00000 n ',
    '0000000115 00000 n ',
    '0000000266 00000 n ',
    '0000000360 00000 n ',
    'trailer<</Size 6/Root 1 0 R>>',
    'startxref',
    '431',
    '%%EOF',
  ].join('\n');
  return Buffer.from(pdf);
}

describe('extract/pdf-extractor', () => {
  const parser = new PdfParseParser();
  let dir: string;
  let pdfPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pdf-extractor-test-'));
    pdfPath = path.join(dir, 'hello.pdf');
    await writeFile(pdfPath, createMinimalPdf());
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('opens a PDF and reports its page count', async () => {
    const handle = await parser.open(pdfPath);
    try {
      expect(handle.path).toBe(pdfPath);
      expect(handle.pageCount).toBe(1);
    } finally {
      await parser.close(handle);
    }
  });

  it('extracts the text of a page', async () => {
    const handle = await parser.open(pdfPath);
    try {
      expect(await parser.extractText(handle, 0)).toContain('Hello World');
    } finally {
      await parser.close(handle);
    }
  });

  it('rejects page indices outside the document', async () => {
    const handle = await parser.open(pdfPath);
    try {
      await expect(parser.extractText(handle, 1)).rejects.toThrow(
        new RangeError('Page index 1 out of range (0-0)')
      );
      await expect(parser.extractText(handle, -1)).rejects.toBeInstanceOf(RangeError);
    } finally {
      await parser.close(handle);
    }
  });

  it('returns null for metadata fields the document lacks', async () => {
    const handle = await parser.open(pdfPath);
    try {
      const metadata = await parser.extractMetadata(handle);
      expect(metadata).toMatchObject({ title: null, author: null, subject: null, creationDate: null });
    } finally {
      await parser.close(handle);
    }
  });

  it('returns an empty outline for a document without bookmarks', async () => {
    const handle = await parser.open(pdfPath);
    try {
      expect(await parser.extractToc(handle)).toEqual([]);
    } finally {
      await parser.close(handle);
    }
  });

  it('serves several calls on one handle in turn', async () => {
    const handle = await parser.open(pdfPath);
    try {
      const [text, metadata, toc] = await Promise.all([
        parser.extractText(handle, 0),
        parser.extractMetadata(handle),
        parser.extractToc(handle),
      ]);
      expect(text).toContain('Hello World');
      expect(metadata.title).toBeNull();
      expect(toc).toEqual([]);
    } finally {
      await parser.close(handle);
    }
  });

  it('rejects data that is not a PDF', async () => {
    const invalidPath = path.join(dir, 'invalid.pdf');
    await writeFile(invalidPath, 'not a pdf file');

    const error = await parser.open(invalidPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DocumentParseError);
    expect(error).toMatchObject({ code: 'parse_failed', path: invalidPath });
  });

  it('rejects a file that cannot be read', async () => {
    const missing = path.join(dir, 'missing.pdf');
    await expect(parser.open(missing)).rejects.toMatchObject({
      code: 'parse_failed',
      message: expect.stringMatching(/^Cannot read /),
    });
  });
});
