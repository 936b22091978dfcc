/**
 * Document parser backed by pdf-parse
 */
import { readFile } from 'node:fs/promises';
import { PDFParse, VerbosityLevel } from 'pdf-parse';
import { z } from 'zod';
import { DocumentParseError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { DocumentHandle, DocumentMetadata, DocumentParser, MetadataValue, TocEntry } from './types.js';

const PDF_EXTRACTION_TIMEOUT_MS = 30_000;

/** PDF info dictionary key -> metadata key exposed to callers. */
const INFO_KEYS: ReadonlyArray<[string, string]> = [
  ['Title', 'title'],
  ['Author', 'author'],
  ['Subject', 'subject'],
  ['Keywords', 'keywords'],
  ['Creator', 'creator'],
  ['Producer', 'producer'],
  ['ModDate', 'modificationDate'],
  ['PDFFormatVersion', 'format'],
];

const InfoSchema = z.record(z.unknown());

interface OutlineNode {
  title: string;
  pageNumber?: number;
  items: OutlineNode[];
}

const OutlineNodeSchema: z.ZodType<OutlineNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    title: z.string(),
    pageNumber: z.number().int().positive().optional(),
    items: z.array(OutlineNodeSchema).default([]),
  })
);

const OutlineSchema = z.array(OutlineNodeSchema);

export interface PdfParseHandle extends DocumentHandle {
  readonly parser: PDFParse;
  /** Tail of the per-handle call chain; pdf-parse calls must not overlap. */
  pending: Promise<unknown>;
}

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout;
  return Promise.race([
    promise.finally(() => clearTimeout(timer)),
    new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
    }),
  ]);
}

/** Run `task` after every earlier call on the same handle has settled. */
function sequential<T>(handle: PdfParseHandle, label: string, task: () => Promise<T>): Promise<T> {
  const run = handle.pending.then(
    () => withTimeout(task(), PDF_EXTRACTION_TIMEOUT_MS, label),
    () => withTimeout(task(), PDF_EXTRACTION_TIMEOUT_MS, label)
  );
  handle.pending = run.catch(() => undefined);
  return run.catch((error: unknown) => {
    if (error instanceof DocumentParseError) throw error;
    throw new DocumentParseError(handle.path, `${label} failed: ${errorMessage(error)}`, { cause: error });
  });
}

function toMetadataValue(value: unknown): MetadataValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function flattenOutline(nodes: OutlineNode[], level: number, into: TocEntry[]): TocEntry[] {
  for (const node of nodes) {
    into.push({ level, title: node.title.trim(), page: node.pageNumber ?? null });
    flattenOutline(node.items, level + 1, into);
  }
  return into;
}

export class PdfParseParser implements DocumentParser<PdfParseHandle> {
  async open(path: string): Promise<PdfParseHandle> {
    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (error) {
      throw new DocumentParseError(path, `Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
    }

    const parser = new PDFParse({ data: new Uint8Array(data), verbosity: VerbosityLevel.ERRORS });
    try {
      const info = await withTimeout(parser.getInfo(), PDF_EXTRACTION_TIMEOUT_MS, 'PDF getInfo');
      return { path, pageCount: info.total, parser, pending: Promise.resolve() };
    } catch (error) {
      await parser.destroy().catch((destroyError: unknown) => {
        logger.debug({ path, error: errorMessage(destroyError) }, 'Failed to release PDF parser');
      });
      logger.warn({ path, error: errorMessage(error) }, 'Failed to open PDF');
      throw new DocumentParseError(path, `Failed to open PDF ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  extractText(handle: PdfParseHandle, pageIndex: number): Promise<string> {
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= handle.pageCount) {
      return Promise.reject(
        new RangeError(`Page index ${pageIndex} out of range (0-${handle.pageCount - 1})`)
      );
    }

    const pageNumber = pageIndex + 1;
    return sequential(handle, 'PDF getText', async () => {
      const result = await handle.parser.getText({ partial: [pageNumber] });
      const page = result.pages.find((entry) => entry.num === pageNumber);
      return (page?.text ?? '').trim();
    });
  }

  extractMetadata(handle: PdfParseHandle): Promise<DocumentMetadata> {
    return sequential(handle, 'PDF getInfo', async () => {
      const result = await handle.parser.getInfo();
      const parsed = InfoSchema.safeParse(result.info ?? {});
      const info = parsed.success ? parsed.data : {};

      const metadata: DocumentMetadata = {};
      for (const [infoKey, key] of INFO_KEYS) {
        metadata[key] = toMetadataValue(info[infoKey]);
      }

      const dateNode = result.getDateNode();
      const creationDate = dateNode.CreationDate ?? dateNode.XmpCreateDate;
      metadata.creationDate =
        creationDate instanceof Date ? creationDate.toISOString() : toMetadataValue(info.CreationDate);

      return metadata;
    });
  }

  extractToc(handle: PdfParseHandle): Promise<TocEntry[]> {
    return sequential(handle, 'PDF outline', async () => {
      const result = await handle.parser.getInfo();
      const outline: unknown = 'outline' in result ? result.outline : null;
      if (!outline) return [];

      const parsed = OutlineSchema.safeParse(outline);
      if (!parsed.success) {
        logger.debug({ path: handle.path }, 'Unrecognized PDF outline shape, ignoring');
        return [];
      }
      return flattenOutline(parsed.data, 1, []);
    });
  }

  async close(handle: PdfParseHandle): Promise<void> {
    await handle.pending;
    await handle.parser.destroy();
  }
}
