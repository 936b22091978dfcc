/**
 * Shared types for the document parsing collaborator
 */

/** Metadata values are flattened to JSON scalars. */
export type MetadataValue = string | number | boolean | null;

export type DocumentMetadata = Record<string, MetadataValue>;

/** One outline entry. `level` starts at 1; `page` is 1-based, null when unresolvable. */
export interface TocEntry {
  level: number;
  title: string;
  page: number | null;
}

/** An opened document. Only the parser that created it knows what is inside. */
export interface DocumentHandle {
  readonly path: string;
  readonly pageCount: number;
}

export interface DocumentParser<H extends DocumentHandle = DocumentHandle> {
  /** Rejects with DocumentParseError when the file is not a readable PDF. */
  open(path: string): Promise<H>;
  /** Text of one page, 0-based. */
  extractText(handle: H, pageIndex: number): Promise<string>;
  extractMetadata(handle: H): Promise<DocumentMetadata>;
  extractToc(handle: H): Promise<TocEntry[]>;
  close(handle: H): Promise<void>;
}
