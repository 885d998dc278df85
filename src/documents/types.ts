export type DocumentKind = "pdf" | "slidedeck";

/** One table: ordered rows of ordered cell strings. */
export type TableRows = string[][];

export interface SourceDocument {
  /** Absolute path for files from the input root, or the upload's file name. */
  readonly path: string;
  readonly fileName: string;
  readonly kind: DocumentKind;
  readonly bytes: Uint8Array;
}

export interface Segment {
  /** 1-based page or slide number. */
  index: number;
  heading?: string;
  body: string;
  tables: TableRows[];
  /** Speaker notes, slide decks only. */
  notes?: string;
}

export interface ExtractedContent {
  kind: DocumentKind;
  segments: Segment[];
  warnings: string[];
}

export interface ExtractOptions {
  includeNotes?: boolean;
  signal?: AbortSignal;
}

export interface DocumentExtractor {
  readonly kind: DocumentKind;
  extract(source: SourceDocument, options: ExtractOptions): Promise<ExtractedContent>;
}
