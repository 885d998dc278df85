export interface GeneratedNote {
  text: string;
  sourceName: string;
  languageKey: string;
  fileName: string;
}

/** Side effects actually committed by a placement. Paths are absolute host paths. */
export interface PlacementResult {
  notePath: string;
  noteName: string;
  noteText: string;
  copiedPath?: string;
}

export interface ArchiveSource {
  fileName: string;
  bytes: Uint8Array;
}

export interface PlaceOptions {
  /** Output-root-relative directory for the note. */
  outputDir: string;
  /** Copy-root-relative directory; when set, `source` is archived there. */
  copyDir?: string;
  source?: ArchiveSource;
  /** Highest ` (n)` suffix tried before giving up. */
  maxArchiveAttempts?: number;
}
