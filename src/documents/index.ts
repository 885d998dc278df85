export { detectDocumentKind, extractDocument, SUPPORTED_EXTENSIONS } from "./document-extractor.js";
export type {
  DocumentExtractor,
  DocumentKind,
  ExtractOptions,
  ExtractedContent,
  Segment,
  SourceDocument,
  TableRows,
} from "./types.js";
