import { extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import { ConversionError, createLogger } from "../shared/index.js";
import { PdfExtractor } from "./extractors/pdf-extractor.js";
import { PptxExtractor } from "./extractors/pptx-extractor.js";
import type {
  DocumentExtractor,
  DocumentKind,
  ExtractOptions,
  ExtractedContent,
  SourceDocument,
} from "./types.js";

const log = createLogger("extract");

const PDF_MIME = "application/pdf";
const PPTX_MIME = "application/vnd.openxmlformats-officedocument.presentationml.presentation";
const ZIP_MIME = "application/zip";

const ACCEPTED_MIME: Record<DocumentKind, readonly string[]> = {
  pdf: [PDF_MIME],
  slidedeck: [PPTX_MIME, ZIP_MIME],
};

const pdfExtractor = new PdfExtractor();
const pptxExtractor = new PptxExtractor();

export const SUPPORTED_EXTENSIONS: readonly string[] = [".pdf", ".pptx"];

export function detectDocumentKind(fileName: string): DocumentKind {
  switch (extname(fileName).toLowerCase()) {
    case ".pdf":
      return "pdf";
    case ".pptx":
      return "slidedeck";
    default:
      throw new ConversionError(
        "UnsupportedFormat",
        `Unsupported file type: ${fileName}. Choose a .pptx or .pdf file.`,
      );
  }
}

function extractorFor(kind: DocumentKind): DocumentExtractor {
  switch (kind) {
    case "pdf":
      return pdfExtractor;
    case "slidedeck":
      return pptxExtractor;
  }
}

/** Rejects bytes whose sniffed type contradicts the declared kind. Unknown content passes through to the reader. */
async function assertContentMatchesKind(source: SourceDocument): Promise<void> {
  const sniffed = await fileTypeFromBuffer(source.bytes);
  if (!sniffed) return;
  if (!ACCEPTED_MIME[source.kind].includes(sniffed.mime)) {
    throw new ConversionError(
      "ExtractionFailed",
      `${source.fileName} looks like ${sniffed.ext} content, not ${source.kind === "pdf" ? "a PDF" : "a slide deck"}.`,
    );
  }
}

export async function extractDocument(
  source: SourceDocument,
  options: ExtractOptions = {},
): Promise<ExtractedContent> {
  if (source.bytes.byteLength === 0) {
    throw new ConversionError("ExtractionFailed", `${source.fileName} is empty.`);
  }
  await assertContentMatchesKind(source);

  const start = Date.now();
  const content = await extractorFor(source.kind).extract(source, options);
  log.debug(
    `Extracted ${content.segments.length} segment(s) from ${source.fileName} in ${Date.now() - start}ms`,
  );
  for (const warning of content.warnings) {
    log.warn(`${source.fileName}: ${warning}`);
  }
  return content;
}
