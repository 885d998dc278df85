import { ConversionError, isConversionError } from "../../shared/index.js";
import { throwIfCancelled } from "../../shared/index.js";
import type {
  DocumentExtractor,
  ExtractOptions,
  ExtractedContent,
  Segment,
  SourceDocument,
} from "../types.js";
import { layoutPage } from "./pdf-layout.js";
import type { TextRun } from "./pdf-layout.js";

interface PdfTextItem {
  str: string;
  transform: unknown[];
  width: number;
  height: number;
}

function toRun(item: PdfTextItem): TextRun {
  const x = Number(item.transform[4] ?? 0);
  const y = Number(item.transform[5] ?? 0);
  return {
    text: item.str,
    x: Number.isFinite(x) ? x : 0,
    y: Number.isFinite(y) ? y : 0,
    width: Number.isFinite(item.width) ? item.width : 0,
    height: Number.isFinite(item.height) ? item.height : 0,
  };
}

function describeOpenFailure(err: unknown, fileName: string): ConversionError {
  if (err instanceof Error && err.name === "PasswordException") {
    return new ConversionError("ExtractionFailed", `${fileName} is password-protected.`, { cause: err });
  }
  return new ConversionError(
    "ExtractionFailed",
    `${fileName} could not be opened as a PDF (corrupt or unsupported).`,
    { cause: err },
  );
}

export class PdfExtractor implements DocumentExtractor {
  readonly kind = "pdf" as const;

  async extract(source: SourceDocument, options: ExtractOptions): Promise<ExtractedContent> {
    throwIfCancelled(options.signal);
    const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");

    const loadingTask = pdfjs.getDocument({
      data: new Uint8Array(source.bytes),
      useWorkerFetch: false,
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: 0,
    });
    const onAbort = (): void => {
      void loadingTask.destroy();
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const pdfDoc = await loadingTask.promise.catch((err: unknown) => {
        throwIfCancelled(options.signal);
        throw describeOpenFailure(err, source.fileName);
      });

      if (pdfDoc.numPages === 0) {
        throw new ConversionError("ExtractionFailed", `${source.fileName} has no pages.`);
      }

      const segments: Segment[] = [];
      for (let pageNumber = 1; pageNumber <= pdfDoc.numPages; pageNumber++) {
        throwIfCancelled(options.signal);
        const page = await pdfDoc.getPage(pageNumber);
        const textContent = await page.getTextContent();
        const runs = textContent.items.flatMap((item) => ("str" in item ? [toRun(item)] : []));
        const layout = layoutPage(runs);
        segments.push({ index: pageNumber, body: layout.body, tables: layout.tables });
        page.cleanup();
      }

      const warnings: string[] = [];
      if (segments.every((segment) => segment.body.length === 0)) {
        warnings.push("No extractable text found in PDF. This may be a scanned document (OCR disabled).");
      }

      return { kind: "pdf", segments, warnings };
    } catch (err) {
      if (isConversionError(err)) throw err;
      throwIfCancelled(options.signal);
      throw new ConversionError("ExtractionFailed", `${source.fileName} could not be read.`, { cause: err });
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      await loadingTask.destroy();
    }
  }
}
