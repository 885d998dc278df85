import JSZip from "jszip";
import { posix } from "node:path";
import { ConversionError } from "../../shared/index.js";
import { throwIfCancelled } from "../../shared/index.js";
import type {
  DocumentExtractor,
  ExtractOptions,
  ExtractedContent,
  Segment,
  SourceDocument,
  TableRows,
} from "../types.js";
import { child, children, descendants, parseXml, path } from "./xml-tree.js";
import type { XmlElement } from "./xml-tree.js";

const SLIDE_PATH_RE = /^ppt\/slides\/slide(\d+)\.xml$/;
const TITLE_PLACEHOLDERS = new Set(["title", "ctrTitle"]);
const NOTES_REL_SUFFIX = "/notesSlide";

type ShapeItem =
  | { kind: "text"; isTitle: boolean; paragraphs: Paragraph[] }
  | { kind: "table"; rows: TableRows };

interface Paragraph {
  level: number;
  text: string;
}

interface PositionedBlock {
  x: number;
  y: number;
  order: number;
  items: ShapeItem[];
}

interface SlideContent {
  heading?: string;
  body: string;
  tables: TableRows[];
}

export class PptxExtractor implements DocumentExtractor {
  readonly kind = "slidedeck" as const;

  async extract(source: SourceDocument, options: ExtractOptions): Promise<ExtractedContent> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(source.bytes);
    } catch (err) {
      throw new ConversionError(
        "ExtractionFailed",
        `${source.fileName} could not be opened as a slide deck (corrupt or password-protected).`,
        { cause: err },
      );
    }

    const warnings: string[] = [];
    const slidePaths = await listSlidePaths(zip, warnings);
    if (slidePaths.length === 0) {
      throw new ConversionError("ExtractionFailed", `${source.fileName} contains no slides.`);
    }

    const segments: Segment[] = [];
    for (const [position, slidePath] of slidePaths.entries()) {
      throwIfCancelled(options.signal);

      const xml = await readEntry(zip, slidePath);
      if (xml === undefined) {
        throw new ConversionError("ExtractionFailed", `${source.fileName} is missing ${slidePath}.`);
      }

      let content: SlideContent;
      try {
        content = parseSlide(xml);
      } catch (err) {
        throw new ConversionError("ExtractionFailed", `Slide ${position + 1} could not be parsed.`, {
          cause: err,
        });
      }

      const segment: Segment = {
        index: position + 1,
        ...(content.heading ? { heading: content.heading } : {}),
        body: content.body,
        tables: content.tables,
      };
      if (options.includeNotes) {
        const notes = await readSpeakerNotes(zip, slidePath);
        if (notes) segment.notes = notes;
      }
      segments.push(segment);
    }

    const hasText = segments.some(
      (segment) => segment.heading || segment.body.length > 0 || segment.tables.length > 0,
    );
    if (!hasText) {
      warnings.push("No extractable text found in the slide deck. Slides may contain only images (OCR disabled).");
    }

    return { kind: "slidedeck", segments, warnings };
  }
}

async function readEntry(zip: JSZip, entryPath: string): Promise<string | undefined> {
  const file = zip.file(entryPath);
  if (!file) return undefined;
  return file.async("text");
}

function relationshipTargets(relsXml: string): Array<{ id: string; type: string; target: string }> {
  const root = parseXml(relsXml).find((element) => element.tag === "Relationships");
  return children(root, "Relationship").map((rel) => ({
    id: rel.attrs["Id"] ?? "",
    type: rel.attrs["Type"] ?? "",
    target: rel.attrs["Target"] ?? "",
  }));
}

function resolvePartPath(baseDir: string, target: string): string {
  if (target.startsWith("/")) return posix.normalize(target.slice(1));
  return posix.normalize(posix.join(baseDir, target));
}

function relsPathFor(partPath: string): string {
  return `${posix.dirname(partPath)}/_rels/${posix.basename(partPath)}.rels`;
}

/** Slide part paths in presentation order, falling back to file-name numbering. */
async function listSlidePaths(zip: JSZip, warnings: string[]): Promise<string[]> {
  const presentationXml = await readEntry(zip, "ppt/presentation.xml");
  const relsXml = await readEntry(zip, relsPathFor("ppt/presentation.xml"));

  if (presentationXml !== undefined && relsXml !== undefined) {
    const targets = new Map(relationshipTargets(relsXml).map((rel) => [rel.id, rel.target]));
    const presentation = parseXml(presentationXml).find((element) => element.tag === "p:presentation");
    const ordered: string[] = [];
    for (const slideId of children(child(presentation, "p:sldIdLst"), "p:sldId")) {
      const target = targets.get(slideId.attrs["r:id"] ?? "");
      if (!target) continue;
      const slidePath = resolvePartPath("ppt", target);
      if (zip.file(slidePath)) {
        ordered.push(slidePath);
      } else {
        warnings.push(`Slide part ${slidePath} is listed but missing; it was skipped.`);
      }
    }
    if (ordered.length > 0) return ordered;
  }

  return Object.keys(zip.files)
    .map((entryPath) => {
      const match = entryPath.match(SLIDE_PATH_RE);
      if (!match) return null;
      return { path: entryPath, order: Number(match[1] ?? "0") };
    })
    .filter((entry): entry is { path: string; order: number } => entry !== null)
    .sort((a, b) => a.order - b.order)
    .map((entry) => entry.path);
}

async function readSpeakerNotes(zip: JSZip, slidePath: string): Promise<string | undefined> {
  const relsXml = await readEntry(zip, relsPathFor(slidePath));
  if (relsXml === undefined) return undefined;

  const notesRel = relationshipTargets(relsXml).find((rel) => rel.type.endsWith(NOTES_REL_SUFFIX));
  if (!notesRel) return undefined;

  const notesXml = await readEntry(zip, resolvePartPath(posix.dirname(slidePath), notesRel.target));
  if (notesXml === undefined) return undefined;

  const notesRoot = parseXml(notesXml).find((element) => element.tag === "p:notes");
  const spTree = path(notesRoot, "p:cSld", "p:spTree");
  const lines: string[] = [];
  for (const shape of descendants(spTree, "p:sp")) {
    if (placeholderType(shape) !== "body") continue;
    for (const paragraph of readParagraphs(child(shape, "p:txBody"))) {
      if (paragraph.text) lines.push(paragraph.text);
    }
  }
  const text = lines.join("\n").trim();
  return text.length > 0 ? text : undefined;
}

// ── Slide XML ──────────────────────────────────────────────────────

export function parseSlide(xml: string): SlideContent {
  const slide = parseXml(xml).find((element) => element.tag === "p:sld");
  const spTree = path(slide, "p:cSld", "p:spTree");
  const items = collectShapes(spTree);

  let heading: string | undefined;
  const bodyLines: string[] = [];
  const tables: TableRows[] = [];

  for (const item of items) {
    if (item.kind === "table") {
      tables.push(item.rows);
      continue;
    }
    if (item.isTitle && heading === undefined) {
      heading = item.paragraphs.map((paragraph) => paragraph.text).filter(Boolean).join(" ").trim();
      continue;
    }
    for (const paragraph of item.paragraphs) {
      if (!paragraph.text) continue;
      bodyLines.push(`${"  ".repeat(paragraph.level)}- ${paragraph.text}`);
    }
  }

  return {
    ...(heading ? { heading } : {}),
    body: bodyLines.join("\n"),
    tables,
  };
}

function readOffset(xfrm: XmlElement | undefined): { x: number; y: number } | undefined {
  const off = child(xfrm, "a:off");
  if (!off) return undefined;
  const x = Number(off.attrs["x"]);
  const y = Number(off.attrs["y"]);
  if (!Number.isFinite(x) || !Number.isFinite(y)) return undefined;
  return { x, y };
}

function placeholderType(shape: XmlElement): string | undefined {
  const ph = path(shape, "p:nvSpPr", "p:nvPr", "p:ph");
  if (!ph) return undefined;
  return ph.attrs["type"] ?? "body";
}

/** Shapes of a tree or group in visual order: top to bottom, then left to right. */
function collectShapes(container: XmlElement | undefined): ShapeItem[] {
  const blocks: PositionedBlock[] = [];

  for (const [order, element] of (container?.children ?? []).entries()) {
    let offset: { x: number; y: number } | undefined;
    let items: ShapeItem[] = [];

    switch (element.tag) {
      case "p:sp": {
        const body = child(element, "p:txBody");
        if (!body) continue;
        const type = placeholderType(element);
        offset = readOffset(path(element, "p:spPr", "a:xfrm"));
        items = [{
          kind: "text",
          isTitle: type !== undefined && TITLE_PLACEHOLDERS.has(type),
          paragraphs: readParagraphs(body),
        }];
        break;
      }
      case "p:graphicFrame": {
        const table = path(element, "a:graphic", "a:graphicData", "a:tbl");
        if (!table) continue;
        offset = readOffset(child(element, "p:xfrm"));
        items = [{ kind: "table", rows: readTable(table) }];
        break;
      }
      case "p:grpSp":
        offset = readOffset(path(element, "p:grpSpPr", "a:xfrm"));
        items = collectShapes(element);
        break;
      default:
        continue;
    }

    blocks.push({
      x: offset?.x ?? Number.POSITIVE_INFINITY,
      y: offset?.y ?? Number.POSITIVE_INFINITY,
      order,
      items,
    });
  }

  blocks.sort((a, b) => {
    if (a.y !== b.y) return a.y < b.y ? -1 : 1;
    if (a.x !== b.x) return a.x < b.x ? -1 : 1;
    return a.order - b.order;
  });
  return blocks.flatMap((block) => block.items);
}

function paragraphText(paragraph: XmlElement): string {
  let text = "";
  for (const part of paragraph.children) {
    if (part.tag === "a:r" || part.tag === "a:fld") {
      text += child(part, "a:t")?.text ?? "";
    } else if (part.tag === "a:br") {
      text += " ";
    }
  }
  return text.replace(/\s+/g, " ").trim();
}

function readParagraphs(body: XmlElement | undefined): Paragraph[] {
  return children(body, "a:p").map((paragraph) => {
    const level = Number.parseInt(child(paragraph, "a:pPr")?.attrs["lvl"] ?? "0", 10);
    return {
      level: Number.isFinite(level) && level > 0 ? level : 0,
      text: paragraphText(paragraph),
    };
  });
}

function readTable(table: XmlElement): TableRows {
  return children(table, "a:tr").map((row) =>
    children(row, "a:tc").map((cell) =>
      readParagraphs(child(cell, "a:txBody"))
        .map((paragraph) => paragraph.text)
        .filter(Boolean)
        .join(" ")
        .trim(),
    ),
  );
}
