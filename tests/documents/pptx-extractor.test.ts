import { describe, expect, it } from "vitest";
import JSZip from "jszip";
import { PptxExtractor, parseSlide } from "../../src/documents/extractors/pptx-extractor.js";
import type { SourceDocument } from "../../src/documents/index.js";
import { buildDeck, paragraph, slideXml, tableShape, textShape } from "../helpers/deck.js";

function deckSource(bytes: Uint8Array, fileName = "Intro.pptx"): SourceDocument {
  return { path: fileName, fileName, kind: "slidedeck", bytes };
}

describe("parseSlide", () => {
  it("reads the title as heading and the rest as indented bullets", () => {
    const xml = slideXml(
      textShape({ id: 2, placeholder: "title", x: 10, y: 10, paragraphs: [paragraph("Cell biology")] }) +
        textShape({
          id: 3,
          placeholder: "body",
          x: 10,
          y: 500,
          paragraphs: [paragraph("Membranes"), paragraph("Lipid bilayer", 1), paragraph(""), paragraph("Organelles")],
        }),
    );

    expect(parseSlide(xml)).toEqual({
      heading: "Cell biology",
      body: "- Membranes\n  - Lipid bilayer\n- Organelles",
      tables: [],
    });
  });

  it("treats a centred title placeholder as the heading", () => {
    const xml = slideXml(textShape({ id: 2, placeholder: "ctrTitle", x: 0, y: 0, paragraphs: [paragraph("Welcome")] }));
    expect(parseSlide(xml)).toEqual({ heading: "Welcome", body: "", tables: [] });
  });

  it("orders text frames top to bottom, then left to right", () => {
    const xml = slideXml(
      textShape({ id: 2, x: 5000, y: 100, paragraphs: [paragraph("right")] }) +
        textShape({ id: 3, x: 0, y: 900, paragraphs: [paragraph("bottom")] }) +
        textShape({ id: 4, paragraphs: [paragraph("unplaced")] }) +
        textShape({ id: 5, x: 0, y: 100, paragraphs: [paragraph("left")] }),
    );
    expect(parseSlide(xml).body).toBe("- left\n- right\n- bottom\n- unplaced");
  });

  it("flattens group shapes at the group's position", () => {
    const group =
      `<p:grpSp><p:nvGrpSpPr><p:cNvPr id="9" name="Group"/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
      `<p:grpSpPr><a:xfrm><a:off x="0" y="50"/></a:xfrm></p:grpSpPr>` +
      textShape({ id: 10, x: 0, y: 50, paragraphs: [paragraph("grouped one")] }) +
      textShape({ id: 11, x: 0, y: 60, paragraphs: [paragraph("grouped two")] }) +
      `</p:grpSp>`;
    const xml = slideXml(textShape({ id: 2, x: 0, y: 300, paragraphs: [paragraph("after")] }) + group);

    expect(parseSlide(xml).body).toBe("- grouped one\n- grouped two\n- after");
  });

  it("turns each table into rows of trimmed cell text", () => {
    const xml = slideXml(
      tableShape({ id: 4, x: 0, y: 0, rows: [["Term", " Meaning "], ["ATP", "Energy carrier"]] }),
    );
    expect(parseSlide(xml)).toEqual({
      body: "",
      tables: [[["Term", "Meaning"], ["ATP", "Energy carrier"]]],
    });
  });

  it("joins runs and turns line breaks into spaces", () => {
    const shape =
      `<p:sp><p:nvSpPr><p:cNvPr id="2" name="t"/><p:cNvSpPr/><p:nvPr/></p:nvSpPr><p:spPr/>` +
      `<p:txBody><a:bodyPr/><a:p><a:r><a:t>Half</a:t></a:r><a:r><a:t>way</a:t></a:r>` +
      `<a:br/><a:r><a:t>there &amp; back</a:t></a:r></a:p></p:txBody></p:sp>`;
    expect(parseSlide(slideXml(shape)).body).toBe("- Halfway there & back");
  });
});

describe("PptxExtractor", () => {
  const extractor = new PptxExtractor();

  it("yields one segment per slide in presentation order", async () => {
    const bytes = await buildDeck([{ title: "One" }, { title: "Two" }, { title: "Three" }], { order: [2, 1, 3] });
    const content = await extractor.extract(deckSource(bytes), {});

    expect(content.kind).toBe("slidedeck");
    expect(content.segments.map((segment) => [segment.index, segment.heading])).toEqual([
      [1, "Two"],
      [2, "One"],
      [3, "Three"],
    ]);
    expect(content.warnings).toEqual([]);
  });

  it("falls back to numeric file order without a presentation part", async () => {
    const specs = Array.from({ length: 11 }, (_, index) => ({ title: `Slide ${index + 1}` }));
    const bytes = await buildDeck(specs, { omitPresentation: true });
    const content = await extractor.extract(deckSource(bytes), {});

    expect(content.segments).toHaveLength(11);
    expect(content.segments[1]?.heading).toBe("Slide 2");
    expect(content.segments[10]?.heading).toBe("Slide 11");
  });

  it("keeps empty slides so numbering stays faithful", async () => {
    const bytes = await buildDeck([{ title: "First" }, {}, { bullets: ["Last point"] }]);
    const content = await extractor.extract(deckSource(bytes), {});

    expect(content.segments).toEqual([
      { index: 1, heading: "First", body: "", tables: [] },
      { index: 2, body: "", tables: [] },
      { index: 3, body: "- Last point", tables: [] },
    ]);
  });

  it("attaches speaker notes only when asked", async () => {
    const bytes = await buildDeck([{ title: "Intro", notes: "Remember the demo." }]);

    const without = await extractor.extract(deckSource(bytes), {});
    expect(without.segments[0]?.notes).toBeUndefined();

    const withNotes = await extractor.extract(deckSource(bytes), { includeNotes: true });
    expect(withNotes.segments[0]?.notes).toBe("Remember the demo.");
  });

  it("warns when no slide carries text", async () => {
    const bytes = await buildDeck([{}, {}]);
    const content = await extractor.extract(deckSource(bytes), {});
    expect(content.segments).toHaveLength(2);
    expect(content.warnings).toEqual([
      "No extractable text found in the slide deck. Slides may contain only images (OCR disabled).",
    ]);
  });

  it("fails with ExtractionFailed for bytes that are not a zip archive", async () => {
    const bytes = new TextEncoder().encode("definitely not a deck");
    await expect(extractor.extract(deckSource(bytes), {})).rejects.toMatchObject({
      kind: "ExtractionFailed",
      message: "Intro.pptx could not be opened as a slide deck (corrupt or password-protected).",
    });
  });

  it("fails with ExtractionFailed for a deck without slides", async () => {
    const zip = new JSZip();
    zip.file("[Content_Types].xml", "<Types/>");
    const bytes = await zip.generateAsync({ type: "uint8array" });
    await expect(extractor.extract(deckSource(bytes), {})).rejects.toMatchObject({
      kind: "ExtractionFailed",
      message: "Intro.pptx contains no slides.",
    });
  });

  it("stops with Cancelled when the signal is aborted", async () => {
    const bytes = await buildDeck([{ title: "One" }]);
    const controller = new AbortController();
    controller.abort();
    await expect(extractor.extract(deckSource(bytes), { signal: controller.signal })).rejects.toMatchObject({
      kind: "Cancelled",
    });
  });
});
