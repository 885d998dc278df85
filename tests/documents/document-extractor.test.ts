import { describe, expect, it } from "vitest";
import { ConversionError } from "../../src/shared/index.js";
import { detectDocumentKind, extractDocument } from "../../src/documents/index.js";
import { buildDeck } from "../helpers/deck.js";
import { buildPdf } from "../helpers/pdf.js";

describe("detectDocumentKind", () => {
  it("maps extensions case-insensitively", () => {
    expect(detectDocumentKind("Intro.PPTX")).toBe("slidedeck");
    expect(detectDocumentKind("lecture.pdf")).toBe("pdf");
  });

  it("rejects anything else with UnsupportedFormat", () => {
    expect(() => detectDocumentKind("notes.docx")).toThrow(ConversionError);
    expect(() => detectDocumentKind("notes.docx")).toThrow(
      "Unsupported file type: notes.docx. Choose a .pptx or .pdf file.",
    );
  });
});

describe("extractDocument", () => {
  it("dispatches slide decks to the deck reader", async () => {
    const bytes = await buildDeck([{ title: "Hello", bullets: ["World"] }]);
    const content = await extractDocument({ path: "Intro.pptx", fileName: "Intro.pptx", kind: "slidedeck", bytes });
    expect(content.segments).toEqual([{ index: 1, heading: "Hello", body: "- World", tables: [] }]);
  });

  it("rejects empty files", async () => {
    await expect(
      extractDocument({ path: "a.pdf", fileName: "a.pdf", kind: "pdf", bytes: new Uint8Array() }),
    ).rejects.toMatchObject({ kind: "ExtractionFailed", message: "a.pdf is empty." });
  });

  it("rejects content that contradicts the extension", async () => {
    const deck = await buildDeck([{ title: "Hello" }]);
    await expect(
      extractDocument({ path: "Intro.pdf", fileName: "Intro.pdf", kind: "pdf", bytes: deck }),
    ).rejects.toMatchObject({ kind: "ExtractionFailed" });

    const pdf = buildPdf([[{ text: "Hello", x: 72, y: 700 }]]);
    await expect(
      extractDocument({ path: "Intro.pptx", fileName: "Intro.pptx", kind: "slidedeck", bytes: pdf }),
    ).rejects.toMatchObject({
      kind: "ExtractionFailed",
      message: "Intro.pptx looks like pdf content, not a slide deck.",
    });
  });
});
