import { describe, expect, it } from "vitest";
import { isBase64, parseClientMessage } from "../../src/engine/index.js";

describe("isBase64", () => {
  it("accepts padded base64 and ignores line breaks", () => {
    expect(isBase64("aGVsbG8=")).toBe(true);
    expect(isBase64("aGVs\nbG8=")).toBe(true);
    expect(isBase64("")).toBe(true);
  });

  it("rejects text with the wrong length or alphabet", () => {
    expect(isBase64("aGVsbG8")).toBe(false);
    expect(isBase64("aGVs*G8=")).toBe(false);
    expect(isBase64("a===")).toBe(false);
  });
});

describe("parseClientMessage", () => {
  it("accepts options and reload, keeping a string requestId", () => {
    expect(parseClientMessage({ type: "options", requestId: "r1" })).toEqual({
      ok: true,
      message: { type: "options", requestId: "r1" },
    });
    expect(parseClientMessage({ type: "reload", requestId: 7 })).toEqual({
      ok: true,
      message: { type: "reload" },
    });
  });

  it("rejects anything that is not an object", () => {
    expect(parseClientMessage(null)).toEqual({ ok: false, error: "Message must be a JSON object." });
    expect(parseClientMessage(["options"])).toEqual({ ok: false, error: "Message must be a JSON object." });
  });

  it("names unknown message types", () => {
    expect(parseClientMessage({ type: "chat", requestId: "r1" })).toEqual({
      ok: false,
      requestId: "r1",
      error: "Unknown message type: chat",
    });
  });

  describe("browse", () => {
    it("defaults path to the root and hides dot files", () => {
      expect(parseClientMessage({ type: "browse", root: "output" })).toEqual({
        ok: true,
        message: { type: "browse", root: "output", path: "", showHidden: false },
      });
    });

    it("rejects unknown roots and non-string paths", () => {
      expect(parseClientMessage({ type: "browse", root: "home" })).toEqual({
        ok: false,
        error: "browse.root must be one of: input, output, copy.",
      });
      expect(parseClientMessage({ type: "browse", root: "input", path: 3 })).toEqual({
        ok: false,
        error: "browse.path must be a string.",
      });
    });
  });

  describe("convert", () => {
    it("accepts an upload with optional fields", () => {
      const result = parseClientMessage({
        type: "convert",
        requestId: "r2",
        source: { upload: { fileName: "a.pdf", dataBase64: "JVBERi0=" } },
        model: "gpt-4.1",
        language: "english",
        outputDir: "week1",
        includeNotes: true,
      });

      expect(result).toEqual({
        ok: true,
        message: {
          type: "convert",
          requestId: "r2",
          source: { upload: { fileName: "a.pdf", dataBase64: "JVBERi0=" } },
          model: "gpt-4.1",
          language: "english",
          outputDir: "week1",
          includeNotes: true,
        },
      });
    });

    it("accepts a path source and treats null fields as absent", () => {
      expect(parseClientMessage({ type: "convert", source: { path: "a.pptx" }, copyDir: null })).toEqual({
        ok: true,
        message: { type: "convert", source: { path: "a.pptx" } },
      });
    });

    it.each([
      [{ type: "convert" }, "convert requires a source."],
      [{ type: "convert", source: {} }, "source must carry either upload or path."],
      [{ type: "convert", source: { path: "  " } }, "source must carry either upload or path."],
      [{ type: "convert", source: { upload: "a.pdf" } }, "source.upload must be an object."],
      [
        { type: "convert", source: { upload: { fileName: "", dataBase64: "" } } },
        "source.upload.fileName must be a non-empty string.",
      ],
      [
        { type: "convert", source: { upload: { fileName: "a.pdf", dataBase64: "not base64!" } } },
        "source.upload.dataBase64 must be base64 text.",
      ],
      [{ type: "convert", source: { path: "a.pdf" }, model: 4 }, "convert.model must be a string."],
      [{ type: "convert", source: { path: "a.pdf" }, includeNotes: "yes" }, "convert.includeNotes must be a boolean."],
    ])("rejects %j", (message, error) => {
      expect(parseClientMessage(message)).toEqual({ ok: false, error });
    });
  });
});
