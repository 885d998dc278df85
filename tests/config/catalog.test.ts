import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { DEFAULT_CATALOG_PATH, findPreset, loadCatalog, parseCatalog } from "../../src/config/index.js";

function validCatalog(): Record<string, unknown> {
  return {
    models: ["model-a", "model-b"],
    defaultModel: "model-b",
    defaultLanguage: "nynorsk",
    languages: [
      { key: "nynorsk", label: "Nynorsk", systemPrompt: "Skriv nynorsk.", userTemplate: "Innhald:\n{{content}}" },
      { key: "english", label: "English", systemPrompt: "Write English.", userTemplate: "Content:\n{{content}}" },
    ],
  };
}

describe("parseCatalog", () => {
  it("accepts a well-formed catalog", () => {
    const result = parseCatalog(validCatalog());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.catalog.models).toEqual(["model-a", "model-b"]);
    expect(result.catalog.languages.map((preset) => preset.key)).toEqual(["nynorsk", "english"]);
  });

  it("requires the content placeholder in every user template", () => {
    const raw = validCatalog();
    raw["languages"] = [{ key: "nynorsk", label: "Nynorsk", systemPrompt: "x", userTemplate: "no placeholder" }];
    expect(parseCatalog(raw)).toEqual({
      ok: false,
      error: "languages[0].userTemplate must contain {{content}}.",
    });
  });

  it("rejects a default model outside the model list", () => {
    const raw = validCatalog();
    raw["defaultModel"] = "model-z";
    expect(parseCatalog(raw)).toEqual({ ok: false, error: "defaultModel must be one of models." });
  });

  it("rejects duplicate language keys", () => {
    const raw = validCatalog();
    raw["languages"] = [
      { key: "english", label: "English", systemPrompt: "a", userTemplate: "{{content}}" },
      { key: "english", label: "English again", systemPrompt: "b", userTemplate: "{{content}}" },
    ];
    raw["defaultLanguage"] = "english";
    expect(parseCatalog(raw)).toEqual({ ok: false, error: "duplicate language key: english" });
  });

  it("rejects keys that are unsafe in file names", () => {
    const raw = validCatalog();
    raw["languages"] = [{ key: "../x", label: "X", systemPrompt: "a", userTemplate: "{{content}}" }];
    expect(parseCatalog(raw)).toEqual({
      ok: false,
      error: 'languages[0].key may only contain letters, digits, "_" and "-".',
    });
  });

  it("rejects an unknown default language", () => {
    const raw = validCatalog();
    raw["defaultLanguage"] = "bokmal";
    expect(parseCatalog(raw)).toEqual({ ok: false, error: "defaultLanguage must match a language key." });
  });
});

describe("loadCatalog", () => {
  let tempDir = "";

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "note-maker-catalog-"));
  });

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
    }
  });

  it("reports invalid JSON", async () => {
    const path = join(tempDir, "catalog.json");
    await writeFile(path, "{ not json", "utf8");
    await expect(loadCatalog(path)).resolves.toEqual({ ok: false, error: `${path} is not valid JSON.` });
  });

  it("loads the shipped catalog", async () => {
    const result = await loadCatalog(DEFAULT_CATALOG_PATH);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.catalog.defaultModel).toBe("gpt-5.1");
    expect(result.catalog.defaultLanguage).toBe("nynorsk");
    expect(result.catalog.languages.map((preset) => preset.key)).toEqual(["nynorsk", "bokmal", "english"]);
    expect(findPreset(result.catalog, "bokmal")?.label).toBe("Bokmål");
    expect(findPreset(result.catalog, "klingon")).toBeUndefined();
  });
});
