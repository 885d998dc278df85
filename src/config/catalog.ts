import { readFile } from "node:fs/promises";
import type { Catalog, LanguagePreset } from "./types.js";

export const CONTENT_PLACEHOLDER = "{{content}}";

export type CatalogLoadResult =
  | { ok: true; catalog: Catalog }
  | { ok: false; error: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function parsePreset(value: unknown, index: number): LanguagePreset | string {
  if (!isObject(value)) return `languages[${index}] must be an object.`;
  const { key, label, systemPrompt, userTemplate } = value;
  if (!isNonEmptyString(key)) return `languages[${index}].key must be a non-empty string.`;
  if (!/^[A-Za-z0-9_-]+$/.test(key)) {
    return `languages[${index}].key may only contain letters, digits, "_" and "-".`;
  }
  if (!isNonEmptyString(label)) return `languages[${index}].label must be a non-empty string.`;
  if (!isNonEmptyString(systemPrompt)) return `languages[${index}].systemPrompt must be a non-empty string.`;
  if (!isNonEmptyString(userTemplate)) return `languages[${index}].userTemplate must be a non-empty string.`;
  if (!userTemplate.includes(CONTENT_PLACEHOLDER)) {
    return `languages[${index}].userTemplate must contain ${CONTENT_PLACEHOLDER}.`;
  }
  return { key, label, systemPrompt, userTemplate };
}

export function parseCatalog(raw: unknown): CatalogLoadResult {
  if (!isObject(raw)) return { ok: false, error: "catalog must be a JSON object." };

  const { models, defaultModel, defaultLanguage, languages } = raw;
  if (!Array.isArray(models) || models.length === 0 || !models.every(isNonEmptyString)) {
    return { ok: false, error: "models must be a non-empty array of strings." };
  }
  if (!isNonEmptyString(defaultModel) || !models.includes(defaultModel)) {
    return { ok: false, error: "defaultModel must be one of models." };
  }
  if (!Array.isArray(languages) || languages.length === 0) {
    return { ok: false, error: "languages must be a non-empty array." };
  }

  const presets: LanguagePreset[] = [];
  for (const [index, entry] of languages.entries()) {
    const parsed = parsePreset(entry, index);
    if (typeof parsed === "string") return { ok: false, error: parsed };
    if (presets.some((preset) => preset.key === parsed.key)) {
      return { ok: false, error: `duplicate language key: ${parsed.key}` };
    }
    presets.push(parsed);
  }

  if (!isNonEmptyString(defaultLanguage) || !presets.some((preset) => preset.key === defaultLanguage)) {
    return { ok: false, error: "defaultLanguage must match a language key." };
  }

  return {
    ok: true,
    catalog: { models: [...models], defaultModel, defaultLanguage, languages: presets },
  };
}

export async function loadCatalog(catalogPath: string): Promise<CatalogLoadResult> {
  let text: string;
  try {
    text = await readFile(catalogPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `cannot read ${catalogPath}: ${message}` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, error: `${catalogPath} is not valid JSON.` };
  }
  return parseCatalog(raw);
}

export function findPreset(catalog: Catalog, key: string): LanguagePreset | undefined {
  return catalog.languages.find((preset) => preset.key === key);
}
