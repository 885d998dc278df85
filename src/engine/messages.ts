import { ROOT_KEYS } from "../config/types.js";
import type { RootKey } from "../config/types.js";

export type ClientMessage =
  | { type: "options"; requestId?: string }
  | { type: "browse"; requestId?: string; root: RootKey; path: string; showHidden: boolean }
  | {
      type: "convert";
      requestId?: string;
      source: { upload: { fileName: string; dataBase64: string } } | { path: string };
      model?: string;
      language?: string;
      outputDir?: string;
      copyDir?: string;
      styleHint?: string;
      includeNotes?: boolean;
    }
  | { type: "reload"; requestId?: string };

export type ParseResult =
  | { ok: true; message: ClientMessage }
  | { ok: false; requestId?: string; error: string };

interface ConvertFields {
  model?: string;
  language?: string;
  outputDir?: string;
  copyDir?: string;
  styleHint?: string;
}

const CONVERT_FIELDS = ["model", "language", "outputDir", "copyDir", "styleHint"] as const;

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRootKey(value: unknown): value is RootKey {
  return typeof value === "string" && ROOT_KEYS.some((key) => key === value);
}

function optionalString(record: Record<string, unknown>, key: string): string | undefined | null {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  return typeof value === "string" ? value : null;
}

export function isBase64(text: string): boolean {
  const compact = text.replace(/\s+/g, "");
  return compact.length % 4 === 0 && BASE64_RE.test(compact);
}

function parseSource(
  raw: unknown,
): { upload: { fileName: string; dataBase64: string } } | { path: string } | string {
  if (!isRecord(raw)) return "convert requires a source.";
  const upload = raw["upload"];
  if (upload !== undefined) {
    if (!isRecord(upload)) return "source.upload must be an object.";
    const fileName = upload["fileName"];
    const dataBase64 = upload["dataBase64"];
    if (typeof fileName !== "string" || fileName.length === 0) {
      return "source.upload.fileName must be a non-empty string.";
    }
    if (typeof dataBase64 !== "string" || !isBase64(dataBase64)) {
      return "source.upload.dataBase64 must be base64 text.";
    }
    return { upload: { fileName, dataBase64 } };
  }
  const path = raw["path"];
  if (typeof path === "string" && path.trim().length > 0) {
    return { path };
  }
  return "source must carry either upload or path.";
}

/** Validates an inbound frame. Anything unrecognised is rejected with a readable reason. */
export function parseClientMessage(data: unknown): ParseResult {
  if (!isRecord(data)) {
    return { ok: false, error: "Message must be a JSON object." };
  }
  const rawId = data["requestId"];
  const requestId = typeof rawId === "string" ? rawId : undefined;
  const fail = (error: string): ParseResult =>
    requestId === undefined ? { ok: false, error } : { ok: false, requestId, error };
  const withId = requestId === undefined ? {} : { requestId };

  switch (data["type"]) {
    case "options":
      return { ok: true, message: { type: "options", ...withId } };
    case "reload":
      return { ok: true, message: { type: "reload", ...withId } };
    case "browse": {
      const root = data["root"];
      if (!isRootKey(root)) {
        return fail(`browse.root must be one of: ${ROOT_KEYS.join(", ")}.`);
      }
      const path = optionalString(data, "path");
      if (path === null) return fail("browse.path must be a string.");
      return {
        ok: true,
        message: { type: "browse", ...withId, root, path: path ?? "", showHidden: data["showHidden"] === true },
      };
    }
    case "convert": {
      const source = parseSource(data["source"]);
      if (typeof source === "string") return fail(source);

      const fields: ConvertFields = {};
      for (const key of CONVERT_FIELDS) {
        const value = optionalString(data, key);
        if (value === null) return fail(`convert.${key} must be a string.`);
        if (value !== undefined) fields[key] = value;
      }
      const includeNotes = data["includeNotes"];
      if (includeNotes !== undefined && typeof includeNotes !== "boolean") {
        return fail("convert.includeNotes must be a boolean.");
      }
      return {
        ok: true,
        message: {
          type: "convert",
          ...withId,
          source,
          ...fields,
          ...(includeNotes === undefined ? {} : { includeNotes }),
        },
      };
    }
    default:
      return fail(`Unknown message type: ${String(data["type"])}`);
  }
}
