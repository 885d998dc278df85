import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseDotenv } from "dotenv";
import { createLogger, registerSecret } from "../shared/index.js";
import { loadCatalog } from "./catalog.js";
import { ROOT_KEYS } from "./types.js";
import type { AppConfig, RootKey, RootMapping } from "./types.js";

const log = createLogger("config");

// ── Defaults ───────────────────────────────────────────────────────

const DEFAULT_PORT = 8080;
const DEFAULT_MODEL_TIMEOUT_MS = 120_000;
const DEFAULT_RATE_LIMIT_BACKOFF_MS = 2_000;
const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

const thisDir = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CATALOG_PATH = resolve(thisDir, "..", "..", "config", "catalog.json");

const ROOT_ENV_VARS: Record<RootKey, string> = {
  input: "HOST_INPUT_PATH",
  output: "HOST_OUTPUT_PATH",
  copy: "HOST_COPY_PATH",
};

export interface LoadAppConfigOptions {
  env?: Record<string, string | undefined>;
  /** Directory searched for `.env`. */
  cwd?: string;
  catalogPath?: string;
}

// ── Env-var parsing helpers ────────────────────────────────────────

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim().length === 0) return fallback;
  return raw === "1" || raw.toLowerCase() === "true";
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function parseRoot(raw: string | undefined, cwd: string): string | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;
  const expanded = expandHome(trimmed);
  return isAbsolute(expanded) ? resolve(expanded) : resolve(cwd, expanded);
}

// ── .env file ──────────────────────────────────────────────────────

/**
 * Reads KEY=VALUE pairs from a .env file. A file holding only a bare value
 * on its own line is taken as the OpenAI key.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const values: Record<string, string> = { ...parseDotenv(content) };
  if (values["OPENAI_API_KEY"]) return values;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#") || line.includes("=")) continue;
    values["OPENAI_API_KEY"] = line.replace(/^['"]|['"]$/g, "");
    break;
  }
  return values;
}

async function readEnvFile(cwd: string): Promise<Record<string, string>> {
  try {
    return parseEnvFile(await readFile(join(cwd, ".env"), "utf-8"));
  } catch {
    return {};
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

// ── Loader ─────────────────────────────────────────────────────────

export async function loadAppConfig(options: LoadAppConfigOptions = {}): Promise<AppConfig> {
  const cwd = options.cwd ?? process.cwd();
  const fileEnv = await readEnvFile(cwd);
  const processEnv = options.env ?? process.env;
  const read = (name: string): string | undefined => {
    const fromProcess = processEnv[name];
    return fromProcess !== undefined && fromProcess.length > 0 ? fromProcess : fileEnv[name];
  };

  const catalogPath = options.catalogPath ?? DEFAULT_CATALOG_PATH;
  const loaded = await loadCatalog(catalogPath);
  if (!loaded.ok) {
    throw new Error(`Invalid model catalog: ${loaded.error}`);
  }

  const roots: Partial<Record<RootKey, string>> = {};
  for (const key of ROOT_KEYS) {
    const dir = parseRoot(read(ROOT_ENV_VARS[key]), cwd);
    if (dir !== undefined) roots[key] = dir;
  }

  const apiKey = read("OPENAI_API_KEY")?.trim() || undefined;
  registerSecret(apiKey);
  if (!apiKey) {
    log.warn("OPENAI_API_KEY is not set; conversions will fail until it is configured.");
  }

  const config: AppConfig = {
    apiKey,
    roots: roots satisfies RootMapping,
    catalog: loaded.catalog,
    port: parsePositiveInt(read("NOTE_MAKER_PORT"), DEFAULT_PORT),
    modelTimeoutMs: parsePositiveInt(read("NOTE_MAKER_MODEL_TIMEOUT_MS"), DEFAULT_MODEL_TIMEOUT_MS),
    rateLimitBackoffMs: parsePositiveInt(
      read("NOTE_MAKER_RATE_LIMIT_BACKOFF_MS"),
      DEFAULT_RATE_LIMIT_BACKOFF_MS,
    ),
    maxUploadBytes: parsePositiveInt(read("NOTE_MAKER_MAX_UPLOAD_BYTES"), DEFAULT_MAX_UPLOAD_BYTES),
    includeSpeakerNotes: parseBool(read("NOTE_MAKER_INCLUDE_NOTES"), false),
  };

  log.debug(
    `Loaded config: roots=[${Object.keys(roots).join(", ")}] models=${config.catalog.models.length}`,
  );
  return deepFreeze(config);
}
