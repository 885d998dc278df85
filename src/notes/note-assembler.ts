import { randomUUID } from "node:crypto";
import { link, mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { PathSandbox } from "../sandbox/index.js";
import { ConversionError, createLogger, errnoCode, toConversionError } from "../shared/index.js";
import type { ArchiveSource, GeneratedNote, PlaceOptions, PlacementResult } from "./types.js";

const log = createLogger("notes");

export const DEFAULT_MAX_ARCHIVE_ATTEMPTS = 10_000;

const FENCED_NOTE_RE = /^```(?:markdown|md)?[ \t]*\r?\n([\s\S]*?)\r?\n?```$/i;

function splitName(fileName: string): { stem: string; ext: string } {
  const ext = extname(fileName);
  return { stem: ext ? fileName.slice(0, -ext.length) : fileName, ext };
}

export function deriveNoteFileName(sourceName: string, languageKey: string): string {
  const { stem } = splitName(basename(sourceName));
  return `${stem}_${languageKey.toLowerCase()}.md`;
}

/** Normalizes model output into the note body. */
export function assembleNote(noteText: string, sourceName: string, languageKey: string): GeneratedNote {
  let text = noteText.trim();
  const fenced = FENCED_NOTE_RE.exec(text);
  if (fenced) {
    text = (fenced[1] ?? "").trim();
  }
  if (text.length === 0) {
    throw new ConversionError("ModelError", "The model returned an empty note.");
  }
  return {
    text,
    sourceName,
    languageKey,
    fileName: deriveNoteFileName(sourceName, languageKey),
  };
}

async function ensureDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw toConversionError(err, "WriteFailed", `Could not create directory ${dir}.`);
  }
}

/** Writes to a temporary sibling and renames it over the target. */
export async function writeTextFileAtomic(filePath: string, text: string): Promise<void> {
  const tmpPath = join(filePath, "..", `.${basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmpPath, text, "utf-8");
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw toConversionError(err, "WriteFailed", `Could not write ${basename(filePath)}.`);
  }
}

export function archiveCandidateName(fileName: string, attempt: number): string {
  if (attempt === 0) return fileName;
  const { stem, ext } = splitName(fileName);
  return `${stem} (${attempt})${ext}`;
}

/**
 * Copies the source into the copy root under the first free name:
 * `name.ext`, then `name (1).ext`, `name (2).ext` and so on. The bytes land
 * in a temporary sibling first and are hard-linked into place, so a name is
 * only ever claimed by a complete copy and an existing archive is never
 * replaced.
 */
export async function archiveSource(
  sandbox: PathSandbox,
  copyDir: string,
  source: ArchiveSource,
  maxAttempts: number = DEFAULT_MAX_ARCHIVE_ATTEMPTS,
): Promise<string> {
  const dir = await sandbox.resolve("copy", copyDir);
  await ensureDirectory(dir);

  const fileName = basename(source.fileName);
  const tmpPath = join(dir, `.${fileName}.${randomUUID()}.tmp`);
  try {
    try {
      await writeFile(tmpPath, source.bytes, { flag: "wx" });
    } catch (err) {
      throw toConversionError(err, "WriteFailed", `Could not archive ${fileName}.`);
    }

    for (let attempt = 0; attempt <= maxAttempts; attempt++) {
      const target = join(dir, archiveCandidateName(fileName, attempt));
      try {
        await link(tmpPath, target);
        return target;
      } catch (err) {
        if (errnoCode(err) === "EEXIST") continue;
        throw toConversionError(err, "WriteFailed", `Could not archive ${fileName}.`);
      }
    }

    throw new ConversionError(
      "NamingExhausted",
      `No free archive name for ${fileName} after ${maxAttempts} numbered attempts.`,
    );
  } finally {
    await rm(tmpPath, { force: true });
  }
}

export async function placeNote(
  sandbox: PathSandbox,
  note: GeneratedNote,
  options: PlaceOptions,
): Promise<PlacementResult> {
  const dir = await sandbox.resolve("output", options.outputDir);
  await ensureDirectory(dir);

  const notePath = join(dir, note.fileName);
  await writeTextFileAtomic(notePath, note.text);
  log.debug(`Wrote ${notePath}`);

  const result: PlacementResult = { notePath, noteName: note.fileName, noteText: note.text };
  if (options.copyDir !== undefined && options.source) {
    result.copiedPath = await archiveSource(
      sandbox,
      options.copyDir,
      options.source,
      options.maxArchiveAttempts,
    );
    log.debug(`Archived ${options.source.fileName} as ${result.copiedPath}`);
  }
  return result;
}
