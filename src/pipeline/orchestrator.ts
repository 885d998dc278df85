import { readFile, stat } from "node:fs/promises";
import { posix } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { findPreset } from "../config/catalog.js";
import type { AppConfig, LanguagePreset } from "../config/types.js";
import type { InvokeOptions, ModelInvoker } from "../core/index.js";
import { detectDocumentKind, extractDocument } from "../documents/index.js";
import type { SourceDocument } from "../documents/index.js";
import { assembleNote, placeNote } from "../notes/index.js";
import { composePrompt } from "../prompt/index.js";
import type { ModelRequest } from "../prompt/index.js";
import { PathSandbox } from "../sandbox/index.js";
import {
  ConversionError,
  createLogger,
  errnoCode,
  isConversionError,
  redactSecrets,
  throwIfCancelled,
  toConversionError,
} from "../shared/index.js";
import type {
  ConversionOutcome,
  ConversionRequest,
  ConversionSource,
  ConvertOptions,
  PipelineStage,
} from "./types.js";

const log = createLogger("pipeline");

export interface PipelineDeps {
  config: AppConfig;
  invoker: ModelInvoker;
  /** Defaults to a sandbox over `config.roots`. */
  sandbox?: PathSandbox;
  maxArchiveAttempts?: number;
}

function uploadName(fileName: string): string {
  const name = posix.basename(fileName.replace(/\\/g, "/"));
  if (!name || name === "." || name === "..") {
    throw new ConversionError("InvalidRequest", "The uploaded file has no usable name.");
  }
  return name;
}

function formatBytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

/**
 * Runs one conversion request through resolve, extract, compose, invoke and
 * place. Every failure is reported as a stage-tagged outcome, never thrown.
 */
export class ConversionPipeline {
  readonly config: AppConfig;
  private readonly invoker: ModelInvoker;
  private readonly sandbox: PathSandbox;
  private readonly maxArchiveAttempts: number | undefined;

  constructor(deps: PipelineDeps) {
    this.config = deps.config;
    this.invoker = deps.invoker;
    this.sandbox = deps.sandbox ?? new PathSandbox(deps.config.roots);
    this.maxArchiveAttempts = deps.maxArchiveAttempts;
  }

  get pathSandbox(): PathSandbox {
    return this.sandbox;
  }

  async convert(request: ConversionRequest, options: ConvertOptions = {}): Promise<ConversionOutcome> {
    const { signal } = options;
    const stages: PipelineStage[] = [];
    const progress: { stage: PipelineStage } = { stage: "received" };
    const enter = (stage: PipelineStage): void => {
      progress.stage = stage;
      stages.push(stage);
      log.debug(`-> ${stage}`);
      options.onStage?.(stage);
    };

    enter("received");
    try {
      const preset = this.validate(request);

      throwIfCancelled(signal);
      enter("resolving");
      const source = await this.resolveSource(request.source);

      enter("extracting");
      const content = await extractDocument(source, {
        includeNotes: request.includeNotes ?? this.config.includeSpeakerNotes,
        signal,
      });

      throwIfCancelled(signal);
      enter("composing");
      const modelRequest = composePrompt(content, preset, request.modelId, {
        ...(request.styleHint ? { styleHint: request.styleHint } : {}),
      });

      enter("invoking");
      const text = await this.invokeWithRetry(modelRequest, signal);

      throwIfCancelled(signal);
      enter("placing");
      const note = assembleNote(text, source.fileName, preset.key);
      const result = await placeNote(this.sandbox, note, {
        outputDir: request.outputDir,
        ...(request.copyDir !== undefined ? { copyDir: request.copyDir, source } : {}),
        ...(this.maxArchiveAttempts !== undefined ? { maxArchiveAttempts: this.maxArchiveAttempts } : {}),
      });

      enter("done");
      log.info(`Converted ${source.fileName} -> ${result.noteName}`);
      return { ok: true, result, stages };
    } catch (err) {
      const error = toConversionError(err, "Internal");
      const failure = {
        stage: progress.stage,
        kind: error.kind,
        message: redactSecrets(error.message),
      };
      log.warn(`Failed at ${failure.stage}: ${failure.kind}: ${failure.message}`);
      return { ok: false, failure, stages };
    }
  }

  private validate(request: ConversionRequest): LanguagePreset {
    const preset = findPreset(this.config.catalog, request.languageKey);
    if (!preset) {
      throw new ConversionError("InvalidRequest", `Unknown language preset: ${request.languageKey}`);
    }
    if (!this.config.catalog.models.includes(request.modelId)) {
      throw new ConversionError("InvalidRequest", `Unknown model: ${request.modelId}`);
    }
    const { source } = request;
    const hasSource = "upload" in source ? source.upload.fileName.length > 0 : source.path.trim().length > 0;
    if (!hasSource) {
      throw new ConversionError("InvalidRequest", "No source file was given.");
    }
    return preset;
  }

  private assertWithinUploadLimit(fileName: string, size: number): void {
    if (size > this.config.maxUploadBytes) {
      throw new ConversionError(
        "InvalidRequest",
        `${fileName} is ${formatBytes(size)}; the limit is ${formatBytes(this.config.maxUploadBytes)}.`,
      );
    }
  }

  private async resolveSource(source: ConversionSource): Promise<SourceDocument> {
    if ("upload" in source) {
      const fileName = uploadName(source.upload.fileName);
      const kind = detectDocumentKind(fileName);
      this.assertWithinUploadLimit(fileName, source.upload.bytes.byteLength);
      return { path: fileName, fileName, kind, bytes: source.upload.bytes };
    }

    const absolutePath = await this.sandbox.resolve("input", source.path);

    let size: number;
    try {
      const info = await stat(absolutePath);
      if (!info.isFile()) {
        throw new ConversionError("NotFound", `${source.path} is not a file.`);
      }
      size = info.size;
    } catch (err) {
      if (isConversionError(err)) throw err;
      throw new ConversionError("NotFound", `${source.path} does not exist.`, { cause: err });
    }

    // Named after the path the caller asked for; a symbolic link keeps its own name.
    const fileName = posix.basename(source.path.replace(/\\/g, "/"));
    const kind = detectDocumentKind(fileName);
    this.assertWithinUploadLimit(fileName, size);

    try {
      const bytes = new Uint8Array(await readFile(absolutePath));
      return { path: absolutePath, fileName, kind, bytes };
    } catch (err) {
      const code = errnoCode(err);
      throw new ConversionError(
        "ExtractionFailed",
        `${fileName} could not be read${code ? ` (${code})` : ""}.`,
        { cause: err },
      );
    }
  }

  private async invokeWithRetry(request: ModelRequest, signal: AbortSignal | undefined): Promise<string> {
    const invokeOptions: InvokeOptions = {
      timeoutMs: this.config.modelTimeoutMs,
      ...(signal ? { signal } : {}),
    };
    try {
      return await this.invoker.invoke(request, invokeOptions);
    } catch (err) {
      if (!isConversionError(err) || err.kind !== "RateLimited") throw err;
      log.warn(`Rate limited; retrying once in ${this.config.rateLimitBackoffMs}ms`);
      await this.backoff(signal);
      return this.invoker.invoke(request, invokeOptions);
    }
  }

  private async backoff(signal: AbortSignal | undefined): Promise<void> {
    try {
      await sleep(this.config.rateLimitBackoffMs, undefined, signal ? { signal } : {});
    } catch (err) {
      throwIfCancelled(signal);
      throw err;
    }
  }
}
