import type { AppConfig } from "../config/types.js";
import { ROOT_KEYS } from "../config/types.js";
import type { CreateInvoker } from "../core/index.js";
import { SUPPORTED_EXTENSIONS } from "../documents/index.js";
import { ConversionPipeline } from "../pipeline/index.js";
import type { ConversionRequest, ConversionSource } from "../pipeline/index.js";
import { createLogger, errorMessage, isConversionError, redactSecrets } from "../shared/index.js";
import { parseClientMessage } from "./messages.js";
import type { ClientMessage } from "./messages.js";

export { isBase64, parseClientMessage } from "./messages.js";
export type { ClientMessage, ParseResult } from "./messages.js";

const log = createLogger("engine");

type Reply = (clientId: string, data: unknown) => void;

type ConvertMessage = Extract<ClientMessage, { type: "convert" }>;
type BrowseMessage = Extract<ClientMessage, { type: "browse" }>;

export interface NoteEngineOptions {
  onReply: Reply;
  loadConfig: () => Promise<AppConfig>;
  createInvoker: CreateInvoker;
  maxArchiveAttempts?: number;
}

/**
 * Routes client messages to the conversion pipeline and reports progress
 * back. Conversions belong to the client that asked for them and are
 * aborted when it disconnects.
 */
export class NoteEngine {
  private readonly onReply: Reply;
  private readonly loadConfig: () => Promise<AppConfig>;
  private readonly createInvoker: CreateInvoker;
  private readonly maxArchiveAttempts: number | undefined;
  private pipeline: ConversionPipeline | null = null;
  private readonly inFlight = new Map<string, Set<AbortController>>();

  constructor(options: NoteEngineOptions) {
    this.onReply = options.onReply;
    this.loadConfig = options.loadConfig;
    this.createInvoker = options.createInvoker;
    this.maxArchiveAttempts = options.maxArchiveAttempts;
  }

  get config(): AppConfig | undefined {
    return this.pipeline?.config;
  }

  async start(): Promise<void> {
    await this.reload();
    log.info("NoteEngine started");
  }

  async stop(): Promise<void> {
    for (const clientId of [...this.inFlight.keys()]) {
      this.abortClient(clientId);
    }
    log.info("NoteEngine stopped");
  }

  /** Builds a fresh pipeline from newly loaded configuration. Running conversions keep the old one. */
  async reload(): Promise<AppConfig> {
    const config = await this.loadConfig();
    this.pipeline = new ConversionPipeline({
      config,
      invoker: this.createInvoker({ apiKey: config.apiKey }),
      ...(this.maxArchiveAttempts !== undefined ? { maxArchiveAttempts: this.maxArchiveAttempts } : {}),
    });
    log.debug(`Configuration loaded: ${config.catalog.models.length} model(s), ${config.catalog.languages.length} language(s)`);
    return config;
  }

  abortClient(clientId: string): void {
    const controllers = this.inFlight.get(clientId);
    if (!controllers) return;
    for (const controller of controllers) {
      controller.abort();
    }
    this.inFlight.delete(clientId);
    log.info(`Aborted ${controllers.size} conversion(s) for ${clientId}`);
  }

  async handleMessage(clientId: string, data: unknown): Promise<void> {
    const parsed = parseClientMessage(data);
    if (!parsed.ok) {
      log.warn(`Rejected message from ${clientId}: ${parsed.error}`);
      this.onReply(clientId, { type: "error", requestId: parsed.requestId, message: parsed.error });
      return;
    }

    const message = parsed.message;
    log.debug(`Message from ${clientId}: ${message.type}`);
    try {
      switch (message.type) {
        case "options":
          this.sendOptions(clientId, message.requestId);
          return;
        case "browse":
          await this.browse(clientId, message);
          return;
        case "convert":
          await this.convert(clientId, message);
          return;
        case "reload":
          await this.reload();
          this.onReply(clientId, { type: "reloaded", requestId: message.requestId });
          return;
      }
    } catch (err) {
      const text = redactSecrets(errorMessage(err));
      log.error(`Handling ${message.type} failed:`, text);
      this.onReply(clientId, { type: "error", requestId: message.requestId, message: text });
    }
  }

  private requirePipeline(): ConversionPipeline {
    if (!this.pipeline) {
      throw new Error("Engine has not been started.");
    }
    return this.pipeline;
  }

  private sendOptions(clientId: string, requestId: string | undefined): void {
    const pipeline = this.requirePipeline();
    const { catalog } = pipeline.config;
    this.onReply(clientId, {
      type: "options",
      requestId,
      models: catalog.models,
      defaultModel: catalog.defaultModel,
      languages: catalog.languages.map((preset) => ({ key: preset.key, label: preset.label })),
      defaultLanguage: catalog.defaultLanguage,
      roots: Object.fromEntries(ROOT_KEYS.map((key) => [key, pipeline.pathSandbox.isConfigured(key)])),
      maxUploadBytes: pipeline.config.maxUploadBytes,
      extensions: SUPPORTED_EXTENSIONS,
    });
  }

  private async browse(clientId: string, message: BrowseMessage): Promise<void> {
    const sandbox = this.requirePipeline().pathSandbox;
    try {
      const listing = await sandbox.list(message.root, message.path, { showHidden: message.showHidden });
      this.onReply(clientId, {
        type: "browse_result",
        requestId: message.requestId,
        root: listing.root,
        entries: listing.entries,
        currentPath: listing.currentPath,
        parentPath: listing.parentPath,
      });
    } catch (err) {
      if (!isConversionError(err)) throw err;
      this.onReply(clientId, {
        type: "browse_error",
        requestId: message.requestId,
        kind: err.kind,
        message: err.message,
      });
    }
  }

  private toRequest(message: ConvertMessage, pipeline: ConversionPipeline): ConversionRequest {
    const { catalog } = pipeline.config;
    const source: ConversionSource =
      "upload" in message.source
        ? {
            upload: {
              fileName: message.source.upload.fileName,
              bytes: new Uint8Array(Buffer.from(message.source.upload.dataBase64, "base64")),
            },
          }
        : { path: message.source.path };

    return {
      source,
      modelId: message.model ?? catalog.defaultModel,
      languageKey: message.language ?? catalog.defaultLanguage,
      outputDir: message.outputDir ?? "",
      ...(message.copyDir !== undefined && message.copyDir !== "" ? { copyDir: message.copyDir } : {}),
      ...(message.styleHint ? { styleHint: message.styleHint } : {}),
      ...(message.includeNotes !== undefined ? { includeNotes: message.includeNotes } : {}),
    };
  }

  private async convert(clientId: string, message: ConvertMessage): Promise<void> {
    const pipeline = this.requirePipeline();
    const request = this.toRequest(message, pipeline);
    const { requestId } = message;

    const controller = new AbortController();
    const controllers = this.inFlight.get(clientId) ?? new Set<AbortController>();
    controllers.add(controller);
    this.inFlight.set(clientId, controllers);

    try {
      const outcome = await pipeline.convert(request, {
        signal: controller.signal,
        onStage: (stage) => this.onReply(clientId, { type: "convert_progress", requestId, stage }),
      });

      if (outcome.ok) {
        this.onReply(clientId, { type: "convert_result", requestId, ...outcome.result });
      } else {
        this.onReply(clientId, { type: "convert_error", requestId, ...outcome.failure });
      }
    } finally {
      controllers.delete(controller);
      if (controllers.size === 0 && this.inFlight.get(clientId) === controllers) {
        this.inFlight.delete(clientId);
      }
    }
  }
}
