import OpenAI from "openai";
import type {
  CreateInvoker,
  InvokeOptions,
  InvokerSettings,
  ModelInvoker,
} from "../../core/contracts/model-invoker.js";
import type { ModelRequest } from "../../prompt/types.js";
import { ConversionError, createLogger, isConversionError, redactSecrets } from "../../shared/index.js";

const log = createLogger("openai");

export interface OpenAiInvokerOptions extends InvokerSettings {
  /** Builds the SDK client. Tests inject a fake here. */
  clientFactory?: (apiKey: string) => OpenAI;
}

function defaultClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0 });
}

function classifyError(err: unknown, signal: AbortSignal | undefined): ConversionError {
  if (isConversionError(err)) return err;

  if (err instanceof OpenAI.APIUserAbortError) {
    return signal?.aborted
      ? new ConversionError("Cancelled", "The model call was cancelled.", { cause: err })
      : new ConversionError("Timeout", "The model call was aborted before it finished.", { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new ConversionError("Timeout", "The model service did not respond in time.", { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    if (status === 401 || status === 403) {
      // Provider messages for bad keys quote part of the key.
      return new ConversionError(
        "AuthenticationError",
        `The model service rejected the API key (HTTP ${status}).`,
        { cause: err },
      );
    }
    if (status === 429) {
      return new ConversionError("RateLimited", "The model service is rate limiting requests.", { cause: err });
    }
    const prefix = status === undefined ? "Model request failed" : `Model request failed (HTTP ${status})`;
    return new ConversionError("ModelError", `${prefix}: ${redactSecrets(err.message)}`, { cause: err });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ConversionError("ModelError", `Model request failed: ${redactSecrets(message)}`, { cause: err });
}

export class OpenAiModelInvoker implements ModelInvoker {
  readonly name = "openai";
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiInvokerOptions) {}

  private getClient(): OpenAI {
    const apiKey = this.options.apiKey?.trim();
    if (!apiKey) {
      throw new ConversionError(
        "AuthenticationError",
        "No API key is configured. Set OPENAI_API_KEY in the environment or the .env file.",
      );
    }
    if (!this.client) {
      this.client = (this.options.clientFactory ?? defaultClient)(apiKey);
    }
    return this.client;
  }

  async invoke(request: ModelRequest, options: InvokeOptions): Promise<string> {
    const { timeoutMs, signal } = options;
    if (signal?.aborted) {
      throw new ConversionError("Cancelled", "The model call was cancelled.");
    }
    const client = this.getClient();

    const controller = new AbortController();
    const relayAbort = (): void => controller.abort();
    signal?.addEventListener("abort", relayAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ConversionError("Timeout", `The model did not answer within ${timeoutMs}ms.`));
      }, timeoutMs);
    });
    let rejectCancelled: ((err: ConversionError) => void) | undefined;
    const cancelled = new Promise<never>((_, reject) => {
      rejectCancelled = reject;
    });
    const onCancel = (): void => rejectCancelled?.(new ConversionError("Cancelled", "The model call was cancelled."));
    signal?.addEventListener("abort", onCancel, { once: true });

    const start = Date.now();
    try {
      const response = await Promise.race([
        client.chat.completions.create(
          {
            model: request.modelId,
            messages: [
              { role: "system", content: request.systemPrompt },
              { role: "user", content: request.userPrompt },
            ],
          },
          { signal: controller.signal, maxRetries: 0 },
        ),
        deadline,
        cancelled,
      ]);

      const text = response.choices[0]?.message?.content ?? "";
      if (text.trim().length === 0) {
        throw new ConversionError("ModelError", "The model returned an empty response.");
      }
      log.debug(`${request.modelId} answered in ${Date.now() - start}ms (${text.length} chars)`);
      return text;
    } catch (err) {
      const failure = classifyError(err, signal);
      log.warn(`${request.modelId} call failed: ${failure.kind}: ${failure.message}`);
      throw failure;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", relayAbort);
      signal?.removeEventListener("abort", onCancel);
    }
  }
}

const createInvoker: CreateInvoker = (settings) => new OpenAiModelInvoker(settings);

export default createInvoker;
