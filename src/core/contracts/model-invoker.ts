import type { ModelRequest } from "../../prompt/types.js";

export interface InvokeOptions {
  /** Wall-clock limit for the whole call. */
  timeoutMs: number;
  /** Caller cancellation. Aborting yields a `Cancelled` failure. */
  signal?: AbortSignal;
}

/**
 * One request/response exchange with a hosted language model.
 *
 * Implementations resolve with the raw completion text and reject with a
 * ConversionError whose kind is one of `AuthenticationError`, `RateLimited`,
 * `ModelError`, `Timeout` or `Cancelled`.
 */
export interface ModelInvoker {
  readonly name: string;
  invoke(request: ModelRequest, options: InvokeOptions): Promise<string>;
}

export interface InvokerSettings {
  apiKey: string | undefined;
}

export type CreateInvoker = (settings: InvokerSettings) => ModelInvoker;
