import { ConversionError } from "./errors.js";

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ConversionError("Cancelled", "The conversion was cancelled.");
  }
}
