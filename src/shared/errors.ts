export type ConversionErrorKind =
  | "InvalidRequest"
  | "RootNotConfigured"
  | "PathViolation"
  | "NotFound"
  | "UnsupportedFormat"
  | "ExtractionFailed"
  | "EmptyDocument"
  | "AuthenticationError"
  | "RateLimited"
  | "ModelError"
  | "Timeout"
  | "NamingExhausted"
  | "WriteFailed"
  | "Cancelled"
  | "Internal";

export class ConversionError extends Error {
  constructor(
    public readonly kind: ConversionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConversionError";
  }
}

export function isConversionError(err: unknown): err is ConversionError {
  return err instanceof ConversionError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Passes a ConversionError through untouched and wraps anything else as `fallback`. */
export function toConversionError(
  err: unknown,
  fallback: ConversionErrorKind,
  message?: string,
): ConversionError {
  if (isConversionError(err)) return err;
  return new ConversionError(fallback, message ?? errorMessage(err), { cause: err });
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
