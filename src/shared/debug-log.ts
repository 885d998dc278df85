/**
 * Color-coded scoped logger.
 *
 * Every line carries a bright-magenta scope tag so output from one stage of a
 * conversion is easy to pick out in the terminal:
 *
 *   [pipeline] INFO  Conversion finished ...
 *
 * Threshold comes from NOTE_MAKER_LOG_LEVEL (debug | info | warn | error | silent).
 * Secrets are masked before anything is written.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const GREY = "\x1b[90m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, "silent">, string> = {
  debug: `${GREY}DEBUG${RESET}`,
  info: `${CYAN}INFO${RESET}`,
  warn: `${YELLOW}WARN${RESET}`,
  error: `${RED}ERROR${RESET}`,
};

const API_KEY_PATTERN = /\bsk-[A-Za-z0-9_-]{6,}/g;
const MASK = "[redacted]";

const knownSecrets = new Set<string>();

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (!raw) return fallback;
  const lowered = raw.trim().toLowerCase();
  return isLogLevel(lowered) ? lowered : fallback;
}

/** Registers a value that must never appear in log output, e.g. the model credential. */
export function registerSecret(value: string | undefined): void {
  if (value && value.length >= 4) {
    knownSecrets.add(value);
  }
}

export function redactSecrets(text: string): string {
  let out = text.replace(API_KEY_PATTERN, MASK);
  for (const secret of knownSecrets) {
    out = out.split(secret).join(MASK);
  }
  return out;
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  const threshold = (): number =>
    LEVEL_ORDER[level ?? parseLogLevel(process.env["NOTE_MAKER_LOG_LEVEL"])];
  const prefix = `${MAGENTA}[${scope}]${RESET}`;

  const write = (at: Exclude<LogLevel, "silent">, args: unknown[]): void => {
    if (LEVEL_ORDER[at] < threshold()) return;
    const line = redactSecrets(args.map(formatArg).join(" "));
    const sink = at === "error" || at === "warn" ? console.error : console.log;
    sink(prefix, LEVEL_LABEL[at], line);
  };

  return {
    debug: (...args) => write("debug", args),
    info: (...args) => write("info", args),
    warn: (...args) => write("warn", args),
    error: (...args) => write("error", args),
  };
}
