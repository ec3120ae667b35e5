// stdout carries the MCP protocol, so every level writes to stderr.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const REDACT_KEYS = new Set([
  "access_token",
  "authorization",
  "Authorization",
  "client_secret",
  "clientSecret",
  "apiKey",
  "token",
]);

function safeStringify(meta: unknown): string {
  try {
    return JSON.stringify(meta, (k, v: unknown) =>
      REDACT_KEYS.has(k) ? "[REDACTED]" : v
    );
  } catch {
    return "[unserializable]";
  }
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export function formatLine(level: LogLevel, message: string, meta?: unknown): string {
  return `[${level}] ${message}${meta === undefined ? "" : ` ${safeStringify(meta)}`}`;
}

export function createLogger(
  minLevel: LogLevel = "info",
  write: (line: string) => void = (line) => console.error(line)
): Logger {
  const emit = (level: LogLevel, message: string, meta?: unknown) => {
    if (LEVELS[level] < LEVELS[minLevel]) return;
    write(formatLine(level, message, meta));
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}

export const silentLogger: Logger = createLogger("error", () => {});
