// All output goes to stderr: stdout carries the MCP stdio transport.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let override: LogLevel | undefined;

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

export function setLogLevel(level: LogLevel | undefined): void {
  override = level;
}

// Read per call: entry points load .env after this module is imported.
function threshold(): LogLevel {
  return override ?? parseLevel(process.env.LOG_LEVEL);
}

function emit(level: LogLevel, message: string, meta?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold()]) return;
  console.error(JSON.stringify({ level, message, meta, ts: Date.now() }));
}

export const log = {
  debug(message: string, meta?: unknown): void {
    emit("debug", message, meta);
  },
  info(message: string, meta?: unknown): void {
    emit("info", message, meta);
  },
  warn(message: string, meta?: unknown): void {
    emit("warn", message, meta);
  },
  error(message: string, meta?: unknown): void {
    emit("error", message, meta);
  },
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
