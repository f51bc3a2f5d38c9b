export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function resolveThreshold(): number {
  const raw = String(process.env.LOG_LEVEL || "").trim().toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error" || raw === "silent") {
    return LEVEL_ORDER[raw];
  }
  // Keep test output clean unless LOG_LEVEL asks otherwise.
  return process.env.NODE_ENV === "test" ? LEVEL_ORDER.silent : LEVEL_ORDER.info;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) { return error.message || error.name; }
  return String(error ?? "unknown error");
}

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

/**
 * Single-line JSON logger scoped to one module. Records are easy to grep and
 * never carry request texts.
 */
export function createLogger(scope: string): Logger {
  function write(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < resolveThreshold()) { return; }
    try {
      const line = JSON.stringify({ tag: "embeddings", level, scope, event, ...data });
      if (level === "error") {
        console.error(line);
      } else if (level === "warn") {
        console.warn(line);
      } else {
        console.log(line);
      }
    } catch {
      // unserializable payload; drop the record
    }
  }

  return {
    debug: (event, data) => write("debug", event, data),
    info: (event, data) => write("info", event, data),
    warn: (event, data) => write("warn", event, data),
    error: (event, data) => write("error", event, data),
  };
}
