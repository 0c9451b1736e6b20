export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

function serializeMeta(meta: LogMeta): string {
  return JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

export function formatLogLine(level: LogLevel, message: string, meta?: LogMeta): string {
  const prefix = `[${level.toUpperCase()}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) return prefix;
  return `${prefix} ${serializeMeta(meta)}`;
}

/**
 * Everything goes to stderr: stdout belongs to MCP clients.
 */
export function createLogger(
  threshold: LogLevel = "info",
  write: (line: string) => void = (line) => console.error(line)
): Logger {
  const emit = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[threshold]) return;
    write(formatLogLine(level, message, meta));
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    fatal: emit("fatal"),
  };
}

export const silentLogger: Logger = createLogger("fatal", () => undefined);
