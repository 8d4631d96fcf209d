export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (line: string) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  sink?: LogSink;
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Creates a logger whose lines look like `[Scope] WARN - message`.
 * Everything goes to stderr unless another sink is given.
 */
export function createLogger(
  scope: string,
  options: LoggerOptions = {},
): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? stderrSink;
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (messageLevel: LogLevel, message: string) => {
    if (LOG_LEVELS.indexOf(messageLevel) < threshold) return;
    sink(`[${scope}] ${messageLevel.toUpperCase()} - ${message}\n`);
  };

  return {
    level,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    child: (childScope) => createLogger(childScope, { level, sink }),
  };
}
