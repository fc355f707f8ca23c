export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

let threshold: LogLevel = "info";
let sink: (line: string) => void = (line) => {
  process.stderr.write(line);
};

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Redirects log lines; tests use it to capture output. Returns the previous sink. */
export function setLogSink(next: (line: string) => void): (line: string) => void {
  const previous = sink;
  sink = next;
  return previous;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) {
      return;
    }
    sink(`[${level.toUpperCase()}] ${new Date().toISOString()} | ${scope} | ${message}\n`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, error) => {
      if (error === undefined) {
        write("error", message);
        return;
      }
      const detail = error instanceof Error ? error.stack ?? error.message : String(error);
      write("error", `${message}: ${detail}`);
    }
  };
}
