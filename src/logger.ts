export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

let threshold: LogLevel = "INFO";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Case-insensitive; `WARN` is taken as `WARNING`.
 * Returns undefined for anything that is not a known level.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const upper = value.trim().toUpperCase();
  if (upper === "WARN") return "WARNING";
  return LOG_LEVELS.find((level) => level === upper);
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  critical(message: string, ...args: unknown[]): void;
}

export function createLogger(name: string): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (SEVERITY[level] < SEVERITY[threshold]) return;
    const line = `${new Date().toISOString()} ${level} [${name}] ${message}`;
    if (level === "ERROR" || level === "CRITICAL") {
      console.error(line, ...args);
    } else if (level === "WARNING") {
      console.warn(line, ...args);
    } else {
      console.log(line, ...args);
    }
  };

  return {
    debug: (message, ...args) => write("DEBUG", message, args),
    info: (message, ...args) => write("INFO", message, args),
    warn: (message, ...args) => write("WARNING", message, args),
    error: (message, ...args) => write("ERROR", message, args),
    critical: (message, ...args) => write("CRITICAL", message, args),
  };
}
