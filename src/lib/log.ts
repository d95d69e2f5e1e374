export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };
const maxLogLines = 100;

let threshold: LogLevel = "info";
const recent: string[] = [];

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** Latest lines written at or above the current level, oldest first. */
export function getRecentLog(): string[] {
  return [...recent];
}

export function clearRecentLog(): void {
  recent.length = 0;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function write(level: Exclude<LogLevel, "silent">, scope: string, message: string): void {
  if (RANK[level] < RANK[threshold]) return;
  const line = `[${scope}] ${message}`;
  recent.push(`${new Date().toISOString()} ${level.toUpperCase()} ${line}`);
  if (recent.length > maxLogLines) recent.shift();
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message) => write("debug", scope, message),
    info: (message) => write("info", scope, message),
    warn: (message) => write("warn", scope, message),
    error: (message) => write("error", scope, message),
  };
}
