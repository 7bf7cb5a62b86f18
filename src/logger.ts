import chalk from "chalk";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

const levelRank: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(levelRank, value);
}

/** Normalise une valeur (env, CLI, config) en niveau de log, ou null si invalide. */
export function parseLogLevel(value: unknown): LogLevel | null {
  if (typeof value !== "string") return null;
  const v = value.trim().toLowerCase();
  return isLogLevel(v) ? v : null;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levelRank[level] <= levelRank[currentLevel];
}

function stringify(value: unknown): string {
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object") {
    try { return JSON.stringify(value); } catch { return String(value); }
  }
  return String(value);
}

/** Formate une ligne de log: `[ts] [LEVEL] [scope] message args…` */
export function formatLine(level: LogLevel, scope: string | null, message: unknown, args: unknown[]): string {
  const ts = new Date().toISOString();
  const base = scope ? `[${ts}] [${level.toUpperCase()}] [${scope}]` : `[${ts}] [${level.toUpperCase()}]`;
  const text = [message, ...args].map(stringify).join(" ");
  switch (level) {
    case "error":
      return chalk.red.bold(`${base} ${text}`);
    case "warn":
      return chalk.yellow(`${base} ${text}`);
    case "info":
      return chalk.cyan(`${base} ${text}`);
    case "debug":
      return chalk.gray(`${base} ${text}`);
    case "trace":
      return chalk.magenta(`${base} ${text}`);
  }
}

export interface Logger {
  error(message: unknown, ...args: unknown[]): void;
  warn(message: unknown, ...args: unknown[]): void;
  info(message: unknown, ...args: unknown[]): void;
  debug(message: unknown, ...args: unknown[]): void;
  trace(message: unknown, ...args: unknown[]): void;
}

/**
 * Crée un logger préfixé par un scope (ex: "router", "poller").
 * Le niveau est global: `setLogLevel()` s'applique à tous les scopes.
 */
export function createLogger(scope?: string): Logger {
  const s = scope ?? null;
  return {
    error: (message, ...args) => {
      if (shouldLog("error")) console.error(formatLine("error", s, message, args));
    },
    warn: (message, ...args) => {
      if (shouldLog("warn")) console.warn(formatLine("warn", s, message, args));
    },
    info: (message, ...args) => {
      if (shouldLog("info")) console.log(formatLine("info", s, message, args));
    },
    debug: (message, ...args) => {
      if (shouldLog("debug")) console.log(formatLine("debug", s, message, args));
    },
    trace: (message, ...args) => {
      if (shouldLog("trace")) console.log(formatLine("trace", s, message, args));
    },
  };
}

export const logger: Logger = createLogger();
