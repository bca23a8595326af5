/* Leveled console logger; each component logs under its own scope */
export type LogLevel = "info" | "warn" | "error" | "debug";

const levelOrder: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase() ?? "";
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

/** Applied once at bootstrap from the loaded configuration. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] <= levelOrder[currentLevel];
}

export function formatLine(level: LogLevel, scope: string | null, message: string, now = new Date()): string {
  const prefix = scope ? `[${scope}] ` : "";
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${prefix}${message}`;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  debug(message: string): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string | null = null): Logger {
  return {
    info: (message) => {
      if (shouldLog("info")) {
        console.log(formatLine("info", scope, message));
      }
    },
    warn: (message) => {
      if (shouldLog("warn")) {
        console.warn(formatLine("warn", scope, message));
      }
    },
    error: (message, error) => {
      if (shouldLog("error")) {
        console.error(formatLine("error", scope, message), error ?? "");
      }
    },
    debug: (message) => {
      if (shouldLog("debug")) {
        console.debug(formatLine("debug", scope, message));
      }
    },
    child: (child) => createLogger(scope ? `${scope}:${child}` : child),
  };
}

export const logger = createLogger();
