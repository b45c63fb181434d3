/**
 * Logger utility for the Cardwise backend
 *
 * Structured console logging with a module prefix per logger. The minimum
 * level comes from LOG_LEVEL (or DEBUG for debug output) and can be changed
 * at runtime once the engine config is loaded.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, "silent">;
  module: string;
  message: string;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.DEBUG ? "debug" : "info";
}

let minimumLevel: LogLevel = initialLevel();

/**
 * Sets the minimum level for every logger in the process.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

/**
 * Formats a log entry for console output.
 */
function formatLog(entry: LogEntry): string {
  const time = entry.timestamp.split("T")[1]?.slice(0, 12) ?? entry.timestamp;
  const prefix = `[${time}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}]`;
  return `${prefix} ${entry.message}`;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string) {
  const log = (level: LogEntry["level"], message: string, data?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
      return;
    }

    const formatted = formatLog({
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data,
    });
    const extra = data !== undefined ? data : "";

    switch (level) {
      case "debug":
      case "info":
        console.log(formatted, extra);
        break;
      case "warn":
        console.warn(formatted, extra);
        break;
      case "error":
        console.error(formatted, extra);
        break;
    }
  };

  return {
    debug: (message: string, data?: unknown) => log("debug", message, data),
    info: (message: string, data?: unknown) => log("info", message, data),
    warn: (message: string, data?: unknown) => log("warn", message, data),
    error: (message: string, data?: unknown) => log("error", message, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;

// Pre-created loggers for each module
export const serverLog = createLogger("Server");
export const schedulerLog = createLogger("Scheduler");
export const storeLog = createLogger("CardStore");
