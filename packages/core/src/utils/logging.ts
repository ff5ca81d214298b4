import { getOptions } from "../options.js";
import type { LogLevel, WdomLogEntry } from "../types.js";

export type Logger = {
  debug: (message: string, detail?: Record<string, unknown>) => void;
  info: (message: string, detail?: Record<string, unknown>) => void;
  warn: (message: string, detail?: Record<string, unknown>) => void;
  error: (message: string, detail?: Record<string, unknown>) => void;
};

const LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
};

const ENTRY_LEVELS: Record<WdomLogEntry["type"], number> = {
  debug: LEVEL_VALUES.DEBUG,
  info: LEVEL_VALUES.INFO,
  warn: LEVEL_VALUES.WARN,
  error: LEVEL_VALUES.ERROR
};

const logCallbacks: Array<(entry: WdomLogEntry) => void> = [];

export function onLog(callback: (entry: WdomLogEntry) => void): () => void {
  logCallbacks.push(callback);
  return () => {
    const index = logCallbacks.indexOf(callback);
    if (index >= 0) {
      logCallbacks.splice(index, 1);
    }
  };
}

export function levelValue(level: string | number): number {
  if (typeof level === "number") {
    return level;
  }
  const normalized = level.toUpperCase();
  if (normalized === "WARNING") {
    return LEVEL_VALUES.WARN;
  }
  if (isLogLevel(normalized)) {
    return LEVEL_VALUES[normalized];
  }
  return LEVEL_VALUES.INFO;
}

export function createLogger(scope: string): Logger {
  const write = (type: WdomLogEntry["type"], message: string, detail?: Record<string, unknown>): void => {
    const entry: WdomLogEntry = { type, scope, message, detail, timestamp: Date.now() };
    emitLog(entry);
    if (ENTRY_LEVELS[type] < levelValue(getOptions().logLevel)) {
      return;
    }
    const prefix = `[wdom:${scope}]`;
    const args = detail ? [prefix, message, detail] : [prefix, message];
    if (type === "error") {
      console.error(...args);
    } else if (type === "warn") {
      console.warn(...args);
    } else if (type === "debug") {
      console.debug(...args);
    } else {
      console.info(...args);
    }
  };
  return {
    debug: (message, detail) => write("debug", message, detail),
    info: (message, detail) => write("info", message, detail),
    warn: (message, detail) => write("warn", message, detail),
    error: (message, detail) => write("error", message, detail)
  };
}

function emitLog(entry: WdomLogEntry): void {
  for (const callback of [...logCallbacks]) {
    try {
      callback(entry);
    } catch (error) {
      console.error("[wdom] log callback error", error);
    }
  }
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_VALUES;
}
