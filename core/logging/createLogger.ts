import fs from "fs";
import path from "path";

/* ----------------------------------
 * Log levels
 * ---------------------------------- */

export const LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = typeof LEVELS[number];

export const LOGGER_MODES = ["none", "console", "file"] as const;
export type LoggerMode = typeof LOGGER_MODES[number];

function levelRank(level: LogLevel) {
  return LEVELS.indexOf(level);
}

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

export function isLoggerMode(value: string): value is LoggerMode {
  return (LOGGER_MODES as readonly string[]).includes(value);
}

/* ----------------------------------
 * Log entry + logger types
 * ---------------------------------- */

export interface LogEntry {
  level: LogLevel;
  msg: string;
  time?: number;
  [key: string]: unknown;
}

export type LinkgateLogger = (entry: LogEntry) => void;

/* ----------------------------------
 * Logger factory
 * ---------------------------------- */

export function createLogger(
  mode: LoggerMode,
  options?: {
    filePath?: string;
    level?: LogLevel;
  }
): LinkgateLogger | undefined {
  if (mode === "none") return undefined;

  const minLevel = options?.level ?? "info";

  const shouldLog = (entry: LogEntry) =>
    levelRank(entry.level) <= levelRank(minLevel);

  const serialize = (entry: LogEntry) =>
    JSON.stringify({ time: entry.time ?? Date.now(), ...entry }, errorReplacer);

  /* ---------- console logger ---------- */

  if (mode === "console") {
    return (entry) => {
      if (!shouldLog(entry)) return;
      const line = serialize(entry);
      if (entry.level === "error") console.error(line);
      else console.log(line);
    };
  }

  /* ---------- file logger ---------- */

  if (!options?.filePath) {
    console.warn("File logger disabled: filePath not set");
    return undefined;
  }

  const target = path.resolve(options.filePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const stream = fs.createWriteStream(target, { flags: "a" });

  stream.on("error", (err) => {
    console.error("log file stream failed:", err);
  });

  return (entry) => {
    if (!shouldLog(entry)) return;
    stream.write(serialize(entry) + "\n");
  };
}

/**
 * Returns a logger that merges `fields` into every entry. Entry fields win
 * over bound ones.
 */
export function bindLogger(
  logger: LinkgateLogger | undefined,
  fields: Record<string, unknown>
): LinkgateLogger | undefined {
  if (!logger) return undefined;
  return (entry) => logger({ ...fields, ...entry });
}

// Error instances serialize to {} by default
function errorReplacer(_key: string, value: unknown) {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
