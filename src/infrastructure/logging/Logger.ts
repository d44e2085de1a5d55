import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogThreshold;
  /** JSON-lines file to append to; empty string disables file output. */
  file?: string;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function ensureLogDir(file: string): void {
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Structured logger writing one JSON object per entry to the console and,
 * when configured, to a JSON-lines file.
 *
 * Entries from log() carry `{ timestamp, level, message, ...meta }`; entries
 * from event() keep the flat `{ timestamp, type, ...payload }` shape used for
 * pipeline events.
 */
export function createLogger(options: LoggerOptions = {}): LoggerPort {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const file = options.file;

  function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    const line = JSON.stringify(entry) + "\n";

    if (level === "error") {
      console.error(line.trimEnd());
    } else {
      console.log(line.trimEnd());
    }

    if (!file) {
      return;
    }

    try {
      ensureLogDir(file);
      fs.appendFileSync(file, line, { encoding: "utf-8" });
    } catch (err) {
      console.error("Failed to write log file:", err);
    }
  }

  return {
    log(level, message, meta) {
      writeEntry(level, {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(meta || {}),
      });
    },

    event(type, payload) {
      writeEntry("info", {
        timestamp: new Date().toISOString(),
        type,
        ...payload,
      });
    },
  };
}
