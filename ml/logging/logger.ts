import fs from "node:fs";
import path from "node:path";

export type LogLevel = "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  at: string;
  level: LogLevel;
  logger: string;
  message: string;
  data?: Record<string, unknown>;
};

export type Logger = {
  name: string;
  entries: LogEntry[];
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  fatal: (message: string, data?: Record<string, unknown>) => void;
};

export type LoggerOptions = {
  // JSONL mirror goes to <logDir>/promotion.jsonl; omitted means console only.
  logDir?: string;
  silent?: boolean;
};

export const LOG_FILE_NAME = "promotion.jsonl";

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const entries: LogEntry[] = [];
  const logPath = options.logDir ? path.join(options.logDir, LOG_FILE_NAME) : null;
  if (options.logDir) {
    fs.mkdirSync(options.logDir, { recursive: true });
  }

  const push = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    const entry: LogEntry = {
      at: new Date().toISOString(),
      level,
      logger: name,
      message,
      ...(data ? { data } : {}),
    };
    entries.push(entry);

    if (logPath) {
      fs.appendFileSync(logPath, `${JSON.stringify(entry)}\n`);
    }
    if (options.silent) return;

    const line = `[${name}:${level}] ${message}`;
    if (level === "error" || level === "fatal") {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  };

  return {
    name,
    entries,
    info: (message, data) => push("info", message, data),
    warn: (message, data) => push("warn", message, data),
    error: (message, data) => push("error", message, data),
    fatal: (message, data) => push("fatal", message, data),
  };
}

export function formatMetrics(metrics: Record<string, number | undefined> | null): string {
  if (!metrics) return "none";
  return Object.entries(metrics)
    .filter((entry): entry is [string, number] => typeof entry[1] === "number")
    .map(([key, value]) => `${key}=${value.toFixed(4)}`)
    .join(" ");
}
