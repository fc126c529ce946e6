import { mkdirSync, existsSync, appendFileSync } from "fs";
import { join } from "path";

// stdout carries the pipeline's JSON result, so every log line goes to stderr.

type LogLevel = "info" | "warn" | "error" | "debug";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

let fileSinkDisabled = false;

function formatEntry(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.data !== undefined) {
    return `${base} ${JSON.stringify(serializeData(entry.data))}`;
  }
  return base;
}

function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  return data;
}

// LOG_DIR opts into a daily log file next to the console output
function writeToFile(formatted: string): void {
  const logDir = process.env.LOG_DIR;
  if (!logDir || fileSinkDisabled) return;

  try {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    const date = new Date().toISOString().slice(0, 10);
    appendFileSync(join(logDir, `need-analysis-${date}.log`), formatted + "\n");
  } catch (err) {
    fileSinkDisabled = true;
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`Log file output disabled: ${reason}`);
  }
}

function log(level: LogLevel, message: string, data?: unknown): void {
  if (level === "debug" && !process.env.DEBUG) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data,
  };

  const formatted = formatEntry(entry);
  console.error(formatted);
  writeToFile(formatted);
}

export const logger = {
  info: (msg: string, data?: unknown) => log("info", msg, data),
  warn: (msg: string, data?: unknown) => log("warn", msg, data),
  error: (msg: string, data?: unknown) => log("error", msg, data),
  debug: (msg: string, data?: unknown) => log("debug", msg, data),
};
