import { appendFileSync } from "fs";
import chalk from "chalk";
import { getCurrentLogFile, rotateLogs, ensureMcsshDir } from "./paths.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: LogData;
}

export type LogWriter = (level: LogLevel, message: string, data?: LogData) => void;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  child(context: LogData): Logger;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: chalk.dim("debug"),
  info: chalk.blue("info"),
  warn: chalk.yellow("warning"),
  error: chalk.red("error")
};

let currentLogLevel: LogLevel = "warn";
let fileLogging = false;

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export function setFileLogging(enabled: boolean): void {
  fileLogging = enabled;
}

function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}]`, `[${entry.level.toUpperCase()}]`, entry.message];

  if (entry.data) {
    parts.push(JSON.stringify(entry.data));
  }

  return parts.join(" ") + "\n";
}

function formatConsoleEntry(entry: LogEntry): string {
  const line = `${LEVEL_LABELS[entry.level]}: ${entry.message}`;
  if (entry.data && Object.keys(entry.data).length > 0) {
    return `${line} ${chalk.dim(JSON.stringify(entry.data))}\n`;
  }
  return line + "\n";
}

function writeLog(level: LogLevel, message: string, data?: LogData): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data
  };

  process.stderr.write(formatConsoleEntry(entry));

  if (fileLogging) {
    ensureMcsshDir();
    rotateLogs(10);
    appendFileSync(getCurrentLogFile(), formatLogEntry(entry), { encoding: "utf-8" });
  }
}

function mergeContext(context: LogData, data?: LogData): LogData | undefined {
  if (Object.keys(context).length === 0) return data;
  return { ...context, ...data };
}

export function createLogger(write: LogWriter = writeLog, context: LogData = {}): Logger {
  return {
    debug: (message, data) => write("debug", message, mergeContext(context, data)),
    info: (message, data) => write("info", message, mergeContext(context, data)),
    warn: (message, data) => write("warn", message, mergeContext(context, data)),
    error: (message, data) => write("error", message, mergeContext(context, data)),
    child: (childContext) => createLogger(write, { ...context, ...childContext })
  };
}

export const logger = createLogger();

export default logger;
