/**
 * logger.ts
 *
 * One timestamped line per message, filtered by level.
 */

import { config, type LogLevel } from "./config";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (line: string) => void;

function defaultSink(at: LogLevel): LogSink {
  return at === "warn" || at === "error" ? console.error : console.log;
}

export function createLogger(level: LogLevel = "info", sink?: LogSink): Logger {
  const write = (at: LogLevel) => (message: string) => {
    if (RANK[at] < RANK[level]) return;
    (sink ?? defaultSink(at))(`[${new Date().toISOString()}] ${at.toUpperCase().padEnd(5)} ${message}`);
  };
  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

export const logger = createLogger(config.logLevel);
