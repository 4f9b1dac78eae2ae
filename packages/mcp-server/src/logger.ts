// Structured logger for server and CLI diagnostics
// Writes to stderr: stdout carries the MCP transport and report output

import type { LogLevelSetting } from "./config.js";

export type LogLevel = Exclude<LogLevelSetting, "silent">;

const RANK: Record<LogLevelSetting, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogSink = (line: string) => void;

export function formatLogLine(scope: string, level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const prefix = `[${scope}:${level.toUpperCase()}]`;
  return data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
}

export function createLogger(
  scope: string,
  minLevel: LogLevelSetting = "info",
  sink: LogSink = (line) => console.error(line),
): Logger {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (RANK[level] < RANK[minLevel]) return;
    sink(formatLogLine(scope, level, message, data));
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
  };
}
