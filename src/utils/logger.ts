/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LogLevel } from "../types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  constructor(private readonly level: LogLevel = "info") {}

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled("error")) {
      return;
    }
    console.error(`[ERROR] ${message}`);
    if (error) {
      console.error(error);
    }
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
