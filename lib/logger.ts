/* eslint-disable no-console */
// Leveled console logging for the analytics jobs.
//
// Everything here runs in Node.js where stdout/stderr are captured by the
// platform, so output goes straight to the console. LOG_LEVEL sets the
// lowest level that is printed; errors are always printed.

import { config, type LogLevel } from "@/lib/config";

const PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const enabled = (level: LogLevel) => PRIORITY[level] >= PRIORITY[config.logLevel];

export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled("debug")) {
      console.debug(...args);
    }
  },
  log: (...args: unknown[]) => {
    if (enabled("info")) {
      console.log(...args);
    }
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) {
      console.info(...args);
    }
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) {
      console.warn(...args);
    }
  },
  error: (...args: unknown[]) => {
    // Always log errors
    console.error(...args);
  },
};

export type Logger = typeof logger;
