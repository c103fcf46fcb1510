/**
 * Console logger with a bracketed module prefix, e.g.
 *   [FlowEngine] PREFLOW_PUSH converged: value=20.00 after 4 iterations
 */

export const LOG_LEVELS = ["silent", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = {
  silent: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export function createLogger(prefix: string, level: LogLevel): Logger {
  const enabled = (wanted: LogLevel): boolean => RANK[level] >= RANK[wanted];

  return {
    warn(message: string): void {
      if (enabled("warn")) console.warn(`[${prefix}] ${message}`);
    },
    info(message: string): void {
      if (enabled("info")) console.log(`[${prefix}] ${message}`);
    },
    debug(message: string): void {
      if (enabled("debug")) console.log(`[${prefix}] ${message}`);
    },
  };
}
