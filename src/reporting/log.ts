import type { LogLevel } from '../config/schema.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/** Writes `[OutputSentinel] message` to stderr when `level` is enabled. */
export function log(level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  process.stderr.write(`[OutputSentinel] ${message}\n`);
}
