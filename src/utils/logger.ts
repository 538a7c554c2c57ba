/**
 * Logger
 *
 * Writes leveled messages to stderr. stdout is reserved for the MCP stdio transport.
 *
 * Controlled by:
 * - GDBTRIAGE_LOG_LEVEL: minimum level to emit (debug, info, warn, error). Defaults to info.
 * - GDBTRIAGE_SILENCE_LOGS: when truthy, nothing is written.
 */

import { getLogLevel, isLoggingSilenced, type LogLevel } from './environment.ts';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type { LogLevel };

export function shouldLog(level: LogLevel): boolean {
  if (isLoggingSilenced()) return false;
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
}

export function log(level: LogLevel, message: string): void {
  if (!shouldLog(level)) return;
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [${level.toUpperCase()}] ${message}`);
}
