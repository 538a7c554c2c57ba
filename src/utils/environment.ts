/**
 * Environment configuration
 *
 * All runtime settings come from GDBTRIAGE_* environment variables and are read on
 * every call, so tests can change process.env between cases.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const DEFAULT_INDEX_CACHE_DIRECTORY = 'gdb_cache';

function isTruthy(raw: string | undefined): boolean {
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return ['1', 'true', 'yes', 'on'].includes(normalized);
}

export function isLoggingSilenced(): boolean {
  return isTruthy(process.env.GDBTRIAGE_SILENCE_LOGS);
}

export function getLogLevel(): LogLevel {
  const raw = process.env.GDBTRIAGE_LOG_LEVEL;
  if (!raw) return 'info';

  const normalized = raw.trim().toLowerCase();
  if (normalized === 'debug') return 'debug';
  if (['warn', 'warning'].includes(normalized)) return 'warn';
  if (normalized === 'error') return 'error';
  return 'info';
}

/**
 * Directory GDB uses for its symbol index cache. Relative paths resolve against the
 * debugger's working directory.
 */
export function getIndexCacheDirectory(): string {
  const raw = process.env.GDBTRIAGE_INDEX_CACHE_DIR?.trim();
  return raw ? raw : DEFAULT_INDEX_CACHE_DIRECTORY;
}

/**
 * Caller-supplied triage script path, if any. When set, the external script variant is
 * selected instead of the bundled script.
 */
export function getExternalTriageScriptPath(): string | undefined {
  const raw = process.env.GDBTRIAGE_SCRIPT?.trim();
  return raw ? raw : undefined;
}
