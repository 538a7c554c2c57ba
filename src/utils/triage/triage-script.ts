/**
 * Triage script provisioning
 *
 * GDB sources the triage script by path, so the bundled copy is written to a temporary
 * file that stays on disk for as long as its owner needs it.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { v4 as uuidv4 } from 'uuid';
import { log } from '../logger.ts';
import { ScriptProvisionError, UnsupportedScriptLocationError } from '../errors.ts';

const LOG_PREFIX = '[TriageScript]';
const SCRIPT_SUFFIX = '.py';
const BUNDLED_SCRIPT_URL = new URL('./scripts/triage.py', import.meta.url);

export interface TemporaryScriptFile {
  readonly path: string;
  dispose(): void;
}

export type TriageScriptSource =
  | { kind: 'internal'; file: TemporaryScriptFile }
  | { kind: 'external'; path: string };

let bundledScript: string | null = null;

export function loadBundledTriageScript(): string {
  bundledScript ??= fs.readFileSync(fileURLToPath(BUNDLED_SCRIPT_URL), 'utf8');
  return bundledScript;
}

// Files not disposed explicitly are removed when the process exits.
const liveScriptPaths = new Set<string>();
let exitHookInstalled = false;

function removeScriptFile(filePath: string): void {
  liveScriptPaths.delete(filePath);
  try {
    fs.rmSync(filePath, { force: true });
  } catch (error) {
    log('warn', `${LOG_PREFIX} failed to remove ${filePath}: ${String(error)}`);
  }
}

function trackUntilExit(filePath: string): void {
  liveScriptPaths.add(filePath);
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.once('exit', () => {
    for (const livePath of Array.from(liveScriptPaths)) {
      removeScriptFile(livePath);
    }
  });
}

class DefaultTemporaryScriptFile implements TemporaryScriptFile {
  readonly path: string;
  private disposed = false;

  constructor(filePath: string) {
    this.path = filePath;
    trackUntilExit(filePath);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    removeScriptFile(this.path);
  }
}

/**
 * Writes the triage script to a fresh temporary file.
 * Throws ScriptProvisionError when the script cannot be read or written.
 */
export function provisionInternalTriageScript(
  opts: { contents?: string; directory?: string } = {},
): TemporaryScriptFile {
  const directory = opts.directory ?? os.tmpdir();
  const filePath = path.join(directory, `gdb-triage-${uuidv4()}${SCRIPT_SUFFIX}`);

  try {
    const contents = opts.contents ?? loadBundledTriageScript();
    fs.writeFileSync(filePath, contents, { encoding: 'utf8', flag: 'wx', mode: 0o600 });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ScriptProvisionError(`Failed to write triage script to ${filePath}: ${reason}`, error);
  }

  log('debug', `${LOG_PREFIX} wrote triage script to ${filePath}`);
  return new DefaultTemporaryScriptFile(filePath);
}

/**
 * Returns the path GDB should source.
 * Only the bundled script is wired up; an external path is rejected.
 */
export function resolveTriageScriptPath(source: TriageScriptSource): string {
  switch (source.kind) {
    case 'internal':
      return source.file.path;
    case 'external':
      // TODO: pass external script paths through once they can be validated before a run.
      throw new UnsupportedScriptLocationError(source.path);
  }
}

export function disposeTriageScript(source: TriageScriptSource): void {
  if (source.kind === 'internal') {
    source.file.dispose();
  }
}
