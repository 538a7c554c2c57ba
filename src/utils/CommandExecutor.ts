import type { ChildProcess } from 'child_process';

export interface CommandExecOptions {
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Result of a finished command. `output` and `error` hold the decoded stdout and stderr.
 */
export interface CommandResponse {
  success: boolean;
  output: string;
  error?: string;
  process: ChildProcess;
  exitCode: number | null;
  signal?: NodeJS.Signals | null;
}

/**
 * Runs a command to completion and captures both output streams.
 * Rejects when the executable cannot be spawned.
 */
export type CommandExecutor = (
  command: string[],
  logPrefix?: string,
  opts?: CommandExecOptions,
) => Promise<CommandResponse>;
