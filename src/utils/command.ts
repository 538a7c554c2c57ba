/**
 * Command execution
 *
 * Spawns a process, waits for it to exit and collects its stdout and stderr in full.
 * Both pipes are drained while the process runs so large output cannot stall it.
 */

import { spawn } from 'child_process';
import { log } from './logger.ts';
import type { CommandExecOptions, CommandExecutor, CommandResponse } from './CommandExecutor.ts';

/**
 * Decodes captured bytes as UTF-8. Invalid sequences become U+FFFD.
 */
export function decodeOutput(chunks: Buffer[]): string {
  return Buffer.concat(chunks).toString('utf8');
}

async function defaultExecutor(
  command: string[],
  logPrefix?: string,
  opts?: CommandExecOptions,
): Promise<CommandResponse> {
  const [executable, ...args] = command;
  if (!executable) {
    throw new Error('Cannot execute an empty command');
  }

  log('debug', `${logPrefix ?? 'Command'}: ${command.join(' ')}`);

  return new Promise((resolve, reject) => {
    const childProcess = spawn(executable, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, ...(opts?.env ?? {}) },
      cwd: opts?.cwd,
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    childProcess.stdout?.on('data', (data: Buffer) => stdoutChunks.push(data));
    childProcess.stderr?.on('data', (data: Buffer) => stderrChunks.push(data));

    childProcess.on('error', (error) => {
      reject(error);
    });

    // 'close' fires after the stdio streams have ended, unlike 'exit'.
    childProcess.on('close', (code, signal) => {
      const stderr = decodeOutput(stderrChunks);
      resolve({
        success: code === 0,
        output: decodeOutput(stdoutChunks),
        error: stderr.length > 0 ? stderr : undefined,
        process: childProcess,
        exitCode: code,
        signal,
      });
    });
  });
}

export function getDefaultCommandExecutor(): CommandExecutor {
  if (process.env.VITEST === 'true' || process.env.NODE_ENV === 'test') {
    throw new Error(
      `🚨 REAL SYSTEM EXECUTOR DETECTED IN TEST! 🚨\n` +
        `This test is trying to spawn a real process.\n` +
        `Fix: Inject a mock CommandExecutor in your test setup.`,
    );
  }

  return defaultExecutor;
}
