/**
 * Mock Executors for Testing - Dependency Injection Architecture
 *
 * Mock implementations of CommandExecutor for tests. They never spawn a process and
 * have no dependency on production logging.
 */

import type { ChildProcess } from 'child_process';
import type { CommandExecutor, CommandResponse } from '../utils/execution/index.ts';

export type MockCommandResult = {
  success?: boolean;
  output?: string;
  error?: string;
  exitCode?: number | null;
  shouldThrow?: Error;
};

export type RecordedCall = {
  command: string[];
  logPrefix?: string;
};

function createMockProcess(exitCode: number | null): ChildProcess {
  return {
    pid: 12345,
    stdout: null,
    stderr: null,
    stdin: null,
    stdio: [null, null, null],
    killed: false,
    connected: false,
    exitCode,
    signalCode: null,
    spawnargs: [],
    spawnfile: 'gdb',
  } as unknown as ChildProcess;
}

function toResponse(result: MockCommandResult): CommandResponse {
  const exitCode = result.exitCode === undefined ? (result.success === false ? 1 : 0) : result.exitCode;
  return {
    success: result.success ?? exitCode === 0,
    output: result.output ?? '',
    error: result.error,
    process: createMockProcess(exitCode),
    exitCode,
    signal: null,
  };
}

/**
 * Create a mock executor for testing
 * @param result Mock command result, or an Error/string the executor rejects with
 * @param calls Optional array every invocation is recorded into
 */
export function createMockExecutor(
  result: MockCommandResult | Error | string,
  calls?: RecordedCall[],
): CommandExecutor {
  return async (command, logPrefix) => {
    calls?.push({ command, logPrefix });

    if (result instanceof Error || typeof result === 'string') {
      throw result;
    }
    if (result.shouldThrow) {
      throw result.shouldThrow;
    }
    return toResponse(result);
  };
}

/**
 * Create a no-op executor that throws an error if called
 * Use this for tests where an executor is required but should never be called
 */
export function createNoopExecutor(): CommandExecutor {
  return async (command) => {
    throw new Error(
      `🚨 NOOP EXECUTOR CALLED! 🚨\n` +
        `Command: ${command.join(' ')}\n` +
        `This executor should never be called in this test context.\n` +
        `Either fix the test to avoid this code path, or use createMockExecutor() instead.`,
    );
  };
}

/**
 * Builds GDB-shaped output: each region wrapped in its start/end lines, in order.
 */
export function wrapInMarkers(
  regions: Array<{ marker: { start: string; end: string }; payload: string }>,
  noise = '',
): string {
  return regions
    .map(({ marker, payload }) => `${noise}${marker.start}\n${payload}${marker.end}\n`)
    .join('');
}
