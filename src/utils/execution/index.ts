/**
 * Focused execution facade.
 * Prefer importing from 'utils/execution/index.ts' over the individual modules.
 */
export { getDefaultCommandExecutor, decodeOutput } from '../command.ts';

// Types
export type { CommandExecutor, CommandResponse, CommandExecOptions } from '../CommandExecutor.ts';
