import type { GdbTriager } from './gdb-triager.ts';
import { getDefaultGdbTriager } from './index.ts';

export type TriageToolContext = {
  triager: GdbTriager;
};

export function getDefaultTriageToolContext(): TriageToolContext {
  return {
    triager: getDefaultGdbTriager(),
  };
}
