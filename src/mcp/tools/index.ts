import type { ToolDefinition } from '../../utils/typed-tool-factory.ts';
import doctor from './doctor/doctor.ts';
import triageTestcase from './triage/triage_testcase.ts';

export const tools: ToolDefinition[] = [triageTestcase, doctor];
