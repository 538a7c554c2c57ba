/**
 * Triage Plugin: Triage Testcase
 *
 * Runs a program under GDB and returns a structured crash report for the point where it
 * stopped.
 */

import * as z from 'zod';
import type { ToolResponse } from '../../../types/common.ts';
import { safeStringifyPretty } from '../../../utils/json.ts';
import { log } from '../../../utils/logging/index.ts';
import { createErrorResponse } from '../../../utils/responses/index.ts';
import {
  MarkerNotFoundError,
  MarkersOutOfOrderError,
  PayloadParseError,
  ScriptProvisionError,
  SpawnFailureError,
  TriageScriptError,
  UnsupportedScriptLocationError,
} from '../../../utils/errors.ts';
import { createTypedToolWithContext } from '../../../utils/typed-tool-factory.ts';
import {
  formatTriageReport,
  getDefaultTriageToolContext,
  type TriageToolContext,
} from '../../../utils/triage/index.ts';

const LOG_PREFIX = '[Triage]';

const triageTestcaseSchema = z.object({
  programArgs: z
    .array(z.string())
    .min(1, { message: 'programArgs must include the program path' })
    .describe('Program path followed by its arguments, e.g. ["./fuzz_target", "crash-input"]'),
  showRawOutput: z
    .boolean()
    .optional()
    .describe(
      'Log the raw GDB stdout/stderr to the server log at info level; dropped when GDBTRIAGE_LOG_LEVEL is warn or error or GDBTRIAGE_SILENCE_LOGS is set',
    ),
});

export type TriageTestcaseParams = z.infer<typeof triageTestcaseSchema>;

function mapTriageError(error: unknown): ToolResponse {
  if (error instanceof SpawnFailureError) {
    return createErrorResponse(`Could not launch ${error.executable}`, error.message);
  }
  if (error instanceof UnsupportedScriptLocationError || error instanceof ScriptProvisionError) {
    return createErrorResponse('Triage script unavailable', error.message);
  }
  if (error instanceof MarkerNotFoundError) {
    const stage = error.channel.startsWith('child')
      ? 'GDB did not finish running the program'
      : 'GDB did not finish running the triage script';
    return createErrorResponse(stage, error.message);
  }
  if (error instanceof MarkersOutOfOrderError) {
    return createErrorResponse('Marker text appeared out of order in GDB output', error.message);
  }
  if (error instanceof TriageScriptError) {
    return createErrorResponse('Triage script reported an error', error.scriptOutput);
  }
  if (error instanceof PayloadParseError) {
    return createErrorResponse(
      `Triage script produced invalid output: ${error.parserMessage}`,
      error.payload,
    );
  }
  return createErrorResponse(
    `An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`,
  );
}

export async function triage_testcaseLogic(
  params: TriageTestcaseParams,
  ctx: TriageToolContext,
): Promise<ToolResponse> {
  const { programArgs, showRawOutput = false } = params;
  log('info', `${LOG_PREFIX}: Triaging ${programArgs.join(' ')}`);

  try {
    const result = await ctx.triager.triageTestcase(programArgs, showRawOutput);
    log(
      'info',
      `${LOG_PREFIX}: Captured ${result.thread_info.threads.length} thread(s) for ${programArgs[0]}`,
    );
    return {
      content: [
        { type: 'text', text: formatTriageReport(result) },
        { type: 'text', text: safeStringifyPretty(result) },
      ],
    };
  } catch (error) {
    log(
      'error',
      `${LOG_PREFIX}: Failed - ${error instanceof Error ? error.message : String(error)}`,
    );
    return mapTriageError(error);
  }
}

export default {
  name: 'triage_testcase',
  description:
    'Run a program under GDB and return its crash report: threads, frames, symbols, arguments and locals.',
  schema: triageTestcaseSchema.shape,
  annotations: {
    title: 'Triage Testcase',
    destructiveHint: false,
    openWorldHint: true,
  },
  handler: createTypedToolWithContext<TriageTestcaseParams, TriageToolContext>(
    triageTestcaseSchema,
    triage_testcaseLogic,
    getDefaultTriageToolContext,
  ),
};
