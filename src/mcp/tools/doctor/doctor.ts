/**
 * Doctor Plugin: Doctor Tool
 *
 * Checks that GDB starts with Python support and reports the triage configuration.
 */

import * as z from 'zod';
import { log } from '../../../utils/logging/index.ts';
import { version } from '../../../version.ts';
import type { ToolResponse } from '../../../types/common.ts';
import { createTypedToolWithContext } from '../../../utils/typed-tool-factory.ts';
import {
  getDefaultTriageToolContext,
  type TriageToolContext,
} from '../../../utils/triage/index.ts';

const LOG_PREFIX = '[Doctor]';

const doctorSchema = z.object({
  enabled: z.boolean().optional().describe('Optional: dummy parameter to satisfy MCP protocol'),
});

type DoctorParams = z.infer<typeof doctorSchema>;

export async function doctorLogic(
  _params: DoctorParams,
  ctx: TriageToolContext,
): Promise<ToolResponse> {
  log('info', `${LOG_PREFIX}: Running doctor tool`);

  const report = await ctx.triager.checkGdb();

  const lines = [
    'GDB Triage Doctor',
    `Server Version: ${version}`,
    '',
    '## GDB',
    `- Executable: ${ctx.triager.gdb}`,
    `- Supported: ${report.supported ? '✅ Yes' : '❌ No'}`,
    `- Version: ${report.version ?? '(unknown)'}`,
    `- Python: ${report.pythonVersion ?? '(unknown)'}`,
    '',
    '## Configuration',
    `- Index cache directory: ${ctx.triager.indexCacheDirectory}`,
    `- Triage script: ${ctx.triager.scriptSource === 'internal' ? 'bundled' : 'external (not supported)'}`,
  ];

  if (!report.supported) {
    lines.push(
      '',
      '## Troubleshooting Tips',
      '- Install GDB built with Python support and make sure `gdb` is on PATH',
      '- Run `gdb --nx --batch -ex "python print(1)"` to confirm Python works',
    );
  }

  return {
    content: [{ type: 'text', text: lines.join('\n') }],
    ...(report.supported ? {} : { isError: true }),
  };
}

export default {
  name: 'doctor',
  description: 'Checks that GDB with Python support is available and reports triage configuration.',
  schema: doctorSchema.shape,
  annotations: {
    title: 'Doctor',
    readOnlyHint: true,
  },
  handler: createTypedToolWithContext<DoctorParams, TriageToolContext>(
    doctorSchema,
    doctorLogic,
    getDefaultTriageToolContext,
  ),
};
