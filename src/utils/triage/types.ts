import * as z from 'zod';

/**
 * Line number used when the debugger could not resolve one (stripped or inlined frames).
 */
export const UNKNOWN_LINE = -1;

export const gdbSymbolSchema = z.object({
  function_name: z.string(),
  mangled_function_name: z.string(),
  function_signature: z.string(),
  file: z.string(),
  line: z
    .number()
    .int()
    .nullish()
    .transform((line) => line ?? UNKNOWN_LINE),
});

const MIN_ADDRESS = -(2n ** 63n);
const MAX_ADDRESS = 2n ** 64n - 1n;

/**
 * A 64-bit address. Values outside the safe integer range arrive as bigint.
 */
export const gdbAddressSchema = z.union([
  z.number().int(),
  z.bigint().min(MIN_ADDRESS).max(MAX_ADDRESS),
]);

export const gdbVariableSchema = z.object({
  type: z.string(),
  name: z.string(),
  value: z.string(),
});

export const gdbFrameInfoSchema = z.object({
  address: gdbAddressSchema,
  relative_address: gdbAddressSchema,
  module: z.string(),
  pretty_address: z.string(),
  symbol: gdbSymbolSchema,
  args: z.array(gdbVariableSchema),
  locals: z.array(gdbVariableSchema),
});

export const gdbThreadSchema = z.object({
  tid: z.number().int(),
  backtrace: z.array(gdbFrameInfoSchema),
});

export const gdbThreadInfoSchema = z.object({
  current_tid: z.number().int(),
  threads: z.array(gdbThreadSchema),
});

export type GdbSymbol = z.infer<typeof gdbSymbolSchema>;
export type GdbVariable = z.infer<typeof gdbVariableSchema>;
export type GdbFrameInfo = z.infer<typeof gdbFrameInfoSchema>;
export type GdbThread = z.infer<typeof gdbThreadSchema>;
export type GdbThreadInfo = z.infer<typeof gdbThreadInfoSchema>;

export interface GdbChildResult {
  stdout: string;
  stderr: string;
  /**
   * Exit status of the GDB process, not of the program it ran. In batch mode GDB exits
   * with the status of its last command, so this is 0 for nearly every completed run;
   * -1 when GDB itself was killed by a signal.
   */
  status_code: number;
}

export interface GdbTriageResult {
  thread_info: GdbThreadInfo;
  child: GdbChildResult;
}

export interface GdbSanityReport {
  supported: boolean;
  version?: string;
  pythonVersion?: string;
}
