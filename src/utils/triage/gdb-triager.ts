import type { CommandExecutor, CommandResponse } from '../execution/index.ts';
import { getDefaultCommandExecutor } from '../execution/index.ts';
import { isInteger, isSafeNumber, parse as parseLosslessJson } from 'lossless-json';
import { log } from '../logger.ts';
import { getExternalTriageScriptPath, getIndexCacheDirectory } from '../environment.ts';
import {
  MarkerNotFoundError,
  MarkersOutOfOrderError,
  PayloadParseError,
  SpawnFailureError,
  TriageScriptError,
  type OutputChannel,
} from '../errors.ts';
import { MARKER_BACKTRACE, MARKER_CHILD_OUTPUT, extractMarker, type Marker } from './markers.ts';
import {
  disposeTriageScript,
  provisionInternalTriageScript,
  resolveTriageScriptPath,
  type TriageScriptSource,
} from './triage-script.ts';
import {
  gdbThreadInfoSchema,
  type GdbSanityReport,
  type GdbThreadInfo,
  type GdbTriageResult,
} from './types.ts';

const LOG_PREFIX = '[GdbTriage]';
const GDB_EXECUTABLE = 'gdb';
const UNKNOWN_STATUS_CODE = -1;

const SANITY_CHECK_COMMAND =
  "python import gdb, sys; print('V:'+gdb.execute('show version', to_string=True).splitlines()[0]); print('P:'+sys.version.splitlines()[0].strip())";

export interface GdbTriagerOptions {
  executor?: CommandExecutor;
  script?: TriageScriptSource;
  indexCacheDirectory?: string;
}

// Written to both streams so each carries its own copy of the marker line.
function printMarkerCommand(sentinel: string): string {
  return `python [x.write('${sentinel}\\n') for x in [sys.stdout, sys.stderr]]`;
}

function findPrefixedLine(text: string, prefix: string): string | undefined {
  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith(prefix)) {
      return line.slice(prefix.length);
    }
  }
  return undefined;
}

function sliceOrThrow(text: string, marker: Marker, channel: OutputChannel): string {
  const extraction = extractMarker(text, marker);
  if (extraction.ok) {
    return extraction.value;
  }
  if (extraction.reason === 'out-of-order') {
    throw new MarkersOutOfOrderError(marker.start, marker.end, channel);
  }
  throw new MarkerNotFoundError(extraction.sentinel, channel);
}

function formatZodPath(path: PropertyKey[]): string {
  return path.length > 0 ? path.map(String).join('.') : 'root';
}

// Addresses can exceed Number.MAX_SAFE_INTEGER; those integers are kept exact as bigint.
function parsePayloadNumber(value: string): number | bigint {
  if (isInteger(value) && !isSafeNumber(value)) {
    return BigInt(value);
  }
  return Number(value);
}

export function parseThreadInfo(payload: string): GdbThreadInfo {
  let json: unknown;
  try {
    json = parseLosslessJson(payload, null, parsePayloadNumber);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PayloadParseError(message, payload, error);
  }

  const parsed = gdbThreadInfoSchema.safeParse(json);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${formatZodPath(issue.path)}: ${issue.message}`)
      .join('; ');
    throw new PayloadParseError(message, payload, parsed.error);
  }
  return parsed.data;
}

/**
 * Runs programs under GDB in batch mode and turns the triage script's output into a
 * structured crash report.
 *
 * Owns a temporary copy of the triage script; call dispose() once the triager is no
 * longer needed.
 */
export class GdbTriager {
  readonly gdb = GDB_EXECUTABLE;
  readonly indexCacheDirectory: string;

  private readonly executor: CommandExecutor;
  private readonly script: TriageScriptSource;

  constructor(options: GdbTriagerOptions = {}) {
    this.executor = options.executor ?? getDefaultCommandExecutor();
    this.indexCacheDirectory = options.indexCacheDirectory ?? getIndexCacheDirectory();
    this.script = options.script ?? {
      kind: 'internal',
      file: provisionInternalTriageScript(),
    };
  }

  get scriptSource(): TriageScriptSource['kind'] {
    return this.script.kind;
  }

  /**
   * Checks that GDB starts and has Python support. Never throws.
   */
  async checkGdb(): Promise<GdbSanityReport> {
    const gdbArgs = ['--nx', '--batch', '-iex', SANITY_CHECK_COMMAND];

    let output: CommandResponse;
    try {
      output = await this.executor([this.gdb, ...gdbArgs], `${LOG_PREFIX} sanity check`);
    } catch (error) {
      log('error', `${LOG_PREFIX} Failed to execute '${this.gdb}': ${String(error)}`);
      return { supported: false };
    }

    const stdout = output.output;
    const stderr = output.error ?? '';
    const version = findPrefixedLine(stdout, 'V:');
    const pythonVersion = findPrefixedLine(stdout, 'P:');

    if (!output.success || version === undefined || pythonVersion === undefined) {
      log(
        'error',
        `${LOG_PREFIX} GDB sanity check failure\nARGS: ${gdbArgs.join(' ')}\nSTDOUT: ${stdout}\nSTDERR: ${stderr}`,
      );
      return { supported: false, version, pythonVersion };
    }

    return { supported: true, version, pythonVersion };
  }

  async hasSupportedGdb(): Promise<boolean> {
    const report = await this.checkGdb();
    if (report.supported) {
      log('info', `${LOG_PREFIX} GDB is working (${report.version} - Python ${report.pythonVersion})`);
    }
    return report.supported;
  }

  /**
   * Full GDB argument vector for one triage run. `progArgs` is the inferior's command line.
   */
  buildTriageArgs(scriptPath: string, progArgs: string[]): string[] {
    return [
      '--batch',
      '--nx',
      '-iex',
      'set index-cache on',
      '-iex',
      `set index-cache directory ${this.indexCacheDirectory}`,
      '-ex',
      printMarkerCommand(MARKER_CHILD_OUTPUT.start),
      '-ex',
      'set logging file /dev/null',
      '-ex',
      'set logging redirect on',
      '-ex',
      'set logging on',
      '-ex',
      'run',
      '-ex',
      'set logging redirect off',
      '-ex',
      'set logging off',
      '-ex',
      printMarkerCommand(MARKER_CHILD_OUTPUT.end),
      '-ex',
      printMarkerCommand(MARKER_BACKTRACE.start),
      '-x',
      scriptPath,
      '-ex',
      printMarkerCommand(MARKER_BACKTRACE.end),
      '--args',
      ...progArgs,
    ];
  }

  async triageTestcase(progArgs: string[], showRawOutput = false): Promise<GdbTriageResult> {
    const scriptPath = resolveTriageScriptPath(this.script);
    const gdbArgs = this.buildTriageArgs(scriptPath, progArgs);

    let output: CommandResponse;
    try {
      output = await this.executor([this.gdb, ...gdbArgs], `${LOG_PREFIX} triage`);
    } catch (error) {
      throw new SpawnFailureError(this.gdb, error);
    }

    const stdout = output.output;
    const stderr = output.error ?? '';

    if (showRawOutput) {
      log(
        'info',
        `--- RAW GDB OUTPUT ---\nGDB ARGS: ${gdbArgs.join(' ')}\nPROGRAM ARGS: ${progArgs.join(' ')}\nSTDOUT:\n${stdout}\nSTDERR:\n${stderr}\n`,
      );
    }

    const childStdout = sliceOrThrow(stdout, MARKER_CHILD_OUTPUT, 'child-stdout');
    const childStderr = sliceOrThrow(stderr, MARKER_CHILD_OUTPUT, 'child-stderr');
    const backtraceOutput = sliceOrThrow(stdout, MARKER_BACKTRACE, 'backtrace-stdout');
    const backtraceErrors = sliceOrThrow(stderr, MARKER_BACKTRACE, 'backtrace-stderr');

    if (backtraceErrors.length > 0) {
      throw new TriageScriptError(backtraceErrors);
    }

    const threadInfo = parseThreadInfo(backtraceOutput);
    log(
      'debug',
      `${LOG_PREFIX} parsed ${threadInfo.threads.length} thread(s), current tid ${threadInfo.current_tid}`,
    );

    return {
      thread_info: threadInfo,
      child: {
        stdout: childStdout,
        stderr: childStderr,
        status_code: output.exitCode ?? UNKNOWN_STATUS_CODE,
      },
    };
  }

  dispose(): void {
    disposeTriageScript(this.script);
  }
}

/**
 * Script source chosen by configuration: an external path when GDBTRIAGE_SCRIPT is set,
 * otherwise the bundled script.
 */
export function resolveConfiguredScriptSource(): TriageScriptSource {
  const externalPath = getExternalTriageScriptPath();
  if (externalPath) {
    return { kind: 'external', path: externalPath };
  }
  return { kind: 'internal', file: provisionInternalTriageScript() };
}
