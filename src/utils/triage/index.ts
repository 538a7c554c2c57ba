import { GdbTriager, resolveConfiguredScriptSource } from './gdb-triager.ts';

let defaultGdbTriager: GdbTriager | null = null;

export function getDefaultGdbTriager(): GdbTriager {
  defaultGdbTriager ??= new GdbTriager({ script: resolveConfiguredScriptSource() });
  return defaultGdbTriager;
}

export function disposeDefaultGdbTriager(): void {
  defaultGdbTriager?.dispose();
  defaultGdbTriager = null;
}

export { GdbTriager, parseThreadInfo, resolveConfiguredScriptSource } from './gdb-triager.ts';
export type { GdbTriagerOptions } from './gdb-triager.ts';
export { MARKER_BACKTRACE, MARKER_CHILD_OUTPUT, buildMarker, extractMarker } from './markers.ts';
export type { Marker, MarkerExtraction } from './markers.ts';
export { formatFrame, formatTriageReport, getCurrentThread } from './report.ts';
export { getDefaultTriageToolContext } from './tool-context.ts';
export type { TriageToolContext } from './tool-context.ts';
export { UNKNOWN_LINE } from './types.ts';
export type {
  GdbChildResult,
  GdbFrameInfo,
  GdbSanityReport,
  GdbSymbol,
  GdbThread,
  GdbThreadInfo,
  GdbTriageResult,
  GdbVariable,
} from './types.ts';
