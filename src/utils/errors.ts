/**
 * Triage errors
 *
 * Every failure of a triage run surfaces as one of these classes. `code` is stable and
 * safe to switch on; the message is for people.
 */

export type TriageErrorCode =
  | 'SPAWN_FAILURE'
  | 'SCRIPT_PROVISION_FAILURE'
  | 'UNSUPPORTED_SCRIPT_LOCATION'
  | 'MARKER_NOT_FOUND'
  | 'MARKERS_OUT_OF_ORDER'
  | 'TRIAGE_SCRIPT_ERROR'
  | 'PAYLOAD_PARSE_ERROR';

/**
 * Which slice of the debugger output an extraction targeted.
 */
export type OutputChannel =
  | 'child-stdout'
  | 'child-stderr'
  | 'backtrace-stdout'
  | 'backtrace-stderr';

export class TriageError extends Error {
  readonly code: TriageErrorCode;

  constructor(code: TriageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TriageError';
    this.code = code;
  }
}

/**
 * The debugger executable could not be launched.
 */
export class SpawnFailureError extends TriageError {
  readonly executable: string;

  constructor(executable: string, originalError: unknown) {
    const reason = originalError instanceof Error ? originalError.message : String(originalError);
    super('SPAWN_FAILURE', `Failed to execute '${executable}': ${reason}`, {
      cause: originalError,
    });
    this.name = 'SpawnFailureError';
    this.executable = executable;
  }
}

export class ScriptProvisionError extends TriageError {
  constructor(message: string, originalError?: unknown) {
    super('SCRIPT_PROVISION_FAILURE', message, { cause: originalError });
    this.name = 'ScriptProvisionError';
  }
}

export class UnsupportedScriptLocationError extends TriageError {
  readonly scriptPath?: string;

  constructor(scriptPath?: string) {
    super(
      'UNSUPPORTED_SCRIPT_LOCATION',
      scriptPath
        ? `Unsupported triage script location: ${scriptPath}`
        : 'Unsupported triage script location',
    );
    this.name = 'UnsupportedScriptLocationError';
    this.scriptPath = scriptPath;
  }
}

export class MarkerNotFoundError extends TriageError {
  readonly sentinel: string;
  readonly channel: OutputChannel;

  constructor(sentinel: string, channel: OutputChannel) {
    super('MARKER_NOT_FOUND', `Could not find ${sentinel} in ${channel}`);
    this.name = 'MarkerNotFoundError';
    this.sentinel = sentinel;
    this.channel = channel;
  }
}

export class MarkersOutOfOrderError extends TriageError {
  readonly startSentinel: string;
  readonly endSentinel: string;
  readonly channel: OutputChannel;

  constructor(startSentinel: string, endSentinel: string, channel: OutputChannel) {
    super(
      'MARKERS_OUT_OF_ORDER',
      `Start marker and end marker out-of-order in ${channel} (${startSentinel} / ${endSentinel})`,
    );
    this.name = 'MarkersOutOfOrderError';
    this.startSentinel = startSentinel;
    this.endSentinel = endSentinel;
    this.channel = channel;
  }
}

/**
 * The triage script ran and reported a failure on stderr.
 */
export class TriageScriptError extends TriageError {
  readonly scriptOutput: string;

  constructor(scriptOutput: string) {
    super('TRIAGE_SCRIPT_ERROR', `Triage script emitted errors: ${scriptOutput}`);
    this.name = 'TriageScriptError';
    this.scriptOutput = scriptOutput;
  }
}

export class PayloadParseError extends TriageError {
  readonly payload: string;
  readonly parserMessage: string;

  constructor(parserMessage: string, payload: string, originalError?: unknown) {
    super('PAYLOAD_PARSE_ERROR', `Failed to parse triage JSON from GDB: ${parserMessage}`, {
      cause: originalError,
    });
    this.name = 'PayloadParseError';
    this.payload = payload;
    this.parserMessage = parserMessage;
  }
}
