/**
 * Output markers
 *
 * GDB's transcript, the inferior's own output and the triage payload all share the same
 * two streams. Each region we care about is bracketed by a start and end sentinel, always
 * printed on its own line, and sliced back out after the run.
 */

export interface Marker {
  readonly start: string;
  readonly end: string;
}

export type MarkerExtraction =
  | { ok: true; value: string }
  | { ok: false; reason: 'start-not-found' | 'end-not-found'; sentinel: string }
  | { ok: false; reason: 'out-of-order'; sentinel: string };

export function buildMarker(tag: string): Marker {
  return Object.freeze({
    start: `----${tag}_START----`,
    end: `----${tag}_END----`,
  });
}

export const MARKER_CHILD_OUTPUT = buildMarker('AFLTRIAGE_CHILD_OUTPUT');
export const MARKER_BACKTRACE = buildMarker('AFLTRIAGE_BACKTRACE');

/**
 * Returns the exact text between the first start sentinel and the first end sentinel.
 * The newline that terminates the start sentinel's line is not part of the payload.
 */
export function extractMarker(text: string, marker: Marker): MarkerExtraction {
  const startIndex = text.indexOf(marker.start);
  if (startIndex === -1) {
    return { ok: false, reason: 'start-not-found', sentinel: marker.start };
  }

  const endIndex = text.indexOf(marker.end);
  if (endIndex === -1) {
    return { ok: false, reason: 'end-not-found', sentinel: marker.end };
  }

  let payloadStart = startIndex + marker.start.length;
  if (text.charAt(payloadStart) === '\n') {
    payloadStart += 1;
  }

  if (payloadStart > endIndex) {
    return { ok: false, reason: 'out-of-order', sentinel: marker.end };
  }

  return { ok: true, value: text.slice(payloadStart, endIndex) };
}
