import { UNKNOWN_LINE, type GdbFrameInfo, type GdbThread, type GdbThreadInfo, type GdbTriageResult } from './types.ts';

export function getCurrentThread(info: GdbThreadInfo): GdbThread | undefined {
  return info.threads.find((thread) => thread.tid === info.current_tid);
}

function formatFrameLocation(frame: GdbFrameInfo): string {
  const { file, line } = frame.symbol;
  if (!file) {
    return frame.module ? ` from ${frame.module}` : '';
  }
  return line === UNKNOWN_LINE ? ` at ${file}` : ` at ${file}:${line}`;
}

export function formatFrame(frame: GdbFrameInfo, index: number): string {
  const functionName = frame.symbol.function_name || '??';
  const args = frame.args.map((arg) => `${arg.name}=${arg.value}`).join(', ');
  return `#${index} ${frame.pretty_address} in ${functionName} (${args})${formatFrameLocation(frame)}`;
}

function formatThread(thread: GdbThread, isCurrent: boolean): string[] {
  const header = `Thread ${thread.tid}${isCurrent ? ' (current)' : ''}`;
  if (thread.backtrace.length === 0) {
    return [header, '  <no frames>'];
  }
  return [header, ...thread.backtrace.map((frame, index) => `  ${formatFrame(frame, index)}`)];
}

/**
 * Human-readable backtrace listing. The current thread comes first.
 */
export function formatTriageReport(result: GdbTriageResult): string {
  const { thread_info: info, child } = result;
  const current = getCurrentThread(info);
  const ordered = current
    ? [current, ...info.threads.filter((thread) => thread !== current)]
    : info.threads;

  const lines: string[] = [];
  for (const thread of ordered) {
    if (lines.length > 0) lines.push('');
    lines.push(...formatThread(thread, thread === current));
  }

  if (child.stdout) {
    lines.push('', 'Program stdout:', child.stdout.trimEnd());
  }
  if (child.stderr) {
    lines.push('', 'Program stderr:', child.stderr.trimEnd());
  }

  return lines.join('\n');
}
