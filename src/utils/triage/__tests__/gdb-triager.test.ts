import { afterEach, describe, expect, it, vi } from 'vitest';

import { GdbTriager, parseThreadInfo } from '../gdb-triager.ts';
import { MARKER_BACKTRACE, MARKER_CHILD_OUTPUT } from '../markers.ts';
import type { TriageScriptSource } from '../triage-script.ts';
import {
  MarkerNotFoundError,
  MarkersOutOfOrderError,
  PayloadParseError,
  SpawnFailureError,
  TriageScriptError,
  UnsupportedScriptLocationError,
} from '../../errors.ts';
import {
  createMockExecutor,
  createNoopExecutor,
  wrapInMarkers,
  type RecordedCall,
} from '../../../test-utils/mock-executors.ts';

const SCRIPT_PATH = '/tmp/gdb-triage-test.py';

function fakeScript(): TriageScriptSource {
  return { kind: 'internal', file: { path: SCRIPT_PATH, dispose: vi.fn() } };
}

function gdbStdout(childStdout: string, payload: string): string {
  return (
    'Reading symbols from ./crasher...\n' +
    wrapInMarkers([{ marker: MARKER_CHILD_OUTPUT, payload: childStdout }]) +
    '\nProgram received signal SIGSEGV, Segmentation fault.\n' +
    wrapInMarkers([{ marker: MARKER_BACKTRACE, payload }])
  );
}

function gdbStderr(childStderr = '', scriptErrors = ''): string {
  return wrapInMarkers([
    { marker: MARKER_CHILD_OUTPUT, payload: childStderr },
    { marker: MARKER_BACKTRACE, payload: scriptErrors },
  ]);
}

const MINIMAL_PAYLOAD = '{"current_tid":1,"threads":[{"tid":1,"backtrace":[]}]}\n';

const FULL_PAYLOAD = JSON.stringify({
  current_tid: 4242,
  threads: [
    {
      tid: 4242,
      backtrace: [
        {
          address: 93824992235849,
          relative_address: 4425,
          module: '/work/crasher',
          pretty_address: '0x0000555555555149',
          symbol: {
            function_name: 'crash',
            mangled_function_name: '_Z5crashPi',
            function_signature: 'void (int *)',
            file: 'crasher.cc',
            line: 4,
          },
          args: [{ type: 'int *', name: 'p', value: '0x0' }],
          locals: [{ type: 'int', name: 'x', value: '7' }],
        },
        {
          address: 140737351860224,
          relative_address: 160256,
          module: '/lib/x86_64-linux-gnu/libc.so.6',
          pretty_address: '0x00007ffff7e27200',
          symbol: {
            function_name: '',
            mangled_function_name: '',
            function_signature: '',
            file: '',
          },
          args: [],
          locals: [],
        },
      ],
    },
    { tid: 4243, backtrace: [] },
  ],
});

function singleFramePayload(address: string): string {
  return (
    '{"current_tid":1,"threads":[{"tid":1,"backtrace":[{' +
    `"address":${address},"relative_address":${address},` +
    '"module":"[vsyscall]","pretty_address":"0xffffffffff600400",' +
    '"symbol":{"function_name":"","mangled_function_name":"","function_signature":"","file":""},' +
    '"args":[],"locals":[]}]}]}\n'
  );
}

function createTriager(
  result: Parameters<typeof createMockExecutor>[0],
  calls?: RecordedCall[],
): GdbTriager {
  return new GdbTriager({
    executor: createMockExecutor(result, calls),
    script: fakeScript(),
    indexCacheDirectory: 'gdb_cache',
  });
}

describe('GdbTriager', () => {
  describe('buildTriageArgs', () => {
    it('produces the exact GDB command line', () => {
      const triager = new GdbTriager({
        executor: createNoopExecutor(),
        script: fakeScript(),
        indexCacheDirectory: 'gdb_cache',
      });

      expect(triager.buildTriageArgs(SCRIPT_PATH, ['./crasher', 'input.bin'])).toEqual([
        '--batch',
        '--nx',
        '-iex',
        'set index-cache on',
        '-iex',
        'set index-cache directory gdb_cache',
        '-ex',
        "python [x.write('----AFLTRIAGE_CHILD_OUTPUT_START----\\n') for x in [sys.stdout, sys.stderr]]",
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
        "python [x.write('----AFLTRIAGE_CHILD_OUTPUT_END----\\n') for x in [sys.stdout, sys.stderr]]",
        '-ex',
        "python [x.write('----AFLTRIAGE_BACKTRACE_START----\\n') for x in [sys.stdout, sys.stderr]]",
        '-x',
        SCRIPT_PATH,
        '-ex',
        "python [x.write('----AFLTRIAGE_BACKTRACE_END----\\n') for x in [sys.stdout, sys.stderr]]",
        '--args',
        './crasher',
        'input.bin',
      ]);
    });

    it('uses the configured index cache directory', () => {
      const triager = new GdbTriager({
        executor: createNoopExecutor(),
        script: fakeScript(),
        indexCacheDirectory: '/var/cache/gdb-index',
      });
      expect(triager.buildTriageArgs(SCRIPT_PATH, ['./a'])[5]).toBe(
        'set index-cache directory /var/cache/gdb-index',
      );
    });
  });

  describe('triageTestcase', () => {
    it('slices the child output and parses the backtrace payload', async () => {
      const calls: RecordedCall[] = [];
      const triager = createTriager(
        { output: gdbStdout('hello\n', MINIMAL_PAYLOAD), error: gdbStderr() },
        calls,
      );

      const result = await triager.triageTestcase(['./crasher', 'input.bin']);

      expect(result).toEqual({
        thread_info: { current_tid: 1, threads: [{ tid: 1, backtrace: [] }] },
        child: { stdout: 'hello\n', stderr: '', status_code: 0 },
      });
      expect(calls).toHaveLength(1);
      expect(calls[0]?.command).toEqual([
        'gdb',
        ...triager.buildTriageArgs(SCRIPT_PATH, ['./crasher', 'input.bin']),
      ]);
    });

    it('keeps the child stderr separate from the child stdout', async () => {
      const triager = createTriager({
        output: gdbStdout('out line\n', MINIMAL_PAYLOAD),
        error: gdbStderr('AddressSanitizer: SEGV on unknown address\n'),
      });

      const result = await triager.triageTestcase(['./crasher']);

      expect(result.child.stdout).toBe('out line\n');
      expect(result.child.stderr).toBe('AddressSanitizer: SEGV on unknown address\n');
    });

    it('parses full frames and marks missing line numbers as unknown', async () => {
      const triager = createTriager({
        output: gdbStdout('', `${FULL_PAYLOAD}\n`),
        error: gdbStderr(),
      });

      const { thread_info: info } = await triager.triageTestcase(['./crasher']);

      expect(info.threads.map((thread) => thread.tid)).toContain(info.current_tid);
      const [first, second] = info.threads[0]?.backtrace ?? [];
      expect(first?.symbol).toEqual({
        function_name: 'crash',
        mangled_function_name: '_Z5crashPi',
        function_signature: 'void (int *)',
        file: 'crasher.cc',
        line: 4,
      });
      expect(first?.args).toEqual([{ type: 'int *', name: 'p', value: '0x0' }]);
      expect(first?.locals).toEqual([{ type: 'int', name: 'x', value: '7' }]);
      expect(first?.address).toBe(93824992235849);
      expect(first?.relative_address).toBe(4425);
      expect(second?.symbol.line).toBe(-1);
      expect(second?.module).toBe('/lib/x86_64-linux-gnu/libc.so.6');
    });

    it("reports GDB's own exit status", async () => {
      const failedCommand = createTriager({
        success: false,
        exitCode: 1,
        output: gdbStdout('', MINIMAL_PAYLOAD),
        error: gdbStderr(),
      });
      expect((await failedCommand.triageTestcase(['./crasher'])).child.status_code).toBe(1);

      const signalled = createTriager({
        success: false,
        exitCode: null,
        output: gdbStdout('', MINIMAL_PAYLOAD),
        error: gdbStderr(),
      });
      expect((await signalled.triageTestcase(['./crasher'])).child.status_code).toBe(-1);
    });

    it('fails with TriageScriptError before parsing when the script wrote to stderr', async () => {
      const triager = createTriager({
        output: gdbStdout('', 'not json at all\n'),
        error: gdbStderr('', 'Python Exception <class gdb.error>: No stack.\n'),
      });

      const error = await triager.triageTestcase(['./crasher']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TriageScriptError);
      if (error instanceof TriageScriptError) {
        expect(error.scriptOutput).toBe('Python Exception <class gdb.error>: No stack.\n');
        expect(error.code).toBe('TRIAGE_SCRIPT_ERROR');
      }
    });

    it('fails with PayloadParseError on truncated JSON', async () => {
      const truncated = '{"current_tid":1,"threads":[{"tid"\n';
      const triager = createTriager({ output: gdbStdout('', truncated), error: gdbStderr() });

      const error = await triager.triageTestcase(['./crasher']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PayloadParseError);
      if (error instanceof PayloadParseError) {
        expect(error.payload).toBe(truncated);
      }
    });

    it('fails with PayloadParseError when JSON does not match the schema', async () => {
      const triager = createTriager({
        output: gdbStdout('', '{"current_tid":"one","threads":[]}\n'),
        error: gdbStderr(),
      });

      const error = await triager.triageTestcase(['./crasher']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PayloadParseError);
      if (error instanceof PayloadParseError) {
        expect(error.parserMessage.startsWith('current_tid: ')).toBe(true);
      }
    });

    it('names the child stdout channel when GDB never printed the markers', async () => {
      const triager = createTriager({ output: 'gdb: unrecognized option\n', error: '' });

      const error = await triager.triageTestcase(['./crasher']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MarkerNotFoundError);
      if (error instanceof MarkerNotFoundError) {
        expect(error.channel).toBe('child-stdout');
        expect(error.sentinel).toBe(MARKER_CHILD_OUTPUT.start);
      }
    });

    it('names the backtrace channel when the script never finished', async () => {
      const stdout =
        wrapInMarkers([{ marker: MARKER_CHILD_OUTPUT, payload: '' }]) +
        `${MARKER_BACKTRACE.start}\n{"current_tid":1`;
      const triager = createTriager({ output: stdout, error: gdbStderr() });

      const error = await triager.triageTestcase(['./crasher']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MarkerNotFoundError);
      if (error instanceof MarkerNotFoundError) {
        expect(error.channel).toBe('backtrace-stdout');
        expect(error.sentinel).toBe(MARKER_BACKTRACE.end);
        expect(error.message).toBe(
          'Could not find ----AFLTRIAGE_BACKTRACE_END---- in backtrace-stdout',
        );
      }
    });

    it('detects marker text leaked by the program as out of order', async () => {
      const stdout = `${MARKER_CHILD_OUTPUT.end}\n${gdbStdout('hello\n', MINIMAL_PAYLOAD)}`;
      const triager = createTriager({ output: stdout, error: gdbStderr() });

      const error = await triager.triageTestcase(['./crasher']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MarkersOutOfOrderError);
      if (error instanceof MarkersOutOfOrderError) {
        expect(error.channel).toBe('child-stdout');
      }
    });

    it('wraps spawn failures', async () => {
      const triager = createTriager(new Error('spawn gdb ENOENT'));

      const error = await triager.triageTestcase(['./crasher']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SpawnFailureError);
      if (error instanceof SpawnFailureError) {
        expect(error.message).toBe("Failed to execute 'gdb': spawn gdb ENOENT");
        expect(error.executable).toBe('gdb');
      }
    });

    it('refuses an external script without running GDB', async () => {
      const triager = new GdbTriager({
        executor: createNoopExecutor(),
        script: { kind: 'external', path: '/opt/triage/custom.py' },
      });

      await expect(triager.triageTestcase(['./crasher'])).rejects.toBeInstanceOf(
        UnsupportedScriptLocationError,
      );
    });

    describe('raw output', () => {
      const previousSilence = process.env.GDBTRIAGE_SILENCE_LOGS;

      afterEach(() => {
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
        if (previousSilence === undefined) {
          delete process.env.GDBTRIAGE_SILENCE_LOGS;
        } else {
          process.env.GDBTRIAGE_SILENCE_LOGS = previousSilence;
        }
      });

      it('logs the raw streams when requested', async () => {
        delete process.env.GDBTRIAGE_SILENCE_LOGS;
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const triager = createTriager({
          output: gdbStdout('hello\n', MINIMAL_PAYLOAD),
          error: gdbStderr(),
        });

        await triager.triageTestcase(['./crasher'], true);

        expect(errorSpy).toHaveBeenCalledWith(
          expect.stringContaining('--- RAW GDB OUTPUT ---\nGDB ARGS: --batch --nx'),
        );
        expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('PROGRAM ARGS: ./crasher\n'));
      });

      it('follows the log level threshold', async () => {
        delete process.env.GDBTRIAGE_SILENCE_LOGS;
        vi.stubEnv('GDBTRIAGE_LOG_LEVEL', 'warn');
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const triager = createTriager({
          output: gdbStdout('hello\n', MINIMAL_PAYLOAD),
          error: gdbStderr(),
        });

        await triager.triageTestcase(['./crasher'], true);

        expect(errorSpy).not.toHaveBeenCalled();
      });
    });
  });

  describe('checkGdb', () => {
    it('reports both versions when GDB and Python respond', async () => {
      const calls: RecordedCall[] = [];
      const triager = createTriager(
        { output: 'V:GNU gdb 12.1\nP:3.10.4\n', exitCode: 0 },
        calls,
      );

      expect(await triager.checkGdb()).toEqual({
        supported: true,
        version: 'GNU gdb 12.1',
        pythonVersion: '3.10.4',
      });
      expect(calls[0]?.command.slice(0, 4)).toEqual(['gdb', '--nx', '--batch', '-iex']);
      expect(calls[0]?.command[4]?.startsWith('python import gdb, sys;')).toBe(true);
      expect(await triager.hasSupportedGdb()).toBe(true);
    });

    it('fails when the Python line is missing', async () => {
      const triager = createTriager({ output: 'V:GNU gdb 12.1\n', exitCode: 0 });

      expect(await triager.checkGdb()).toEqual({
        supported: false,
        version: 'GNU gdb 12.1',
        pythonVersion: undefined,
      });
      expect(await triager.hasSupportedGdb()).toBe(false);
    });

    it('fails when the version line is missing', async () => {
      const triager = createTriager({ output: 'P:3.10.4\n', exitCode: 0 });
      expect(await triager.hasSupportedGdb()).toBe(false);
    });

    it('fails when GDB exits unsuccessfully', async () => {
      const triager = createTriager({
        success: false,
        exitCode: 1,
        output: 'V:GNU gdb 12.1\nP:3.10.4\n',
        error: 'Python scripting is not supported in this copy of GDB.\n',
      });
      expect(await triager.hasSupportedGdb()).toBe(false);
    });

    it('does not throw when GDB cannot be launched', async () => {
      const triager = createTriager(new Error('spawn gdb ENOENT'));
      expect(await triager.checkGdb()).toEqual({ supported: false });
    });
  });

  it('disposes the script it owns', () => {
    const script = fakeScript();
    const triager = new GdbTriager({ executor: createNoopExecutor(), script });
    triager.dispose();
    if (script.kind === 'internal') {
      expect(script.file.dispose).toHaveBeenCalledTimes(1);
    }
  });
});

describe('parseThreadInfo', () => {
  it('returns a thread list whose current tid names one of its threads', () => {
    const info = parseThreadInfo(FULL_PAYLOAD);
    expect(info.current_tid).toBe(4242);
    expect(info.threads.filter((thread) => thread.tid === info.current_tid)).toHaveLength(1);
  });

  it('treats a null line as unknown', () => {
    const info = parseThreadInfo(
      JSON.stringify({
        current_tid: 1,
        threads: [
          {
            tid: 1,
            backtrace: [
              {
                address: 4096,
                relative_address: 0,
                module: 'a.out',
                pretty_address: '0x1000',
                symbol: {
                  function_name: 'f',
                  mangled_function_name: 'f',
                  function_signature: 'void (void)',
                  file: 'f.c',
                  line: null,
                },
                args: [],
                locals: [],
              },
            ],
          },
        ],
      }),
    );
    expect(info.threads[0]?.backtrace[0]?.symbol.line).toBe(-1);
  });

  it('keeps addresses above the safe integer range exact', () => {
    const frame = parseThreadInfo(singleFramePayload('9007199254740993')).threads[0]?.backtrace[0];
    expect(frame?.address).toBe(9007199254740993n);
    expect(frame?.relative_address).toBe(9007199254740993n);
  });

  it('accepts the vsyscall page as a signed or unsigned 64-bit address', () => {
    const signed = parseThreadInfo(singleFramePayload('-10484736')).threads[0]?.backtrace[0];
    expect(signed?.address).toBe(-10484736);

    const unsigned = parseThreadInfo(singleFramePayload('18446744073699066880')).threads[0]
      ?.backtrace[0];
    expect(unsigned?.address).toBe(18446744073699066880n);
    expect(unsigned?.pretty_address).toBe('0xffffffffff600400');
  });

  it('rejects addresses wider than 64 bits', () => {
    expect(() => parseThreadInfo(singleFramePayload('18446744073709551616'))).toThrow(
      PayloadParseError,
    );
  });

  it('rejects an empty payload', () => {
    expect(() => parseThreadInfo('')).toThrow(PayloadParseError);
  });
});
