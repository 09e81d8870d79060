import type { SpawnOptions } from 'child_process';
import { EventEmitter, once } from 'events';
import { tmpdir } from 'os';
import { join } from 'path';
import { PassThrough } from 'stream';
import { finished } from 'stream/promises';
import { describe, expect, it } from 'vitest';
import { LogSink } from './log-sink.js';
import { type ChildHandle, type FinishedEvent, ProcessRunner, type RunRequest, type SpawnFn } from './process-runner.js';

const RULE = '─'.repeat(60);

class FakeChild extends EventEmitter implements ChildHandle {
  stdout = new PassThrough();
  stderr = new PassThrough();
  killed = false;
  signals: (NodeJS.Signals | undefined)[] = [];

  constructor(private exitsOn: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGKILL']) {
    super();
  }

  kill(signal?: NodeJS.Signals): boolean {
    this.killed = true;
    this.signals.push(signal);
    if (signal && this.exitsOn.includes(signal)) {
      setImmediate(() => this.emit('exit', null, signal));
    }
    return true;
  }
}

interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
}

function fakeSpawn(child: FakeChild): { spawn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    return child;
  };
  return { spawn, calls };
}

const download: RunRequest = {
  operation: 'download',
  argv: ['sbstck-dl', 'download', '--url', 'https://x.substack.com'],
  label: 'Start Download',
  runningLabel: 'Downloading…',
};

const banner = ['', RULE, ' Running: sbstck-dl download --url https://x.substack.com', RULE, ''];

async function endStreams(child: FakeChild): Promise<void> {
  child.stdout.end();
  child.stderr.end();
  await Promise.all([finished(child.stdout), finished(child.stderr)]);
}

function drained(sink: LogSink): string[] {
  sink.drain();
  return sink.lines();
}

describe('ProcessRunner', () => {
  it('spawns the argument vector without a shell', () => {
    const child = new FakeChild();
    const { spawn, calls } = fakeSpawn(child);
    const runner = new ProcessRunner(new LogSink(), { spawn });

    expect(runner.start(download)).toBe(true);

    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('sbstck-dl');
    expect(calls[0].args).toEqual(['download', '--url', 'https://x.substack.com']);
    expect(calls[0].options.stdio).toEqual(['ignore', 'pipe', 'pipe']);
    expect(calls[0].options.shell).toBeUndefined();
  });

  it('streams output line by line and reports success', async () => {
    const child = new FakeChild();
    const sink = new LogSink();
    const runner = new ProcessRunner(sink, { spawn: fakeSpawn(child).spawn });
    const states: string[] = [];
    runner.on('state-change', (state: string) => states.push(state));

    runner.start(download);
    expect(runner.isRunning()).toBe(true);
    expect(runner.getActiveRun()?.runningLabel).toBe('Downloading…');

    child.stdout.write('Fetching posts\r\nSaved 2 ');
    child.stdout.write('posts');
    await endStreams(child);

    const done = once(runner, 'finished');
    child.emit('close', 0, null);
    expect(runner.getStatus()).toBe('idle');

    const [event] = await done;
    expect(event).toEqual({ operation: 'download', success: true, exitCode: 0 } satisfies FinishedEvent);
    expect(states).toEqual(['running', 'idle']);
    expect(drained(sink)).toEqual([
      ...banner,
      'Fetching posts',
      'Saved 2 posts',
      '',
      '✓ Completed successfully (exit code 0)',
    ]);
  });

  it('treats carriage returns as line breaks', async () => {
    const child = new FakeChild();
    const sink = new LogSink();
    const runner = new ProcessRunner(sink, { spawn: fakeSpawn(child).spawn });

    runner.start(download);
    child.stdout.write('10%\r50%\r');
    child.stdout.write('100%\r');
    child.stdout.write('\ndone\r\n');
    await endStreams(child);
    const done = once(runner, 'finished');
    child.emit('close', 0, null);
    await done;

    expect(drained(sink)).toEqual([
      ...banner,
      '10%',
      '50%',
      '100%',
      'done',
      '',
      '✓ Completed successfully (exit code 0)',
    ]);
  });

  it('flushes a line ended by a final carriage return', async () => {
    const child = new FakeChild();
    const sink = new LogSink();
    const runner = new ProcessRunner(sink, { spawn: fakeSpawn(child).spawn });

    runner.start(download);
    child.stdout.write('Saved 2 posts\r');
    await endStreams(child);
    const done = once(runner, 'finished');
    child.emit('close', 0, null);
    await done;

    expect(drained(sink).slice(-3)).toEqual(['Saved 2 posts', '', '✓ Completed successfully (exit code 0)']);
  });

  it('keeps stderr lines in the log', async () => {
    const child = new FakeChild();
    const sink = new LogSink();
    const runner = new ProcessRunner(sink, { spawn: fakeSpawn(child).spawn });

    runner.start(download);
    child.stderr.write('rate limited, retrying\n');
    await endStreams(child);
    const done = once(runner, 'finished');
    child.emit('close', 0, null);
    await done;

    expect(drained(sink)).toContain('rate limited, retrying');
  });

  it('reports a non-zero exit as a failure', async () => {
    const child = new FakeChild();
    const sink = new LogSink();
    const runner = new ProcessRunner(sink, { spawn: fakeSpawn(child).spawn });

    runner.start(download);
    await endStreams(child);
    const done = once(runner, 'finished');
    child.emit('close', 2, null);

    const [event] = await done;
    expect(event).toEqual({ operation: 'download', success: false, exitCode: 2 });
    expect(drained(sink).slice(-2)).toEqual(['', '✗ Process exited with code 2']);
  });

  it('reports termination by a signal', async () => {
    const child = new FakeChild();
    const sink = new LogSink();
    const runner = new ProcessRunner(sink, { spawn: fakeSpawn(child).spawn });

    runner.start(download);
    await endStreams(child);
    const done = once(runner, 'finished');
    child.emit('close', null, 'SIGTERM');

    const [event] = await done;
    expect(event).toEqual({ operation: 'download', success: false, exitCode: null });
    expect(drained(sink).slice(-1)).toEqual(['✗ Process terminated by signal SIGTERM']);
  });

  it('explains a missing executable and finishes once', async () => {
    const child = new FakeChild();
    const sink = new LogSink();
    const runner = new ProcessRunner(sink, { spawn: fakeSpawn(child).spawn });
    const events: FinishedEvent[] = [];
    runner.on('finished', (event: FinishedEvent) => events.push(event));

    runner.start(download);
    const done = once(runner, 'finished');
    child.emit('error', Object.assign(new Error('spawn sbstck-dl ENOENT'), { code: 'ENOENT' }));
    child.emit('close', -2, null);
    await done;
    await new Promise(resolve => setImmediate(resolve));

    expect(events).toEqual([{ operation: 'download', success: false, exitCode: null }]);
    expect(drained(sink)).toEqual([
      ...banner,
      '',
      '[ERROR] Could not find executable: sbstck-dl',
      '  → Check the Settings tab and make sure the path is correct.',
      '  → If using sbstck-dl, install it with:  pip install sbstck-dl',
    ]);
  });

  it('reports a spawn that throws', async () => {
    const sink = new LogSink();
    const spawn: SpawnFn = () => {
      throw new Error('spawn EACCES');
    };
    const runner = new ProcessRunner(sink, { spawn });

    const done = once(runner, 'finished');
    expect(runner.start(download)).toBe(true);
    expect(runner.isRunning()).toBe(false);

    const [event] = await done;
    expect(event).toEqual({ operation: 'download', success: false, exitCode: null });
    expect(drained(sink).slice(-2)).toEqual(['', '[ERROR] spawn EACCES']);
  });

  it('rejects a second run while one is active', async () => {
    const child = new FakeChild();
    const sink = new LogSink();
    const { spawn, calls } = fakeSpawn(child);
    const runner = new ProcessRunner(sink, { spawn });

    runner.start(download);
    const convert: RunRequest = {
      operation: 'convert',
      argv: ['pandoc', 'a.md'],
      label: 'Convert to ePub',
      runningLabel: 'Converting…',
    };
    expect(runner.start(convert)).toBe(false);
    expect(calls).toHaveLength(1);
    expect(runner.getActiveRun()?.operation).toBe('download');
    expect(drained(sink).slice(-1)).toEqual(['[WARNING] A process is already running. Please wait.']);

    await endStreams(child);
    const done = once(runner, 'finished');
    child.emit('close', 0, null);
    await done;

    expect(runner.start(convert)).toBe(true);
    expect(calls).toHaveLength(2);
  });

  it('does nothing on dispose while idle', async () => {
    const child = new FakeChild();
    const runner = new ProcessRunner(new LogSink(), { spawn: fakeSpawn(child).spawn });

    await runner.dispose(10);

    expect(child.signals).toEqual([]);
  });

  it('stops an active child with SIGTERM', async () => {
    const child = new FakeChild();
    const runner = new ProcessRunner(new LogSink(), { spawn: fakeSpawn(child).spawn });

    runner.start(download);
    await runner.dispose(10);

    expect(child.signals).toEqual(['SIGTERM']);
  });

  it('escalates to SIGKILL when the child ignores SIGTERM', async () => {
    const child = new FakeChild(['SIGKILL']);
    const runner = new ProcessRunner(new LogSink(), { spawn: fakeSpawn(child).spawn });

    runner.start(download);
    await runner.dispose(10);

    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
  });
});

describe('ProcessRunner with real processes', () => {
  const node = process.execPath;

  async function run(argv: string[]): Promise<{ event: unknown; lines: string[] }> {
    const sink = new LogSink();
    const runner = new ProcessRunner(sink);
    const done = once(runner, 'finished');

    runner.start({ ...download, argv });
    const [event] = await done;
    return { event, lines: drained(sink) };
  }

  it('captures both streams before reporting success', async () => {
    const { event, lines } = await run([
      node,
      '-e',
      "process.stdout.write('10%\\r50%\\r100%\\n'); process.stderr.write('slow down\\n'); process.stdout.write('last line')",
    ]);

    expect(event).toEqual({ operation: 'download', success: true, exitCode: 0 });
    expect(lines).toEqual(expect.arrayContaining(['10%', '50%', '100%', 'slow down', 'last line']));
    expect(lines.slice(-2)).toEqual(['', '✓ Completed successfully (exit code 0)']);
  });

  it('reports the exit code of a failing process', async () => {
    const { event, lines } = await run([node, '-e', 'process.exit(3)']);

    expect(event).toEqual({ operation: 'download', success: false, exitCode: 3 });
    expect(lines.slice(-1)).toEqual(['✗ Process exited with code 3']);
  });

  it('explains an executable that does not exist', async () => {
    const missing = join(tmpdir(), 'archiver-missing-tool');
    const { event, lines } = await run([missing, 'download']);

    expect(event).toEqual({ operation: 'download', success: false, exitCode: null });
    expect(lines.slice(-3)).toEqual([
      `[ERROR] Could not find executable: ${missing}`,
      '  → Check the Settings tab and make sure the path is correct.',
      '  → If using sbstck-dl, install it with:  pip install sbstck-dl',
    ]);
  });
});
