import { spawn, type SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import type { Readable } from 'stream';
import { type ArgVector, formatCommand } from './command-builder.js';
import { errorMessage, isMissingExecutable } from './errors.js';
import type { Operation } from './form-state.js';
import type { LogSink } from './log-sink.js';
import log from './logger.js';

export type RunStatus = 'idle' | 'running';

/** The slice of `ChildProcess` the runner relies on. */
export interface ChildHandle extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  killed: boolean;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

export interface RunRequest {
  operation: Operation;
  argv: ArgVector;
  label: string;
  runningLabel: string;
}

export interface ActiveRun {
  operation: Operation;
  label: string;
  runningLabel: string;
  startedAt: number;
}

export interface FinishedEvent {
  operation: Operation;
  success: boolean;
  exitCode: number | null;
}

export interface ProcessRunnerOptions {
  spawn?: SpawnFn;
}

export const ALREADY_RUNNING_WARNING = '[WARNING] A process is already running. Please wait.\n';

const RULE = '─'.repeat(60);
const LINE_BREAK = /\r\n|\r|\n/;

const TERMINATE_GRACE_MS = 1000;
const FORCE_KILL_WAIT_MS = 500;

interface StreamBuffer {
  stdout: string;
  stderr: string;
}

export class ProcessRunner extends EventEmitter {
  private sink: LogSink;
  private spawnProcess: SpawnFn;
  private active: ActiveRun | null;
  private child: ChildHandle | null;

  constructor(sink: LogSink, options: ProcessRunnerOptions = {}) {
    super();
    this.sink = sink;
    this.spawnProcess = options.spawn ?? spawn;
    this.active = null;
    this.child = null;
  }

  getStatus(): RunStatus {
    return this.active ? 'running' : 'idle';
  }

  isRunning(): boolean {
    return this.active !== null;
  }

  getActiveRun(): ActiveRun | null {
    return this.active;
  }

  /** Launches `request.argv` unless another run is active. */
  start(request: RunRequest): boolean {
    if (this.active) {
      this.sink.write(ALREADY_RUNNING_WARNING);
      log.warn(`Rejected ${request.operation} while ${this.active.operation} is running`);
      return false;
    }

    this.active = {
      operation: request.operation,
      label: request.label,
      runningLabel: request.runningLabel,
      startedAt: Date.now(),
    };
    this.emit('state-change', 'running');
    this.execute(request);
    return true;
  }

  private execute(request: RunRequest): void {
    const [executable, ...args] = request.argv;
    const display = formatCommand(request.argv);

    this.sink.write(`\n${RULE}\n Running: ${display}\n${RULE}\n\n`);
    log.info(`Starting ${request.operation}: ${display}`);

    let settled = false;
    const finish = (success: boolean, exitCode: number | null) => {
      if (settled) return;
      settled = true;
      this.child = null;
      this.active = null;
      log.info(`${request.operation} finished, success=${success} code=${exitCode}`);
      // Listeners run on a later turn of the event loop, never inside start().
      setImmediate(() => {
        this.emit('state-change', 'idle');
        this.emit('finished', { operation: request.operation, success, exitCode } satisfies FinishedEvent);
      });
    };

    let child: ChildHandle;
    try {
      child = this.spawnProcess(executable, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (err) {
      this.reportError(executable, err);
      finish(false, null);
      return;
    }

    this.child = child;
    const buffer: StreamBuffer = { stdout: '', stderr: '' };

    const forward = (source: keyof StreamBuffer, stream: Readable | null) => {
      if (!stream) return;
      stream.setEncoding('utf8');
      stream.on('data', (data: Buffer | string) => {
        const text = buffer[source] + data.toString();
        // A trailing '\r' may be the first half of a '\r\n' split across chunks.
        const held = text.endsWith('\r') ? '\r' : '';
        const lines = text.slice(0, text.length - held.length).split(LINE_BREAK);
        buffer[source] = (lines.pop() ?? '') + held;
        lines.forEach(line => this.sink.write(line + '\n'));
      });
    };

    forward('stdout', child.stdout);
    forward('stderr', child.stderr);

    child.on('error', (err: Error) => {
      this.reportError(executable, err);
      finish(false, null);
    });

    // 'close' only fires once both pipes are drained, so every line is already queued.
    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;

      for (const source of ['stdout', 'stderr'] as const) {
        if (buffer[source].length > 0) {
          this.sink.write(buffer[source].replace(/\r$/, '') + '\n');
          buffer[source] = '';
        }
      }

      if (code === 0) {
        this.sink.write('\n✓ Completed successfully (exit code 0)\n');
      } else if (code !== null) {
        this.sink.write(`\n✗ Process exited with code ${code}\n`);
      } else {
        this.sink.write(`\n✗ Process terminated by signal ${signal ?? 'unknown'}\n`);
      }
      finish(code === 0, code);
    });
  }

  private reportError(executable: string, err: unknown): void {
    if (isMissingExecutable(err)) {
      this.sink.write(`\n[ERROR] Could not find executable: ${executable}\n`);
      this.sink.write('  → Check the Settings tab and make sure the path is correct.\n');
      this.sink.write('  → If using sbstck-dl, install it with:  pip install sbstck-dl\n');
      log.error(`Executable not found: ${executable}`);
    } else {
      this.sink.write(`\n[ERROR] ${errorMessage(err)}\n`);
      log.error(`Process error for ${executable}: ${errorMessage(err)}`);
    }
  }

  /**
   * Terminates a run that is still going when the application quits: SIGTERM
   * first, then SIGKILL if the child has not exited within `graceMs`.
   */
  async dispose(graceMs: number = TERMINATE_GRACE_MS): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }

    if (await this.signalAndWait(child, 'SIGTERM', graceMs)) {
      return;
    }

    log.warn(`Child did not exit within ${graceMs}ms of SIGTERM, sending SIGKILL`);
    await this.signalAndWait(child, 'SIGKILL', FORCE_KILL_WAIT_MS);
  }

  /** Resolves true when the child exits before `timeoutMs`. */
  private signalAndWait(child: ChildHandle, signal: NodeJS.Signals, timeoutMs: number): Promise<boolean> {
    return new Promise(resolve => {
      const onExit = () => {
        clearTimeout(timeout);
        resolve(true);
      };
      const timeout = setTimeout(() => {
        child.off('exit', onExit);
        resolve(false);
      }, timeoutMs);

      child.once('exit', onExit);
      try {
        child.kill(signal);
      } catch (err) {
        log.warn(`Could not send ${signal} to child process: ${errorMessage(err)}`);
      }
    });
  }
}
