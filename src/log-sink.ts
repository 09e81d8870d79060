export const MAX_LOG_LINES = 2000;
export const POLL_INTERVAL_MS = 100;

export interface LogSinkOptions {
  maxLines?: number;
}

/**
 * Producers write fragments into a queue; the UI drains it on a timer into a
 * line buffer that keeps only the most recent `maxLines` lines.
 */
export class LogSink {
  private queue: string[];
  private buffer: string[];
  private maxLines: number;
  private timer: NodeJS.Timeout | null;

  constructor(options: LogSinkOptions = {}) {
    this.queue = [];
    // The last element is the open line that the next fragment continues.
    this.buffer = [''];
    this.maxLines = options.maxLines ?? MAX_LOG_LINES;
    this.timer = null;
  }

  write(fragment: string): void {
    if (fragment.length > 0) {
      this.queue.push(fragment);
    }
  }

  pending(): number {
    return this.queue.length;
  }

  /** Moves every queued fragment into the buffer. Returns true if anything moved. */
  drain(): boolean {
    if (this.queue.length === 0) {
      return false;
    }

    const fragments = this.queue;
    this.queue = [];

    for (const fragment of fragments) {
      const parts = fragment.split('\n');
      this.buffer[this.buffer.length - 1] += parts[0];
      for (let i = 1; i < parts.length; i++) {
        this.buffer.push(parts[i]);
      }
    }

    if (this.buffer.length > this.maxLines) {
      this.buffer.splice(0, this.buffer.length - this.maxLines);
    }

    return true;
  }

  lines(): string[] {
    const last = this.buffer[this.buffer.length - 1];
    return last === '' ? this.buffer.slice(0, -1) : [...this.buffer];
  }

  clear(): void {
    this.buffer = [''];
  }

  start(onChange: () => void, intervalMs: number = POLL_INTERVAL_MS): void {
    this.stop();
    this.timer = setInterval(() => {
      if (this.drain()) {
        onChange();
      }
    }, intervalMs);
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
