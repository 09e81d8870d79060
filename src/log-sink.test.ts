import { afterEach, describe, expect, it, vi } from 'vitest';
import { LogSink } from './log-sink.js';

describe('LogSink', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('queues fragments until drained', () => {
    const sink = new LogSink();
    sink.write('hello\n');
    sink.write('');

    expect(sink.pending()).toBe(1);
    expect(sink.lines()).toEqual([]);
    expect(sink.drain()).toBe(true);
    expect(sink.pending()).toBe(0);
    expect(sink.lines()).toEqual(['hello']);
    expect(sink.drain()).toBe(false);
  });

  it('joins fragments that split a line', () => {
    const sink = new LogSink();
    sink.write('Downloading ');
    sink.write('post 1\nDownloading post 2');
    sink.drain();

    expect(sink.lines()).toEqual(['Downloading post 1', 'Downloading post 2']);

    sink.write('\n');
    sink.drain();
    expect(sink.lines()).toEqual(['Downloading post 1', 'Downloading post 2']);
  });

  it('keeps blank lines inside the output', () => {
    const sink = new LogSink();
    sink.write('\nfirst\n\nsecond\n');
    sink.drain();

    expect(sink.lines()).toEqual(['', 'first', '', 'second']);
  });

  it('evicts the oldest lines past the cap', () => {
    const sink = new LogSink({ maxLines: 3 });
    sink.write('one\ntwo\nthree\nfour\nfive\n');
    sink.drain();

    expect(sink.lines()).toEqual(['four', 'five']);

    sink.write('six');
    sink.drain();
    expect(sink.lines()).toEqual(['four', 'five', 'six']);

    sink.write('\nseven');
    sink.drain();
    expect(sink.lines()).toEqual(['five', 'six', 'seven']);
  });

  it('clears the buffer but keeps queued fragments', () => {
    const sink = new LogSink();
    sink.write('old\n');
    sink.drain();
    sink.write('new\n');
    sink.clear();

    expect(sink.lines()).toEqual([]);
    sink.drain();
    expect(sink.lines()).toEqual(['new']);
  });

  it('drains on a timer and reports changes only', () => {
    vi.useFakeTimers();
    const sink = new LogSink();
    const onChange = vi.fn();

    sink.start(onChange, 50);
    vi.advanceTimersByTime(50);
    expect(onChange).not.toHaveBeenCalled();

    sink.write('line\n');
    vi.advanceTimersByTime(50);
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(sink.lines()).toEqual(['line']);

    sink.stop();
    sink.write('later\n');
    vi.advanceTimersByTime(200);
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(sink.pending()).toBe(1);
  });
});
