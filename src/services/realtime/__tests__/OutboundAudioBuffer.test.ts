import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OutboundAudioBuffer } from '../OutboundAudioBuffer';

describe('OutboundAudioBuffer', () => {
  let flushed: Buffer[];
  let buffer: OutboundAudioBuffer;

  beforeEach(() => {
    vi.useFakeTimers();
    flushed = [];
    buffer = new OutboundAudioBuffer({
      flushIntervalMs: 100,
      flushChunkCount: 3,
      onFlush: (audio) => flushed.push(audio)
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('flushes as soon as the chunk threshold is reached', () => {
    buffer.push(Buffer.from([1]));
    buffer.push(Buffer.from([2]));
    expect(flushed).toEqual([]);

    buffer.push(Buffer.from([3]));
    expect(flushed).toEqual([Buffer.from([1, 2, 3])]);
    expect(buffer.pendingChunks()).toBe(0);
  });

  it('flushes on the interval when fewer chunks arrive', () => {
    buffer.push(Buffer.from([1]));
    vi.advanceTimersByTime(99);
    expect(flushed).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(flushed).toEqual([Buffer.from([1])]);
  });

  it('does not fire the interval again after a threshold flush', () => {
    buffer.push(Buffer.from([1]));
    buffer.push(Buffer.from([2]));
    buffer.push(Buffer.from([3]));
    vi.advanceTimersByTime(500);

    expect(flushed).toHaveLength(1);
  });

  it('flushes pending audio on demand', () => {
    buffer.push(Buffer.from([7, 8]));
    buffer.flush();
    buffer.flush();

    expect(flushed).toEqual([Buffer.from([7, 8])]);
  });

  it('discards pending audio without sending it', () => {
    buffer.push(Buffer.from([1]));
    buffer.discard();
    vi.advanceTimersByTime(500);

    expect(flushed).toEqual([]);
  });

  it('ignores empty frames', () => {
    buffer.push(Buffer.alloc(0));
    vi.advanceTimersByTime(500);

    expect(buffer.pendingChunks()).toBe(0);
    expect(flushed).toEqual([]);
  });
});
