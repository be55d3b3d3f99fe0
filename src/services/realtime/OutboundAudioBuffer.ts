export interface OutboundAudioBufferOptions {
  flushIntervalMs: number;
  flushChunkCount: number;
  onFlush: (audio: Buffer) => void;
}

/**
 * Coalesces microphone frames into fewer `input_audio_buffer.append` sends.
 * Pending audio goes out when `flushChunkCount` frames are queued or
 * `flushIntervalMs` after the first queued frame, whichever comes first.
 */
export class OutboundAudioBuffer {
  private pending: Buffer[] = [];
  private timer: NodeJS.Timeout | undefined;

  public constructor(private readonly options: OutboundAudioBufferOptions) {}

  public push(frame: Buffer): void {
    if (frame.length === 0) {
      return;
    }

    this.pending.push(frame);
    if (this.pending.length >= this.options.flushChunkCount) {
      this.flush();
      return;
    }

    if (!this.timer) {
      this.timer = setTimeout(() => {
        this.timer = undefined;
        this.flush();
      }, this.options.flushIntervalMs);
    }
  }

  public flush(): void {
    this.clearTimer();
    if (this.pending.length === 0) {
      return;
    }

    const audio = Buffer.concat(this.pending);
    this.pending = [];
    this.options.onFlush(audio);
  }

  public discard(): void {
    this.clearTimer();
    this.pending = [];
  }

  public pendingChunks(): number {
    return this.pending.length;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
