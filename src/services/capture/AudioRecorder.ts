import type { DeviceError } from '../../errors';

export interface RealtimeStreamOptions {
  chunkDurationMs: number;
  onChunk: (chunk: Buffer) => void;
  onError?: (error: DeviceError) => void;
}

export interface AudioRecorder {
  startStreaming(options: RealtimeStreamOptions): Promise<void>;
  stop(): Promise<void>;
  /** Releases the device immediately, without waiting for a clean exit. */
  terminate(): void;
}
