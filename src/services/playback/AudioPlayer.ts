import type { DeviceError } from '../../errors';
import type { AudioChunk } from '../../types';

export interface PlaybackOptions {
  onError?: (error: DeviceError) => void;
}

export interface AudioPlayer {
  open(options: PlaybackOptions): void;
  write(chunk: AudioChunk): void;
  /** Silences output immediately and discards everything already queued. */
  flush(): void;
  stop(): Promise<void>;
  terminate(): void;
}
