import { spawn, type ChildProcess } from 'node:child_process';
import { DeviceError, describeError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AudioRecorder, RealtimeStreamOptions } from './AudioRecorder';

const START_STABILITY_DELAY_MS = 300;
const BYTES_PER_SAMPLE = 2; // s16le mono

export interface FfmpegRecorderOptions {
  inputFormat: string;
  inputDevice: string;
  sampleRate: number;
  ffmpegBin?: string;
}

export const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant the terminal microphone access, then restart voxshell.';
  }

  if (/Input\/output error|No such file|device not found|could not find|Connection refused/i.test(detail)) {
    return 'Microphone input device is unavailable. Verify VOXSHELL_FFMPEG_FORMAT and VOXSHELL_FFMPEG_INPUT.';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

export const buildCaptureArgs = (options: FfmpegRecorderOptions): string[] => [
  '-hide_banner',
  '-loglevel',
  'error',
  '-f',
  options.inputFormat,
  '-i',
  options.inputDevice,
  '-ac',
  '1',
  '-ar',
  String(options.sampleRate),
  '-f',
  's16le',
  '-acodec',
  'pcm_s16le',
  'pipe:1'
];

export class FfmpegRecorder implements AudioRecorder {
  private process: ChildProcess | undefined;
  private stopping = false;
  private pendingChunks: Buffer[] = [];
  private pendingChunkOffset = 0;
  private pendingBytes = 0;
  private chunkByteSize = 0;
  private onChunk: ((chunk: Buffer) => void) | undefined;
  private onError: ((error: DeviceError) => void) | undefined;

  public constructor(
    private readonly options: FfmpegRecorderOptions,
    private readonly logger?: StructuredLogger
  ) {}

  public async startStreaming(options: RealtimeStreamOptions): Promise<void> {
    if (this.process) {
      throw new DeviceError('capture', 'Recorder is already active');
    }

    if (options.chunkDurationMs < 10 || options.chunkDurationMs > 2000) {
      throw new DeviceError('capture', 'chunkDurationMs must be between 10 and 2000.');
    }

    this.onChunk = options.onChunk;
    this.onError = options.onError;
    this.stopping = false;
    this.resetPending();
    this.chunkByteSize = Math.max(
      BYTES_PER_SAMPLE,
      Math.floor((this.options.sampleRate * BYTES_PER_SAMPLE * options.chunkDurationMs) / 1000)
    );

    const ffmpeg = spawn(this.options.ffmpegBin ?? 'ffmpeg', buildCaptureArgs(this.options), {
      stdio: ['ignore', 'pipe', 'pipe']
    });
    let stderrLog = '';
    let settled = false;

    ffmpeg.on('close', (code) => {
      if (this.process !== ffmpeg) {
        return;
      }

      this.process = undefined;
      if (this.stopping) {
        return;
      }

      const error = new DeviceError('capture', normalizeMicError(`${stderrLog}\nexit code=${code}`));
      this.logger?.error('Recorder exited unexpectedly', { code, detail: error.message });
      this.onError?.(error);
    });

    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.stdout.on('data', (chunk: Buffer) => {
      this.handleAudioData(chunk);
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new DeviceError('capture', normalizeMicError(error.message), { cause: error }));
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(new DeviceError('capture', normalizeMicError(stderrLog)));
            return;
          }

          this.process = ffmpeg;
          settled = true;
          resolve();
        }, START_STABILITY_DELAY_MS);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new DeviceError('capture', normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      });
    });

    this.logger?.info('Recorder started (stream mode)', {
      inputFormat: this.options.inputFormat,
      inputDevice: this.options.inputDevice,
      sampleRate: this.options.sampleRate,
      chunkByteSize: this.chunkByteSize
    });
  }

  public async stop(): Promise<void> {
    const current = this.process;
    if (!current) {
      return;
    }

    this.stopping = true;
    await new Promise<void>((resolve, reject) => {
      current.once('close', (code) => {
        this.process = undefined;
        if (code === 0 || code === 255 || code === null) {
          resolve();
          return;
        }

        reject(new DeviceError('capture', `ffmpeg exited with code ${code}`));
      });

      current.once('error', (error) => {
        this.process = undefined;
        reject(new DeviceError('capture', error.message, { cause: error }));
      });

      current.kill('SIGINT');
    });

    this.flushPendingTailChunk();
    this.resetPending();
    this.onChunk = undefined;
    this.onError = undefined;

    this.logger?.info('Recorder stopped');
  }

  public terminate(): void {
    const current = this.process;
    this.stopping = true;
    this.process = undefined;
    this.onChunk = undefined;
    this.onError = undefined;
    this.resetPending();

    if (current && current.exitCode === null) {
      current.kill('SIGKILL');
      this.logger?.warn('Recorder terminated', { pid: current.pid });
    }
  }

  private resetPending(): void {
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
  }

  private handleAudioData(chunk: Buffer): void {
    if (!this.onChunk || chunk.length === 0 || this.chunkByteSize <= 0) {
      return;
    }

    this.pendingChunks.push(Buffer.from(chunk));
    this.pendingBytes += chunk.length;

    while (this.pendingBytes >= this.chunkByteSize) {
      const nextChunk = this.readPendingBytes(this.chunkByteSize);
      if (!nextChunk) {
        break;
      }

      this.emitChunk(nextChunk);
    }
  }

  private flushPendingTailChunk(): void {
    if (!this.onChunk || this.pendingBytes < Math.floor(this.chunkByteSize / 2)) {
      return;
    }

    // Keep whole samples only.
    const tail = this.readPendingBytes(this.pendingBytes - (this.pendingBytes % BYTES_PER_SAMPLE));
    if (tail) {
      this.emitChunk(tail);
    }
  }

  private emitChunk(chunk: Buffer): void {
    try {
      this.onChunk?.(chunk);
    } catch (error) {
      this.logger?.warn('Recorder chunk callback failed', { detail: describeError(error) });
    }
  }

  private readPendingBytes(byteCount: number): Buffer | undefined {
    if (byteCount <= 0 || byteCount > this.pendingBytes) {
      return undefined;
    }

    const output = Buffer.allocUnsafe(byteCount);
    let writeOffset = 0;

    while (writeOffset < byteCount) {
      const head = this.pendingChunks[0];
      if (!head) {
        break;
      }

      const available = head.length - this.pendingChunkOffset;
      const toCopy = Math.min(available, byteCount - writeOffset);
      head.copy(output, writeOffset, this.pendingChunkOffset, this.pendingChunkOffset + toCopy);

      writeOffset += toCopy;
      this.pendingChunkOffset += toCopy;
      this.pendingBytes -= toCopy;

      if (this.pendingChunkOffset >= head.length) {
        this.pendingChunks.shift();
        this.pendingChunkOffset = 0;
      }
    }

    return writeOffset === byteCount ? output : output.subarray(0, writeOffset);
  }
}
