import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { DeviceError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AudioChunk } from '../../types';
import type { AudioPlayer, PlaybackOptions } from './AudioPlayer';

export type PlaybackTool = 'ffplay' | 'play' | 'sox';

const STDERR_LIMIT = 4000;

export const buildPlaybackCommand = (tool: PlaybackTool, sampleRate: number): string[] => {
  if (tool === 'ffplay') {
    return [
      'ffplay',
      '-nodisp',
      '-autoexit',
      '-hide_banner',
      '-loglevel',
      'error',
      '-fflags',
      'nobuffer',
      '-flags',
      'low_delay',
      '-f',
      's16le',
      '-ar',
      String(sampleRate),
      '-ac',
      '1',
      '-'
    ];
  }

  const rawInput = ['-q', '-t', 'raw', '-r', String(sampleRate), '-e', 'signed-integer', '-b', '16', '-c', '1', '-'];
  return tool === 'sox' ? ['sox', ...rawInput, '-d'] : ['play', ...rawInput];
};

export interface ProcessAudioPlayerOptions {
  tool: PlaybackTool;
  sampleRate: number;
}

/**
 * Streams PCM16 into a player child process spawned on first write. A flush
 * kills the current child so nothing it buffered reaches the speaker; the
 * next write starts a fresh one.
 */
export class ProcessAudioPlayer implements AudioPlayer {
  private current: ChildProcessWithoutNullStreams | undefined;
  private readonly retiring = new Set<ChildProcessWithoutNullStreams>();
  private onError: ((error: DeviceError) => void) | undefined;

  public constructor(
    private readonly options: ProcessAudioPlayerOptions,
    private readonly logger?: StructuredLogger
  ) {}

  public open(options: PlaybackOptions): void {
    this.onError = options.onError;
  }

  public write(chunk: AudioChunk): void {
    if (chunk.data.length === 0) {
      return;
    }

    const player = this.current ?? this.spawnPlayer();
    if (!player.stdin.writable) {
      return;
    }

    player.stdin.write(chunk.data);
  }

  public flush(): void {
    const player = this.current;
    if (!player) {
      return;
    }

    this.current = undefined;
    this.retire(player);
    this.logger?.debug('Playback flushed', { pid: player.pid });
  }

  public async stop(): Promise<void> {
    this.flush();
    this.onError = undefined;

    await Promise.all(
      [...this.retiring].map(
        (player) =>
          new Promise<void>((resolve) => {
            if (player.exitCode !== null || player.signalCode !== null) {
              this.retiring.delete(player);
              resolve();
              return;
            }

            player.once('close', () => {
              resolve();
            });
          })
      )
    );
  }

  public terminate(): void {
    const players = [...this.retiring];
    if (this.current) {
      players.push(this.current);
    }

    this.current = undefined;
    this.onError = undefined;
    this.retiring.clear();

    for (const player of players) {
      if (player.exitCode === null) {
        player.kill('SIGKILL');
      }
    }
  }

  private retire(player: ChildProcessWithoutNullStreams): void {
    this.retiring.add(player);
    player.stdin.destroy();
    player.kill('SIGKILL');
  }

  private spawnPlayer(): ChildProcessWithoutNullStreams {
    const [command, ...args] = buildPlaybackCommand(this.options.tool, this.options.sampleRate);
    const player = spawn(command, args, { stdio: 'pipe' });
    let stderrLog = '';

    this.current = player;
    this.logger?.debug('Playback process started', { tool: this.options.tool, pid: player.pid });

    player.stderr.on('data', (chunk: Buffer) => {
      if (stderrLog.length < STDERR_LIMIT) {
        stderrLog += chunk.toString();
      }
    });

    // EPIPE after a flush or crash surfaces through 'close' below.
    player.stdin.on('error', (error) => {
      this.logger?.debug('Playback stdin error', { detail: error.message });
    });

    player.on('error', (error) => {
      this.handleExit(player, `${error.message}`);
    });

    player.on('close', (code, signal) => {
      this.retiring.delete(player);
      if (code === 0 && this.current === player) {
        this.current = undefined;
        return;
      }

      this.handleExit(player, `${stderrLog.trim() || 'no output'} (code=${code}, signal=${signal})`);
    });

    return player;
  }

  private handleExit(player: ChildProcessWithoutNullStreams, detail: string): void {
    if (this.current !== player) {
      return;
    }

    this.current = undefined;
    const error = new DeviceError('playback', `Audio playback failed: ${detail}`);
    this.logger?.error('Playback process exited unexpectedly', { detail });
    this.onError?.(error);
  }
}
