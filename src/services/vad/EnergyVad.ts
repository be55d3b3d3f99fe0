import type { VadSensitivity } from '../../types';

export type VadTransition = 'speech_started' | 'speech_stopped';

export interface EnergyVadOptions extends VadSensitivity {
  sampleRate: number;
  windowFrames?: number;
}

const SILENCE_FLOOR_DBFS = -120;
const BYTES_PER_SAMPLE = 2; // s16le mono
const DEFAULT_WINDOW_FRAMES = 3;

export const frameMeanSquare = (audio: Buffer): number => {
  let sumSquares = 0;
  let sampleCount = 0;
  for (let index = 0; index + 1 < audio.length; index += BYTES_PER_SAMPLE) {
    const sample = audio.readInt16LE(index) / 32768;
    sumSquares += sample * sample;
    sampleCount += 1;
  }

  return sampleCount === 0 ? 0 : sumSquares / sampleCount;
};

export const meanSquareToDbfs = (meanSquare: number): number => {
  if (meanSquare <= 0) {
    return SILENCE_FLOOR_DBFS;
  }

  return Math.max(SILENCE_FLOOR_DBFS, 10 * Math.log10(meanSquare));
};

export const estimateDbfs = (audio: Buffer): number => meanSquareToDbfs(frameMeanSquare(audio));

/**
 * Energy detector with hysteresis: speech starts when the windowed level
 * reaches `enterDbfs` and stops once it has stayed below `exitDbfs` for
 * `hangoverMs`. Levels between the two thresholds keep the current state.
 */
export class EnergyVad {
  private readonly energies: number[] = [];
  private readonly windowFrames: number;
  private speaking = false;
  private silenceMs = 0;
  private lastLevelDbfs = SILENCE_FLOOR_DBFS;

  public constructor(private readonly options: EnergyVadOptions) {
    if (options.exitDbfs > options.enterDbfs) {
      throw new Error('exitDbfs must not exceed enterDbfs.');
    }

    this.windowFrames = Math.max(1, options.windowFrames ?? DEFAULT_WINDOW_FRAMES);
  }

  public push(frame: Buffer): VadTransition | undefined {
    if (frame.length < BYTES_PER_SAMPLE) {
      return undefined;
    }

    this.energies.push(frameMeanSquare(frame));
    if (this.energies.length > this.windowFrames) {
      this.energies.shift();
    }

    const windowEnergy = this.energies.reduce((sum, value) => sum + value, 0) / this.energies.length;
    const level = meanSquareToDbfs(windowEnergy);
    this.lastLevelDbfs = level;

    if (!this.speaking) {
      if (level < this.options.enterDbfs) {
        return undefined;
      }

      this.speaking = true;
      this.silenceMs = 0;
      return 'speech_started';
    }

    if (level >= this.options.exitDbfs) {
      this.silenceMs = 0;
      return undefined;
    }

    this.silenceMs += this.frameDurationMs(frame);
    if (this.silenceMs < this.options.hangoverMs) {
      return undefined;
    }

    this.speaking = false;
    this.silenceMs = 0;
    return 'speech_stopped';
  }

  public isSpeaking(): boolean {
    return this.speaking;
  }

  public getLevelDbfs(): number {
    return this.lastLevelDbfs;
  }

  public reset(): void {
    this.energies.length = 0;
    this.speaking = false;
    this.silenceMs = 0;
    this.lastLevelDbfs = SILENCE_FLOOR_DBFS;
  }

  private frameDurationMs(frame: Buffer): number {
    return (frame.length / (BYTES_PER_SAMPLE * this.options.sampleRate)) * 1000;
  }
}
