export interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export type TurnOutcome = 'completed' | 'cancelled' | 'timed_out';

export interface TurnLatencySample {
  outcome: TurnOutcome;
  /** Commit (or text submission) to the first audible delta; absent when none arrived. */
  firstAudioMs?: number;
  durationMs: number;
}

export interface TurnLatencySummary {
  turns: number;
  completed: number;
  cancelled: number;
  timedOut: number;
  firstAudioMs: PercentileSummary;
  durationMs: PercentileSummary;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

export class TurnLatencyTracker {
  private samples: TurnLatencySample[] = [];

  public reset(): void {
    this.samples = [];
  }

  public push(sample: TurnLatencySample): void {
    this.samples.push(sample);
  }

  public summarize(): TurnLatencySummary {
    const count = (outcome: TurnOutcome): number =>
      this.samples.filter((sample) => sample.outcome === outcome).length;

    return {
      turns: this.samples.length,
      completed: count('completed'),
      cancelled: count('cancelled'),
      timedOut: count('timed_out'),
      firstAudioMs: asSummary(
        this.samples.flatMap((sample) => (sample.firstAudioMs === undefined ? [] : [sample.firstAudioMs]))
      ),
      durationMs: asSummary(this.samples.map((sample) => sample.durationMs))
    };
  }
}
