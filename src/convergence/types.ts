// src/convergence/types.ts

/** Metric name -> integer count, as returned by one successful fetch. */
export type MetricValues = Readonly<Record<string, number>>;

export interface Sample {
  /** Seconds since collection start, from a monotonic clock. */
  readonly elapsedSeconds: number;
  readonly values: MetricValues;
}

/** A tick at which the fetch for this source failed or timed out. */
export interface TickGap {
  readonly tick: number;
  readonly elapsedSeconds: number;
  readonly reason: string;
}

/**
 * Every sample recorded for one source during a collection run.
 * `samples` are ordered by non-decreasing elapsedSeconds; values may go down.
 */
export interface Series {
  readonly source: string;
  readonly samples: readonly Sample[];
  readonly gaps: readonly TickGap[];
  readonly ticks: number;
}

export type ConvergenceStatus = 'found' | 'start-not-reached' | 'end-not-reached' | 'invalid-range';

export interface ConvergenceResult {
  readonly metric: string;
  readonly startValue: number;
  readonly endValue: number;
  readonly startTime?: number;
  readonly endTime?: number;
  readonly convergenceTime?: number;
  readonly rate?: number;
  readonly status: ConvergenceStatus;
  readonly note?: string;
}

/** A (metric, start, end) triple to analyze once collection has finished. */
export interface ConvergenceTarget {
  readonly metric: string;
  readonly startValue: number;
  readonly endValue: number;
}
