// src/convergence/analyzer.ts — first-crossing threshold scan over a frozen Series.
// Pure: no I/O, no clock. Same series and thresholds always give an equal result.
import type { ConvergenceResult, ConvergenceTarget, Series } from './types.js';

export const SUB_TICK_NOTE = 'rate undefined (sub-tick convergence)';

export function analyze(series: Series, metric: string, startValue: number, endValue: number): ConvergenceResult {
  const base = { metric, startValue, endValue };

  if (endValue <= startValue) {
    return Object.freeze({ ...base, status: 'invalid-range' as const });
  }

  // Samples where this metric was not reported are skipped, not read as zero.
  const points = series.samples.flatMap((s) => {
    const value = s.values[metric];
    return value === undefined ? [] : [{ t: s.elapsedSeconds, value }];
  });

  const startIdx = points.findIndex((p) => p.value >= startValue);
  if (startIdx === -1) {
    return Object.freeze({ ...base, status: 'start-not-reached' as const });
  }
  const startTime = points[startIdx].t;

  const endIdx = points.findIndex((p, i) => i >= startIdx && p.value >= endValue);
  if (endIdx === -1) {
    return Object.freeze({ ...base, startTime, status: 'end-not-reached' as const });
  }
  const endTime = points[endIdx].t;
  const convergenceTime = endTime - startTime;

  if (convergenceTime > 0) {
    return Object.freeze({
      ...base,
      startTime,
      endTime,
      convergenceTime,
      rate: (endValue - startValue) / convergenceTime,
      status: 'found' as const,
    });
  }
  return Object.freeze({ ...base, startTime, endTime, convergenceTime, status: 'found' as const, note: SUB_TICK_NOTE });
}

export function analyzeAll(series: Series, targets: readonly ConvergenceTarget[]): ConvergenceResult[] {
  return targets.map((t) => analyze(series, t.metric, t.startValue, t.endValue));
}
