// src/convergence/sampler.ts — fixed-cadence polling loop that records one Series per source.
// One coordinating loop owns the tick cadence; fetches within a tick fan out through a
// bounded pool under a single tick deadline. Only this loop appends to a Series.
import type { MetricValues, Sample, Series, TickGap } from './types.js';
import { mapSettled, type Settled } from '../shared/pool.js';
import { sleep, untilAborted } from '../shared/timing.js';
import { LabError, LabErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../logger.js';

export const DEFAULT_CONCURRENCY = 8;

/**
 * Returns the current metric values for one source, or rejects.
 * `signal` aborts when the tick deadline passes; the fetch should stop its work then.
 */
export type FetchFn<K extends string> = (source: K, signal: AbortSignal) => Promise<MetricValues>;

export interface TickReport {
  readonly tick: number;
  readonly elapsedSeconds: number;
  readonly succeeded: readonly string[];
  readonly failed: readonly { readonly source: string; readonly reason: string }[];
}

export interface SamplerOptions {
  durationSeconds: number;
  intervalSeconds: number;
  /**
   * Deadline for every fetch of a tick, measured from the tick start on real timers.
   * Fetches still queued in the pool at the deadline are not started. Defaults to the interval.
   */
  fetchTimeoutSeconds?: number;
  concurrency?: number;
  /** Operator early-stop. Checked at the top of every tick. */
  signal?: AbortSignal;
  /** Monotonic milliseconds. */
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onTick?: (report: TickReport) => void;
}

interface Recorder {
  samples: Sample[];
  gaps: TickGap[];
}

export async function collect<K extends string>(
  sources: readonly K[],
  fetch: FetchFn<K>,
  options: SamplerOptions,
): Promise<Map<K, Series>> {
  validateOptions(sources, options);

  const clock = options.clock ?? (() => performance.now());
  const wait = options.sleep ?? sleep;
  const durationMs = options.durationSeconds * 1000;
  const intervalMs = options.intervalSeconds * 1000;
  const timeoutMs = (options.fetchTimeoutSeconds ?? options.intervalSeconds) * 1000;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

  const unique = [...new Set(sources)];
  const recorders = new Map<K, Recorder>(unique.map((s) => [s, { samples: [], gaps: [] }]));

  const startedAt = clock();
  let tick = 0;

  while (!options.signal?.aborted) {
    const tickStart = clock();
    const elapsedMs = tickStart - startedAt;
    if (elapsedMs >= durationMs) break;
    const elapsedSeconds = elapsedMs / 1000;

    const settled = await fetchTick(unique, fetch, concurrency, timeoutMs);

    const succeeded: string[] = [];
    const failed: { source: string; reason: string }[] = [];
    settled.forEach((outcome, i) => {
      const source = unique[i];
      const recorder = recorders.get(source);
      if (!recorder) return;
      if (outcome.ok) {
        recorder.samples.push(Object.freeze({ elapsedSeconds, values: outcome.value }));
        succeeded.push(source);
      } else {
        const reason = errorMessage(outcome.error);
        recorder.gaps.push(Object.freeze({ tick, elapsedSeconds, reason }));
        failed.push({ source, reason });
        logger.debug({ source, tick, reason }, 'fetch failed');
      }
    });
    options.onTick?.({ tick, elapsedSeconds, succeeded, failed });

    tick++;
    await wait(Math.max(0, tickStart + intervalMs - clock()), options.signal);
  }

  if (options.signal?.aborted) {
    logger.info({ ticks: tick, elapsedSeconds: (clock() - startedAt) / 1000 }, 'collection stopped early');
  }

  const result = new Map<K, Series>();
  for (const [source, recorder] of recorders) {
    result.set(
      source,
      Object.freeze({
        source,
        samples: Object.freeze(recorder.samples),
        gaps: Object.freeze(recorder.gaps),
        ticks: tick,
      }),
    );
  }
  return result;
}

async function fetchTick<K extends string>(
  sources: readonly K[],
  fetch: FetchFn<K>,
  concurrency: number,
  timeoutMs: number,
): Promise<Settled<MetricValues>[]> {
  const deadline = new AbortController();
  const timer = setTimeout(() => deadline.abort(), timeoutMs);
  try {
    return await mapSettled(sources, concurrency, async (source) => {
      const timedOut = (): LabError =>
        new LabError(LabErrorCode.FETCH_TIMEOUT, `fetch ${source} timed out after ${timeoutMs}ms`, { timeoutMs });
      if (deadline.signal.aborted) throw timedOut();
      return checkValues(await untilAborted(fetch(source, deadline.signal), deadline.signal, timedOut));
    });
  } finally {
    clearTimeout(timer);
  }
}

function validateOptions(sources: readonly string[], options: SamplerOptions): void {
  const problems: string[] = [];
  if (sources.length === 0) problems.push('at least one source is required');
  if (!(options.durationSeconds > 0)) problems.push('duration must be greater than zero');
  if (!(options.intervalSeconds > 0)) problems.push('interval must be greater than zero');
  if (options.fetchTimeoutSeconds !== undefined && !(options.fetchTimeoutSeconds > 0)) {
    problems.push('fetch timeout must be greater than zero');
  }
  if (options.concurrency !== undefined && !(Number.isInteger(options.concurrency) && options.concurrency >= 1)) {
    problems.push('concurrency must be a positive integer');
  }
  if (problems.length > 0) {
    throw new LabError(LabErrorCode.CONFIG_INVALID, `Invalid sampler configuration: ${problems.join('; ')}`, {
      problems,
    });
  }
}

function checkValues(values: MetricValues): MetricValues {
  for (const [metric, value] of Object.entries(values)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new LabError(LabErrorCode.PARSE_FAILED, `metric ${metric} is not a count: ${value}`);
    }
  }
  return Object.freeze({ ...values });
}
