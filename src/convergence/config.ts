// src/convergence/config.ts — validated, frozen options for one convergence run.
import { z } from 'zod';
import type { ConvergenceTarget } from './types.js';
import { LabError, LabErrorCode } from '../shared/errors.js';
import { deepFreeze } from '../config/loader.js';

const convergenceOptionsSchema = z
  .object({
    devices: z.array(z.string().min(1)).min(1, 'device list is empty'),
    metrics: z.array(z.string().min(1)).min(1, 'metric list is empty'),
    durationSeconds: z.number().positive(),
    intervalSeconds: z.number().positive(),
    startValues: z.array(z.number().int().nonnegative()).optional(),
    endValues: z.array(z.number().int().nonnegative()).optional(),
  })
  .superRefine((opts, ctx) => {
    const { startValues, endValues, metrics } = opts;
    if ((startValues === undefined) !== (endValues === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'start and end values must be given together' });
      return;
    }
    if (startValues === undefined || endValues === undefined) return;
    if (startValues.length !== metrics.length || endValues.length !== metrics.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected ${metrics.length} start and end values (one per metric)`,
      });
      return;
    }
    startValues.forEach((start, i) => {
      if (endValues[i] <= start) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['endValues', i],
          message: `end value ${endValues[i]} must be greater than start value ${start} for ${metrics[i]}`,
        });
      }
    });
  });

export type ConvergenceOptions = z.infer<typeof convergenceOptionsSchema>;

export interface ConvergenceConfig {
  readonly devices: readonly string[];
  readonly metrics: readonly string[];
  readonly durationSeconds: number;
  readonly intervalSeconds: number;
  /** Empty when no thresholds were requested. */
  readonly targets: readonly ConvergenceTarget[];
}

/** Throws CONFIG_INVALID before any sampling can start. */
export function buildConvergenceConfig(input: ConvergenceOptions): ConvergenceConfig {
  const parsed = convergenceOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new LabError(LabErrorCode.CONFIG_INVALID, `Invalid convergence options: ${issues.join('; ')}`, { issues });
  }
  const { devices, metrics, durationSeconds, intervalSeconds, startValues, endValues } = parsed.data;
  const targets: ConvergenceTarget[] =
    startValues && endValues
      ? metrics.map((metric, i) => ({ metric, startValue: startValues[i], endValue: endValues[i] }))
      : [];
  return deepFreeze({ devices, metrics, durationSeconds, intervalSeconds, targets });
}

/** Parses "5000, 10000" style CLI lists. */
export function parseIntegerList(raw: string, label: string): number[] {
  return raw.split(',').map((part) => {
    const trimmed = part.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new LabError(LabErrorCode.CONFIG_INVALID, `${label} must be comma-separated integers, got "${raw}"`);
    }
    return Number(trimmed);
  });
}
