import { z } from 'zod';
import { ConfigurationError } from '../../errors';
import type { QcCheck, QcLimit, QcMetricRecord } from '../../types/qc';

export const METRIC_NOT_COMPUTED = 'metric not computed';

/**
 * Acceptance limits reported on the phantom QC page.
 *
 * Bounds are inclusive. Displacements are in microns, centre of mass in mm.
 */
export const DEFAULT_QC_LIMITS: readonly QcLimit[] = [
  { name: 'tmean_phantom', label: 'Mean Signal', lower: 550, upper: 1000 },
  { name: 'tmean_ghost', label: 'Mean Nyquist', lower: 0, upper: 50 },
  { name: 'tmean_noise', label: 'Mean Noise', lower: 0, upper: 30 },
  { name: 'tsd_phantom', label: 'SD Signal', lower: 0, upper: 1 },
  { name: 'tsd_ghost', label: 'SD Nyquist', lower: 0, upper: 1 },
  { name: 'tsd_noise', label: 'SD Noise', lower: 0, upper: 0.1 },
  { name: 'tmean_snr', label: 'Mean SNR', lower: 25, upper: 100 },
  { name: 'sig_drift_perc', label: 'Signal Drift (%)', lower: 0, upper: 10 },
  { name: 'com_mean_x', label: 'CofM x (mm)', lower: -20, upper: 20 },
  { name: 'com_mean_y', label: 'CofM y (mm)', lower: -20, upper: 20 },
  { name: 'com_mean_z', label: 'CofM z (mm)', lower: -20, upper: 20 },
  { name: 'max_abs_dx', label: 'Max abs dx (um)', lower: 0, upper: 1000 },
  { name: 'max_abs_dy', label: 'Max abs dy (um)', lower: 0, upper: 1000 },
  { name: 'max_abs_dz', label: 'Max abs dz (um)', lower: 0, upper: 1000 },
];

/**
 * Pass/fail per metric that has a limit. Metrics without a limit are skipped.
 * A limit whose metric is absent from the record fails as not computed,
 * after the checks that follow record order.
 *
 * NaN (inconclusive) always fails.
 */
export function evaluateQcLimits(record: QcMetricRecord, limits: readonly QcLimit[] = DEFAULT_QC_LIMITS): QcCheck[] {
  const byName = new Map(limits.map((l) => [l.name, l]));
  const checks: QcCheck[] = [];
  const seen = new Set<string>();

  for (const metric of record) {
    const limit = byName.get(metric.name);
    if (!limit) continue;
    seen.add(metric.name);

    const pass = !Number.isNaN(metric.value) && metric.value >= limit.lower && metric.value <= limit.upper;
    const check: QcCheck = { ...limit, value: metric.value, status: pass ? 'pass' : 'fail' };
    if (metric.inconclusive) check.inconclusive = metric.inconclusive;
    checks.push(check);
  }

  for (const limit of limits) {
    if (seen.has(limit.name)) continue;
    seen.add(limit.name);
    checks.push({ ...limit, value: NaN, status: 'fail', inconclusive: METRIC_NOT_COMPUTED });
  }

  return checks;
}

const limitEntrySchema = z
  .object({
    name: z.string().min(1),
    label: z.string().min(1).optional(),
    lower: z.number(),
    upper: z.number(),
  })
  .refine((l) => l.lower <= l.upper, { message: 'lower must not exceed upper' });

export const qcLimitsFileSchema = z.array(limitEntrySchema);

export type QcLimitsFileEntry = z.infer<typeof limitEntrySchema>;

/**
 * Apply overrides on top of a base table. Known names keep their position (and
 * their label unless one is given); new names are appended.
 */
export function mergeQcLimits(base: readonly QcLimit[], overrides: readonly QcLimitsFileEntry[]): QcLimit[] {
  const merged = base.map((l) => ({ ...l }));
  for (const o of overrides) {
    const existing = merged.find((l) => l.name === o.name);
    if (existing) {
      existing.lower = o.lower;
      existing.upper = o.upper;
      if (o.label) existing.label = o.label;
    } else {
      merged.push({ name: o.name, label: o.label ?? o.name, lower: o.lower, upper: o.upper });
    }
  }
  return merged;
}

/**
 * Parse a limits file (JSON array of `{ name, label?, lower, upper }`) and merge it over the defaults.
 */
export function parseQcLimitsJson(text: string, source = 'limits file'): QcLimit[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`${source}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const parsed = qcLimitsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigurationError(`${source}: ${issue?.message ?? 'invalid limits'}${where}`);
  }

  return mergeQcLimits(DEFAULT_QC_LIMITS, parsed.data);
}

function formatNumber(v: number): string {
  return Number.isFinite(v) ? v.toFixed(6) : 'NaN';
}

function formatBound(v: number): string {
  return String(v);
}

/** Tab-separated table with a header row; result column is PASS or FAIL. */
export function formatChecksTsv(checks: readonly QcCheck[]): string {
  const lines = ['name\tlabel\tvalue\tlower\tupper\tresult'];
  for (const c of checks) {
    lines.push(
      [c.name, c.label, formatNumber(c.value), formatBound(c.lower), formatBound(c.upper), c.status.toUpperCase()].join('\t')
    );
  }
  return lines.join('\n') + '\n';
}

export function failedChecks(checks: readonly QcCheck[]): QcCheck[] {
  return checks.filter((c) => c.status === 'fail');
}
