import type { QcMetricRecord, ScanInfo } from '../types/qc';

export const SUMMARY_FILE = 'qc_summary.txt';

/** Keys that carry scan metadata rather than metrics. */
export const SUMMARY_INFO_KEYS = [
  'scanner_serial',
  'acq_date',
  'analysis_date',
  'scanner_freq',
  'tr_ms',
  'num_volumes',
] as const;

const INFO_KEY_SET: ReadonlySet<string> = new Set(SUMMARY_INFO_KEYS);

/** Older summaries used these metric names. */
export const LEGACY_METRIC_KEYS: ReadonlyMap<string, string> = new Map([
  ['tmean_nyquist', 'tmean_ghost'],
  ['tsd_nyquist', 'tsd_ghost'],
  ['max_adx', 'max_abs_dx'],
  ['max_ady', 'max_abs_dy'],
  ['max_adz', 'max_abs_dz'],
  ['spikes_nyquist', 'spikes_ghost'],
]);

export function formatMetricValue(v: number): string {
  return Number.isFinite(v) ? v.toFixed(6) : 'NaN';
}

/** YYYYMMDD in local time. */
export function formatYyyymmdd(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

/**
 * One `key value` line per entry: scan metadata first (when known), then every metric.
 */
export function formatSummary(params: {
  metrics: QcMetricRecord;
  scanInfo?: ScanInfo | null;
  analysisDate: Date;
}): string {
  const lines: string[] = [];
  const info = params.scanInfo;
  if (info) {
    lines.push(
      `scanner_serial ${info.scannerSerial}`,
      `acq_date ${info.acquisitionDate}`,
      `analysis_date ${formatYyyymmdd(params.analysisDate)}`,
      `scanner_freq ${info.rfFrequencyMHz}`,
      `tr_ms ${info.repetitionTimeMs}`,
      `num_volumes ${info.volumeCount}`
    );
  }
  for (const m of params.metrics) {
    lines.push(`${m.name} ${formatMetricValue(m.value)}`);
  }
  return lines.join('\n') + '\n';
}

export type ParsedSummary = {
  info: Map<string, string>;
  /** Metric values keyed by current metric name; legacy names are mapped. */
  metrics: Map<string, number>;
};

export function parseSummary(text: string): ParsedSummary {
  const info = new Map<string, string>();
  const metrics = new Map<string, number>();

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    const m = /^(\S+)\s+(\S.*)$/.exec(line);
    if (!m) continue;
    const [, key, value] = m;

    if (INFO_KEY_SET.has(key)) {
      info.set(key, value.trim());
      continue;
    }

    const name = LEGACY_METRIC_KEYS.get(key) ?? key;
    metrics.set(name, value.trim() === 'NaN' ? NaN : Number(value));
  }

  return { info, metrics };
}
