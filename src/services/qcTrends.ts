import fs from 'node:fs/promises';
import path from 'node:path';
import { MissingInputError } from '../errors';
import { writeFileAtomic } from './fileStore';
import { formatMetricValue, formatYyyymmdd, parseSummary, SUMMARY_FILE } from './qcSummary';

export const TRENDS_FILE = 'qc_trends.csv';

export type QcTrendRow = {
  /** YYYYMMDD, from the analysis directory name. */
  date: string;
  metrics: Map<string, number>;
};

export type CollectTrendsOptions = {
  /** Only dates within this many months before `now`. */
  sinceMonths?: number;
  now?: Date;
  /** Called for dated directories that have no readable summary. */
  onSkip?: (dir: string, reason: string) => void;
};

function isValidYyyymmdd(name: string): boolean {
  if (!/^\d{8}$/.test(name)) return false;
  const y = Number(name.slice(0, 4));
  const m = Number(name.slice(4, 6));
  const d = Number(name.slice(6, 8));
  const date = new Date(y, m - 1, d);
  return date.getFullYear() === y && date.getMonth() === m - 1 && date.getDate() === d;
}

/**
 * Gather the summaries of every `YYYYMMDD` directory of one scanner, oldest first.
 */
export async function collectQcTrends(scannerDir: string, options: CollectTrendsOptions = {}): Promise<QcTrendRow[]> {
  let entries: string[];
  try {
    entries = (await fs.readdir(scannerDir, { withFileTypes: true }))
      .filter((e) => e.isDirectory() && isValidYyyymmdd(e.name))
      .map((e) => e.name)
      .sort();
  } catch {
    throw new MissingInputError(`Scanner directory not found: ${scannerDir}`, scannerDir);
  }

  let cutoff: string | null = null;
  if (options.sinceMonths !== undefined) {
    const start = new Date(options.now ?? new Date());
    start.setMonth(start.getMonth() - options.sinceMonths);
    cutoff = formatYyyymmdd(start);
  }

  const rows: QcTrendRow[] = [];
  for (const date of entries) {
    if (cutoff && date < cutoff) continue;

    const summaryPath = path.join(scannerDir, date, SUMMARY_FILE);
    let text: string;
    try {
      text = await fs.readFile(summaryPath, 'utf8');
    } catch {
      options.onSkip?.(path.join(scannerDir, date), `no ${SUMMARY_FILE}`);
      continue;
    }

    const { metrics } = parseSummary(text);
    if (metrics.size === 0) {
      options.onSkip?.(path.join(scannerDir, date), 'summary has no metrics');
      continue;
    }
    rows.push({ date, metrics });
  }

  return rows;
}

/** CSV with a `date` column and one column per metric, in first-seen order; missing cells are empty. */
export function formatTrendsCsv(rows: readonly QcTrendRow[]): string {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const name of row.metrics.keys()) {
      if (!seen.has(name)) {
        seen.add(name);
        columns.push(name);
      }
    }
  }

  const lines = [['date', ...columns].join(',')];
  for (const row of rows) {
    const cells = columns.map((name) => {
      const v = row.metrics.get(name);
      return v === undefined ? '' : formatMetricValue(v);
    });
    lines.push([row.date, ...cells].join(','));
  }
  return lines.join('\n') + '\n';
}

export async function writeQcTrends(
  scannerDir: string,
  options: CollectTrendsOptions = {}
): Promise<{ path: string; rows: QcTrendRow[] }> {
  const rows = await collectQcTrends(scannerDir, options);
  const outPath = path.join(scannerDir, TRENDS_FILE);
  await writeFileAtomic(outPath, formatTrendsCsv(rows));
  return { path: outPath, rows };
}
