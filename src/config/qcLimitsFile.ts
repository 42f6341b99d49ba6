import fs from 'node:fs/promises';
import { ConfigurationError } from '../errors';
import type { QcLimit } from '../types/qc';
import { DEFAULT_QC_LIMITS, parseQcLimitsJson } from '../utils/metrics/qcLimits';

/** Defaults, overridden by the JSON limits file when one is configured. */
export async function loadQcLimits(limitsFile?: string): Promise<QcLimit[]> {
  if (!limitsFile) return DEFAULT_QC_LIMITS.map((l) => ({ ...l }));

  let text: string;
  try {
    text = await fs.readFile(limitsFile, 'utf8');
  } catch {
    throw new ConfigurationError(`Limits file not readable: ${limitsFile}`);
  }
  return parseQcLimitsJson(text, limitsFile);
}
