import dicomParser from 'dicom-parser';
import fs from 'node:fs/promises';
import path from 'node:path';
import { InvalidInputError, MissingInputError, toErrorMessage } from '../errors';
import type { ScanInfo } from '../types/qc';
import { writeFileAtomic } from './fileStore';

export const SCAN_INFO_FILE = 'qc_info.txt';

// DICOM Tags
const TAGS = {
  AcquisitionDate: 'x00080022',
  DeviceSerialNumber: 'x00181000',
  ImagingFrequency: 'x00180084',
  RepetitionTime: 'x00180080',
} as const;

const KEYS = {
  scannerSerial: 'scanner_serial',
  acquisitionDate: 'acq_date',
  rfFrequencyMHz: 'scanner_freq',
  repetitionTimeMs: 'tr_ms',
  volumeCount: 'num_volumes',
} as const;

function getText(dataSet: dicomParser.DataSet, tag: string): string {
  return (dataSet.string(tag) || '').trim();
}

function getNumber(dataSet: dicomParser.DataSet, tag: string): number {
  const vr = dataSet.elements?.[tag]?.vr;
  const typed = vr === 'IS' ? dataSet.intString(tag, 0) : dataSet.floatString(tag, 0);
  if (typeof typed === 'number' && Number.isFinite(typed)) return typed;

  const str = dataSet.string(tag, 0);
  if (!str) return NaN;
  // Multi-valued strings: take the first value.
  const first = str.includes('\\') ? str.split('\\')[0] : str;
  return parseFloat(first);
}

/**
 * Scan metadata from one DICOM file of the series. The volume count comes
 * from the converted 4D image, not the header.
 */
export function scanInfoFromDicom(bytes: Uint8Array, volumeCount: number): ScanInfo {
  let dataSet: dicomParser.DataSet;
  try {
    dataSet = dicomParser.parseDicom(bytes);
  } catch (err) {
    throw new InvalidInputError(`scanInfoFromDicom: not a readable DICOM file (${toErrorMessage(err)})`);
  }

  return {
    scannerSerial: getText(dataSet, TAGS.DeviceSerialNumber) || 'unknown',
    acquisitionDate: getText(dataSet, TAGS.AcquisitionDate),
    rfFrequencyMHz: getNumber(dataSet, TAGS.ImagingFrequency),
    repetitionTimeMs: getNumber(dataSet, TAGS.RepetitionTime),
    volumeCount,
  };
}

/**
 * Read scan metadata from the first parseable DICOM file in a directory (sorted by name).
 */
export async function readScanInfoFromDicomDir(dicomDir: string, volumeCount: number): Promise<ScanInfo> {
  let names: string[];
  try {
    names = (await fs.readdir(dicomDir, { withFileTypes: true }))
      .filter((e) => e.isFile() && !e.name.startsWith('.'))
      .map((e) => e.name)
      .sort();
  } catch {
    throw new MissingInputError(`DICOM directory not found: ${dicomDir}`, dicomDir);
  }

  let lastError: unknown = null;
  for (const name of names) {
    const bytes = await fs.readFile(path.join(dicomDir, name));
    try {
      return scanInfoFromDicom(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength), volumeCount);
    } catch (err) {
      if (!(err instanceof InvalidInputError)) throw err;
      lastError = err;
    }
  }

  const reason = lastError ? ` (${toErrorMessage(lastError)})` : '';
  throw new MissingInputError(`No readable DICOM file in ${dicomDir}${reason}`, dicomDir);
}

export function formatScanInfo(info: ScanInfo): string {
  return (
    [
      `${KEYS.scannerSerial} ${info.scannerSerial}`,
      `${KEYS.acquisitionDate} ${info.acquisitionDate}`,
      `${KEYS.rfFrequencyMHz} ${info.rfFrequencyMHz}`,
      `${KEYS.repetitionTimeMs} ${info.repetitionTimeMs}`,
      `${KEYS.volumeCount} ${info.volumeCount}`,
    ].join('\n') + '\n'
  );
}

/**
 * Parse `key value` lines. Also accepts the older layout of five bare values
 * (serial, date, frequency, TR, volume count) separated by whitespace.
 */
export function parseScanInfo(text: string): ScanInfo {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

  const map = new Map<string, string>();
  for (const line of lines) {
    const m = /^([a-z_]+)\s+(.*)$/.exec(line);
    if (m) map.set(m[1], m[2].trim());
  }

  if (!map.has(KEYS.scannerSerial)) {
    const tokens = lines.join(' ').split(/\s+/);
    if (tokens.length !== 5) {
      throw new InvalidInputError(`parseScanInfo: expected key/value lines or 5 values (got ${tokens.length})`);
    }
    [KEYS.scannerSerial, KEYS.acquisitionDate, KEYS.rfFrequencyMHz, KEYS.repetitionTimeMs, KEYS.volumeCount].forEach(
      (key, i) => map.set(key, tokens[i])
    );
  }

  const num = (key: string): number => {
    const v = map.get(key);
    return v === undefined ? NaN : Number(v);
  };

  return {
    scannerSerial: map.get(KEYS.scannerSerial) ?? 'unknown',
    acquisitionDate: map.get(KEYS.acquisitionDate) ?? '',
    rfFrequencyMHz: num(KEYS.rfFrequencyMHz),
    repetitionTimeMs: num(KEYS.repetitionTimeMs),
    volumeCount: num(KEYS.volumeCount),
  };
}

export async function readScanInfo(qcDir: string): Promise<ScanInfo | null> {
  let text: string;
  try {
    text = await fs.readFile(path.join(qcDir, SCAN_INFO_FILE), 'utf8');
  } catch {
    return null;
  }
  return text.trim().length > 0 ? parseScanInfo(text) : null;
}

export async function writeScanInfo(qcDir: string, info: ScanInfo): Promise<void> {
  await writeFileAtomic(path.join(qcDir, SCAN_INFO_FILE), formatScanInfo(info));
}
