import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidInputError, MissingInputError } from '../src/errors';
import {
  formatScanInfo,
  parseScanInfo,
  readScanInfo,
  readScanInfoFromDicomDir,
  scanInfoFromDicom,
  writeScanInfo,
} from '../src/services/scanInfo';
import type { ScanInfo } from '../src/types/qc';
import { buildDicomFile, PHANTOM_SCAN_ELEMENTS } from './helpers/dicomFixture';

const info: ScanInfo = {
  scannerSerial: 'SN-4242',
  acquisitionDate: '20240315',
  rfFrequencyMHz: 123.2582,
  repetitionTimeMs: 2000,
  volumeCount: 50,
};

describe('scan info text', () => {
  it('writes key/value lines', () => {
    expect(formatScanInfo(info)).toBe(
      'scanner_serial SN-4242\nacq_date 20240315\nscanner_freq 123.2582\ntr_ms 2000\nnum_volumes 50\n'
    );
  });

  it('reads back what it writes', () => {
    expect(parseScanInfo(formatScanInfo(info))).toEqual(info);
  });

  it('accepts the older five-value layout', () => {
    expect(parseScanInfo('12345\n20240315\n123.2582\n2000\n50\n')).toEqual({ ...info, scannerSerial: '12345' });
  });

  it('rejects anything else', () => {
    expect(() => parseScanInfo('12345 20240315\n')).toThrow(InvalidInputError);
  });
});

describe('scanInfoFromDicom', () => {
  it('reads serial, date, frequency and TR from the header', () => {
    expect(scanInfoFromDicom(buildDicomFile(PHANTOM_SCAN_ELEMENTS), 50)).toEqual(info);
  });

  it('rejects bytes that are not DICOM', () => {
    expect(() => scanInfoFromDicom(new Uint8Array([1, 2, 3, 4]), 50)).toThrow(InvalidInputError);
  });
});

describe('scan info files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'qc-scaninfo-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns null when no info file exists', async () => {
    expect(await readScanInfo(dir)).toBeNull();
  });

  it('round-trips through qc_info.txt', async () => {
    await writeScanInfo(dir, info);
    expect(await readScanInfo(dir)).toEqual(info);
  });

  it('skips unreadable files in a DICOM directory', async () => {
    const dicomDir = path.join(dir, 'dicom');
    await fs.mkdir(dicomDir);
    await fs.writeFile(path.join(dicomDir, 'IM0000'), 'not an image');
    await fs.writeFile(path.join(dicomDir, 'IM0001'), buildDicomFile(PHANTOM_SCAN_ELEMENTS));

    expect(await readScanInfoFromDicomDir(dicomDir, 50)).toEqual(info);
  });

  it('reports a missing DICOM directory', async () => {
    await expect(readScanInfoFromDicomDir(path.join(dir, 'dicom'), 50)).rejects.toBeInstanceOf(MissingInputError);
  });
});
