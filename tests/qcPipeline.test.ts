import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DirectoryLockedError, InvalidInputError, MissingInputError } from '../src/errors';
import type { DicomConverter } from '../src/services/adapters/dicomConversion';
import { runQcDirectory } from '../src/services/qcPipeline';
import { writeScanInfo } from '../src/services/scanInfo';
import type { QcProgress } from '../src/types/qc';
import { metricValue } from '../src/utils/metrics/qcMetrics';
import { createVolume } from '../src/utils/volume/volume';
import { buildDicomFile, PHANTOM_SCAN_ELEMENTS } from './helpers/dicomFixture';
import { makeSphereSeries, makeZeroMotionCorrector, writeVolumeNii } from './helpers/syntheticPhantom';

const analysisDate = new Date(2024, 9, 18);

describe('runQcDirectory', () => {
  let root: string;
  let qcDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'qc-pipeline-'));
    qcDir = path.join(root, 'scanner-a', '20240315');
    await fs.mkdir(qcDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const readText = (name: string) => fs.readFile(path.join(qcDir, name), 'utf8');
  const exists = (name: string) =>
    fs.access(path.join(qcDir, name)).then(
      () => true,
      () => false
    );

  describe('synthetic sphere phantom', () => {
    beforeEach(async () => {
      // 30 mm sphere at 800 over a background of 5, 50 identical frames.
      await writeVolumeNii(path.join(qcDir, 'qc.nii'), makeSphereSeries());
      await writeScanInfo(qcDir, {
        scannerSerial: 'SN-4242',
        acquisitionDate: '20240315',
        rfFrequencyMHz: 123.2582,
        repetitionTimeMs: 2000,
        volumeCount: 50,
      });
    });

    it('produces the expected metrics and artifacts', async () => {
      const { corrector, correct } = makeZeroMotionCorrector(50);
      const progress: QcProgress[] = [];

      const result = await runQcDirectory(qcDir, {
        motionCorrector: corrector,
        now: () => analysisDate,
        onProgress: (p) => progress.push(p),
      });

      expect(correct).toHaveBeenCalledTimes(1);
      expect(correct.mock.calls[0][0]).toMatchObject({ referenceVolume: 0, outputStem: path.join(qcDir, 'qc_mcf') });

      expect(result.degenerate).toBeUndefined();
      expect(result.labelCounts).toEqual([4311, 2313, 6166, 25610]);

      const m = result.metrics;
      expect(metricValue(m, 'tmean_phantom')).toBe(800);
      expect(metricValue(m, 'tsd_phantom')).toBe(0);
      expect(metricValue(m, 'tmean_ghost')).toBe(5);
      expect(metricValue(m, 'tmean_noise')).toBe(5);
      expect(metricValue(m, 'tmean_snr')).toBe(160);
      expect(metricValue(m, 'sig_drift_perc')).toBe(0);
      expect(metricValue(m, 'max_abs_dx')).toBe(0);
      expect(metricValue(m, 'max_abs_dy')).toBe(0);
      expect(metricValue(m, 'max_abs_dz')).toBe(0);
      expect(metricValue(m, 'spikes_phantom')).toBe(0);

      const status = (name: string) => result.checks.find((c) => c.name === name)?.status;
      expect(status('tmean_phantom')).toBe('pass');
      expect(status('tmean_snr')).toBe('fail');
      expect(result.passed).toBe(false);

      for (const name of ['qc_mean.nii', 'qc_sd.nii', 'qc_mask.nii', 'qc_timeseries_detrend.txt', 'qc_checks.tsv']) {
        expect(await exists(name)).toBe(true);
      }
      expect(await exists('qc.lock')).toBe(false);

      const table = (await readText('qc_timeseries.txt')).split('\n');
      expect(table[0]).toBe('800 5 5');
      expect(table).toHaveLength(51);

      const summary = (await readText('qc_summary.txt')).split('\n');
      expect(summary.slice(0, 8)).toEqual([
        'scanner_serial SN-4242',
        'acq_date 20240315',
        'analysis_date 20241018',
        'scanner_freq 123.2582',
        'tr_ms 2000',
        'num_volumes 50',
        'tmean_phantom 800.000000',
        'tmean_ghost 5.000000',
      ]);

      expect(progress.map((p) => p.stage)).toContain('mask');
      expect(progress[progress.length - 1].stage).toBe('write');
    });

    it('reuses cached stages on a second run', async () => {
      const { corrector, correct } = makeZeroMotionCorrector(50);
      await runQcDirectory(qcDir, { motionCorrector: corrector, now: () => analysisDate });
      const firstSummary = await readText('qc_summary.txt');

      const second = await runQcDirectory(qcDir, { motionCorrector: corrector, now: () => analysisDate });

      expect(correct).toHaveBeenCalledTimes(1);
      expect(second.cachedStages).toEqual(['motion-correction', 'temporal-stats', 'mask', 'timeseries']);
      expect(second.labelCounts).toEqual([4311, 2313, 6166, 25610]);
      expect(await readText('qc_summary.txt')).toBe(firstSummary);
    });

    it('recomputes the mask when its options change', async () => {
      const { corrector } = makeZeroMotionCorrector(50);
      await runQcDirectory(qcDir, { motionCorrector: corrector });

      const rerun = await runQcDirectory(qcDir, { motionCorrector: corrector, mask: { kernelRadiusMm: 3 } });
      expect(rerun.cachedStages).toContain('temporal-stats');
      expect(rerun.cachedStages).not.toContain('mask');
    });

    it('ignores the cache when forced', async () => {
      const { corrector, correct } = makeZeroMotionCorrector(50);
      await runQcDirectory(qcDir, { motionCorrector: corrector });
      const forced = await runQcDirectory(qcDir, { motionCorrector: corrector, force: true });

      expect(correct).toHaveBeenCalledTimes(2);
      expect(forced.cachedStages).toEqual([]);
    });

    it('can summarise the detrended series', async () => {
      const { corrector } = makeZeroMotionCorrector(50);
      const result = await runQcDirectory(qcDir, { motionCorrector: corrector, metricsSource: 'detrended' });
      expect(metricValue(result.metrics, 'tmean_phantom')).toBeCloseTo(800, 3);
      expect(metricValue(result.metrics, 'tmean_snr')).toBeCloseTo(160, 3);
    });

    it('refuses a directory another run holds', async () => {
      await fs.writeFile(path.join(qcDir, 'qc.lock'), '');
      const { corrector, correct } = makeZeroMotionCorrector(50);

      await expect(runQcDirectory(qcDir, { motionCorrector: corrector })).rejects.toBeInstanceOf(DirectoryLockedError);
      expect(correct).not.toHaveBeenCalled();
      expect(await exists('qc_summary.txt')).toBe(false);
    });
  });

  it('writes the same summary from cached stages on non-round data', async () => {
    const drifting = makeSphereSeries({ nt: 20, outside: 5.123457, insideAt: (t) => 800.1234567 + 0.3333333 * t });
    await writeVolumeNii(path.join(qcDir, 'qc.nii'), drifting);
    const { corrector } = makeZeroMotionCorrector(20);

    await runQcDirectory(qcDir, { motionCorrector: corrector, now: () => analysisDate });
    const fresh = await readText('qc_summary.txt');

    const rerun = await runQcDirectory(qcDir, { motionCorrector: corrector, now: () => analysisDate });
    expect(rerun.cachedStages).toEqual(['motion-correction', 'temporal-stats', 'mask', 'timeseries']);
    expect(await readText('qc_summary.txt')).toBe(fresh);
  });

  it('rejects motion parameters that do not match the frame count', async () => {
    await writeVolumeNii(path.join(qcDir, 'qc.nii'), makeSphereSeries({ nt: 6 }));
    const { corrector } = makeZeroMotionCorrector(5);

    await expect(runQcDirectory(qcDir, { motionCorrector: corrector })).rejects.toThrow(InvalidInputError);
    await expect(runQcDirectory(qcDir, { motionCorrector: corrector })).rejects.toThrow(/has 5 rows but qc_mcf.nii has 6 frames/);
  });

  it('still writes a summary when the image has no signal', async () => {
    const zeros = createVolume({
      data: new Float32Array(8 * 8 * 4 * 3),
      dims: { nx: 8, ny: 8, nz: 4, nt: 3 },
      voxelSizeMm: [3, 3, 3],
    });
    await writeVolumeNii(path.join(qcDir, 'qc.nii'), zeros);
    const { corrector } = makeZeroMotionCorrector(3);

    const result = await runQcDirectory(qcDir, { motionCorrector: corrector });

    expect(result.degenerate).toMatch(/signal threshold/);
    expect(result.labelCounts).toBeUndefined();
    expect(metricValue(result.metrics, 'tmean_phantom')).toBeNaN();
    expect(result.checks.find((c) => c.name === 'tmean_phantom')?.status).toBe('fail');
    expect(await exists('qc_mask.nii')).toBe(false);
    expect(await exists('qc_timeseries.txt')).toBe(false);

    const summary = await readText('qc_summary.txt');
    expect(summary.split('\n')[0]).toBe('tmean_phantom NaN');
    expect(summary).toContain('\nmax_abs_dx 0.000000\n');
  });

  it('converts DICOM and derives scan info when no volume exists', async () => {
    const dicomDir = path.join(qcDir, 'dicom');
    await fs.mkdir(dicomDir);
    await fs.writeFile(path.join(dicomDir, 'IM0001'), buildDicomFile(PHANTOM_SCAN_ELEMENTS));

    const series = makeSphereSeries({ nx: 20, ny: 20, nz: 12, nt: 6, radiusMm: 15 });
    const convert = vi.fn(async ({ outputDir, outputStem }: { outputDir: string; outputStem: string }) => {
      const out = path.join(outputDir, `${outputStem}.nii`);
      await writeVolumeNii(out, series);
      return out;
    });
    const converter: DicomConverter = { convert };
    const { corrector } = makeZeroMotionCorrector(6);

    const result = await runQcDirectory(qcDir, { motionCorrector: corrector, dicomConverter: converter });

    expect(convert).toHaveBeenCalledWith({ dicomDir, outputDir: qcDir, outputStem: 'qc' });
    expect(result.scanInfo).toEqual({
      scannerSerial: 'SN-4242',
      acquisitionDate: '20240315',
      rfFrequencyMHz: 123.2582,
      repetitionTimeMs: 2000,
      volumeCount: 6,
    });
    expect(await readText('qc_info.txt')).toContain('num_volumes 6\n');
  });

  it('fails without a volume or DICOM directory', async () => {
    const { corrector } = makeZeroMotionCorrector(1);
    await expect(runQcDirectory(qcDir, { motionCorrector: corrector })).rejects.toBeInstanceOf(MissingInputError);
    expect(await exists('qc.lock')).toBe(false);
  });
});
