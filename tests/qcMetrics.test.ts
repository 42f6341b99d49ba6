import { describe, expect, it } from 'vitest';
import { DegenerateInputError, NumericInstabilityError } from '../src/errors';
import type { RoiTimeseries } from '../src/types/qc';
import { evaluateQcLimits } from '../src/utils/metrics/qcLimits';
import {
  centerOfMass,
  computeQcMetrics,
  frameAveragedSnr,
  maxAbsDisplacementMicrons,
  metricValue,
  signalDriftPercent,
  temporalMeanSd,
} from '../src/utils/metrics/qcMetrics';
import { detrendTimeseries } from '../src/utils/timeseries/detrend';
import { createVolume } from '../src/utils/volume/volume';

function constant(n: number, v: number): Float64Array {
  return new Float64Array(n).fill(v);
}

function timeseries(phantom: Float64Array, nyquist: Float64Array, noise: Float64Array): RoiTimeseries {
  return { frameCount: phantom.length, phantom, nyquist, noise };
}

describe('temporalMeanSd', () => {
  it('uses the population SD', () => {
    const { mean, sd } = temporalMeanSd([1, 2, 3, 4]);
    expect(mean).toBe(2.5);
    expect(sd).toBeCloseTo(Math.sqrt(1.25), 12);
  });

  it('treats an empty or NaN series as degenerate', () => {
    expect(() => temporalMeanSd([])).toThrow(DegenerateInputError);
    expect(() => temporalMeanSd([1, NaN])).toThrow(DegenerateInputError);
  });
});

describe('frameAveragedSnr', () => {
  it('averages the per-frame ratio', () => {
    expect(frameAveragedSnr(constant(20, 1000), constant(20, 10))).toBe(100);
    expect(frameAveragedSnr([100, 300], [10, 10])).toBe(20);
  });

  it('refuses a zero noise frame', () => {
    expect(() => frameAveragedSnr([100, 100], [10, 0])).toThrow(NumericInstabilityError);
  });
});

describe('signalDriftPercent', () => {
  it('is zero for a constant series', () => {
    expect(signalDriftPercent(constant(50, 800))).toBe(0);
  });

  it('is 200 (max - min) / (max + min)', () => {
    expect(signalDriftPercent([90, 100, 110])).toBe(20);
  });

  it('refuses a zero denominator', () => {
    expect(() => signalDriftPercent([0, 0])).toThrow(NumericInstabilityError);
  });
});

describe('centerOfMass', () => {
  it('weights voxel positions by intensity and maps them to world mm', () => {
    const volume = createVolume({
      data: new Float32Array([0, 0, 5]),
      dims: { nx: 3, ny: 1, nz: 1, nt: 1 },
      voxelSizeMm: [2, 1, 1],
      affine: [
        [2, 0, 0, -10],
        [0, 1, 0, 3],
        [0, 0, 1, 0],
      ],
    });
    expect(centerOfMass(volume)).toEqual([-6, 3, 0]);
  });

  it('balances equal weights', () => {
    const volume = createVolume({
      data: new Float32Array([4, 0, 0, 4]),
      dims: { nx: 4, ny: 1, nz: 1, nt: 1 },
      voxelSizeMm: [1, 1, 1],
    });
    expect(centerOfMass(volume)).toEqual([1.5, 0, 0]);
  });

  it('treats an empty image as degenerate', () => {
    const volume = createVolume({ data: new Float32Array(4), dims: { nx: 4, ny: 1, nz: 1, nt: 1 }, voxelSizeMm: [1, 1, 1] });
    expect(() => centerOfMass(volume)).toThrow(DegenerateInputError);
  });
});

describe('maxAbsDisplacementMicrons', () => {
  it('takes the largest absolute translation per axis in microns', () => {
    const [dx, dy, dz] = maxAbsDisplacementMicrons([
      [0, 0, 0, 0.1, -0.2, 0],
      [0.01, 0, 0, -0.15, 0.05, 0.3],
    ]);
    expect(dx).toBeCloseTo(150, 9);
    expect(dy).toBeCloseTo(200, 9);
    expect(dz).toBeCloseTo(300, 9);
  });

  it('ignores rotations', () => {
    expect(maxAbsDisplacementMicrons([[0.5, -0.5, 0.5, 0, 0, 0]])).toEqual([0, 0, 0]);
  });
});

describe('computeQcMetrics', () => {
  const meanVolume = createVolume({
    data: new Float32Array([1, 1]),
    dims: { nx: 2, ny: 1, nz: 1, nt: 1 },
    voxelSizeMm: [1, 1, 1],
  });
  const stillMotion = [
    [0, 0, 0, 0, 0, 0],
    [0, 0, 0, 0, 0, 0],
  ] as const;

  it('reports every metric in a fixed order', () => {
    const record = computeQcMetrics({
      timeseries: timeseries(constant(20, 1000), constant(20, 3), constant(20, 10)),
      meanVolume,
      motion: stillMotion,
    });

    expect(record.map((m) => m.name)).toEqual([
      'tmean_phantom',
      'tmean_ghost',
      'tmean_noise',
      'tsd_phantom',
      'tsd_ghost',
      'tsd_noise',
      'tmean_snr',
      'sig_drift_perc',
      'com_mean_x',
      'com_mean_y',
      'com_mean_z',
      'max_abs_dx',
      'max_abs_dy',
      'max_abs_dz',
    ]);
    expect(metricValue(record, 'tmean_snr')).toBe(100);
    expect(metricValue(record, 'tmean_ghost')).toBe(3);
    expect(metricValue(record, 'tsd_phantom')).toBe(0);
    expect(metricValue(record, 'sig_drift_perc')).toBe(0);
    expect(metricValue(record, 'com_mean_x')).toBe(0.5);
    expect(metricValue(record, 'max_abs_dz')).toBe(0);
  });

  it('marks SNR inconclusive when the noise is zero, which then fails its check', () => {
    const record = computeQcMetrics({
      timeseries: timeseries(constant(10, 1000), constant(10, 3), constant(10, 0)),
      meanVolume,
      motion: stillMotion,
    });
    const snr = record.find((m) => m.name === 'tmean_snr');
    expect(snr?.value).toBeNaN();
    expect(snr?.inconclusive).toMatch(/noise is zero/);

    const check = evaluateQcLimits(record).find((c) => c.name === 'tmean_snr');
    expect(check?.status).toBe('fail');
  });

  it('marks region metrics inconclusive when no time series is available', () => {
    const record = computeQcMetrics({ timeseriesUnavailableReason: 'mask threshold is zero', meanVolume, motion: stillMotion });
    const phantom = record.find((m) => m.name === 'tmean_phantom');
    expect(phantom?.value).toBeNaN();
    expect(phantom?.inconclusive).toBe('mask threshold is zero');
    expect(metricValue(record, 'com_mean_x')).toBe(0.5);
  });

  it('marks displacement inconclusive without motion parameters', () => {
    const record = computeQcMetrics({ timeseries: timeseries(constant(4, 9), constant(4, 1), constant(4, 1)), meanVolume });
    expect(record.find((m) => m.name === 'max_abs_dx')?.inconclusive).toBe('motion parameters unavailable');
  });

  it('adds spike counts when detrending ran', () => {
    const ts = timeseries(constant(30, 1000), constant(30, 3), constant(30, 10));
    const record = computeQcMetrics({ timeseries: ts, meanVolume, motion: stillMotion, detrend: detrendTimeseries(ts) });
    expect(record.slice(-3).map((m) => [m.name, m.value])).toEqual([
      ['spikes_phantom', 0],
      ['spikes_ghost', 0],
      ['spikes_noise', 0],
    ]);
  });
});
