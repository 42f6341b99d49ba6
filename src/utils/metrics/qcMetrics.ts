/**
 * Summary QC metrics from ROI time series, the temporal-mean image and motion parameters.
 *
 * The SNR and drift definitions are kept exactly as historically reported so
 * that trend pages stay comparable:
 * - tmean_snr is the mean over frames of phantom[t] / noise[t]
 * - sig_drift_perc is 200 * (max - min) / (max + min) of the phantom series
 *
 * Degenerate inputs and near-zero denominators never throw out of
 * computeQcMetrics; the affected metric is reported as NaN with a reason.
 */

import { DegenerateInputError, NumericInstabilityError } from '../../errors';
import type { MotionParameters, QcMetric, QcMetricRecord, RegionName, RoiTimeseries, Vec3Tuple, Volume } from '../../types/qc';
import { REGION_NAMES } from '../../types/qc';
import type { DetrendResult } from '../timeseries/detrend';
import { spatialVoxelCount, voxelToWorld } from '../volume/volume';

export const NEAR_ZERO = 1e-9;

/** Metric-name suffix per region. */
export const REGION_METRIC_SUFFIX: Record<RegionName, string> = {
  phantom: 'phantom',
  nyquist: 'ghost',
  noise: 'noise',
};

export type MeanSd = { mean: number; sd: number };

/**
 * Mean and biased (population) SD of a series.
 */
export function temporalMeanSd(series: ArrayLike<number>): MeanSd {
  const n = series.length;
  if (n === 0) {
    throw new DegenerateInputError('temporalMeanSd: empty series');
  }

  let sum = 0;
  for (let i = 0; i < n; i++) sum += series[i];
  const mean = sum / n;

  let ss = 0;
  for (let i = 0; i < n; i++) {
    const d = series[i] - mean;
    ss += d * d;
  }
  const sd = Math.sqrt(ss / n);

  if (!Number.isFinite(mean) || !Number.isFinite(sd)) {
    throw new DegenerateInputError('temporalMeanSd: series contains non-finite values');
  }
  return { mean, sd };
}

export function frameAveragedSnr(phantom: ArrayLike<number>, noise: ArrayLike<number>): number {
  const n = Math.min(phantom.length, noise.length);
  if (n === 0) {
    throw new DegenerateInputError('frameAveragedSnr: empty series');
  }

  let sum = 0;
  for (let t = 0; t < n; t++) {
    const p = phantom[t];
    const q = noise[t];
    if (!Number.isFinite(p) || !Number.isFinite(q)) {
      throw new DegenerateInputError(`frameAveragedSnr: non-finite signal at frame ${t}`);
    }
    if (Math.abs(q) < NEAR_ZERO) {
      throw new NumericInstabilityError(`frameAveragedSnr: noise is zero at frame ${t}`);
    }
    sum += p / q;
  }
  return sum / n;
}

export function signalDriftPercent(phantom: ArrayLike<number>): number {
  const n = phantom.length;
  if (n === 0) {
    throw new DegenerateInputError('signalDriftPercent: empty series');
  }

  let max = -Infinity;
  let min = Infinity;
  for (let t = 0; t < n; t++) {
    const v = phantom[t];
    if (!Number.isFinite(v)) {
      throw new DegenerateInputError(`signalDriftPercent: non-finite signal at frame ${t}`);
    }
    if (v > max) max = v;
    if (v < min) min = v;
  }

  const denom = max + min;
  if (Math.abs(denom) < NEAR_ZERO) {
    throw new NumericInstabilityError('signalDriftPercent: max + min is zero');
  }
  return (200 * (max - min)) / denom;
}

/**
 * Intensity-weighted centre of mass of a 3D volume, in world mm.
 */
export function centerOfMass(volume: Volume): Vec3Tuple {
  const { nx, ny, nz } = volume.dims;
  const n = spatialVoxelCount(volume.dims);
  const data = volume.data;

  let total = 0;
  let si = 0;
  let sj = 0;
  let sk = 0;
  for (let k = 0; k < nz; k++) {
    for (let j = 0; j < ny; j++) {
      for (let i = 0; i < nx; i++) {
        const v = data[k * nx * ny + j * nx + i];
        total += v;
        si += v * i;
        sj += v * j;
        sk += v * k;
      }
    }
  }

  if (n === 0 || !Number.isFinite(total) || Math.abs(total) < NEAR_ZERO) {
    throw new DegenerateInputError('centerOfMass: total intensity is zero');
  }
  return voxelToWorld(volume.affine, si / total, sj / total, sk / total);
}

/**
 * Largest absolute translation per axis (columns 4-6), converted from mm to microns.
 */
export function maxAbsDisplacementMicrons(motion: MotionParameters): Vec3Tuple {
  if (motion.length === 0) {
    throw new DegenerateInputError('maxAbsDisplacementMicrons: no motion parameters');
  }

  const out: Vec3Tuple = [0, 0, 0];
  for (const row of motion) {
    for (let axis = 0; axis < 3; axis++) {
      const v = Math.abs(row[3 + axis]);
      if (!Number.isFinite(v)) {
        throw new DegenerateInputError('maxAbsDisplacementMicrons: non-finite translation');
      }
      if (v > out[axis]) out[axis] = v;
    }
  }
  return [out[0] * 1000, out[1] * 1000, out[2] * 1000];
}

export type QcMetricInputs = {
  /** Absent when masking was degenerate. */
  timeseries?: RoiTimeseries;
  /** Why the time series is absent; copied into the affected metrics. */
  timeseriesUnavailableReason?: string;
  meanVolume?: Volume;
  /** Absent when no motion parameter table was available. */
  motion?: MotionParameters;
  detrend?: DetrendResult;
};

function isRecoverable(err: unknown): err is DegenerateInputError | NumericInstabilityError {
  return err instanceof DegenerateInputError || err instanceof NumericInstabilityError;
}

/**
 * Compute a group of metrics; degenerate inputs turn every metric of the group inconclusive.
 */
function measureGroup(names: string[], compute: () => number[]): QcMetric[] {
  try {
    const values = compute();
    return names.map((name, i) => ({ name, value: values[i] ?? NaN }));
  } catch (err) {
    if (!isRecoverable(err)) throw err;
    return names.map((name) => ({ name, value: NaN, inconclusive: err.message }));
  }
}

function unavailable(names: string[], reason: string): QcMetric[] {
  return names.map((name) => ({ name, value: NaN, inconclusive: reason }));
}

export function computeQcMetrics(inputs: QcMetricInputs): QcMetricRecord {
  const { timeseries, meanVolume, motion, detrend } = inputs;
  const noSeries = inputs.timeseriesUnavailableReason ?? 'region time series unavailable';
  const metrics: QcMetric[] = [];

  const meanNames = REGION_NAMES.map((r) => `tmean_${REGION_METRIC_SUFFIX[r]}`);
  const sdNames = REGION_NAMES.map((r) => `tsd_${REGION_METRIC_SUFFIX[r]}`);
  const perRegion = REGION_NAMES.map((region, i) =>
    timeseries
      ? measureGroup([meanNames[i], sdNames[i]], () => {
          const { mean, sd } = temporalMeanSd(timeseries[region]);
          return [mean, sd];
        })
      : unavailable([meanNames[i], sdNames[i]], noSeries)
  );
  metrics.push(...perRegion.map((pair) => pair[0]), ...perRegion.map((pair) => pair[1]));

  if (timeseries) {
    metrics.push(...measureGroup(['tmean_snr'], () => [frameAveragedSnr(timeseries.phantom, timeseries.noise)]));
    metrics.push(...measureGroup(['sig_drift_perc'], () => [signalDriftPercent(timeseries.phantom)]));
  } else {
    metrics.push(...unavailable(['tmean_snr', 'sig_drift_perc'], noSeries));
  }

  const comNames = ['com_mean_x', 'com_mean_y', 'com_mean_z'];
  metrics.push(
    ...(meanVolume
      ? measureGroup(comNames, () => centerOfMass(meanVolume))
      : unavailable(comNames, 'temporal mean image unavailable'))
  );

  const dispNames = ['max_abs_dx', 'max_abs_dy', 'max_abs_dz'];
  metrics.push(
    ...(motion
      ? measureGroup(dispNames, () => maxAbsDisplacementMicrons(motion))
      : unavailable(dispNames, 'motion parameters unavailable'))
  );

  if (detrend) {
    for (const region of REGION_NAMES) {
      const spikes = detrend[region].spikeCount;
      const name = `spikes_${REGION_METRIC_SUFFIX[region]}`;
      metrics.push(
        Number.isFinite(spikes) ? { name, value: spikes } : { name, value: NaN, inconclusive: 'detrending not possible' }
      );
    }
  }

  return metrics;
}

export function metricValue(record: QcMetricRecord, name: string): number | undefined {
  return record.find((m) => m.name === name)?.value;
}
