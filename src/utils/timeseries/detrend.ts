/**
 * Exponential + linear detrending of ROI time series.
 *
 * Model: f(t) = a * exp(-t / tau) + b * t + c, with t the frame index.
 * tau is found by a log-spaced grid search; for each tau the model is linear
 * in (a, b, c) and solved in closed form. Residual scale is the median
 * absolute residual * 1.4826.
 */

import type { RegionName, RoiTimeseries } from '../../types/qc';
import { median } from '../segmentation/percentile';

export type DetrendFit = {
  a: number;
  /** Exponential time constant in frames; NaN when only a linear trend was fitted. */
  tau: number;
  b: number;
  c: number;
  /** median(|residual|) * 1.4826 */
  residualSd: number;
  /** Residuals more than SPIKE_SD_MULTIPLE residual SDs from zero. */
  spikeCount: number;
  /** 100 * (fit[last] - fit[0]) / fit[0]. */
  driftPercent: number;
  fitted: Float64Array;
  /** Residual plus the series mean. */
  detrended: Float64Array;
};

export type DetrendResult = Record<RegionName, DetrendFit>;

export const MAD_TO_SD = 1.4826;
export const SPIKE_SD_MULTIPLE = 5;
const MIN_FRAMES = 4;
const TAU_GRID_SIZE = 60;

type Solved = { a: number; b: number; c: number; sse: number };

/** Gaussian elimination with partial pivoting for a 3x3 system; null when singular. */
function solve3(m: number[][], rhs: number[]): [number, number, number] | null {
  const a = m.map((row, i) => [...row, rhs[i]]);
  const scale = Math.max(1, ...m.flat().map((v) => Math.abs(v)));

  for (let col = 0; col < 3; col++) {
    let pivot = col;
    for (let r = col + 1; r < 3; r++) {
      if (Math.abs(a[r][col]) > Math.abs(a[pivot][col])) pivot = r;
    }
    if (Math.abs(a[pivot][col]) < 1e-12 * scale) return null;
    [a[col], a[pivot]] = [a[pivot], a[col]];

    for (let r = 0; r < 3; r++) {
      if (r === col) continue;
      const f = a[r][col] / a[col][col];
      for (let c = col; c < 4; c++) a[r][c] -= f * a[col][c];
    }
  }

  return [a[0][3] / a[0][0], a[1][3] / a[1][1], a[2][3] / a[2][2]];
}

function fitForTau(y: Float64Array, tau: number): Solved | null {
  const n = y.length;
  let see = 0;
  let set = 0;
  let se = 0;
  let stt = 0;
  let st = 0;
  let sey = 0;
  let sty = 0;
  let sy = 0;

  for (let t = 0; t < n; t++) {
    const e = Math.exp(-t / tau);
    see += e * e;
    set += e * t;
    se += e;
    stt += t * t;
    st += t;
    sey += e * y[t];
    sty += t * y[t];
    sy += y[t];
  }

  const sol = solve3(
    [
      [see, set, se],
      [set, stt, st],
      [se, st, n],
    ],
    [sey, sty, sy]
  );
  if (!sol) return null;

  const [a, b, c] = sol;
  let sse = 0;
  for (let t = 0; t < n; t++) {
    const r = y[t] - (a * Math.exp(-t / tau) + b * t + c);
    sse += r * r;
  }
  return Number.isFinite(sse) ? { a, b, c, sse } : null;
}

function fitLinear(y: Float64Array): { b: number; c: number } {
  const n = y.length;
  let st = 0;
  let sy = 0;
  let stt = 0;
  let sty = 0;
  for (let t = 0; t < n; t++) {
    st += t;
    sy += y[t];
    stt += t * t;
    sty += t * y[t];
  }
  const den = n * stt - st * st;
  const b = den !== 0 ? (n * sty - st * sy) / den : 0;
  const c = (sy - b * st) / n;
  return { b, c };
}

function emptyFit(y: Float64Array): DetrendFit {
  return {
    a: NaN,
    tau: NaN,
    b: NaN,
    c: NaN,
    residualSd: NaN,
    spikeCount: NaN,
    driftPercent: NaN,
    fitted: new Float64Array(y.length).fill(NaN),
    detrended: Float64Array.from(y),
  };
}

export function detrendSeries(y: Float64Array): DetrendFit {
  const n = y.length;
  if (n < MIN_FRAMES || y.some((v) => !Number.isFinite(v))) {
    return emptyFit(y);
  }

  // tau from half a frame to ten acquisitions long.
  const tauMin = 0.5;
  const tauMax = 10 * n;
  let best: (Solved & { tau: number }) | null = null;
  for (let i = 0; i < TAU_GRID_SIZE; i++) {
    const tau = tauMin * Math.pow(tauMax / tauMin, i / (TAU_GRID_SIZE - 1));
    const s = fitForTau(y, tau);
    if (s && (!best || s.sse < best.sse)) best = { ...s, tau };
  }

  const params = best ?? { a: 0, tau: NaN, ...fitLinear(y) };
  const model = (t: number) =>
    (Number.isFinite(params.tau) ? params.a * Math.exp(-t / params.tau) : 0) + params.b * t + params.c;

  let mean = 0;
  for (let t = 0; t < n; t++) mean += y[t];
  mean /= n;

  const fitted = new Float64Array(n);
  const residuals = new Float64Array(n);
  const detrended = new Float64Array(n);
  for (let t = 0; t < n; t++) {
    fitted[t] = model(t);
    residuals[t] = y[t] - fitted[t];
    detrended[t] = residuals[t] + mean;
  }

  const residualSd = median(residuals.map(Math.abs)) * MAD_TO_SD;
  // Near-perfect fits leave residuals at rounding level; never count those as spikes.
  const spikeLimit = Math.max(SPIKE_SD_MULTIPLE * residualSd, 1e-6 * Math.max(1, Math.abs(mean)));
  let spikeCount = 0;
  for (let t = 0; t < n; t++) {
    if (Math.abs(residuals[t]) > spikeLimit) spikeCount++;
  }

  const f0 = fitted[0];
  const driftPercent = Math.abs(f0) > 1e-9 ? (100 * (fitted[n - 1] - f0)) / f0 : NaN;

  return {
    a: params.a,
    tau: params.tau,
    b: params.b,
    c: params.c,
    residualSd,
    spikeCount,
    driftPercent,
    fitted,
    detrended,
  };
}

export function detrendTimeseries(ts: RoiTimeseries): DetrendResult {
  return {
    phantom: detrendSeries(ts.phantom),
    nyquist: detrendSeries(ts.nyquist),
    noise: detrendSeries(ts.noise),
  };
}

export function detrendedTimeseries(ts: RoiTimeseries, result: DetrendResult): RoiTimeseries {
  return {
    frameCount: ts.frameCount,
    phantom: result.phantom.detrended,
    nyquist: result.nyquist.detrended,
    noise: result.noise.detrended,
  };
}
