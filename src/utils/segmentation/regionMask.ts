/**
 * Phantom / Nyquist ghost / noise region mask.
 *
 * Built from the temporal-mean image in a fixed order:
 * 1. threshold at a fraction of a high percentile to get the signal footprint
 * 2. erode to get the phantom core, away from edge artifacts
 * 3. dilate the core (twice by default) to get a generous signal envelope
 * 4. swap the halves of the envelope along the phase-encode axis (an N/2 ghost)
 * 5. the ghost region is the swapped envelope outside the real envelope
 * 6. noise is everything else outside the envelope
 *
 * The envelope rim that is neither core nor ghost/noise keeps label 0.
 */

import { DegenerateInputError, InvalidInputError } from '../../errors';
import type { RegionMask, Volume, VolumeDims } from '../../types/qc';
import { REGION_LABELS } from '../../types/qc';
import { spatialVoxelCount } from '../volume/volume';
import { dilate3D, erode3D, sphereKernel } from './morphology3D';
import { percentile } from './percentile';

export type PhaseEncodeAxis = 0 | 1 | 2;

export type RegionMaskOptions = {
  /** Spatial axis the Nyquist ghost is displaced along (0 = X, 1 = Y, 2 = Z). */
  phaseEncodeAxis: PhaseEncodeAxis;
  /** Split index along the phase-encode axis; defaults to floor(n / 2). */
  midpoint?: number;
  thresholdPercentile: number;
  thresholdFraction: number;
  kernelRadiusMm: number;
  dilationIterations: number;
};

export const DEFAULT_REGION_MASK_OPTIONS: RegionMaskOptions = {
  phaseEncodeAxis: 1,
  thresholdPercentile: 99,
  thresholdFraction: 0.1,
  kernelRadiusMm: 6,
  dilationIterations: 2,
};

export type RegionMaskResult = {
  mask: RegionMask;
  signalThreshold: number;
  /** Voxel count per label, indexed by label value 0..3. */
  labelCounts: [number, number, number, number];
};

function axisLength(dims: Readonly<VolumeDims>, axis: PhaseEncodeAxis): number {
  return axis === 0 ? dims.nx : axis === 1 ? dims.ny : dims.nz;
}

/**
 * Reassemble a binary mask with the [mid, n) half of `axis` moved in front of the [0, mid) half.
 *
 * The output stays on the input grid (and therefore keeps its affine), so
 * `out[i] = mask[(i + mid) % n]` along the axis.
 */
export function swapHalves(
  mask: Uint8Array,
  dims: Readonly<VolumeDims>,
  axis: PhaseEncodeAxis,
  mid: number
): Uint8Array {
  const { nx, ny, nz } = dims;
  const n = axisLength(dims, axis);
  if (!Number.isInteger(mid) || mid < 0 || mid > n) {
    throw new InvalidInputError(`swapHalves: midpoint ${mid} out of range [0, ${n}]`);
  }

  const out = new Uint8Array(mask.length);
  for (let z = 0; z < nz; z++) {
    for (let y = 0; y < ny; y++) {
      for (let x = 0; x < nx; x++) {
        let sx = x;
        let sy = y;
        let sz = z;
        if (axis === 0) sx = (x + mid) % nx;
        else if (axis === 1) sy = (y + mid) % ny;
        else sz = (z + mid) % nz;

        out[z * nx * ny + y * nx + x] = mask[sz * nx * ny + sy * nx + sx];
      }
    }
  }
  return out;
}

export function buildRegionMask(
  meanVolume: Volume,
  options: Partial<RegionMaskOptions> = {}
): RegionMaskResult {
  const opts: RegionMaskOptions = { ...DEFAULT_REGION_MASK_OPTIONS, ...options };
  const { dims } = meanVolume;
  if (dims.nt !== 1) {
    throw new InvalidInputError(`buildRegionMask: expected a 3D mean volume (got ${dims.nt} frames)`);
  }

  const n = spatialVoxelCount(dims);
  const mean = meanVolume.data;

  const signalThreshold = percentile(mean, opts.thresholdPercentile) * opts.thresholdFraction;
  if (!Number.isFinite(signalThreshold) || signalThreshold <= 0) {
    throw new DegenerateInputError(
      `buildRegionMask: signal threshold ${signalThreshold} is not positive (empty or zero-signal volume)`
    );
  }

  const signal = new Uint8Array(n);
  for (let i = 0; i < n; i++) {
    signal[i] = mean[i] >= signalThreshold ? 1 : 0;
  }

  const kernel = sphereKernel(opts.kernelRadiusMm, meanVolume.voxelSizeMm);
  const phantom = erode3D(signal, dims, kernel);
  const signalDil = dilate3D(phantom, dims, kernel, opts.dilationIterations);

  const mid = opts.midpoint ?? Math.floor(axisLength(dims, opts.phaseEncodeAxis) / 2);
  const swapped = swapHalves(signalDil, dims, opts.phaseEncodeAxis, mid);

  const labels = new Uint8Array(n);
  const labelCounts: [number, number, number, number] = [0, 0, 0, 0];

  for (let i = 0; i < n; i++) {
    const inEnvelope = signalDil[i] === 1;
    // XOR of swapped and envelope, kept only outside the envelope.
    const nyquist = swapped[i] !== signalDil[i] && !inEnvelope;
    const noise = !inEnvelope && !nyquist;

    const label = phantom[i]
      ? REGION_LABELS.phantom
      : nyquist
        ? REGION_LABELS.nyquist
        : noise
          ? REGION_LABELS.noise
          : REGION_LABELS.unused;

    labels[i] = label;
    labelCounts[label]++;
  }

  return {
    mask: {
      labels,
      dims: { nx: dims.nx, ny: dims.ny, nz: dims.nz, nt: 1 },
      affine: meanVolume.affine,
      voxelSizeMm: meanVolume.voxelSizeMm,
    },
    signalThreshold,
    labelCounts,
  };
}
