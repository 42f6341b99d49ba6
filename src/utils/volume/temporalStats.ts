import { InvalidInputError } from '../../errors';
import type { Volume } from '../../types/qc';
import { createVolume, spatialVoxelCount } from './volume';

export type TemporalStats = {
  mean: Volume;
  sd: Volume;
};

/**
 * Voxel-wise temporal mean and population standard deviation of a 4D volume.
 *
 * Sums are accumulated in double precision and stored as float32.
 */
export function computeTemporalStats(volume: Volume): TemporalStats {
  const { nt } = volume.dims;
  if (nt < 2) {
    throw new InvalidInputError(`computeTemporalStats: need at least 2 frames (got ${nt})`);
  }

  const n = spatialVoxelCount(volume.dims);
  const src = volume.data;
  const mean = new Float32Array(n);
  const sd = new Float32Array(n);

  for (let i = 0; i < n; i++) {
    let sum = 0;
    for (let t = 0; t < nt; t++) {
      sum += src[t * n + i];
    }
    const m = sum / nt;

    let ss = 0;
    for (let t = 0; t < nt; t++) {
      const d = src[t * n + i] - m;
      ss += d * d;
    }

    mean[i] = m;
    sd[i] = Math.sqrt(ss / nt);
  }

  const dims3 = { nx: volume.dims.nx, ny: volume.dims.ny, nz: volume.dims.nz, nt: 1 };
  const { voxelSizeMm, affine } = volume;

  return {
    mean: createVolume({ data: mean, dims: dims3, voxelSizeMm, affine }),
    sd: createVolume({ data: sd, dims: dims3, voxelSizeMm, affine }),
  };
}
