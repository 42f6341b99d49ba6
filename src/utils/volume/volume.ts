import { InvalidInputError } from '../../errors';
import type { Affine, Vec3Tuple, Volume, VolumeDims } from '../../types/qc';

export function idx3(x: number, y: number, z: number, nx: number, ny: number): number {
  return z * (nx * ny) + y * nx + x;
}

export function spatialVoxelCount(dims: Readonly<VolumeDims>): number {
  return dims.nx * dims.ny * dims.nz;
}

/** Affine for an axis-aligned grid with the origin at voxel (0, 0, 0). */
export function diagonalAffine(voxelSizeMm: Readonly<Vec3Tuple>): Affine {
  return [
    [voxelSizeMm[0], 0, 0, 0],
    [0, voxelSizeMm[1], 0, 0],
    [0, 0, voxelSizeMm[2], 0],
  ];
}

export function copyAffine(affine: Readonly<Affine>): Affine {
  const [r0, r1, r2] = affine;
  return [
    [r0[0], r0[1], r0[2], r0[3]],
    [r1[0], r1[1], r1[2], r1[3]],
    [r2[0], r2[1], r2[2], r2[3]],
  ];
}

export function voxelToWorld(affine: Readonly<Affine>, i: number, j: number, k: number): Vec3Tuple {
  const [r0, r1, r2] = affine;
  return [
    r0[0] * i + r0[1] * j + r0[2] * k + r0[3],
    r1[0] * i + r1[1] * j + r1[2] * k + r1[3],
    r2[0] * i + r2[1] * j + r2[2] * k + r2[3],
  ];
}

export function createVolume(params: {
  data: Float32Array;
  dims: Readonly<VolumeDims>;
  voxelSizeMm: Readonly<Vec3Tuple>;
  affine?: Readonly<Affine>;
}): Volume {
  const { nx, ny, nz, nt } = params.dims;
  if (![nx, ny, nz, nt].every((d) => Number.isInteger(d) && d > 0)) {
    throw new InvalidInputError(`createVolume: invalid dims ${nx}x${ny}x${nz}x${nt}`);
  }

  const expected = nx * ny * nz * nt;
  if (params.data.length !== expected) {
    throw new InvalidInputError(`createVolume: data length mismatch (expected ${expected}, got ${params.data.length})`);
  }

  return {
    data: params.data,
    dims: { nx, ny, nz, nt },
    voxelSizeMm: [params.voxelSizeMm[0], params.voxelSizeMm[1], params.voxelSizeMm[2]],
    affine: params.affine ? copyAffine(params.affine) : diagonalAffine(params.voxelSizeMm),
  };
}

/**
 * View of one time frame. Shares memory with the source volume, so callers must not write to it.
 */
export function frameView(volume: Volume, t: number): Float32Array {
  const n = spatialVoxelCount(volume.dims);
  if (!Number.isInteger(t) || t < 0 || t >= volume.dims.nt) {
    throw new InvalidInputError(`frameView: frame ${t} out of range [0, ${volume.dims.nt})`);
  }
  return volume.data.subarray(t * n, (t + 1) * n);
}

export function sameSpatialGrid(a: Readonly<VolumeDims>, b: Readonly<VolumeDims>): boolean {
  return a.nx === b.nx && a.ny === b.ny && a.nz === b.nz;
}
