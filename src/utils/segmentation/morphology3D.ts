import { InvalidInputError } from '../../errors';
import type { Vec3Tuple, VolumeDims } from '../../types/qc';
import { idx3 } from '../volume/volume';

/**
 * Structuring element as voxel offsets (dx, dy, dz interleaved).
 */
export type KernelOffsets = Int32Array;

/**
 * Spherical structuring element: every voxel offset whose physical distance
 * from the centre is within `radiusMm`, given anisotropic voxel sizes.
 */
export function sphereKernel(radiusMm: number, voxelSizeMm: Readonly<Vec3Tuple>): KernelOffsets {
  if (!(radiusMm >= 0) || !Number.isFinite(radiusMm)) {
    throw new InvalidInputError(`sphereKernel: invalid radius ${radiusMm}`);
  }
  const [vx, vy, vz] = voxelSizeMm;
  if (!(vx > 0 && vy > 0 && vz > 0)) {
    throw new InvalidInputError(`sphereKernel: invalid voxel size ${vx}x${vy}x${vz}`);
  }

  const rx = Math.floor(radiusMm / vx);
  const ry = Math.floor(radiusMm / vy);
  const rz = Math.floor(radiusMm / vz);
  const r2 = radiusMm * radiusMm;

  const offsets: number[] = [];
  for (let dz = -rz; dz <= rz; dz++) {
    for (let dy = -ry; dy <= ry; dy++) {
      for (let dx = -rx; dx <= rx; dx++) {
        const d2 = (dx * vx) ** 2 + (dy * vy) ** 2 + (dz * vz) ** 2;
        if (d2 <= r2) offsets.push(dx, dy, dz);
      }
    }
  }

  return Int32Array.from(offsets);
}

function assertMaskSize(name: string, mask: Uint8Array, dims: Readonly<VolumeDims>): void {
  const n = dims.nx * dims.ny * dims.nz;
  if (mask.length !== n) {
    throw new InvalidInputError(`${name}: mask length mismatch (expected ${n}, got ${mask.length})`);
  }
}

/**
 * 3D binary erosion.
 *
 * A voxel survives only if every in-volume neighbour under the kernel is set.
 * Out-of-bounds neighbours are ignored.
 */
export function erode3D(mask: Uint8Array, dims: Readonly<VolumeDims>, kernel: KernelOffsets): Uint8Array {
  assertMaskSize('erode3D', mask, dims);
  const { nx, ny, nz } = dims;
  const out = new Uint8Array(mask.length);
  const k = kernel.length;

  for (let z = 0; z < nz; z++) {
    for (let y = 0; y < ny; y++) {
      for (let x = 0; x < nx; x++) {
        if (!mask[idx3(x, y, z, nx, ny)]) continue;

        let on = 1;
        for (let o = 0; o < k; o += 3) {
          const xx = x + kernel[o];
          const yy = y + kernel[o + 1];
          const zz = z + kernel[o + 2];
          if (xx < 0 || yy < 0 || zz < 0 || xx >= nx || yy >= ny || zz >= nz) continue;
          if (!mask[idx3(xx, yy, zz, nx, ny)]) {
            on = 0;
            break;
          }
        }

        out[idx3(x, y, z, nx, ny)] = on;
      }
    }
  }

  return out;
}

function dilateOnce(mask: Uint8Array, dims: Readonly<VolumeDims>, kernel: KernelOffsets): Uint8Array {
  const { nx, ny, nz } = dims;
  const out = new Uint8Array(mask.length);
  const k = kernel.length;

  for (let z = 0; z < nz; z++) {
    for (let y = 0; y < ny; y++) {
      for (let x = 0; x < nx; x++) {
        if (!mask[idx3(x, y, z, nx, ny)]) continue;

        // Scatter the kernel around every set voxel.
        for (let o = 0; o < k; o += 3) {
          const xx = x + kernel[o];
          const yy = y + kernel[o + 1];
          const zz = z + kernel[o + 2];
          if (xx < 0 || yy < 0 || zz < 0 || xx >= nx || yy >= ny || zz >= nz) continue;
          out[idx3(xx, yy, zz, nx, ny)] = 1;
        }
      }
    }
  }

  return out;
}

/**
 * 3D binary dilation (maximum filter), applied `iterations` times.
 */
export function dilate3D(
  mask: Uint8Array,
  dims: Readonly<VolumeDims>,
  kernel: KernelOffsets,
  iterations = 1
): Uint8Array {
  assertMaskSize('dilate3D', mask, dims);
  if (!Number.isInteger(iterations) || iterations < 0) {
    throw new InvalidInputError(`dilate3D: invalid iteration count ${iterations}`);
  }

  let cur = mask;
  for (let i = 0; i < iterations; i++) {
    cur = dilateOnce(cur, dims, kernel);
  }
  return cur === mask ? mask.slice() : cur;
}
