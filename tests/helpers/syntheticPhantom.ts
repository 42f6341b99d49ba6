import fs from 'node:fs/promises';
import path from 'node:path';
import { vi } from 'vitest';
import type { MotionCorrectionRequest, MotionCorrector } from '../../src/services/adapters/motionCorrection';
import type { Volume } from '../../src/types/qc';
import { buildNifti1 } from '../../src/utils/volume/nifti1';
import { createVolume } from '../../src/utils/volume/volume';

export type SphereSeriesParams = {
  nx?: number;
  ny?: number;
  nz?: number;
  nt?: number;
  voxelMm?: number;
  radiusMm?: number;
  inside?: number;
  outside?: number;
  /** Per-frame signal inside the sphere; defaults to a constant `inside`. */
  insideAt?: (t: number) => number;
};

/**
 * Uniform sphere centred on voxel (nx/2, ny/2, nz/2) over a constant background.
 */
export function makeSphereSeries(params: SphereSeriesParams = {}): Volume {
  const nx = params.nx ?? 40;
  const ny = params.ny ?? 40;
  const nz = params.nz ?? 24;
  const nt = params.nt ?? 50;
  const vox = params.voxelMm ?? 3;
  const radius = params.radiusMm ?? 30;
  const inside = params.inside ?? 800;
  const outside = params.outside ?? 5;
  const insideAt = params.insideAt ?? (() => inside);

  const cx = Math.floor(nx / 2);
  const cy = Math.floor(ny / 2);
  const cz = Math.floor(nz / 2);
  const n = nx * ny * nz;

  const isInside = new Uint8Array(n);
  for (let z = 0; z < nz; z++) {
    for (let y = 0; y < ny; y++) {
      for (let x = 0; x < nx; x++) {
        const d2 = ((x - cx) * vox) ** 2 + ((y - cy) * vox) ** 2 + ((z - cz) * vox) ** 2;
        isInside[z * nx * ny + y * nx + x] = d2 <= radius * radius ? 1 : 0;
      }
    }
  }

  const data = new Float32Array(n * nt);
  for (let t = 0; t < nt; t++) {
    const v = insideAt(t);
    for (let i = 0; i < n; i++) data[t * n + i] = isInside[i] ? v : outside;
  }

  return createVolume({ data, dims: { nx, ny, nz, nt }, voxelSizeMm: [vox, vox, vox] });
}

export async function writeVolumeNii(filePath: string, volume: Volume): Promise<void> {
  const bytes = buildNifti1({
    payload: { kind: 'float32', data: volume.data },
    dims: volume.dims,
    voxelSizeMm: volume.voxelSizeMm,
    affine: volume.affine,
  });
  await fs.writeFile(filePath, new Uint8Array(bytes));
}

/**
 * Stand-in for the registration tool: copies the input unchanged and writes zero motion for every frame.
 */
export function makeZeroMotionCorrector(frameCount: number) {
  const correct = vi.fn(async ({ inputPath, outputStem }: MotionCorrectionRequest) => {
    const volumePath = `${outputStem}${path.extname(inputPath) === '.gz' ? '.nii.gz' : '.nii'}`;
    await fs.copyFile(inputPath, volumePath);
    const parametersPath = `${outputStem}.par`;
    await fs.writeFile(parametersPath, '0 0 0 0 0 0\n'.repeat(frameCount));
    return { volumePath, parametersPath };
  });
  const corrector: MotionCorrector = { correct };
  return { corrector, correct };
}
