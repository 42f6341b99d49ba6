import fs from 'node:fs/promises';
import { MissingInputError } from '../errors';
import type { RegionMask, Volume } from '../types/qc';
import { buildNifti1, readNifti1, toArrayBuffer } from '../utils/volume/nifti1';
import { fileExists, writeFileAtomic } from './fileStore';

export async function loadVolume(filePath: string): Promise<Volume> {
  if (!(await fileExists(filePath))) {
    throw new MissingInputError(`Volume not found: ${filePath}`, filePath);
  }
  const buf = await fs.readFile(filePath);
  return readNifti1(toArrayBuffer(buf));
}

export async function saveVolume(filePath: string, volume: Volume, description?: string): Promise<void> {
  const bytes = buildNifti1({
    payload: { kind: 'float32', data: volume.data },
    dims: volume.dims,
    voxelSizeMm: volume.voxelSizeMm,
    affine: volume.affine,
    description,
  });
  await writeFileAtomic(filePath, new Uint8Array(bytes));
}

export async function saveRegionMask(filePath: string, mask: RegionMask): Promise<void> {
  const bytes = buildNifti1({
    payload: { kind: 'uint8', data: mask.labels },
    dims: mask.dims,
    voxelSizeMm: mask.voxelSizeMm,
    affine: mask.affine,
    description: 'qc regions 1=phantom 2=nyquist 3=noise',
  });
  await writeFileAtomic(filePath, new Uint8Array(bytes));
}

export async function loadRegionMask(filePath: string): Promise<RegionMask> {
  const volume = await loadVolume(filePath);
  const labels = new Uint8Array(volume.data.length);
  for (let i = 0; i < labels.length; i++) labels[i] = Math.round(volume.data[i]);
  return {
    labels,
    dims: { ...volume.dims, nt: 1 },
    affine: volume.affine,
    voxelSizeMm: volume.voxelSizeMm,
  };
}
