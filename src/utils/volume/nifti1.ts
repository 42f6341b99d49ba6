import * as nifti from 'nifti-reader-js';
import { InvalidInputError } from '../../errors';
import type { Affine, Vec4Tuple, Volume, VolumeDims } from '../../types/qc';
import { createVolume, diagonalAffine } from './volume';

export type Nifti1Units = {
  spatial: 'mm' | 'm' | 'um';
  temporal?: 'sec' | 'msec' | 'usec';
};

// NIfTI-1 datatype codes.
const DT_UINT8 = 2;
const DT_INT16 = 4;
const DT_INT32 = 8;
const DT_FLOAT32 = 16;
const DT_FLOAT64 = 64;
const DT_INT8 = 256;
const DT_UINT16 = 512;
const DT_UINT32 = 768;

function clampAscii(s: string, maxBytes: number): Uint8Array {
  const out = new Uint8Array(maxBytes);
  const enc = new TextEncoder();
  const bytes = enc.encode(s);
  out.set(bytes.subarray(0, maxBytes));
  return out;
}

function unitsToXyzt(units: Nifti1Units | undefined): number {
  const spatial = units?.spatial ?? 'mm';
  const temporal = units?.temporal;

  const spatialCode = spatial === 'm' ? 1 : spatial === 'mm' ? 2 : 3; // um
  const temporalCode = temporal === 'msec' ? 16 : temporal === 'usec' ? 24 : temporal === 'sec' ? 8 : 0;

  return spatialCode | temporalCode;
}

/** Copy into a standalone ArrayBuffer; Node Buffers may be views into a shared pool. */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const out = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(out).set(bytes);
  return out;
}

export type Nifti1Payload = { kind: 'uint8'; data: Uint8Array } | { kind: 'float32'; data: Float32Array };

/**
 * Serialize a 3D or 4D volume as a single-file NIfTI-1 (.nii).
 *
 * The sform carries the affine; qform is left unset.
 */
export function buildNifti1(params: {
  /** Flattened in X-fastest order (length = nx*ny*nz*nt). */
  payload: Nifti1Payload;
  dims: Readonly<VolumeDims>;
  voxelSizeMm: readonly [number, number, number];
  affine?: Readonly<Affine>;
  /** pixdim[4] for 4D volumes. */
  repetitionTimeSec?: number;
  description?: string;
  /** Defaults to mm (+ sec for 4D). */
  units?: Nifti1Units;
}): ArrayBuffer {
  const { nx, ny, nz, nt } = params.dims;

  if (!(nx > 0 && ny > 0 && nz > 0 && nt > 0)) {
    throw new InvalidInputError(`buildNifti1: invalid dims ${nx}x${ny}x${nz}x${nt}`);
  }

  const expected = nx * ny * nz * nt;
  if (params.payload.data.length !== expected) {
    throw new InvalidInputError(
      `buildNifti1: data length mismatch (expected ${expected}, got ${params.payload.data.length})`
    );
  }

  // NIfTI-1 .nii = 348-byte header + 4-byte extension + payload.
  const HEADER_BYTES = 348;
  const VOX_OFFSET = 352;

  const header = new ArrayBuffer(HEADER_BYTES);
  const dv = new DataView(header);

  dv.setInt32(0, HEADER_BYTES, true); // sizeof_hdr

  // dim[0..7] (int16), starting at offset 40.
  dv.setInt16(40, nt > 1 ? 4 : 3, true);
  dv.setInt16(42, nx, true);
  dv.setInt16(44, ny, true);
  dv.setInt16(46, nz, true);
  dv.setInt16(48, nt, true);
  dv.setInt16(50, 1, true);
  dv.setInt16(52, 1, true);
  dv.setInt16(54, 1, true);

  const isFloat = params.payload.kind === 'float32';
  dv.setInt16(70, isFloat ? DT_FLOAT32 : DT_UINT8, true); // datatype
  dv.setInt16(72, isFloat ? 32 : 8, true); // bitpix

  // pixdim[0] is qfac; keep 1.
  dv.setFloat32(76, 1, true);

  const vx = Math.abs(params.voxelSizeMm[0]);
  const vy = Math.abs(params.voxelSizeMm[1]);
  const vz = Math.abs(params.voxelSizeMm[2]);
  dv.setFloat32(80, vx, true);
  dv.setFloat32(84, vy, true);
  dv.setFloat32(88, vz, true);
  dv.setFloat32(92, nt > 1 ? params.repetitionTimeSec ?? 1 : 0, true);

  dv.setFloat32(108, VOX_OFFSET, true); // vox_offset

  // Scaling: identity.
  dv.setFloat32(112, 1, true); // scl_slope
  dv.setFloat32(116, 0, true); // scl_inter

  dv.setUint8(123, unitsToXyzt(params.units ?? { spatial: 'mm', temporal: nt > 1 ? 'sec' : undefined }));

  // descrip[80] at offset 148.
  if (params.description) {
    new Uint8Array(header, 148, 80).set(clampAscii(params.description, 80));
  }

  dv.setInt16(252, 0, true); // qform_code
  dv.setInt16(254, 1, true); // sform_code (scanner anatomical)

  // srow_x/y/z at offsets 280/296/312.
  const affine = params.affine ?? diagonalAffine([vx, vy, vz]);
  for (let r = 0; r < 3; r++) {
    const row = affine[r];
    for (let c = 0; c < 4; c++) {
      dv.setFloat32(280 + r * 16 + c * 4, row[c], true);
    }
  }

  // magic[4] at offset 344: "n+1\0" for .nii
  dv.setUint8(344, 'n'.charCodeAt(0));
  dv.setUint8(345, '+'.charCodeAt(0));
  dv.setUint8(346, '1'.charCodeAt(0));
  dv.setUint8(347, 0);

  const bytesPerVoxel = isFloat ? 4 : 1;
  const out = new Uint8Array(VOX_OFFSET + expected * bytesPerVoxel);

  out.set(new Uint8Array(header), 0);
  // Bytes 348..351 (extension flag) stay zero.

  if (params.payload.kind === 'uint8') {
    out.set(params.payload.data, VOX_OFFSET);
  } else {
    const body = new DataView(out.buffer, VOX_OFFSET);
    const src = params.payload.data;
    for (let i = 0; i < src.length; i++) {
      body.setFloat32(i * 4, src[i], true);
    }
  }

  return out.buffer;
}

function readScaledVoxels(
  image: ArrayBuffer,
  datatype: number,
  count: number,
  littleEndian: boolean,
  slope: number,
  inter: number
): Float32Array {
  const dv = new DataView(image);
  const out = new Float32Array(count);

  const read = ((): ((i: number) => number) => {
    switch (datatype) {
      case DT_UINT8:
        return (i) => dv.getUint8(i);
      case DT_INT8:
        return (i) => dv.getInt8(i);
      case DT_INT16:
        return (i) => dv.getInt16(i * 2, littleEndian);
      case DT_UINT16:
        return (i) => dv.getUint16(i * 2, littleEndian);
      case DT_INT32:
        return (i) => dv.getInt32(i * 4, littleEndian);
      case DT_UINT32:
        return (i) => dv.getUint32(i * 4, littleEndian);
      case DT_FLOAT32:
        return (i) => dv.getFloat32(i * 4, littleEndian);
      case DT_FLOAT64:
        return (i) => dv.getFloat64(i * 8, littleEndian);
      default:
        throw new InvalidInputError(`readNifti1: unsupported datatype ${datatype}`);
    }
  })();

  const bytesPerVoxel = datatype === DT_FLOAT64 ? 8 : datatype === DT_UINT8 || datatype === DT_INT8 ? 1 : datatype === DT_INT16 || datatype === DT_UINT16 ? 2 : 4;
  if (image.byteLength < count * bytesPerVoxel) {
    throw new InvalidInputError(
      `readNifti1: image payload too short (expected ${count * bytesPerVoxel} bytes, got ${image.byteLength})`
    );
  }

  for (let i = 0; i < count; i++) {
    out[i] = read(i) * slope + inter;
  }
  return out;
}

function toAffineRow(row: number[] | undefined): Vec4Tuple | null {
  if (!row || row.length < 4 || !row.slice(0, 4).every((v) => Number.isFinite(v))) return null;
  return [row[0], row[1], row[2], row[3]];
}

/**
 * Parse a NIfTI-1/2 file (optionally gzip-compressed) into a float32 volume.
 *
 * Intensities are rescaled by scl_slope/scl_inter. The sform/qform affine from
 * the header is used when either code is set; otherwise the grid is axis-aligned.
 */
export function readNifti1(buffer: ArrayBuffer): Volume {
  let data = buffer;
  if (nifti.isCompressed(data)) {
    data = toArrayBuffer(new Uint8Array(nifti.decompress(data)));
  }

  if (!nifti.isNIFTI(data)) {
    throw new InvalidInputError('readNifti1: not a NIfTI file');
  }

  const header = nifti.readHeader(data);
  if (!header) {
    throw new InvalidInputError('readNifti1: unable to parse NIfTI header');
  }

  const ndim = header.dims[0] ?? 0;
  if (ndim < 3 || ndim > 7) {
    throw new InvalidInputError(`readNifti1: unsupported dimensionality ${ndim}`);
  }
  const extra = header.dims.slice(5, ndim + 1).reduce((acc, d) => acc * Math.max(1, d), 1);
  if (extra !== 1) {
    throw new InvalidInputError('readNifti1: dimensions beyond time are not supported');
  }

  const dims: VolumeDims = {
    nx: header.dims[1] ?? 0,
    ny: header.dims[2] ?? 0,
    nz: header.dims[3] ?? 0,
    nt: ndim >= 4 ? Math.max(1, header.dims[4] ?? 1) : 1,
  };
  const voxelSizeMm: [number, number, number] = [
    Math.abs(header.pixDims[1] ?? 1) || 1,
    Math.abs(header.pixDims[2] ?? 1) || 1,
    Math.abs(header.pixDims[3] ?? 1) || 1,
  ];

  let affine: Affine = diagonalAffine(voxelSizeMm);
  if (header.sform_code > 0 || header.qform_code > 0) {
    const r0 = toAffineRow(header.affine[0]);
    const r1 = toAffineRow(header.affine[1]);
    const r2 = toAffineRow(header.affine[2]);
    if (r0 && r1 && r2) affine = [r0, r1, r2];
  }

  // scl_slope == 0 means "no scaling" per the NIfTI-1 standard.
  const slope = Number.isFinite(header.scl_slope) && header.scl_slope !== 0 ? header.scl_slope : 1;
  const inter = Number.isFinite(header.scl_inter) && header.scl_slope !== 0 ? header.scl_inter : 0;

  const count = dims.nx * dims.ny * dims.nz * dims.nt;
  const image = nifti.readImage(header, data);
  const voxels = readScaledVoxels(image, header.datatypeCode, count, header.littleEndian, slope, inter);

  return createVolume({ data: voxels, dims, voxelSizeMm, affine });
}
