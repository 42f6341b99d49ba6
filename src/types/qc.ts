// ============================================================================
// Volumes
// ============================================================================

export type VolumeDims = { nx: number; ny: number; nz: number; nt: number };

export type Vec3Tuple = [number, number, number];
export type Vec4Tuple = [number, number, number, number];

/** sform rows: maps voxel (i, j, k, 1) to world mm. */
export type Affine = [Vec4Tuple, Vec4Tuple, Vec4Tuple];

/**
 * Scalar volume on a regular grid.
 *
 * Data is flattened X-fastest, then Y, Z and finally T (length = nx*ny*nz*nt).
 * Volumes are never modified after creation; every operation returns a new one.
 */
export type Volume = {
  readonly data: Float32Array;
  readonly dims: Readonly<VolumeDims>;
  readonly voxelSizeMm: Readonly<Vec3Tuple>;
  readonly affine: Readonly<Affine>;
};

// ============================================================================
// Regions
// ============================================================================

export const REGION_LABELS = {
  unused: 0,
  phantom: 1,
  nyquist: 2,
  noise: 3,
} as const;

export type RegionName = 'phantom' | 'nyquist' | 'noise';

export const REGION_NAMES: readonly RegionName[] = ['phantom', 'nyquist', 'noise'];

/** Region label per voxel on the spatial grid of a 3D volume. */
export type RegionMask = {
  readonly labels: Uint8Array;
  readonly dims: Readonly<VolumeDims>;
  readonly affine: Readonly<Affine>;
  readonly voxelSizeMm: Readonly<Vec3Tuple>;
};

/** Mean intensity per frame inside each labelled region. */
export type RoiTimeseries = {
  readonly frameCount: number;
  readonly phantom: Float64Array;
  readonly nyquist: Float64Array;
  readonly noise: Float64Array;
};

/** Per-frame rigid-body parameters relative to the reference frame: [rx, ry, rz, tx, ty, tz]. */
export type MotionParameters = ReadonlyArray<readonly [number, number, number, number, number, number]>;

// ============================================================================
// Metrics
// ============================================================================

export type QcMetric = {
  name: string;
  /** NaN when the metric could not be computed. */
  value: number;
  /** Reason the value is NaN; absent for a computed metric. */
  inconclusive?: string;
};

export type QcMetricRecord = readonly QcMetric[];

export type QcLimit = {
  name: string;
  label: string;
  lower: number;
  upper: number;
};

export type QcCheckStatus = 'pass' | 'fail';

export type QcCheck = QcLimit & {
  value: number;
  status: QcCheckStatus;
  inconclusive?: string;
};

// ============================================================================
// Scan metadata
// ============================================================================

export type ScanInfo = {
  scannerSerial: string;
  /** YYYYMMDD */
  acquisitionDate: string;
  rfFrequencyMHz: number;
  repetitionTimeMs: number;
  volumeCount: number;
};

// ============================================================================
// Progress
// ============================================================================

export type QcStage =
  | 'convert'
  | 'scan-info'
  | 'motion-correction'
  | 'temporal-stats'
  | 'mask'
  | 'timeseries'
  | 'detrend'
  | 'metrics'
  | 'write';

export type QcProgress = {
  stage: QcStage;
  message: string;
  /** True when the stage was satisfied from the stage cache. */
  cached?: boolean;
};
