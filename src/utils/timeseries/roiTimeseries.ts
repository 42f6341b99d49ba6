import { InvalidInputError } from '../../errors';
import type { RegionMask, RoiTimeseries, Volume } from '../../types/qc';
import { REGION_LABELS, REGION_NAMES } from '../../types/qc';
import { sameSpatialGrid, spatialVoxelCount } from '../volume/volume';

/**
 * Mean intensity inside each labelled region, for every frame.
 *
 * A region with no voxels yields NaN for every frame rather than throwing, so
 * downstream metrics can report it as inconclusive.
 */
export function extractRoiTimeseries(volume: Volume, mask: RegionMask): RoiTimeseries {
  if (!sameSpatialGrid(volume.dims, mask.dims)) {
    const v = volume.dims;
    const m = mask.dims;
    throw new InvalidInputError(
      `extractRoiTimeseries: grid mismatch (volume ${v.nx}x${v.ny}x${v.nz}, mask ${m.nx}x${m.ny}x${m.nz})`
    );
  }

  const n = spatialVoxelCount(volume.dims);
  const nt = volume.dims.nt;
  const labels = mask.labels;

  const counts = [0, 0, 0, 0];
  for (let i = 0; i < n; i++) {
    const l = labels[i];
    if (l <= REGION_LABELS.noise) counts[l]++;
  }

  const series = {
    phantom: new Float64Array(nt),
    nyquist: new Float64Array(nt),
    noise: new Float64Array(nt),
  };

  const sums = [0, 0, 0, 0];
  for (let t = 0; t < nt; t++) {
    sums.fill(0);
    const base = t * n;
    for (let i = 0; i < n; i++) {
      const l = labels[i];
      if (l >= REGION_LABELS.phantom && l <= REGION_LABELS.noise) sums[l] += volume.data[base + i];
    }

    for (const name of REGION_NAMES) {
      const label = REGION_LABELS[name];
      series[name][t] = counts[label] > 0 ? sums[label] / counts[label] : NaN;
    }
  }

  return { frameCount: nt, ...series };
}

// Shortest round-trip form: parsing a written table reproduces the series exactly.
function formatCell(v: number): string {
  return Number.isFinite(v) ? String(v) : 'NaN';
}

/**
 * Whitespace-delimited table: one row per frame, columns phantom, Nyquist ghost, noise.
 */
export function formatTimeseriesTable(ts: RoiTimeseries): string {
  const lines: string[] = [];
  for (let t = 0; t < ts.frameCount; t++) {
    lines.push([ts.phantom[t], ts.nyquist[t], ts.noise[t]].map(formatCell).join(' '));
  }
  return lines.join('\n') + '\n';
}

export function parseTimeseriesTable(text: string): RoiTimeseries {
  const rows = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));

  const phantom = new Float64Array(rows.length);
  const nyquist = new Float64Array(rows.length);
  const noise = new Float64Array(rows.length);

  rows.forEach((row, t) => {
    const cells = row.split(/[\s,]+/);
    if (cells.length < 3) {
      throw new InvalidInputError(`parseTimeseriesTable: row ${t + 1} has ${cells.length} columns (expected 3)`);
    }
    const values = cells.slice(0, 3).map((c) => (c === 'NaN' ? NaN : Number(c)));
    if (values.some((v, i) => Number.isNaN(v) && cells[i] !== 'NaN')) {
      throw new InvalidInputError(`parseTimeseriesTable: row ${t + 1} is not numeric`);
    }
    phantom[t] = values[0];
    nyquist[t] = values[1];
    noise[t] = values[2];
  });

  return { frameCount: rows.length, phantom, nyquist, noise };
}
