/**
 * Computes a quantile value from a pre-sorted array.
 *
 * @param sorted - Values sorted ascending
 * @param q - Quantile in [0, 1] (e.g., 0.5 for median)
 * @returns Linearly interpolated quantile value, or NaN for an empty input
 */
export function quantileSorted(sorted: ArrayLike<number>, q: number): number {
  const n = sorted.length;
  if (n === 0) return NaN;

  const qq = q < 0 ? 0 : q > 1 ? 1 : q;
  const idx = qq * (n - 1);
  const i0 = Math.floor(idx);
  const i1 = Math.min(n - 1, i0 + 1);
  const t = idx - i0;
  const a = sorted[i0];
  const b = sorted[i1];
  return t === 0 ? a : a + (b - a) * t;
}

/**
 * Percentile (0..100) of every finite value, interpolating between order statistics.
 */
export function percentile(values: ArrayLike<number>, p: number): number {
  const finite: number[] = [];
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (Number.isFinite(v)) finite.push(v);
  }
  const sorted = Float64Array.from(finite).sort();
  return quantileSorted(sorted, p / 100);
}

export function median(values: ArrayLike<number>): number {
  return percentile(values, 50);
}
