export type ColumnRange = {
  min: number;
  max: number;
  range: number;
};

// NaN anywhere poisons the reduction, the same as an unmasked array min/max.
export const columnRange = (values: readonly number[]): ColumnRange => {
  if (!values.length) return { min: Number.NaN, max: Number.NaN, range: Number.NaN };
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const v of values) {
    if (Number.isNaN(v)) return { min: Number.NaN, max: Number.NaN, range: Number.NaN };
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max, range: max - min };
};

export const minMaxNormalize = (
  values: readonly number[],
  epsilon: number,
): { normalized: number[]; range: ColumnRange } => {
  const range = columnRange(values);
  const denom = range.range + epsilon;
  return {
    normalized: values.map((v) => (v - range.min) / denom),
    range,
  };
};

/**
 * Linear-interpolated percentile, `p` in [0, 100].
 * Returns NaN for an empty series or one holding NaN.
 */
export const percentile = (values: readonly number[], p: number): number => {
  if (!values.length) return Number.NaN;
  if (values.some((v) => Number.isNaN(v))) return Number.NaN;
  const sorted = [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const pos = (Math.min(100, Math.max(0, p)) / 100) * (sorted.length - 1);
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  if (lower === upper) return sorted[lower];
  const t = pos - lower;
  return sorted[lower] * (1 - t) + sorted[upper] * t;
};

/**
 * Derivative with respect to sample index: central differences inside,
 * first differences at both ends. Needs at least 2 values.
 */
export const indexGradient = (values: readonly number[]): number[] => {
  const n = values.length;
  if (n < 2) {
    throw new RangeError(`gradient needs at least 2 values (got ${n})`);
  }
  const out = new Array<number>(n);
  out[0] = values[1] - values[0];
  out[n - 1] = values[n - 1] - values[n - 2];
  for (let i = 1; i < n - 1; i++) {
    out[i] = (values[i + 1] - values[i - 1]) / 2;
  }
  return out;
};

export const nonFiniteIndices = (values: readonly number[]): number[] => {
  const out: number[] = [];
  values.forEach((v, i) => {
    if (!Number.isFinite(v)) out.push(i);
  });
  return out;
};
