/**
 * Histogram binning for continuous data.
 *
 * Bin i covers `[edge[i], edge[i+1])`; the last bin is closed so the maximum
 * value is always counted and counts sum to the number of values.
 *
 * @module computeHistogramBins
 */

import type { BinCountRange } from '../../config/types';
import { defaultAutoBinRange } from '../../config/defaults';
import { DEGENERATE_HALF_SPAN } from '../bounds/computeBounds';
import { InvalidArgumentError } from '../../errors';

export interface HistogramBins {
  readonly binCount: number;
  /** `binCount + 1` ascending edges. */
  readonly edges: number[];
  readonly counts: number[];
}

/**
 * Sturges' rule, `ceil(log2(n) + 1)`, clamped to `range`.
 */
export function autoBinCount(n: number, range: BinCountRange = defaultAutoBinRange): number {
  const sturges = n > 0 ? Math.ceil(Math.log2(n) + 1) : range.min;
  return Math.max(range.min, Math.min(range.max, sturges));
}

/**
 * `binCount + 1` equally spaced edges over `[min, max]`; the last edge is exactly `max`.
 * `min == max` widens to `[v - 0.5, v + 0.5]`.
 */
export function computeBinEdges(min: number, max: number, binCount: number): number[] {
  let lo = min;
  let hi = max;
  if (lo === hi) {
    lo -= DEGENERATE_HALF_SPAN;
    hi += DEGENERATE_HALF_SPAN;
  }

  const width = (hi - lo) / binCount;
  const edges: number[] = [];
  for (let i = 0; i < binCount; i++) edges.push(lo + i * width);
  edges.push(hi);
  return edges;
}

/**
 * Index of the bin holding `v`, or -1 when `v` is outside the edges.
 */
export function findBinIndex(edges: ReadonlyArray<number>, v: number): number {
  const last = edges.length - 1;
  if (last < 1 || !(v >= edges[0] && v <= edges[last])) return -1;
  if (v === edges[last]) return last - 1;

  let lo = 0;
  let hi = last - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (edges[mid] <= v) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

export function countIntoBins(values: ReadonlyArray<number>, edges: ReadonlyArray<number>): number[] {
  const counts = new Array<number>(Math.max(0, edges.length - 1)).fill(0);
  for (const v of values) {
    const i = findBinIndex(edges, v);
    if (i >= 0) counts[i]++;
  }
  return counts;
}

const validateBinCount = (requested: number): void => {
  if (!Number.isInteger(requested) || requested < 0) {
    throw new InvalidArgumentError(
      'computeHistogramBins',
      `bin count must be a non-negative integer (got ${requested})`,
      'pass 0 to choose the bin count automatically'
    );
  }
};

/**
 * Bins `values` into `requestedBinCount` bins (0 = automatic).
 * `values` must be non-empty and finite.
 */
export function computeHistogramBins(
  values: ReadonlyArray<number>,
  requestedBinCount: number = 0,
  autoRange: BinCountRange = defaultAutoBinRange
): HistogramBins {
  validateBinCount(requestedBinCount);
  if (values.length === 0) {
    throw new InvalidArgumentError('computeHistogramBins', 'values must not be empty');
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (!Number.isFinite(v)) {
      throw new InvalidArgumentError('computeHistogramBins', `values[${i}] is not a finite number (${v})`);
    }
    if (v < min) min = v;
    if (v > max) max = v;
  }

  const binCount = requestedBinCount === 0 ? autoBinCount(values.length, autoRange) : requestedBinCount;
  const edges = computeBinEdges(min, max, binCount);
  return { binCount, edges, counts: countIntoBins(values, edges) };
}

/**
 * Running totals of `counts`.
 */
export function cumulativeCounts(counts: ReadonlyArray<number>): number[] {
  const out: number[] = [];
  let total = 0;
  for (const c of counts) {
    total += c;
    out.push(total);
  }
  return out;
}

/**
 * Validates per-category counts for a discrete histogram.
 */
export function validateDiscreteCounts(counts: ReadonlyArray<number>, operation: string): void {
  counts.forEach((c, i) => {
    if (!Number.isInteger(c) || c < 0) {
      throw new InvalidArgumentError(operation, `counts[${i}] must be a non-negative integer (got ${c})`);
    }
  });
}
