/**
 * Data extents for a plot: tight box over every series and reference line,
 * padded, with manual override and degenerate-range repair.
 *
 * @module computeBounds
 */

import type { DataBounds, ReferenceLine, Series } from '../../config/types';
import { defaultLayout } from '../../config/defaults';

export const DEFAULT_BOUNDS: DataBounds = { minX: 0, maxX: 1, minY: 0, maxY: 1 };

/** Half-width of the span synthesized around a single value. */
export const DEGENERATE_HALF_SPAN = 0.5;

export type BoundsSource = 'manual' | 'data' | 'histogram' | 'fallback';

export interface ResolvedBounds {
  readonly bounds: DataBounds;
  readonly source: BoundsSource;
  /** No series and no reference lines. */
  readonly isEmpty: boolean;
}

export interface ComputePlotBoundsInput {
  readonly series: ReadonlyArray<Series>;
  readonly referenceLines: ReadonlyArray<ReferenceLine>;
  readonly manualBounds?: DataBounds | null;
  readonly paddingFraction?: number;
  readonly histogramPaddingFraction?: number;
}

interface AxisExtent {
  min: number;
  max: number;
}

const emptyExtent = (): AxisExtent => ({ min: Number.POSITIVE_INFINITY, max: Number.NEGATIVE_INFINITY });

const include = (extent: AxisExtent, v: number): void => {
  if (!Number.isFinite(v)) return;
  if (v < extent.min) extent.min = v;
  if (v > extent.max) extent.max = v;
};

const hasValues = (extent: AxisExtent): boolean => extent.min <= extent.max;

/**
 * Returns a finite, ordered, non-degenerate domain.
 * Non-finite input maps to 0..1; `min == max` widens by {@link DEGENERATE_HALF_SPAN}.
 */
export const normalizeDomain = (minIn: number, maxIn: number): { readonly min: number; readonly max: number } => {
  let min = minIn;
  let max = maxIn;

  if (!Number.isFinite(min) || !Number.isFinite(max)) return { min: 0, max: 1 };
  if (min > max) {
    const t = min;
    min = max;
    max = t;
  }
  if (min === max) return { min: min - DEGENERATE_HALF_SPAN, max: max + DEGENERATE_HALF_SPAN };
  return { min, max };
};

export const normalizeBounds = (bounds: DataBounds): DataBounds => {
  const x = normalizeDomain(bounds.minX, bounds.maxX);
  const y = normalizeDomain(bounds.minY, bounds.maxY);
  return { minX: x.min, maxX: x.max, minY: y.min, maxY: y.max };
};

const padDomain = (extent: AxisExtent, fraction: number): { min: number; max: number } => {
  if (!hasValues(extent)) return { min: DEFAULT_BOUNDS.minX, max: DEFAULT_BOUNDS.maxX };
  const { min, max } = normalizeDomain(extent.min, extent.max);
  const pad = (max - min) * fraction;
  return { min: min - pad, max: max + pad };
};

const includeReferenceLines = (x: AxisExtent, y: AxisExtent, lines: ReadonlyArray<ReferenceLine>): void => {
  for (const line of lines) {
    include(line.orientation === 'vertical' ? x : y, line.value);
  }
};

const collectPointExtents = (
  series: ReadonlyArray<Series>,
  referenceLines: ReadonlyArray<ReferenceLine>
): { readonly x: AxisExtent; readonly y: AxisExtent } => {
  const x = emptyExtent();
  const y = emptyExtent();

  for (const s of series) {
    switch (s.kind) {
      case 'plain':
        for (const p of s.points) {
          include(x, p.x);
          include(y, p.y);
        }
        break;
      case 'cluster':
        for (const cp of s.points) {
          include(x, cp.point.x);
          include(y, cp.point.y);
        }
        break;
      case 'histogram-continuous':
      case 'histogram-discrete':
        break;
    }
  }
  includeReferenceLines(x, y, referenceLines);
  return { x, y };
};

/**
 * Tight, unpadded extents over plain and cluster points plus reference lines.
 * An axis nothing contributes to reads 0..1. Returns null when nothing contributes at all.
 */
export function computeRawBounds(
  series: ReadonlyArray<Series>,
  referenceLines: ReadonlyArray<ReferenceLine>
): DataBounds | null {
  const { x, y } = collectPointExtents(series, referenceLines);
  if (!hasValues(x) && !hasValues(y)) return null;
  return {
    minX: hasValues(x) ? x.min : DEFAULT_BOUNDS.minX,
    maxX: hasValues(x) ? x.max : DEFAULT_BOUNDS.maxX,
    minY: hasValues(y) ? y.min : DEFAULT_BOUNDS.minY,
    maxY: hasValues(y) ? y.max : DEFAULT_BOUNDS.maxY,
  };
}

const computeHistogramBounds = (
  series: ReadonlyArray<Series>,
  referenceLines: ReadonlyArray<ReferenceLine>,
  paddingFraction: number,
  histogramPaddingFraction: number
): DataBounds => {
  const x = emptyExtent();
  const y = emptyExtent();
  let continuous = false;
  include(y, 0);

  for (const s of series) {
    if (s.kind === 'histogram-continuous') {
      continuous = true;
      include(x, s.edges[0]);
      include(x, s.edges[s.edges.length - 1]);
      for (const c of s.counts) include(y, c);
    } else if (s.kind === 'histogram-discrete') {
      include(x, -0.5);
      include(x, s.counts.length - 0.5);
      for (const c of s.counts) include(y, c);
    }
  }
  includeReferenceLines(x, y, referenceLines);

  const xDomain = continuous ? padDomain(x, histogramPaddingFraction) : padDomain(x, 0);
  const yDomain = y.max > y.min ? { min: y.min, max: y.max } : { min: y.min, max: y.min + 1 };
  const yPad = (yDomain.max - yDomain.min) * paddingFraction;
  return {
    minX: xDomain.min,
    maxX: xDomain.max,
    minY: yDomain.min,
    maxY: yDomain.max + yPad,
  };
};

/**
 * Bounds used for one render pass.
 *
 * Manual bounds win and are only normalized. With histogram series present,
 * bounds derive from bin edges / category slots and counts (y starts at 0).
 * Otherwise every axis is padded by `paddingFraction` of its span.
 */
export function computePlotBounds(input: ComputePlotBoundsInput): ResolvedBounds {
  const isEmpty = input.series.length === 0 && input.referenceLines.length === 0;
  const paddingFraction = input.paddingFraction ?? defaultLayout.paddingFraction;
  const histogramPaddingFraction = input.histogramPaddingFraction ?? defaultLayout.histogramPaddingFraction;

  if (input.manualBounds) {
    return { bounds: normalizeBounds(input.manualBounds), source: 'manual', isEmpty };
  }
  if (isEmpty) {
    return { bounds: DEFAULT_BOUNDS, source: 'fallback', isEmpty };
  }

  const hasHistogram = input.series.some(
    (s) => s.kind === 'histogram-continuous' || s.kind === 'histogram-discrete'
  );
  if (hasHistogram) {
    return {
      bounds: computeHistogramBounds(input.series, input.referenceLines, paddingFraction, histogramPaddingFraction),
      source: 'histogram',
      isEmpty,
    };
  }

  const { x, y } = collectPointExtents(input.series, input.referenceLines);
  if (!hasValues(x) && !hasValues(y)) return { bounds: DEFAULT_BOUNDS, source: 'fallback', isEmpty };

  const px = padDomain(x, paddingFraction);
  const py = padDomain(y, paddingFraction);
  return { bounds: { minX: px.min, maxX: px.max, minY: py.min, maxY: py.max }, source: 'data', isEmpty };
}
