import { describe, it, expect } from 'vitest';
import type { ReferenceLine, Series } from '../../config/types';
import { computePlotBounds, computeRawBounds, DEFAULT_BOUNDS, normalizeDomain } from '../bounds/computeBounds';

const style = { pointSize: 4, lineWidth: 2, color: [0, 0, 1, 0.8] as const, label: 'data' };

const plain = (points: Array<[number, number]>): Series => ({
  kind: 'plain',
  name: 'data',
  points: points.map(([x, y]) => ({ x, y })),
  style,
});

const horizontal = (value: number): ReferenceLine => ({
  orientation: 'horizontal',
  value,
  label: 'limit',
  color: [1, 0, 0, 0.8],
  lineWidth: 1.5,
});

describe('computeBounds - point data', () => {
  it('pads each axis by 5% of its span', () => {
    const { bounds, source, isEmpty } = computePlotBounds({
      series: [plain([[1, 2], [5, 10]])],
      referenceLines: [],
    });
    expect(source).toBe('data');
    expect(isEmpty).toBe(false);
    expect(bounds.minX).toBeCloseTo(0.8);
    expect(bounds.maxX).toBeCloseTo(5.2);
    expect(bounds.minY).toBeCloseTo(1.6);
    expect(bounds.maxY).toBeCloseTo(10.4);
  });

  it('widens a single point to a unit span before padding', () => {
    const { bounds } = computePlotBounds({ series: [plain([[3, 3]])], referenceLines: [] });
    expect(bounds.minX).toBeCloseTo(2.45);
    expect(bounds.maxX).toBeCloseTo(3.55);
    expect(bounds.minY).toBeCloseTo(2.45);
    expect(bounds.maxY).toBeCloseTo(3.55);
  });

  it('includes reference lines, leaving an axis without values at 0..1', () => {
    const { bounds } = computePlotBounds({ series: [], referenceLines: [horizontal(5)] });
    expect(bounds.minX).toBe(0);
    expect(bounds.maxX).toBe(1);
    expect(bounds.minY).toBeCloseTo(4.45);
    expect(bounds.maxY).toBeCloseTo(5.55);
  });

  it('ignores non-finite coordinates', () => {
    expect(computeRawBounds([plain([[Number.NaN, 1], [2, 4], [6, Number.POSITIVE_INFINITY]])], [])).toEqual({
      minX: 2,
      maxX: 6,
      minY: 1,
      maxY: 4,
    });
  });
});

describe('computeBounds - manual and empty', () => {
  it('uses manual bounds without padding, repairing reversed and equal limits', () => {
    const resolved = computePlotBounds({
      series: [plain([[100, 100]])],
      referenceLines: [],
      manualBounds: { minX: 5, maxX: 1, minY: 2, maxY: 2 },
    });
    expect(resolved.source).toBe('manual');
    expect(resolved.bounds).toEqual({ minX: 1, maxX: 5, minY: 1.5, maxY: 2.5 });
  });

  it('falls back to the unit square for an empty plot', () => {
    const resolved = computePlotBounds({ series: [], referenceLines: [] });
    expect(resolved).toEqual({ bounds: DEFAULT_BOUNDS, source: 'fallback', isEmpty: true });
  });

  it('maps non-finite domains to 0..1', () => {
    expect(normalizeDomain(Number.NaN, 3)).toEqual({ min: 0, max: 1 });
  });
});

describe('computeBounds - histograms', () => {
  const histogramStyle = { ...style, label: 'hist' };

  it('spans the bin edges with histogram padding and starts y at zero', () => {
    const { bounds, source } = computePlotBounds({
      series: [
        {
          kind: 'histogram-continuous',
          name: 'hist',
          values: [],
          edges: [0, 10 / 3, 20 / 3, 10],
          counts: [3, 5, 2],
          style: histogramStyle,
        },
      ],
      referenceLines: [],
    });
    expect(source).toBe('histogram');
    expect(bounds.minX).toBeCloseTo(-0.2);
    expect(bounds.maxX).toBeCloseTo(10.2);
    expect(bounds.minY).toBe(0);
    expect(bounds.maxY).toBeCloseTo(5.25);
  });

  it('spans category slots for discrete data', () => {
    const { bounds } = computePlotBounds({
      series: [
        {
          kind: 'histogram-discrete',
          name: 'cats',
          categories: ['a', 'b', 'c'],
          counts: [4, 0, 6],
          colors: [style.color, style.color, style.color],
          style: histogramStyle,
        },
      ],
      referenceLines: [],
    });
    expect(bounds.minX).toBe(-0.5);
    expect(bounds.maxX).toBe(2.5);
    expect(bounds.minY).toBe(0);
    expect(bounds.maxY).toBeCloseTo(6.3);
  });

  it('gives all-zero counts a unit y span', () => {
    const { bounds } = computePlotBounds({
      series: [
        {
          kind: 'histogram-discrete',
          name: 'cats',
          categories: ['a'],
          counts: [0],
          colors: [style.color],
          style: histogramStyle,
        },
      ],
      referenceLines: [],
    });
    expect(bounds.minY).toBe(0);
    expect(bounds.maxY).toBeCloseTo(1.05);
  });
});
