import { describe, it, expect } from 'vitest';
import { resolvePlotOptions, resolveSubplotGridOptions, resolveTheme } from '../OptionResolver';
import { InvalidArgumentError } from '../../errors';

describe('OptionResolver - plot options', () => {
  it('fills every default', () => {
    const resolved = resolvePlotOptions();
    expect(resolved.width).toBe(800);
    expect(resolved.height).toBe(600);
    expect(resolved.margins).toEqual({ left: 80, right: 150, top: 60, bottom: 80 });
    expect(resolved.tickCount).toBe(6);
    expect(resolved.paddingFraction).toBe(0.05);
    expect(resolved.histogramPaddingFraction).toBe(0.02);
    expect(resolved.autoBinRange).toEqual({ min: 5, max: 50 });
    expect(resolved.palette).toHaveLength(10);
  });

  it('replaces invalid numbers with defaults', () => {
    const resolved = resolvePlotOptions({ width: -5, height: Number.NaN, paddingFraction: 2, tickCount: 0 });
    expect(resolved.width).toBe(800);
    expect(resolved.height).toBe(600);
    expect(resolved.paddingFraction).toBe(0.05);
    expect(resolved.tickCount).toBe(6);
  });

  it('merges partial margins', () => {
    expect(resolvePlotOptions({ margins: { left: 10 } }).margins).toEqual({ left: 10, right: 150, top: 60, bottom: 80 });
  });

  it('keeps the bin range ordered', () => {
    expect(resolvePlotOptions({ autoBinRange: { min: 20, max: 10 } }).autoBinRange).toEqual({ min: 20, max: 20 });
  });

  it('resolves a custom palette and drops unknown entries', () => {
    expect(resolvePlotOptions({ palette: ['red', 'nope', '#0000ff'] }).palette).toEqual([
      [1, 0, 0, 0.8],
      [0, 0, 1, 1],
    ]);
  });

  it('falls back to the light palette when fewer than two colors resolve', () => {
    expect(resolvePlotOptions({ palette: ['red'] }).palette).toEqual(resolvePlotOptions().palette);
  });
});

describe('OptionResolver - themes', () => {
  it('parses the dark theme', () => {
    const theme = resolveTheme('dark');
    expect(theme.backgroundColor).toEqual([0x1a / 255, 0x1a / 255, 0x2e / 255, 1]);
    expect(theme.fontSize).toBe(10);
  });

  it('merges a partial theme over the light theme', () => {
    const theme = resolveTheme({ textColor: '#ff0000', fontSize: 14 });
    expect(theme.textColor).toEqual([1, 0, 0, 1]);
    expect(theme.backgroundColor).toEqual([1, 1, 1, 1]);
    expect(theme.fontSize).toBe(14);
  });

  it('falls back to the base color when a theme color does not parse', () => {
    expect(resolveTheme({ axisLineColor: 'not-a-color' }).axisLineColor).toEqual([0, 0, 0, 1]);
  });
});

describe('OptionResolver - subplot grids', () => {
  it('fills grid defaults', () => {
    expect(resolveSubplotGridOptions({ rows: 2, cols: 3 })).toEqual({
      rows: 2,
      cols: 3,
      width: 1200,
      height: 900,
      spacing: 0.05,
      plot: {},
    });
  });

  it('clamps spacing', () => {
    expect(resolveSubplotGridOptions({ rows: 1, cols: 1, spacing: 0.9 }).spacing).toBe(0.45);
  });

  it('rejects non-positive or fractional dimensions', () => {
    expect(() => resolveSubplotGridOptions({ rows: 0, cols: 2 })).toThrow(InvalidArgumentError);
    expect(() => resolveSubplotGridOptions({ rows: 1.5, cols: 2 })).toThrow(
      'SubplotGrid: rows and cols must be positive integers (got 1.5x2)'
    );
  });
});
