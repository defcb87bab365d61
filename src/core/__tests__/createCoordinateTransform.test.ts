import { describe, it, expect } from 'vitest';
import { computePlotArea, createCoordinateTransform } from '../transform/createCoordinateTransform';
import { defaultMargins } from '../../config/defaults';

const bounds = { minX: 0, maxX: 10, minY: 0, maxY: 100 };

describe('createCoordinateTransform - plot area', () => {
  it('subtracts the margins from the canvas', () => {
    expect(computePlotArea(800, 600, defaultMargins)).toEqual({
      left: 80,
      top: 60,
      width: 570,
      height: 460,
      right: 650,
      bottom: 520,
    });
  });

  it('keeps at least one pixel when margins exceed the canvas', () => {
    const area = computePlotArea(100, 100, defaultMargins);
    expect(area.width).toBe(1);
    expect(area.height).toBe(1);
  });
});

describe('createCoordinateTransform - mapping', () => {
  const transform = createCoordinateTransform({ bounds, width: 800, height: 600, margins: defaultMargins });

  it('maps the bounds corners to the plot area corners with y pointing down', () => {
    expect(transform.toScreen({ x: 0, y: 0 })).toEqual({ x: 80, y: 520 });
    expect(transform.toScreen({ x: 10, y: 100 })).toEqual({ x: 650, y: 60 });
  });

  it('maps the center linearly and inverts back to data space', () => {
    const screen = transform.toScreen({ x: 5, y: 50 });
    expect(screen).toEqual({ x: 365, y: 290 });
    expect(transform.toData(screen)).toEqual({ x: 5, y: 50 });
  });

  it('places the local layout inside a viewport', () => {
    const placed = createCoordinateTransform({
      bounds,
      width: 800,
      height: 600,
      margins: defaultMargins,
      viewport: { offsetX: 100, offsetY: 50, scale: 0.5 },
    });
    expect(placed.scale).toBe(0.5);
    expect(placed.toScreen({ x: 0, y: 0 })).toEqual({ x: 140, y: 310 });
    expect(placed.toDevice(800, 600)).toEqual({ x: 500, y: 350 });
  });

  it('repairs degenerate bounds before mapping', () => {
    const flat = createCoordinateTransform({
      bounds: { minX: 2, maxX: 2, minY: 0, maxY: 1 },
      width: 800,
      height: 600,
      margins: defaultMargins,
    });
    expect(flat.bounds.minX).toBe(1.5);
    expect(flat.bounds.maxX).toBe(2.5);
    expect(flat.toScreen({ x: 2, y: 0 }).x).toBe(365);
  });

  it('falls back to an identity viewport for a non-positive scale', () => {
    const t = createCoordinateTransform({
      bounds,
      width: 800,
      height: 600,
      margins: defaultMargins,
      viewport: { offsetX: 0, offsetY: 0, scale: 0 },
    });
    expect(t.scale).toBe(1);
  });
});
