/**
 * Data-space to device-space mapping for one plot.
 *
 * A plot lays itself out in a local pixel space of `width` x `height`. The optional
 * viewport places that local space on the output surface (a subplot cell): device
 * coordinates are `offset + local * scale`. Outside a grid the viewport is the identity.
 *
 * @module createCoordinateTransform
 */

import type { DataBounds, PlotMargins, Point } from '../../config/types';
import { normalizeBounds } from '../bounds/computeBounds';

export interface Viewport {
  readonly offsetX: number;
  readonly offsetY: number;
  readonly scale: number;
}

export const IDENTITY_VIEWPORT: Viewport = { offsetX: 0, offsetY: 0, scale: 1 };

/**
 * Plot area rectangle in local layout pixels.
 */
export interface PlotArea {
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
  readonly right: number;
  readonly bottom: number;
}

export interface CoordinateTransformInput {
  readonly bounds: DataBounds;
  readonly width: number;
  readonly height: number;
  readonly margins: PlotMargins;
  readonly viewport?: Viewport;
}

export interface CoordinateTransform {
  readonly bounds: DataBounds;
  readonly width: number;
  readonly height: number;
  readonly plotArea: PlotArea;
  readonly viewport: Viewport;
  /** Multiplier for line widths, font sizes and marker sizes. */
  readonly scale: number;
  /** Data point to device pixels. */
  toScreen(p: Point): Point;
  /** Device pixels back to data space. */
  toData(p: Point): Point;
  /** Local layout pixels to device pixels (titles, legend, labels). */
  toDevice(x: number, y: number): Point;
}

const finiteOr = (v: number, fallback: number): number => (Number.isFinite(v) ? v : fallback);

const sanitizeViewport = (viewport: Viewport | undefined): Viewport => {
  if (!viewport) return IDENTITY_VIEWPORT;
  const scale = Number.isFinite(viewport.scale) && viewport.scale > 0 ? viewport.scale : 1;
  return { offsetX: finiteOr(viewport.offsetX, 0), offsetY: finiteOr(viewport.offsetY, 0), scale };
};

/**
 * Plot area after margins, clamped to at least 1 px per side.
 */
export function computePlotArea(width: number, height: number, margins: PlotMargins): PlotArea {
  const left = Math.max(0, finiteOr(margins.left, 0));
  const top = Math.max(0, finiteOr(margins.top, 0));
  const right = Math.max(0, finiteOr(margins.right, 0));
  const bottom = Math.max(0, finiteOr(margins.bottom, 0));

  const plotWidth = Math.max(1, finiteOr(width, 0) - left - right);
  const plotHeight = Math.max(1, finiteOr(height, 0) - top - bottom);

  return {
    left,
    top,
    width: plotWidth,
    height: plotHeight,
    right: left + plotWidth,
    bottom: top + plotHeight,
  };
}

export function createCoordinateTransform(input: CoordinateTransformInput): CoordinateTransform {
  const bounds = normalizeBounds(input.bounds);
  const viewport = sanitizeViewport(input.viewport);
  const plotArea = computePlotArea(input.width, input.height, input.margins);

  const spanX = bounds.maxX - bounds.minX;
  const spanY = bounds.maxY - bounds.minY;
  const { offsetX, offsetY, scale } = viewport;

  const toDevice = (x: number, y: number): Point => ({ x: offsetX + x * scale, y: offsetY + y * scale });

  return {
    bounds,
    width: input.width,
    height: input.height,
    plotArea,
    viewport,
    scale,
    toDevice,
    toScreen(p) {
      const localX = plotArea.left + ((p.x - bounds.minX) / spanX) * plotArea.width;
      const localY = plotArea.bottom - ((p.y - bounds.minY) / spanY) * plotArea.height;
      return toDevice(localX, localY);
    },
    toData(p) {
      const localX = (p.x - offsetX) / scale;
      const localY = (p.y - offsetY) / scale;
      return {
        x: bounds.minX + ((localX - plotArea.left) / plotArea.width) * spanX,
        y: bounds.minY + ((plotArea.bottom - localY) / plotArea.height) * spanY,
      };
    },
  };
}
