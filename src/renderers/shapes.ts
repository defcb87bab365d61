import type { MarkerType, Point, Rgba } from '../config/types';
import type { DrawingSurface } from '../surface/types';

// Control-point distance for a quarter circle drawn as one cubic Bezier.
const KAPPA = 0.5522847498;

export function tracePolyline(surface: DrawingSurface, points: ReadonlyArray<Point>): void {
  points.forEach((p, i) => (i === 0 ? surface.moveTo(p.x, p.y) : surface.lineTo(p.x, p.y)));
}

export function traceRect(surface: DrawingSurface, x0: number, y0: number, x1: number, y1: number): void {
  surface.moveTo(x0, y0);
  surface.lineTo(x1, y0);
  surface.lineTo(x1, y1);
  surface.lineTo(x0, y1);
  surface.closePath();
}

export function traceCircle(surface: DrawingSurface, cx: number, cy: number, r: number): void {
  const k = r * KAPPA;
  surface.moveTo(cx + r, cy);
  surface.curveTo(cx + r, cy + k, cx + k, cy + r, cx, cy + r);
  surface.curveTo(cx - k, cy + r, cx - r, cy + k, cx - r, cy);
  surface.curveTo(cx - r, cy - k, cx - k, cy - r, cx, cy - r);
  surface.curveTo(cx + k, cy - r, cx + r, cy - k, cx + r, cy);
  surface.closePath();
}

export function strokeSegment(surface: DrawingSurface, a: Point, b: Point): void {
  surface.moveTo(a.x, a.y);
  surface.lineTo(b.x, b.y);
  surface.stroke();
}

/**
 * Draws one marker of radius `size` centered on `center` (device pixels).
 * Crosses are stroked; the other shapes are filled.
 */
export function drawMarker(
  surface: DrawingSurface,
  type: MarkerType,
  center: Point,
  size: number,
  color: Rgba
): void {
  const { x, y } = center;
  surface.setColor(color);

  switch (type) {
    case 'circle':
      traceCircle(surface, x, y, size);
      surface.fill();
      return;
    case 'square':
      traceRect(surface, x - size, y - size, x + size, y + size);
      surface.fill();
      return;
    case 'triangle':
      surface.moveTo(x, y - size);
      surface.lineTo(x + size, y + size);
      surface.lineTo(x - size, y + size);
      surface.closePath();
      surface.fill();
      return;
    case 'cross':
      surface.setDash([]);
      surface.setLineWidth(Math.max(1, size / 2));
      surface.moveTo(x - size, y - size);
      surface.lineTo(x + size, y + size);
      surface.moveTo(x + size, y - size);
      surface.lineTo(x - size, y + size);
      surface.stroke();
      return;
  }
}
