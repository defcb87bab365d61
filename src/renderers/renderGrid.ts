import type { AxisTick, RenderContext } from './types';
import { strokeSegment } from './shapes';

const GRID_LINE_WIDTH = 0.5;

/**
 * Grid lines at every visible tick, clipped to the plot area.
 */
export function renderGrid(ctx: RenderContext, xTicks: ReadonlyArray<AxisTick>, yTicks: ReadonlyArray<AxisTick>): void {
  const { surface, transform, theme } = ctx;
  const { plotArea, bounds } = transform;

  surface.setColor(theme.gridLineColor);
  surface.setLineWidth(GRID_LINE_WIDTH * transform.scale);
  surface.setDash([]);

  for (const tick of xTicks) {
    const x = transform.toScreen({ x: tick.value, y: bounds.minY }).x;
    strokeSegment(surface, { x, y: transform.toDevice(0, plotArea.top).y }, { x, y: transform.toDevice(0, plotArea.bottom).y });
  }

  for (const tick of yTicks) {
    const y = transform.toScreen({ x: bounds.minX, y: tick.value }).y;
    strokeSegment(surface, { x: transform.toDevice(plotArea.left, 0).x, y }, { x: transform.toDevice(plotArea.right, 0).x, y });
  }
}
