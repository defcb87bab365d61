import type { ReferenceLine } from '../config/types';
import type { RenderContext } from './types';
import { strokeSegment } from './shapes';
import { referenceLineDefaults } from '../config/defaults';

/**
 * Dashed lines across the plot area. Lines outside the current bounds are skipped.
 */
export function renderReferenceLines(ctx: RenderContext, lines: ReadonlyArray<ReferenceLine>): void {
  const { surface, transform } = ctx;
  const { plotArea, bounds, scale } = transform;

  for (const line of lines) {
    if (!Number.isFinite(line.value)) continue;

    surface.setColor(line.color);
    surface.setLineWidth(line.lineWidth * scale);
    surface.setDash(referenceLineDefaults.dash.map((d) => d * scale));

    if (line.orientation === 'vertical') {
      if (line.value < bounds.minX || line.value > bounds.maxX) continue;
      const x = transform.toScreen({ x: line.value, y: bounds.minY }).x;
      strokeSegment(surface, { x, y: transform.toDevice(0, plotArea.top).y }, { x, y: transform.toDevice(0, plotArea.bottom).y });
    } else {
      if (line.value < bounds.minY || line.value > bounds.maxY) continue;
      const y = transform.toScreen({ x: bounds.minX, y: line.value }).y;
      strokeSegment(surface, { x: transform.toDevice(plotArea.left, 0).x, y }, { x: transform.toDevice(plotArea.right, 0).x, y });
    }
  }
  surface.setDash([]);
}
