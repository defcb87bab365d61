/**
 * Axis lines, tick marks, tick labels and axis titles.
 *
 * Tick marks and labels come from the same tick list the grid uses.
 *
 * @module renderAxes
 */

import type { AxisTick, RenderContext } from './types';
import { strokeSegment } from './shapes';
import { axisLayout, typography } from '../config/defaults';

const AXIS_LINE_WIDTH = 1.5;
const TICK_LINE_WIDTH = 1;
const Y_TICK_LABEL_GAP = 8;

export interface AxisLabels {
  readonly xLabel: string;
  readonly yLabel: string;
}

export function renderAxes(
  ctx: RenderContext,
  xTicks: ReadonlyArray<AxisTick>,
  yTicks: ReadonlyArray<AxisTick>,
  labels: AxisLabels
): void {
  const { surface, transform, theme } = ctx;
  const { plotArea, bounds, scale } = transform;

  const bottomLeft = transform.toDevice(plotArea.left, plotArea.bottom);
  const bottomRight = transform.toDevice(plotArea.right, plotArea.bottom);
  const topLeft = transform.toDevice(plotArea.left, plotArea.top);

  surface.setDash([]);
  surface.setColor(theme.axisLineColor);
  surface.setLineWidth(AXIS_LINE_WIDTH * scale);
  strokeSegment(surface, bottomLeft, bottomRight);
  strokeSegment(surface, bottomLeft, topLeft);

  const tickLength = axisLayout.tickLength * scale;
  const fontSize = theme.fontSize * scale;

  surface.setColor(theme.axisTickColor);
  surface.setLineWidth(TICK_LINE_WIDTH * scale);
  for (const tick of xTicks) {
    const x = transform.toScreen({ x: tick.value, y: bounds.minY }).x;
    strokeSegment(surface, { x, y: bottomLeft.y }, { x, y: bottomLeft.y + tickLength });
  }
  for (const tick of yTicks) {
    const y = transform.toScreen({ x: bounds.minX, y: tick.value }).y;
    strokeSegment(surface, { x: bottomLeft.x - tickLength, y }, { x: bottomLeft.x, y });
  }

  surface.setColor(theme.textColor);
  for (const tick of xTicks) {
    const x = transform.toScreen({ x: tick.value, y: bounds.minY }).x;
    surface.drawText(tick.label, { x, y: bottomLeft.y + axisLayout.tickLabelGap * scale }, fontSize, {
      anchor: 'middle',
    });
  }
  for (const tick of yTicks) {
    const y = transform.toScreen({ x: bounds.minX, y: tick.value }).y;
    surface.drawText(tick.label, { x: bottomLeft.x - Y_TICK_LABEL_GAP * scale, y }, fontSize, {
      anchor: 'end',
      baseline: 'middle',
    });
  }

  const titleSize = theme.fontSize * typography.axisLabelScale * scale;
  if (labels.xLabel.length > 0) {
    const pos = transform.toDevice(plotArea.left + plotArea.width / 2, transform.height - axisLayout.xLabelInset);
    surface.drawText(labels.xLabel, pos, titleSize, { anchor: 'middle', weight: 'bold' });
  }
  if (labels.yLabel.length > 0) {
    const pos = transform.toDevice(axisLayout.yLabelInset, plotArea.top + plotArea.height / 2);
    surface.drawText(labels.yLabel, pos, titleSize, { anchor: 'middle', weight: 'bold', rotation: -90 });
  }
}
