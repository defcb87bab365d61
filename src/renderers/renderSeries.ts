/**
 * Data drawing, dispatched on the series kind.
 *
 * @module renderSeries
 */

import type {
  ClusterPoint,
  ClusterSeries,
  ContinuousHistogramSeries,
  DiscreteHistogramSeries,
  PlainSeries,
  Point,
  Rgba,
  Series,
} from '../config/types';
import type { PlotDrawStyle, RenderContext } from './types';
import { drawMarker, tracePolyline, traceRect } from './shapes';
import { clusterColor, OUTLIER_LABEL } from '../core/color/createColorAssigner';
import { histogramDefaults, lineStyleDashes, typography } from '../config/defaults';
import { scaleRgb, withAlpha } from '../utils/colors';

const BAR_OUTLINE_WIDTH = 1;
const EMPTY_PLACEHOLDER_TEXT = 'Empty plot';

const isFinitePoint = (p: Point): boolean => Number.isFinite(p.x) && Number.isFinite(p.y);

const insidePlotArea = (ctx: RenderContext, p: Point): boolean => {
  const { plotArea } = ctx.transform;
  const topLeft = ctx.transform.toDevice(plotArea.left, plotArea.top);
  const bottomRight = ctx.transform.toDevice(plotArea.right, plotArea.bottom);
  const slack = 0.5;
  return (
    p.x >= topLeft.x - slack && p.x <= bottomRight.x + slack && p.y >= topLeft.y - slack && p.y <= bottomRight.y + slack
  );
};

const scaledDash = (dash: ReadonlyArray<number>, scale: number): number[] => dash.map((d) => d * scale);

/**
 * Strokes runs of finite points; a non-finite point breaks the line.
 */
const strokeLine = (ctx: RenderContext, points: ReadonlyArray<Point>, color: Rgba, width: number, dash: ReadonlyArray<number>): void => {
  const { surface, transform } = ctx;
  surface.setColor(color);
  surface.setLineWidth(width * transform.scale);
  surface.setDash(scaledDash(dash, transform.scale));

  let run: Point[] = [];
  const flush = (): void => {
    if (run.length >= 2) {
      tracePolyline(surface, run);
      surface.stroke();
    }
    run = [];
  };
  for (const p of points) {
    if (isFinitePoint(p)) run.push(transform.toScreen(p));
    else flush();
  }
  flush();
  surface.setDash([]);
};

const drawMarkers = (
  ctx: RenderContext,
  points: ReadonlyArray<Point>,
  type: PlotDrawStyle['markerType'],
  size: number,
  color: Rgba
): void => {
  for (const p of points) {
    if (!isFinitePoint(p)) continue;
    const screen = ctx.transform.toScreen(p);
    if (!insidePlotArea(ctx, screen)) continue;
    drawMarker(ctx.surface, type, screen, size * ctx.transform.scale, color);
  }
};

function renderPlainSeries(ctx: RenderContext, series: PlainSeries, style: PlotDrawStyle): void {
  const { color, pointSize, lineWidth } = series.style;

  if (style.plotKind === 'line') {
    strokeLine(ctx, series.points, color, lineWidth, lineStyleDashes[style.lineStyle]);
    if (style.showMarkers || series.points.length < 2) {
      drawMarkers(ctx, series.points, style.markerType, pointSize, color);
    }
    return;
  }

  drawMarkers(ctx, series.points, style.markerType, pointSize, color);
}

/**
 * Outliers first, then clusters in ascending label order.
 */
const orderedClusterLabels = (series: ClusterSeries): number[] => {
  const clusters = series.labels.filter((l) => l !== OUTLIER_LABEL);
  return series.labels.includes(OUTLIER_LABEL) ? [OUTLIER_LABEL, ...clusters] : clusters;
};

export const resolveClusterColor = (series: ClusterSeries, label: number): Rgba =>
  withAlpha(series.clusterColors.get(label) ?? clusterColor(label), series.alpha);

function renderClusterSeries(ctx: RenderContext, series: ClusterSeries, style: PlotDrawStyle): void {
  const groups = new Map<number, ClusterPoint[]>();
  for (const cp of series.points) {
    const group = groups.get(cp.label);
    if (group) group.push(cp);
    else groups.set(cp.label, [cp]);
  }

  for (const label of orderedClusterLabels(series)) {
    const members = groups.get(label) ?? [];
    const color = resolveClusterColor(series, label);
    const isOutlier = label === OUTLIER_LABEL;
    const points = members.map((cp) => cp.point);

    if (style.plotKind === 'line') {
      const sorted = points.slice().sort((a, b) => a.x - b.x);
      const dash = isOutlier ? lineStyleDashes.dashed : lineStyleDashes[style.lineStyle];
      strokeLine(ctx, sorted, color, series.pointSize / 2 + 1, dash);
      if (!style.showMarkers && sorted.length >= 2) continue;
    }

    if (isOutlier) drawMarkers(ctx, points, 'cross', series.pointSize + 1, color);
    else drawMarkers(ctx, points, 'circle', series.pointSize, color);
  }
}

const fillBar = (ctx: RenderContext, x0: number, x1: number, height: number, color: Rgba): void => {
  if (!(height > 0)) return;
  const { surface, transform } = ctx;
  const a = transform.toScreen({ x: x0, y: 0 });
  const b = transform.toScreen({ x: x1, y: height });

  surface.setColor(color);
  traceRect(surface, a.x, b.y, b.x, a.y);
  surface.fill();

  surface.setColor(scaleRgb(color, histogramDefaults.outlineFactor));
  surface.setLineWidth(BAR_OUTLINE_WIDTH * transform.scale);
  surface.setDash([]);
  traceRect(surface, a.x, b.y, b.x, a.y);
  surface.stroke();
};

function renderContinuousHistogram(ctx: RenderContext, series: ContinuousHistogramSeries): void {
  series.counts.forEach((count, i) => {
    fillBar(ctx, series.edges[i], series.edges[i + 1], count, series.style.color);
  });
}

function renderDiscreteHistogram(ctx: RenderContext, series: DiscreteHistogramSeries): void {
  const half = histogramDefaults.discreteBarWidth / 2;
  series.counts.forEach((count, i) => {
    fillBar(ctx, i - half, i + half, count, series.colors[i] ?? series.style.color);
  });
}

/**
 * Draws every series in insertion order.
 */
export function renderSeries(ctx: RenderContext, series: ReadonlyArray<Series>, style: PlotDrawStyle): void {
  for (const s of series) {
    switch (s.kind) {
      case 'plain':
        renderPlainSeries(ctx, s, style);
        break;
      case 'cluster':
        renderClusterSeries(ctx, s, style);
        break;
      case 'histogram-continuous':
        renderContinuousHistogram(ctx, s);
        break;
      case 'histogram-discrete':
        renderDiscreteHistogram(ctx, s);
        break;
    }
  }
}

/**
 * Centered "Empty plot" text for plots with nothing to draw.
 */
export function renderEmptyPlaceholder(ctx: RenderContext): void {
  const { surface, transform, theme } = ctx;
  const { plotArea } = transform;
  const center = transform.toDevice(plotArea.left + plotArea.width / 2, plotArea.top + plotArea.height / 2);

  surface.setColor(withAlpha(theme.textColor, 0.5));
  surface.drawText(EMPTY_PLACEHOLDER_TEXT, center, theme.fontSize * typography.titleScale * transform.scale, {
    anchor: 'middle',
    baseline: 'middle',
  });
}
