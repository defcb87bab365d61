/**
 * Legend entries and legend box.
 *
 * Entries follow insertion order (series first, then reference lines), are
 * de-duplicated by label, and skip hidden labels. Colors are read from the
 * series records, so hiding an entry never changes what anything else looks like.
 *
 * @module renderLegend
 */

import type { ReferenceLine, Series } from '../config/types';
import type { LegendEntry, PlotDrawStyle, RenderContext } from './types';
import { drawMarker, strokeSegment, traceRect } from './shapes';
import { resolveClusterColor } from './renderSeries';
import { defaultClusterName } from '../data/buildSeries';
import { OUTLIER_LABEL } from '../core/color/createColorAssigner';
import { legendLayout, referenceLineDefaults, typography } from '../config/defaults';

const SYMBOL_SIZE = 4;
const SYMBOL_LINE_LENGTH = 16;

const seriesEntries = (series: Series, style: PlotDrawStyle): LegendEntry[] => {
  switch (series.kind) {
    case 'plain':
      return [
        {
          label: series.style.label,
          color: series.style.color,
          symbol: style.plotKind === 'line' ? 'line' : style.markerType,
        },
      ];
    case 'cluster':
      // Labels are ascending, so outliers (-1) come first.
      return series.labels.map((label): LegendEntry => ({
        label: series.clusterNames.get(label) ?? defaultClusterName(label),
        color: resolveClusterColor(series, label),
        symbol: label === OUTLIER_LABEL ? 'cross' : 'circle',
      }));
    case 'histogram-continuous':
      return [{ label: series.style.label, color: series.style.color, symbol: 'bar' }];
    case 'histogram-discrete':
      return series.categories.map((category, i): LegendEntry => ({
        label: category,
        color: series.colors[i] ?? series.style.color,
        symbol: 'bar',
      }));
  }
};

export interface LegendInput {
  readonly series: ReadonlyArray<Series>;
  readonly referenceLines: ReadonlyArray<ReferenceLine>;
  readonly style: PlotDrawStyle;
  readonly hiddenLabels: ReadonlySet<string>;
}

export function buildLegendEntries(input: LegendInput): LegendEntry[] {
  const candidates: LegendEntry[] = [
    ...input.series.flatMap((s) => seriesEntries(s, input.style)),
    ...input.referenceLines.map((line): LegendEntry => ({ label: line.label, color: line.color, symbol: 'dashed-line' })),
  ];

  const seen = new Set<string>();
  const entries: LegendEntry[] = [];
  for (const entry of candidates) {
    if (entry.label.length === 0 || seen.has(entry.label)) continue;
    seen.add(entry.label);
    if (input.hiddenLabels.has(entry.label)) continue;
    entries.push(entry);
  }
  return entries;
}

const drawSymbol = (ctx: RenderContext, entry: LegendEntry, x: number, y: number): void => {
  const { surface, transform } = ctx;
  const scale = transform.scale;
  const center = transform.toDevice(x, y);

  switch (entry.symbol) {
    case 'line':
    case 'dashed-line': {
      surface.setColor(entry.color);
      surface.setLineWidth(2 * scale);
      surface.setDash(entry.symbol === 'dashed-line' ? referenceLineDefaults.dash.map((d) => d * scale) : []);
      const half = (SYMBOL_LINE_LENGTH / 2) * scale;
      strokeSegment(surface, { x: center.x - half, y: center.y }, { x: center.x + half, y: center.y });
      surface.setDash([]);
      return;
    }
    case 'bar': {
      const half = (SYMBOL_SIZE + 1) * scale;
      surface.setColor(entry.color);
      traceRect(surface, center.x - half, center.y - half, center.x + half, center.y + half);
      surface.fill();
      return;
    }
    default:
      drawMarker(surface, entry.symbol, center, SYMBOL_SIZE * scale, entry.color);
  }
};

/**
 * Draws the legend in the right margin, level with the top of the plot area.
 * Draws nothing when `entries` is empty.
 */
export function renderLegend(ctx: RenderContext, entries: ReadonlyArray<LegendEntry>): void {
  if (entries.length === 0) return;

  const { surface, transform, theme } = ctx;
  const scale = transform.scale;
  const fontSize = theme.fontSize * typography.legendScale;
  const { offsetX, offsetY, lineHeight, padding, markerOffset, textOffset } = legendLayout;

  const x0 = transform.plotArea.right + offsetX;
  const y0 = transform.plotArea.top + offsetY;

  const longest = entries.reduce((max, e) => Math.max(max, surface.measureText(e.label, fontSize).width), 0);
  const boxLeft = x0 - padding;
  const boxTop = y0 - lineHeight / 2 - padding;
  const boxRight = x0 + textOffset + longest + padding;
  const boxBottom = y0 + (entries.length - 0.5) * lineHeight + padding;

  const tl = transform.toDevice(boxLeft, boxTop);
  const br = transform.toDevice(boxRight, boxBottom);

  surface.setColor(theme.legendBackgroundColor);
  traceRect(surface, tl.x, tl.y, br.x, br.y);
  surface.fill();

  surface.setColor(theme.legendBorderColor);
  surface.setLineWidth(scale);
  surface.setDash([]);
  traceRect(surface, tl.x, tl.y, br.x, br.y);
  surface.stroke();

  entries.forEach((entry, i) => {
    const rowY = y0 + i * lineHeight;
    drawSymbol(ctx, entry, x0 + markerOffset, rowY);
    surface.setColor(theme.textColor);
    surface.drawText(entry.label, transform.toDevice(x0 + textOffset, rowY), fontSize * scale, { baseline: 'middle' });
  });
}
