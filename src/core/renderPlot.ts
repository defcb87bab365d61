/**
 * Staged render pass for one plot.
 *
 * Stages run in a fixed order:
 * computeBounds → computeTicks → buildTransform → drawGrid → drawAxes →
 * drawSeries → drawReferenceLines → drawLegend → drawTitle → finalize.
 *
 * Bounds, ticks and the transform are computed once per pass and shared by every
 * later stage. The pass only reads its input; rendering the same input twice
 * issues the same drawing calls.
 *
 * @module renderPlot
 */

import type { DataBounds, ReferenceLine, Series } from '../config/types';
import type { ResolvedPlotOptions } from '../config/OptionResolver';
import type { DrawingSurface } from '../surface/types';
import type { AxisTick, LegendEntry, PlotDrawStyle, RenderContext } from '../renderers/types';
import { computePlotBounds, type ResolvedBounds } from './bounds/computeBounds';
import { computeNiceTicks, createTickFormatter, tickStep, visibleTicks } from './axis/computeAxisTicks';
import { createCoordinateTransform, type CoordinateTransform, type Viewport } from './transform/createCoordinateTransform';
import { renderGrid } from '../renderers/renderGrid';
import { renderAxes } from '../renderers/renderAxes';
import { renderEmptyPlaceholder, renderSeries } from '../renderers/renderSeries';
import { renderReferenceLines } from '../renderers/renderReferenceLines';
import { buildLegendEntries, renderLegend } from '../renderers/renderLegend';
import { renderTitle } from '../renderers/renderTitle';

export const RENDER_STAGES = [
  'computeBounds',
  'computeTicks',
  'buildTransform',
  'drawGrid',
  'drawAxes',
  'drawSeries',
  'drawReferenceLines',
  'drawLegend',
  'drawTitle',
  'finalize',
] as const;

export type RenderStage = (typeof RENDER_STAGES)[number];

export interface PlotRenderInput {
  readonly options: ResolvedPlotOptions;
  readonly title: string;
  readonly xLabel: string;
  readonly yLabel: string;
  readonly series: ReadonlyArray<Series>;
  readonly referenceLines: ReadonlyArray<ReferenceLine>;
  readonly manualBounds: DataBounds | null;
  readonly legendEnabled: boolean;
  readonly hiddenLegendLabels: ReadonlySet<string>;
  readonly style: PlotDrawStyle;
}

export interface RenderResult {
  readonly bounds: ResolvedBounds;
  readonly xTicks: ReadonlyArray<AxisTick>;
  readonly yTicks: ReadonlyArray<AxisTick>;
  readonly transform: CoordinateTransform;
  readonly legendEntries: ReadonlyArray<LegendEntry>;
  readonly stages: ReadonlyArray<RenderStage>;
}

export interface RenderHooks {
  /** Called as each stage starts. */
  readonly onStage?: (stage: RenderStage) => void;
}

interface RenderState {
  bounds?: ResolvedBounds;
  xTicks?: AxisTick[];
  yTicks?: AxisTick[];
  transform?: CoordinateTransform;
  legendEntries: LegendEntry[];
}

const need = <T>(value: T | undefined, name: string): T => {
  if (value === undefined) throw new Error(`renderPlot: ${name} used before it was computed.`);
  return value;
};

/**
 * Numeric ticks inside `[min, max]`, labeled with a formatter derived from the tick step.
 */
export function buildAxisTicks(min: number, max: number, targetCount: number): AxisTick[] {
  const ticks = computeNiceTicks(min, max, targetCount);
  const formatter = createTickFormatter(tickStep(ticks));
  return visibleTicks(ticks, min, max).map((value) => ({ value, label: formatter(value) }));
}

/**
 * Category slots 0..n-1 labeled by name, for discrete histograms.
 */
const computeCategoryTicks = (series: ReadonlyArray<Series>, min: number, max: number): AxisTick[] | null => {
  let categories: ReadonlyArray<string> | null = null;
  for (const s of series) {
    if (s.kind === 'histogram-discrete' && (!categories || s.categories.length > categories.length)) {
      categories = s.categories;
    }
  }
  if (!categories) return null;
  return categories
    .map((label, value) => ({ value, label }))
    .filter((t) => t.value >= min && t.value <= max);
};

export function renderPlot(
  input: PlotRenderInput,
  surface: DrawingSurface,
  viewport?: Viewport,
  hooks: RenderHooks = {}
): RenderResult {
  const { options } = input;
  const state: RenderState = { legendEntries: [] };
  const stages: RenderStage[] = [];

  const context = (): RenderContext => ({
    surface,
    transform: need(state.transform, 'transform'),
    theme: options.theme,
  });

  const runStage = (stage: RenderStage): void => {
    switch (stage) {
      case 'computeBounds':
        state.bounds = computePlotBounds({
          series: input.series,
          referenceLines: input.referenceLines,
          manualBounds: input.manualBounds,
          paddingFraction: options.paddingFraction,
          histogramPaddingFraction: options.histogramPaddingFraction,
        });
        return;

      case 'computeTicks': {
        const { bounds } = need(state.bounds, 'bounds');
        state.xTicks =
          computeCategoryTicks(input.series, bounds.minX, bounds.maxX) ??
          buildAxisTicks(bounds.minX, bounds.maxX, options.tickCount);
        state.yTicks = buildAxisTicks(bounds.minY, bounds.maxY, options.tickCount);
        return;
      }

      case 'buildTransform':
        state.transform = createCoordinateTransform({
          bounds: need(state.bounds, 'bounds').bounds,
          width: options.width,
          height: options.height,
          margins: options.margins,
          viewport,
        });
        return;

      case 'drawGrid':
        renderGrid(context(), need(state.xTicks, 'xTicks'), need(state.yTicks, 'yTicks'));
        return;

      case 'drawAxes':
        renderAxes(context(), need(state.xTicks, 'xTicks'), need(state.yTicks, 'yTicks'), {
          xLabel: input.xLabel,
          yLabel: input.yLabel,
        });
        return;

      case 'drawSeries':
        if (need(state.bounds, 'bounds').isEmpty) renderEmptyPlaceholder(context());
        else renderSeries(context(), input.series, input.style);
        return;

      case 'drawReferenceLines':
        renderReferenceLines(context(), input.referenceLines);
        return;

      case 'drawLegend':
        if (!input.legendEnabled) return;
        state.legendEntries = buildLegendEntries({
          series: input.series,
          referenceLines: input.referenceLines,
          style: input.style,
          hiddenLabels: input.hiddenLegendLabels,
        });
        renderLegend(context(), state.legendEntries);
        return;

      case 'drawTitle':
        renderTitle(context(), input.title);
        return;

      case 'finalize':
        surface.setDash([]);
        return;
    }
  };

  for (const stage of RENDER_STAGES) {
    hooks.onStage?.(stage);
    runStage(stage);
    stages.push(stage);
  }

  return {
    bounds: need(state.bounds, 'bounds'),
    xTicks: need(state.xTicks, 'xTicks'),
    yTicks: need(state.yTicks, 'yTicks'),
    transform: need(state.transform, 'transform'),
    legendEntries: state.legendEntries,
    stages,
  };
}
