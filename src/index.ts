/**
 * plotframe - 2D scatter, line and histogram plots rendered to SVG and PNG
 */

export const version = '0.1.0';

// Plots
export { Plot } from './plots/Plot';
export { XYPlot } from './plots/XYPlot';
export type { SeriesStyleInput } from './plots/XYPlot';
export { ScatterPlot } from './plots/ScatterPlot';
export { LinePlot } from './plots/LinePlot';
export { HistogramPlot } from './plots/HistogramPlot';
export { SubplotGrid } from './plots/SubplotGrid';
export type { AnyPlot, PlotByKind } from './plots/SubplotGrid';

// Errors
export { PlotError, InvalidArgumentError, OutOfRangeError } from './errors';

// Configuration
export type {
  BinCountRange,
  ClusterPoint,
  ClusterSeries,
  ColorInput,
  ColorName,
  ContinuousHistogramSeries,
  DataBounds,
  DiscreteHistogramSeries,
  HistogramSeries,
  LineStyle,
  MarkerType,
  PlainSeries,
  PlotKind,
  PlotMargins,
  PlotOptions,
  Point,
  ReferenceLine,
  ReferenceLineOrientation,
  Rgba,
  Series,
  SeriesKind,
  SeriesStyle,
  SubplotGridOptions,
  ThemeName,
} from './config/types';
export { defaultMargins, defaultPlotSize, defaultGridSize, defaultLayout } from './config/defaults';
export { resolvePlotOptions, resolveSubplotGridOptions, resolveTheme } from './config/OptionResolver';
export type { ResolvedPlotOptions, ResolvedSubplotGridOptions, ResolvedTheme } from './config/OptionResolver';

// Themes
export { darkTheme, lightTheme, getTheme } from './themes';
export type { ThemeConfig } from './themes';

// Core algorithms
export { computeNiceStep, computeNiceTicks, createTickFormatter, formatNumber } from './core/axis/computeAxisTicks';
export type { TickFormatter } from './core/axis/computeAxisTicks';
export { computePlotBounds, computeRawBounds } from './core/bounds/computeBounds';
export type { ResolvedBounds } from './core/bounds/computeBounds';
export { computePlotArea, createCoordinateTransform } from './core/transform/createCoordinateTransform';
export type { CoordinateTransform, PlotArea, Viewport } from './core/transform/createCoordinateTransform';
export { clusterColor, createColorAssigner, CLUSTER_PALETTE, OUTLIER_LABEL } from './core/color/createColorAssigner';
export type { ColorAssigner, ColorContext } from './core/color/createColorAssigner';
export { autoBinCount, computeBinEdges, computeHistogramBins, cumulativeCounts } from './core/histogram/computeHistogramBins';
export type { HistogramBins } from './core/histogram/computeHistogramBins';
export { computeSubplotLayout } from './core/layout/computeSubplotLayout';
export type { SubplotCellLayout, SubplotLayout } from './core/layout/computeSubplotLayout';
export { renderPlot, RENDER_STAGES } from './core/renderPlot';
export type { PlotRenderInput, RenderHooks, RenderResult, RenderStage } from './core/renderPlot';

// Drawing surfaces
export { createSvgSurface } from './surface/createSvgSurface';
export type { SvgSurface, SvgSurfaceOptions } from './surface/createSvgSurface';
export type { DrawingSurface, FontWeight, TextAnchor, TextBaseline, TextOptions, TextSize } from './surface/types';
export type { AxisTick, LegendEntry } from './renderers/types';
