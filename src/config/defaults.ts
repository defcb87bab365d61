import type { BinCountRange, LineStyle, MarkerType, PlotMargins } from './types';

export const defaultMargins = {
  left: 80,
  right: 150,
  top: 60,
  bottom: 80,
} as const satisfies PlotMargins;

export const defaultPlotSize = {
  width: 800,
  height: 600,
} as const;

export const defaultGridSize = {
  width: 1200,
  height: 900,
  spacing: 0.05,
} as const;

/** Spacing is clamped to this so cells keep a positive size. */
export const maxGridSpacing = 0.45;

export const defaultAutoBinRange = {
  min: 5,
  max: 50,
} as const satisfies BinCountRange;

export const defaultLayout = {
  tickCount: 6,
  paddingFraction: 0.05,
  histogramPaddingFraction: 0.02,
} as const;

export const seriesDefaults = {
  pointSize: 4,
  lineWidth: 2,
  markerType: 'circle' as MarkerType,
  lineStyle: 'solid' as LineStyle,
  showMarkers: false,
} as const;

export const clusterDefaults = {
  pointSize: 3,
  alpha: 0.8,
} as const;

export const referenceLineDefaults = {
  lineWidth: 1.5,
  dash: [4, 4],
} as const;

/** Dash patterns in pixels for line plot styles. */
export const lineStyleDashes = {
  solid: [],
  dashed: [10, 5],
  dotted: [2, 3],
} as const satisfies Record<LineStyle, readonly number[]>;

/**
 * Font sizes relative to `theme.fontSize` (tick labels).
 */
export const typography = {
  titleScale: 1.6,
  axisLabelScale: 1.2,
  legendScale: 1.1,
  gridTitleScale: 2,
} as const;

export const legendLayout = {
  offsetX: 10,
  offsetY: 20,
  lineHeight: 20,
  padding: 5,
  markerOffset: 8,
  textOffset: 20,
} as const;

export const axisLayout = {
  tickLength: 5,
  tickLabelGap: 15,
  titleBaseline: 25,
  xLabelInset: 15,
  yLabelInset: 20,
} as const;

export const histogramDefaults = {
  /** 0 selects the bin count automatically. */
  binCount: 0,
  yLabel: 'Frequency',
  outlineFactor: 0.7,
  discreteBarWidth: 0.8,
} as const;
