/**
 * Plot configuration and data model types.
 */

import type { ThemeConfig } from '../themes/types';

export type PlotKind = 'scatter' | 'line' | 'histogram';

/**
 * RGBA color with every component in [0, 1].
 */
export type Rgba = readonly [r: number, g: number, b: number, a: number];

export type ColorName =
  | 'red'
  | 'blue'
  | 'green'
  | 'orange'
  | 'purple'
  | 'cyan'
  | 'magenta'
  | 'yellow'
  | 'black'
  | 'gray';

/**
 * A color name, a CSS `#hex` / `rgb()` / `rgba()` string, or an RGBA tuple.
 */
export type ColorInput = ColorName | (string & {}) | Rgba;

export type MarkerType = 'circle' | 'cross' | 'square' | 'triangle';

export type LineStyle = 'solid' | 'dashed' | 'dotted';

export type ThemeName = 'light' | 'dark';

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface SeriesStyle {
  readonly pointSize: number;
  readonly lineWidth: number;
  readonly color: Rgba;
  readonly label: string;
}

export interface PlainSeries {
  readonly kind: 'plain';
  readonly name: string;
  readonly points: ReadonlyArray<Point>;
  readonly style: SeriesStyle;
}

export interface ClusterPoint {
  readonly point: Point;
  /** `-1` marks an outlier, `>= 0` a cluster id. */
  readonly label: number;
}

export interface ClusterSeries {
  readonly kind: 'cluster';
  readonly name: string;
  readonly points: ReadonlyArray<ClusterPoint>;
  readonly pointSize: number;
  readonly alpha: number;
  /** Distinct labels, ascending. */
  readonly labels: ReadonlyArray<number>;
  readonly clusterNames: ReadonlyMap<number, string>;
  readonly clusterColors: ReadonlyMap<number, Rgba>;
}

export interface ContinuousHistogramSeries {
  readonly kind: 'histogram-continuous';
  readonly name: string;
  readonly values: ReadonlyArray<number>;
  /** `counts.length + 1` ascending edges. */
  readonly edges: ReadonlyArray<number>;
  readonly counts: ReadonlyArray<number>;
  readonly style: SeriesStyle;
}

export interface DiscreteHistogramSeries {
  readonly kind: 'histogram-discrete';
  readonly name: string;
  readonly categories: ReadonlyArray<string>;
  readonly counts: ReadonlyArray<number>;
  readonly colors: ReadonlyArray<Rgba>;
  readonly style: SeriesStyle;
}

export type HistogramSeries = ContinuousHistogramSeries | DiscreteHistogramSeries;

export type Series = PlainSeries | ClusterSeries | HistogramSeries;

export type SeriesKind = Series['kind'];

export type ReferenceLineOrientation = 'vertical' | 'horizontal';

export interface ReferenceLine {
  readonly orientation: ReferenceLineOrientation;
  readonly value: number;
  readonly label: string;
  readonly color: Rgba;
  readonly lineWidth: number;
}

export interface DataBounds {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
}

export interface PlotMargins {
  readonly left: number;
  readonly right: number;
  readonly top: number;
  readonly bottom: number;
}

export interface BinCountRange {
  readonly min: number;
  readonly max: number;
}

export interface PlotOptions {
  /** Local layout width in pixels. Default: 800. */
  readonly width?: number;
  /** Local layout height in pixels. Default: 600. */
  readonly height?: number;
  readonly margins?: Partial<PlotMargins>;
  readonly theme?: ThemeName | Partial<ThemeConfig>;
  /** Overrides the auto-color rotation. */
  readonly palette?: ReadonlyArray<ColorInput>;
  /** Target number of ticks per axis. Default: 6. */
  readonly tickCount?: number;
  /** Fraction of the data span added on each side of an axis. Default: 0.05. */
  readonly paddingFraction?: number;
  /** Horizontal padding fraction for continuous histograms. Default: 0.02. */
  readonly histogramPaddingFraction?: number;
  /** Clamp range for automatic bin counts. Default: 5 to 50. */
  readonly autoBinRange?: Partial<BinCountRange>;
}

export interface SubplotGridOptions {
  readonly rows: number;
  readonly cols: number;
  /** Default: 1200. */
  readonly width?: number;
  /** Default: 900. */
  readonly height?: number;
  /** Gap between cells as a fraction of the canvas size. Default: 0.05. */
  readonly spacing?: number;
  /** Options shared by every cell plot. */
  readonly plot?: PlotOptions;
}
