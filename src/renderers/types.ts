import type { ResolvedTheme } from '../config/OptionResolver';
import type { LineStyle, MarkerType, PlotKind, Rgba } from '../config/types';
import type { CoordinateTransform } from '../core/transform/createCoordinateTransform';
import type { DrawingSurface } from '../surface/types';

/**
 * Everything a draw step needs. One context serves a whole render pass.
 */
export interface RenderContext {
  readonly surface: DrawingSurface;
  readonly transform: CoordinateTransform;
  readonly theme: ResolvedTheme;
}

export interface AxisTick {
  readonly value: number;
  readonly label: string;
}

/**
 * Per-plot drawing defaults that vary by chart kind.
 */
export interface PlotDrawStyle {
  readonly plotKind: PlotKind;
  readonly markerType: MarkerType;
  readonly lineStyle: LineStyle;
  readonly showMarkers: boolean;
}

export type LegendSymbol = MarkerType | 'line' | 'dashed-line' | 'bar';

export interface LegendEntry {
  readonly label: string;
  readonly color: Rgba;
  readonly symbol: LegendSymbol;
}
