import type { ColorInput, LineStyle } from '../config/types';
import type { PlotDrawStyle } from '../renderers/types';
import { seriesDefaults } from '../config/defaults';
import { XYPlot } from './XYPlot';
import { InvalidArgumentError } from '../errors';

/**
 * Series drawn as polylines in insertion order, optionally with markers.
 */
export class LinePlot extends XYPlot {
  readonly kind = 'line' as const;

  private lineStyle: LineStyle = seriesDefaults.lineStyle;
  private lineWidth: number = seriesDefaults.lineWidth;
  private showMarkers: boolean = seriesDefaults.showMarkers;

  addLine(xValues: ArrayLike<number>, yValues: ArrayLike<number>, name?: string, color?: ColorInput): void {
    this.addXYSeries(xValues, yValues, name, color, 'addLine');
  }

  setDefaultLineStyle(style: LineStyle): void {
    this.lineStyle = style;
  }

  getDefaultLineStyle(): LineStyle {
    return this.lineStyle;
  }

  /** Applies to series added afterwards. */
  setDefaultLineWidth(width: number): void {
    if (!Number.isFinite(width) || width <= 0) {
      throw new InvalidArgumentError('setDefaultLineWidth', `width must be a positive number (got ${width})`);
    }
    this.lineWidth = width;
  }

  getDefaultLineWidth(): number {
    return this.lineWidth;
  }

  setShowMarkers(show: boolean): void {
    this.showMarkers = show;
  }

  getShowMarkers(): boolean {
    return this.showMarkers;
  }

  protected defaultLineWidth(): number {
    return this.lineWidth;
  }

  protected drawStyle(): PlotDrawStyle {
    return {
      plotKind: this.kind,
      markerType: this.markerType,
      lineStyle: this.lineStyle,
      showMarkers: this.showMarkers,
    };
  }
}
