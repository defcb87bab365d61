import type { ColorInput } from '../config/types';
import type { PlotDrawStyle } from '../renderers/types';
import { seriesDefaults } from '../config/defaults';
import { XYPlot } from './XYPlot';

/**
 * Points drawn as markers.
 */
export class ScatterPlot extends XYPlot {
  readonly kind = 'scatter' as const;

  /**
   * Adds a series from parallel coordinate arrays. Unnamed series are called
   * `Series N`; omitting `color` takes the next palette color.
   */
  addSeries(xValues: ArrayLike<number>, yValues: ArrayLike<number>, name?: string, color?: ColorInput): void {
    this.addXYSeries(xValues, yValues, name, color, 'addSeries');
  }

  protected drawStyle(): PlotDrawStyle {
    return {
      plotKind: this.kind,
      markerType: this.markerType,
      lineStyle: seriesDefaults.lineStyle,
      showMarkers: true,
    };
  }
}
