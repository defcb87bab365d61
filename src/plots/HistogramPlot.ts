import type { ColorInput, Rgba } from '../config/types';
import type { PlotDrawStyle } from '../renderers/types';
import { histogramDefaults, seriesDefaults } from '../config/defaults';
import { computeHistogramBins, validateDiscreteCounts } from '../core/histogram/computeHistogramBins';
import { InvalidArgumentError } from '../errors';
import { Plot } from './Plot';

/**
 * Frequency bars, either binned from continuous values or given per category.
 * A plot holds one of the two modes at a time.
 */
export class HistogramPlot extends Plot {
  readonly kind = 'histogram' as const;

  private binCount: number = histogramDefaults.binCount;

  protected defaultYLabel(): string {
    return histogramDefaults.yLabel;
  }

  /**
   * Default bin count for {@link addHistogram}; 0 selects it from the data size.
   */
  setDefaultBinCount(binCount: number): void {
    if (!Number.isInteger(binCount) || binCount < 0) {
      throw new InvalidArgumentError(
        'setDefaultBinCount',
        `bin count must be a non-negative integer (got ${binCount})`,
        'pass 0 to choose the bin count automatically'
      );
    }
    this.binCount = binCount;
  }

  getDefaultBinCount(): number {
    return this.binCount;
  }

  addHistogram(values: ReadonlyArray<number>, binCount?: number): void;
  addHistogram(values: ReadonlyArray<number>, name: string, binCount?: number): void;
  addHistogram(values: ReadonlyArray<number>, name: string, color: ColorInput, binCount?: number): void;
  addHistogram(
    values: ReadonlyArray<number>,
    nameOrBinCount?: string | number,
    colorOrBinCount?: ColorInput | number,
    binCount?: number
  ): void {
    const operation = 'addHistogram';
    const name = typeof nameOrBinCount === 'string' ? nameOrBinCount : undefined;
    const color = typeof colorOrBinCount === 'number' ? undefined : colorOrBinCount;
    const requested =
      typeof nameOrBinCount === 'number'
        ? nameOrBinCount
        : typeof colorOrBinCount === 'number'
          ? colorOrBinCount
          : binCount ?? this.binCount;

    if (values.length === 0) {
      console.warn(`plotframe: ${operation}: no values given, nothing added.`);
      return;
    }

    this.model.assertCanAdd('histogram-continuous', operation);
    const bins = computeHistogramBins(values, requested, this.options.autoBinRange);
    const seriesName = this.seriesName(name);
    this.model.addSeries(
      {
        kind: 'histogram-continuous',
        name: seriesName,
        values: values.slice(),
        edges: bins.edges,
        counts: bins.counts,
        style: this.seriesStyle(seriesName, this.seriesColor(color, operation)),
      },
      operation
    );
  }

  /**
   * Adds one bar per category. Categories default to `Category 1..n`; each bar
   * takes the next palette color unless `colors` gives one per category.
   */
  addDiscreteHistogram(
    counts: ReadonlyArray<number>,
    categories?: ReadonlyArray<string>,
    colors?: ReadonlyArray<ColorInput>
  ): void {
    const operation = 'addDiscreteHistogram';
    if (counts.length === 0) {
      console.warn(`plotframe: ${operation}: no counts given, nothing added.`);
      return;
    }
    validateDiscreteCounts(counts, operation);
    if (categories && categories.length !== counts.length) {
      throw new InvalidArgumentError(
        operation,
        `expected ${counts.length} category name(s), one per count (got ${categories.length})`
      );
    }
    if (colors && colors.length !== counts.length) {
      throw new InvalidArgumentError(
        operation,
        `expected ${counts.length} color(s), one per count (got ${colors.length})`
      );
    }

    this.model.assertCanAdd('histogram-discrete', operation);

    const categoryColors: Rgba[] = counts.map((_, i) => this.seriesColor(colors?.[i], operation));
    const seriesName = this.nextSeriesName();
    this.model.addSeries(
      {
        kind: 'histogram-discrete',
        name: seriesName,
        categories: categories ? categories.slice() : counts.map((_, i) => `Category ${i + 1}`),
        counts: counts.slice(),
        colors: categoryColors,
        style: this.seriesStyle(seriesName, categoryColors[0]),
      },
      operation
    );
  }

  protected drawStyle(): PlotDrawStyle {
    return {
      plotKind: this.kind,
      markerType: seriesDefaults.markerType,
      lineStyle: seriesDefaults.lineStyle,
      showMarkers: false,
    };
  }
}
