import type { ColorInput, MarkerType, Point, SeriesStyle } from '../config/types';
import { clusterDefaults, seriesDefaults } from '../config/defaults';
import { Plot } from './Plot';
import {
  appendClusterPoint,
  appendPlainPoint,
  buildClusterSeries,
  buildPlainSeries,
  copyPoints,
  zipPoints,
  type ClusterSeriesInput,
} from '../data/buildSeries';
import { resolveClusterColor } from '../renderers/renderSeries';
import { resolveColorOrFallback } from '../utils/colors';
import { InvalidArgumentError } from '../errors';

export interface SeriesStyleInput extends Partial<Omit<SeriesStyle, 'color'>> {
  readonly color?: ColorInput;
}

/**
 * Point-based plots (scatter and line): plain series and cluster-labeled series.
 */
export abstract class XYPlot extends Plot {
  protected markerType: MarkerType = seriesDefaults.markerType;

  setDefaultMarkerType(type: MarkerType): void {
    this.markerType = type;
  }

  getDefaultMarkerType(): MarkerType {
    return this.markerType;
  }

  /** Line width given to new series. */
  protected defaultLineWidth(): number {
    return seriesDefaults.lineWidth;
  }

  protected addXYSeries(
    xValues: ArrayLike<number>,
    yValues: ArrayLike<number>,
    name: string | undefined,
    color: ColorInput | undefined,
    operation: string
  ): void {
    this.addPointSeries(zipPoints(xValues, yValues, operation), name, color, operation);
  }

  private addPointSeries(
    points: ReadonlyArray<Point>,
    name: string | undefined,
    color: ColorInput | undefined,
    operation: string
  ): void {
    const seriesName = this.seriesName(name);
    const style = this.seriesStyle(seriesName, this.seriesColor(color, operation), {
      lineWidth: this.defaultLineWidth(),
    });
    this.model.addSeries(buildPlainSeries(seriesName, points, style), operation);
  }

  /**
   * Adds a series from points.
   */
  addPoints(points: ReadonlyArray<Point>, name?: string, color?: ColorInput): void {
    this.addPointSeries(points, name, color, 'addPoints');
  }

  /**
   * Adds a named series with explicit style fields; missing fields take the plot defaults.
   */
  addStyledSeries(name: string, points: ReadonlyArray<Point>, style: SeriesStyleInput = {}): void {
    const operation = 'addStyledSeries';
    const seriesName = this.seriesName(name);
    const resolved = this.seriesStyle(seriesName, this.seriesColor(style.color, operation), {
      pointSize: style.pointSize,
      lineWidth: style.lineWidth ?? this.defaultLineWidth(),
      label: style.label,
    });
    this.model.addSeries(buildPlainSeries(seriesName, copyPoints(points), resolved), operation);
  }

  /**
   * Appends a point to the series called `name`, creating the series on first use.
   */
  addSeriesPoint(name: string, x: number, y: number): void {
    const operation = 'addSeriesPoint';
    const index = this.model.indexOf(name);
    if (index < 0) {
      this.addPointSeries([{ x, y }], name, undefined, operation);
      return;
    }

    const existing = this.model.series[index];
    if (existing.kind !== 'plain') {
      throw new InvalidArgumentError(operation, `series "${name}" is not a point series`);
    }
    this.model.replaceSeries(index, appendPlainPoint(existing, { x, y }));
  }

  /**
   * Adds cluster-labeled points from parallel arrays. Label -1 marks outliers;
   * `names` and `colors`, when given, hold one entry per distinct non-negative
   * label in ascending order.
   */
  addClusters(
    xValues: ArrayLike<number>,
    yValues: ArrayLike<number>,
    labels: ReadonlyArray<number>,
    names?: ReadonlyArray<string>,
    colors?: ReadonlyArray<ColorInput>
  ): void {
    const operation = 'addClusters';
    this.addCluster(
      {
        name: this.nextSeriesName(),
        points: zipPoints(xValues, yValues, operation),
        labels,
        names,
        colors: colors?.map((c) => resolveColorOrFallback(c, operation, clusterDefaults.alpha)),
        pointSize: clusterDefaults.pointSize,
        alpha: clusterDefaults.alpha,
      },
      operation
    );
  }

  addClusterSeries(
    name: string,
    points: ReadonlyArray<Point>,
    labels: ReadonlyArray<number>,
    pointSize: number = clusterDefaults.pointSize,
    alpha: number = clusterDefaults.alpha
  ): void {
    this.addCluster(
      {
        name: this.seriesName(name),
        points,
        labels,
        pointSize: Number.isFinite(pointSize) && pointSize > 0 ? pointSize : clusterDefaults.pointSize,
        alpha: Number.isFinite(alpha) ? Math.min(1, Math.max(0, alpha)) : clusterDefaults.alpha,
      },
      'addClusterSeries'
    );
  }

  /**
   * Appends a labeled point to the cluster series called `name`, creating it on first use.
   */
  addClusterPoint(name: string, x: number, y: number, label: number): void {
    const operation = 'addClusterPoint';
    const index = this.model.indexOf(name);
    if (index < 0) {
      this.addClusterSeries(name, [{ x, y }], [label]);
      return;
    }

    const existing = this.model.series[index];
    if (existing.kind !== 'cluster') {
      throw new InvalidArgumentError(operation, `series "${name}" is not a cluster series`);
    }
    const updated = appendClusterPoint(existing, { x, y }, label, operation);
    this.model.replaceSeries(index, updated);
    this.colors.registerSeriesColor(resolveClusterColor(updated, label));
  }

  private addCluster(input: ClusterSeriesInput, operation: string): void {
    const series = buildClusterSeries(input, operation);
    this.model.addSeries(series, operation);
    for (const label of series.labels) {
      this.colors.registerSeriesColor(resolveClusterColor(series, label));
    }
  }
}
