/**
 * Validated construction of series records from caller input.
 *
 * Every builder returns a fresh, fully-populated record; nothing here keeps
 * references to caller arrays.
 */

import type { ClusterPoint, ClusterSeries, PlainSeries, Point, Rgba, SeriesStyle } from '../config/types';
import { OUTLIER_LABEL } from '../core/color/createColorAssigner';
import { InvalidArgumentError } from '../errors';

export const OUTLIER_NAME = 'Outliers';

export const defaultClusterName = (label: number): string =>
  label === OUTLIER_LABEL ? OUTLIER_NAME : `Cluster ${label}`;

/**
 * Pairs parallel coordinate arrays into points.
 */
export function zipPoints(xValues: ArrayLike<number>, yValues: ArrayLike<number>, operation: string): Point[] {
  if (xValues.length !== yValues.length) {
    throw new InvalidArgumentError(
      operation,
      `x and y must have the same length (got ${xValues.length} and ${yValues.length})`
    );
  }
  const points: Point[] = [];
  for (let i = 0; i < xValues.length; i++) {
    points.push({ x: xValues[i], y: yValues[i] });
  }
  return points;
}

export function copyPoints(points: ReadonlyArray<Point>): Point[] {
  return points.map((p) => ({ x: p.x, y: p.y }));
}

export function buildPlainSeries(name: string, points: ReadonlyArray<Point>, style: SeriesStyle): PlainSeries {
  return {
    kind: 'plain',
    name,
    points: copyPoints(points),
    style: { ...style, color: [style.color[0], style.color[1], style.color[2], style.color[3]] },
  };
}

export const appendPlainPoint = (series: PlainSeries, point: Point): PlainSeries => ({
  ...series,
  points: [...series.points, { x: point.x, y: point.y }],
});

const validateLabel = (label: number, operation: string, index: number): void => {
  if (!Number.isInteger(label) || label < OUTLIER_LABEL) {
    throw new InvalidArgumentError(
      operation,
      `labels[${index}] must be -1 (outlier) or a non-negative integer (got ${label})`
    );
  }
};

/**
 * Distinct labels, ascending.
 */
export const distinctLabels = (points: ReadonlyArray<ClusterPoint>): number[] =>
  Array.from(new Set(points.map((p) => p.label))).sort((a, b) => a - b);

export interface ClusterSeriesInput {
  readonly name: string;
  readonly points: ReadonlyArray<Point>;
  readonly labels: ReadonlyArray<number>;
  readonly pointSize: number;
  readonly alpha: number;
  /** Display names for the distinct non-negative labels, ascending. */
  readonly names?: ReadonlyArray<string>;
  /** Color overrides for the distinct non-negative labels, ascending. */
  readonly colors?: ReadonlyArray<Rgba>;
}

export function buildClusterSeries(input: ClusterSeriesInput, operation: string): ClusterSeries {
  if (input.points.length !== input.labels.length) {
    throw new InvalidArgumentError(
      operation,
      `points and labels must have the same length (got ${input.points.length} and ${input.labels.length})`
    );
  }
  input.labels.forEach((label, i) => validateLabel(label, operation, i));

  const points: ClusterPoint[] = input.points.map((p, i) => ({
    point: { x: p.x, y: p.y },
    label: input.labels[i],
  }));
  const labels = distinctLabels(points);
  const clusterIds = labels.filter((l) => l !== OUTLIER_LABEL);

  const clusterNames = new Map<number, string>();
  if (input.names) {
    if (input.names.length !== clusterIds.length) {
      throw new InvalidArgumentError(
        operation,
        `expected ${clusterIds.length} cluster name(s), one per distinct cluster label (got ${input.names.length})`
      );
    }
    const names = input.names;
    clusterIds.forEach((label, i) => clusterNames.set(label, names[i]));
  }

  const clusterColors = new Map<number, Rgba>();
  if (input.colors) {
    if (input.colors.length !== clusterIds.length) {
      throw new InvalidArgumentError(
        operation,
        `expected ${clusterIds.length} cluster color(s), one per distinct cluster label (got ${input.colors.length})`
      );
    }
    const colors = input.colors;
    clusterIds.forEach((label, i) => clusterColors.set(label, colors[i]));
  }

  return {
    kind: 'cluster',
    name: input.name,
    points,
    pointSize: input.pointSize,
    alpha: input.alpha,
    labels,
    clusterNames,
    clusterColors,
  };
}

export function appendClusterPoint(
  series: ClusterSeries,
  point: Point,
  label: number,
  operation: string
): ClusterSeries {
  validateLabel(label, operation, series.points.length);
  const points = [...series.points, { point: { x: point.x, y: point.y }, label }];
  return { ...series, points, labels: distinctLabels(points) };
}
