/**
 * Ordered series and reference-line storage for one plot.
 *
 * Insertion-time checks keep a plot's histogram data exclusively continuous or
 * exclusively discrete, and keep vertical reference lines off discrete data.
 *
 * @module createSeriesModel
 */

import type { ReferenceLine, Series } from '../config/types';
import { InvalidArgumentError } from '../errors';

export type HistogramMode = 'none' | 'continuous' | 'discrete';

export interface SeriesModelSnapshot {
  readonly series: ReadonlyArray<Series>;
  readonly referenceLines: ReadonlyArray<ReferenceLine>;
}

export interface SeriesModel {
  readonly series: ReadonlyArray<Series>;
  readonly referenceLines: ReadonlyArray<ReferenceLine>;
  histogramMode(): HistogramMode;
  indexOf(name: string): number;
  /** Throws when a series of `kind` could not be added. Changes nothing. */
  assertCanAdd(kind: Series['kind'], operation: string): void;
  addSeries(series: Series, operation: string): void;
  replaceSeries(index: number, series: Series): void;
  addReferenceLine(line: ReferenceLine, operation: string): void;
  clearReferenceLines(): void;
  clear(): void;
  /** Copies of both lists, frozen for one render pass. */
  snapshot(): SeriesModelSnapshot;
}

const modeOf = (kind: Series['kind']): HistogramMode => {
  switch (kind) {
    case 'histogram-continuous':
      return 'continuous';
    case 'histogram-discrete':
      return 'discrete';
    case 'plain':
    case 'cluster':
      return 'none';
  }
};

export function createSeriesModel(): SeriesModel {
  const series: Series[] = [];
  const referenceLines: ReferenceLine[] = [];

  const histogramMode = (): HistogramMode => {
    for (const s of series) {
      const mode = modeOf(s.kind);
      if (mode !== 'none') return mode;
    }
    return 'none';
  };

  const assertCanAdd = (kind: Series['kind'], operation: string): void => {
    const incomingMode = modeOf(kind);
    if (incomingMode === 'none') return;

    const current = histogramMode();
    if (current !== 'none' && current !== incomingMode) {
      throw new InvalidArgumentError(
        operation,
        `cannot add ${incomingMode} histogram data to a plot holding ${current} histogram data`,
        'use a separate plot for each histogram mode'
      );
    }
    if (incomingMode === 'discrete' && referenceLines.some((l) => l.orientation === 'vertical')) {
      throw new InvalidArgumentError(
        operation,
        'cannot add discrete histogram data to a plot with vertical reference lines',
        'categorical axes have no numeric x position; remove the vertical lines first'
      );
    }
  };

  return {
    get series() {
      return series;
    },

    get referenceLines() {
      return referenceLines;
    },

    histogramMode,

    indexOf(name) {
      return series.findIndex((s) => s.name === name);
    },

    assertCanAdd,

    addSeries(s, operation) {
      assertCanAdd(s.kind, operation);
      series.push(s);
    },

    replaceSeries(index, s) {
      if (index < 0 || index >= series.length) return;
      if (series[index].kind !== s.kind) {
        throw new InvalidArgumentError('replaceSeries', `series "${s.name}" cannot change kind`);
      }
      series[index] = s;
    },

    addReferenceLine(line, operation) {
      if (line.orientation === 'vertical' && histogramMode() === 'discrete') {
        throw new InvalidArgumentError(
          operation,
          'vertical reference lines are not allowed on discrete histogram data',
          'categorical axes have no numeric x position; use a horizontal line instead'
        );
      }
      referenceLines.push(line);
    },

    clearReferenceLines() {
      referenceLines.length = 0;
    },

    clear() {
      series.length = 0;
      referenceLines.length = 0;
    },

    snapshot() {
      return { series: series.slice(), referenceLines: referenceLines.slice() };
    },
  };
}
