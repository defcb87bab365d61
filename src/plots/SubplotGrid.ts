/**
 * Fixed rows × cols arrangement of plots rendered onto one shared surface.
 *
 * Cells are created up front as scatter plots whose local layout matches the
 * cell's aspect ratio. At render time each cell plot is scaled uniformly into
 * its cell and drawn in row-major order after the shared title.
 *
 * @module SubplotGrid
 */

import type { PlotKind, PlotOptions } from '../config/types';
import {
  resolvePlotOptions,
  resolveSubplotGridOptions,
  type ResolvedSubplotGridOptions,
  type ResolvedTheme,
} from '../config/OptionResolver';
import { typography } from '../config/defaults';
import { computeSubplotLayout, type SubplotLayout } from '../core/layout/computeSubplotLayout';
import type { DrawingSurface } from '../surface/types';
import { createSvgSurface, type SvgSurface } from '../surface/createSvgSurface';
import { InvalidArgumentError, OutOfRangeError } from '../errors';
import { ScatterPlot } from './ScatterPlot';
import { LinePlot } from './LinePlot';
import { HistogramPlot } from './HistogramPlot';

export interface PlotByKind {
  scatter: ScatterPlot;
  line: LinePlot;
  histogram: HistogramPlot;
}

export type AnyPlot = PlotByKind[PlotKind];

const plotFactories: { [K in PlotKind]: (options: PlotOptions) => PlotByKind[K] } = {
  scatter: (options) => new ScatterPlot(options),
  line: (options) => new LinePlot(options),
  histogram: (options) => new HistogramPlot(options),
};

const isPlotOfKind = <K extends PlotKind>(plot: AnyPlot, kind: K): boolean => plot.kind === kind;

export class SubplotGrid {
  private readonly options: ResolvedSubplotGridOptions;
  private readonly theme: ResolvedTheme;
  private readonly cellOptions: PlotOptions;
  private readonly cells: AnyPlot[];
  private mainTitle = '';

  constructor(
    rows: number,
    cols: number,
    width?: number,
    height?: number,
    spacing?: number,
    plotOptions?: PlotOptions
  ) {
    this.options = resolveSubplotGridOptions({ rows, cols, width, height, spacing, plot: plotOptions });

    const base = resolvePlotOptions(this.options.plot);
    this.theme = base.theme;

    const { cellWidth, cellHeight } = this.layout(0, 1, 1);
    this.cellOptions = {
      ...this.options.plot,
      width: base.width,
      height: Math.max(1, Math.round((base.width * cellHeight) / cellWidth)),
    };

    this.cells = [];
    for (let i = 0; i < this.options.rows * this.options.cols; i++) {
      this.cells.push(plotFactories.scatter(this.cellOptions));
    }
  }

  getRows(): number {
    return this.options.rows;
  }

  getCols(): number {
    return this.options.cols;
  }

  get width(): number {
    return this.options.width;
  }

  get height(): number {
    return this.options.height;
  }

  setMainTitle(title: string): void {
    this.mainTitle = title;
  }

  getMainTitle(): string {
    return this.mainTitle;
  }

  /**
   * Returns the plot in cell (row, col). Asking for another kind replaces an
   * untouched cell with a fresh plot of that kind.
   */
  getSubplot(row: number, col: number): ScatterPlot;
  getSubplot<K extends PlotKind>(row: number, col: number, kind: K): PlotByKind[K];
  getSubplot(row: number, col: number, kind: PlotKind = 'scatter'): AnyPlot {
    const { rows, cols } = this.options;
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || row >= rows || col < 0 || col >= cols) {
      throw new OutOfRangeError(row, col, rows, cols);
    }

    const index = row * cols + col;
    const existing = this.cells[index];
    if (isPlotOfKind(existing, kind)) return existing;

    if (!existing.isPristine()) {
      throw new InvalidArgumentError(
        'getSubplot',
        `cell (${row}, ${col}) already holds a ${existing.kind} plot`,
        `request it as '${existing.kind}', or use an empty cell for a ${kind} plot`
      );
    }

    const replacement = plotFactories[kind](this.cellOptions);
    this.cells[index] = replacement;
    return replacement;
  }

  private layout(titleHeight: number, plotWidth: number, plotHeight: number): SubplotLayout {
    const { rows, cols, width, height, spacing } = this.options;
    return computeSubplotLayout({ rows, cols, width, height, spacing, titleHeight, plotWidth, plotHeight });
  }

  /**
   * Draws the shared title, then every cell in row-major order.
   */
  renderTo(surface: DrawingSurface): SubplotLayout {
    const fontSize = this.theme.fontSize * typography.gridTitleScale;
    const titleHeight = this.mainTitle.length > 0 ? surface.measureText(this.mainTitle, fontSize, 'bold').height : 0;

    const plotWidth = this.cellOptions.width ?? 1;
    const plotHeight = this.cellOptions.height ?? 1;
    const layout = this.layout(titleHeight, plotWidth, plotHeight);

    if (titleHeight > 0) {
      surface.setColor(this.theme.textColor);
      surface.drawText(this.mainTitle, { x: this.options.width / 2, y: layout.titleY }, fontSize, {
        anchor: 'middle',
        weight: 'bold',
      });
    }

    layout.cells.forEach((cell, i) => {
      this.cells[i].renderTo(surface, cell.viewport);
    });
    return layout;
  }

  private renderToSvgSurface(): SvgSurface {
    const surface = createSvgSurface(this.options.width, this.options.height, {
      background: this.theme.backgroundColor,
      fontFamily: this.theme.fontFamily,
    });
    this.renderTo(surface);
    return surface;
  }

  toSvg(): string {
    return this.renderToSvgSurface().toSvg();
  }

  /** Resolves false when the file cannot be written. */
  savePng(path: string): Promise<boolean> {
    return this.renderToSvgSurface().writePng(path);
  }

  /** Resolves false when the file cannot be written. */
  saveSvg(path: string): Promise<boolean> {
    return this.renderToSvgSurface().writeSvg(path);
  }
}
