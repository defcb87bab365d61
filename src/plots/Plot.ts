/**
 * State and operations shared by every chart kind.
 *
 * A plot owns its series, reference lines, labels, bounds override, legend
 * visibility and color rotation. Rendering reads that state and never changes it.
 *
 * @module Plot
 */

import type {
  ColorInput,
  DataBounds,
  PlotKind,
  PlotOptions,
  ReferenceLine,
  ReferenceLineOrientation,
  Rgba,
  SeriesStyle,
} from '../config/types';
import { resolvePlotOptions, type ResolvedPlotOptions } from '../config/OptionResolver';
import { referenceLineDefaults, seriesDefaults } from '../config/defaults';
import { createSeriesModel, type SeriesModel } from '../data/createSeriesModel';
import { createColorAssigner, type ColorAssigner } from '../core/color/createColorAssigner';
import { computePlotBounds } from '../core/bounds/computeBounds';
import { formatNumber } from '../core/axis/computeAxisTicks';
import { renderPlot, type RenderHooks, type RenderResult } from '../core/renderPlot';
import type { Viewport } from '../core/transform/createCoordinateTransform';
import type { PlotDrawStyle } from '../renderers/types';
import type { DrawingSurface } from '../surface/types';
import { createSvgSurface, type SvgSurface } from '../surface/createSvgSurface';
import { resolveColorOrFallback } from '../utils/colors';
import { InvalidArgumentError } from '../errors';

export abstract class Plot {
  abstract readonly kind: PlotKind;

  protected readonly options: ResolvedPlotOptions;
  protected readonly model: SeriesModel = createSeriesModel();
  protected readonly colors: ColorAssigner;

  private title = '';
  private xLabel = '';
  private yLabel: string;
  private manualBounds: DataBounds | null = null;
  private legendEnabled = true;
  private readonly hiddenLegendLabels = new Set<string>();

  constructor(options: PlotOptions = {}) {
    this.options = resolvePlotOptions(options);
    this.colors = createColorAssigner(this.options.palette);
    this.yLabel = this.defaultYLabel();
  }

  get width(): number {
    return this.options.width;
  }

  get height(): number {
    return this.options.height;
  }

  /** Y axis label applied at construction and by {@link clear}. */
  protected defaultYLabel(): string {
    return '';
  }

  protected abstract drawStyle(): PlotDrawStyle;

  // Labels

  setTitle(title: string): void {
    this.title = title;
  }

  setXLabel(label: string): void {
    this.xLabel = label;
  }

  setYLabel(label: string): void {
    this.yLabel = label;
  }

  setLabels(title: string, xLabel: string, yLabel: string): void {
    this.title = title;
    this.xLabel = xLabel;
    this.yLabel = yLabel;
  }

  getTitle(): string {
    return this.title;
  }

  getXLabel(): string {
    return this.xLabel;
  }

  getYLabel(): string {
    return this.yLabel;
  }

  // Bounds

  /**
   * Fixes the axis ranges. Manual bounds are used as given (no padding);
   * reversed or equal limits are repaired at render time.
   */
  setBounds(minX: number, maxX: number, minY: number, maxY: number): void {
    const values = { minX, maxX, minY, maxY };
    for (const [key, v] of Object.entries(values)) {
      if (!Number.isFinite(v)) {
        throw new InvalidArgumentError('setBounds', `${key} must be a finite number (got ${v})`);
      }
    }
    this.manualBounds = values;
  }

  /** Returns to bounds computed from the data. */
  autoBounds(): void {
    this.manualBounds = null;
  }

  /** Bounds the next render will use. */
  getBounds(): DataBounds {
    const { series, referenceLines } = this.model.snapshot();
    return computePlotBounds({
      series,
      referenceLines,
      manualBounds: this.manualBounds,
      paddingFraction: this.options.paddingFraction,
      histogramPaddingFraction: this.options.histogramPaddingFraction,
    }).bounds;
  }

  // Legend

  setLegendEnabled(enabled: boolean): void {
    this.legendEnabled = enabled;
  }

  isLegendEnabled(): boolean {
    return this.legendEnabled;
  }

  hideLegendItem(label: string): void {
    this.hiddenLegendLabels.add(label);
  }

  showLegendItem(label: string): void {
    this.hiddenLegendLabels.delete(label);
  }

  showAllLegendItems(): void {
    this.hiddenLegendLabels.clear();
  }

  isLegendItemHidden(label: string): boolean {
    return this.hiddenLegendLabels.has(label);
  }

  // Reference lines

  addVerticalLine(x: number, label?: string, color?: ColorInput): void {
    this.addReferenceLine('vertical', x, label, color, 'addVerticalLine');
  }

  addHorizontalLine(y: number, label?: string, color?: ColorInput): void {
    this.addReferenceLine('horizontal', y, label, color, 'addHorizontalLine');
  }

  clearReferenceLines(): void {
    this.model.clearReferenceLines();
  }

  getReferenceLineCount(): number {
    return this.model.referenceLines.length;
  }

  getSeriesCount(): number {
    return this.model.series.length;
  }

  getReferenceLines(): ReadonlyArray<ReferenceLine> {
    return this.model.snapshot().referenceLines;
  }

  private addReferenceLine(
    orientation: ReferenceLineOrientation,
    value: number,
    label: string | undefined,
    color: ColorInput | undefined,
    operation: string
  ): void {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(operation, `position must be a finite number (got ${value})`);
    }

    const line: ReferenceLine = {
      orientation,
      value,
      label: label ?? `${orientation === 'vertical' ? 'X' : 'Y'} = ${formatNumber(value)}`,
      color: color === undefined ? this.colors.nextAutoColor('referenceLine') : resolveColorOrFallback(color, operation),
      lineWidth: referenceLineDefaults.lineWidth,
    };
    this.model.addReferenceLine(line, operation);
  }

  // Series helpers for subclasses

  protected nextSeriesName(): string {
    return `Series ${this.model.series.length + 1}`;
  }

  protected seriesName(name: string | undefined): string {
    return name !== undefined && name.length > 0 ? name : this.nextSeriesName();
  }

  /**
   * Explicit colors are recorded for reference-line conflict checks; otherwise the
   * next auto color is taken.
   */
  protected seriesColor(color: ColorInput | undefined, operation: string): Rgba {
    if (color === undefined) return this.colors.nextAutoColor('series');
    const resolved = resolveColorOrFallback(color, operation);
    this.colors.registerSeriesColor(resolved);
    return resolved;
  }

  protected seriesStyle(name: string, color: Rgba, overrides: Partial<Omit<SeriesStyle, 'color'>> = {}): SeriesStyle {
    return {
      pointSize: overrides.pointSize ?? seriesDefaults.pointSize,
      lineWidth: overrides.lineWidth ?? seriesDefaults.lineWidth,
      color,
      label: overrides.label ?? name,
    };
  }

  /**
   * True while the plot holds nothing a caller configured: no data, lines,
   * labels, bounds override or legend changes.
   */
  isPristine(): boolean {
    return (
      this.model.series.length === 0 &&
      this.model.referenceLines.length === 0 &&
      this.title === '' &&
      this.xLabel === '' &&
      this.yLabel === this.defaultYLabel() &&
      this.manualBounds === null &&
      this.legendEnabled &&
      this.hiddenLegendLabels.size === 0
    );
  }

  // Rendering

  /**
   * Renders into `surface`. Inside a subplot grid, `viewport` places the plot's local
   * layout in its cell.
   */
  renderTo(surface: DrawingSurface, viewport?: Viewport, hooks?: RenderHooks): RenderResult {
    const { series, referenceLines } = this.model.snapshot();
    return renderPlot(
      {
        options: this.options,
        title: this.title,
        xLabel: this.xLabel,
        yLabel: this.yLabel,
        series,
        referenceLines,
        manualBounds: this.manualBounds,
        legendEnabled: this.legendEnabled,
        hiddenLegendLabels: new Set(this.hiddenLegendLabels),
        style: this.drawStyle(),
      },
      surface,
      viewport,
      hooks
    );
  }

  private renderToSvgSurface(): SvgSurface {
    const surface = createSvgSurface(this.options.width, this.options.height, {
      background: this.options.theme.backgroundColor,
      fontFamily: this.options.theme.fontFamily,
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

  /**
   * Removes all data, reference lines, labels, bounds override and legend state,
   * and restarts the color rotation. Per-plot drawing defaults are kept.
   */
  clear(): void {
    this.model.clear();
    this.colors.reset();
    this.title = '';
    this.xLabel = '';
    this.yLabel = this.defaultYLabel();
    this.manualBounds = null;
    this.legendEnabled = true;
    this.hiddenLegendLabels.clear();
  }
}
