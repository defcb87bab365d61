import type { BinCountRange, ColorInput, PlotMargins, PlotOptions, Rgba, SubplotGridOptions } from './types';
import {
  defaultAutoBinRange,
  defaultGridSize,
  defaultLayout,
  defaultMargins,
  defaultPlotSize,
  maxGridSpacing,
} from './defaults';
import { getTheme } from '../themes';
import type { ThemeConfig } from '../themes/types';
import { parseCssColorToRgba01, resolveColorInput } from '../utils/colors';
import { InvalidArgumentError } from '../errors';

/**
 * Theme with every color parsed, ready for drawing.
 */
export interface ResolvedTheme {
  readonly backgroundColor: Rgba;
  readonly textColor: Rgba;
  readonly axisLineColor: Rgba;
  readonly axisTickColor: Rgba;
  readonly gridLineColor: Rgba;
  readonly legendBackgroundColor: Rgba;
  readonly legendBorderColor: Rgba;
  readonly fontFamily: string;
  readonly fontSize: number;
}

export interface ResolvedPlotOptions {
  readonly width: number;
  readonly height: number;
  readonly margins: PlotMargins;
  readonly theme: ResolvedTheme;
  readonly palette: ReadonlyArray<Rgba>;
  readonly tickCount: number;
  readonly paddingFraction: number;
  readonly histogramPaddingFraction: number;
  readonly autoBinRange: BinCountRange;
}

export interface ResolvedSubplotGridOptions {
  readonly rows: number;
  readonly cols: number;
  readonly width: number;
  readonly height: number;
  readonly spacing: number;
  readonly plot: PlotOptions;
}

const positiveOr = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;

const nonNegativeOr = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;

const fractionOr = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 && value < 1 ? value : fallback;

const takeString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const resolveThemeConfig = (themeInput: PlotOptions['theme']): ThemeConfig => {
  if (typeof themeInput === 'string') {
    return getTheme(themeInput.trim().toLowerCase() === 'dark' ? 'dark' : 'light');
  }

  const base = getTheme('light');
  if (!themeInput || typeof themeInput !== 'object') return base;

  const palette = Array.isArray(themeInput.colorPalette)
    ? themeInput.colorPalette.map(takeString).filter((c): c is string => c !== undefined)
    : [];

  return {
    backgroundColor: takeString(themeInput.backgroundColor) ?? base.backgroundColor,
    textColor: takeString(themeInput.textColor) ?? base.textColor,
    axisLineColor: takeString(themeInput.axisLineColor) ?? base.axisLineColor,
    axisTickColor: takeString(themeInput.axisTickColor) ?? base.axisTickColor,
    gridLineColor: takeString(themeInput.gridLineColor) ?? base.gridLineColor,
    legendBackgroundColor: takeString(themeInput.legendBackgroundColor) ?? base.legendBackgroundColor,
    legendBorderColor: takeString(themeInput.legendBorderColor) ?? base.legendBorderColor,
    colorPalette: palette.length > 0 ? palette : Array.from(base.colorPalette),
    fontFamily: takeString(themeInput.fontFamily) ?? base.fontFamily,
    fontSize: positiveOr(themeInput.fontSize, base.fontSize),
  };
};

const parseThemeColor = (css: string, fallback: string): Rgba =>
  parseCssColorToRgba01(css) ?? parseCssColorToRgba01(fallback) ?? [0, 0, 0, 1];

export function resolveTheme(themeInput?: PlotOptions['theme']): ResolvedTheme {
  const theme = resolveThemeConfig(themeInput);
  const base = typeof themeInput === 'string' ? theme : getTheme('light');
  return {
    backgroundColor: parseThemeColor(theme.backgroundColor, base.backgroundColor),
    textColor: parseThemeColor(theme.textColor, base.textColor),
    axisLineColor: parseThemeColor(theme.axisLineColor, base.axisLineColor),
    axisTickColor: parseThemeColor(theme.axisTickColor, base.axisTickColor),
    gridLineColor: parseThemeColor(theme.gridLineColor, base.gridLineColor),
    legendBackgroundColor: parseThemeColor(theme.legendBackgroundColor, base.legendBackgroundColor),
    legendBorderColor: parseThemeColor(theme.legendBorderColor, base.legendBorderColor),
    fontFamily: theme.fontFamily,
    fontSize: theme.fontSize,
  };
}

const resolvePalette = (options: PlotOptions): Rgba[] => {
  const source: ReadonlyArray<ColorInput> =
    options.palette && options.palette.length > 0 ? options.palette : resolveThemeConfig(options.theme).colorPalette;
  const palette = source.map((c) => resolveColorInput(c)).filter((c): c is Rgba => c !== null);
  if (palette.length >= 2) return palette;

  // Rotation needs two distinct entries; fall back to the light theme's.
  return getTheme('light')
    .colorPalette.map((c) => resolveColorInput(c))
    .filter((c): c is Rgba => c !== null);
};

export function resolvePlotOptions(userOptions: PlotOptions = {}): ResolvedPlotOptions {
  const margins = userOptions.margins ?? {};
  const binRange = userOptions.autoBinRange ?? {};
  const minBins = Math.max(1, Math.floor(positiveOr(binRange.min, defaultAutoBinRange.min)));
  const maxBins = Math.max(minBins, Math.floor(positiveOr(binRange.max, defaultAutoBinRange.max)));

  return {
    width: positiveOr(userOptions.width, defaultPlotSize.width),
    height: positiveOr(userOptions.height, defaultPlotSize.height),
    margins: {
      left: nonNegativeOr(margins.left, defaultMargins.left),
      right: nonNegativeOr(margins.right, defaultMargins.right),
      top: nonNegativeOr(margins.top, defaultMargins.top),
      bottom: nonNegativeOr(margins.bottom, defaultMargins.bottom),
    },
    theme: resolveTheme(userOptions.theme),
    palette: resolvePalette(userOptions),
    tickCount: Math.max(2, Math.round(positiveOr(userOptions.tickCount, defaultLayout.tickCount))),
    paddingFraction: fractionOr(userOptions.paddingFraction, defaultLayout.paddingFraction),
    histogramPaddingFraction: fractionOr(userOptions.histogramPaddingFraction, defaultLayout.histogramPaddingFraction),
    autoBinRange: { min: minBins, max: maxBins },
  };
}

export function resolveSubplotGridOptions(options: SubplotGridOptions): ResolvedSubplotGridOptions {
  const { rows, cols } = options;
  if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(cols) || cols < 1) {
    throw new InvalidArgumentError(
      'SubplotGrid',
      `rows and cols must be positive integers (got ${rows}x${cols})`
    );
  }

  const spacing = nonNegativeOr(options.spacing, defaultGridSize.spacing);

  return {
    rows,
    cols,
    width: positiveOr(options.width, defaultGridSize.width),
    height: positiveOr(options.height, defaultGridSize.height),
    spacing: Math.min(maxGridSpacing, spacing),
    plot: options.plot ?? {},
  };
}
