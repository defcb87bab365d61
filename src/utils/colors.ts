/**
 * Color parsing and conversion helpers.
 *
 * Colors travel through the library as RGBA tuples in [0, 1]; CSS strings
 * exist only at the edges (theme input, caller input, SVG output).
 *
 * @module colors
 */

import type { ColorInput, Rgba } from '../config/types';

/** Alpha applied to named colors on series, clusters and reference lines. */
export const SERIES_ALPHA = 0.8;

const NAMED_RGB: Readonly<Record<string, readonly [number, number, number]>> = {
  red: [1, 0, 0],
  blue: [0, 0, 1],
  green: [0, 0.7, 0],
  orange: [1, 0.5, 0],
  purple: [0.6, 0.2, 0.8],
  cyan: [0, 0.8, 0.8],
  magenta: [0.8, 0, 0.8],
  yellow: [0.8, 0.8, 0],
  black: [0, 0, 0],
  gray: [0.5, 0.5, 0.5],
  grey: [0.5, 0.5, 0.5],
  white: [1, 1, 1],
  darkred: [0.5, 0, 0],
  darkblue: [0, 0, 0.5],
  darkgreen: [0, 0.4, 0],
};

export const FALLBACK_COLOR: Rgba = [0, 0, 1, SERIES_ALPHA];

export const clamp01 = (v: number): number => Math.min(1, Math.max(0, v));

/**
 * Looks up a named color (case-insensitive). Returns null for unknown names.
 */
export const namedColor = (name: string, alpha: number = SERIES_ALPHA): Rgba | null => {
  const rgb = NAMED_RGB[name.trim().toLowerCase()];
  if (!rgb) return null;
  return [rgb[0], rgb[1], rgb[2], clamp01(alpha)];
};

const parseHex = (hex: string): Rgba | null => {
  if (!/^[0-9a-f]+$/i.test(hex)) return null;
  const expand = hex.length === 3 || hex.length === 4 ? hex.replace(/./g, (c) => c + c) : hex;
  if (expand.length !== 6 && expand.length !== 8) return null;
  const channel = (i: number): number => Number.parseInt(expand.slice(i * 2, i * 2 + 2), 16) / 255;
  return [channel(0), channel(1), channel(2), expand.length === 8 ? channel(3) : 1];
};

const parseFunctional = (css: string): Rgba | null => {
  const match = /^rgba?\(([^)]*)\)$/i.exec(css);
  if (!match) return null;
  const parts = match[1].split(',').map((p) => p.trim());
  if (parts.length !== 3 && parts.length !== 4) return null;
  const nums = parts.map((p) => Number(p));
  if (parts.some((p) => p.length === 0) || nums.some((n) => !Number.isFinite(n))) return null;
  const a = nums.length === 4 ? nums[3] : 1;
  return [clamp01(nums[0] / 255), clamp01(nums[1] / 255), clamp01(nums[2] / 255), clamp01(a)];
};

/**
 * Parses `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`, `rgb()`, `rgba()` or a color name
 * (opaque) into an RGBA tuple. Returns null when the string is not understood.
 */
export function parseCssColorToRgba01(css: string): Rgba | null {
  const trimmed = css.trim();
  if (trimmed.length === 0) return null;
  if (trimmed.startsWith('#')) return parseHex(trimmed.slice(1));
  if (/^rgba?\(/i.test(trimmed)) return parseFunctional(trimmed);
  return namedColor(trimmed, 1);
}

/**
 * Resolves caller color input. Names get `alpha`; CSS strings and tuples keep their own.
 */
export function resolveColorInput(input: ColorInput, alpha: number = SERIES_ALPHA): Rgba | null {
  if (typeof input === 'string') {
    return namedColor(input, alpha) ?? parseCssColorToRgba01(input);
  }
  if (input.length !== 4 || !input.every((c) => Number.isFinite(c))) return null;
  return [clamp01(input[0]), clamp01(input[1]), clamp01(input[2]), clamp01(input[3])];
}

/**
 * Like {@link resolveColorInput}, but unknown colors log a warning and fall back to blue.
 */
export function resolveColorOrFallback(input: ColorInput, context: string, alpha: number = SERIES_ALPHA): Rgba {
  const resolved = resolveColorInput(input, alpha);
  if (resolved) return resolved;
  console.warn(`plotframe: ${context}: unknown color ${JSON.stringify(input)}, using blue.`);
  return [FALLBACK_COLOR[0], FALLBACK_COLOR[1], FALLBACK_COLOR[2], clamp01(alpha)];
}

const to255 = (v: number): number => Math.max(0, Math.min(255, Math.round(v * 255)));

/**
 * CSS `rgb()` without alpha; SVG carries opacity in a separate attribute.
 */
export const rgba01ToCssRgb = (rgba: Rgba): string => `rgb(${to255(rgba[0])},${to255(rgba[1])},${to255(rgba[2])})`;

/**
 * Multiplies the RGB channels by `factor`, keeping alpha. Used for bar outlines.
 */
export const scaleRgb = (rgba: Rgba, factor: number): Rgba => [
  clamp01(rgba[0] * factor),
  clamp01(rgba[1] * factor),
  clamp01(rgba[2] * factor),
  rgba[3],
];

export const withAlpha = (rgba: Rgba, alpha: number): Rgba => [rgba[0], rgba[1], rgba[2], clamp01(alpha)];

/**
 * Identity of a color's hue for conflict checks; alpha is ignored.
 */
export const colorKey = (rgba: Rgba): string => `${to255(rgba[0])},${to255(rgba[1])},${to255(rgba[2])}`;
