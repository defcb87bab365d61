/**
 * SVG implementation of {@link DrawingSurface}.
 *
 * Paths accumulate until `stroke()` / `fill()` emits one `<path>` element. Numbers are
 * rounded to two decimals, so identical drawing calls always produce identical markup.
 *
 * @module createSvgSurface
 */

import type { Point, Rgba } from '../config/types';
import type { DrawingSurface, FontWeight, TextOptions, TextSize } from './types';
import { estimateTextSize } from './measureText';
import { writePngFile, writeSvgFile } from './writeOutput';
import { rgba01ToCssRgb } from '../utils/colors';

export interface SvgSurfaceOptions {
  readonly background?: Rgba;
  readonly fontFamily?: string;
}

export interface SvgSurface extends DrawingSurface {
  toSvg(): string;
}

const DEFAULT_FONT_FAMILY = 'Arial, Helvetica, sans-serif';

// Shift applied to `baseline: 'middle'` text, as a fraction of the font size.
const MIDDLE_BASELINE_SHIFT = 0.35;

export const formatSvgNumber = (v: number): string => {
  if (!Number.isFinite(v)) return '0';
  const rounded = Math.round(v * 100) / 100;
  return String(Object.is(rounded, -0) ? 0 : rounded);
};

export const escapeXml = (s: string): string =>
  s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');

const opacity = (a: number): string => formatSvgNumber(Math.min(1, Math.max(0, a)));

export function createSvgSurface(width: number, height: number, options: SvgSurfaceOptions = {}): SvgSurface {
  const surfaceWidth = Math.max(1, Math.round(Number.isFinite(width) ? width : 1));
  const surfaceHeight = Math.max(1, Math.round(Number.isFinite(height) ? height : 1));
  const fontFamily = escapeXml(options.fontFamily ?? DEFAULT_FONT_FAMILY);

  const elements: string[] = [];
  let path: string[] = [];
  let color: Rgba = [0, 0, 0, 1];
  let lineWidth = 1;
  let dash: number[] = [];

  if (options.background) {
    const bg = options.background;
    elements.push(
      `<rect x="0" y="0" width="${surfaceWidth}" height="${surfaceHeight}" fill="${rgba01ToCssRgb(bg)}" fill-opacity="${opacity(bg[3])}"/>`
    );
  }

  const n = formatSvgNumber;

  const takePath = (): string | null => {
    if (path.length === 0) return null;
    const d = path.join(' ');
    path = [];
    return d;
  };

  const toSvg = (): string =>
    [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${surfaceWidth}" height="${surfaceHeight}" viewBox="0 0 ${surfaceWidth} ${surfaceHeight}">`,
      ...elements,
      '</svg>',
      '',
    ].join('\n');

  return {
    width: surfaceWidth,
    height: surfaceHeight,

    setColor(rgba) {
      color = [rgba[0], rgba[1], rgba[2], rgba[3]];
    },

    setLineWidth(w) {
      lineWidth = Number.isFinite(w) && w > 0 ? w : 1;
    },

    setDash(pattern) {
      dash = pattern.filter((d) => Number.isFinite(d) && d >= 0);
    },

    moveTo(x, y) {
      path.push(`M${n(x)} ${n(y)}`);
    },

    lineTo(x, y) {
      path.push(`L${n(x)} ${n(y)}`);
    },

    curveTo(x1, y1, x2, y2, x, y) {
      path.push(`C${n(x1)} ${n(y1)} ${n(x2)} ${n(y2)} ${n(x)} ${n(y)}`);
    },

    closePath() {
      path.push('Z');
    },

    stroke() {
      const d = takePath();
      if (d === null) return;
      const dashAttr = dash.length > 0 ? ` stroke-dasharray="${dash.map(n).join(' ')}"` : '';
      elements.push(
        `<path d="${d}" fill="none" stroke="${rgba01ToCssRgb(color)}" stroke-opacity="${opacity(color[3])}" stroke-width="${n(lineWidth)}"${dashAttr}/>`
      );
    },

    fill() {
      const d = takePath();
      if (d === null) return;
      elements.push(`<path d="${d}" fill="${rgba01ToCssRgb(color)}" fill-opacity="${opacity(color[3])}"/>`);
    },

    drawText(text: string, position: Point, fontSize: number, textOptions: TextOptions = {}) {
      if (text.length === 0) return;
      const anchor = textOptions.anchor ?? 'start';
      const weight = textOptions.weight ?? 'normal';
      const y = textOptions.baseline === 'middle' ? position.y + fontSize * MIDDLE_BASELINE_SHIFT : position.y;
      const rotation = textOptions.rotation ?? 0;
      const transform =
        rotation !== 0 ? ` transform="rotate(${n(rotation)} ${n(position.x)} ${n(position.y)})"` : '';
      elements.push(
        `<text x="${n(position.x)}" y="${n(y)}" font-family="${fontFamily}" font-size="${n(fontSize)}" font-weight="${weight}" text-anchor="${anchor}" fill="${rgba01ToCssRgb(color)}" fill-opacity="${opacity(color[3])}"${transform}>${escapeXml(text)}</text>`
      );
    },

    measureText(text: string, fontSize: number, weight?: FontWeight): TextSize {
      return estimateTextSize(text, fontSize, weight);
    },

    writePng(filePath) {
      return writePngFile(filePath, toSvg());
    },

    writeSvg(filePath) {
      return writeSvgFile(filePath, toSvg());
    },

    toSvg,
  };
}
