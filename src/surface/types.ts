/**
 * Drawing capability the render pipeline draws through.
 */

import type { Point, Rgba } from '../config/types';

export type TextAnchor = 'start' | 'middle' | 'end';

export type TextBaseline = 'alphabetic' | 'middle';

export type FontWeight = 'normal' | 'bold';

export interface TextOptions {
  readonly anchor?: TextAnchor;
  readonly baseline?: TextBaseline;
  /** Degrees, clockwise, around the text position. */
  readonly rotation?: number;
  readonly weight?: FontWeight;
}

export interface TextSize {
  readonly width: number;
  readonly height: number;
}

/**
 * Path-based 2D drawing surface. `stroke()` and `fill()` consume the current path.
 */
export interface DrawingSurface {
  readonly width: number;
  readonly height: number;
  setColor(rgba: Rgba): void;
  setLineWidth(width: number): void;
  /** Dash lengths in pixels; empty for solid lines. */
  setDash(pattern: ReadonlyArray<number>): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  curveTo(x1: number, y1: number, x2: number, y2: number, x: number, y: number): void;
  closePath(): void;
  stroke(): void;
  fill(): void;
  drawText(text: string, position: Point, fontSize: number, options?: TextOptions): void;
  measureText(text: string, fontSize: number, weight?: FontWeight): TextSize;
  /** Resolves false (never rejects) when encoding or writing fails. */
  writePng(path: string): Promise<boolean>;
  /** Resolves false (never rejects) when writing fails. */
  writeSvg(path: string): Promise<boolean>;
}
