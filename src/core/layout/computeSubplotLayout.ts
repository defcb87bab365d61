/**
 * Subplot grid geometry.
 *
 * Gaps of `spacing * size` separate cells from each other and from the canvas edges.
 * A shared title reserves a band at the top. Each cell plot keeps its own local
 * layout size and is scaled uniformly to fit its cell, centered.
 *
 * @module computeSubplotLayout
 */

import type { Viewport } from '../transform/createCoordinateTransform';

export const TITLE_BAND_PADDING = 10;

export interface SubplotLayoutInput {
  readonly rows: number;
  readonly cols: number;
  readonly width: number;
  readonly height: number;
  readonly spacing: number;
  /** Measured height of the shared title, or 0 when there is none. */
  readonly titleHeight: number;
  /** Local layout size of every cell plot. */
  readonly plotWidth: number;
  readonly plotHeight: number;
}

export interface SubplotCellLayout {
  readonly row: number;
  readonly col: number;
  /** Cell rectangle on the canvas. */
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly viewport: Viewport;
}

export interface SubplotLayout {
  readonly horizontalSpacing: number;
  readonly verticalSpacing: number;
  /** Height reserved above the first row; 0 without a title. */
  readonly titleBand: number;
  /** Baseline of the shared title. */
  readonly titleY: number;
  readonly cellWidth: number;
  readonly cellHeight: number;
  /** Row-major. */
  readonly cells: ReadonlyArray<SubplotCellLayout>;
}

export function computeSubplotLayout(input: SubplotLayoutInput): SubplotLayout {
  const { rows, cols, width, height, spacing } = input;
  const horizontalSpacing = spacing * width;
  const verticalSpacing = spacing * height;

  const titleHeight = Math.max(0, input.titleHeight);
  const titleBand = titleHeight > 0 ? titleHeight + TITLE_BAND_PADDING + verticalSpacing * 0.5 : 0;

  const cellWidth = Math.max(1, (width - (cols + 1) * horizontalSpacing) / cols);
  const cellHeight = Math.max(1, (height - titleBand - (rows + 1) * verticalSpacing) / rows);

  const plotWidth = Math.max(1, input.plotWidth);
  const plotHeight = Math.max(1, input.plotHeight);
  const scale = Math.min(cellWidth / plotWidth, cellHeight / plotHeight);

  const cells: SubplotCellLayout[] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const x = horizontalSpacing + col * (cellWidth + horizontalSpacing);
      const y = titleBand + verticalSpacing + row * (cellHeight + verticalSpacing);
      cells.push({
        row,
        col,
        x,
        y,
        width: cellWidth,
        height: cellHeight,
        viewport: {
          offsetX: x + (cellWidth - plotWidth * scale) / 2,
          offsetY: y + (cellHeight - plotHeight * scale) / 2,
          scale,
        },
      });
    }
  }

  return {
    horizontalSpacing,
    verticalSpacing,
    titleBand,
    titleY: verticalSpacing * 0.5 + titleHeight,
    cellWidth,
    cellHeight,
    cells,
  };
}
