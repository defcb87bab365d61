/**
 * Per-plot auto-color rotation and the fixed cluster palette.
 *
 * Series and reference lines of one plot share a single rotation counter.
 * Reference lines skip colors the plot's data series already use while an unused
 * palette entry remains. Cluster colors depend on the label alone.
 *
 * @module createColorAssigner
 */

import type { Rgba } from '../../config/types';
import { colorKey, namedColor } from '../../utils/colors';
import { clusterDefaults } from '../../config/defaults';

export type ColorContext = 'series' | 'referenceLine';

export interface ColorAssigner {
  readonly palette: ReadonlyArray<Rgba>;
  nextAutoColor(context: ColorContext): Rgba;
  /** Records a color a data series uses so reference lines avoid it. */
  registerSeriesColor(color: Rgba): void;
  reset(): void;
}

export const OUTLIER_LABEL = -1;

export const OUTLIER_COLOR: Rgba = [1, 0, 0, clusterDefaults.alpha];

const rgb = (r: number, g: number, b: number): Rgba => [r, g, b, clusterDefaults.alpha];

/**
 * Cluster colors, indexed by `label % length`.
 */
export const CLUSTER_PALETTE: ReadonlyArray<Rgba> = [
  rgb(0, 0.4, 0.8),
  rgb(0, 0.7, 0.3),
  rgb(0.6, 0.2, 0.8),
  rgb(1, 0.5, 0),
  rgb(0.8, 0.8, 0),
  rgb(0, 0.8, 0.8),
  rgb(0.8, 0, 0.8),
  rgb(0.6, 0.3, 0.1),
  rgb(0.5, 0.5, 0.5),
  rgb(0, 0.5, 0.5),
  rgb(0.4, 0, 0.6),
  rgb(0, 0.2, 0.6),
  rgb(0.5, 0.5, 0),
  rgb(0.8, 0.3, 0),
  rgb(0.6, 0, 0.4),
];

/**
 * Color of a cluster label: outliers are red, clusters cycle {@link CLUSTER_PALETTE}.
 */
export function clusterColor(label: number): Rgba {
  if (label === OUTLIER_LABEL) return OUTLIER_COLOR;
  const n = CLUSTER_PALETTE.length;
  const index = ((Math.trunc(label) % n) + n) % n;
  return CLUSTER_PALETTE[index];
}

export const DEFAULT_AUTO_PALETTE: ReadonlyArray<Rgba> = (
  ['blue', 'red', 'green', 'orange', 'purple', 'cyan', 'magenta', 'yellow', 'black', 'gray'] as const
)
  .map((name) => namedColor(name))
  .filter((c): c is Rgba => c !== null);

const dedupe = (palette: ReadonlyArray<Rgba>): Rgba[] => {
  const seen = new Set<string>();
  return palette.filter((c) => {
    const key = colorKey(c);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

/**
 * The palette is de-duplicated by hue; fewer than two distinct entries selects the default.
 */
export function createColorAssigner(palette: ReadonlyArray<Rgba> = DEFAULT_AUTO_PALETTE): ColorAssigner {
  const distinct = dedupe(palette);
  const colors = distinct.length >= 2 ? distinct : DEFAULT_AUTO_PALETTE.slice();
  const usedBySeries = new Set<string>();
  let counter = 0;

  const take = (offset: number): Rgba => {
    const color = colors[(counter + offset) % colors.length];
    counter += offset + 1;
    return color;
  };

  return {
    palette: colors,

    nextAutoColor(context) {
      if (context === 'series') {
        const color = take(0);
        usedBySeries.add(colorKey(color));
        return color;
      }

      for (let offset = 0; offset < colors.length; offset++) {
        const candidate = colors[(counter + offset) % colors.length];
        if (!usedBySeries.has(colorKey(candidate))) return take(offset);
      }
      return take(0);
    },

    registerSeriesColor(color) {
      usedBySeries.add(colorKey(color));
    },

    reset() {
      counter = 0;
      usedBySeries.clear();
    },
  };
}
