import type { FontWeight, TextSize } from './types';

// Average glyph advance for sans-serif fonts, as a fraction of the font size.
const NORMAL_ADVANCE = 0.55;
const BOLD_ADVANCE = 0.6;

/**
 * Font-independent text size estimate. Layout only needs a stable upper-ish bound,
 * and the same string must always measure the same.
 */
export function estimateTextSize(text: string, fontSize: number, weight: FontWeight = 'normal'): TextSize {
  const size = Number.isFinite(fontSize) && fontSize > 0 ? fontSize : 0;
  const advance = weight === 'bold' ? BOLD_ADVANCE : NORMAL_ADVANCE;
  return { width: Array.from(text).length * size * advance, height: size };
}
