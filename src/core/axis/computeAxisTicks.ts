/**
 * Nice axis ticks and tick label formatting.
 *
 * Ticks are multiples of a step of the form m·10^k with m in {1, 2, 5}.
 * Grid lines and tick labels are drawn from the same list, so everything here
 * is deterministic for a given input.
 *
 * @module computeAxisTicks
 */

export const DEFAULT_TICK_COUNT = 5;

/** Upper bound on decimals printed in a tick label. */
export const MAX_TICK_DECIMALS = 2;

const NICE_MULTIPLIERS = [1, 2, 5, 10] as const;

// Relative slack so that e.g. 0.1 / 0.1 stays at multiplier 1 instead of creeping to 2.
const STEP_EPSILON = 1e-9;

/**
 * Removes floating noise from a computed tick (0.30000000000000004 → 0.3).
 */
export const cleanTickValue = (v: number): number => {
  const cleaned = Number(v.toPrecision(12));
  return Object.is(cleaned, -0) ? 0 : cleaned;
};

/** Decimals that keep ticks `step` apart once rounded, at any offset from zero. */
const tickDecimals = (step: number): number => Math.max(0, -Math.floor(Math.log10(step)) + 1);

const roundTick = (v: number, decimals: number): number => {
  const rounded = Number(v.toFixed(decimals));
  return Object.is(rounded, -0) ? 0 : rounded;
};

/**
 * Rounds a raw step up to the nearest m·10^k, m in {1, 2, 5}.
 * Returns 0 for non-positive or non-finite input.
 */
export function computeNiceStep(rawStep: number): number {
  if (!Number.isFinite(rawStep) || rawStep <= 0) return 0;

  const exponent = Math.floor(Math.log10(rawStep));
  const magnitude = Math.pow(10, exponent);
  const normalized = rawStep / magnitude;

  const multiplier = NICE_MULTIPLIERS.find((m) => normalized <= m * (1 + STEP_EPSILON)) ?? 10;
  return cleanTickValue(multiplier * magnitude);
}

/**
 * Tick values covering `[lo, hi]`: multiples of the nice step from at or below `lo`
 * through at or above `hi`.
 *
 * Returns `[lo]` for a degenerate range and `[]` for non-finite input.
 */
export function computeNiceTicks(lo: number, hi: number, targetCount: number = DEFAULT_TICK_COUNT): number[] {
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) return [];
  const min = Math.min(lo, hi);
  const max = Math.max(lo, hi);
  if (min === max) return [min];

  const target = Number.isFinite(targetCount) && targetCount >= 1 ? Math.round(targetCount) : DEFAULT_TICK_COUNT;
  const step = computeNiceStep((max - min) / target);
  if (step <= 0) return [min, max];

  const first = Math.floor(min / step + STEP_EPSILON);
  const last = Math.ceil(max / step - STEP_EPSILON);

  const decimals = tickDecimals(step);
  const ticks: number[] = [];
  for (let i = first; i <= last; i++) {
    ticks.push(roundTick(i * step, decimals));
  }
  return ticks;
}

/**
 * Step between consecutive ticks, or 0 when fewer than two ticks exist.
 */
export const tickStep = (ticks: ReadonlyArray<number>): number =>
  ticks.length >= 2 ? cleanTickValue(ticks[1] - ticks[0]) : 0;

/**
 * Ticks inside `[min, max]` (with a small tolerance), in order.
 */
export function visibleTicks(ticks: ReadonlyArray<number>, min: number, max: number): number[] {
  const tolerance = Math.abs(max - min) * 1e-9;
  return ticks.filter((t) => t >= min - tolerance && t <= max + tolerance);
}

/**
 * Number of decimals needed to tell ticks `step` apart, capped at {@link MAX_TICK_DECIMALS}.
 */
export function decimalsForStep(step: number): number {
  if (!Number.isFinite(step) || step <= 0) return MAX_TICK_DECIMALS;
  const needed = Math.ceil(-Math.log10(step) - STEP_EPSILON);
  return Math.max(0, Math.min(MAX_TICK_DECIMALS, needed));
}

/**
 * Fixed-precision formatting with trailing zeros (and a bare trailing point) removed.
 */
export function formatNumber(value: number, precision: number = MAX_TICK_DECIMALS): string {
  if (!Number.isFinite(value)) return String(value);
  const digits = Math.max(0, Math.min(20, Math.floor(precision)));
  let text = value.toFixed(digits);
  if (text.includes('.')) {
    text = text.replace(/0+$/, '').replace(/\.$/, '');
  }
  return text === '-0' ? '0' : text;
}

export type TickFormatter = (value: number) => string;

export function createTickFormatter(step: number): TickFormatter {
  const decimals = decimalsForStep(step);
  return (value) => formatNumber(value, decimals);
}
