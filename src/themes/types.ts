/**
 * Theme configuration types.
 */

export interface ThemeConfig {
  readonly backgroundColor: string;
  readonly textColor: string;
  readonly axisLineColor: string;
  readonly axisTickColor: string;
  readonly gridLineColor: string;
  readonly legendBackgroundColor: string;
  readonly legendBorderColor: string;
  /** Auto-color rotation; color names or CSS colors. */
  readonly colorPalette: string[];
  readonly fontFamily: string;
  /** Tick label size in pixels; titles and axis labels scale from it. */
  readonly fontSize: number;
}
