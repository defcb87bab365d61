import type { ThemeName } from '../config/types';
import type { ThemeConfig } from './types';

const autoPalette = ['blue', 'red', 'green', 'orange', 'purple', 'cyan', 'magenta', 'yellow', 'black', 'gray'];

export const lightTheme: ThemeConfig = {
  backgroundColor: '#ffffff',
  textColor: '#000000',
  axisLineColor: '#000000',
  axisTickColor: '#000000',
  gridLineColor: 'rgba(230,230,230,0.8)',
  legendBackgroundColor: 'rgba(255,255,255,0.9)',
  legendBorderColor: 'rgba(0,0,0,0.3)',
  colorPalette: autoPalette,
  fontFamily: 'Arial, Helvetica, sans-serif',
  fontSize: 10,
};

export const darkTheme: ThemeConfig = {
  backgroundColor: '#1a1a2e',
  textColor: '#e0e0e0',
  axisLineColor: '#d0d0d0',
  axisTickColor: '#d0d0d0',
  gridLineColor: 'rgba(255,255,255,0.12)',
  legendBackgroundColor: 'rgba(26,26,46,0.9)',
  legendBorderColor: 'rgba(255,255,255,0.3)',
  colorPalette: ['cyan', 'orange', 'green', 'magenta', 'yellow', 'blue', 'red', 'purple', 'gray'],
  fontFamily: 'Arial, Helvetica, sans-serif',
  fontSize: 10,
};

export function getTheme(name: ThemeName): ThemeConfig {
  return name === 'dark' ? darkTheme : lightTheme;
}

export type { ThemeConfig } from './types';
