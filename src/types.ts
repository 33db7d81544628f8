// Bcachefs TUI Types - Configuration

import type { LevelWithSilent } from 'pino';
import type { TuiTheme } from './tui/types.js';

export interface AppConfig {
  logLevel: LevelWithSilent;
  enhancedKeyboard: boolean; // Ask the terminal to report key repeat/release
  theme: TuiTheme;
}
