import os from 'os';
import path from 'path';
import fs from 'fs';
import YAML from 'yaml';
import { z } from 'zod';

import { logger, LOG_LEVELS } from './logger.js';
import type { AppConfig } from './types.js';
import { DEFAULT_THEME } from './tui/types.js';

export const APP_NAME = 'bcachefs-tui';
export const VERSION = '0.1.0';

// Data directory - config and logs
export const DATA_DIR = process.env.BCACHEFS_TUI_HOME ?? path.join(os.homedir(), '.bcachefs-tui');
export const CONFIG_PATH = path.join(DATA_DIR, 'config.yaml');

// Default configuration
export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'info',
  enhancedKeyboard: false,
  theme: DEFAULT_THEME,
};

// Zod schema for config file validation; every field is optional
const ThemeSchema = z
  .object({
    titleColor: z.string(),
    keyColor: z.string(),
    valueColor: z.string(),
    errorColor: z.string(),
    borderColor: z.string(),
  })
  .partial();

const ConfigFileSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).optional(),
  enhancedKeyboard: z.boolean().optional(),
  theme: ThemeSchema.optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function mergeConfig(base: AppConfig, overrides: ConfigFile): AppConfig {
  return {
    logLevel: overrides.logLevel ?? base.logLevel,
    enhancedKeyboard: overrides.enhancedKeyboard ?? base.enhancedKeyboard,
    theme: { ...base.theme, ...overrides.theme },
  };
}

export function loadConfig(configPath: string = CONFIG_PATH): AppConfig {
  if (!fs.existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    // An empty file parses to null
    const parsed: unknown = YAML.parse(content) ?? {};
    const result = ConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn('Invalid config %s, using defaults: %s', configPath, result.error.message);
      return DEFAULT_CONFIG;
    }
    return mergeConfig(DEFAULT_CONFIG, result.data);
  } catch (error) {
    logger.warn('Failed to read config %s, using defaults: %s', configPath, error);
    return DEFAULT_CONFIG;
  }
}

/**
 * Config file merged with command line overrides; unset overrides keep the
 * file's value
 */
export function resolveConfig(configPath: string, overrides: ConfigFile): AppConfig {
  return mergeConfig(loadConfig(configPath), overrides);
}
