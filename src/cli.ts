import { Command, Option } from 'commander';

import { APP_NAME, CONFIG_PATH, resolveConfig, VERSION } from './config.js';
import { logger, LOG_LEVELS, setLogLevel } from './logger.js';
import type { AppConfig } from './types.js';
import { startTui } from './tui-cli.js';

export interface CliOptions {
  config: string;
  logLevel?: AppConfig['logLevel'];
  enhancedKeyboard?: boolean;
}

export type TuiRunner = (config: AppConfig) => Promise<unknown>;

export function createProgram(run: TuiRunner = startTui): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Terminal user interface for bcachefs')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to the config file', CONFIG_PATH)
    .addOption(new Option('-l, --log-level <level>', 'Log level').choices(LOG_LEVELS))
    .option('--enhanced-keyboard', 'Ask the terminal to report key repeat and release')
    .action(async (options: CliOptions) => {
      const config = resolveConfig(options.config, {
        logLevel: options.logLevel,
        enhancedKeyboard: options.enhancedKeyboard,
      });
      setLogLevel(config.logLevel);

      try {
        await run(config);
      } catch (error) {
        logger.error({ err: error }, 'TUI terminated with an error');
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
