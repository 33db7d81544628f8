// TUI entry point - wires the session, surface and input source around the app

import { logger } from './logger.js';
import type { AppConfig } from './types.js';
import { App } from './tui/app.js';
import { InkSurface } from './tui/ink-surface.js';
import { createAppState } from './tui/state.js';
import type { EventSource, Surface } from './tui/types.js';
import { StdinEventSource } from './terminal/input.js';
import { defaultTerminalIO, withTerminalSession, type TerminalIO } from './terminal/session.js';

export interface TuiDependencies {
  io?: TerminalIO;
  createSurface?: () => Surface;
  createEvents?: () => EventSource;
}

/**
 * Run the TUI to completion and return the finished app. The terminal is
 * restored before this resolves or rejects.
 */
export async function startTui(config: AppConfig, deps: TuiDependencies = {}): Promise<App> {
  const io = deps.io ?? defaultTerminalIO();
  const createSurface = deps.createSurface ?? (() => new InkSurface());
  const createEvents = deps.createEvents ?? (() => new StdinEventSource(process.stdin, process.stdout));

  const app = new App(createAppState(), config.theme);

  await withTerminalSession(
    async () => {
      const surface = createSurface();
      const events = createEvents();
      try {
        await app.run(surface, events);
      } finally {
        events.close();
        surface.close();
      }
    },
    io,
    { enhancedKeyboard: config.enhancedKeyboard }
  );

  logger.info('TUI exited (counter=%d)', app.counter);
  return app;
}
