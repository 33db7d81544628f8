// Application Loop - owns the state and drives draw / read / handle

import { logger } from '../logger.js';
import { ScreenBuffer, type Rect } from './render/buffer.js';
import type { Widget } from './render/widget.js';
import { applyKey, CounterBoundsError, createAppState, type AppState } from './state.js';
import { DEFAULT_THEME, type EventSource, type KeyEvent, type Surface, type TerminalEvent, type TuiTheme } from './types.js';
import { buildView } from './view.js';

export type LoopPhase = 'draw' | 'read' | 'handle';

export class LoopError extends Error {
  constructor(
    public readonly phase: LoopPhase,
    cause: unknown
  ) {
    super(`${describePhase(phase)} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'LoopError';
  }
}

function describePhase(phase: LoopPhase): string {
  switch (phase) {
    case 'draw':
      return 'Drawing the frame';
    case 'read':
      return 'Reading the next terminal event';
    case 'handle':
      return 'Handling the terminal event';
  }
}

export type KeyOutcome =
  | { ok: true; handled: boolean }
  | { ok: false; error: CounterBoundsError };

export class App implements Widget {
  private readonly state: AppState;
  private readonly theme: TuiTheme;

  constructor(state: AppState = createAppState(), theme: TuiTheme = DEFAULT_THEME) {
    this.state = state;
    this.theme = theme;
  }

  get counter(): number {
    return this.state.counter;
  }

  get exit(): boolean {
    return this.state.exit;
  }

  get status(): string | null {
    return this.state.status;
  }

  /**
   * Run until the exit flag is set. Failures of the surface, the event source
   * or the handler reject with a LoopError naming the phase.
   */
  async run(surface: Surface, events: EventSource): Promise<void> {
    logger.info('Application loop started');

    while (!this.state.exit) {
      try {
        surface.draw((area) => this.renderFrame(area));
      } catch (error) {
        throw new LoopError('draw', error);
      }

      let event: TerminalEvent;
      try {
        event = await events.readEvent();
      } catch (error) {
        throw new LoopError('read', error);
      }

      try {
        this.handleEvent(event);
      } catch (error) {
        throw new LoopError('handle', error);
      }
    }

    logger.info('Application loop finished (counter=%d)', this.state.counter);
  }

  handleEvent(event: TerminalEvent): void {
    // Repeat and release reports are dropped; resize is picked up by the next draw
    if (event.kind === 'key' && event.action === 'press') {
      this.handleKeyEvent(event);
    }
  }

  /**
   * Dispatch a key press. Counter bound failures are reported through the
   * status row and the return value, everything else is thrown.
   */
  handleKeyEvent(event: KeyEvent): KeyOutcome {
    if (event.ctrl || event.meta) {
      return { ok: true, handled: false };
    }

    try {
      const handled = applyKey(this.state, event.key);
      if (handled) {
        logger.debug('Key %s -> counter=%d exit=%s', event.key, this.state.counter, this.state.exit);
        this.state.status = null;
      }
      return { ok: true, handled };
    } catch (error) {
      if (error instanceof CounterBoundsError) {
        logger.warn('Key %s rejected: %s (counter=%d)', event.key, error.message, error.counter);
        this.state.status = error.message;
        return { ok: false, error };
      }
      throw error;
    }
  }

  render(area: Rect, buf: ScreenBuffer): void {
    buildView(this.state, this.theme).render(area, buf);
  }

  renderFrame(area: Rect): ScreenBuffer {
    const buf = new ScreenBuffer(area);
    this.render(area, buf);
    return buf;
  }
}
