// Terminal Session Manager - raw mode and alternate screen, restored exactly once

import { logger } from '../logger.js';

const CSI = '\u001b[';

export const SEQUENCES = {
  altScreenOn: `${CSI}?1049h`,
  altScreenOff: `${CSI}?1049l`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  // Kitty keyboard protocol: disambiguate escape codes + report event types
  pushKeyboardFlags: `${CSI}>3u`,
  popKeyboardFlags: `${CSI}<u`,
} as const;

export class TerminalInitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalInitError';
  }
}

export class TerminalRestoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalRestoreError';
  }
}

export interface TtyInput {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TtyOutput {
  write(chunk: string): unknown;
}

/**
 * The subset of `process` the session hooks into so a signal or a plain
 * process exit still puts the terminal back
 */
export interface ProcessHooks {
  onExit(listener: () => void): void;
  offExit(listener: () => void): void;
  onSignal(signal: NodeJS.Signals, listener: () => void): void;
  offSignal(signal: NodeJS.Signals, listener: () => void): void;
  exit(code: number): void;
}

export interface TerminalIO {
  stdin: TtyInput;
  stdout: TtyOutput;
  process: ProcessHooks;
}

export interface SessionOptions {
  enhancedKeyboard?: boolean;
}

const HANDLED_SIGNALS: Array<{ signal: NodeJS.Signals; number: number }> = [
  { signal: 'SIGTERM', number: 15 },
  { signal: 'SIGHUP', number: 1 },
];

export function processHooks(): ProcessHooks {
  return {
    onExit: (listener) => {
      process.on('exit', listener);
    },
    offExit: (listener) => {
      process.off('exit', listener);
    },
    onSignal: (signal, listener) => {
      process.on(signal, listener);
    },
    offSignal: (signal, listener) => {
      process.off(signal, listener);
    },
    exit: (code) => {
      process.exit(code);
    },
  };
}

export function defaultTerminalIO(): TerminalIO {
  return { stdin: process.stdin, stdout: process.stdout, process: processHooks() };
}

export class TerminalSession {
  private rawMode = false;
  private alternateScreen = false;
  private keyboardFlags = false;
  private restored = false;
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();

  private constructor(private readonly io: TerminalIO) {}

  /**
   * Take over the terminal. If any step fails, whatever was already set up is
   * undone before the TerminalInitError is thrown.
   */
  static init(io: TerminalIO = defaultTerminalIO(), options: SessionOptions = {}): TerminalSession {
    const { stdin } = io;
    if (!stdin.isTTY || typeof stdin.setRawMode !== 'function') {
      throw new TerminalInitError('Standard input is not a terminal');
    }

    const session = new TerminalSession(io);
    try {
      session.enter(options);
    } catch (error) {
      try {
        session.restore();
      } catch (restoreError) {
        logger.error('Failed to undo partial terminal setup: %s', restoreError);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TerminalInitError(`Failed to configure terminal: ${message}`, { cause: error });
    }

    logger.info('Terminal session started');
    return session;
  }

  get isRestored(): boolean {
    return this.restored;
  }

  /**
   * Leave raw mode and the alternate screen. Only the first call does anything.
   */
  restore(): void {
    if (this.restored) return;
    this.restored = true;
    this.removeHooks();

    // Every step is attempted even if an earlier one fails
    const { stdin, stdout } = this.io;
    const failures: unknown[] = [];
    const attempt = (step: () => void): void => {
      try {
        step();
      } catch (error) {
        failures.push(error);
      }
    };

    if (this.keyboardFlags) {
      this.keyboardFlags = false;
      attempt(() => stdout.write(SEQUENCES.popKeyboardFlags));
    }
    if (this.alternateScreen) {
      this.alternateScreen = false;
      attempt(() => stdout.write(SEQUENCES.showCursor + SEQUENCES.altScreenOff));
    }
    if (this.rawMode) {
      this.rawMode = false;
      attempt(() => stdin.setRawMode?.(false));
    }
    attempt(() => stdin.pause());

    if (failures.length > 0) {
      const [first] = failures;
      const message = first instanceof Error ? first.message : String(first);
      throw new TerminalRestoreError(`Failed to restore terminal: ${message}`, { cause: first });
    }

    logger.info('Terminal session restored');
  }

  private enter(options: SessionOptions): void {
    const { stdin, stdout } = this.io;

    this.installHooks();

    stdin.setRawMode?.(true);
    this.rawMode = true;
    stdin.resume();

    this.alternateScreen = true;
    stdout.write(SEQUENCES.altScreenOn + SEQUENCES.hideCursor);

    if (options.enhancedKeyboard) {
      this.keyboardFlags = true;
      stdout.write(SEQUENCES.pushKeyboardFlags);
    }
  }

  private installHooks(): void {
    this.io.process.onExit(this.onExit);
    for (const { signal, number } of HANDLED_SIGNALS) {
      const handler = () => {
        logger.warn('Received %s, restoring terminal', signal);
        this.restoreQuietly();
        this.io.process.exit(128 + number);
      };
      this.signalHandlers.set(signal, handler);
      this.io.process.onSignal(signal, handler);
    }
  }

  private removeHooks(): void {
    this.io.process.offExit(this.onExit);
    for (const [signal, handler] of this.signalHandlers) {
      this.io.process.offSignal(signal, handler);
    }
    this.signalHandlers.clear();
  }

  private restoreQuietly(): void {
    try {
      this.restore();
    } catch (error) {
      logger.error('Terminal restore failed: %s', error);
    }
  }

  private onExit = (): void => {
    this.restoreQuietly();
  };
}

/**
 * Run `fn` with the terminal acquired and release it afterwards, whether `fn`
 * resolves or rejects. A restore failure after a failed `fn` is logged and the
 * original error is kept.
 */
export async function withTerminalSession<T>(
  fn: (session: TerminalSession) => Promise<T>,
  io: TerminalIO = defaultTerminalIO(),
  options: SessionOptions = {}
): Promise<T> {
  const session = TerminalSession.init(io, options);
  let result: T;
  try {
    result = await fn(session);
  } catch (error) {
    try {
      session.restore();
    } catch (restoreError) {
      logger.error('Terminal restore failed after an error: %s', restoreError);
    }
    throw error;
  }
  session.restore();
  return result;
}
