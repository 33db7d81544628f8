import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createProgram } from '../cli.js';
import { DEFAULT_CONFIG } from '../config.js';
import { setLogLevel } from '../logger.js';
import { startTui } from '../tui-cli.js';
import { LoopError } from '../tui/app.js';
import type { ScreenBuffer } from '../tui/render/buffer.js';
import { keyPress, type EventSource, type RenderFn, type Surface, type TerminalEvent } from '../tui/types.js';
import type { TerminalIO } from '../terminal/session.js';

function fakeIO(rawModes: boolean[]): TerminalIO {
  return {
    stdin: {
      isTTY: true,
      setRawMode: (mode: boolean) => rawModes.push(mode),
      resume: () => undefined,
      pause: () => undefined,
    },
    stdout: { write: () => true },
    process: {
      onExit: () => undefined,
      offExit: () => undefined,
      onSignal: () => undefined,
      offSignal: () => undefined,
      exit: () => undefined,
    },
  };
}

class FrameSurface implements Surface {
  last: ScreenBuffer | null = null;
  closed = false;

  draw(renderFn: RenderFn): void {
    this.last = renderFn({ x: 0, y: 0, width: 50, height: 4 });
  }

  close(): void {
    this.closed = true;
  }
}

function scripted(events: TerminalEvent[]): EventSource & { closed: boolean } {
  return {
    closed: false,
    async readEvent() {
      const next = events.shift();
      if (!next) throw new Error('no more input');
      return next;
    },
    close() {
      this.closed = true;
    },
  };
}

describe('startTui', () => {
  it('should run the app and restore the terminal on quit', async () => {
    const rawModes: boolean[] = [];
    const surface = new FrameSurface();
    const events = scripted([keyPress('k'), keyPress('k'), keyPress('q')]);

    const app = await startTui(DEFAULT_CONFIG, {
      io: fakeIO(rawModes),
      createSurface: () => surface,
      createEvents: () => events,
    });

    expect(app.counter).toBe(2);
    expect(app.exit).toBe(true);
    expect(rawModes).toEqual([true, false]);
    expect(surface.closed).toBe(true);
    expect(events.closed).toBe(true);
    expect(surface.last?.toLines()[1]).toBe('┃                    Value: 2                    ┃');
  });

  it('should restore the terminal when the loop fails', async () => {
    const rawModes: boolean[] = [];
    const surface = new FrameSurface();

    await expect(
      startTui(DEFAULT_CONFIG, {
        io: fakeIO(rawModes),
        createSurface: () => surface,
        createEvents: () => scripted([keyPress('k')]),
      })
    ).rejects.toBeInstanceOf(LoopError);

    expect(rawModes).toEqual([true, false]);
    expect(surface.closed).toBe(true);
  });
});

describe('CLI', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bcachefs-tui-cli-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    process.exitCode = undefined;
    setLogLevel('silent');
    vi.restoreAllMocks();
  });

  it('should pass the resolved config to the runner', async () => {
    const run = vi.fn().mockResolvedValue(undefined);
    const configPath = path.join(tempDir, 'config.yaml');
    fs.writeFileSync(configPath, 'theme:\n  valueColor: green\n', 'utf-8');

    await createProgram(run)
      .exitOverride()
      .parseAsync(['--config', configPath, '--log-level', 'silent', '--enhanced-keyboard'], { from: 'user' });

    expect(run).toHaveBeenCalledWith({
      logLevel: 'silent',
      enhancedKeyboard: true,
      theme: { ...DEFAULT_CONFIG.theme, valueColor: 'green' },
    });
  });

  it('should reject unknown log levels', async () => {
    const run = vi.fn();
    const program = createProgram(run)
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    await expect(program.parseAsync(['--log-level', 'loud'], { from: 'user' })).rejects.toThrow();
    expect(run).not.toHaveBeenCalled();
  });

  it('should set a failing exit code and print the error', async () => {
    const errors: unknown[] = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(message);
    });
    const run = vi.fn().mockRejectedValue(new Error('Standard input is not a terminal'));

    await createProgram(run)
      .exitOverride()
      .parseAsync(['--config', path.join(tempDir, 'missing.yaml'), '--log-level', 'silent'], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(errors).toEqual(['Error: Standard input is not a terminal']);
  });
});
