// Input Source - queues decoded terminal events for the application loop

import type { EventEmitter } from 'events';
import { StringDecoder } from 'string_decoder';

import { logger } from '../logger.js';
import type { EventSource, TerminalEvent } from '../tui/types.js';
import { decodeKeys } from './keys.js';

export class InputReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputReadError';
  }
}

export type InputStream = EventEmitter;

export type OutputStream = EventEmitter & {
  columns?: number;
  rows?: number;
};

interface Waiter {
  resolve: (event: TerminalEvent) => void;
  reject: (error: InputReadError) => void;
}

/**
 * Turns stdin chunks and stdout resizes into a stream of events read one at a
 * time. Events that arrive while nobody is waiting are queued in order.
 */
export class StdinEventSource implements EventSource {
  private queue: TerminalEvent[] = [];
  private waiters: Waiter[] = [];
  private failure: InputReadError | null = null;
  // Holds the leading bytes of a character split across chunks
  private readonly decoder = new StringDecoder('utf8');
  private closed = false;

  constructor(
    private readonly input: InputStream,
    private readonly output?: OutputStream
  ) {
    this.input.on('data', this.onData);
    this.input.on('end', this.onEnd);
    this.input.on('error', this.onError);
    this.output?.on('resize', this.onResize);
  }

  readEvent(): Promise<TerminalEvent> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Number of decoded events not yet read
   */
  get pending(): number {
    return this.queue.length;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    this.input.off('error', this.onError);
    this.output?.off('resize', this.onResize);
    this.fail(new InputReadError('Input source closed'));
  }

  private push(event: TerminalEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(event);
    } else {
      this.queue.push(event);
    }
  }

  private fail(error: InputReadError): void {
    if (this.failure) return;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  private onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    for (const event of decodeKeys(text)) {
      this.push(event);
    }
  };

  private onResize = (): void => {
    const columns = this.output?.columns ?? 0;
    const rows = this.output?.rows ?? 0;
    logger.debug('Terminal resized to %dx%d', columns, rows);
    this.push({ kind: 'resize', columns, rows });
  };

  private onEnd = (): void => {
    this.fail(new InputReadError('Input stream ended'));
  };

  private onError = (error: unknown): void => {
    const message = error instanceof Error ? error.message : String(error);
    this.fail(new InputReadError(`Input stream failed: ${message}`, { cause: error }));
  };
}
