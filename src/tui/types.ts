// TUI Types

import type { Rect, ScreenBuffer } from './render/buffer.js';

export interface TuiTheme {
  titleColor: string;
  keyColor: string;
  valueColor: string;
  errorColor: string;
  borderColor: string;
}

export const DEFAULT_THEME: TuiTheme = {
  titleColor: 'white',
  keyColor: 'blue',
  valueColor: 'yellow',
  errorColor: 'red',
  borderColor: 'white',
};

export type KeyAction = 'press' | 'repeat' | 'release';

export interface KeyEvent {
  kind: 'key';
  key: string;
  action: KeyAction;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

export interface ResizeEvent {
  kind: 'resize';
  columns: number;
  rows: number;
}

export interface OtherEvent {
  kind: 'other';
  sequence: string;
}

export type TerminalEvent = KeyEvent | ResizeEvent | OtherEvent;

export type RenderFn = (area: Rect) => ScreenBuffer;

/**
 * Where frames end up. draw() runs the render step and flushes the frame.
 */
export interface Surface {
  draw(renderFn: RenderFn): void;
  close(): void;
}

/**
 * Source of terminal events. readEvent() waits until one is available.
 */
export interface EventSource {
  readEvent(): Promise<TerminalEvent>;
  close(): void;
}

export function keyPress(key: string, modifiers: Partial<Pick<KeyEvent, 'ctrl' | 'meta' | 'shift'>> = {}): KeyEvent {
  return {
    kind: 'key',
    key,
    action: 'press',
    ctrl: modifiers.ctrl ?? false,
    meta: modifiers.meta ?? false,
    shift: modifiers.shift ?? false,
  };
}
