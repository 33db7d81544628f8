// Key decoding - raw terminal input to TerminalEvents

import type { KeyAction, KeyEvent, TerminalEvent } from '../tui/types.js';

const ESC = '\u001b';

// Kitty keyboard protocol modifier bits (value sent is bits + 1)
const KITTY_SHIFT = 1;
const KITTY_ALT = 2;
const KITTY_CTRL = 4;
const KITTY_META = 32;

const KITTY_EVENT_TYPES: Record<string, KeyAction> = {
  '1': 'press',
  '2': 'repeat',
  '3': 'release',
};

const CSI_LETTER_KEYS: Record<string, string> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end',
};

const CSI_TILDE_KEYS: Record<string, string> = {
  '1': 'home',
  '3': 'delete',
  '4': 'end',
  '5': 'pageup',
  '6': 'pagedown',
  '7': 'home',
  '8': 'end',
};

const KITTY_CODEPOINT_KEYS: Record<number, string> = {
  9: 'tab',
  13: 'enter',
  27: 'escape',
  127: 'backspace',
};

interface Modifiers {
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

const NO_MODIFIERS: Modifiers = { ctrl: false, meta: false, shift: false };

function keyEvent(key: string, modifiers: Modifiers = NO_MODIFIERS, action: KeyAction = 'press'): KeyEvent {
  return { kind: 'key', key, action, ...modifiers };
}

function xtermModifiers(param: string | undefined): Modifiers {
  if (param === undefined) return NO_MODIFIERS;
  const bits = Math.max(0, Number.parseInt(param, 10) - 1);
  return {
    shift: (bits & 1) !== 0,
    meta: (bits & 2) !== 0,
    ctrl: (bits & 4) !== 0,
  };
}

function kittyModifiers(param: string | undefined): Modifiers {
  if (param === undefined) return NO_MODIFIERS;
  const bits = Math.max(0, Number.parseInt(param, 10) - 1);
  return {
    shift: (bits & KITTY_SHIFT) !== 0,
    meta: (bits & (KITTY_ALT | KITTY_META)) !== 0,
    ctrl: (bits & KITTY_CTRL) !== 0,
  };
}

function findCsiEnd(input: string, start: number): number {
  for (let index = start + 2; index < input.length; index++) {
    const code = input.charCodeAt(index);
    if (code >= 0x40 && code <= 0x7e) return index;
  }
  return -1;
}

/**
 * CSI code[:alternates];mods[:event][;text]u
 */
function decodeKittyU(sequence: string): KeyEvent | null {
  const match = sequence.match(/^\u001b\[(\d+)(?::[\d:]*)?(?:;(\d+)(?::(\d+))?(?:;[\d:]+)?)?u$/);
  if (!match) return null;

  const codepoint = Number.parseInt(match[1], 10);
  const modifiers = kittyModifiers(match[2]);
  const action = match[3] === undefined ? 'press' : KITTY_EVENT_TYPES[match[3]] ?? 'press';

  const named = KITTY_CODEPOINT_KEYS[codepoint];
  if (named !== undefined) {
    return keyEvent(named, modifiers, action);
  }
  if (codepoint < 32 || codepoint > 0x10ffff) return null;
  return keyEvent(String.fromCodePoint(codepoint), modifiers, action);
}

function decodeCsi(sequence: string): TerminalEvent {
  const kitty = decodeKittyU(sequence);
  if (kitty) return kitty;

  const match = sequence.match(/^\u001b\[(?:(\d+)(?:;(\d+)(?::(\d+))?)?)?([A-Za-z~])$/);
  if (!match) {
    return { kind: 'other', sequence };
  }

  const [, primary, modifierParam, eventType, suffix] = match;
  const modifiers = xtermModifiers(modifierParam);
  const action = eventType === undefined ? 'press' : KITTY_EVENT_TYPES[eventType] ?? 'press';

  if (suffix === 'Z') {
    return keyEvent('tab', { ...modifiers, shift: true }, action);
  }
  if (suffix === '~') {
    const named = primary === undefined ? undefined : CSI_TILDE_KEYS[primary];
    return named === undefined ? { kind: 'other', sequence } : keyEvent(named, modifiers, action);
  }
  const named = CSI_LETTER_KEYS[suffix];
  return named === undefined ? { kind: 'other', sequence } : keyEvent(named, modifiers, action);
}

function decodeControl(code: number): KeyEvent {
  if (code === 13 || code === 10) return keyEvent('enter');
  if (code === 9) return keyEvent('tab');
  if (code === 8 || code === 127) return keyEvent('backspace');
  if (code >= 1 && code <= 26) {
    return keyEvent(String.fromCharCode(code + 96), { ...NO_MODIFIERS, ctrl: true });
  }
  return keyEvent(String.fromCharCode(code), { ...NO_MODIFIERS, ctrl: true });
}

/**
 * Split one chunk of terminal input into events. A chunk may carry several
 * keys at once (pastes, fast typing). An escape sequence cut off at the end of
 * the chunk is reported as `other`.
 */
export function decodeKeys(input: string): TerminalEvent[] {
  const events: TerminalEvent[] = [];
  let index = 0;

  while (index < input.length) {
    const char = input[index];

    if (char === ESC) {
      const next = input[index + 1];

      if (next === undefined) {
        events.push(keyEvent('escape'));
        index += 1;
      } else if (next === '[') {
        const end = findCsiEnd(input, index);
        if (end === -1) {
          events.push({ kind: 'other', sequence: input.slice(index) });
          break;
        }
        events.push(decodeCsi(input.slice(index, end + 1)));
        index = end + 1;
      } else if (next === 'O') {
        const suffix = input[index + 2];
        const named = suffix === undefined ? undefined : CSI_LETTER_KEYS[suffix];
        const sequence = input.slice(index, index + 3);
        events.push(named === undefined ? { kind: 'other', sequence } : keyEvent(named));
        index += sequence.length;
      } else if (next === ESC) {
        events.push(keyEvent('escape'));
        index += 1;
      } else {
        // ESC followed by a key is how terminals send Alt+key
        const codepoint = input.codePointAt(index + 1) ?? 0;
        const key = String.fromCodePoint(codepoint);
        events.push(keyEvent(key, { ...NO_MODIFIERS, meta: true }));
        index += 1 + key.length;
      }
      continue;
    }

    const code = input.charCodeAt(index);
    if (code < 32 || code === 127) {
      events.push(decodeControl(code));
      index += 1;
      continue;
    }

    const codepoint = input.codePointAt(index) ?? code;
    const key = String.fromCodePoint(codepoint);
    events.push(keyEvent(key, { ...NO_MODIFIERS, shift: key !== key.toLowerCase() }));
    index += key.length;
  }

  return events;
}
