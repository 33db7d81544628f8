// Application State - counter, exit flag and key bindings

export const COUNTER_MIN = 0;
export const COUNTER_MAX = 2;

export interface AppState {
  counter: number;
  exit: boolean;
  status: string | null;
}

export function createAppState(): AppState {
  return { counter: COUNTER_MIN, exit: false, status: null };
}

// Counter Error Types
export class CounterBoundsError extends Error {
  constructor(
    message: string,
    public readonly counter: number
  ) {
    super(message);
    this.name = 'CounterBoundsError';
  }
}

export class CounterUnderflowError extends CounterBoundsError {
  constructor(counter: number) {
    super('counter underflow', counter);
    this.name = 'CounterUnderflowError';
  }
}

export class CounterOverflowError extends CounterBoundsError {
  constructor(counter: number) {
    super('counter overflow', counter);
    this.name = 'CounterOverflowError';
  }
}

export type Transition = (state: AppState) => void;

export type BoundKey = 'q' | 'j' | 'k';

/**
 * Every bound key and what it does to the state. A transition either mutates
 * the state or throws, never both.
 */
export const KEY_BINDINGS: Record<BoundKey, Transition> = {
  q: (state) => {
    state.exit = true;
  },
  j: (state) => {
    if (state.counter <= COUNTER_MIN) {
      throw new CounterUnderflowError(state.counter);
    }
    state.counter -= 1;
  },
  k: (state) => {
    if (state.counter + 1 > COUNTER_MAX) {
      throw new CounterOverflowError(state.counter);
    }
    state.counter += 1;
  },
};

export function isBoundKey(key: string): key is BoundKey {
  return Object.prototype.hasOwnProperty.call(KEY_BINDINGS, key);
}

/**
 * Apply the binding for `key`. Unbound keys leave the state untouched.
 * Returns whether a binding ran.
 */
export function applyKey(state: AppState, key: string): boolean {
  if (!isBoundKey(key)) return false;
  KEY_BINDINGS[key](state);
  return true;
}
