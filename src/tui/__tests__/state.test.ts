import { describe, it, expect } from 'vitest';
import {
  applyKey,
  COUNTER_MAX,
  CounterBoundsError,
  CounterOverflowError,
  CounterUnderflowError,
  createAppState,
  isBoundKey,
  KEY_BINDINGS,
} from '../state.js';

describe('Application State', () => {
  it('should start at zero and not exited', () => {
    expect(createAppState()).toEqual({ counter: 0, exit: false, status: null });
  });

  describe('k (increment)', () => {
    it('should count up to the upper bound', () => {
      const state = createAppState();
      applyKey(state, 'k');
      expect(state.counter).toBe(1);
      applyKey(state, 'k');
      expect(state.counter).toBe(2);
    });

    it('should equal min(presses, 2) for any number of presses', () => {
      for (let presses = 0; presses <= 6; presses++) {
        const state = createAppState();
        for (let i = 0; i < presses; i++) {
          try {
            applyKey(state, 'k');
          } catch {
            // overflow leaves the counter alone
          }
        }
        expect(state.counter).toBe(Math.min(presses, COUNTER_MAX));
      }
    });

    it('should throw CounterOverflowError past the bound and keep the previous value', () => {
      const state = { counter: 2, exit: false, status: null };
      expect(() => applyKey(state, 'k')).toThrow(CounterOverflowError);
      expect(state.counter).toBe(2);
    });

    it('should use the exact overflow message', () => {
      const state = { counter: 2, exit: false, status: null };
      try {
        applyKey(state, 'k');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CounterBoundsError);
        expect((error as CounterOverflowError).message).toBe('counter overflow');
        expect((error as CounterOverflowError).name).toBe('CounterOverflowError');
        expect((error as CounterOverflowError).counter).toBe(2);
      }
    });
  });

  describe('j (decrement)', () => {
    it('should decrease by exactly one per press', () => {
      const state = { counter: 2, exit: false, status: null };
      applyKey(state, 'j');
      expect(state.counter).toBe(1);
      applyKey(state, 'j');
      expect(state.counter).toBe(0);
    });

    it('should throw CounterUnderflowError at zero without wrapping', () => {
      const state = createAppState();
      expect(() => applyKey(state, 'j')).toThrow('counter underflow');
      expect(() => applyKey(state, 'j')).toThrow(CounterUnderflowError);
      expect(state.counter).toBe(0);
    });
  });

  describe('q (quit)', () => {
    it('should set the exit flag from every reachable counter value', () => {
      for (const counter of [0, 1, 2]) {
        const state = { counter, exit: false, status: null };
        applyKey(state, 'q');
        expect(state.exit).toBe(true);
        expect(state.counter).toBe(counter);
      }
    });

    it('should keep the exit flag set', () => {
      const state = createAppState();
      applyKey(state, 'q');
      applyKey(state, 'q');
      applyKey(state, 'k');
      expect(state.exit).toBe(true);
    });
  });

  describe('unbound keys', () => {
    it('should be a no-op', () => {
      const state = createAppState();
      expect(applyKey(state, 'x')).toBe(false);
      expect(applyKey(state, 'K')).toBe(false);
      expect(applyKey(state, 'enter')).toBe(false);
      expect(state).toEqual(createAppState());
    });

    it('should not treat object prototype names as bindings', () => {
      expect(isBoundKey('toString')).toBe(false);
      expect(isBoundKey('constructor')).toBe(false);
    });
  });

  it('should bind exactly q, j and k', () => {
    expect(Object.keys(KEY_BINDINGS).sort()).toEqual(['j', 'k', 'q']);
  });
});
