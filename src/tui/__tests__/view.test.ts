import { describe, it, expect } from 'vitest';
import { App } from '../app.js';
import { ScreenBuffer } from '../render/buffer.js';
import { createAppState } from '../state.js';
import { DEFAULT_THEME } from '../types.js';
import { buildView } from '../view.js';

const GOLDEN = [
  '┏━━━━━━━━━━━━━━━━━ Bcachefs TUI ━━━━━━━━━━━━━━━━━┓',
  '┃                    Value: 0                    ┃',
  '┃                                                ┃',
  '┗━━━━━ Decrement <j> Increment <k> Quit <q>━━━━━━┛',
];

function renderState(counter: number, status: string | null = null): ScreenBuffer {
  const buf = ScreenBuffer.empty(50, 4);
  buildView({ counter, exit: false, status }).render(buf.area, buf);
  return buf;
}

describe('Main panel view', () => {
  it('should render the initial state as the expected grid', () => {
    expect(renderState(0).toLines()).toEqual(GOLDEN);
  });

  it('should render the same grid through App.renderFrame', () => {
    const app = new App(createAppState());
    expect(app.renderFrame({ x: 0, y: 0, width: 50, height: 4 }).toLines()).toEqual(GOLDEN);
  });

  it('should emphasise the title', () => {
    const buf = renderState(0);
    expect(buf.cell(19, 0)).toEqual({ symbol: 'B', style: { color: DEFAULT_THEME.titleColor, bold: true } });
    expect(buf.cell(30, 0).symbol).toBe('I');
    expect(buf.cell(30, 0).style.bold).toBe(true);
    expect(buf.cell(17, 0).style.bold).toBeUndefined();
  });

  it('should emphasise the numeral but not its label', () => {
    const buf = renderState(0);
    expect(buf.cell(28, 1)).toEqual({ symbol: '0', style: { color: DEFAULT_THEME.valueColor } });
    expect(buf.cell(21, 1)).toEqual({ symbol: 'V', style: {} });
  });

  it('should emphasise each key token in the instructions', () => {
    const buf = renderState(0);
    const keyStyle = { color: DEFAULT_THEME.keyColor, bold: true };
    for (const [start, key] of [
      [17, 'j'],
      [31, 'k'],
      [40, 'q'],
    ] as const) {
      expect(buf.cell(start, 3)).toEqual({ symbol: '<', style: keyStyle });
      expect(buf.cell(start + 1, 3)).toEqual({ symbol: key, style: keyStyle });
      expect(buf.cell(start + 2, 3)).toEqual({ symbol: '>', style: keyStyle });
    }
    expect(buf.cell(7, 3)).toEqual({ symbol: 'D', style: { color: DEFAULT_THEME.borderColor } });
  });

  it('should produce identical output when rendered twice', () => {
    const first = renderState(1);
    const second = renderState(1);
    expect(second.toString()).toBe(first.toString());
    expect(second.row(1)).toEqual(first.row(1));
    expect(second.row(3)).toEqual(first.row(3));
  });

  it('should show the counter value', () => {
    expect(renderState(2).toLines()[1]).toBe('┃                    Value: 2                    ┃');
  });

  it('should show the status on the second body row', () => {
    const buf = renderState(2, 'counter overflow');
    expect(buf.toLines()[2]).toBe('┃                counter overflow                ┃');
    expect(buf.cell(17, 2)).toEqual({ symbol: 'c', style: { color: DEFAULT_THEME.errorColor, bold: true } });
  });

  it('should apply a custom theme', () => {
    const theme = { ...DEFAULT_THEME, valueColor: 'green', keyColor: '#6366f1' };
    const buf = ScreenBuffer.empty(50, 4);
    buildView(createAppState(), theme).render(buf.area, buf);
    expect(buf.cell(28, 1).style.color).toBe('green');
    expect(buf.cell(18, 3).style.color).toBe('#6366f1');
  });
});
