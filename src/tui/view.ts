// Main panel - builds the widget tree for the current state

import { BORDER_SETS, Block } from './render/block.js';
import { Paragraph } from './render/paragraph.js';
import { line, span, type Line } from './render/text.js';
import type { AppState } from './state.js';
import { DEFAULT_THEME, type TuiTheme } from './types.js';

export const APP_TITLE = 'Bcachefs TUI';

export function instructionLine(theme: TuiTheme): Line {
  const keyStyle = { color: theme.keyColor, bold: true };
  return line([
    ' Decrement ',
    span('<j>', keyStyle),
    ' Increment ',
    span('<k>', keyStyle),
    ' Quit ',
    span('<q>', keyStyle),
  ]);
}

export function buildView(state: AppState, theme: TuiTheme = DEFAULT_THEME): Paragraph {
  const block = new Block({
    borderSet: BORDER_SETS.thick,
    borderStyle: { color: theme.borderColor },
  })
    .title(line([span(` ${APP_TITLE} `, { color: theme.titleColor, bold: true })]), 'top', 'center')
    .title(instructionLine(theme), 'bottom', 'center');

  const lines: Line[] = [line(['Value: ', span(String(state.counter), { color: theme.valueColor })])];
  if (state.status !== null) {
    lines.push(line([span(state.status, { color: theme.errorColor, bold: true })]));
  }

  return new Paragraph(lines).centered().withBlock(block);
}
