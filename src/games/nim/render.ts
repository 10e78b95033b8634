/**
 * Frame renderer
 *
 * Pure function of the session state and terminal size. Every call
 * produces the whole screen; nothing is diffed against the last frame.
 */

import type { Palette } from '../../themes';
import { isPresent } from './board';
import { renderHelp } from './help';
import { center, countNewlines, indent, paint, wordWrap } from './layout';
import { isMarked } from './selection';
import type { NimState } from './state';
import { isLost } from './turns';

export const TITLE = '== Nimm ==';

export const RULES =
  'Nim is a mathematical game of strategy in which two players take turns ' +
  'removing (or "nimming") objects from distinct heaps or piles. On each ' +
  'turn, a player must remove at least one object, and may remove any ' +
  'number of objects provided they all come from the same heap or pile. ' +
  'The goal of the game is to avoid taking the last object.';

/** Columns kept free around the rules paragraph */
const RULES_MARGIN = 12;
/** Left margin of the whole frame */
const FRAME_INDENT = 2;
/** Rows kept free below the frame */
const RESERVED_ROWS = 4;

const STICK = 'X';
const CELL_GAP = '  ';

/**
 * The lost message is padded to the width of the turn message so the
 * centered line does not shift when the game ends.
 */
export function statusLine(state: NimState): string {
  const turn = `Player ${state.player}'s turn`;
  return isLost(state) ? `Player ${state.player} lost`.padEnd(turn.length) : turn;
}

export function renderRules(width: number, palette: Palette): string {
  return wordWrap(RULES, width - RULES_MARGIN)
    .map(line => paint(palette.dim, line))
    .join('\n');
}

/**
 * Board rows without a trailing newline. The cursor style wins over the
 * selection style on the same cell.
 */
export function renderBoard(state: NimState, palette: Palette): string {
  const lines: string[] = [];
  for (let row = 0; row < state.rows; row++) {
    let line = '';
    for (let col = 0; col < state.cols; col++) {
      const mark = isPresent(state.board, row, col) ? STICK : ' ';
      let style = '';
      if (row === state.cursor.row && col === state.cursor.col) {
        style = palette.highlight;
      } else if (isMarked(state, row, col)) {
        style = palette.marked;
      }
      line += CELL_GAP + paint(style, mark);
    }
    lines.push(line);
  }
  return lines.join('\n');
}

export function render(state: NimState, palette: Palette): string {
  const { width, height } = state;

  let body = '';
  body += center(paint(palette.title, TITLE), width) + '\n\n';
  body += center(renderRules(width, palette), width) + '\n\n';
  body += center(statusLine(state), width) + '\n\n';
  body += center(renderBoard(state, palette), width) + '\n';

  const help = center(renderHelp(state.help, palette), width);
  const fill = Math.max(0, height - RESERVED_ROWS - countNewlines(body) - countNewlines(help));

  return indent('\n' + body + '\n'.repeat(fill) + help, FRAME_INDENT);
}
