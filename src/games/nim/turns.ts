/**
 * Turn handling: cursor movement, move submission, loss detection
 */

import { availableCount, clearRange } from './board';
import { clearSelection, isMarked } from './selection';
import type { NimState, Player } from './state';

export type Direction = 'up' | 'down' | 'left' | 'right';

export function moveCursor(state: NimState, direction: Direction): void {
  const cursor = state.cursor;
  switch (direction) {
    case 'up':
      cursor.row = Math.max(0, cursor.row - 1);
      break;
    case 'down':
      cursor.row = Math.min(state.rows - 1, cursor.row + 1);
      break;
    case 'left':
      cursor.col = Math.max(0, cursor.col - 1);
      break;
    case 'right':
      cursor.col = Math.min(state.cols - 1, cursor.col + 1);
      break;
  }
}

/**
 * Sticks that would survive if the current selection were taken
 */
export function remainingAfterSelection(state: NimState): number {
  let remaining = 0;
  state.board.forEach((cells, row) => {
    cells.forEach((present, col) => {
      if (present && !isMarked(state, row, col)) remaining++;
    });
  });
  return remaining;
}

export function nextPlayer(player: Player): Player {
  return player === 1 ? 2 : 1;
}

/**
 * Commit the selection as a move.
 *
 * Rejected without any change when nothing is selected or when the move
 * would take the last stick. Returns whether the move was applied.
 */
export function submitMove(state: NimState): boolean {
  const range = state.markedRange;
  const row = state.markedRow;
  if (!range || row === null) return false;

  if (remainingAfterSelection(state) === 0) return false;

  clearRange(state.board, row, range[0], range[1]);
  state.cursor = { row: 0, col: 0 };
  clearSelection(state);
  state.player = nextPlayer(state.player);
  return true;
}

/**
 * The player to move has lost once a single stick is left. Nobody can
 * take it (submitMove refuses to empty the board), so the board stays
 * frozen in this state.
 */
export function isLost(state: NimState): boolean {
  return availableCount(state.board) === 1;
}
