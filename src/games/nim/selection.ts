/**
 * Selection engine
 *
 * A selection is a contiguous column span inside a single row. Space on
 * a stick starts or extends the span; space inside the span drops it.
 */

import { isPresent } from './board';
import type { NimState } from './state';

/**
 * Toggle the cell under the cursor.
 *
 * - absent cell: nothing happens
 * - cell in another row: the old selection is dropped first
 * - cell inside the current span: the whole span is cancelled
 * - otherwise the span grows to cover the new column, so the result is
 *   always [min, max] of the clicked columns (gaps are allowed)
 */
export function toggleCell(state: NimState): void {
  const { row, col } = state.cursor;
  if (!isPresent(state.board, row, col)) return;

  if (state.markedRow !== row) {
    state.markedRange = null;
  }
  state.markedRow = row;

  const range = state.markedRange;
  if (range && col >= range[0] && col <= range[1]) {
    state.markedRange = null;
    return;
  }

  const columns = range ? [range[0], range[1], col] : [col];
  columns.sort((a, b) => a - b);
  state.markedRange = [columns[0], columns[columns.length - 1]];
}

/**
 * Whether (row, col) is inside the active selection
 */
export function isMarked(state: NimState, row: number, col: number): boolean {
  const range = state.markedRange;
  if (!range || state.markedRow !== row) return false;
  return col >= range[0] && col <= range[1];
}

export function clearSelection(state: NimState): void {
  state.markedRow = null;
  state.markedRange = null;
}
