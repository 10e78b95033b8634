/**
 * Nim board model
 *
 * Four heaps of 1, 3, 5 and 7 sticks, drawn as a triangle inside a
 * 4x7 grid. Cells only ever go from present to absent.
 */

export const BOARD_ROWS = 4;
export const BOARD_COLS = 7;

/** `board[row][col]` is true while the stick is still on the board */
export type Board = boolean[][];

/**
 * Build a fresh board with the triangle centered on the middle column
 */
export function createBoard(rows: number = BOARD_ROWS, cols: number = BOARD_COLS): Board {
  const middle = Math.floor(cols / 2);
  const board: Board = [];
  for (let row = 0; row < rows; row++) {
    const cells: boolean[] = [];
    for (let col = 0; col < cols; col++) {
      cells.push(Math.abs(col - middle) <= row);
    }
    board.push(cells);
  }
  return board;
}

export function isPresent(board: Board, row: number, col: number): boolean {
  return board[row]?.[col] === true;
}

/**
 * Number of sticks left across all rows
 */
export function availableCount(board: Board): number {
  let sum = 0;
  for (const cells of board) {
    for (const present of cells) {
      if (present) sum++;
    }
  }
  return sum;
}

/**
 * Remove every stick in columns lo..hi (inclusive) of one row.
 * Already-removed cells are skipped, columns outside the row are ignored.
 */
export function clearRange(board: Board, row: number, lo: number, hi: number): void {
  const cells = board[row];
  if (!cells) return;
  const from = Math.max(0, lo);
  const to = Math.min(cells.length - 1, hi);
  for (let col = from; col <= to; col++) {
    cells[col] = false;
  }
}
