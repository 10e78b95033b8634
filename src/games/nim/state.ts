/**
 * Per-session Nim state
 *
 * One NimState belongs to exactly one session. Nothing in the game
 * modules keeps state of its own, so any number of sessions can run
 * side by side in one process.
 */

import { type Board, BOARD_COLS, BOARD_ROWS, createBoard } from './board';

export type Player = 1 | 2;

/** Inclusive column span, always lo <= hi */
export type MarkedRange = readonly [lo: number, hi: number];

export interface Cursor {
  row: number;
  col: number;
}

export interface NimState {
  board: Board;
  rows: number;
  cols: number;
  cursor: Cursor;
  /** Row the selection lives in; null once a move has been submitted */
  markedRow: number | null;
  markedRange: MarkedRange | null;
  player: Player;
  /** Terminal size */
  width: number;
  height: number;
  /** Terminal type reported by the client, passed through untouched */
  term: string;
  help: {
    showAll: boolean;
    width: number;
  };
  /**
   * Last tick time. Updated every second but never drawn; kept so the
   * session tick has somewhere to land.
   */
  clock: Date;
}

export interface NimStateOptions {
  width: number;
  height: number;
  term?: string;
  now?: Date;
}

export function createNimState(options: NimStateOptions): NimState {
  return {
    board: createBoard(BOARD_ROWS, BOARD_COLS),
    rows: BOARD_ROWS,
    cols: BOARD_COLS,
    cursor: { row: 0, col: 0 },
    markedRow: 0,
    markedRange: null,
    player: 1,
    width: options.width,
    height: options.height,
    term: options.term ?? '',
    help: {
      showAll: false,
      width: 0,
    },
    clock: options.now ?? new Date(),
  };
}
