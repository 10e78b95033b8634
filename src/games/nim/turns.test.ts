import { describe, it, expect } from 'vitest';
import { availableCount, clearRange } from './board';
import { toggleCell } from './selection';
import { createNimState, type NimState } from './state';
import { moveCursor, submitMove, isLost, remainingAfterSelection, nextPlayer } from './turns';

function freshState(): NimState {
  return createNimState({ width: 80, height: 24 });
}

function select(state: NimState, row: number, lo: number, hi: number = lo) {
  state.cursor = { row, col: lo };
  toggleCell(state);
  if (hi !== lo) {
    state.cursor = { row, col: hi };
    toggleCell(state);
  }
}

/** Play moves until only the top stick is left; player 2 is to move */
function playDownToOneStick(state: NimState) {
  select(state, 3, 0, 6);
  expect(submitMove(state)).toBe(true);
  select(state, 2, 1, 5);
  expect(submitMove(state)).toBe(true);
  select(state, 1, 2, 4);
  expect(submitMove(state)).toBe(true);
}

describe('moveCursor', () => {
  it('moves one cell per step', () => {
    const state = freshState();
    moveCursor(state, 'down');
    moveCursor(state, 'right');
    expect(state.cursor).toEqual({ row: 1, col: 1 });
    moveCursor(state, 'up');
    moveCursor(state, 'left');
    expect(state.cursor).toEqual({ row: 0, col: 0 });
  });

  it('clamps at the board edges', () => {
    const state = freshState();
    moveCursor(state, 'up');
    moveCursor(state, 'left');
    expect(state.cursor).toEqual({ row: 0, col: 0 });

    for (let i = 0; i < 10; i++) {
      moveCursor(state, 'down');
      moveCursor(state, 'right');
    }
    expect(state.cursor).toEqual({ row: 3, col: 6 });
  });

  it('moves onto absent cells', () => {
    const state = freshState();
    moveCursor(state, 'right');
    expect(state.cursor).toEqual({ row: 0, col: 1 });
  });

  it('leaves the selection alone', () => {
    const state = freshState();
    select(state, 3, 0, 2);
    moveCursor(state, 'up');
    expect(state.markedRow).toBe(3);
    expect(state.markedRange).toEqual([0, 2]);
  });
});

describe('submitMove', () => {
  it('rejects an empty selection', () => {
    const state = freshState();
    expect(submitMove(state)).toBe(false);
    expect(state.player).toBe(1);
    expect(availableCount(state.board)).toBe(16);
  });

  it('removes the selected run and passes the turn', () => {
    const state = freshState();
    select(state, 3, 0, 2);
    expect(state.markedRange).toEqual([0, 2]);

    expect(submitMove(state)).toBe(true);
    expect(state.board[3]).toEqual([false, false, false, true, true, true, true]);
    expect(availableCount(state.board)).toBe(13);
    expect(state.cursor).toEqual({ row: 0, col: 0 });
    expect(state.markedRow).toBeNull();
    expect(state.markedRange).toBeNull();
    expect(state.player).toBe(2);
  });

  it('alternates players on every accepted move', () => {
    const state = freshState();
    const players: number[] = [];
    for (const [row, lo, hi] of [[3, 0, 0], [3, 6, 6], [2, 1, 1], [1, 2, 2]]) {
      select(state, row, lo, hi);
      expect(submitMove(state)).toBe(true);
      players.push(state.player);
    }
    expect(players).toEqual([2, 1, 2, 1]);
  });

  it('refuses a move that would empty the board', () => {
    const state = freshState();
    clearRange(state.board, 0, 0, 6);
    clearRange(state.board, 1, 0, 6);
    clearRange(state.board, 2, 0, 6);
    select(state, 3, 0, 6);

    expect(remainingAfterSelection(state)).toBe(0);
    expect(submitMove(state)).toBe(false);
    expect(availableCount(state.board)).toBe(7);
    expect(state.player).toBe(1);
    expect(state.markedRange).toEqual([0, 6]);
  });

  it('takes only present cells when the range straddles gaps', () => {
    const state = freshState();
    clearRange(state.board, 3, 2, 4);
    select(state, 3, 1, 5);
    expect(submitMove(state)).toBe(true);
    expect(state.board[3]).toEqual([true, false, false, false, false, false, true]);
  });
});

describe('remainingAfterSelection', () => {
  it('counts sticks outside the selection', () => {
    const state = freshState();
    expect(remainingAfterSelection(state)).toBe(16);
    select(state, 3, 0, 2);
    expect(remainingAfterSelection(state)).toBe(13);
  });
});

describe('isLost', () => {
  it('is false while more than one stick is left', () => {
    expect(isLost(freshState())).toBe(false);
  });

  it('is true once a single stick is left', () => {
    const state = freshState();
    playDownToOneStick(state);
    expect(availableCount(state.board)).toBe(1);
    expect(state.player).toBe(2);
    expect(isLost(state)).toBe(true);
  });

  it('freezes the board on the last stick', () => {
    const state = freshState();
    playDownToOneStick(state);

    select(state, 0, 3);
    expect(state.markedRange).toEqual([3, 3]);
    expect(submitMove(state)).toBe(false);
    expect(submitMove(state)).toBe(false);
    expect(availableCount(state.board)).toBe(1);
    expect(state.player).toBe(2);
  });
});

describe('nextPlayer', () => {
  it('flips between 1 and 2', () => {
    expect(nextPlayer(1)).toBe(2);
    expect(nextPlayer(2)).toBe(1);
  });
});
