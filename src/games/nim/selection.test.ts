import { describe, it, expect } from 'vitest';
import { availableCount, clearRange } from './board';
import { toggleCell, isMarked, clearSelection } from './selection';
import { createNimState, type NimState } from './state';

function freshState(): NimState {
  return createNimState({ width: 80, height: 24 });
}

function clickAt(state: NimState, row: number, col: number) {
  state.cursor = { row, col };
  toggleCell(state);
}

describe('toggleCell', () => {
  it('ignores absent cells', () => {
    const state = freshState();
    clickAt(state, 0, 0);
    expect(state.markedRange).toBeNull();
    expect(state.markedRow).toBe(0);
  });

  it('starts a one-cell range on the first click', () => {
    const state = freshState();
    clickAt(state, 3, 0);
    expect(state.markedRow).toBe(3);
    expect(state.markedRange).toEqual([0, 0]);
  });

  it('cancels when the same cell is clicked twice', () => {
    const state = freshState();
    clickAt(state, 3, 0);
    clickAt(state, 3, 0);
    expect(state.markedRange).toBeNull();
    expect(availableCount(state.board)).toBe(16);
  });

  it('extends the range to the right', () => {
    const state = freshState();
    clickAt(state, 3, 0);
    clickAt(state, 3, 2);
    expect(state.markedRange).toEqual([0, 2]);
    clickAt(state, 3, 5);
    expect(state.markedRange).toEqual([0, 5]);
  });

  it('extends the range to the left', () => {
    const state = freshState();
    clickAt(state, 3, 4);
    clickAt(state, 3, 1);
    expect(state.markedRange).toEqual([1, 4]);
  });

  it('cancels the whole range on an interior click', () => {
    const state = freshState();
    clickAt(state, 2, 1);
    clickAt(state, 2, 4);
    expect(state.markedRange).toEqual([1, 4]);
    clickAt(state, 2, 2);
    expect(state.markedRange).toBeNull();
  });

  it('cancels on a click at either end of the range', () => {
    const state = freshState();
    clickAt(state, 3, 1);
    clickAt(state, 3, 3);
    clickAt(state, 3, 3);
    expect(state.markedRange).toBeNull();
  });

  it('starts over after a cancel', () => {
    const state = freshState();
    clickAt(state, 3, 1);
    clickAt(state, 3, 1);
    clickAt(state, 3, 5);
    expect(state.markedRange).toEqual([5, 5]);
  });

  it('drops the selection when another row is clicked', () => {
    const state = freshState();
    clickAt(state, 3, 0);
    clickAt(state, 3, 2);
    clickAt(state, 2, 3);
    expect(state.markedRow).toBe(2);
    expect(state.markedRange).toEqual([3, 3]);
  });

  it('lets a range straddle cleared cells', () => {
    const state = freshState();
    clearRange(state.board, 3, 2, 4);
    clickAt(state, 3, 1);
    clickAt(state, 3, 5);
    expect(state.markedRange).toEqual([1, 5]);
  });

  it('keeps lo <= hi inside the row for any click order', () => {
    const state = freshState();
    for (const col of [6, 0, 3, 5, 1]) {
      clickAt(state, 3, col);
      const range = state.markedRange;
      if (range) {
        expect(range[0]).toBeLessThanOrEqual(range[1]);
        expect(range[0]).toBeGreaterThanOrEqual(0);
        expect(range[1]).toBeLessThan(state.cols);
      }
    }
  });
});

describe('isMarked', () => {
  it('is true only inside the range of the marked row', () => {
    const state = freshState();
    clickAt(state, 3, 1);
    clickAt(state, 3, 3);
    expect(isMarked(state, 3, 0)).toBe(false);
    expect(isMarked(state, 3, 1)).toBe(true);
    expect(isMarked(state, 3, 2)).toBe(true);
    expect(isMarked(state, 3, 3)).toBe(true);
    expect(isMarked(state, 3, 4)).toBe(false);
    expect(isMarked(state, 2, 2)).toBe(false);
  });

  it('is false with no selection', () => {
    const state = freshState();
    expect(isMarked(state, 0, 3)).toBe(false);
  });
});

describe('clearSelection', () => {
  it('resets row and range', () => {
    const state = freshState();
    clickAt(state, 3, 1);
    clearSelection(state);
    expect(state.markedRow).toBeNull();
    expect(state.markedRange).toBeNull();
  });
});
