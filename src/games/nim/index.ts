/**
 * Nimm
 *
 * Two-player Nim on a triangular board. Players take turns removing a
 * contiguous run of sticks from one row; whoever is left facing the last
 * stick has lost.
 *
 * One call to runNimGame is one session: it owns its own board, its own
 * one-second tick and its own terminal listeners, and releases all of
 * them on stop().
 */

import type { Palette } from '../../themes';
import { type GameTerminal, enterAlternateBuffer, exitAlternateBuffer, getCurrentPalette, toScreen } from '../utils';
import { type NimEvent, dispatch } from './input';
import { render } from './render';
import { type NimState, createNimState } from './state';

/**
 * Nim Game Controller
 */
export interface NimController {
  stop: () => void;
  isRunning: boolean;
  readonly state: NimState;
}

export interface NimGameOptions {
  /** Terminal type reported by the client */
  term?: string;
  /** Called after the player quits with q / ESC / ctrl+c */
  onExit?: () => void;
  /** Clock tick period in ms */
  tickInterval?: number;
  palette?: Palette;
}

export const TICK_INTERVAL = 1000;

export function runNimGame(terminal: GameTerminal, options: NimGameOptions = {}): NimController {
  const palette = options.palette ?? getCurrentPalette();

  // -------------------------------------------------------------------------
  // STATE
  // -------------------------------------------------------------------------
  const state = createNimState({
    width: terminal.cols,
    height: terminal.rows,
    term: options.term,
  });
  state.help.width = terminal.cols;
  let running = true;

  // -------------------------------------------------------------------------
  // CONTROLLER
  // -------------------------------------------------------------------------
  const controller: NimController = {
    stop: () => {
      if (!running) return;
      running = false;
      clearInterval(tickTimer);
      keyListener.dispose();
      resizeListener.dispose();
      exitAlternateBuffer(terminal, 'nim');
    },
    get isRunning() { return running; },
    state,
  };

  // -------------------------------------------------------------------------
  // EVENT LOOP
  // -------------------------------------------------------------------------

  function draw() {
    terminal.write(toScreen(render(state, palette)));
  }

  function handle(event: NimEvent) {
    if (!running) return;
    if (dispatch(state, event) === 'quit') {
      controller.stop();
      options.onExit?.();
      return;
    }
    draw();
  }

  enterAlternateBuffer(terminal, 'nim');

  const keyListener = terminal.onKey(({ domEvent }) => {
    handle({ type: 'key', key: domEvent.key, ctrl: domEvent.ctrlKey ?? false, alt: domEvent.altKey ?? false });
  });

  const resizeListener = terminal.onResize(({ cols, rows }) => {
    handle({ type: 'resize', cols, rows });
  });

  const tickTimer = setInterval(() => {
    handle({ type: 'tick', now: new Date() });
  }, options.tickInterval ?? TICK_INTERVAL);

  draw();

  return controller;
}

export { createBoard, availableCount, clearRange, isPresent, BOARD_ROWS, BOARD_COLS, type Board } from './board';
export { createNimState, type NimState, type NimStateOptions, type Player, type Cursor, type MarkedRange } from './state';
export { toggleCell, isMarked, clearSelection } from './selection';
export { moveCursor, submitMove, isLost, remainingAfterSelection, type Direction } from './turns';
export { dispatch, matchBinding, KEY_BINDINGS, type NimEvent, type DispatchResult, type BindingName, type KeyBinding } from './input';
export { render, renderBoard, statusLine, TITLE, RULES } from './render';
export { renderHelp } from './help';
