/**
 * nimm
 *
 * Two-player Nim for terminals: play it over SSH, in a local terminal,
 * or in any xterm.js Terminal.
 *
 * Library usage (xterm.js):
 *   import { runNimGame, setTheme } from 'nimm';
 *   setTheme('amber');
 *   const controller = runNimGame(terminal, { onExit: () => terminal.dispose() });
 *
 * CLI usage:
 *   nimm            play locally
 *   nimm serve      serve over SSH
 */

export {
  // Game
  runNimGame,
  TICK_INTERVAL,
  type NimController,
  type NimGameOptions,

  // Rules and state
  createBoard,
  availableCount,
  clearRange,
  isPresent,
  BOARD_ROWS,
  BOARD_COLS,
  createNimState,
  toggleCell,
  isMarked,
  clearSelection,
  moveCursor,
  submitMove,
  isLost,
  remainingAfterSelection,
  dispatch,
  matchBinding,
  KEY_BINDINGS,
  type Board,
  type NimState,
  type NimStateOptions,
  type Player,
  type Cursor,
  type MarkedRange,
  type Direction,
  type NimEvent,
  type DispatchResult,
  type BindingName,
  type KeyBinding,

  // Rendering
  render,
  renderBoard,
  renderHelp,
  statusLine,
  TITLE,
  RULES,
} from './games/nim';

export {
  // Terminal contract and theme utilities
  setTheme,
  getTheme,
  getCurrentPalette,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  toScreen,
  type GameTerminal,
  type GameKeyEvent,
  type TerminalSize,
} from './games/utils';

export {
  themes,
  getPalette,
  getThemeModes,
  isValidThemeMode,
  DEFAULT_THEME,
  type PhosphorMode,
  type Palette,
  type ThemeColors,
} from './themes';

export { decodeKeys, parseKey, splitKeys } from './terminal/keys';
export { StreamTerminal } from './terminal/stream';
export { createNimServer, type NimServer, type NimServerOptions } from './server';
export { type Logger, clackLogger } from './logger';
