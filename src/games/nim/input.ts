/**
 * Input dispatcher
 *
 * Maps session events (keys, resizes, clock ticks) onto the selection
 * engine and turn controller. Every handler runs to completion before
 * the next event is looked at.
 */

import { toggleCell } from './selection';
import type { NimState } from './state';
import { type Direction, moveCursor, submitMove } from './turns';

export interface KeyBinding {
  /** DOM-style key names, plus `ctrl+<key>` for control chords */
  keys: string[];
  help: {
    key: string;
    desc: string;
  };
}

export type BindingName =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'help'
  | 'quit'
  | 'submit'
  | 'select';

export const KEY_BINDINGS: Record<BindingName, KeyBinding> = {
  up: { keys: ['ArrowUp', 'k'], help: { key: '↑/k', desc: 'move up' } },
  down: { keys: ['ArrowDown', 'j'], help: { key: '↓/j', desc: 'move down' } },
  left: { keys: ['ArrowLeft', 'h'], help: { key: '←/h', desc: 'move left' } },
  right: { keys: ['ArrowRight', 'l'], help: { key: '→/l', desc: 'move right' } },
  help: { keys: ['?'], help: { key: '?', desc: 'toggle help' } },
  quit: { keys: ['q', 'Escape', 'ctrl+c'], help: { key: 'q', desc: 'quit' } },
  submit: { keys: ['Enter'], help: { key: 'ENTER', desc: 'submit' } },
  select: { keys: [' '], help: { key: 'SPACE', desc: 'select' } },
};

export type NimEvent =
  | { type: 'key'; key: string; ctrl?: boolean; alt?: boolean }
  | { type: 'resize'; cols: number; rows: number }
  | { type: 'tick'; now: Date };

export type DispatchResult = 'continue' | 'quit';

const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

/**
 * Find the binding a key press belongs to
 */
export function matchBinding(key: string, ctrl = false): BindingName | null {
  const name = ctrl ? `ctrl+${key.toLowerCase()}` : key;
  for (const [binding, { keys }] of Object.entries(KEY_BINDINGS)) {
    if (keys.includes(name)) return isBindingName(binding) ? binding : null;
  }
  return null;
}

function isBindingName(value: string): value is BindingName {
  return value in KEY_BINDINGS;
}

function isDirection(value: BindingName): value is Direction {
  return DIRECTIONS.some(direction => direction === value);
}

export function dispatch(state: NimState, event: NimEvent): DispatchResult {
  switch (event.type) {
    case 'tick':
      state.clock = event.now;
      return 'continue';
    case 'resize':
      state.width = event.cols;
      state.height = event.rows;
      state.help.width = event.cols;
      return 'continue';
    case 'key':
      // No bindings use alt / meta
      if (event.alt) return 'continue';
      return handleKey(state, event.key, event.ctrl ?? false);
  }
}

function handleKey(state: NimState, key: string, ctrl: boolean): DispatchResult {
  const binding = matchBinding(key, ctrl);
  if (binding === null) return 'continue';

  if (isDirection(binding)) {
    moveCursor(state, binding);
    return 'continue';
  }

  switch (binding) {
    case 'quit':
      return 'quit';
    case 'submit':
      submitMove(state);
      break;
    case 'select':
      toggleCell(state);
      break;
    case 'help':
      state.help.showAll = !state.help.showAll;
      break;
  }
  return 'continue';
}
