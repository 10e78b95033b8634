/**
 * Raw terminal input decoding
 *
 * Turns the bytes a terminal sends in raw mode into DOM-style key names
 * (`ArrowUp`, `Enter`, `Escape`, `a`, ...), the same names xterm.js puts
 * on `domEvent.key`.
 */

import type { GameKeyEvent } from '../games/utils';

const ESC = '\x1b';

const SEQUENCES: Record<string, string> = {
  '\x1b[A': 'ArrowUp',
  '\x1bOA': 'ArrowUp',
  '\x1b[B': 'ArrowDown',
  '\x1bOB': 'ArrowDown',
  '\x1b[C': 'ArrowRight',
  '\x1bOC': 'ArrowRight',
  '\x1b[D': 'ArrowLeft',
  '\x1bOD': 'ArrowLeft',
  '\r': 'Enter',
  '\n': 'Enter',
  '\x1b': 'Escape',
  ' ': ' ',
  '\x7f': 'Backspace',
  '\b': 'Backspace',
  '\t': 'Tab',
};

/**
 * Index just past the key sequence that starts at `i`. An ESC followed by
 * another key in the same chunk is an alt chord and covers both.
 */
function sequenceEnd(chars: string[], i: number): number {
  const ch = chars[i];

  if (ch === ESC && (chars[i + 1] === '[' || chars[i + 1] === 'O') && i + 2 < chars.length) {
    // CSI / SS3: parameters, then a final byte in @..~
    let end = i + 2;
    if (chars[i + 1] === '[') {
      while (end < chars.length && !/[@-~]/.test(chars[end])) end++;
    }
    return Math.min(end, chars.length - 1) + 1;
  }

  if (ch === ESC && i + 1 < chars.length) {
    return sequenceEnd(chars, i + 1);
  }

  if (ch === '\r' && chars[i + 1] === '\n') {
    return i + 2;
  }

  return i + 1;
}

/**
 * Split one chunk of input into individual key sequences. A chunk can
 * hold several keys when the client types fast or pastes.
 */
export function splitKeys(data: string): string[] {
  const keys: string[] = [];
  const chars = [...data];
  let i = 0;

  while (i < chars.length) {
    const end = sequenceEnd(chars, i);
    const key = chars.slice(i, end).join('');
    keys.push(key.endsWith('\r\n') ? key.slice(0, -1) : key);
    i = end;
  }

  return keys;
}

/**
 * Parse a single key sequence
 */
export function parseKey(sequence: string): GameKeyEvent {
  const named = SEQUENCES[sequence];
  if (named !== undefined) {
    return { key: named, domEvent: { key: named, ctrlKey: false } };
  }

  const chars = [...sequence];
  if (chars[0] === ESC && (chars.length === 2 || chars[1] === ESC)) {
    // alt / meta chord
    const inner = parseKey(chars.slice(1).join(''));
    return { key: inner.key, domEvent: { ...inner.domEvent, altKey: true } };
  }

  const code = sequence.length === 1 ? sequence.charCodeAt(0) : -1;
  if (code >= 1 && code <= 26) {
    // ctrl+a .. ctrl+z
    const letter = String.fromCharCode(code + 96);
    return { key: letter, domEvent: { key: letter, ctrlKey: true } };
  }

  return { key: sequence, domEvent: { key: sequence, ctrlKey: false } };
}

/**
 * Decode a chunk of raw input into key events, in order
 */
export function decodeKeys(data: string): GameKeyEvent[] {
  return splitKeys(data).map(parseKey);
}
