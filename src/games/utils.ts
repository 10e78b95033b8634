/**
 * Shared utilities for games
 *
 * This module provides the terminal contract the game runs against and
 * theme selection. The theme must be configured by the consuming
 * application via setTheme().
 */

import type { IDisposable, Terminal } from '@xterm/xterm';
import { DEFAULT_THEME, type Palette, type PhosphorMode, getPalette } from '../themes';

// ============================================================================
// Terminal Contract
// ============================================================================

export interface GameKeyEvent {
  key: string;
  domEvent: {
    key: string;
    ctrlKey?: boolean;
    altKey?: boolean;
  };
}

export interface TerminalSize {
  cols: number;
  rows: number;
}

/**
 * The slice of an xterm.js Terminal a game needs. The SSH and local
 * adapters implement it directly; an xterm.js Terminal already is one.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
  onKey(listener: (event: GameKeyEvent) => void): IDisposable;
  onResize(listener: (size: TerminalSize) => void): IDisposable;
}

type AssertAssignable<T extends GameTerminal> = T;
/** Fails to compile if xterm.js stops satisfying GameTerminal */
export type XtermGameTerminal = AssertAssignable<Terminal>;

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: PhosphorMode = DEFAULT_THEME;

/**
 * Set the current theme mode
 */
export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

/**
 * Get the current theme mode
 */
export function getTheme(): PhosphorMode {
  return currentTheme;
}

/**
 * Palette of the current theme
 */
export function getCurrentPalette(): Palette {
  return getPalette(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 *
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

/**
 * Check if terminal is currently in alternate buffer
 */
export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Frame Output
// ============================================================================

/**
 * Turn a rendered frame into a full-screen redraw: home the cursor, clear
 * each line's tail, clear whatever is left below.
 */
export function toScreen(frame: string): string {
  const lines = frame.split('\n').map(line => line + '\x1b[K');
  return '\x1b[H' + lines.join('\r\n') + '\x1b[J';
}
