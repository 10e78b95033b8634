/**
 * Byte-stream terminal
 *
 * GameTerminal over a plain write callback and raw input bytes. The
 * local (stdin/stdout) and SSH adapters are both built on it.
 */

import type { IDisposable } from '@xterm/xterm';
import type { GameKeyEvent, GameTerminal, TerminalSize } from '../games/utils';
import { decodeKeys } from './keys';

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
export const SYNC_START = '\x1b[?2026h';
export const SYNC_END = '\x1b[?2026l';

export const DEFAULT_SIZE: TerminalSize = { cols: 80, rows: 24 };

/**
 * Listener list that hands out xterm-style disposables
 */
export class ListenerSet<T> {
  private listeners: ((value: T) => void)[] = [];

  add(listener: (value: T) => void): IDisposable {
    this.listeners.push(listener);
    return {
      dispose: () => {
        const idx = this.listeners.indexOf(listener);
        if (idx !== -1) this.listeners.splice(idx, 1);
      },
    };
  }

  emit(value: T): void {
    for (const listener of [...this.listeners]) {
      listener(value);
    }
  }

  get size(): number {
    return this.listeners.length;
  }
}

/**
 * Terminal whose input arrives through feed() and whose output goes to a
 * write callback. Both the local and the SSH adapters build on this.
 */
export class StreamTerminal implements GameTerminal {
  private readonly keyListeners = new ListenerSet<GameKeyEvent>();
  private readonly resizeListeners = new ListenerSet<TerminalSize>();
  private size: TerminalSize;
  private closed = false;

  constructor(
    private readonly output: (data: string) => void,
    size: TerminalSize = DEFAULT_SIZE,
    private readonly onClose?: () => void,
  ) {
    this.size = { ...size };
  }

  get cols(): number { return this.size.cols; }
  get rows(): number { return this.size.rows; }

  write(data: string): void {
    if (this.closed) return;
    this.output(SYNC_START + data + SYNC_END);
  }

  onKey(listener: (event: GameKeyEvent) => void): IDisposable {
    return this.keyListeners.add(listener);
  }

  onResize(listener: (size: TerminalSize) => void): IDisposable {
    return this.resizeListeners.add(listener);
  }

  /** Push raw input bytes */
  feed(data: string): void {
    if (this.closed) return;
    for (const event of decodeKeys(data)) {
      this.keyListeners.emit(event);
    }
  }

  resize(size: TerminalSize): void {
    if (this.closed) return;
    if (size.cols === this.size.cols && size.rows === this.size.rows) return;
    this.size = { ...size };
    this.resizeListeners.emit({ ...size });
  }

  /** Drop all further input and output */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose?.();
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
