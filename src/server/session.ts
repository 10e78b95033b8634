/**
 * One shell request on an SSH connection: one game
 */

import type { Duplex } from 'stream';
import { type NimController, runNimGame } from '../games/nim';
import { errorMessage, type Logger } from '../logger';
import type { Palette } from '../themes';
import type { TerminalSize } from '../games/utils';
import type { StreamTerminal } from '../terminal/stream';
import { createChannelTerminal } from './terminal';

/** What the shell handler needs from an ssh2 ServerChannel */
export interface ShellChannel extends Duplex {
  stderr: { write(data: string): unknown };
  exit(status: number): void;
}

/** Terminal details from the client's pty request */
export interface PtyInfo {
  term: string;
  cols: number;
  rows: number;
}

export interface ShellContext {
  user: string;
  remote: string;
  palette: Palette;
  log: Logger;
}

export interface ShellHandle {
  game: NimController;
  terminal: StreamTerminal;
  /** Stop the game and detach from the channel */
  stop: () => void;
}

export const NO_PTY_MESSAGE = 'no active terminal, skipping';

/**
 * Start a game on a freshly accepted shell channel. Without a pty there
 * is nothing to draw on: the client gets an error and exit status 1.
 */
export function startShell(channel: ShellChannel, pty: PtyInfo | null, ctx: ShellContext): ShellHandle | null {
  if (!pty) {
    channel.stderr.write(`${NO_PTY_MESSAGE}\n`);
    channel.exit(1);
    channel.end();
    return null;
  }

  ctx.log.info(`${ctx.user} connect ${ctx.remote} ${pty.term} ${pty.cols} ${pty.rows}`);

  const terminal = createChannelTerminal(channel, { cols: pty.cols, rows: pty.rows });

  const game = runNimGame(terminal, {
    term: pty.term,
    palette: ctx.palette,
    onExit: () => {
      terminal.close();
      channel.exit(0);
      channel.end();
    },
  });

  const stop = () => {
    game.stop();
    terminal.close();
  };

  channel.once('close', stop);
  channel.on('error', (err: Error) => {
    ctx.log.warn(`${ctx.remote} channel error: ${errorMessage(err)}`);
    stop();
  });

  return { game, terminal, stop };
}

/**
 * Apply a window-change request. Before the shell starts there is no
 * terminal yet, so the pending pty size is updated instead.
 */
export function applyWindowChange(pty: PtyInfo | null, shell: ShellHandle | null, size: TerminalSize): PtyInfo | null {
  if (shell) {
    shell.terminal.resize(size);
    return pty;
  }
  return pty ? { ...pty, cols: size.cols, rows: size.rows } : null;
}
