/**
 * Node Terminal Adapter
 *
 * Maps stdin/stdout to the GameTerminal interface so the game can run
 * directly in any terminal emulator.
 */

import type { TerminalSize } from '../games/utils';
import { DEFAULT_SIZE, StreamTerminal } from './stream';

/**
 * Terminal on the current process's stdin/stdout
 */
export function createNodeTerminal(
  stdin: NodeJS.ReadStream = process.stdin,
  stdout: NodeJS.WriteStream = process.stdout,
): StreamTerminal {
  const currentSize = (): TerminalSize => ({
    cols: stdout.columns || DEFAULT_SIZE.cols,
    rows: stdout.rows || DEFAULT_SIZE.rows,
  });

  const onData = (data: string) => terminal.feed(data);
  const onResize = () => terminal.resize(currentSize());

  function cleanup() {
    stdin.off('data', onData);
    stdout.off('resize', onResize);
    if (stdin.isTTY) {
      stdin.setRawMode(false);
    }
    stdin.pause();
    stdout.write('\x1b[0m');
  }

  const terminal = new StreamTerminal(data => stdout.write(data), currentSize(), cleanup);

  if (stdin.isTTY) {
    stdin.setRawMode(true);
  }
  stdin.resume();
  stdin.setEncoding('utf8');
  stdin.on('data', onData);
  stdout.on('resize', onResize);

  return terminal;
}
