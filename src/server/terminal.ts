/**
 * GameTerminal over an SSH session channel
 */

import type { Duplex } from 'stream';
import type { TerminalSize } from '../games/utils';
import { StreamTerminal } from '../terminal/stream';

export function createChannelTerminal(channel: Duplex, size: TerminalSize): StreamTerminal {
  const onData = (chunk: string) => terminal.feed(chunk);

  const terminal = new StreamTerminal(
    data => {
      if (channel.writable) channel.write(data);
    },
    size,
    () => {
      channel.off('data', onData);
    },
  );

  // Decode as a stream so multi-byte characters split across packets survive
  channel.setEncoding('utf8');
  channel.on('data', onData);

  return terminal;
}
