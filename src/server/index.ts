/**
 * SSH game server
 *
 * Every connection gets its own game for every shell it opens. Sessions
 * share nothing; the registry only exists so shutdown can wait for them.
 */

import ssh2 from 'ssh2';
import type { ClientInfo, Connection, Session } from 'ssh2';
import type { ServeConfig } from '../config';
import { errorMessage, formatDuration, type Logger } from '../logger';
import type { Palette } from '../themes';
import { SessionRegistry } from './sessions';
import { type PtyInfo, type ShellHandle, applyWindowChange, startShell } from './session';

export interface NimServerOptions extends Pick<ServeConfig, 'host' | 'port' | 'shutdownTimeout'> {
  hostKey: Buffer | string;
  palette: Palette;
  log: Logger;
}

export interface NimServer {
  /** Resolves once the listener is bound, rejects if binding fails */
  listen(): Promise<void>;
  /**
   * Stop accepting connections, give open sessions `shutdownTimeout` ms
   * to finish, then end the rest.
   */
  shutdown(): Promise<void>;
  readonly sessionCount: number;
  /** Games currently running across all connections */
  readonly activeGames: number;
  /** Bound port, once listening */
  readonly port: number;
}

export function createNimServer(options: NimServerOptions): NimServer {
  const { log } = options;
  const sessions = new SessionRegistry();
  const liveShells = new Set<ShellHandle>();

  function handleSession(session: Session, user: string, remote: string, shells: Set<ShellHandle>) {
    let pty: PtyInfo | null = null;
    let shell: ShellHandle | null = null;

    session.on('pty', (accept, _reject, info) => {
      pty = { term: info.term, cols: info.cols, rows: info.rows };
      accept?.();
    });

    session.on('window-change', (accept, _reject, info) => {
      pty = applyWindowChange(pty, shell, { cols: info.cols, rows: info.rows });
      accept?.();
    });

    session.on('shell', accept => {
      const channel = accept();
      shell = startShell(channel, pty, { user, remote, palette: options.palette, log });
      if (!shell) return;

      const handle = shell;
      shells.add(handle);
      liveShells.add(handle);
      channel.once('close', () => {
        shells.delete(handle);
        liveShells.delete(handle);
      });
    });
  }

  function handleConnection(client: Connection, info: ClientInfo) {
    const remote = `${info.ip}:${info.port}`;
    const shells = new Set<ShellHandle>();
    let user = '';

    const stopShells = () => {
      for (const shell of shells) {
        shell.stop();
        liveShells.delete(shell);
      }
      shells.clear();
    };

    const entry = sessions.open(remote, () => {
      stopShells();
      client.end();
    });

    client.on('authentication', ctx => {
      user = ctx.username;
      ctx.accept();
    });

    client.on('ready', () => {
      client.on('session', accept => {
        handleSession(accept(), user, remote, shells);
      });
    });

    client.on('error', err => {
      log.warn(`${remote} connection error: ${errorMessage(err)}`);
    });

    client.on('close', () => {
      stopShells();
      if (sessions.close(entry.id)) {
        log.info(`${remote} disconnect ${formatDuration(Date.now() - entry.startedAt)}`);
      }
    });
  }

  const server = new ssh2.Server({ hostKeys: [options.hostKey] }, handleConnection);

  return {
    listen: () =>
      new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => reject(err);
        server.once('error', onError);
        server.listen(options.port, options.host, () => {
          server.off('error', onError);
          server.on('error', (err: Error) => log.error(`Server error: ${errorMessage(err)}`));
          log.info(`Starting SSH server on ${options.host}:${options.port}`);
          resolve();
        });
      }),

    shutdown: async () => {
      log.info('Stopping SSH server');
      const closed = new Promise<void>(resolve => {
        server.close(() => resolve());
      });

      const forced = await sessions.drain(options.shutdownTimeout);
      if (forced > 0) {
        log.warn(`Terminated ${forced} session(s) still open after ${formatDuration(options.shutdownTimeout)}`);
      }
      await closed;
    },

    get sessionCount() {
      return sessions.size;
    },

    get activeGames() {
      return [...liveShells].filter(shell => shell.game.isRunning).length;
    },

    get port() {
      const address = server.address();
      return typeof address === 'object' && address !== null ? address.port : options.port;
    },
  };
}
