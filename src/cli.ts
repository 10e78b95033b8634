/**
 * CLI entry point for nimm
 *
 *   nimm          play in this terminal (two players, one keyboard)
 *   nimm serve    host games over SSH, one per connection
 */

import * as p from '@clack/prompts';
import { ConfigError, type ServeConfig, parseServeConfig, resolveTheme } from './config';
import { runNimGame } from './games/nim';
import { getCurrentPalette, setTheme } from './games/utils';
import { clackLogger, errorMessage } from './logger';
import { loadHostKey } from './server/hostKey';
import { type NimServer, createNimServer } from './server';
import { createNodeTerminal } from './terminal/node';
import { getTheme, getThemeModes } from './themes';
import { getCurrentVersion } from './version';

// ---------------------------------------------------------------------------
// Local game
// ---------------------------------------------------------------------------

function play(args: string[]) {
  setTheme(resolveTheme(args, process.env));

  const terminal = createNodeTerminal();
  const game = runNimGame(terminal, {
    term: process.env.TERM,
    onExit: () => terminal.close(),
  });

  const quit = () => {
    game.stop();
    terminal.close();
  };
  process.once('SIGINT', quit);
  process.once('SIGTERM', quit);
}

// ---------------------------------------------------------------------------
// SSH server
// ---------------------------------------------------------------------------

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

async function startServer(config: ServeConfig): Promise<NimServer> {
  const hostKey = loadHostKey(config.hostKeyPath, clackLogger);
  const server = createNimServer({
    host: config.host,
    port: config.port,
    shutdownTimeout: config.shutdownTimeout,
    hostKey,
    palette: getCurrentPalette(),
    log: clackLogger,
  });
  await server.listen();
  return server;
}

async function serve(args: string[]) {
  const config = parseServeConfig(args, process.env);
  setTheme(config.theme);

  p.intro(`nimm ${getCurrentVersion()}`);

  const server = await startServer(config).catch((err: unknown) => {
    clackLogger.error(`Could not start SSH server: ${errorMessage(err)}`);
    return process.exit(1);
  });

  const signal = await waitForSignal();
  clackLogger.info(`Received ${signal}`);
  await server.shutdown();
  p.outro('Server stopped.');
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  nimm — Nim for the terminal

  Usage:
    nimm                         Play in this terminal (hot-seat)
    nimm serve                   Serve games over SSH
    nimm --list-themes           List color themes
    nimm --version               Show version
    nimm --help                  Show this help

  Options:
    --theme <theme>              Color theme (env NIMM_THEME)
    --host <address>             serve: bind address (env NIMM_HOST, default 0.0.0.0)
    --port <port>                serve: port (env NIMM_PORT, default 2222)
    --host-key <path>            serve: host key file, created if missing
                                 (env NIMM_HOST_KEY, default .ssh/term_info_ed25519)

  Controls:
    Arrow keys / hjkl    Move the cursor
    Space                Select / extend / cancel a run of sticks
    Enter                Take the selected sticks
    ?                    Toggle full help
    Q / ESC              Quit

  Examples:
    nimm --theme amber
    nimm serve --port 2222
    ssh -p 2222 localhost
`);
}

async function main() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    return;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(getCurrentVersion());
    return;
  }

  if (args.includes('--list-themes')) {
    for (const mode of getThemeModes()) {
      console.log(`  ${mode.padEnd(12)} ${getTheme(mode).name}`);
    }
    return;
  }

  const [command, ...rest] = args;
  if (command === 'serve') {
    await serve(rest);
    return;
  }
  if (command !== undefined && !command.startsWith('--')) {
    throw new ConfigError(`Unknown command: ${command}`);
  }

  play(args);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
    console.error('Run `nimm --help` for usage.');
  } else {
    console.error(err);
  }
  process.exit(1);
});
