/**
 * SSH host key
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import ssh2 from 'ssh2';
import type { Logger } from '../logger';

/**
 * Read the host key at `path`, creating a new ed25519 key pair there
 * (and `<path>.pub`) when it does not exist yet.
 */
export function loadHostKey(path: string, log?: Logger): Buffer {
  if (existsSync(path)) {
    return readFileSync(path);
  }

  const keys = ssh2.utils.generateKeyPairSync('ed25519');
  mkdirSync(dirname(path), { recursive: true, mode: 0o700 });
  writeFileSync(path, keys.private, { mode: 0o600 });
  writeFileSync(`${path}.pub`, `${keys.public}\n`);
  log?.info(`Generated new host key at ${path}`);

  return Buffer.from(keys.private);
}
