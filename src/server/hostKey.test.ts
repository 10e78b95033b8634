import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { loadHostKey } from './hostKey';

describe('loadHostKey', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nimm-hostkey-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns an existing key untouched', () => {
    const path = join(dir, 'host_key');
    writeFileSync(path, 'test-key');
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    expect(loadHostKey(path, log).toString()).toBe('test-key');
    expect(log.info).not.toHaveBeenCalled();
  });

  it('creates an ed25519 key pair when missing', () => {
    const path = join(dir, '.ssh', 'term_info_ed25519');
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const key = loadHostKey(path, log);

    expect(key.toString()).toContain('PRIVATE KEY');
    expect(readFileSync(path).equals(key)).toBe(true);
    expect(readFileSync(`${path}.pub`, 'utf8').startsWith('ssh-ed25519 ')).toBe(true);
    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(log.info).toHaveBeenCalledWith(`Generated new host key at ${path}`);
  });

  it('reuses the key it created', () => {
    const path = join(dir, 'host_key');
    const first = loadHostKey(path);
    expect(loadHostKey(path).equals(first)).toBe(true);
  });
});
