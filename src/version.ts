/**
 * Package version, read from package.json at runtime
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

export const PACKAGE_NAME = 'nimm';

interface PackageJson {
  name?: unknown;
  version?: unknown;
}

function readPackageJson(path: string): PackageJson | null {
  const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return typeof data === 'object' && data !== null ? data : null;
}

/**
 * Walk up from this file until our package.json turns up. Works both from
 * src/ (tests) and from the bundled dist/.
 */
export function getCurrentVersion(startDir: string = dirname(fileURLToPath(import.meta.url))): string {
  let dir = startDir;
  for (let i = 0; i < 5; i++) {
    const pkgPath = resolve(dir, 'package.json');
    if (existsSync(pkgPath)) {
      const pkg = readPackageJson(pkgPath);
      if (pkg && pkg.name === PACKAGE_NAME && typeof pkg.version === 'string') return pkg.version;
    }
    dir = resolve(dir, '..');
  }
  return '0.0.0';
}
