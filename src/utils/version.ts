import { readFileSync } from 'node:fs';

/**
 * Package version, read from package.json next to the source or build tree.
 */
function readVersion(): string {
  const pkgUrl = new URL('../../package.json', import.meta.url);
  try {
    const pkg = JSON.parse(readFileSync(pkgUrl, 'utf-8')) as { version?: unknown };
    return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return '0.0.0';
    }
    throw error;
  }
}

export const VERSION: string = readVersion();
