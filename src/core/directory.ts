import * as os from 'os';
import * as path from 'path';

import type { TypmDirectories } from '../types/index.js';
import { DIR_PATTERNS } from '../constants/index.js';

/**
 * Typst data and cache directories, following the XDG base directory layout.
 *
 * Only the CLI entry point calls this with process.env; pipelines receive
 * the resolved TypmDirectories value.
 */
export function getTypmDirectories(
  env: Readonly<Record<string, string | undefined>>,
  homeDir: string = os.homedir()
): TypmDirectories {
  const dataBase = env.XDG_DATA_HOME || path.join(homeDir, '.local', 'share');
  const cacheBase = env.XDG_CACHE_HOME || path.join(homeDir, '.cache');

  return {
    data: path.join(dataBase, DIR_PATTERNS.TYPST),
    cache: path.join(cacheBase, DIR_PATTERNS.TYPST)
  };
}

/**
 * Root holding `<namespace>/<name>/<version>` trees
 */
export function getPackagesRoot(base: string): string {
  return path.join(base, DIR_PATTERNS.PACKAGES);
}
