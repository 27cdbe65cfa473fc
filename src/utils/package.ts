import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { FILE_PATTERNS } from '../constants/index.js';

/**
 * Version of the installed typm package, read from its package.json
 * (two levels up from both src/utils and dist/utils).
 */
export function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', FILE_PATTERNS.PACKAGE_JSON);
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch {
    // Fall through to the placeholder below
  }
  return '0.0.0';
}
