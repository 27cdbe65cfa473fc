/**
 * Exclusion rules from `package.exclude`.
 *
 * A pattern excludes a path when either
 *   - it matches the whole relative path as an fnmatch-style glob, or
 *   - it is a literal directory (trailing `/`, or no glob metacharacters and an
 *     existing directory under the source root) and the path is that directory
 *     or lies beneath it.
 */

import { join } from 'path';
import { minimatch } from 'minimatch';

import { isDirectory } from './fs.js';
import { logger } from './logger.js';

export interface ExcludeMatcher {
  /** Patterns as declared in the manifest */
  readonly patterns: readonly string[];
  /** Literal directory prefixes derived from the patterns */
  readonly directoryPrefixes: readonly string[];
  /** True when the POSIX relative path is excluded */
  isExcluded(relativePath: string): boolean;
}

/**
 * `]` only counts as a metacharacter together with `[`.
 */
export function hasGlobMetacharacters(pattern: string): boolean {
  return /[*?[]/.test(pattern);
}

/**
 * Normalize a path or pattern to `/` separators without leading `./`.
 */
export function toPosixRelative(path: string): string {
  let result = path.replace(/\\/g, '/');
  while (result.startsWith('./')) {
    result = result.slice(2);
  }
  return result;
}

/**
 * Stand-in for `/` while matching. It never occurs in file names, and minimatch
 * treats it as an ordinary character.
 */
const SEPARATOR_PLACEHOLDER = '\u0001';

/**
 * fnmatch semantics on top of minimatch: the path is matched as a single
 * segment, so `*` and `?` also match `/`; `!`, `#`, braces and extglobs are
 * literal text.
 */
const GLOB_OPTIONS = {
  dot: true,
  nonegate: true,
  nocomment: true,
  nobrace: true,
  noext: true,
  noglobstar: true
} as const;

function hideSeparators(value: string): string {
  return value.split('/').join(SEPARATOR_PLACEHOLDER);
}

/**
 * True when the glob matches the whole POSIX relative path.
 */
export function matchesGlob(relativePath: string, pattern: string): boolean {
  return minimatch(hideSeparators(relativePath), hideSeparators(pattern), GLOB_OPTIONS);
}

function stripTrailingSeparators(pattern: string): string {
  return pattern.replace(/\/+$/, '');
}

/**
 * Build the matcher for a source root. Literal directory patterns are resolved
 * against the filesystem once, up front.
 */
export async function compileExcludeRules(
  patterns: readonly string[],
  sourceRoot: string
): Promise<ExcludeMatcher> {
  const normalized = patterns.map(toPosixRelative).filter(p => p.length > 0);
  const directoryPrefixes: string[] = [];

  for (const pattern of normalized) {
    if (hasGlobMetacharacters(pattern)) {
      continue;
    }
    const prefix = stripTrailingSeparators(pattern);
    if (!prefix) {
      continue;
    }
    if (pattern.endsWith('/') || (await isDirectory(join(sourceRoot, prefix)))) {
      directoryPrefixes.push(prefix);
    }
  }

  logger.debug('Compiled exclude rules', { patterns: normalized, directoryPrefixes });

  return createExcludeMatcher(normalized, directoryPrefixes);
}

/**
 * Matcher over already-resolved directory prefixes; no filesystem access.
 */
export function createExcludeMatcher(
  patterns: readonly string[],
  directoryPrefixes: readonly string[]
): ExcludeMatcher {
  return {
    patterns,
    directoryPrefixes,
    isExcluded(relativePath: string): boolean {
      const path = toPosixRelative(relativePath);

      if (patterns.some(pattern => matchesGlob(path, pattern))) {
        return true;
      }

      return directoryPrefixes.some(prefix => path === prefix || path.startsWith(`${prefix}/`));
    }
  };
}
