/**
 * File Walker Utility
 *
 * Lazy traversal of a directory tree. Used by the materializer and manifest
 * discovery.
 */

import { promises as fs, type Dirent } from 'fs';
import { join } from 'path';

import { FileSystemError } from './errors.js';
import { compareCodeUnits } from './fs.js';
import { logger } from './logger.js';

/**
 * One visited entry. `relativePath` always uses `/` separators.
 */
export interface WalkEntry {
  fullPath: string;
  relativePath: string;
  isDirectory: boolean;
}

/**
 * Predicate deciding whether an entry is pruned. A pruned directory is
 * neither yielded nor descended into.
 */
export type PruneFilter = (entry: WalkEntry) => boolean;

/**
 * Options for file walking
 */
export interface WalkOptions {
  /**
   * Entries for which this returns true are skipped entirely
   */
  prune?: PruneFilter;
}

/**
 * Async generator that walks a directory tree depth-first, yielding files only.
 * Entries within a directory are visited in name order. Symbolic links to files
 * are yielded; links to directories are never followed.
 *
 * Each call starts a fresh walk.
 *
 * @example
 * for await (const entry of walkFiles('/path/to/dir')) {
 *   console.log(entry.relativePath);
 * }
 */
export async function* walkFiles(
  dir: string,
  options: WalkOptions = {}
): AsyncGenerator<WalkEntry> {
  yield* walkInternal(dir, '', options);
}

async function* walkInternal(
  dir: string,
  relativeDir: string,
  options: WalkOptions
): AsyncGenerator<WalkEntry> {
  const entries = await readEntries(dir);
  entries.sort((a, b) => compareCodeUnits(a.name, b.name));

  for (const dirent of entries) {
    const fullPath = join(dir, dirent.name);
    const kind = await entryKind(dirent, fullPath);
    if (!kind) {
      continue;
    }

    const entry: WalkEntry = {
      fullPath,
      relativePath: relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name,
      isDirectory: kind === 'directory'
    };

    if (options.prune?.(entry)) {
      continue;
    }

    if (entry.isDirectory) {
      yield* walkInternal(entry.fullPath, entry.relativePath, options);
    } else {
      yield entry;
    }
  }
}

async function entryKind(dirent: Dirent, fullPath: string): Promise<'file' | 'directory' | undefined> {
  if (dirent.isDirectory()) {
    return 'directory';
  }
  if (dirent.isFile()) {
    return 'file';
  }
  if (!dirent.isSymbolicLink()) {
    return undefined;
  }

  try {
    const target = await fs.stat(fullPath);
    return target.isFile() ? 'file' : undefined;
  } catch (error) {
    logger.debug('Skipping unresolvable symbolic link', { path: fullPath, error });
    return undefined;
  }
}

async function readEntries(dir: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Error walking directory: ${dir}`, { dir, error });
  }
}
