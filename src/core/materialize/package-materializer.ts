/**
 * Package materialization: copy a package tree from its source root into a
 * destination root.
 *
 * Every file goes through exactly one of, in this order:
 *   1. exclusion  - matched by package.exclude, nothing is written
 *   2. sanitize   - typst.toml, `#:schema` lines removed
 *   3. rewrite    - .typ sources, relative self-imports turned into `@ns/name:version`
 *   4. copy       - everything else, byte for byte
 *
 * Destination directories are created on demand and existing content is left
 * in place; files are overwritten one by one. A failure part-way leaves the
 * files written so far.
 */

import path from 'path';

import { FILE_PATTERNS } from '../../constants/index.js';
import { copyFile, ensureDir, readTextFile, writeTextFile } from '../../utils/fs.js';
import { walkFiles, type WalkEntry } from '../../utils/file-walker.js';
import { compileExcludeRules, type ExcludeMatcher } from '../../utils/exclude-rules.js';
import { createSelfImportRewriter, type ImportRewriter } from '../../utils/import-rewriter.js';
import { stripSchemaDirectives } from '../../utils/package-toml.js';
import { logger } from '../../utils/logger.js';

export interface MaterializeOptions {
  sourceDir: string;
  destDir: string;
  exclude: readonly string[];
  /** `<namespace>/<name>` */
  importBase: string;
  version: string;
  entrypoint: string;
}

export type FileAction = 'excluded' | 'sanitized' | 'rewritten' | 'copied';

export interface MaterializedFile {
  relativePath: string;
  action: FileAction;
}

export interface MaterializeSummary {
  files: MaterializedFile[];
  excluded: number;
  sanitized: number;
  rewritten: number;
  copied: number;
  /** Total self-import replacements across all .typ files */
  importReplacements: number;
}

/**
 * True when `child` is `parent` or lies beneath it.
 */
export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === '') {
    return true;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Which transformation applies to a file. Exclusion wins over everything.
 */
export function classifyFile(relativePath: string, excludes: Pick<ExcludeMatcher, 'isExcluded'>): FileAction {
  if (excludes.isExcluded(relativePath)) {
    return 'excluded';
  }
  const fileName = path.posix.basename(relativePath);
  if (fileName === FILE_PATTERNS.TYPST_TOML) {
    return 'sanitized';
  }
  if (path.posix.extname(fileName) === FILE_PATTERNS.TYP_FILES) {
    return 'rewritten';
  }
  return 'copied';
}

async function processFile(
  entry: WalkEntry,
  action: Exclude<FileAction, 'excluded'>,
  destPath: string,
  rewrite: ImportRewriter
): Promise<number> {
  switch (action) {
    case 'sanitized': {
      const content = await readTextFile(entry.fullPath);
      await writeTextFile(destPath, stripSchemaDirectives(content));
      return 0;
    }
    case 'rewritten': {
      const content = await readTextFile(entry.fullPath);
      const result = rewrite(content);
      await writeTextFile(destPath, result.content);
      if (result.replacements > 0) {
        logger.debug(`Rewrote ${result.replacements} self-import(s) in ${entry.relativePath}`);
      }
      return result.replacements;
    }
    case 'copied':
      await copyFile(entry.fullPath, destPath);
      return 0;
  }
}

export async function materializePackage(options: MaterializeOptions): Promise<MaterializeSummary> {
  const sourceDir = path.resolve(options.sourceDir);
  const destDir = path.resolve(options.destDir);

  await ensureDir(destDir);

  const excludes = await compileExcludeRules(options.exclude, sourceDir);
  const rewrite = createSelfImportRewriter({
    entrypoint: options.entrypoint,
    importBase: options.importBase,
    version: options.version
  });

  // Destination nested in the source: never read back what we write
  const destInsideSource = isWithin(sourceDir, destDir);

  const summary: MaterializeSummary = {
    files: [],
    excluded: 0,
    sanitized: 0,
    rewritten: 0,
    copied: 0,
    importReplacements: 0
  };

  const entries = walkFiles(sourceDir, {
    prune: entry => destInsideSource && isWithin(destDir, entry.fullPath)
  });

  for await (const entry of entries) {
    const action = classifyFile(entry.relativePath, excludes);
    summary.files.push({ relativePath: entry.relativePath, action });
    summary[action]++;

    if (action === 'excluded') {
      logger.debug(`Excluded: ${entry.relativePath}`);
      continue;
    }

    const destPath = path.join(destDir, ...entry.relativePath.split('/'));
    summary.importReplacements += await processFile(entry, action, destPath, rewrite);
  }

  logger.debug('Materialized package', {
    sourceDir,
    destDir,
    excluded: summary.excluded,
    sanitized: summary.sanitized,
    rewritten: summary.rewritten,
    copied: summary.copied
  });

  return summary;
}
