import * as TOML from 'smol-toml';
import path from 'path';

import type { LoadedManifest, PackageManifest } from '../types/index.js';
import { SCHEMA_DIRECTIVE } from '../constants/index.js';
import { readTextFile } from './fs.js';
import { InvalidManifestError } from './errors.js';
import { validateManifestFields } from './validation/manifest.js';

/**
 * Parse typst.toml content and validate its fields
 */
export function parsePackageToml(content: string, source: string = 'typst.toml'): PackageManifest {
  let document: unknown;
  try {
    document = TOML.parse(content);
  } catch (error) {
    throw new InvalidManifestError(
      `Failed to parse TOML from ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }
  return validateManifestFields(document);
}

/**
 * Read and validate a typst.toml file
 */
export async function loadPackageToml(manifestPath: string): Promise<LoadedManifest> {
  const absolutePath = path.resolve(manifestPath);
  const content = await readTextFile(absolutePath);
  return {
    manifest: parsePackageToml(content, absolutePath),
    manifestPath: absolutePath,
    packageDir: path.dirname(absolutePath)
  };
}

/**
 * Drop every `#:schema` line (leading whitespace ignored) and rejoin the rest
 * with `\n`. Line terminators are normalized and the final one is not kept.
 */
export function stripSchemaDirectives(content: string): string {
  const lines = content.split(/\r\n|\n|\r/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines
    .filter(line => !line.trimStart().startsWith(SCHEMA_DIRECTIVE))
    .join('\n');
}
