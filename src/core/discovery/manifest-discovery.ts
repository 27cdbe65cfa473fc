/**
 * Locating typst.toml inside a cloned repository.
 *
 * The manifest is expected at the resolved in-repo path. When it is not there
 * the subtree is searched recursively; several hits are returned to the caller,
 * which picks one (see selectManifestCandidate).
 */

import path from 'path';

import { FILE_PATTERNS } from '../../constants/index.js';
import { compareCodeUnits, exists, isDirectory } from '../../utils/fs.js';
import { walkFiles } from '../../utils/file-walker.js';
import { ManifestAmbiguousError, ManifestNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ManifestCandidate {
  /** Absolute path of the typst.toml */
  manifestPath: string;
  /** Path relative to the search root, `/`-separated */
  relativePath: string;
}

export type ManifestDiscovery =
  | { kind: 'direct'; manifestPath: string }
  | { kind: 'single'; manifestPath: string }
  | { kind: 'ambiguous'; candidates: ManifestCandidate[] };

/**
 * Every typst.toml under `searchRoot`, ordered by relative path.
 */
export async function findManifestCandidates(searchRoot: string): Promise<ManifestCandidate[]> {
  const candidates: ManifestCandidate[] = [];

  for await (const entry of walkFiles(searchRoot)) {
    if (path.basename(entry.fullPath) === FILE_PATTERNS.TYPST_TOML) {
      candidates.push({ manifestPath: entry.fullPath, relativePath: entry.relativePath });
    }
  }

  return candidates.sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath));
}

export async function discoverManifest(searchRoot: string): Promise<ManifestDiscovery> {
  const direct = path.join(searchRoot, FILE_PATTERNS.TYPST_TOML);
  if (await exists(direct)) {
    return { kind: 'direct', manifestPath: direct };
  }

  if (!(await isDirectory(searchRoot))) {
    throw new ManifestNotFoundError(searchRoot);
  }

  logger.debug(`typst.toml not found at ${direct}; searching recursively in ${searchRoot}`);
  const candidates = await findManifestCandidates(searchRoot);

  if (candidates.length === 0) {
    throw new ManifestNotFoundError(`${searchRoot} (searched recursively)`);
  }
  if (candidates.length === 1) {
    return { kind: 'single', manifestPath: candidates[0].manifestPath };
  }
  return { kind: 'ambiguous', candidates };
}

/**
 * Resolve an externally chosen, zero-based candidate index.
 */
export function selectManifestCandidate(candidates: readonly ManifestCandidate[], index: number): ManifestCandidate {
  if (!Number.isInteger(index) || index < 0 || index >= candidates.length) {
    throw new ManifestAmbiguousError(
      candidates.map(c => c.relativePath),
      `invalid selection ${index + 1}, expected 1-${candidates.length}`
    );
  }
  return candidates[index];
}
