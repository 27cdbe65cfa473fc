/**
 * Enumerates installed packages: every <namespace>/<name>/<version>
 * directory below a packages root.
 */

import { join } from 'path';

import { isDirectory, listDirectories } from '../../utils/fs.js';
import { formatImportSpec } from '../../utils/import-rewriter.js';

export interface InstalledPackage {
  namespace: string;
  name: string;
  version: string;
  /** `@namespace/name:version` */
  spec: string;
  path: string;
}

export interface PackageRootListing {
  root: string;
  /** False when the root directory does not exist */
  exists: boolean;
  packages: InstalledPackage[];
}

export async function listInstalledPackages(packagesRoot: string): Promise<PackageRootListing> {
  if (!(await isDirectory(packagesRoot))) {
    return { root: packagesRoot, exists: false, packages: [] };
  }

  const packages: InstalledPackage[] = [];

  for (const namespace of await listDirectories(packagesRoot)) {
    const namespaceDir = join(packagesRoot, namespace);
    for (const name of await listDirectories(namespaceDir)) {
      const packageDir = join(namespaceDir, name);
      for (const version of await listDirectories(packageDir)) {
        packages.push({
          namespace,
          name,
          version,
          spec: formatImportSpec(`${namespace}/${name}`, version),
          path: join(packageDir, version)
        });
      }
    }
  }

  return { root: packagesRoot, exists: true, packages };
}
