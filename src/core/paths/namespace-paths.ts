/**
 * Destination paths and import namespaces for built and installed packages.
 *
 *   build:   <output-root>/<name>/<version>
 *   install: <data-root>/packages/<provider>-<owner>/<name>/<version>
 */

import path from 'path';

import type { GitSourceDescriptor, PackageManifest } from '../../types/index.js';
import { DEFAULTS, DIR_PATTERNS, PROVIDER_ABBREVIATIONS } from '../../constants/index.js';
import { formatImportSpec } from '../../utils/import-rewriter.js';

export interface PackageTarget {
  /** Directory the package tree is materialized into */
  destination: string;
  namespace: string;
  /** `<namespace>/<name>` */
  importBase: string;
  /** `@<namespace>/<name>:<version>` */
  importSpec: string;
}

/**
 * Short provider prefix for install namespaces: gh, gl, bb, or the first
 * label of any other host.
 */
export function getProviderAbbreviation(host: string): string {
  return PROVIDER_ABBREVIATIONS[host] ?? host.split('.')[0];
}

export function getInstallNamespace(source: Pick<GitSourceDescriptor, 'providerHost' | 'owner'>): string {
  return `${getProviderAbbreviation(source.providerHost)}-${source.owner}`;
}

function createTarget(destination: string, namespace: string, manifest: Pick<PackageManifest, 'name' | 'version'>): PackageTarget {
  const importBase = `${namespace}/${manifest.name}`;
  return {
    destination,
    namespace,
    importBase,
    importSpec: formatImportSpec(importBase, manifest.version)
  };
}

export function deriveBuildTarget(options: {
  outputRoot: string;
  manifest: Pick<PackageManifest, 'name' | 'version'>;
  namespace?: string;
}): PackageTarget {
  const { outputRoot, manifest } = options;
  const namespace = options.namespace || DEFAULTS.NAMESPACE;
  return createTarget(path.join(outputRoot, manifest.name, manifest.version), namespace, manifest);
}

export function deriveInstallTarget(options: {
  dataRoot: string;
  source: Pick<GitSourceDescriptor, 'providerHost' | 'owner'>;
  manifest: Pick<PackageManifest, 'name' | 'version'>;
}): PackageTarget {
  const { dataRoot, source, manifest } = options;
  const namespace = getInstallNamespace(source);
  const destination = path.join(dataRoot, DIR_PATTERNS.PACKAGES, namespace, manifest.name, manifest.version);
  return createTarget(destination, namespace, manifest);
}
