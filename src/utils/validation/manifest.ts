import path from 'path';

import type { PackageManifest, TemplateConfig, VersionTriple } from '../../types/index.js';
import { DEFAULTS } from '../../constants/index.js';
import { ConstraintUnsatisfiedError, InvalidManifestError } from '../errors.js';
import { formatVersion, matchesRequirement } from './version.js';

type TomlTable = Record<string, unknown>;

function isTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(table: TomlTable, key: string, section: string): string | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidManifestError(`'${section}.${key}' must be a string`, { key: `${section}.${key}` });
  }
  return value;
}

function requiredString(table: TomlTable, key: string): string {
  const value = optionalString(table, key, 'package');
  if (!value) {
    throw new InvalidManifestError(`'package.${key}' is required`, { key: `package.${key}` });
  }
  return value;
}

function stringList(table: TomlTable, key: string): string[] {
  const value = table[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidManifestError(`'package.${key}' must be a list of strings`, { key: `package.${key}` });
  }
  return [...value];
}

function readTemplate(document: TomlTable): TemplateConfig | undefined {
  const template = document.template;
  if (template === undefined) {
    return undefined;
  }
  if (!isTable(template)) {
    throw new InvalidManifestError(`'template' must be a table`);
  }
  return {
    path: optionalString(template, 'path', 'template'),
    entrypoint: optionalString(template, 'entrypoint', 'template'),
    thumbnail: optionalString(template, 'thumbnail', 'template')
  };
}

/**
 * Check required fields of a parsed typst.toml document and apply defaults.
 */
export function validateManifestFields(document: unknown): PackageManifest {
  if (!isTable(document) || !isTable(document.package)) {
    throw new InvalidManifestError(`missing [package] table`);
  }

  const pkg = document.package;
  const compiler = optionalString(pkg, 'compiler', 'package');

  return {
    name: requiredString(pkg, 'name'),
    version: requiredString(pkg, 'version'),
    exclude: stringList(pkg, 'exclude'),
    entrypoint: optionalString(pkg, 'entrypoint', 'package') ?? DEFAULTS.ENTRYPOINT,
    ...(compiler ? { compiler } : {}),
    template: readTemplate(document)
  };
}

/**
 * A package must live in a directory named after it.
 */
export function validatePackageName(packageName: string, manifestDir: string): void {
  const parentDirName = path.basename(path.resolve(manifestDir));
  if (packageName !== parentDirName) {
    throw new InvalidManifestError(
      `Package name '${packageName}' does not match parent directory name '${parentDirName}'`,
      { packageName, parentDirName }
    );
  }
}

/**
 * Throws when the compiler version does not satisfy `package.compiler`.
 */
export function checkCompilerRequirement(requirement: string, current: VersionTriple): void {
  if (!matchesRequirement(requirement, current)) {
    throw new ConstraintUnsatisfiedError(requirement, formatVersion(current));
  }
}
