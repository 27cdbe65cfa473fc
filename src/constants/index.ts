/**
 * Shared constants for the typm CLI application
 * Single source of truth for file names, directory names and defaults.
 */

export const FILE_PATTERNS = {
  TYPST_TOML: 'typst.toml',
  TYP_FILES: '.typ',
  PACKAGE_JSON: 'package.json'
} as const;

export const DIR_PATTERNS = {
  PACKAGES: 'packages',
  TYPST: 'typst'
} as const;

export const DEFAULTS = {
  ENTRYPOINT: 'main.typ',
  NAMESPACE: 'preview',
  OUTPUT_DIR: 'out'
} as const;

/**
 * Tooling-only comment lines in typst.toml (e.g. `#:schema ./schema.json`).
 * Stripped from every copied manifest.
 */
export const SCHEMA_DIRECTIVE = '#:schema';

export const COMPILER = {
  BINARY: 'typst',
  VERSION_FLAG: '--version'
} as const;

export const GIT = {
  BINARY: 'git',
  CLONE_DEPTH: '1',
  TEMP_PREFIX: 'typm-git-'
} as const;

/**
 * Alias prefixes accepted in `<alias>/<owner>/<repo>[/<path>]` sources.
 */
export const PROVIDER_ALIASES: Readonly<Record<string, string>> = {
  gh: 'github.com',
  github: 'github.com',
  gl: 'gitlab.com',
  gitlab: 'gitlab.com',
  bb: 'bitbucket.org',
  bitbucket: 'bitbucket.org'
};

/**
 * Namespace prefixes for packages installed from a known provider.
 */
export const PROVIDER_ABBREVIATIONS: Readonly<Record<string, string>> = {
  'github.com': 'gh',
  'gitlab.com': 'gl',
  'bitbucket.org': 'bb'
};
