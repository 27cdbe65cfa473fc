/**
 * Common types and interfaces for the typm CLI application
 */

// Version types

/**
 * Parsed semantic version core: (major, minor, patch).
 * Pre-release and build metadata are not represented.
 */
export interface VersionTriple {
  major: number;
  minor: number;
  patch: number;
}

export type ConstraintOperator = '>=' | '<=' | '==' | '!=' | '>' | '<' | '=';

export interface VersionConstraint {
  operator: ConstraintOperator;
  /** Operand exactly as written in the requirement string */
  operand: string;
}

// Git source types

/**
 * Resolved git source. `cloneUrl` is always https://<providerHost>/<owner>/<repo>.git
 */
export interface GitSourceDescriptor {
  readonly cloneUrl: string;
  /** Branch or tag; undefined means the default branch */
  readonly ref?: string;
  /** POSIX relative path to the manifest directory ('' = repository root) */
  readonly pathInRepo: string;
  readonly providerHost: string;
  readonly owner: string;
}

// Manifest types

export interface TemplateConfig {
  path?: string;
  entrypoint?: string;
  thumbnail?: string;
}

export interface PackageManifest {
  name: string;
  /** Free-form; used verbatim for paths and import specs */
  version: string;
  exclude: string[];
  entrypoint: string;
  /** Compiler requirement expression, e.g. ">=0.12.0 <0.13.0" */
  compiler?: string;
  template?: TemplateConfig;
}

export interface LoadedManifest {
  manifest: PackageManifest;
  /** Absolute path of the typst.toml file */
  manifestPath: string;
  /** Directory containing the manifest (the package source root) */
  packageDir: string;
}

// Directory types

export interface TypmDirectories {
  /** Typst data directory; local packages live under <data>/packages */
  data: string;
  /** Typst cache directory; preview packages live under <cache>/packages */
  cache: string;
}

// Command result

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class TypmError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TypmError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_SOURCE = 'INVALID_SOURCE',
  INVALID_VERSION = 'INVALID_VERSION',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
  CONSTRAINT_UNSATISFIED = 'CONSTRAINT_UNSATISFIED',
  EXTERNAL_TOOL_FAILURE = 'EXTERNAL_TOOL_FAILURE',
  MANIFEST_NOT_FOUND = 'MANIFEST_NOT_FOUND',
  MANIFEST_AMBIGUOUS = 'MANIFEST_AMBIGUOUS',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
