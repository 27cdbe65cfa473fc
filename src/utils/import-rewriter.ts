/**
 * Self-import rewriting for .typ sources.
 *
 * Inside a package, examples and templates reach the package through a
 * relative path such as `#import "../../main.typ": *`. Once the package is
 * installed those paths no longer resolve, so they are replaced with the
 * canonical package spec: `#import "@preview/foo:1.0.0": *`.
 *
 * Pure string transformation; no filesystem access.
 */

import { posix } from 'path';

export interface SelfImportRewriteOptions {
  /** Package entrypoint as declared in the manifest; only its file name is matched */
  entrypoint: string;
  /** `<namespace>/<name>` */
  importBase: string;
  version: string;
}

export interface RewriteResult {
  content: string;
  replacements: number;
}

export type ImportRewriter = (content: string) => RewriteResult;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Spec written in place of the relative path, e.g. `@preview/foo:1.0.0`.
 */
export function formatImportSpec(importBase: string, version: string): string {
  return `@${importBase}:${version}`;
}

/**
 * Build the regular expression recognizing self-imports of `entrypointName`.
 *
 * Groups: 1 = `#import` plus whitespace plus opening quote, 2 = `../` run,
 * 3 = optional `:`-clause inside the quotes.
 */
export function buildSelfImportPattern(entrypointName: string): RegExp {
  return new RegExp(
    `(#import\\s+")((?:\\.\\./)+)${escapeRegExp(entrypointName)}((?::\\s*[^"]*)?)"`,
    'g'
  );
}

/**
 * Create a rewriter bound to one package. Everything outside the
 * `../`-run and file name of a matched import is left byte-identical.
 */
export function createSelfImportRewriter(options: SelfImportRewriteOptions): ImportRewriter {
  const entrypointName = posix.basename(options.entrypoint.replace(/\\/g, '/'));
  const spec = formatImportSpec(options.importBase, options.version);

  return (content: string): RewriteResult => {
    const pattern = buildSelfImportPattern(entrypointName);
    let replacements = 0;

    const rewritten = content.replace(pattern, (_match, opening: string, _parents: string, clause: string) => {
      replacements++;
      return `${opening}${spec}${clause}"`;
    });

    return { content: rewritten, replacements };
  };
}

/**
 * One-shot form of {@link createSelfImportRewriter}.
 */
export function rewriteSelfImports(content: string, options: SelfImportRewriteOptions): RewriteResult {
  return createSelfImportRewriter(options)(content);
}
