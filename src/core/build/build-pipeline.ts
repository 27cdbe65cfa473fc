/**
 * Build pipeline: local typst.toml -> <output>/<name>/<version>
 *
 * All validation (fields, compiler requirement, name/directory match) and the
 * template compilation happen before anything is written to the output root.
 */

import path from 'path';

import type { PackageManifest } from '../../types/index.js';
import { DEFAULTS, FILE_PATTERNS } from '../../constants/index.js';
import { exists, isDirectory, isFile } from '../../utils/fs.js';
import { ManifestNotFoundError } from '../../utils/errors.js';
import { loadPackageToml } from '../../utils/package-toml.js';
import { checkCompilerRequirement, validatePackageName } from '../../utils/validation/manifest.js';
import { formatVersion } from '../../utils/validation/version.js';
import { toPosixRelative } from '../../utils/exclude-rules.js';
import { createTypstCompiler, type TypstCompiler } from '../compiler/typst-compiler.js';
import { deriveBuildTarget, type PackageTarget } from '../paths/namespace-paths.js';
import { isWithin, materializePackage, type MaterializeSummary } from '../materialize/package-materializer.js';
import { resolveOutput } from '../ports/resolve.js';
import type { OutputPort } from '../ports/output.js';

export interface BuildOptions {
  /** typst.toml, or a directory containing one */
  manifest: string;
  outputDir?: string;
  namespace?: string;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
  compiler?: TypstCompiler;
  output?: OutputPort;
}

export interface BuildResult {
  manifest: PackageManifest;
  target: PackageTarget;
  summary: MaterializeSummary;
}

/**
 * Accept either the manifest file itself or its directory.
 */
export async function resolveManifestPath(input: string): Promise<string> {
  if (await isFile(input)) {
    return path.resolve(input);
  }
  if (await isDirectory(input)) {
    const candidate = path.join(input, FILE_PATTERNS.TYPST_TOML);
    if (!(await exists(candidate))) {
      throw new ManifestNotFoundError(`directory: ${input}`);
    }
    return path.resolve(candidate);
  }
  throw new ManifestNotFoundError(`${input} (path is neither a file nor a directory)`);
}

/**
 * Exclusions for a build. When the output root sits inside the package, earlier
 * builds under it must not be copied into the new one.
 */
export function buildExcludes(manifest: PackageManifest, packageDir: string, outputRoot: string): string[] {
  const excludes = [...manifest.exclude];
  if (isWithin(packageDir, outputRoot)) {
    const relative = toPosixRelative(path.relative(packageDir, outputRoot));
    if (relative && !excludes.includes(relative) && !excludes.includes(`${relative}/`)) {
      excludes.push(`${relative}/`);
    }
  }
  return excludes;
}

async function compileTemplateIfDeclared(
  manifest: PackageManifest,
  packageDir: string,
  compiler: TypstCompiler,
  output: OutputPort
): Promise<void> {
  const template = manifest.template;
  if (!template) {
    return;
  }

  const templatePath = template.path ?? '';
  const templateEntrypoint = template.entrypoint ?? '';

  if (!templatePath || !templateEntrypoint) {
    if (template.path !== undefined && !templatePath) {
      output.warn('Template path is present but empty.');
    }
    if (template.entrypoint !== undefined && !templateEntrypoint) {
      output.warn('Template entrypoint is present but empty.');
    }
    return;
  }

  const compileOptions = { packageDir, packageName: manifest.name, templatePath, templateEntrypoint };

  output.step(`Compiling template: ${templatePath}/${templateEntrypoint}`);
  await compiler.compileTemplate(compileOptions);

  if (template.thumbnail) {
    output.step(`Generating thumbnail: ${template.thumbnail}`);
    await compiler.generateThumbnail({ ...compileOptions, thumbnailPath: template.thumbnail });
  }
}

export async function runBuild(options: BuildOptions): Promise<BuildResult> {
  const output = resolveOutput(options);
  const compiler = options.compiler ?? createTypstCompiler();
  const cwd = options.cwd ?? process.cwd();

  const manifestPath = await resolveManifestPath(path.resolve(cwd, options.manifest));
  const { manifest, packageDir } = await loadPackageToml(manifestPath);

  if (manifest.compiler) {
    const current = await compiler.getVersion();
    checkCompilerRequirement(manifest.compiler, current);
    output.info(`Typst version check passed (required: ${manifest.compiler}, current: ${formatVersion(current)}).`);
  }

  validatePackageName(manifest.name, packageDir);

  await compileTemplateIfDeclared(manifest, packageDir, compiler, output);

  const outputRoot = path.resolve(cwd, options.outputDir ?? DEFAULTS.OUTPUT_DIR);
  const target = deriveBuildTarget({ outputRoot, manifest, namespace: options.namespace });

  output.step(`Copying files to: ${target.destination}`);
  const summary = await materializePackage({
    sourceDir: packageDir,
    destDir: target.destination,
    exclude: buildExcludes(manifest, packageDir, outputRoot),
    importBase: target.importBase,
    version: manifest.version,
    entrypoint: manifest.entrypoint
  });

  output.success(`Package '${manifest.name}' v${manifest.version} built successfully to ${target.destination}`);

  return { manifest, target, summary };
}
