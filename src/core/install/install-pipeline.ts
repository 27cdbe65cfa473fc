/**
 * Install pipeline: git source -> <data>/packages/<provider>-<owner>/<name>/<version>
 *
 *   parse source -> temporary clone -> locate typst.toml -> validate
 *   -> derive target -> materialize -> remove clone
 */

import path from 'path';

import type { GitSourceDescriptor, PackageManifest, TypmDirectories } from '../../types/index.js';
import { exists } from '../../utils/fs.js';
import { ManifestAmbiguousError } from '../../utils/errors.js';
import { parseGitSource } from '../../utils/git-url-detection.js';
import { withTempClone, type GitCloner } from '../../utils/git-clone.js';
import { loadPackageToml } from '../../utils/package-toml.js';
import { checkCompilerRequirement } from '../../utils/validation/manifest.js';
import { formatVersion } from '../../utils/validation/version.js';
import { createTypstCompiler, type TypstCompiler } from '../compiler/typst-compiler.js';
import { discoverManifest, selectManifestCandidate, type ManifestCandidate } from '../discovery/manifest-discovery.js';
import { deriveInstallTarget, type PackageTarget } from '../paths/namespace-paths.js';
import { materializePackage, type MaterializeSummary } from '../materialize/package-materializer.js';
import { NonInteractivePromptError } from '../ports/console-prompt.js';
import { resolveOutput, resolvePrompt } from '../ports/resolve.js';
import type { OutputPort } from '../ports/output.js';
import type { PromptPort } from '../ports/prompt.js';

export interface InstallOptions {
  /** Alias or URL, e.g. gh/owner/repo/path */
  source: string;
  directories: TypmDirectories;
  clone?: GitCloner;
  compiler?: TypstCompiler;
  /** Parent of the temporary clone workspace */
  tempRoot?: string;
  output?: OutputPort;
  prompt?: PromptPort;
}

export interface InstallResult {
  source: GitSourceDescriptor;
  manifest: PackageManifest;
  target: PackageTarget;
  summary: MaterializeSummary;
  /** `#import "@ns/name:version": ...` */
  importStatement: string;
}

/**
 * Ask the prompt port which candidate to install. Without an interactive
 * prompt the ambiguity is fatal.
 */
async function chooseCandidate(
  candidates: ManifestCandidate[],
  prompt: PromptPort
): Promise<ManifestCandidate> {
  let index: number;
  try {
    index = await prompt.select(
      'Multiple typst.toml files found. Please choose one to install:',
      candidates.map((candidate, i) => ({ title: candidate.relativePath, value: i }))
    );
  } catch (error) {
    if (error instanceof NonInteractivePromptError) {
      throw new ManifestAmbiguousError(candidates.map(c => c.relativePath), 'no interactive selection available');
    }
    throw error;
  }
  return selectManifestCandidate(candidates, index);
}

async function locateManifest(searchRoot: string, prompt: PromptPort, output: OutputPort): Promise<string> {
  const discovery = await discoverManifest(searchRoot);

  switch (discovery.kind) {
    case 'direct':
      return discovery.manifestPath;
    case 'single':
      output.info(`Found typst.toml at: ${discovery.manifestPath}`);
      return discovery.manifestPath;
    case 'ambiguous': {
      const selected = await chooseCandidate(discovery.candidates, prompt);
      output.info(`Selected: ${selected.relativePath}`);
      return selected.manifestPath;
    }
  }
}

export async function runInstall(options: InstallOptions): Promise<InstallResult> {
  const output = resolveOutput(options);
  const prompt = resolvePrompt(options);
  const compiler = options.compiler ?? createTypstCompiler();

  output.info(`Attempting to install from: ${options.source}`);
  const source = parseGitSource(options.source);

  output.step(`Cloning ${source.cloneUrl}${source.ref ? ` (${source.ref})` : ''}...`);

  return withTempClone(source, async cloneDir => {
    const searchRoot = path.join(cloneDir, ...source.pathInRepo.split('/').filter(Boolean));
    const manifestPath = await locateManifest(searchRoot, prompt, output);
    const { manifest, packageDir } = await loadPackageToml(manifestPath);

    output.info(`Found package: ${manifest.name} v${manifest.version}`);

    if (manifest.compiler) {
      const current = await compiler.getVersion();
      checkCompilerRequirement(manifest.compiler, current);
      output.info(`Typst version check passed (required: ${manifest.compiler}, current: ${formatVersion(current)}).`);
    }

    const target = deriveInstallTarget({ dataRoot: options.directories.data, source, manifest });

    if (await exists(target.destination)) {
      output.warn(`Package ${manifest.name} v${manifest.version} already installed at ${target.destination}. Overwriting.`);
    }

    output.step(`Installing to: ${target.destination}`);
    const summary = await materializePackage({
      sourceDir: packageDir,
      destDir: target.destination,
      exclude: manifest.exclude,
      importBase: target.importBase,
      version: manifest.version,
      entrypoint: manifest.entrypoint
    });

    const importStatement = `#import "${target.importSpec}": ...`;
    output.success(`Package '${manifest.name}' v${manifest.version} installed successfully.`);
    output.note(importStatement, 'You can now import it using:');

    return { source, manifest, target, summary, importStatement };
  }, { clone: options.clone, tempRoot: options.tempRoot });
}
