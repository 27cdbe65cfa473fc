/**
 * Typst compiler collaborator: version query, template compilation and
 * thumbnail rendering. All invocations are blocking from the caller's point
 * of view and only their exit status and captured output are consumed.
 */

import path from 'path';

import type { VersionTriple } from '../../types/index.js';
import { COMPILER } from '../../constants/index.js';
import { execFileRunner, type CommandOutput, type CommandRunner } from '../../utils/command-runner.js';
import { ExternalToolError, InvalidVersionError } from '../../utils/errors.js';
import { parseVersion } from '../../utils/validation/version.js';
import { logger } from '../../utils/logger.js';

export interface TemplateCompileOptions {
  /** Directory containing typst.toml; must be named after the package */
  packageDir: string;
  packageName: string;
  templatePath: string;
  templateEntrypoint: string;
}

export interface ThumbnailOptions extends TemplateCompileOptions {
  thumbnailPath: string;
}

export interface TypstCompiler {
  getVersion(): Promise<VersionTriple>;
  compileTemplate(options: TemplateCompileOptions): Promise<void>;
  generateThumbnail(options: ThumbnailOptions): Promise<void>;
}

/**
 * `typst --version` prints e.g. "typst 0.12.0 (737895d7)"; the second token is the version.
 */
export function parseCompilerVersionOutput(output: string): VersionTriple {
  const token = output.trim().split(/\s+/)[1];
  if (!token) {
    throw new ExternalToolError(COMPILER.BINARY, `unexpected '${COMPILER.BINARY} ${COMPILER.VERSION_FLAG}' output: ${output.trim()}`);
  }
  try {
    return parseVersion(token);
  } catch (error) {
    if (error instanceof InvalidVersionError) {
      throw new ExternalToolError(COMPILER.BINARY, `failed to parse compiler version: ${token}`, { output });
    }
    throw error;
  }
}

function templateArgument(options: TemplateCompileOptions): string {
  return path.posix.join(options.packageName, options.templatePath, options.templateEntrypoint);
}

export function createTypstCompiler(run: CommandRunner = execFileRunner): TypstCompiler {
  async function invoke(args: string[], cwd: string | undefined, what: string): Promise<CommandOutput> {
    let result: CommandOutput;
    try {
      result = await run(COMPILER.BINARY, args, { cwd });
    } catch (error) {
      throw new ExternalToolError(COMPILER.BINARY, `failed to execute '${COMPILER.BINARY}' for ${what}`, { error });
    }
    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        COMPILER.BINARY,
        `${what} failed\nStdout: ${result.stdout}\nStderr: ${result.stderr}`,
        { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr }
      );
    }
    return result;
  }

  return {
    async getVersion(): Promise<VersionTriple> {
      const result = await invoke([COMPILER.VERSION_FLAG], undefined, 'version query');
      const version = parseCompilerVersionOutput(result.stdout);
      logger.debug('Detected compiler version', version);
      return version;
    },

    async compileTemplate(options: TemplateCompileOptions): Promise<void> {
      const template = templateArgument(options);
      // Run from the package's parent so `--root .` covers the package directory
      await invoke(['compile', '--root', '.', template], path.dirname(path.resolve(options.packageDir)), `template compilation for ${template}`);
    },

    async generateThumbnail(options: ThumbnailOptions): Promise<void> {
      const template = templateArgument(options);
      const thumbnail = path.posix.join(options.packageName, options.thumbnailPath);
      await invoke(
        ['compile', '--root', '.', '--pages', '1', template, thumbnail],
        path.dirname(path.resolve(options.packageDir)),
        `thumbnail generation for ${template}`
      );
    }
  };
}
