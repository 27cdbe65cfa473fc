import { join } from 'path';
import { tmpdir } from 'os';

import type { GitSourceDescriptor } from '../types/index.js';
import { GIT } from '../constants/index.js';
import { logger } from './logger.js';
import { ExternalToolError } from './errors.js';
import { makeTempDir, remove } from './fs.js';
import { execFileRunner, type CommandOutput, type CommandRunner } from './command-runner.js';

export interface GitCloneOptions {
  url: string;
  ref?: string; // branch/tag
}

/**
 * Populates `targetDir` with a checkout of the repository.
 */
export type GitCloner = (options: GitCloneOptions, targetDir: string) => Promise<void>;

export function buildCloneArgs(options: GitCloneOptions, targetDir: string): string[] {
  const args = ['clone', '--depth', GIT.CLONE_DEPTH];
  if (options.ref) {
    args.push('--branch', options.ref);
  }
  args.push(options.url, targetDir);
  return args;
}

/**
 * Shallow clone through the git binary.
 */
export function createGitCloner(run: CommandRunner = execFileRunner): GitCloner {
  return async (options, targetDir) => {
    const args = buildCloneArgs(options, targetDir);
    let result: CommandOutput;
    try {
      result = await run(GIT.BINARY, args);
    } catch (error) {
      throw new ExternalToolError(GIT.BINARY, `failed to execute git clone for ${options.url}`, { error });
    }

    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        GIT.BINARY,
        `git clone failed for ${options.url}${result.stderr ? `: ${result.stderr.trim()}` : ''}`,
        { exitCode: result.exitCode, stderr: result.stderr }
      );
    }

    logger.debug(`Cloned git repository ${options.url}${options.ref ? `#${options.ref}` : ''} to ${targetDir}`);
  };
}

export interface TempCloneOptions {
  clone?: GitCloner;
  /** Parent of the temporary workspace (default: os.tmpdir()) */
  tempRoot?: string;
}

/**
 * Clone `source` into a fresh temporary directory, run `fn` against it and
 * remove the directory afterwards, whether `fn` or the clone succeeded or not.
 */
export async function withTempClone<T>(
  source: Pick<GitSourceDescriptor, 'cloneUrl' | 'ref'>,
  fn: (cloneDir: string) => Promise<T>,
  options: TempCloneOptions = {}
): Promise<T> {
  const clone = options.clone ?? createGitCloner();
  const cloneDir = await makeTempDir(join(options.tempRoot ?? tmpdir(), GIT.TEMP_PREFIX));

  try {
    await clone({ url: source.cloneUrl, ref: source.ref }, cloneDir);
    return await fn(cloneDir);
  } finally {
    await remove(cloneDir);
    logger.debug(`Removed temporary clone workspace ${cloneDir}`);
  }
}
