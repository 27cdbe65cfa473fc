/**
 * Subprocess seam shared by the git and compiler collaborators.
 * Tests substitute a fake CommandRunner; the CLI uses execFileRunner.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

/**
 * Runs a binary to completion. Rejects only when the binary cannot be started;
 * a non-zero exit resolves with its exit code.
 */
export type CommandRunner = (command: string, args: readonly string[], options?: RunOptions) => Promise<CommandOutput>;

interface ExecFailure {
  code?: unknown;
  stdout?: unknown;
  stderr?: unknown;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

export const execFileRunner: CommandRunner = async (command, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], { cwd: options.cwd, encoding: 'utf8' });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    // Exited with a status: surface it. ENOENT and friends carry a string code.
    if (isExecFailure(error) && typeof error.code === 'number') {
      return {
        exitCode: error.code,
        stdout: typeof error.stdout === 'string' ? error.stdout : '',
        stderr: typeof error.stderr === 'string' ? error.stderr : ''
      };
    }
    throw error;
  }
};
