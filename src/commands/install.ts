import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { runInstall } from '../core/install/install-pipeline.js';
import { getTypmDirectories } from '../core/directory.js';
import { createCliOutput } from '../cli/clack-output-adapter.js';
import { createCliPrompt } from '../cli/clack-prompt-adapter.js';

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Install a Typst package from a git repository into the local data directory')
    .argument('<git-source>', 'git URL or alias (e.g. gh/user/repo[/path])')
    .action(withErrorHandling(async (source: string) => {
      await runInstall({
        source,
        directories: getTypmDirectories(process.env),
        output: createCliOutput(),
        prompt: createCliPrompt()
      });
    }));
}
