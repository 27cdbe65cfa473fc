import { Command } from 'commander';

import { DEFAULTS } from '../constants/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runBuild } from '../core/build/build-pipeline.js';
import { createCliOutput } from '../cli/clack-output-adapter.js';

interface BuildCommandOptions {
  outputDir: string;
  namespace: string;
}

export function setupBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build a Typst package/template from a typst.toml file to be published or installed')
    .argument('<manifest>', 'path to the typst.toml file or its directory')
    .option('--output-dir <dir>', 'directory the built package is placed in', DEFAULTS.OUTPUT_DIR)
    .option('-n, --namespace <namespace>', "namespace for self-imports (e.g. 'preview' or 'local')", DEFAULTS.NAMESPACE)
    .action(withErrorHandling(async (manifest: string, options: BuildCommandOptions) => {
      await runBuild({
        manifest,
        outputDir: options.outputDir,
        namespace: options.namespace,
        output: createCliOutput()
      });
    }));
}
