import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { getPackagesRoot, getTypmDirectories } from '../core/directory.js';
import { listInstalledPackages } from '../core/list/list-packages.js';

interface ListOptions {
  local?: boolean;
  preview?: boolean;
}

const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

async function printRoot(title: string, packagesRoot: string, rootType: string): Promise<number> {
  console.log(`\n${title}`);
  const listing = await listInstalledPackages(packagesRoot);

  if (!listing.exists) {
    console.log(dim(`  No packages found in ${rootType} directory (${packagesRoot} does not exist).`));
    return 0;
  }

  for (const pkg of listing.packages) {
    console.log(`  ${pkg.spec}`);
  }
  return listing.packages.length;
}

async function listCommand(options: ListOptions): Promise<void> {
  const directories = getTypmDirectories(process.env);
  const listAll = !options.local && !options.preview;
  let total = 0;

  console.log('Installed Typst packages:');

  if (options.local || listAll) {
    total += await printRoot('Local packages (data directory):', getPackagesRoot(directories.data), 'data');
  }
  if (options.preview || listAll) {
    total += await printRoot('Preview packages (cache directory):', getPackagesRoot(directories.cache), 'cache');
  }

  if (total === 0) {
    if (options.local && !options.preview) {
      console.log('  No local packages found.');
    } else if (options.preview && !options.local) {
      console.log('  No preview packages found.');
    } else {
      console.log('  No packages found in standard Typst data or cache directories.');
    }
  }
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .description('List installed Typst packages')
    .option('--local', 'list only local (data directory) packages')
    .option('--preview', 'list only preview (cache directory) packages')
    .action(withErrorHandling(async (options: ListOptions) => {
      await listCommand(options);
    }));
}
