/**
 * Manifest Command
 *
 * List the conda packages of the Windows build environment manifest.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { join } from 'path';
import {
  findDuplicatePackages,
  formatSpec,
  loadCondaManifest,
  manifestSpecs
} from '../../manifest/CondaManifest.js';

interface ManifestOptions {
  specs: boolean;
  includeDisabled: boolean;
  json: boolean;
}

export const manifestCommand = new Command('manifest')
  .description('List the packages of a conda manifest')
  .argument('[file]', 'Manifest file', join('manifests', 'conda-windows.txt'))
  .option('--specs', 'Print install specs only, one per line', false)
  .option('--include-disabled', 'Include commented-out packages', false)
  .option('--json', 'Print the parsed manifest as JSON', false)
  .action((file: string, options: ManifestOptions) => {
    try {
      const manifest = loadCondaManifest(file);

      if (options.json) {
        console.log(JSON.stringify(manifest, null, 2));
      } else if (options.specs) {
        for (const spec of manifestSpecs(manifest, { includeDisabled: options.includeDisabled })) {
          console.log(spec);
        }
      } else {
        for (const group of manifest.groups) {
          console.log(chalk.cyan(group.title || '(ungrouped)'));
          for (const entry of group.entries) {
            if (entry.enabled) {
              console.log(`  ${formatSpec(entry)}`);
            } else if (options.includeDisabled) {
              console.log(chalk.dim(`  ${formatSpec(entry)} (disabled)`));
            }
          }
        }
      }

      const duplicates = findDuplicatePackages(manifest);
      if (duplicates.length > 0) {
        console.error(chalk.red(`Duplicate packages: ${duplicates.join(', ')}`));
        process.exit(1);
      }
    } catch (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });
