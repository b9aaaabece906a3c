/**
 * Invalidate Command
 *
 * Delete the cache markers so the next run rebuilds the environment.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { invalidateCache } from '../../cache/markers.js';
import { resolveConfig, type CommonOptions } from '../options.js';

export const invalidateCommand = new Command('invalidate')
  .description('Delete the cache markers, forcing a rebuild on the next run')
  .option('--home <dir>', 'Home directory holding the environment and markers (default: $HOME)')
  .action((options: CommonOptions) => {
    try {
      const { removed } = invalidateCache(resolveConfig(options));

      if (removed.length === 0) {
        console.log(chalk.dim('No markers present'));
        return;
      }
      for (const path of removed) {
        console.log(chalk.green('Removed'), path);
      }
    } catch (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });
