/**
 * Run Command
 *
 * Reuse the cached build environment, or rebuild it when the cache marker is
 * missing (always on scheduled runs).
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ArchiveFetcher } from '../../archive/ArchiveFetcher.js';
import { EnvironmentBootstrapper } from '../../bootstrap/EnvironmentBootstrapper.js';
import { exitCodeFor } from '../../core/errors.js';
import { ConsoleLogger } from '../../core/logger.js';
import { formatBytes, resolveConfig, type CommonOptions } from '../options.js';

interface RunOptions extends CommonOptions {
  verbose: boolean;
}

export const runCommand = new Command('run')
  .description('Ensure the build environment exists, rebuilding it when the cache is invalid')
  .option('--home <dir>', 'Home directory holding the environment and markers (default: $HOME)')
  .option('--url <url>', 'Installer archive URL')
  .option('--trigger <type>', 'Trigger type of this run (default: $TRAVIS_EVENT_TYPE)')
  .option('-v, --verbose', 'Print step details', false)
  .action(async (options: RunOptions) => {
    const logger = new ConsoleLogger({ verbose: options.verbose });
    const spinner = ora();

    try {
      const config = resolveConfig(options);

      const fetcher = new ArchiveFetcher({
        onProgress: (received, total) => {
          const size = total ? `${formatBytes(received)} / ${formatBytes(total)}` : formatBytes(received);
          spinner.text = `Downloading and extracting ${config.archiveUrl} (${size})`;
        }
      });

      const bootstrapper = new EnvironmentBootstrapper(config, {
        fetcher,
        logger,
        onPhase: (phase) => {
          if (phase === 'download') {
            spinner.start(`Downloading and extracting ${config.archiveUrl}`);
          } else if (phase === 'install' && spinner.isSpinning) {
            spinner.succeed('Archive extracted');
          }
        }
      });

      const outcome = await bootstrapper.run();

      if (outcome.action === 'cached') {
        console.log(chalk.yellow('Using cached build'));
      } else {
        console.log(chalk.green(`Build environment installed at ${outcome.targetDir}`));
        console.log(chalk.dim('Downloaded:'), formatBytes(outcome.bytesDownloaded));
        console.log(chalk.dim('Paths rewritten:'), outcome.replacements);
      }
    } catch (error) {
      if (spinner.isSpinning) {
        spinner.fail(chalk.red('Download failed'));
      }
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(exitCodeFor(error));
    }
  });
