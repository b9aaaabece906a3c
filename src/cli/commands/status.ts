/**
 * Status Command
 *
 * Show the effective configuration and the state of the cached environment.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { EnvironmentBootstrapper } from '../../bootstrap/EnvironmentBootstrapper.js';
import { getConfigSummary } from '../../config/config.js';
import { resolveConfig, type CommonOptions } from '../options.js';

interface StatusOptions extends CommonOptions {
  output: string;
}

function flag(ok: boolean, label: string): string {
  return ok ? chalk.green(`✓ ${label}`) : chalk.yellow(`✗ ${label}`);
}

export const statusCommand = new Command('status')
  .description('Show configuration and cache state')
  .option('--home <dir>', 'Home directory holding the environment and markers (default: $HOME)')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action((options: StatusOptions) => {
    try {
      const config = resolveConfig(options);
      const state = new EnvironmentBootstrapper(config).inspect();

      if (options.output === 'json') {
        console.log(JSON.stringify({ config, state }, null, 2));
        return;
      }

      console.log(getConfigSummary(config));
      console.log(flag(state.cacheValid, 'Cache marker present'));
      console.log(flag(state.buildComplete, 'Build complete marker present'));
      console.log(flag(state.targetExists, `Environment directory ${state.targetDir}`));
      console.log(flag(state.patchFileExists, `Path configuration ${state.patchFile}`));
      if (state.versionedReferences !== null) {
        console.log(flag(state.versionedReferences === 0, `Unpatched path references: ${state.versionedReferences}`));
      }
    } catch (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });
