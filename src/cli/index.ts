#!/usr/bin/env node
/**
 * env-bootstrap CLI
 *
 * Command-line interface for bootstrapping the cached CI build environment.
 */

import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { invalidateCommand } from './commands/invalidate.js';
import { manifestCommand } from './commands/manifest.js';

const program = new Command();

program
  .name('env-bootstrap')
  .description('Install or reuse the cached scientific build environment for CI')
  .version('0.1.0');

program.addCommand(runCommand, { isDefault: true });
program.addCommand(statusCommand);
program.addCommand(invalidateCommand);
program.addCommand(manifestCommand);

await program.parseAsync();
