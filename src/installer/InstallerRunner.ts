/**
 * InstallerRunner
 *
 * Runs the installer bundled in the extracted archive. Output goes straight
 * to the parent's stdio so it lands in the CI log.
 */

import { spawn, type StdioOptions } from 'child_process';
import { existsSync } from 'fs';
import { join } from 'path';
import { InstallerError } from '../core/errors.js';
import type { InstallerInvocation, InstallerRunner } from '../core/types.js';

/**
 * Installer flags: no bytecode precompilation, verbose output, install into prefix.
 */
export function installerArgs(prefix: string): string[] {
  return ['--nopycompile', '--verbose', `--prefix=${prefix}`];
}

export interface ProcessInstallerRunnerOptions {
  stdio?: StdioOptions;
}

export class ProcessInstallerRunner implements InstallerRunner {
  private readonly stdio: StdioOptions;

  constructor(options: ProcessInstallerRunnerOptions = {}) {
    this.stdio = options.stdio ?? 'inherit';
  }

  async run(invocation: InstallerInvocation): Promise<void> {
    const { installerDir, executable, prefix } = invocation;
    const command = join(installerDir, executable);

    if (!existsSync(installerDir)) {
      throw new InstallerError(command, `installer directory ${installerDir} does not exist`);
    }

    return new Promise((resolve, reject) => {
      const child = spawn(command, installerArgs(prefix), {
        cwd: installerDir,
        stdio: this.stdio
      });

      child.on('error', (error) => {
        reject(new InstallerError(command, error.message, null, null, { cause: error }));
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
        } else if (signal) {
          reject(new InstallerError(command, `terminated by ${signal}`, null, signal));
        } else {
          reject(new InstallerError(command, `exited with code ${code}`, code));
        }
      });
    });
  }
}
