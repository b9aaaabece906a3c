/**
 * EnvironmentBootstrapper
 *
 * Ensures the build environment exists under the home directory, reusing a
 * previous installation while the cache marker is present. Otherwise runs the
 * full cycle: download and extract, install, rename, patch, mark.
 *
 * Any failing step aborts the run without cleanup. The marker is written last,
 * so a failed run leaves no marker and the next run starts from scratch.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ArchiveFetcher } from '../archive/ArchiveFetcher.js';
import {
  invalidateCache,
  isBuildComplete,
  isCacheValid,
  markCacheValid
} from '../cache/markers.js';
import { silentLogger, type BootstrapLogger } from '../core/logger.js';
import type {
  BootstrapConfig,
  BootstrapOutcome,
  BootstrapPhase,
  EnvironmentState,
  InstallerRunner
} from '../core/types.js';
import { ProcessInstallerRunner } from '../installer/InstallerRunner.js';
import {
  countVersionedReferences,
  findInstalledDir,
  patchPathsFile,
  replaceTargetDir
} from '../layout/relocate.js';

export interface BootstrapDependencies {
  fetcher?: ArchiveFetcher;
  installer?: InstallerRunner;
  logger?: BootstrapLogger;
  onPhase?: (phase: BootstrapPhase) => void;
}

export class EnvironmentBootstrapper {
  private readonly config: BootstrapConfig;
  private readonly fetcher: ArchiveFetcher;
  private readonly installer: InstallerRunner;
  private readonly logger: BootstrapLogger;
  private readonly onPhase: (phase: BootstrapPhase) => void;

  constructor(config: BootstrapConfig, deps: BootstrapDependencies = {}) {
    this.config = config;
    this.fetcher = deps.fetcher ?? new ArchiveFetcher();
    this.installer = deps.installer ?? new ProcessInstallerRunner();
    this.logger = deps.logger ?? silentLogger;
    this.onPhase = deps.onPhase ?? (() => {});
  }

  get targetDir(): string {
    return join(this.config.homeDir, this.config.targetDirName);
  }

  get patchFilePath(): string {
    return join(this.targetDir, this.config.patchFile);
  }

  async run(): Promise<BootstrapOutcome> {
    const { homeDir, trigger, scheduledTrigger } = this.config;
    const startedAt = Date.now();

    // 1. Scheduled runs always rebuild
    let invalidated = false;
    if (trigger !== undefined && trigger === scheduledTrigger) {
      this.onPhase('invalidate');
      const { removed } = invalidateCache(this.config);
      invalidated = true;
      this.logger.info(`Scheduled trigger "${trigger}": cache invalidated (${removed.length} marker(s) removed)`);
    }

    // 2. Reuse a valid cache
    this.onPhase('check');
    if (isCacheValid(this.config)) {
      this.logger.info(`Using cached build environment at ${this.targetDir}`);
      return { action: 'cached', invalidated: false, targetDir: this.targetDir };
    }

    // 3. Full rebuild
    this.logger.info(`No valid cache in ${homeDir}, building environment from ${this.config.archiveUrl}`);

    this.onPhase('download');
    const bytesDownloaded = await this.fetcher.fetchAndExtract(this.config.archiveUrl, homeDir);
    this.logger.debug(`Extracted ${bytesDownloaded} bytes into ${homeDir}`);

    this.onPhase('install');
    const installerDir = join(homeDir, this.config.installerDirName);
    await this.installer.run({
      installerDir,
      executable: this.config.installerExecutable,
      prefix: homeDir
    });
    this.logger.debug(`Installer in ${installerDir} finished`);

    this.onPhase('relocate');
    const installedDir = await findInstalledDir(homeDir, this.config.installedDirPrefix);
    const targetDir = replaceTargetDir(homeDir, installedDir, this.config.targetDirName);
    this.logger.debug(`Moved ${installedDir} to ${targetDir}`);

    this.onPhase('patch');
    const replacements = patchPathsFile(
      this.patchFilePath,
      this.config.installedDirPrefix,
      this.config.targetDirName
    );
    this.logger.debug(`Rewrote ${replacements} path reference(s) in ${this.patchFilePath}`);

    this.onPhase('mark');
    markCacheValid(this.config);

    const durationMs = Date.now() - startedAt;
    this.logger.info(`Build environment ready at ${targetDir} (${(durationMs / 1000).toFixed(1)}s)`);

    return {
      action: 'rebuilt',
      invalidated,
      bytesDownloaded,
      installedDir,
      targetDir,
      replacements,
      durationMs
    };
  }

  /**
   * Report the environment state without changing anything.
   */
  inspect(): EnvironmentState {
    const patchFileExists = existsSync(this.patchFilePath);

    return {
      cacheValid: isCacheValid(this.config),
      buildComplete: isBuildComplete(this.config),
      targetDir: this.targetDir,
      targetExists: existsSync(this.targetDir),
      patchFile: this.patchFilePath,
      patchFileExists,
      versionedReferences: patchFileExists
        ? countVersionedReferences(readFileSync(this.patchFilePath, 'utf-8'), this.config.installedDirPrefix)
        : null
    };
  }
}
