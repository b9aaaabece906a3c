/**
 * Configuration
 *
 * Default configuration and environment variable loading for the bootstrapper.
 *
 * Environment variables:
 * - HOME: root directory for the environment and its markers
 * - TRAVIS_EVENT_TYPE: trigger classification (variable name overridable via BOOTSTRAP_TRIGGER_VAR)
 * - BOOTSTRAP_SCHEDULED_TRIGGER: trigger value that invalidates the cache (default: cron)
 * - BOOTSTRAP_ARCHIVE_URL: installer archive to download
 * - BOOTSTRAP_INSTALLER_DIR / BOOTSTRAP_INSTALLER: extracted installer directory and executable
 * - BOOTSTRAP_INSTALLED_PREFIX: installed directory name before its version suffix
 * - BOOTSTRAP_TARGET_DIR: fixed name the installation is renamed to
 * - BOOTSTRAP_PATCH_FILE: path configuration file to rewrite, relative to the target
 */

import { config as loadDotenv } from 'dotenv';
import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';
import type { BootstrapConfig } from '../core/types.js';
import { installedDirPattern } from '../layout/relocate.js';

export const DEFAULT_ARCHIVE_URL = 'https://dials.diamond.ac.uk/diamond_builds/dials-linux-x86_64.tar.gz';
export const DEFAULT_TRIGGER_VAR = 'TRAVIS_EVENT_TYPE';

/**
 * Load a .env file from the working directory.
 * Variables already present in the environment take precedence.
 */
export function loadEnvFile(path: string = join(process.cwd(), '.env')): void {
  loadDotenv({ path });
}

export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): BootstrapConfig {
  const triggerVar = env.BOOTSTRAP_TRIGGER_VAR || DEFAULT_TRIGGER_VAR;

  return {
    homeDir: resolve(env.HOME || homedir()),
    trigger: env[triggerVar] || undefined,
    scheduledTrigger: env.BOOTSTRAP_SCHEDULED_TRIGGER || 'cron',
    archiveUrl: env.BOOTSTRAP_ARCHIVE_URL || DEFAULT_ARCHIVE_URL,
    installerDirName: env.BOOTSTRAP_INSTALLER_DIR || 'dials-installer-dev',
    installerExecutable: env.BOOTSTRAP_INSTALLER || 'install',
    installedDirPrefix: env.BOOTSTRAP_INSTALLED_PREFIX || 'dials-dev',
    targetDirName: env.BOOTSTRAP_TARGET_DIR || 'build_dials',
    patchFile: env.BOOTSTRAP_PATCH_FILE || join('build', 'setpaths.sh'),
    markerFile: '.cache_valid',
    buildCompleteFile: '.build_complete'
  };
}

export function mergeConfig(
  base: BootstrapConfig,
  overrides: Partial<BootstrapConfig>
): BootstrapConfig {
  return {
    ...base,
    ...overrides,
    homeDir: resolve(overrides.homeDir ?? base.homeDir)
  };
}

function isPlainName(name: string): boolean {
  return name.length > 0 && name !== '.' && name !== '..' && !/[\\/]/.test(name);
}

export function validateConfig(config: BootstrapConfig): string[] {
  const errors: string[] = [];

  if (!config.homeDir) {
    errors.push('homeDir must not be empty');
  }

  let protocol: string | null = null;
  try {
    protocol = new URL(config.archiveUrl).protocol;
  } catch {
    errors.push(`archiveUrl is not a valid URL: ${config.archiveUrl}`);
  }
  if (protocol !== null && protocol !== 'http:' && protocol !== 'https:') {
    errors.push(`archiveUrl must use http or https, got ${protocol}`);
  }

  const names: Array<[string, string]> = [
    ['targetDirName', config.targetDirName],
    ['installerDirName', config.installerDirName],
    ['installedDirPrefix', config.installedDirPrefix],
    ['installerExecutable', config.installerExecutable],
    ['markerFile', config.markerFile],
    ['buildCompleteFile', config.buildCompleteFile]
  ];
  for (const [field, value] of names) {
    if (!isPlainName(value)) {
      errors.push(`${field} must be a plain file name, got "${value}"`);
    }
  }

  if (isPlainName(config.installedDirPrefix) && installedDirPattern(config.installedDirPrefix).test(config.targetDirName)) {
    errors.push(`targetDirName "${config.targetDirName}" must not contain the installed directory pattern ${config.installedDirPrefix}<version>`);
  }

  if (!config.patchFile || isAbsolute(config.patchFile) || config.patchFile.split(/[\\/]/).includes('..')) {
    errors.push(`patchFile must be a relative path inside the target directory, got "${config.patchFile}"`);
  }

  return errors;
}

/**
 * Get a summary of the effective configuration
 */
export function getConfigSummary(config: BootstrapConfig): string {
  const lines: string[] = [
    '=== Bootstrap Configuration ===',
    '',
    `Home directory:      ${config.homeDir}`,
    `Trigger:             ${config.trigger ?? '(not set)'}`,
    `Scheduled trigger:   ${config.scheduledTrigger}`,
    `Archive URL:         ${config.archiveUrl}`,
    `Installer:           ${join(config.installerDirName, config.installerExecutable)}`,
    `Installed prefix:    ${config.installedDirPrefix}<version>`,
    `Target directory:    ${config.targetDirName}`,
    `Patch file:          ${join(config.targetDirName, config.patchFile)}`,
    ''
  ];

  return lines.join('\n');
}
