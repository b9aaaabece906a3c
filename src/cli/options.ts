/**
 * Shared option handling for CLI commands.
 */

import { getDefaultConfig, loadEnvFile, mergeConfig, validateConfig } from '../config/config.js';
import { ConfigValidationError } from '../core/errors.js';
import type { BootstrapConfig } from '../core/types.js';

export interface CommonOptions {
  home?: string;
  url?: string;
  trigger?: string;
}

/**
 * Build the validated configuration from .env, the environment and CLI flags.
 */
export function resolveConfig(options: CommonOptions): BootstrapConfig {
  loadEnvFile();

  const overrides: Partial<BootstrapConfig> = {};
  if (options.home) overrides.homeDir = options.home;
  if (options.url) overrides.archiveUrl = options.url;
  if (options.trigger) overrides.trigger = options.trigger;

  const config = mergeConfig(getDefaultConfig(), overrides);
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
  return config;
}

export function formatBytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
