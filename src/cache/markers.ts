/**
 * Cache Markers
 *
 * Zero-byte files under the home directory whose existence records state:
 * - .cache_valid: the environment was fully installed and patched
 * - .build_complete: written by the downstream build step; only ever cleared here
 */

import { existsSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { BootstrapConfig, InvalidationResult } from '../core/types.js';

type MarkerConfig = Pick<BootstrapConfig, 'homeDir' | 'markerFile' | 'buildCompleteFile'>;

export function markerPath(config: MarkerConfig): string {
  return join(config.homeDir, config.markerFile);
}

export function buildCompletePath(config: MarkerConfig): string {
  return join(config.homeDir, config.buildCompleteFile);
}

export function isCacheValid(config: MarkerConfig): boolean {
  return existsSync(markerPath(config));
}

export function isBuildComplete(config: MarkerConfig): boolean {
  return existsSync(buildCompletePath(config));
}

/**
 * Delete both markers. Missing markers are not an error.
 */
export function invalidateCache(config: MarkerConfig): InvalidationResult {
  const removed: string[] = [];

  for (const path of [markerPath(config), buildCompletePath(config)]) {
    if (existsSync(path)) {
      removed.push(path);
    }
    rmSync(path, { force: true });
  }

  return { removed };
}

/**
 * Record that a bootstrap cycle completed.
 */
export function markCacheValid(config: MarkerConfig): string {
  const path = markerPath(config);
  writeFileSync(path, '');
  return path;
}
