/**
 * ci-env-bootstrap
 *
 * Installs a prebuilt scientific build environment into the CI home directory,
 * reusing it across runs while its cache marker is present.
 */

export { EnvironmentBootstrapper } from './bootstrap/EnvironmentBootstrapper.js';
export type { BootstrapDependencies } from './bootstrap/EnvironmentBootstrapper.js';
export { ArchiveFetcher } from './archive/ArchiveFetcher.js';
export type { ArchiveFetcherOptions, FetchLike } from './archive/ArchiveFetcher.js';
export { ProcessInstallerRunner, installerArgs } from './installer/InstallerRunner.js';
export {
  buildCompletePath,
  invalidateCache,
  isBuildComplete,
  isCacheValid,
  markCacheValid,
  markerPath
} from './cache/markers.js';
export {
  countVersionedReferences,
  findInstalledDir,
  installedDirPattern,
  patchPathsFile,
  replaceTargetDir
} from './layout/relocate.js';
export {
  findDuplicatePackages,
  formatSpec,
  loadCondaManifest,
  manifestEntries,
  manifestSpecs,
  parseCondaManifest
} from './manifest/CondaManifest.js';
export {
  getConfigSummary,
  getDefaultConfig,
  loadEnvFile,
  mergeConfig,
  validateConfig
} from './config/config.js';
export { ConsoleLogger, silentLogger } from './core/logger.js';
export type { BootstrapLogger } from './core/logger.js';
export * from './core/errors.js';
export * from './core/types.js';
