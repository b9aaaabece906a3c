/**
 * Core Types
 *
 * Central type definitions for the build environment bootstrapper.
 */

// ==========================================
// CONFIGURATION TYPES
// ==========================================

export interface BootstrapConfig {
  /** Root for all cache state; the environment is installed beneath it */
  homeDir: string;
  /** Trigger classification of the current CI run (e.g. "push", "cron") */
  trigger?: string;
  /** Trigger value that forces cache invalidation */
  scheduledTrigger: string;
  /** Compressed tar archive containing the vendor installer */
  archiveUrl: string;
  /** Directory the archive extracts its installer into */
  installerDirName: string;
  /** Installer executable inside installerDirName */
  installerExecutable: string;
  /** Name of the installed directory, before its version suffix */
  installedDirPrefix: string;
  /** Fixed name the installed directory is renamed to */
  targetDirName: string;
  /** Generated path configuration file, relative to the target directory */
  patchFile: string;
  markerFile: string;
  buildCompleteFile: string;
}

// ==========================================
// BOOTSTRAP RUN TYPES
// ==========================================

export type BootstrapPhase =
  | 'invalidate'
  | 'check'
  | 'download'
  | 'install'
  | 'relocate'
  | 'patch'
  | 'mark';

export interface CachedOutcome {
  action: 'cached';
  invalidated: false;
  targetDir: string;
}

export interface RebuiltOutcome {
  action: 'rebuilt';
  /** Whether the scheduled trigger cleared the markers first */
  invalidated: boolean;
  bytesDownloaded: number;
  installedDir: string;
  targetDir: string;
  /** Versioned references rewritten in the patch file */
  replacements: number;
  durationMs: number;
}

export type BootstrapOutcome = CachedOutcome | RebuiltOutcome;

export interface InvalidationResult {
  /** Marker paths that existed and were removed */
  removed: string[];
}

export interface EnvironmentState {
  cacheValid: boolean;
  buildComplete: boolean;
  targetDir: string;
  targetExists: boolean;
  patchFile: string;
  patchFileExists: boolean;
  /** Versioned references left in the patch file; null when it is missing */
  versionedReferences: number | null;
}

// ==========================================
// DOWNLOAD / INSTALL TYPES
// ==========================================

export type DownloadProgressCallback = (receivedBytes: number, totalBytes: number | null) => void;

export interface InstallerInvocation {
  installerDir: string;
  executable: string;
  prefix: string;
}

export interface InstallerRunner {
  run(invocation: InstallerInvocation): Promise<void>;
}

// ==========================================
// MANIFEST TYPES
// ==========================================

export interface ManifestEntry {
  name: string;
  /** Version constraint as written after the name; null when unconstrained */
  constraint: string | null;
  /** False for entries that are commented out */
  enabled: boolean;
  line: number;
}

export interface ManifestGroup {
  /** Heading comment of the group; empty for entries before the first heading */
  title: string;
  entries: ManifestEntry[];
}

export interface CondaManifest {
  groups: ManifestGroup[];
}
