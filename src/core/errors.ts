/**
 * Custom Error Classes for the bootstrapper
 */

/**
 * Error thrown when the configuration fails validation
 */
export class ConfigValidationError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.problems = problems;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigValidationError);
    }
  }
}

/**
 * Error thrown when the archive cannot be downloaded
 */
export class ArchiveDownloadError extends Error {
  public readonly url: string;
  public readonly status: number | null;

  constructor(url: string, status: number | null, detail: string, options?: { cause?: unknown }) {
    super(`Failed to download ${url}: ${detail}`, options);
    this.name = 'ArchiveDownloadError';
    this.url = url;
    this.status = status;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArchiveDownloadError);
    }
  }
}

/**
 * Error thrown when the downloaded stream is not a readable tar archive
 */
export class ArchiveExtractError extends Error {
  public readonly url: string;
  public readonly destDir: string;

  constructor(url: string, destDir: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Failed to extract ${url} into ${destDir}: ${reason}`, options);
    this.name = 'ArchiveExtractError';
    this.url = url;
    this.destDir = destDir;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArchiveExtractError);
    }
  }
}

/**
 * Error thrown when the vendor installer cannot be started or exits non-zero
 */
export class InstallerError extends Error {
  public readonly command: string;
  /** Exit code of the installer; null when it never ran or was killed */
  public readonly exitCode: number | null;
  public readonly signal: NodeJS.Signals | null;

  constructor(
    command: string,
    detail: string,
    exitCode: number | null = null,
    signal: NodeJS.Signals | null = null,
    options?: { cause?: unknown }
  ) {
    super(`Installer ${command} failed: ${detail}`, options);
    this.name = 'InstallerError';
    this.command = command;
    this.exitCode = exitCode;
    this.signal = signal;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InstallerError);
    }
  }
}

/**
 * Error thrown when no versioned installation directory exists after install
 */
export class InstallationNotFoundError extends Error {
  public readonly homeDir: string;
  public readonly prefix: string;

  constructor(homeDir: string, prefix: string) {
    super(`No installed directory matching ${prefix}<version> found in ${homeDir}`);
    this.name = 'InstallationNotFoundError';
    this.homeDir = homeDir;
    this.prefix = prefix;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InstallationNotFoundError);
    }
  }
}

/**
 * Error thrown when more than one versioned installation directory exists
 */
export class AmbiguousInstallationError extends Error {
  public readonly candidates: string[];

  constructor(homeDir: string, candidates: string[]) {
    super(`Multiple installed directories found in ${homeDir}: ${candidates.join(', ')}`);
    this.name = 'AmbiguousInstallationError';
    this.candidates = candidates;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AmbiguousInstallationError);
    }
  }
}

/**
 * Error thrown when the path configuration file to patch does not exist
 */
export class PatchTargetMissingError extends Error {
  public readonly path: string;

  constructor(path: string) {
    super(`Path configuration file not found: ${path}`);
    this.name = 'PatchTargetMissingError';
    this.path = path;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PatchTargetMissingError);
    }
  }
}

/**
 * Error thrown when a manifest line is not a valid package spec
 */
export class ManifestParseError extends Error {
  public readonly line: number;
  public readonly text: string;

  constructor(line: number, text: string) {
    super(`Invalid package spec on line ${line}: ${text}`);
    this.name = 'ManifestParseError';
    this.line = line;
    this.text = text;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ManifestParseError);
    }
  }
}

/**
 * Process exit code for a failed run.
 * Installer failures propagate the installer's own exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof InstallerError && error.exitCode !== null && error.exitCode !== 0) {
    return error.exitCode;
  }
  return 1;
}
