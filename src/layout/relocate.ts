/**
 * Environment Layout
 *
 * Moves the freshly installed, version-suffixed directory to its fixed name
 * and rewrites the generated path configuration so it follows the rename.
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { escape, glob } from 'glob';
import {
  AmbiguousInstallationError,
  InstallationNotFoundError,
  PatchTargetMissingError
} from '../core/errors.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches the installed directory name: the prefix and its numeric version suffix.
 */
export function installedDirPattern(prefix: string, flags = ''): RegExp {
  return new RegExp(`${escapeRegExp(prefix)}[0-9]*`, flags);
}

/**
 * Locate the single versioned installation directory in homeDir.
 */
export async function findInstalledDir(homeDir: string, prefix: string): Promise<string> {
  const anchored = new RegExp(`^${installedDirPattern(prefix).source}$`);
  const entries = await glob(`${escape(prefix)}*`, { cwd: homeDir, withFileTypes: true });

  const candidates = entries
    .filter((entry) => entry.isDirectory() && anchored.test(entry.name))
    .map((entry) => entry.name)
    .sort();

  if (candidates.length === 0) {
    throw new InstallationNotFoundError(homeDir, prefix);
  }
  if (candidates.length > 1) {
    throw new AmbiguousInstallationError(homeDir, candidates);
  }
  return candidates[0];
}

/**
 * Replace any previous target directory with the installed one.
 * Returns the absolute path of the target directory.
 */
export function replaceTargetDir(homeDir: string, installedName: string, targetName: string): string {
  const targetDir = join(homeDir, targetName);
  rmSync(targetDir, { recursive: true, force: true });
  renameSync(join(homeDir, installedName), targetDir);
  return targetDir;
}

export function countVersionedReferences(text: string, prefix: string): number {
  return text.match(installedDirPattern(prefix, 'g'))?.length ?? 0;
}

/**
 * Rewrite every versioned directory name in the file to the target name, in place.
 * Returns the number of replacements made.
 */
export function patchPathsFile(file: string, prefix: string, targetName: string): number {
  if (!existsSync(file)) {
    throw new PatchTargetMissingError(file);
  }

  const original = readFileSync(file, 'utf-8');
  const replacements = countVersionedReferences(original, prefix);
  const patched = original.replace(installedDirPattern(prefix, 'g'), () => targetName);
  writeFileSync(file, patched, 'utf-8');

  return replacements;
}
