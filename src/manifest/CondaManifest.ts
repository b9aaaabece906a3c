/**
 * Conda Manifest
 *
 * Parses the conda package list used for the Windows build environment.
 *
 * Layout:
 * - "# Title" starts a new group; comment lines right below it continue the heading
 * - "#name>=1.0" (no space after the hash) is a disabled entry; other
 *   comments without that space are ignored
 * - anything else is a package spec, optionally followed by " # comment"
 */

import { readFileSync } from 'fs';
import { ManifestParseError } from '../core/errors.js';
import type { CondaManifest, ManifestEntry, ManifestGroup } from '../core/types.js';

// name, then an optional constraint: an operator form (>=1.2, =3.6, ==2.0)
// or a space-separated version/build (1.15.*, 2.0 py36_0)
const SPEC_PATTERN = /^([A-Za-z0-9_][A-Za-z0-9_.\-]*)\s*((?:[<>!=~]=?|==)\s*\S.*|\s\S.*)?$/;
const NAME_START = /^[A-Za-z0-9_]/;

function parseSpec(text: string, line: number, enabled: boolean): ManifestEntry {
  const match = SPEC_PATTERN.exec(text);
  if (!match) {
    throw new ManifestParseError(line, text);
  }
  const constraint = match[2]?.trim().replace(/\s+/g, ' ');
  return {
    name: match[1].toLowerCase(),
    constraint: constraint ? constraint : null,
    enabled,
    line
  };
}

function stripInlineComment(text: string): string {
  const index = text.search(/\s#/);
  return (index === -1 ? text : text.slice(0, index)).trim();
}

export function parseCondaManifest(text: string): CondaManifest {
  const groups: ManifestGroup[] = [];
  let current: ManifestGroup = { title: '', entries: [] };
  let inHeading = false;

  const lines = text.split(/\r?\n/);
  lines.forEach((raw, index) => {
    const lineNumber = index + 1;
    const trimmed = raw.trim();
    if (!trimmed) {
      inHeading = false;
      return;
    }

    if (trimmed.startsWith('#')) {
      const body = trimmed.slice(1);
      if (NAME_START.test(body)) {
        const spec = stripInlineComment(body);
        // "#TODO: ..." and similar notes are plain comments
        if (SPEC_PATTERN.test(spec)) {
          current.entries.push(parseSpec(spec, lineNumber, false));
          inHeading = false;
        }
        return;
      }
      const title = body.replace(/^#+/, '').trim();
      // comment lines directly below a heading continue it
      if (!title || inHeading) return;
      if (current.entries.length > 0) {
        groups.push(current);
      }
      current = { title, entries: [] };
      inHeading = true;
      return;
    }

    current.entries.push(parseSpec(stripInlineComment(trimmed), lineNumber, true));
    inHeading = false;
  });

  if (current.entries.length > 0) {
    groups.push(current);
  }

  return { groups };
}

export function loadCondaManifest(path: string): CondaManifest {
  return parseCondaManifest(readFileSync(path, 'utf-8'));
}

export function manifestEntries(manifest: CondaManifest, options: { includeDisabled?: boolean } = {}): ManifestEntry[] {
  return manifest.groups
    .flatMap((group) => group.entries)
    .filter((entry) => entry.enabled || options.includeDisabled);
}

/**
 * Format entries as conda install specs ("numpy>=1.15", "python 3.6.*").
 */
export function formatSpec(entry: ManifestEntry): string {
  if (entry.constraint === null) return entry.name;
  return /^[<>!=~]/.test(entry.constraint)
    ? `${entry.name}${entry.constraint}`
    : `${entry.name} ${entry.constraint}`;
}

export function manifestSpecs(manifest: CondaManifest, options: { includeDisabled?: boolean } = {}): string[] {
  return manifestEntries(manifest, options).map(formatSpec);
}

/**
 * Package names listed more than once among enabled entries.
 */
export function findDuplicatePackages(manifest: CondaManifest): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const entry of manifestEntries(manifest)) {
    if (seen.has(entry.name)) {
      duplicates.add(entry.name);
    }
    seen.add(entry.name);
  }

  return [...duplicates].sort();
}
