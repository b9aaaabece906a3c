/**
 * Test fixtures: temporary home directories, installer archives,
 * an in-process fetch and an in-process installer.
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { c as createTar } from 'tar';
import { getDefaultConfig, mergeConfig } from '../config/config.js';
import { InstallerError } from '../core/errors.js';
import type { BootstrapConfig, InstallerInvocation, InstallerRunner } from '../core/types.js';
import type { FetchLike } from '../archive/ArchiveFetcher.js';

export const INSTALLED_NAME = 'dials-dev20261019';

export function createTempDir(label = 'home'): string {
  return mkdtempSync(join(tmpdir(), `env-bootstrap-${label}-`));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function testConfig(homeDir: string, overrides: Partial<BootstrapConfig> = {}): BootstrapConfig {
  return mergeConfig(getDefaultConfig({ HOME: homeDir }), {
    archiveUrl: 'https://downloads.example.test/env/installer.tar.gz',
    ...overrides
  });
}

/**
 * Build a gzipped tarball holding an installer directory.
 */
export async function buildInstallerArchive(installerDirName = 'dials-installer-dev'): Promise<Buffer> {
  const staging = createTempDir('archive');
  try {
    const installerDir = join(staging, installerDirName);
    mkdirSync(installerDir, { recursive: true });
    writeFileSync(join(installerDir, 'install'), '#!/bin/sh\nexit 0\n', { mode: 0o755 });
    writeFileSync(join(installerDir, 'README'), 'test installer\n');

    const archivePath = join(staging, 'installer.tar.gz');
    await createTar({ gzip: true, file: archivePath, cwd: staging }, [installerDirName]);
    return readFileSync(archivePath);
  } finally {
    removeTempDir(staging);
  }
}

export interface FakeFetch {
  fetch: FetchLike;
  calls: string[];
}

/**
 * Serves body for every request, recording the requested URLs.
 */
export function fakeFetch(body: Buffer, init: { status?: number; contentLength?: boolean } = {}): FakeFetch {
  const calls: string[] = [];
  const status = init.status ?? 200;
  const headers: Record<string, string> = init.contentLength === false
    ? {}
    : { 'content-length': String(body.length) };

  return {
    calls,
    fetch: async (url: string) => {
      calls.push(url);
      return new Response(status === 200 ? new Uint8Array(body) : 'not found', { status, headers });
    }
  };
}

export function pathsFileContent(prefix: string, installedName = INSTALLED_NAME): string {
  return [
    '#!/bin/sh',
    `export BUILD_ROOT="${prefix}/${installedName}/build"`,
    `export PATH="${prefix}/${installedName}/build/bin:$PATH"`,
    `. "${prefix}/${installedName}/modules/setup.sh"`,
    ''
  ].join('\n');
}

/**
 * Stands in for the vendor installer: lays out a versioned installation
 * under the prefix, or fails with the configured exit code.
 */
export class FakeInstaller implements InstallerRunner {
  readonly invocations: InstallerInvocation[] = [];

  constructor(
    private readonly options: { exitCode?: number; installedNames?: string[] } = {}
  ) {}

  async run(invocation: InstallerInvocation): Promise<void> {
    this.invocations.push(invocation);

    if (this.options.exitCode) {
      throw new InstallerError(
        join(invocation.installerDir, invocation.executable),
        `exited with code ${this.options.exitCode}`,
        this.options.exitCode
      );
    }

    for (const name of this.options.installedNames ?? [INSTALLED_NAME]) {
      const buildDir = join(invocation.prefix, name, 'build');
      mkdirSync(buildDir, { recursive: true });
      writeFileSync(join(buildDir, 'setpaths.sh'), pathsFileContent(invocation.prefix, name));
    }
  }
}
