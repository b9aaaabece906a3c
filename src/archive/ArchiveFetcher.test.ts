import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { ArchiveFetcher } from './ArchiveFetcher.js';
import { ArchiveDownloadError, ArchiveExtractError } from '../core/errors.js';
import { buildInstallerArchive, createTempDir, fakeFetch, removeTempDir } from '../test/fixtures.js';

const ARCHIVE_URL = 'https://downloads.example.test/env/installer.tar.gz';

describe('ArchiveFetcher', () => {
  let archive: Buffer;
  let dest: string;

  beforeAll(async () => {
    archive = await buildInstallerArchive();
  });

  beforeEach(() => {
    dest = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dest);
  });

  it('should extract the streamed archive without keeping a copy of it', async () => {
    const server = fakeFetch(archive);
    const fetcher = new ArchiveFetcher({ fetch: server.fetch });

    const bytes = await fetcher.fetchAndExtract(ARCHIVE_URL, dest);

    expect(bytes).toBe(archive.length);
    expect(server.calls).toEqual([ARCHIVE_URL]);
    expect(readdirSync(dest)).toEqual(['dials-installer-dev']);
    expect(readFileSync(join(dest, 'dials-installer-dev', 'README'), 'utf-8')).toBe('test installer\n');
    expect(existsSync(join(dest, 'dials-installer-dev', 'install'))).toBe(true);
  });

  it('should report progress against Content-Length', async () => {
    const progress: Array<[number, number | null]> = [];
    const fetcher = new ArchiveFetcher({
      fetch: fakeFetch(archive).fetch,
      onProgress: (received, total) => progress.push([received, total])
    });

    await fetcher.fetchAndExtract(ARCHIVE_URL, dest);

    expect(progress.length).toBeGreaterThan(0);
    expect(progress[progress.length - 1]).toEqual([archive.length, archive.length]);
  });

  it('should report an unknown total without Content-Length', async () => {
    const totals = new Set<number | null>();
    const fetcher = new ArchiveFetcher({
      fetch: fakeFetch(archive, { contentLength: false }).fetch,
      onProgress: (_received, total) => totals.add(total)
    });

    await fetcher.fetchAndExtract(ARCHIVE_URL, dest);

    expect([...totals]).toEqual([null]);
  });

  it('should fail on an HTTP error status without extracting anything', async () => {
    const fetcher = new ArchiveFetcher({ fetch: fakeFetch(archive, { status: 404 }).fetch });

    const attempt = fetcher.fetchAndExtract(ARCHIVE_URL, dest);

    await expect(attempt).rejects.toBeInstanceOf(ArchiveDownloadError);
    await expect(attempt).rejects.toMatchObject({ url: ARCHIVE_URL, status: 404 });
    expect(readdirSync(dest)).toEqual([]);
  });

  it('should wrap network failures', async () => {
    const fetcher = new ArchiveFetcher({
      fetch: async () => {
        throw new Error('getaddrinfo ENOTFOUND downloads.example.test');
      }
    });

    const attempt = fetcher.fetchAndExtract(ARCHIVE_URL, dest);

    await expect(attempt).rejects.toBeInstanceOf(ArchiveDownloadError);
    await expect(attempt).rejects.toMatchObject({ status: null });
    await expect(attempt).rejects.toThrow(
      `Failed to download ${ARCHIVE_URL}: getaddrinfo ENOTFOUND downloads.example.test`
    );
  });

  it('should fail on a truncated archive', async () => {
    const truncated = archive.subarray(0, Math.floor(archive.length / 2));
    const fetcher = new ArchiveFetcher({ fetch: fakeFetch(truncated).fetch });

    await expect(fetcher.fetchAndExtract(ARCHIVE_URL, dest)).rejects.toBeInstanceOf(ArchiveExtractError);
  });
});
