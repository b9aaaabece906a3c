/**
 * ArchiveFetcher
 *
 * Downloads a compressed tar archive and extracts it while it streams in.
 * The archive itself never touches the disk. One attempt, no retries.
 */

import { Readable, Transform, type TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { x as extract } from 'tar';
import { ArchiveDownloadError, ArchiveExtractError } from '../core/errors.js';
import type { DownloadProgressCallback } from '../core/types.js';

export type FetchLike = (url: string) => Promise<Response>;

export interface ArchiveFetcherOptions {
  /** HTTP implementation (defaults to global fetch) */
  fetch?: FetchLike;
  onProgress?: DownloadProgressCallback;
}

/**
 * Counts bytes as they pass through to the extractor.
 */
class ByteCounter extends Transform {
  bytes = 0;

  constructor(private readonly onChunk: (bytes: number) => void) {
    super();
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    this.onChunk(this.bytes);
    callback(null, chunk);
  }
}

export class ArchiveFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly onProgress?: DownloadProgressCallback;

  constructor(options: ArchiveFetcherOptions = {}) {
    this.fetchImpl = options.fetch ?? ((url) => fetch(url));
    this.onProgress = options.onProgress;
  }

  /**
   * Fetch url and unpack it into destDir.
   * Returns the number of bytes received.
   */
  async fetchAndExtract(url: string, destDir: string): Promise<number> {
    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ArchiveDownloadError(url, null, detail, { cause: error });
    }

    if (!response.ok) {
      throw new ArchiveDownloadError(url, response.status, `HTTP ${response.status} ${response.statusText}`.trim());
    }
    if (!response.body) {
      throw new ArchiveDownloadError(url, response.status, 'response has no body');
    }

    const lengthHeader = response.headers.get('content-length');
    const totalBytes = lengthHeader !== null && /^\d+$/.test(lengthHeader) ? Number(lengthHeader) : null;
    const counter = new ByteCounter((received) => this.onProgress?.(received, totalBytes));

    try {
      await pipeline(
        Readable.fromWeb(response.body),
        counter,
        // strict: unreadable entries and non-tar input are errors, not warnings
        extract({ cwd: destDir, strict: true })
      );
    } catch (error) {
      throw new ArchiveExtractError(url, destDir, { cause: error });
    }

    return counter.bytes;
  }
}
