import * as path from 'path';
import { buildStreamHeaders, type HttpClient } from '../utils/http.js';
import { CancellationToken } from '../utils/cancellation.js';
import {
  CancelledError,
  EmptyResultError,
  NetworkError,
  StorageError,
  errorMessage,
} from '../utils/errors.js';
import { formatBytes, truncate } from '../utils/format.js';
import type { FileStorage } from './file-storage.js';

export const SCRATCH_PREFIX = 'temp_';

// Segment fetching covers 0-90%, the merge takes it to 100%
const SEGMENT_PROGRESS_SHARE = 0.9;

export interface TransferProgress {
  progress: number | null;    // null when the total is unknown
  bytes: number | null;
}

export interface TransferOptions {
  headers?: Record<string, string>;
  token?: CancellationToken;
  onProgress?: (update: TransferProgress) => void;
}

export interface TransferResult {
  filePath: string;
  fileSizeBytes: number;
  segmentsTotal: number;
  segmentsDownloaded: number;
}

export interface SegmentEngineOptions {
  minSuccessRatio: number;
  minDirectFileBytes: number;
}

export function scratchDirName(key: string): string {
  return `${SCRATCH_PREFIX}${key}`;
}

export class SegmentEngine {
  constructor(
    private readonly http: HttpClient,
    private readonly storage: FileStorage,
    private readonly options: SegmentEngineOptions = { minSuccessRatio: 0, minDirectFileBytes: 1000 }
  ) {}

  /**
   * Fetch segments strictly in order into a scratch directory, then merge the
   * ones that succeeded into `destination`. A failed segment is skipped.
   */
  async downloadSegments(
    key: string,
    segmentUrls: string[],
    destination: string,
    { headers = {}, token = CancellationToken.none, onProgress }: TransferOptions = {}
  ): Promise<TransferResult> {
    const scratchDir = this.storage.resolve(scratchDirName(key));

    try {
      await this.storage.recreateDir(scratchDir);

      const downloaded: string[] = [];
      let bytes = 0;

      for (let i = 0; i < segmentUrls.length; i++) {
        token.throwIfCancelled();

        const url = segmentUrls[i];
        const segmentPath = path.join(scratchDir, `segment_${String(i).padStart(5, '0')}.ts`);

        try {
          const data = await this.http.getBytes(url, {
            headers: buildStreamHeaders(url, headers),
            signal: token.signal,
          });
          token.throwIfCancelled();

          await this.storage.writeFile(segmentPath, data);
          downloaded.push(segmentPath);
          bytes += data.length;
        } catch (error) {
          if (error instanceof CancelledError || error instanceof StorageError || token.isCancelled) {
            throw error;
          }
          console.warn(`[SegmentEngine] Failed to download segment ${i}: ${errorMessage(error)}`);
        }

        onProgress?.({ progress: ((i + 1) / segmentUrls.length) * SEGMENT_PROGRESS_SHARE, bytes });
      }

      if (downloaded.length === 0) {
        throw new EmptyResultError('No segments were downloaded');
      }

      const ratio = downloaded.length / segmentUrls.length;
      if (ratio < this.options.minSuccessRatio) {
        throw new EmptyResultError(
          `Only ${downloaded.length}/${segmentUrls.length} segments downloaded (minimum ratio ${this.options.minSuccessRatio})`
        );
      }
      if (downloaded.length < segmentUrls.length) {
        console.warn(`[SegmentEngine] Merging ${downloaded.length}/${segmentUrls.length} segments for ${key}`);
      }

      token.throwIfCancelled();
      console.log(`[SegmentEngine] Merging ${downloaded.length} segments...`);

      const fileSizeBytes = await this.storage.concat(destination, downloaded);
      token.throwIfCancelled();
      await this.storage.remove(scratchDir);

      onProgress?.({ progress: 1, bytes: fileSizeBytes });
      console.log(`[SegmentEngine] HLS download complete: ${destination} (${formatBytes(fileSizeBytes)})`);

      return {
        filePath: destination,
        fileSizeBytes,
        segmentsTotal: segmentUrls.length,
        segmentsDownloaded: downloaded.length,
      };
    } catch (error) {
      await this.discard(destination, scratchDir);
      throw token.isCancelled && !(error instanceof CancelledError) ? new CancelledError() : error;
    }
  }

  /**
   * Single streamed download for sources that are not playlists
   */
  async downloadDirect(
    url: string,
    destination: string,
    { headers = {}, token = CancellationToken.none, onProgress }: TransferOptions = {}
  ): Promise<TransferResult> {
    try {
      token.throwIfCancelled();
      console.log(`[SegmentEngine] Starting direct download: ${url}`);

      const { stream, totalBytes } = await this.http.getStream(url, {
        headers: buildStreamHeaders(url, headers),
        signal: token.signal,
      });
      token.throwIfCancelled();

      await this.storage.writeStream(destination, stream, (received) => {
        onProgress?.(totalBytes
          ? { progress: Math.min(received / totalBytes, 1), bytes: totalBytes }
          : { progress: null, bytes: received });
      }, token.signal);
      token.throwIfCancelled();

      const fileSizeBytes = await this.storage.size(destination);
      if (fileSizeBytes === null) {
        throw new StorageError('Downloaded file not found', destination);
      }

      // Tiny bodies are error pages, not media
      if (fileSizeBytes < this.options.minDirectFileBytes) {
        const content = await this.storage.readText(destination);
        throw new NetworkError(`Download failed: ${truncate(content.trim(), 200)}`, undefined, url);
      }

      onProgress?.({ progress: 1, bytes: fileSizeBytes });
      console.log(`[SegmentEngine] Direct download complete: ${destination} (${formatBytes(fileSizeBytes)})`);

      return { filePath: destination, fileSizeBytes, segmentsTotal: 1, segmentsDownloaded: 1 };
    } catch (error) {
      await this.discard(destination);
      throw token.isCancelled && !(error instanceof CancelledError) ? new CancelledError() : error;
    }
  }

  private async discard(...targets: string[]): Promise<void> {
    for (const target of targets) {
      try {
        await this.storage.remove(target);
      } catch (error) {
        console.error(`[SegmentEngine] Failed to clean up ${target}: ${errorMessage(error)}`);
      }
    }
  }
}
