import * as path from 'path';
import { buildStreamHeaders, type HttpClient } from '../utils/http.js';
import { CancellationToken } from '../utils/cancellation.js';
import { errorMessage } from '../utils/errors.js';
import { languageCodeFromLabel, sanitizeFilename } from '../utils/format.js';
import type { SubtitleRecord } from '../types/download.js';
import type { StreamSourceProvider } from '../types/stream.js';
import type { FileStorage } from './file-storage.js';

export const SUBTITLES_DIR = 'subtitles';

/**
 * Best-effort caption download after the video has completed. Never throws:
 * whatever could be fetched is returned, everything else is logged.
 */
export class SubtitleEnricher {
  constructor(
    private readonly http: HttpClient,
    private readonly storage: FileStorage,
    private readonly catalog: StreamSourceProvider
  ) {}

  async fetchSubtitles(
    episodeId: string,
    variant: string,
    baseFilename: string,
    token: CancellationToken = CancellationToken.none
  ): Promise<SubtitleRecord[]> {
    const fetched: SubtitleRecord[] = [];

    try {
      console.log(`[Subtitles] Fetching subtitles for episode: ${episodeId}`);
      const tracks = await this.catalog.getSubtitleTracks(episodeId, variant, token.signal);

      if (tracks.length === 0) {
        console.log('[Subtitles] No subtitles available for this episode');
        return fetched;
      }
      console.log(`[Subtitles] Found ${tracks.length} subtitle tracks to download`);

      const subtitleDir = this.storage.resolve(SUBTITLES_DIR);
      await this.storage.ensureDir(subtitleDir);
      const usedPaths = new Set<string>();

      for (const track of tracks) {
        if (!track.url) continue;
        if (token.isCancelled) {
          console.log(`[Subtitles] Cancelled, stopping after ${fetched.length} track(s)`);
          break;
        }

        try {
          const filePath = uniquePath(
            path.join(subtitleDir, `${baseFilename}_${sanitizeFilename(track.label)}`),
            usedPaths
          );
          const content = await this.http.getText(track.url, {
            headers: buildStreamHeaders(track.url),
            signal: token.signal,
          });
          await this.storage.writeFile(filePath, content);

          fetched.push({
            label: track.label,
            language: languageCodeFromLabel(track.label),
            filePath,
          });
          console.log(`[Subtitles] Downloaded subtitle: ${track.label}`);
        } catch (error) {
          console.warn(`[Subtitles] Failed to download subtitle ${track.label}: ${errorMessage(error)}`);
        }
      }
    } catch (error) {
      console.warn(`[Subtitles] Failed to download subtitles: ${errorMessage(error)}`);
    }

    return fetched;
  }
}

// Two tracks with the same label must not overwrite each other
function uniquePath(base: string, used: Set<string>): string {
  let candidate = `${base}.vtt`;
  for (let n = 2; used.has(candidate); n++) {
    candidate = `${base}_${n}.vtt`;
  }
  used.add(candidate);
  return candidate;
}
