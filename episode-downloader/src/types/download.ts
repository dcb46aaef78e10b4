export type DownloadStatus =
  | 'pending'     // Waiting in the queue
  | 'downloading' // The single active transfer
  | 'completed'   // Video file on disk
  | 'failed'      // Transfer error, retryable
  | 'paused';     // Cancelled by user, retryable

export interface SubtitleRecord {
  label: string;
  language: string;   // ISO 639-1 code or "unknown"
  filePath: string;
}

export interface DownloadRecord {
  key: string;
  animeSlug: string;
  animeTitle: string;
  animeThumbnail: string | null;
  episodeId: string;
  episodeNumber: number;
  episodeTitle: string | null;
  serverVariant: string;  // e.g. "sub" or "dub"
  requestedAt: number;
  status: DownloadStatus;
  progress: number;       // 0.0 - 1.0
  fileSizeBytes: number | null;
  filePath: string | null;
  errorMessage: string | null;
  subtitles: SubtitleRecord[];
}

export interface DownloadRequest {
  animeSlug: string;
  animeTitle: string;
  animeThumbnail?: string | null;
  episodeId: string;
  episodeNumber: number;
  episodeTitle?: string | null;
  serverVariant: string;
}

export interface EnqueueResult {
  accepted: boolean;
  key: string;
  notice: string;
}

export interface AnimeSummary {
  slug: string;
  title: string;
  thumbnail: string | null;
  episodeCount: number;
}

export type DownloadEvent =
  | { type: 'updated'; record: DownloadRecord }
  | { type: 'progress'; key: string; progress: number; fileSizeBytes: number | null }
  | { type: 'removed'; key: string };

export type DownloadListener = (event: DownloadEvent) => void;

/**
 * Deterministic identity of a download: one record per episode and server variant.
 */
// The key doubles as a file and directory name under the downloads root
export function downloadKey(animeSlug: string, episodeNumber: number, serverVariant: string): string {
  return `${withoutSeparators(animeSlug)}_ep${episodeNumber}_${withoutSeparators(serverVariant)}`;
}

function withoutSeparators(part: string): string {
  return part.replace(/[/\\]/g, '_');
}
