import type { DownloadRecord } from '../types/download.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Optional observer of transfers. Nothing in the engine depends on it
 * succeeding: failures are logged and dropped.
 */
export interface NotificationSink {
  progress(record: DownloadRecord, percent: number): void | Promise<void>;
  completed(record: DownloadRecord): void | Promise<void>;
  failed(record: DownloadRecord, message: string): void | Promise<void>;
  /** Short user-visible message ("Already Downloaded", "Download Failed", ...) */
  notice(title: string, message: string): void | Promise<void>;
}

function episodeTitle(record: DownloadRecord): string {
  return `${record.animeTitle} - Episode ${record.episodeNumber}`;
}

export class ConsoleNotificationSink implements NotificationSink {
  progress(record: DownloadRecord, percent: number): void {
    console.log(`[Notifications] Downloading... ${percent}% ${episodeTitle(record)}`);
  }

  completed(record: DownloadRecord): void {
    console.log(`[Notifications] Download Complete: ${episodeTitle(record)}`);
  }

  failed(record: DownloadRecord, message: string): void {
    console.log(`[Notifications] Download Failed: ${episodeTitle(record)} - ${message}`);
  }

  notice(title: string, message: string): void {
    console.log(`[Notifications] ${title}: ${message}`);
  }
}

export function notifySafely(send: () => void | Promise<void>): void {
  try {
    Promise.resolve(send()).catch((error: unknown) => {
      console.warn(`[Notifications] Failed to deliver notification: ${errorMessage(error)}`);
    });
  } catch (error) {
    console.warn(`[Notifications] Failed to deliver notification: ${errorMessage(error)}`);
  }
}
