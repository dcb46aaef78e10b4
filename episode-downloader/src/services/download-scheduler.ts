import type { RecordStore } from '../db/repository.js';
import type { HttpClient } from '../utils/http.js';
import { CancellationSource } from '../utils/cancellation.js';
import { CancelledError, errorMessage } from '../utils/errors.js';
import { formatBytes, truncate } from '../utils/format.js';
import {
  downloadKey,
  type AnimeSummary,
  type DownloadEvent,
  type DownloadListener,
  type DownloadRecord,
  type DownloadRequest,
  type DownloadStatus,
  type EnqueueResult,
} from '../types/download.js';
import type { StreamSourceProvider } from '../types/stream.js';
import type { FileStorage } from './file-storage.js';
import { notifySafely, type NotificationSink } from './notifications.js';
import { PlaylistResolver } from './playlist-resolver.js';
import { SCRATCH_PREFIX, SegmentEngine, scratchDirName, type TransferProgress, type TransferResult } from './segment-engine.js';
import { SubtitleEnricher } from './subtitles.js';

const CANCELLED_MESSAGE = 'Cancelled by user';
// Percentage points between two progress notifications
const NOTIFY_STEP = 2;

export interface DownloadSchedulerOptions {
  maxPlaylistDepth: number;
  minSegmentSuccessRatio: number;
  minDirectFileBytes: number;
}

export interface DownloadSchedulerDeps {
  store: RecordStore;
  storage: FileStorage;
  http: HttpClient;
  catalog: StreamSourceProvider;
  notifications?: NotificationSink;
  options?: Partial<DownloadSchedulerOptions>;
}

const DEFAULT_OPTIONS: DownloadSchedulerOptions = {
  maxPlaylistDepth: 5,
  minSegmentSuccessRatio: 0,
  minDirectFileBytes: 1000,
};

/**
 * Owns the record set and the queue. A single worker drains the queue, so at
 * most one record is `downloading` at any time.
 */
export class DownloadScheduler {
  private records = new Map<string, DownloadRecord>();
  private readonly queue: string[] = [];
  private readonly cancellations = new Map<string, CancellationSource>();
  private readonly listeners = new Set<DownloadListener>();
  private activeKey: string | null = null;
  private worker: Promise<void> | null = null;
  private lastNotifiedPercent = 0;

  private readonly store: RecordStore;
  private readonly storage: FileStorage;
  private readonly catalog: StreamSourceProvider;
  private readonly notifications: NotificationSink | null;
  private readonly resolver: PlaylistResolver;
  private readonly engine: SegmentEngine;
  private readonly subtitles: SubtitleEnricher;

  constructor(deps: DownloadSchedulerDeps) {
    const options = { ...DEFAULT_OPTIONS, ...deps.options };

    this.store = deps.store;
    this.storage = deps.storage;
    this.catalog = deps.catalog;
    this.notifications = deps.notifications ?? null;
    this.resolver = new PlaylistResolver(deps.http, { maxDepth: options.maxPlaylistDepth });
    this.engine = new SegmentEngine(deps.http, deps.storage, {
      minSuccessRatio: options.minSegmentSuccessRatio,
      minDirectFileBytes: options.minDirectFileBytes,
    });
    this.subtitles = new SubtitleEnricher(deps.http, deps.storage, deps.catalog);
  }

  subscribe(listener: DownloadListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: DownloadEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.warn(`[Scheduler] Listener failed on ${event.type}: ${errorMessage(error)}`);
      }
    }
  }

  enqueue(request: DownloadRequest): EnqueueResult {
    const key = downloadKey(request.animeSlug, request.episodeNumber, request.serverVariant);
    const existing = this.records.get(key);
    const label = `${request.animeTitle} - Episode ${request.episodeNumber}`;

    if (existing?.status === 'completed') {
      this.notice('Already Downloaded', `${label} is already downloaded`);
      return { accepted: false, key, notice: 'Already Downloaded' };
    }
    if (existing?.status === 'downloading' || existing?.status === 'pending') {
      this.notice('Download in Progress', `${label} is already being downloaded`);
      return { accepted: false, key, notice: 'Download in Progress' };
    }

    const record: DownloadRecord = {
      key,
      animeSlug: request.animeSlug,
      animeTitle: request.animeTitle,
      animeThumbnail: request.animeThumbnail ?? null,
      episodeId: request.episodeId,
      episodeNumber: request.episodeNumber,
      episodeTitle: request.episodeTitle ?? null,
      serverVariant: request.serverVariant,
      requestedAt: Date.now(),
      status: 'pending',
      progress: 0,
      fileSizeBytes: null,
      filePath: null,
      errorMessage: null,
      subtitles: [],
    };

    // Newest first
    this.records = new Map<string, DownloadRecord>([
      [key, record],
      ...[...this.records].filter(([existingKey]) => existingKey !== key),
    ]);
    this.pushToQueue(key);
    this.persist();
    this.emit({ type: 'updated', record });

    console.log(`[Scheduler] Queued: ${key}`);
    this.notice('Download Started', label);
    this.kick();

    return { accepted: true, key, notice: 'Download Started' };
  }

  /**
   * Returns false when the key is unknown
   */
  cancel(key: string): boolean {
    const record = this.records.get(key);
    if (!record) return false;

    this.cancellations.get(key)?.cancel(CANCELLED_MESSAGE);
    this.removeFromQueue(key);

    // A downloading record is moved to paused by the worker once the transfer stops
    if (record.status === 'pending') {
      this.update(key, { status: 'paused', errorMessage: CANCELLED_MESSAGE });
      this.persist();
    }

    console.log(`[Scheduler] Cancel requested: ${key}`);
    return true;
  }

  /**
   * Re-queue a failed or paused download. Returns false for any other state.
   */
  retry(key: string): boolean {
    const record = this.records.get(key);
    if (!record || (record.status !== 'failed' && record.status !== 'paused')) {
      return false;
    }

    this.update(key, { status: 'pending', progress: 0, errorMessage: null });
    this.pushToQueue(key);
    this.persist();

    console.log(`[Scheduler] Retrying: ${key}`);
    this.kick();
    return true;
  }

  /**
   * Cancel, remove the video and subtitle files, forget the record.
   * Unknown keys are a no-op and return false.
   */
  async delete(key: string): Promise<boolean> {
    const record = this.records.get(key);
    if (!record) return false;

    this.cancellations.get(key)?.cancel(CANCELLED_MESSAGE);
    this.removeFromQueue(key);
    this.records.delete(key);
    this.persist();
    this.emit({ type: 'removed', key });

    await this.removeFiles(record);
    console.log(`[Scheduler] Deleted: ${key}`);
    return true;
  }

  async deleteAll(): Promise<number> {
    const deleted = await this.deleteWhere(() => true);
    await this.removeOrphanedScratchDirs();
    return deleted;
  }

  async deleteCompleted(): Promise<number> {
    const deleted = await this.deleteWhere(record => record.status === 'completed');
    await this.removeOrphanedScratchDirs();
    return deleted;
  }

  async deleteAnimeDownloads(animeSlug: string): Promise<number> {
    return this.deleteWhere(record => record.animeSlug === animeSlug);
  }

  /**
   * Reload the persisted set. Transfers interrupted by a shutdown go back to
   * the queue, oldest request first.
   */
  resumeOnStartup(): void {
    this.records = new Map(
      this.store.loadRecords().map((record): [string, DownloadRecord] => [record.key, record])
    );

    for (const record of this.records.values()) {
      if (record.status === 'downloading') {
        this.update(record.key, { status: 'pending', progress: 0 });
        console.log(`[Scheduler] Reset interrupted download: ${record.key}`);
      }
    }

    const pending = [...this.records.values()]
      .filter(record => record.status === 'pending')
      .sort((a, b) => a.requestedAt - b.requestedAt);
    for (const record of pending) {
      this.pushToQueue(record.key);
    }

    this.persist();
    console.log(`[Scheduler] Restored ${this.records.size} downloads, ${this.queue.length} queued`);
    this.kick();
  }

  /**
   * Resolves once the worker has drained the queue
   */
  async whenIdle(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  getDownload(key: string): DownloadRecord | null {
    return this.records.get(key) ?? null;
  }

  getAll(status?: DownloadStatus): DownloadRecord[] {
    const all = [...this.records.values()];
    return status ? all.filter(record => record.status === status) : all;
  }

  getQueue(): string[] {
    return [...this.queue];
  }

  getActiveKey(): string | null {
    return this.activeKey;
  }

  isDownloaded(animeSlug: string, episodeNumber: number, serverVariant: string): boolean {
    return this.records.get(downloadKey(animeSlug, episodeNumber, serverVariant))?.status === 'completed';
  }

  isDownloading(animeSlug: string, episodeNumber: number, serverVariant: string): boolean {
    const status = this.records.get(downloadKey(animeSlug, episodeNumber, serverVariant))?.status;
    return status === 'downloading' || status === 'pending';
  }

  getDownloadsForAnime(animeSlug: string): DownloadRecord[] {
    return [...this.records.values()]
      .filter(record => record.animeSlug === animeSlug)
      .sort((a, b) => a.episodeNumber - b.episodeNumber);
  }

  /** Anime with at least one completed episode, with their completed count */
  getAnimeSummaries(): AnimeSummary[] {
    const summaries = new Map<string, AnimeSummary>();
    for (const record of this.records.values()) {
      if (record.status !== 'completed') continue;

      const summary = summaries.get(record.animeSlug);
      if (summary) {
        summary.episodeCount++;
      } else {
        summaries.set(record.animeSlug, {
          slug: record.animeSlug,
          title: record.animeTitle,
          thumbnail: record.animeThumbnail,
          episodeCount: 1,
        });
      }
    }
    return [...summaries.values()];
  }

  totalDownloadSize(): number {
    let total = 0;
    for (const record of this.records.values()) {
      if (record.status === 'completed') {
        total += record.fileSizeBytes ?? 0;
      }
    }
    return total;
  }

  private kick(): void {
    if (this.worker) return;

    this.worker = this.runWorker().finally(() => {
      this.worker = null;
      // Something may have been queued between the last check and now
      if (this.queue.length > 0) {
        this.kick();
      }
    });
  }

  private async runWorker(): Promise<void> {
    while (this.queue.length > 0) {
      const key = this.queue.shift();
      if (key === undefined) break;

      const record = this.records.get(key);
      if (!record || record.status !== 'pending') continue;

      await this.processDownload(record);
    }
  }

  private async processDownload(record: DownloadRecord): Promise<void> {
    const { key } = record;
    const source = new CancellationSource();

    // Synchronous up to the first await, so the record is `downloading` as
    // soon as the worker picks it up
    this.activeKey = key;
    this.cancellations.set(key, source);
    this.lastNotifiedPercent = 0;
    this.update(key, { status: 'downloading', progress: 0, errorMessage: null });
    this.persist();
    console.log(`[Scheduler] Starting: ${key}`);

    try {
      const result = await this.transfer(record, source);
      if (await this.complete(key, result, source)) {
        await this.enrichWithSubtitles(key, source);
      }
    } catch (error) {
      await this.fail(key, error, source);
    } finally {
      this.activeKey = null;
      if (this.cancellations.get(key) === source) {
        this.cancellations.delete(key);
      }
    }
  }

  private async transfer(record: DownloadRecord, source: CancellationSource): Promise<TransferResult> {
    const { key } = record;
    const token = source.token;
    const onProgress = (update: TransferProgress) => this.reportProgress(key, update);

    await this.storage.ensureDir(this.storage.root);

    const stream = await this.catalog.resolveStreamSource(record.episodeId, record.serverVariant, token.signal);
    token.throwIfCancelled();

    if (stream.isPlaylist) {
      const playlist = await this.resolver.resolve(stream.url, stream.headers, token);
      console.log(`[Scheduler] ${key}: ${playlist.segments.length} segments`);
      return this.engine.downloadSegments(key, playlist.segments, this.storage.resolve(`${key}.ts`), {
        headers: stream.headers,
        token,
        onProgress,
      });
    }

    return this.engine.downloadDirect(stream.url, this.storage.resolve(`${key}.mp4`), {
      headers: stream.headers,
      token,
      onProgress,
    });
  }

  private async complete(key: string, result: TransferResult, source: CancellationSource): Promise<boolean> {
    // Deleted or cancelled while the last bytes were being written
    if (source.isCancelled || this.records.get(key)?.status !== 'downloading') {
      await this.fail(key, new CancelledError(), source);
      return false;
    }

    const record = this.update(key, {
      status: 'completed',
      progress: 1,
      filePath: result.filePath,
      fileSizeBytes: result.fileSizeBytes,
      errorMessage: null,
    });
    if (!record) return false;

    this.persist();
    console.log(`[Scheduler] Completed: ${key} (${formatBytes(result.fileSizeBytes)})`);

    const sink = this.notifications;
    if (sink) {
      notifySafely(() => sink.completed(record));
    }
    return true;
  }

  private async enrichWithSubtitles(key: string, source: CancellationSource): Promise<void> {
    const record = this.records.get(key);
    if (!record || record.status !== 'completed') return;

    const subtitles = await this.subtitles.fetchSubtitles(record.episodeId, record.serverVariant, key, source.token);
    if (subtitles.length === 0) return;

    const current = this.records.get(key);
    if (!current || current.status !== 'completed') {
      // Deleted while the pass was running
      await this.removePaths(subtitles.map(subtitle => subtitle.filePath));
      return;
    }

    this.update(key, { subtitles: [...current.subtitles, ...subtitles] });
    this.persist();
    console.log(`[Scheduler] Saved ${subtitles.length} subtitle(s) for ${key}`);
  }

  private async fail(key: string, error: unknown, source: CancellationSource): Promise<void> {
    const cancelled = error instanceof CancelledError || source.isCancelled;

    await this.removePaths([
      this.storage.resolve(scratchDirName(key)),
      this.storage.resolve(`${key}.ts`),
      this.storage.resolve(`${key}.mp4`),
    ]);

    // Deleted or re-queued in the meantime
    if (this.records.get(key)?.status !== 'downloading') return;

    if (cancelled) {
      this.update(key, { status: 'paused', errorMessage: CANCELLED_MESSAGE });
      this.persist();
      console.log(`[Scheduler] Paused: ${key}`);
      return;
    }

    const message = errorMessage(error);
    const record = this.update(key, { status: 'failed', errorMessage: message });
    this.persist();
    console.error(`[Scheduler] Failed: ${key} - ${message}`);

    const sink = this.notifications;
    if (record && sink) {
      notifySafely(() => sink.failed(record, message));
    }
    this.notice('Download Failed', truncate(message, 50));
  }

  private reportProgress(key: string, update: TransferProgress): void {
    const current = this.records.get(key);
    if (!current || current.status !== 'downloading') return;

    const progress = update.progress === null ? current.progress : Math.max(current.progress, update.progress);
    const fileSizeBytes = update.bytes ?? current.fileSizeBytes;
    const record = { ...current, progress, fileSizeBytes };
    this.records.set(key, record);

    this.emit({ type: 'progress', key, progress, fileSizeBytes });

    const percent = Math.floor(progress * 100);
    const sink = this.notifications;
    if (sink && percent - this.lastNotifiedPercent >= NOTIFY_STEP) {
      this.lastNotifiedPercent = percent;
      notifySafely(() => sink.progress(record, percent));
    }
  }

  private update(key: string, patch: Partial<Omit<DownloadRecord, 'key'>>): DownloadRecord | null {
    const current = this.records.get(key);
    if (!current) return null;

    const record = { ...current, ...patch };
    this.records.set(key, record);
    this.emit({ type: 'updated', record });
    return record;
  }

  private pushToQueue(key: string): void {
    if (!this.queue.includes(key)) {
      this.queue.push(key);
    }
  }

  private removeFromQueue(key: string): void {
    const index = this.queue.indexOf(key);
    if (index !== -1) {
      this.queue.splice(index, 1);
    }
  }

  private persist(): void {
    try {
      this.store.saveRecords([...this.records.values()]);
    } catch (error) {
      console.error(`[Scheduler] Failed to persist downloads: ${errorMessage(error)}`);
    }
  }

  private notice(title: string, message: string): void {
    const sink = this.notifications;
    if (sink) {
      notifySafely(() => sink.notice(title, message));
    }
  }

  private async deleteWhere(predicate: (record: DownloadRecord) => boolean): Promise<number> {
    const keys = [...this.records.values()].filter(predicate).map(record => record.key);
    let deleted = 0;
    for (const key of keys) {
      if (await this.delete(key)) {
        deleted++;
      }
    }
    return deleted;
  }

  private async removeFiles(record: DownloadRecord): Promise<void> {
    const paths = record.subtitles.map(subtitle => subtitle.filePath);
    if (record.filePath) {
      paths.unshift(record.filePath);
    }
    await this.removePaths(paths);
  }

  private async removePaths(paths: string[]): Promise<void> {
    for (const target of paths) {
      try {
        await this.storage.remove(target);
      } catch (error) {
        console.error(`[Scheduler] Failed to remove ${target}: ${errorMessage(error)}`);
      }
    }
  }

  private async removeOrphanedScratchDirs(): Promise<void> {
    const activeScratch = this.activeKey ? scratchDirName(this.activeKey) : null;
    const dirs = await this.storage.listDirectories(this.storage.root);
    const orphans = dirs.filter(name => name.startsWith(SCRATCH_PREFIX) && name !== activeScratch);
    await this.removePaths(orphans.map(name => this.storage.resolve(name)));

    if (orphans.length > 0) {
      console.log(`[Scheduler] Removed ${orphans.length} orphaned scratch director${orphans.length === 1 ? 'y' : 'ies'}`);
    }
  }
}
