import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import type { RecordStore } from '../db/repository.js';
import type { DownloadRecord } from '../types/download.js';
import type { StreamSource, StreamSourceProvider, SubtitleTrack } from '../types/stream.js';
import { NetworkError } from '../utils/errors.js';
import type { HttpClient, RequestOptions, StreamedBody } from '../utils/http.js';

export type FakeBody = string | Buffer;
export type FakeRoute = FakeBody | Error | ((options: RequestOptions) => Promise<FakeBody>);

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * In-process HttpClient: every URL is answered from a route table, unknown
 * URLs fail like a 404.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, FakeRoute>();

  on(url: string, route: FakeRoute): this {
    this.routes.set(url, route);
    return this;
  }

  requestedUrls(): string[] {
    return this.requests.map(request => request.url);
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const body = await this.respond(url, options);
    return typeof body === 'string' ? body : body.toString('utf-8');
  }

  async getBytes(url: string, options: RequestOptions = {}): Promise<Buffer> {
    const body = await this.respond(url, options);
    return typeof body === 'string' ? Buffer.from(body) : body;
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    return JSON.parse(await this.getText(url, options));
  }

  async getStream(url: string, options: RequestOptions = {}): Promise<StreamedBody> {
    const body = await this.getBytes(url, options);
    return { stream: Readable.from([body]), totalBytes: body.length };
  }

  private async respond(url: string, options: RequestOptions): Promise<FakeBody> {
    this.requests.push({ url, headers: options.headers ?? {} });

    const route = this.routes.get(url);
    if (route === undefined) {
      throw new NetworkError(`HTTP 404 for ${url}`, 404, url);
    }
    if (route instanceof Error) {
      throw route;
    }
    if (typeof route === 'function') {
      return route(options);
    }
    return route;
  }
}

export type FakeSource = StreamSource | Error | ((signal?: AbortSignal) => Promise<StreamSource>);

export class FakeCatalog implements StreamSourceProvider {
  readonly sources = new Map<string, FakeSource>();
  readonly subtitles = new Map<string, SubtitleTrack[] | Error>();
  readonly resolved: string[] = [];

  async resolveStreamSource(episodeId: string, _variant: string, signal?: AbortSignal): Promise<StreamSource> {
    this.resolved.push(episodeId);
    const source = this.sources.get(episodeId);
    if (source === undefined) {
      throw new Error(`No source for ${episodeId}`);
    }
    if (source instanceof Error) {
      throw source;
    }
    return typeof source === 'function' ? source(signal) : source;
  }

  async getSubtitleTracks(episodeId: string): Promise<SubtitleTrack[]> {
    const tracks = this.subtitles.get(episodeId) ?? [];
    if (tracks instanceof Error) {
      throw tracks;
    }
    return tracks;
  }
}

export class MemoryRecordStore implements RecordStore {
  saved: DownloadRecord[] = [];
  saveCount = 0;

  constructor(initial: DownloadRecord[] = []) {
    this.saved = structuredClone(initial);
  }

  loadRecords(): DownloadRecord[] {
    return structuredClone(this.saved);
  }

  saveRecords(records: DownloadRecord[]): void {
    this.saved = structuredClone(records);
    this.saveCount++;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  // Rejecting before anyone awaits must not count as an unhandled rejection
  promise.catch(() => undefined);
  return { promise, resolve, reject };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'episode-dl-'));
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

export function makeRecord(overrides: Partial<DownloadRecord> = {}): DownloadRecord {
  return {
    key: 'frieren_ep1_sub',
    animeSlug: 'frieren',
    animeTitle: 'Frieren',
    animeThumbnail: null,
    episodeId: 'frieren-ep-1',
    episodeNumber: 1,
    episodeTitle: null,
    serverVariant: 'sub',
    requestedAt: 1700000000000,
    status: 'pending',
    progress: 0,
    fileSizeBytes: null,
    filePath: null,
    errorMessage: null,
    subtitles: [],
    ...overrides,
  };
}
