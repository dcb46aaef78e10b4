import { z } from 'zod';
import type { HttpClient } from '../utils/http.js';
import { ResolutionError } from '../utils/errors.js';
import type { StreamSource, StreamSourceProvider, SubtitleTrack } from '../types/stream.js';

export const StreamSourceSchema = z.object({
  file: z.string().default(''),
  proxy_url: z.string().nullish(),
  type: z.string().default('hls'),
  isM3U8: z.boolean().default(true),
});

export const StreamSubtitleSchema = z.object({
  file: z.string().default(''),
  label: z.string().default('Unknown'),
  kind: z.string().default('captions'),
});

export const StreamDataSchema = z.object({
  server_name: z.string().optional(),
  sources: z.array(StreamSourceSchema).default([]),
  subtitles: z.array(StreamSubtitleSchema).default([]),
  headers: z.record(z.string()).default({}),
});

export const StreamResponseSchema = z.object({
  success: z.boolean().default(false),
  episode_id: z.string().optional(),
  server_type: z.string().optional(),
  streams: z.array(StreamDataSchema).default([]),
});
export type StreamResponse = z.infer<typeof StreamResponseSchema>;

/**
 * Client of the catalog's streaming endpoints
 */
export class CatalogClient implements StreamSourceProvider {
  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string,
    private readonly options: { preferServerMp4: boolean } = { preferServerMp4: false }
  ) {}

  streamUrl(episodeId: string, variant: string): string {
    const params = new URLSearchParams({ id: episodeId, server_type: variant });
    return `${this.baseUrl}/api/stream?${params.toString()}`;
  }

  /** Server-side HLS to MP4 conversion endpoint */
  mp4DownloadUrl(episodeId: string, variant: string): string {
    const params = new URLSearchParams({ server_type: variant });
    return `${this.baseUrl}/api/download/mp4/${encodeURIComponent(episodeId)}?${params.toString()}`;
  }

  async getStreamingLinks(episodeId: string, variant: string, signal?: AbortSignal): Promise<StreamResponse> {
    const url = this.streamUrl(episodeId, variant);
    console.log(`[Catalog] GET ${url}`);

    const body = await this.http.getJson(url, { signal });
    const parsed = StreamResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResolutionError(`Unexpected stream response for episode ${episodeId}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }
    return parsed.data;
  }

  async resolveStreamSource(episodeId: string, variant: string, signal?: AbortSignal): Promise<StreamSource> {
    if (this.options.preferServerMp4) {
      return { url: this.mp4DownloadUrl(episodeId, variant), isPlaylist: false, headers: {} };
    }

    const response = await this.getStreamingLinks(episodeId, variant, signal);
    if (response.success) {
      for (const stream of response.streams) {
        for (const source of stream.sources) {
          const url = source.file || source.proxy_url;
          if (url) {
            return {
              url,
              isPlaylist: source.isM3U8 || /\.m3u8(?:[?#]|$)/i.test(url),
              headers: stream.headers,
            };
          }
        }
      }
    }

    throw new ResolutionError(`No stream source available for episode ${episodeId} (${variant})`);
  }

  async getSubtitleTracks(episodeId: string, variant: string, signal?: AbortSignal): Promise<SubtitleTrack[]> {
    const response = await this.getStreamingLinks(episodeId, variant, signal);
    if (!response.success || response.streams.length === 0) {
      console.warn('[Catalog] No stream data available for subtitles');
      return [];
    }

    // Tracks are the same across servers, the first stream is enough
    return response.streams[0].subtitles
      .filter(subtitle => subtitle.file.length > 0)
      .map(subtitle => ({ url: subtitle.file, label: subtitle.label }));
  }
}
