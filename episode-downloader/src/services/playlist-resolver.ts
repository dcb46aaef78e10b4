/**
 * HLS playlist resolution: master playlists are followed to their best
 * variant, media playlists are flattened to an ordered list of segment URLs.
 */

import { buildStreamHeaders, type HttpClient } from '../utils/http.js';
import { CancellationToken } from '../utils/cancellation.js';
import { ResolutionError } from '../utils/errors.js';

const STREAM_INF_TAG = '#EXT-X-STREAM-INF:';
// Anchored so AVERAGE-BANDWIDTH is not picked up
const BANDWIDTH_ATTRIBUTE = /(?:^|[:,])BANDWIDTH=(\d+)/;

export interface PlaylistVariant {
  bandwidth: number;
  uri: string;
}

export type ParsedPlaylist =
  | { kind: 'master'; variants: PlaylistVariant[] }
  | { kind: 'media'; segments: string[] };

export interface ResolvedPlaylist {
  playlistUrl: string;  // URL of the media playlist the segments came from
  segments: string[];
  hops: number;         // master playlists followed to get there
}

/**
 * Absolute URIs are kept, "/path" attaches to the playlist's origin and
 * anything else to the playlist's directory.
 */
export function resolvePlaylistUri(uri: string, playlistUrl: string): string {
  try {
    return new URL(uri, playlistUrl).toString();
  } catch {
    throw new ResolutionError(`Invalid URI "${uri}" in playlist ${playlistUrl}`);
  }
}

function isUriLine(line: string): boolean {
  return line.length > 0 && !line.startsWith('#');
}

export function parsePlaylist(text: string, playlistUrl: string): ParsedPlaylist {
  const lines = text.split('\n').map(line => line.trim());

  if (lines.some(line => line.startsWith(STREAM_INF_TAG))) {
    const variants: PlaylistVariant[] = [];

    for (let i = 0; i < lines.length; i++) {
      if (!lines[i].startsWith(STREAM_INF_TAG)) continue;

      const match = BANDWIDTH_ATTRIBUTE.exec(lines[i].substring(STREAM_INF_TAG.length - 1));
      const bandwidth = match ? parseInt(match[1], 10) : 0;

      // The variant URI is the next non-empty, non-comment line
      for (let j = i + 1; j < lines.length; j++) {
        if (lines[j].startsWith(STREAM_INF_TAG)) break;
        if (isUriLine(lines[j])) {
          variants.push({ bandwidth, uri: resolvePlaylistUri(lines[j], playlistUrl) });
          break;
        }
      }
    }

    if (variants.length === 0) {
      throw new ResolutionError(`Master playlist declares no variant URIs: ${playlistUrl}`);
    }
    return { kind: 'master', variants };
  }

  const segments = lines.filter(isUriLine).map(line => resolvePlaylistUri(line, playlistUrl));
  if (segments.length === 0) {
    throw new ResolutionError(`No video segments found in playlist: ${playlistUrl}`);
  }
  return { kind: 'media', segments };
}

/**
 * Highest bandwidth wins; on a tie the first declared variant is kept.
 */
export function selectBestVariant(variants: PlaylistVariant[]): PlaylistVariant | null {
  let best: PlaylistVariant | null = null;
  for (const variant of variants) {
    if (!best || variant.bandwidth > best.bandwidth) {
      best = variant;
    }
  }
  return best;
}

export class PlaylistResolver {
  constructor(
    private readonly http: HttpClient,
    private readonly options: { maxDepth: number } = { maxDepth: 5 }
  ) {}

  async resolve(
    playlistUrl: string,
    headers: Record<string, string> = {},
    token: CancellationToken = CancellationToken.none
  ): Promise<ResolvedPlaylist> {
    let url = playlistUrl;

    for (let hops = 0; ; hops++) {
      token.throwIfCancelled();
      console.log(`[Playlist] Fetching: ${url}`);

      const text = await this.http.getText(url, {
        headers: buildStreamHeaders(url, headers),
        signal: token.signal,
      });
      token.throwIfCancelled();

      const playlist = parsePlaylist(text, url);
      if (playlist.kind === 'media') {
        console.log(`[Playlist] Found ${playlist.segments.length} segments after ${hops} hop(s)`);
        return { playlistUrl: url, segments: playlist.segments, hops };
      }

      if (hops >= this.options.maxDepth) {
        throw new ResolutionError(`Master playlist nesting exceeded ${this.options.maxDepth} hops at ${url}`);
      }

      const best = selectBestVariant(playlist.variants);
      if (!best) {
        throw new ResolutionError(`Master playlist has no playable variant: ${url}`);
      }
      console.log(`[Playlist] Master playlist, selected variant at ${best.bandwidth} bps: ${best.uri}`);
      url = best.uri;
    }
  }
}
