export interface StreamSource {
  url: string;
  isPlaylist: boolean;
  headers: Record<string, string>;
}

export interface SubtitleTrack {
  url: string;
  label: string;
}

/**
 * Catalog collaborator: maps an episode and server variant to something downloadable.
 */
export interface StreamSourceProvider {
  resolveStreamSource(episodeId: string, variant: string, signal?: AbortSignal): Promise<StreamSource>;
  getSubtitleTracks(episodeId: string, variant: string, signal?: AbortSignal): Promise<SubtitleTrack[]>;
}
