import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

export interface Config {
  port: number;
  host: string;
  dataPath: string;
  downloadPath: string;
  catalogApiUrl: string;
  preferServerMp4: boolean;
  maxPlaylistDepth: number;
  minSegmentSuccessRatio: number;
  minDirectFileBytes: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
}

let config: Config | null = null;

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getConfig(): Config {
  if (!config) {
    config = {
      port: parseInt(process.env.PORT || '8090', 10),
      host: process.env.HOST || '0.0.0.0',
      dataPath: process.env.DATA_PATH || '/data',
      downloadPath: process.env.DOWNLOAD_PATH || '/downloads',
      catalogApiUrl: (process.env.CATALOG_API_URL || 'http://localhost:3000').replace(/\/+$/, ''),
      preferServerMp4: process.env.PREFER_SERVER_MP4 === 'true',
      maxPlaylistDepth: parseNumber(process.env.MAX_PLAYLIST_DEPTH, 5),
      // 0 keeps the lossy behaviour: any non-empty subset of segments is merged
      minSegmentSuccessRatio: Math.min(1, Math.max(0, parseNumber(process.env.MIN_SEGMENT_SUCCESS_RATIO, 0))),
      minDirectFileBytes: parseNumber(process.env.MIN_DIRECT_FILE_BYTES, 1000),
      requestTimeoutMs: parseNumber(process.env.REQUEST_TIMEOUT_MS, 30000),
      downloadTimeoutMs: parseNumber(process.env.DOWNLOAD_TIMEOUT_MS, 30 * 60 * 1000),
    };
  }
  return config;
}

export function reloadConfig(): Config {
  config = null;
  return getConfig();
}
