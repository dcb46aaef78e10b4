import { z } from 'zod';

export const DownloadStatusSchema = z.enum(['pending', 'downloading', 'completed', 'failed', 'paused']);

export const SubtitleRecordSchema = z.object({
  label: z.string().default('Unknown'),
  language: z.string().default('unknown'),
  filePath: z.string(),
});

export const DownloadRecordSchema = z.object({
  key: z.string().min(1),
  animeSlug: z.string(),
  animeTitle: z.string(),
  animeThumbnail: z.string().nullable().default(null),
  episodeId: z.string(),
  episodeNumber: z.number().int(),
  episodeTitle: z.string().nullable().default(null),
  serverVariant: z.string(),
  requestedAt: z.number(),
  status: DownloadStatusSchema,
  progress: z.number().min(0).max(1).default(0),
  fileSizeBytes: z.number().nullable().default(null),
  filePath: z.string().nullable().default(null),
  errorMessage: z.string().nullable().default(null),
  subtitles: z.array(SubtitleRecordSchema).default([]),
});

const KeyPartSchema = z.string().min(1).regex(/^[^/\\]+$/, 'must not contain path separators');

export const DownloadRequestSchema = z.object({
  animeSlug: KeyPartSchema,
  animeTitle: z.string().min(1),
  animeThumbnail: z.string().nullish(),
  episodeId: z.string().min(1),
  episodeNumber: z.number().int().nonnegative(),
  episodeTitle: z.string().nullish(),
  serverVariant: KeyPartSchema,
});
