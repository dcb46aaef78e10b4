import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { NodeFileStorage } from '../services/file-storage.js';
import { SubtitleEnricher } from '../services/subtitles.js';
import { CancellationSource } from '../utils/cancellation.js';
import { FakeCatalog, FakeHttpClient, makeTempDir } from './helpers.js';

const VTT = 'WEBVTT\n\n00:00:01.000 --> 00:00:03.000\nHello\n';

describe('SubtitleEnricher', () => {
  let root: string;
  let storage: NodeFileStorage;
  let http: FakeHttpClient;
  let catalog: FakeCatalog;
  let enricher: SubtitleEnricher;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    root = await makeTempDir();
    storage = new NodeFileStorage(root);
    http = new FakeHttpClient();
    catalog = new FakeCatalog();
    enricher = new SubtitleEnricher(http, storage, catalog);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('writes each track verbatim and infers its language', async () => {
    catalog.subtitles.set('ep-1', [
      { url: 'https://subs.example.com/en.vtt', label: 'English' },
      { url: 'https://subs.example.com/pt.vtt', label: 'Portuguese (Brazil)' },
    ]);
    http.on('https://subs.example.com/en.vtt', VTT).on('https://subs.example.com/pt.vtt', 'WEBVTT\n');

    const subtitles = await enricher.fetchSubtitles('ep-1', 'sub', 'show_ep1_sub');

    const subtitleDir = path.join(root, 'subtitles');
    expect(subtitles).toEqual([
      { label: 'English', language: 'en', filePath: path.join(subtitleDir, 'show_ep1_sub_english.vtt') },
      {
        label: 'Portuguese (Brazil)',
        language: 'pt',
        filePath: path.join(subtitleDir, 'show_ep1_sub_portuguese_(brazil).vtt'),
      },
    ]);
    expect(await fs.readFile(subtitles[0].filePath, 'utf-8')).toBe(VTT);
  });

  it('skips tracks that fail and keeps the rest', async () => {
    catalog.subtitles.set('ep-1', [
      { url: 'https://subs.example.com/missing.vtt', label: 'French' },
      { url: 'https://subs.example.com/ja.vtt', label: 'Japanese' },
    ]);
    http.on('https://subs.example.com/ja.vtt', VTT);

    const subtitles = await enricher.fetchSubtitles('ep-1', 'sub', 'show_ep1_sub');

    expect(subtitles.map(s => s.language)).toEqual(['ja']);
  });

  it('does not let two tracks with the same label overwrite each other', async () => {
    catalog.subtitles.set('ep-1', [
      { url: 'https://subs.example.com/a.vtt', label: 'English' },
      { url: 'https://subs.example.com/b.vtt', label: 'English' },
    ]);
    http.on('https://subs.example.com/a.vtt', 'A').on('https://subs.example.com/b.vtt', 'B');

    const subtitles = await enricher.fetchSubtitles('ep-1', 'sub', 'k');

    expect(subtitles.map(s => path.basename(s.filePath))).toEqual(['k_english.vtt', 'k_english_2.vtt']);
    expect(await fs.readFile(subtitles[1].filePath, 'utf-8')).toBe('B');
  });

  it('labels unrecognised languages as unknown', async () => {
    catalog.subtitles.set('ep-1', [{ url: 'https://subs.example.com/x.vtt', label: 'Klingon' }]);
    http.on('https://subs.example.com/x.vtt', VTT);

    const [subtitle] = await enricher.fetchSubtitles('ep-1', 'sub', 'k');

    expect(subtitle.language).toBe('unknown');
  });

  it('returns nothing when the catalog lookup fails', async () => {
    catalog.subtitles.set('ep-1', new Error('catalog offline'));

    await expect(enricher.fetchSubtitles('ep-1', 'sub', 'k')).resolves.toEqual([]);
  });

  it('stops once cancelled', async () => {
    catalog.subtitles.set('ep-1', [{ url: 'https://subs.example.com/en.vtt', label: 'English' }]);
    http.on('https://subs.example.com/en.vtt', VTT);
    const source = new CancellationSource();
    source.cancel();

    const subtitles = await enricher.fetchSubtitles('ep-1', 'sub', 'k', source.token);

    expect(subtitles).toEqual([]);
    expect(http.requests).toHaveLength(0);
  });
});
