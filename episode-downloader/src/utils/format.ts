// Checked in order; the first entry whose name appears in the label wins
const LANGUAGE_NAMES: ReadonlyArray<readonly [code: string, names: readonly string[]]> = [
  ['en', ['english']],
  ['es', ['spanish', 'español']],
  ['fr', ['french', 'français']],
  ['de', ['german', 'deutsch']],
  ['pt', ['portuguese', 'português']],
  ['it', ['italian', 'italiano']],
  ['ru', ['russian', 'русский']],
  ['ja', ['japanese', '日本語']],
  ['ko', ['korean', '한국어']],
  ['zh', ['chinese', '中文']],
  ['ar', ['arabic', 'العربية']],
  ['hi', ['hindi', 'हिन्दी']],
  ['id', ['indonesian']],
  ['ms', ['malay']],
  ['th', ['thai', 'ไทย']],
  ['vi', ['vietnamese', 'tiếng việt']],
  ['tr', ['turkish', 'türkçe']],
  ['pl', ['polish', 'polski']],
  ['nl', ['dutch', 'nederlands']],
];

/**
 * Infer a language code from a caption label such as "English [CC]"
 */
export function languageCodeFromLabel(label: string): string {
  const lower = label.toLowerCase();
  for (const [code, names] of LANGUAGE_NAMES) {
    if (names.some(name => lower.includes(name))) {
      return code;
    }
  }
  return 'unknown';
}

export function sanitizeFilename(name: string): string {
  return name
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/\s+/g, '_')
    .toLowerCase();
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

export function truncate(text: string, max = 50): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}
