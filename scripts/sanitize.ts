/**
 * Cross-platform filename sanitizer for titles and author names read from EPUB metadata.
 * - Maps typographic dashes, ellipsis and curly quotes to ASCII
 * - Optionally strips diacritics (é -> e)
 * - Replaces reserved characters / \ : * ? " < > | and control characters with a space
 * - Collapses whitespace, trims trailing clutter, and avoids Windows device names
 */

export const UNTITLED = 'Untitled';

const PUNCTUATION: Record<string, string> = {
  '—': '-', // em dash
  '–': '-', // en dash
  '―': '-', // horizontal bar
  '…': '.', // ellipsis
  '“': '"',
  '”': '"',
  '‘': "'",
  '’': "'",
};

const RESERVED_CHARS = new Set(['/', '\\', ':', '*', '?', '"', '<', '>', '|']);

const TRAILING_CLUTTER = new Set(['.', ' ', ';', ':', ',']);

const DEVICE_NAMES = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9',
]);

export function isForbiddenChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code < 32 || code === 127 || RESERVED_CHARS.has(ch);
}

export function isDeviceName(name: string): boolean {
  return DEVICE_NAMES.has(name.toUpperCase());
}

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ');
}

export function normalizePunctuation(input: string): string {
  let out = '';
  for (const ch of input) out += PUNCTUATION[ch] ?? ch;
  return out;
}

export function removeDiacritics(input: string): string {
  return input.normalize('NFD').replace(/\p{M}/gu, '').normalize('NFC');
}

function trimEndChars(input: string, chars: ReadonlySet<string>): string {
  let end = input.length;
  while (end > 0 && chars.has(input[end - 1] ?? '')) end--;
  return input.slice(0, end);
}

export function sanitizeFilename(input: string | null | undefined, stripDiacritics = false): string {
  if (!input || input.trim() === '') return UNTITLED;

  let normalized = normalizePunctuation(input);
  // strip before replacing so an accented reserved character still degrades to its base
  if (stripDiacritics) normalized = removeDiacritics(normalized);

  let out = '';
  for (let i = 0; i < normalized.length; i++) {
    const ch = normalized[i] ?? '';
    out += isForbiddenChar(ch) ? ' ' : ch;
  }

  let cleaned = collapseWhitespace(out).trim();
  // scraped metadata often ends with clutter, e.g. "Tolhurst;"
  cleaned = trimEndChars(cleaned, TRAILING_CLUTTER);
  if (cleaned === '') return UNTITLED;

  if (isDeviceName(cleaned)) cleaned = `_${cleaned}`;
  return cleaned;
}

export function trimStemEnd(input: string): string {
  return trimEndChars(input, new Set(['.', ' ']));
}
