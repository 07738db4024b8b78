import { collapseWhitespace, sanitizeFilename, trimStemEnd } from './sanitize.ts';

// leaves room for the extension and a collision suffix
export const MAX_STEM_LENGTH = 120;

// never split a surrogate pair: a lone high surrogate is written to disk as U+FFFD
function cutPoint(value: string, max: number): number {
  const last = value.charCodeAt(max - 1);
  return last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
}

export function buildStem(title: string, authorsJoined: string, stripDiacritics: boolean): string {
  const titlePart = sanitizeFilename(title, stripDiacritics);
  const authorsPart = sanitizeFilename(authorsJoined, stripDiacritics);

  let stem = collapseWhitespace(`${titlePart} - ${authorsPart}`).trim();
  if (stem.length > MAX_STEM_LENGTH) stem = trimStemEnd(stem.slice(0, cutPoint(stem, MAX_STEM_LENGTH)));
  return stem;
}

// sanitized again as a whole: concatenation can introduce new violations
export function buildFileName(stem: string, extension: string, stripDiacritics: boolean): string {
  return sanitizeFilename(`${stem}${extension}`, stripDiacritics);
}

export function splitExtension(fileName: string): { base: string; extension: string } {
  const dot = fileName.lastIndexOf('.');
  if (dot < 0) return { base: fileName, extension: '' };
  return { base: fileName.slice(0, dot), extension: fileName.slice(dot) };
}
