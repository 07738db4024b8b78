import { collapseWhitespace } from './sanitize.ts';

export type AuthorOrder = 'as-is' | 'first-last' | 'last-first';

const SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv', 'v']);

export function isNameSuffix(value: string): boolean {
  let v = value.trim();
  while (v.startsWith('.')) v = v.slice(1);
  while (v.endsWith('.')) v = v.slice(0, -1);
  return SUFFIXES.has(v.toLowerCase());
}

// "J.Kent Layton" -> "J. Kent Layton"; lowercase abbreviations like "e.g." stay put
export function insertSpaceAfterInitials(input: string): string {
  return input.replace(/(?<=\p{L})\.(?=\p{Lu})/gu, '. ');
}

// "Doe ,  Jane" -> "Doe, Jane"; "Doe,,Jane" -> "Doe, Jane"
export function cleanAuthor(input: string): string {
  let s = collapseWhitespace(input.trim());
  s = s.replace(/\s*,(?:\s*,)*\s*/g, ', ').trim();
  return insertSpaceAfterInitials(s);
}

const wordCount = (s: string) => s.split(' ').filter((w) => w.length > 0).length;

/**
 * Conservatively reorders a "Last, First" author into the requested order.
 * Returns the cleaned input untouched whenever the order cannot be told apart from a
 * list of several authors: no comma, more than three comma segments, a third segment
 * that is not a suffix, or two multi-word sides ("Foo Bar, Zoo Goo").
 */
export function normalizeAuthor(input: string, order: AuthorOrder): string {
  if (input.trim() === '') return input;

  const s = cleanAuthor(input);
  if (order === 'as-is' || !s.includes(',')) return s;

  const parts = s
    .split(',')
    .map((p) => collapseWhitespace(p.trim()))
    .filter((p) => p.length > 0);
  if (parts.length < 2 || parts.length > 3) return s;

  const [last = '', firstMiddle = '', third] = parts;
  let suffix: string | undefined;
  if (third !== undefined) {
    if (!isNameSuffix(third)) return s;
    suffix = third;
  }

  if (wordCount(last) >= 2 && wordCount(firstMiddle) >= 2) return s;

  const ordered = order === 'first-last' ? `${firstMiddle} ${last}` : `${last}, ${firstMiddle}`;
  return collapseWhitespace(suffix ? `${ordered}, ${suffix}` : ordered).trim();
}

const AUTHOR_TAIL_SEPARATOR = ' -- ';

/**
 * Infers an author from a file name shaped like "A New Day Yesterday -- Mike Barnes".
 * Tails that look like ids or metadata dumps are rejected.
 */
export function inferAuthorFromFileName(baseName: string): string | undefined {
  const idx = baseName.lastIndexOf(AUTHOR_TAIL_SEPARATOR);
  if (idx < 0) return undefined;

  const candidate = baseName.slice(idx + AUTHOR_TAIL_SEPARATOR.length).trim();
  if (!candidate) return undefined;

  let letters = 0;
  let digits = 0;
  for (const ch of candidate) {
    if (/\p{L}/u.test(ch)) letters++;
    else if (/\p{Nd}/u.test(ch)) digits++;
  }
  if (letters < 2 || digits > letters) return undefined;
  if (candidate.length > 60) return undefined;

  return collapseWhitespace(candidate);
}
