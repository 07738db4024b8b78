/**
 * Smart Title Case for book titles and author names.
 *
 * Each space-separated token is split into leading punctuation, core and trailing
 * punctuation; the core is split on hyphens and every segment goes through an ordered
 * list of casing rules. A clause flag tracks subtitle starts (after ":", "·", a closing
 * quote, or a comma followed by a capitalized word) so minor words there stay capitalized.
 *
 * Re-applying is only guaranteed to be a no-op for input that is already title cased.
 */

export type CaseDomain = 'title' | 'author';

// style-guide-ish, not perfect
const MINOR_WORDS: readonly string[] = [
  'and', 'or', 'the', 'a', 'an', 'in', 'on', 'of', 'to', 'at', 'by', 'for', 'from',
  'nor', 'but', 'as', 'per', 'vs', 'via', 'with', 'into', 'onto', 'off', 'up', 'down',
];

// name particles that stay lowercase in the middle of an author name
const AUTHOR_PARTICLES: readonly string[] = ['del'];

// Acronyms recognised even when the metadata has them in lowercase. Only words that
// never read as ordinary English words belong here.
const KNOWN_ACRONYMS: readonly string[] = [
  'nasa', 'cia', 'fbi', 'nsa', 'kgb', 'nato', 'ussr', 'bbc', 'cnn', 'ibm',
  'nyc', 'rna', 'html', 'css', 'sql', 'json', 'xml', 'http', 'wwi',
  'wwii', 'ufo', 'ceo', 'cpu', 'gpu', 'pdf', 'ucla', 'lsd',
];

const MINOR_BY_DOMAIN: Record<CaseDomain, ReadonlySet<string>> = {
  title: new Set(MINOR_WORDS),
  author: new Set([...MINOR_WORDS, ...AUTHOR_PARTICLES]),
};

const CLOSING_QUOTES = ['"', '”', '»'];

export interface Segment {
  text: string;
  trailing: string;
  domain: CaseDomain;
  isFirst: boolean;
  isLast: boolean;
  afterBoundary: boolean;
}

export interface CaseRule {
  name: string;
  applies: (seg: Segment) => boolean;
  apply: (seg: Segment) => string;
}

const isLetter = (ch: string) => /\p{L}/u.test(ch);
const isUpper = (ch: string) => /\p{Lu}/u.test(ch);
const isAlnum = (ch: string) => /[\p{L}\p{N}]/u.test(ch);

export function isAllCapsAcronym(word: string): boolean {
  let letters = 0;
  for (const ch of word) {
    if (!isLetter(ch)) continue;
    if (!isUpper(ch)) return false;
    letters++;
  }
  return letters >= 2;
}

// internal capitals ("McCarthy", "iPhone", "eBay") are meaningful
export function looksIntentionallyCased(word: string): boolean {
  let seenLetter = false;
  for (const ch of word) {
    if (!isLetter(ch)) continue;
    if (seenLetter && isUpper(ch)) return true;
    seenLetter = true;
  }
  return false;
}

export function capitalizeWord(word: string): string {
  if (looksIntentionallyCased(word)) return word;

  const lower = word.toLowerCase();
  let out = '';
  let capitalizeNext = true;
  let letters = 0;
  let firstLetter = '';
  for (let i = 0; i < lower.length; i++) {
    const ch = lower[i] ?? '';
    if (capitalizeNext && isLetter(ch)) {
      out += ch.toUpperCase();
      capitalizeNext = false;
    } else {
      out += ch;
    }
    if (isLetter(ch)) {
      letters++;
      if (!firstLetter) firstLetter = ch.toUpperCase();
    }
    // O'Brien, D'Artagnan, L'Étranger; never possessives like Hitchhiker's
    if ((ch === "'" || ch === '’') && isLetter(lower[i + 1] ?? '')) {
      if (letters === 1 && ['O', 'D', 'L'].includes(firstLetter)) capitalizeNext = true;
    }
  }

  if (/^mc\p{L}/iu.test(out)) out = out.slice(0, 2) + out.charAt(2).toUpperCase() + out.slice(3);
  return out;
}

export const CASE_RULES: readonly CaseRule[] = [
  {
    name: 'acronym',
    applies: (seg) =>
      isAllCapsAcronym(seg.text) ||
      (seg.domain === 'title' && KNOWN_ACRONYMS.includes(seg.text.toLowerCase())),
    apply: (seg) => seg.text.toUpperCase(),
  },
  {
    // "A." is an initial, never the article
    name: 'initial',
    applies: (seg) => seg.text.length === 1 && seg.trailing.startsWith('.'),
    apply: (seg) => seg.text.toUpperCase(),
  },
  {
    name: 'minor',
    applies: (seg) =>
      !seg.isFirst &&
      !seg.isLast &&
      !seg.afterBoundary &&
      MINOR_BY_DOMAIN[seg.domain].has(seg.text.toLowerCase()),
    apply: (seg) => seg.text.toLowerCase(),
  },
  {
    name: 'capitalize',
    applies: () => true,
    apply: (seg) => capitalizeWord(seg.text),
  },
];

export function caseSegment(seg: Segment, rules: readonly CaseRule[] = CASE_RULES): string {
  const rule = rules.find((r) => r.applies(seg));
  return rule ? rule.apply(seg) : seg.text;
}

export interface Token {
  leading: string;
  core: string;
  trailing: string;
  hyphenSegments: string[];
}

export function splitToken(token: string): Token | undefined {
  let start = 0;
  let end = token.length - 1;
  while (start <= end && !isAlnum(token[start] ?? '')) start++;
  while (end >= start && !isAlnum(token[end] ?? '')) end--;
  if (start > end) return undefined;
  const core = token.slice(start, end + 1);
  return {
    leading: token.slice(0, start),
    core,
    trailing: token.slice(end + 1),
    hyphenSegments: core.split('-'),
  };
}

function startsWithUpper(token: string | undefined): boolean {
  if (!token) return false;
  for (const ch of token) {
    if (isLetter(ch)) return isUpper(ch);
  }
  return false;
}

// "Narcissus, The Secret Agent" and "Hunt: The Agent" both open a new segment
export function endsClause(trailing: string, nextToken: string | undefined): boolean {
  if (trailing.includes(':') || trailing.includes('·')) return true;
  if (CLOSING_QUOTES.some((q) => trailing.includes(q))) return true;
  return trailing.includes(',') && startsWithUpper(nextToken);
}

export function titleCase(input: string, domain: CaseDomain = 'title'): string {
  if (input.trim() === '') return input;

  const parts = input.split(' ');
  let afterBoundary = false;
  for (let i = 0; i < parts.length; i++) {
    const token = parts[i] ?? '';
    if (token.length === 0) continue;

    const next = parts[i + 1];
    const split = splitToken(token);
    if (!split) {
      afterBoundary = endsClause(token, next);
      continue;
    }

    const cased = split.hyphenSegments.map((text) =>
      text.length === 0
        ? text
        : caseSegment({
            text,
            trailing: split.trailing,
            domain,
            isFirst: i === 0,
            isLast: i === parts.length - 1,
            afterBoundary,
          }),
    );
    parts[i] = split.leading + cased.join('-') + split.trailing;
    afterBoundary = endsClause(split.trailing, next);
  }
  return parts.join(' ');
}
