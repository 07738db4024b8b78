import { fileNameOf, type PlanReport, type ProposedName } from './plan.ts';
import type { RenameOptions } from './options.ts';

export const RULE = '-'.repeat(80);

export function abbrev(value: string, maxLength = 80): string {
  if (value.length <= maxLength) return value;
  if (maxLength <= 3) return value.slice(0, Math.max(0, maxLength));
  return value.slice(0, maxLength - 3) + '...';
}

export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

export function formatUsage(): string[] {
  return [
    'Usage:',
    '  rename-epubs <inputFolder> [--apply] [--move] [--out <outputFolder>] [--recursive] [--ascii [true|false]] [--titlecase [true|false]] [--authorformat <as-is|firstlast|lastfirst>]',
    '',
    'Defaults:',
    '  - Unicode filenames (no ASCII stripping).',
    '  - Top-level search only (non-recursive).',
    '  - Copy to <input>/Renamed_<yyyyMMdd_HHmm> unless --out is provided.',
    '  - Author joiner: comma ", ".',
    '  - Title Case enabled (use --titlecase false to disable).',
    '  - Author format: firstlast (use --authorformat as-is or EPUB_AUTHOR_FORMAT to change).',
  ];
}

export function formatPreview(proposals: readonly ProposedName<unknown>[]): string[] {
  return [
    '',
    'Planned renames (preview):',
    RULE,
    ...proposals.map((p) => `${p.sourceFileName}  =>  ${fileNameOf(p)}`),
    RULE,
    `Total: ${proposals.length} file(s)`,
    '',
  ];
}

const quoted = (s: string) => `"${abbrev(s)}"`;

/** Dry-run summary of metadata gaps and casing/format adjustments; empty when there is nothing to say. */
export function formatSummary(report: PlanReport, options: Pick<RenameOptions, 'authorOrder' | 'applyTitleCase'>): string[] {
  const sections: Array<[string, string[]]> = [
    ['Missing author', report.missingAuthor],
    ['Missing title', report.missingTitle],
    [
      'Author inferred from filename',
      report.inferredAuthors.map((e) => `File: ${e.file} | Inferred author from filename: ${quoted(e.author)}`),
    ],
  ];
  if (options.authorOrder !== 'as-is') {
    sections.push([
      'Authorformat-adjusted',
      report.authorFormatChanges.map((c) => `File: ${c.file} | AuthorFormat Authors: ${quoted(c.before)} -> ${quoted(c.after)}`),
    ]);
  }
  if (options.applyTitleCase) {
    sections.push([
      'Titlecase-adjusted',
      report.titleCaseChanges.map((c) => {
        const pieces: string[] = [];
        if (c.title) pieces.push(`TitleCase Title: ${quoted(c.title.before)} -> ${quoted(c.title.after)}`);
        if (c.authors) pieces.push(`TitleCase Authors: ${quoted(c.authors.before)} -> ${quoted(c.authors.after)}`);
        return `File: ${c.file} | ${pieces.join('; ')}`;
      }),
    ]);
  }

  const filled = sections.filter(([, lines]) => lines.length > 0);
  if (filled.length === 0) return [];

  const out = ['Summary:', RULE];
  filled.forEach(([heading, lines], idx) => {
    if (idx > 0) out.push('');
    out.push(`${heading} (${lines.length}):`, ...lines.map((l) => `  - ${l}`));
  });
  out.push(RULE, '');
  return out;
}
