import { inferAuthorFromFileName, normalizeAuthor, type AuthorOrder } from './author.ts';
import { resolveCollision, UsedNameSet, type ExistsProbe } from './collision.ts';
import { buildFileName, buildStem, splitExtension } from './stem.ts';
import { titleCase } from './title-case.ts';

export const AUTHOR_JOINER = ', ';
export const UNKNOWN_AUTHOR = 'Unknown Author';

export interface RawMetadata {
  readonly title?: string;
  readonly authors: readonly string[];
}

export interface NormalizationOptions {
  readonly stripDiacritics: boolean;
  readonly applyTitleCase: boolean;
  readonly authorOrder: AuthorOrder;
}

export interface RenameSource<Id = string> {
  readonly sourceId: Id;
  /** Original file name, used as title fallback and for author inference. */
  readonly fileName: string;
  readonly metadata: RawMetadata;
}

export interface ProposedName<Id = string> {
  readonly sourceId: Id;
  readonly sourceFileName: string;
  stem: string;
  extension: string;
}

export interface Change {
  readonly before: string;
  readonly after: string;
}

export interface PlanReport {
  missingTitle: string[];
  missingAuthor: string[];
  inferredAuthors: Array<{ file: string; author: string }>;
  authorFormatChanges: Array<{ file: string } & Change>;
  titleCaseChanges: Array<{ file: string; title?: Change; authors?: Change }>;
}

export interface RenamePlan<Id = string> {
  proposals: ProposedName<Id>[];
  report: PlanReport;
}

export const fileNameOf = (p: ProposedName<unknown>) => `${p.stem}${p.extension}`;

const changed = (before: string, after: string): Change | undefined =>
  before === after ? undefined : { before, after };

export function emptyReport(): PlanReport {
  return { missingTitle: [], missingAuthor: [], inferredAuthors: [], authorFormatChanges: [], titleCaseChanges: [] };
}

/**
 * Proposes a unique file name per source, in input order. Each item is finished and its
 * name registered before the next one starts, so earlier items keep un-suffixed names.
 */
export function planRenames<Id>(
  sources: readonly RenameSource<Id>[],
  options: NormalizationOptions,
  exists: ExistsProbe,
): RenamePlan<Id> {
  const usedNames = new UsedNameSet();
  const report = emptyReport();
  const proposals: ProposedName<Id>[] = [];

  for (const source of sources) {
    const file = source.fileName;
    const { base: baseName, extension } = splitExtension(file);

    const rawTitle = source.metadata.title?.trim() ?? '';
    if (!rawTitle) report.missingTitle.push(file);

    let authors = source.metadata.authors.map((a) => a.trim()).filter((a) => a.length > 0);
    if (authors.length === 0) {
      const inferred = inferAuthorFromFileName(baseName);
      if (inferred) {
        authors = [inferred];
        report.inferredAuthors.push({ file, author: inferred });
      } else {
        report.missingAuthor.push(file);
      }
    }

    // as-is still tidies comma spacing and initials, but is not reported as a format change
    const authorsBefore = authors.join(AUTHOR_JOINER);
    authors = authors.map((a) => normalizeAuthor(a, options.authorOrder));
    const formatChange = changed(authorsBefore, authors.join(AUTHOR_JOINER));
    if (formatChange && options.authorOrder !== 'as-is') report.authorFormatChanges.push({ file, ...formatChange });

    let title = rawTitle || baseName;
    if (options.applyTitleCase) {
      const tcTitle = titleCase(title, 'title');
      const tcAuthors = authors.map((a) => titleCase(a, 'author'));
      const titleChange = changed(title, tcTitle);
      const authorsChange = changed(authors.join(AUTHOR_JOINER), tcAuthors.join(AUTHOR_JOINER));
      if (titleChange || authorsChange) {
        report.titleCaseChanges.push({ file, title: titleChange, authors: authorsChange });
      }
      title = tcTitle;
      authors = tcAuthors;
    }

    const authorsJoined = authors.length > 0 ? authors.join(AUTHOR_JOINER) : UNKNOWN_AUTHOR;
    const stem = buildStem(title, authorsJoined, options.stripDiacritics);
    const ext = extension.toLowerCase();
    const candidate = buildFileName(stem, ext, options.stripDiacritics);
    const resolved = resolveCollision(candidate, usedNames, exists, ext);
    const kept = resolved.endsWith(ext) ? ext : '';

    proposals.push({
      sourceId: source.sourceId,
      sourceFileName: file,
      stem: resolved.slice(0, resolved.length - kept.length),
      extension: kept,
    });
  }

  return { proposals, report };
}
