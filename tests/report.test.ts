import test from 'node:test';
import assert from 'node:assert/strict';
import { emptyReport } from '../scripts/plan.ts';
import { abbrev, csvEscape, formatPreview, formatSummary, RULE } from '../scripts/report.ts';

test('abbrev shortens long values with an ellipsis', () => {
  assert.equal(abbrev('short'), 'short');
  const long = abbrev('x'.repeat(100));
  assert.equal(long.length, 80);
  assert.equal(long, 'x'.repeat(77) + '...');
  assert.equal(abbrev('abcdef', 3), 'abc');
});

test('csvEscape quotes only when needed', () => {
  assert.equal(csvEscape('/books/a.epub'), '/books/a.epub');
  assert.equal(csvEscape('Doe, Jane.epub'), '"Doe, Jane.epub"');
  assert.equal(csvEscape('say "hi"'), '"say ""hi"""');
});

test('formatPreview lists every mapping', () => {
  const lines = formatPreview([{ sourceId: '/b/x.epub', sourceFileName: 'x.epub', stem: 'Dune - Frank Herbert', extension: '.epub' }]);
  assert.deepEqual(lines, ['', 'Planned renames (preview):', RULE, 'x.epub  =>  Dune - Frank Herbert.epub', RULE, 'Total: 1 file(s)', '']);
});

test('formatSummary is empty when there is nothing to report', () => {
  assert.deepEqual(formatSummary(emptyReport(), { authorOrder: 'first-last', applyTitleCase: true }), []);
});

test('formatSummary prints the non-empty sections', () => {
  const report = emptyReport();
  report.missingAuthor.push('x.epub');
  report.authorFormatChanges.push({ file: 'y.epub', before: 'Doe, Jane', after: 'Jane Doe' });
  report.titleCaseChanges.push({ file: 'y.epub', title: { before: 'dune', after: 'Dune' } });

  assert.deepEqual(formatSummary(report, { authorOrder: 'first-last', applyTitleCase: true }), [
    'Summary:',
    RULE,
    'Missing author (1):',
    '  - x.epub',
    '',
    'Authorformat-adjusted (1):',
    '  - File: y.epub | AuthorFormat Authors: "Doe, Jane" -> "Jane Doe"',
    '',
    'Titlecase-adjusted (1):',
    '  - File: y.epub | TitleCase Title: "dune" -> "Dune"',
    RULE,
    '',
  ]);

  assert.deepEqual(formatSummary(report, { authorOrder: 'as-is', applyTitleCase: false }), [
    'Summary:',
    RULE,
    'Missing author (1):',
    '  - x.epub',
    RULE,
    '',
  ]);
});
