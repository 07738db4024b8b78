import test from 'node:test';
import assert from 'node:assert/strict';
import { buildFileName, buildStem, MAX_STEM_LENGTH, splitExtension } from '../scripts/stem.ts';

test('buildStem joins title and authors', () => {
  assert.equal(buildStem('The Hobbit', 'J. R. R. Tolkien', false), 'The Hobbit - J. R. R. Tolkien');
  assert.equal(buildStem('Who Goes There?', 'John W. Campbell', false), 'Who Goes There - John W. Campbell');
  assert.equal(buildStem('', '', false), 'Untitled - Untitled');
  assert.equal(buildStem('Café', 'Brontë', true), 'Cafe - Bronte');
});

test('buildStem truncates at a word boundary without dangling punctuation', () => {
  const title = 'word '.repeat(40);
  const stem = buildStem(title, 'Author', false);
  assert.equal(stem, Array(24).fill('word').join(' '));
  assert.ok(stem.length <= MAX_STEM_LENGTH);

  const dotted = buildStem('A'.repeat(118) + '. B', 'Author', false);
  assert.equal(dotted, 'A'.repeat(118));
});

test('buildStem never cuts through a surrogate pair', () => {
  const stem = buildStem('a'.repeat(119) + '\u{1F600} more', 'Author', false);
  assert.equal(stem, 'a'.repeat(119));
  assert.ok(stem.length <= MAX_STEM_LENGTH);

  const fits = buildStem('a'.repeat(118) + '\u{1F600} more', 'Author', false);
  assert.equal(fits, 'a'.repeat(118) + '\u{1F600}');
  assert.equal(fits.length, MAX_STEM_LENGTH);
});

test('buildFileName sanitizes the assembled name', () => {
  assert.equal(buildFileName('Title - Author', '.epub', false), 'Title - Author.epub');
  assert.equal(buildFileName('CON', '', false), '_CON');
});

test('splitExtension splits at the last dot', () => {
  assert.deepEqual(splitExtension('a.b.epub'), { base: 'a.b', extension: '.epub' });
  assert.deepEqual(splitExtension('README'), { base: 'README', extension: '' });
});
