import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Effect } from 'effect';
import { authorsFrom, detectAuthorSource, parseEpubMetadata, readEpubMetadata } from '../scripts/epub.ts';
import { buildEpub, opf, simpleOpf } from './fixtures.ts';

const parse = async (packageXml: string | undefined) => Effect.runPromise(parseEpubMetadata(await buildEpub(packageXml)));

const failure = async (data: Uint8Array) => Effect.runPromise(Effect.flip(parseEpubMetadata(data, 'bad.epub')));

describe('parseEpubMetadata', () => {
  it('reads title and authors by role', async () => {
    const meta = await parse(
      opf(`<dc:title>The Hobbit</dc:title>
    <dc:creator opf:role="aut">Tolkien, J.R.R.</dc:creator>
    <dc:creator opf:role="ill">Alan Lee</dc:creator>`),
    );
    assert.equal(meta.title, 'The Hobbit');
    assert.deepEqual(meta.authors, ['Tolkien, J.R.R.']);
  });

  it('follows EPUB 3 role refinements', async () => {
    const meta = await parse(
      opf(`<dc:title>The Dispossessed</dc:title>
    <dc:creator id="c1">Ursula K. Le Guin</dc:creator>
    <dc:creator id="c2">Someone Else</dc:creator>
    <meta refines="#c1" property="role" scheme="marc:relators">aut</meta>
    <meta refines="#c2" property="role" scheme="marc:relators">edt</meta>`),
    );
    assert.deepEqual(meta.authors, ['Ursula K. Le Guin']);
  });

  it('falls back to every creator when none has a role', async () => {
    const meta = await parse(opf(`<dc:title> Good Omens </dc:title>
    <dc:creator>Terry Pratchett</dc:creator>
    <dc:creator>Neil Gaiman</dc:creator>`));
    assert.equal(meta.title, 'Good Omens');
    assert.deepEqual(meta.authors, ['Terry Pratchett', 'Neil Gaiman']);
  });

  it('copes with a package that has no author', async () => {
    const meta = await parse(simpleOpf('Anonymous Tales', []));
    assert.equal(meta.title, 'Anonymous Tales');
    assert.deepEqual(meta.authors, []);
  });

  it('fails with EpubReadError on broken archives', async () => {
    const notZip = await failure(new TextEncoder().encode('not a zip'));
    assert.equal(notZip._tag, 'EpubReadError');
    assert.equal(notZip.message, 'Not a zip archive');
    assert.equal(notZip.file, 'bad.epub');

    const noContainer = await failure(await buildEpub(undefined));
    assert.equal(noContainer.message, 'Missing META-INF/container.xml');
  });

  it('fails when the file cannot be read', async () => {
    const err = await Effect.runPromise(Effect.flip(readEpubMetadata('/definitely/not/here.epub')));
    assert.equal(err._tag, 'EpubReadError');
    assert.equal(err.file, '/definitely/not/here.epub');
  });
});

describe('detectAuthorSource', () => {
  it('recognises each kind of author source', () => {
    assert.deepEqual(detectAuthorSource({ creator: [{ _: 'A', $: { role: 'aut' } }, { _: 'B' }] }), {
      _tag: 'AuthorList',
      authors: ['A'],
    });
    assert.deepEqual(detectAuthorSource({ creator: [{ _: 'A' }, { _: 'B' }] }), { _tag: 'Authors', authors: ['A', 'B'] });
    assert.deepEqual(detectAuthorSource({ meta: [{ _: 'Jane Austen', $: { property: 'dcterms:creator' } }] }), {
      _tag: 'SingleAuthor',
      author: 'Jane Austen',
    });
    assert.deepEqual(detectAuthorSource({}), { _tag: 'None' });
    assert.deepEqual(detectAuthorSource(''), { _tag: 'None' });
  });

  it('flattens to a plain list', () => {
    assert.deepEqual(authorsFrom({ _tag: 'SingleAuthor', author: 'X' }), ['X']);
    assert.deepEqual(authorsFrom({ _tag: 'None' }), []);
  });
});
