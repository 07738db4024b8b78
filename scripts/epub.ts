import { promises as fs } from 'node:fs';
import path from 'node:path';
import JSZip from 'jszip';
import xml2js from 'xml2js';
import { Data, Effect } from 'effect';
import type { RawMetadata } from './plan.ts';

export class EpubReadError extends Data.TaggedError('EpubReadError')<{
  readonly file: string;
  readonly message: string;
}> {}

/**
 * Where the author names came from. Resolved once here so the rest of the pipeline
 * only ever sees a plain list.
 */
export type AuthorSource =
  | { readonly _tag: 'AuthorList'; readonly authors: readonly string[] }
  | { readonly _tag: 'Authors'; readonly authors: readonly string[] }
  | { readonly _tag: 'SingleAuthor'; readonly author: string }
  | { readonly _tag: 'None' };

const CONTAINER_PATH = 'META-INF/container.xml';

const XML_OPTIONS = {
  tagNameProcessors: [xml2js.processors.stripPrefix],
  attrNameProcessors: [xml2js.processors.stripPrefix],
  explicitCharkey: true,
};

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

function children(node: unknown, key: string): unknown[] {
  if (!isRecord(node)) return [];
  const value = node[key];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function attr(node: unknown, name: string): string | undefined {
  if (!isRecord(node) || !isRecord(node.$)) return undefined;
  const value = node.$[name];
  return typeof value === 'string' ? value : undefined;
}

function text(node: unknown): string | undefined {
  if (typeof node === 'string') return node.trim();
  if (isRecord(node) && typeof node._ === 'string') return node._.trim();
  return undefined;
}

const nonEmpty = (values: Array<string | undefined>): string[] =>
  values.filter((v): v is string => v !== undefined && v.length > 0);

// EPUB 2 puts the role on the creator; EPUB 3 refines it through a <meta> by id
function creatorRole(creator: unknown, metas: unknown[]): string | undefined {
  const direct = attr(creator, 'role');
  if (direct) return direct;
  const id = attr(creator, 'id');
  if (!id) return undefined;
  const refinement = metas.find((m) => attr(m, 'refines') === `#${id}` && attr(m, 'property') === 'role');
  return text(refinement);
}

export function detectAuthorSource(metadata: unknown): AuthorSource {
  const creators = children(metadata, 'creator');
  const metas = children(metadata, 'meta');

  const authorList = nonEmpty(creators.filter((c) => creatorRole(c, metas) === 'aut').map(text));
  if (authorList.length > 0) return { _tag: 'AuthorList', authors: authorList };

  const authors = nonEmpty(creators.map(text));
  if (authors.length > 0) return { _tag: 'Authors', authors };

  const single = nonEmpty(metas.filter((m) => attr(m, 'property') === 'dcterms:creator').map(text))[0];
  if (single) return { _tag: 'SingleAuthor', author: single };

  return { _tag: 'None' };
}

export function authorsFrom(source: AuthorSource): string[] {
  switch (source._tag) {
    case 'AuthorList':
    case 'Authors':
      return [...source.authors];
    case 'SingleAuthor':
      return [source.author];
    case 'None':
      return [];
  }
}

const parseXmlE = (file: string, xml: string) =>
  Effect.tryPromise({
    try: (): Promise<unknown> => xml2js.parseStringPromise(xml, XML_OPTIONS),
    catch: (e) => new EpubReadError({ file, message: `Malformed XML: ${e instanceof Error ? e.message : String(e)}` }),
  });

const readEntryE = (zip: JSZip, file: string, entry: string): Effect.Effect<string, EpubReadError> => {
  const zipEntry = zip.file(entry);
  if (!zipEntry) return Effect.fail(new EpubReadError({ file, message: `Missing ${entry}` }));
  return Effect.tryPromise({
    try: () => zipEntry.async('string'),
    catch: () => new EpubReadError({ file, message: `Unreadable ${entry}` }),
  });
};

export const parseEpubMetadata = (data: Uint8Array, file = '<memory>') =>
  Effect.gen(function* (_) {
    const zip = yield* _(
      Effect.tryPromise({
        try: () => JSZip.loadAsync(data),
        catch: () => new EpubReadError({ file, message: 'Not a zip archive' }),
      }),
    );

    const container = yield* _(readEntryE(zip, file, CONTAINER_PATH).pipe(Effect.flatMap((xml) => parseXmlE(file, xml))));
    const rootfile = children(children(container, 'container')[0], 'rootfiles')
      .flatMap((rf) => children(rf, 'rootfile'))
      .map((rf) => attr(rf, 'full-path'))
      .find((p): p is string => !!p);
    if (!rootfile) return yield* _(Effect.fail(new EpubReadError({ file, message: 'No package document in container' })));

    const opf = yield* _(readEntryE(zip, file, rootfile).pipe(Effect.flatMap((xml) => parseXmlE(file, xml))));
    const metadata = children(children(opf, 'package')[0], 'metadata')[0];
    if (metadata === undefined) return yield* _(Effect.fail(new EpubReadError({ file, message: 'Package has no metadata' })));

    const title = nonEmpty(children(metadata, 'title').map(text))[0];
    const result: RawMetadata = { title, authors: authorsFrom(detectAuthorSource(metadata)) };
    return result;
  });

export const readEpubMetadata = (filePath: string) =>
  Effect.tryPromise({
    try: () => fs.readFile(filePath),
    catch: (e) => new EpubReadError({ file: filePath, message: e instanceof Error ? e.message : String(e) }),
  }).pipe(Effect.flatMap((buf) => parseEpubMetadata(buf, path.basename(filePath))));
