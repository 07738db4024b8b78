import type { AuthorOrder } from './author.ts';
import type { NormalizationOptions } from './plan.ts';

export interface RenameOptions extends NormalizationOptions {
  readonly inputDirectory: string;
  readonly outputDirectory?: string;
  readonly apply: boolean;
  readonly move: boolean;
  readonly recursive: boolean;
}

export type ParseResult =
  | { readonly ok: true; readonly options: RenameOptions }
  | { readonly ok: false; readonly error?: string };

export const AUTHOR_FORMAT_ENV = 'EPUB_AUTHOR_FORMAT';

const DEFAULT_AUTHOR_ORDER: AuthorOrder = 'first-last';

const BOOL_TOKENS: Record<string, boolean> = {
  '1': true, true: true, yes: true, y: true,
  '0': false, false: false, no: false, n: false,
};

const AUTHOR_FORMAT_TOKENS: Record<string, AuthorOrder> = {
  'as-is': 'as-is', asis: 'as-is', as_is: 'as-is',
  firstlast: 'first-last', 'first-last': 'first-last', first_last: 'first-last',
  lastfirst: 'last-first', 'last-first': 'last-first', last_first: 'last-first',
};

export function parseBool(value: string): boolean | undefined {
  return BOOL_TOKENS[value.trim().toLowerCase()];
}

export function parseAuthorFormat(value: string): AuthorOrder | undefined {
  return AUTHOR_FORMAT_TOKENS[value.trim().toLowerCase()];
}

const AUTHOR_FORMAT_HINT = 'expected: as-is | firstlast | lastfirst';

export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): ParseResult {
  if (argv.length === 0) return { ok: false };

  let authorOrder = DEFAULT_AUTHOR_ORDER;
  const envFormat = env[AUTHOR_FORMAT_ENV];
  if (envFormat) {
    const parsed = parseAuthorFormat(envFormat);
    if (!parsed) return { ok: false, error: `Invalid ${AUTHOR_FORMAT_ENV}: ${envFormat} (${AUTHOR_FORMAT_HINT})` };
    authorOrder = parsed;
  }

  let inputDirectory: string | undefined;
  let outputDirectory: string | undefined;
  let apply = false;
  let move = false;
  let recursive = false;
  let stripDiacritics = false;
  let applyTitleCase = true;

  // "--ascii" and "--titlecase" take an optional boolean right after them
  const optionalBool = (i: number): boolean | undefined => {
    const next = argv[i + 1];
    return next === undefined || next.startsWith('-') ? undefined : parseBool(next);
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('--')) {
      if (inputDirectory !== undefined) return { ok: false, error: `Unexpected argument: ${arg}` };
      inputDirectory = arg;
      continue;
    }
    switch (arg) {
      case '--apply':
        apply = true;
        break;
      case '--move':
        move = true;
        break;
      case '--recursive':
        recursive = true;
        break;
      case '--ascii': {
        const value = optionalBool(i);
        stripDiacritics = value ?? true;
        if (value !== undefined) i++;
        break;
      }
      case '--titlecase': {
        const value = optionalBool(i);
        applyTitleCase = value ?? true;
        if (value !== undefined) i++;
        break;
      }
      case '--authorformat': {
        const value = argv[++i];
        if (value === undefined) return { ok: false, error: `Missing value for --authorformat (${AUTHOR_FORMAT_HINT})` };
        const parsed = parseAuthorFormat(value);
        if (!parsed) return { ok: false, error: `Invalid value for --authorformat: ${value} (${AUTHOR_FORMAT_HINT})` };
        authorOrder = parsed;
        break;
      }
      case '--out': {
        const value = argv[++i];
        if (value === undefined) return { ok: false, error: 'Missing value for --out' };
        outputDirectory = value;
        break;
      }
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  if (!inputDirectory || inputDirectory.trim() === '') return { ok: false };

  return {
    ok: true,
    options: {
      inputDirectory,
      outputDirectory,
      apply,
      move,
      recursive,
      stripDiacritics,
      applyTitleCase,
      authorOrder,
    },
  };
}
