import { splitExtension } from './stem.ts';

export type ExistsProbe = (fileName: string) => boolean;

/** Case-insensitive set of names already handed out in one batch. */
export class UsedNameSet {
  private readonly keys = new Set<string>();

  has(name: string): boolean {
    return this.keys.has(name.toLowerCase());
  }

  add(name: string): void {
    this.keys.add(name.toLowerCase());
  }

  get size(): number {
    return this.keys.size;
  }
}

export const noExistingNames: ExistsProbe = () => false;

/** Probe over a fixed listing, e.g. the destination directory read once before planning. */
export function probeFromNames(names: Iterable<string>): ExistsProbe {
  const existing = new UsedNameSet();
  for (const name of names) existing.add(name);
  return (fileName) => existing.has(fileName);
}

/**
 * Returns `candidate`, or `"{base} ({n}){ext}"` for the first n that is neither used in
 * this batch nor reported by `exists`, and records the result in `usedNames`.
 * Pass `extension` when the caller knows it, so a dot inside the stem is never taken for one.
 */
export function resolveCollision(
  candidate: string,
  usedNames: UsedNameSet,
  exists: ExistsProbe,
  extension: string = splitExtension(candidate).extension,
): string {
  const taken = (name: string) => usedNames.has(name) || exists(name);
  const ext = candidate.endsWith(extension) ? extension : '';
  const base = candidate.slice(0, candidate.length - ext.length);
  let name = candidate;
  for (let n = 1; taken(name); n++) name = `${base} (${n})${ext}`;
  usedNames.add(name);
  return name;
}

// earlier entries keep the plain name
export function resolveBatch(candidates: readonly string[], exists: ExistsProbe = noExistingNames): string[] {
  const used = new UsedNameSet();
  return candidates.map((candidate) => resolveCollision(candidate, used, exists));
}
