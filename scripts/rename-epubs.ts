import { constants as fsConstants, promises as fs } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { Effect } from "effect";
import { readEpubMetadata } from "./epub.ts";
import { probeFromNames } from "./collision.ts";
import { parseArgs, type RenameOptions } from "./options.ts";
import { fileNameOf, planRenames, type ProposedName, type RenameSource } from "./plan.ts";
import { csvEscape, formatPreview, formatSummary, formatUsage } from "./report.ts";

const EPUB_EXT = ".epub";
const LOG_NAME = "rename-log.csv";
const READ_CONCURRENCY = 4;

const toError = (e: unknown) => (e instanceof Error ? e : new Error(String(e)));

const ensureDirE = (dir: string) =>
  Effect.tryPromise({ try: () => fs.mkdir(dir, { recursive: true }), catch: toError }).pipe(Effect.as(void 0));

const pad = (n: number) => String(n).padStart(2, "0");

export function defaultOutputDirectory(inputDirectory: string, now: Date = new Date()): string {
  const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}`;
  return path.join(inputDirectory, `Renamed_${stamp}`);
}

// sorted so the batch order, and with it who keeps the plain name, is reproducible
export const listEpubsE = (root: string, recursive: boolean, ignoreDir?: string) =>
  Effect.tryPromise({
    try: async () => {
      const out: string[] = [];
      const stack: string[] = [root];
      while (stack.length) {
        const dir = stack.pop() ?? root;
        const entries = await fs.readdir(dir, { withFileTypes: true });
        for (const e of entries) {
          const abs = path.join(dir, e.name);
          if (e.isDirectory()) {
            if (recursive && abs !== ignoreDir) stack.push(abs);
          } else if (e.isFile() && path.extname(e.name).toLowerCase() === EPUB_EXT) {
            out.push(abs);
          }
        }
      }
      return out.sort();
    },
    catch: toError,
  });

const listExistingNamesE = (dir: string) =>
  Effect.tryPromise(() => fs.readdir(dir)).pipe(Effect.catchAll(() => Effect.succeed<string[]>([])));

const readSourceE = (file: string) =>
  readEpubMetadata(file).pipe(
    Effect.map((metadata): RenameSource | undefined => ({ sourceId: file, fileName: path.basename(file), metadata })),
    Effect.catchAll((err) =>
      Effect.sync(() => {
        console.error(`[WARN] Skipping unreadable EPUB: ${file} (${err._tag}: ${err.message})`);
        return undefined;
      })
    )
  );

type Outcome = "copied" | "moved" | "skipped";

const moveFile = async (src: string, dest: string) => {
  try {
    await fs.access(dest);
    throw new Error(`Destination exists: ${dest}`);
  } catch (e) {
    if (!(e instanceof Error && "code" in e && e.code === "ENOENT")) throw e;
  }
  try {
    await fs.rename(src, dest);
  } catch (e) {
    // rename cannot cross devices
    if (!(e instanceof Error && "code" in e && e.code === "EXDEV")) throw e;
    await fs.copyFile(src, dest, fsConstants.COPYFILE_EXCL);
    await fs.unlink(src);
  }
};

type Applied = { outcome: Outcome; logLine?: string };

const applyOneE = (item: ProposedName, outDir: string, move: boolean): Effect.Effect<Applied> => {
  const dest = path.join(outDir, fileNameOf(item));
  const done: Outcome = move ? "moved" : "copied";
  return Effect.tryPromise({
    try: () => (move ? moveFile(item.sourceId, dest) : fs.copyFile(item.sourceId, dest, fsConstants.COPYFILE_EXCL)),
    catch: toError,
  }).pipe(
    Effect.map((): Applied => ({ outcome: done, logLine: `${csvEscape(item.sourceId)},${csvEscape(dest)}` })),
    Effect.catchAll((err) =>
      Effect.sync((): Applied => {
        console.error(`[WARN] Skipped: ${item.sourceId} -> ${fileNameOf(item)} (${err.message})`);
        return { outcome: "skipped" };
      })
    )
  );
};

export const applyPlanE = (proposals: readonly ProposedName[], outDir: string, move: boolean) =>
  Effect.gen(function* (_) {
    yield* _(ensureDirE(outDir));
    const results = yield* _(Effect.forEach(proposals, (item) => applyOneE(item, outDir, move)));

    const logLines = ["Original,New", ...results.flatMap((r) => (r.logLine ? [r.logLine] : []))];
    const logPath = path.join(outDir, LOG_NAME);
    yield* _(Effect.tryPromise({ try: () => fs.writeFile(logPath, "\uFEFF" + logLines.join("\n") + "\n", "utf8"), catch: toError }));

    const count = (o: Outcome) => results.filter((r) => r.outcome === o).length;
    return { copied: count("copied"), moved: count("moved"), skipped: count("skipped"), logPath };
  });

export function renameEffect(options: RenameOptions) {
  const inputDir = path.resolve(options.inputDirectory);
  const outDir = path.resolve(options.outputDirectory || defaultOutputDirectory(inputDir));

  return Effect.gen(function* (_) {
    const files = yield* _(listEpubsE(inputDir, options.recursive, outDir));
    if (files.length === 0) {
      console.log("No .epub files found.");
      return 0;
    }

    const read = yield* _(Effect.forEach(files, readSourceE, { concurrency: READ_CONCURRENCY }));
    const sources = read.filter((s): s is RenameSource => s !== undefined);
    if (sources.length === 0) {
      console.log("No readable EPUBs found.");
      return 0;
    }

    const existing = yield* _(listExistingNamesE(outDir));
    const { proposals, report } = planRenames(sources, options, probeFromNames(existing));

    for (const line of formatPreview(proposals)) console.log(line);

    if (!options.apply) {
      for (const line of formatSummary(report, options)) console.log(line);
      console.log("Dry run only. Re-run with --apply to perform copy/move.");
      return 0;
    }

    const result = yield* _(applyPlanE(proposals, outDir, options.move));
    console.log("");
    console.log(`Output directory: ${outDir}`);
    console.log(`Copied: ${result.copied}, Moved: ${result.moved}, Skipped: ${result.skipped}`);
    console.log(`Log written: ${result.logPath}`);
    return 0;
  });
}

export async function run(argv: readonly string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const parsed = parseArgs(argv, env);
  if (!parsed.ok) {
    if (parsed.error) console.error(parsed.error);
    for (const line of formatUsage()) console.log(line);
    return 1;
  }

  const { options } = parsed;
  const inputDir = path.resolve(options.inputDirectory);
  const isDir = await fs.stat(inputDir).then((s) => s.isDirectory(), () => false);
  if (!isDir) {
    console.error(`Input directory not found: ${options.inputDirectory}`);
    return 2;
  }

  return Effect.runPromise(renameEffect(options));
}

// Only run when executed directly
const isDirect = import.meta.url === pathToFileURL(process.argv[1] || "").href;
if (isDirect) {
  run().then((code) => { process.exitCode = code; }, (err) => { console.error(err); process.exit(1); });
}
