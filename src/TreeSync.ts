// file: src/TreeSync.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { TextDecoder } from 'util';
import { redactSource } from './Redactor';
import { withContext, withContextSync } from './ErrorContext';
import { verboseLog } from './logger';
import { ComposeConfig } from './ComposePrimitives';

/** Files with this suffix go through redaction; everything else is copied as is. */
export const SOURCE_SUFFIX = '.rs';

/**
 * Determine whether the given file should be redacted rather than copied byte for byte.
 */
export function isSourceFile(file: string): boolean {
  return file.endsWith(SOURCE_SUFFIX);
}

// Invalid UTF-8 fails the read instead of turning into U+FFFD; a BOM is kept as is
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

async function readSource(file: string): Promise<string> {
  const bytes = await fs.readFile(file);
  return utf8.decode(bytes);
}

/**
 * Copies one file into the output tree, redacting it first if it is a source file.
 * The parent directory of `outPath` is created as needed.
 */
export async function processFile(inPath: string, outPath: string, verbose: boolean = false): Promise<void> {
  const outDir = path.dirname(outPath);
  await withContext(fs.mkdir(outDir, { recursive: true }), `failed to create dir ${outDir}`);

  if (isSourceFile(inPath)) {
    if (verbose) verboseLog(`Redacting file: ${inPath}`);
    const content = await withContext(readSource(inPath), `failed to read file ${inPath}`);
    const redacted = withContextSync(() => redactSource(content), `failed to process file ${inPath}`);
    await withContext(fs.writeFile(outPath, redacted, 'utf-8'), `failed to write file ${outPath}`);
  } else {
    if (verbose) verboseLog(`Copying file: ${inPath}`);
    await withContext(fs.copyFile(inPath, outPath), `failed to copy ${inPath} to ${outPath}`);
  }
}

async function isDirectory(p: string): Promise<boolean> {
  // stat follows symlinks, so a link to a directory is mirrored as a directory
  const stats = await withContext(fs.stat(p), `failed to read entry ${p}`);
  return stats.isDirectory();
}

/**
 * Recursively mirrors `inPath` into `outPath`, one entry at a time in name order.
 * Entries whose bare name is in `excluded` are skipped at every depth.
 * Output directories only appear once a file is written into them.
 */
export async function processDir(
  inPath: string,
  outPath: string,
  excluded: ReadonlySet<string>,
  verbose: boolean = false
): Promise<void> {
  const names = await withContext(fs.readdir(inPath), `failed to read dir ${inPath}`);
  for (const name of names.sort()) {
    if (excluded.has(name)) {
      if (verbose) verboseLog(`Skipping excluded entry: ${path.join(inPath, name)}`);
      continue;
    }
    const childIn = path.join(inPath, name);
    const childOut = path.join(outPath, name);
    if (await isDirectory(childIn)) {
      await processDir(childIn, childOut, excluded, verbose);
    } else {
      await processFile(childIn, childOut, verbose);
    }
  }
}

/**
 * Mirrors each declared entry of the input root into the output root, in order.
 * The exclusion set applies below the entries, not to the entries themselves.
 */
export async function processEntries(
  inRoot: string,
  outRoot: string,
  entries: readonly string[],
  excluded: ReadonlySet<string>,
  verbose: boolean = false
): Promise<void> {
  for (const entry of entries) {
    const inPath = path.join(inRoot, entry);
    const outPath = path.join(outRoot, entry);
    if (verbose) verboseLog(`Processing entry: ${entry}`);
    if (await isDirectory(inPath)) {
      await processDir(inPath, outPath, excluded, verbose);
    } else {
      await processFile(inPath, outPath, verbose);
    }
  }
}

/**
 * Normalizes an entry so it compares equal to a directory listing name:
 * `./tasks/` and `tasks` are the same entry.
 */
export function normalizeEntryName(entry: string): string {
  return path.normalize(entry).replace(/[\\/]+$/, '');
}

/**
 * Builds the set of top-level output names that pruning must keep.
 */
export function buildSpareSet(config: ComposeConfig, extra: readonly string[] = []): Set<string> {
  return new Set([...config.entries, ...config.noRemove, ...extra].map(normalizeEntryName));
}

/**
 * Removes every top-level entry of `outRoot` whose name is not spared.
 * Directories are removed with their contents; spared directories are left untouched.
 *
 * @returns Names of the removed entries, in name order.
 */
export async function pruneEntries(
  outRoot: string,
  spare: ReadonlySet<string>,
  verbose: boolean = false
): Promise<string[]> {
  const names = await withContext(fs.readdir(outRoot), `failed to read dir ${outRoot}`);
  const removed: string[] = [];
  for (const name of names.sort()) {
    if (spare.has(name)) {
      continue;
    }
    const target = path.join(outRoot, name);
    if (verbose) verboseLog(`Pruning entry: ${target}`);
    await withContext(fs.rm(target, { recursive: true }), `failed to remove ${target}`);
    removed.push(name);
  }
  return removed;
}
