// file: src/ManifestWriter.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { hasErrorCode, withContext } from './ErrorContext';

/** Workspace manifest written at the output root; also the package descriptor looked for in entries. */
export const MANIFEST_NAME = 'Cargo.toml';

const INDENT = '    ';

async function hasPackageDescriptor(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path.join(dir, MANIFEST_NAME));
    return stats.isFile();
  } catch (err: unknown) {
    // Entry is missing or is a plain file
    if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
}

/**
 * Returns the declared entries whose output directory holds a package descriptor, in order.
 */
export async function collectTasks(outRoot: string, entries: readonly string[]): Promise<string[]> {
  const tasks: string[] = [];
  for (const entry of entries) {
    if (await hasPackageDescriptor(path.join(outRoot, entry))) {
      tasks.push(entry);
    }
  }
  return tasks;
}

function renderMembers(title: string, members: readonly string[]): string[] {
  // TOML basic strings share JSON's escaping for the characters paths contain
  return [`${INDENT}# ${title}`, ...members.map(m => `${INDENT}${JSON.stringify(m.split(path.sep).join('/'))},`)];
}

/**
 * Renders the workspace manifest text with a tasks section and a tools section.
 */
export function renderWorkspaceManifest(tasks: readonly string[], tools: readonly string[]): string {
  const lines = [
    '[workspace]',
    'members = [',
    ...renderMembers('Tasks', tasks),
    '',
    ...renderMembers('Tools', tools),
    ']'
  ];
  return lines.join('\n') + '\n';
}

/**
 * Writes `<outRoot>/Cargo.toml` listing the packaged entries and the tools.
 * @returns The manifest text that was written.
 */
export async function writeWorkspaceManifest(
  outRoot: string,
  entries: readonly string[],
  tools: readonly string[]
): Promise<string> {
  const tasks = await collectTasks(outRoot, entries);
  const content = renderWorkspaceManifest(tasks, tools);
  const target = path.join(outRoot, MANIFEST_NAME);
  await withContext(fs.writeFile(target, content, 'utf-8'), `failed to write ${target}`);
  return content;
}
