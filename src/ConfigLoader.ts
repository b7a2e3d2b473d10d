// file: src/ConfigLoader.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ComposeConfig } from './ComposePrimitives';
import { withContext } from './ErrorContext';

/** Name of the config file looked up at the root of the private tree. */
export const CONFIG_NAME = '.compose.yml';

const configSchema = z.object({
  entries: z.array(z.string().min(1)),
  no_copy: z.array(z.string().min(1)).default([]),
  no_remove: z.array(z.string().min(1)).default([]),
  workspace_tools: z.array(z.string().min(1)).default([])
});

/**
 * Parses and validates config text.
 * @param text - YAML document.
 * @param source - Where the text came from, for error messages.
 */
export function parseConfig(text: string, source: string = CONFIG_NAME): ComposeConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err: unknown) {
    throw new Error(`failed to parse ${source}`, { cause: err });
  }
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`invalid config ${source}: ${issues}`);
  }
  return {
    entries: result.data.entries,
    noCopy: result.data.no_copy,
    noRemove: result.data.no_remove,
    workspaceTools: result.data.workspace_tools
  };
}

/**
 * Reads the config of a private tree.
 * @param inRoot - Root of the private tree.
 * @param configPath - Explicit config location; defaults to `<inRoot>/.compose.yml`.
 */
export async function loadConfig(inRoot: string, configPath?: string): Promise<ComposeConfig> {
  const file = configPath ?? path.join(inRoot, CONFIG_NAME);
  const text = await withContext(fs.readFile(file, 'utf-8'), `failed to read ${file}`);
  return parseConfig(text, file);
}
