// Utility to generate a temp directory with many source files containing compose directives
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

// Mix of redacted sources and files copied as is
export const extensions = ['rs', 'rs', 'rs', 'toml', 'md'];

/**
 * Generates a temporary tree of task directories, each holding a few files.
 * Every .rs file carries one private block of 100 lines and one private line.
 * @param options.prefix Prefix for mkdtemp (defaults to 'perf-').
 * @param options.totalFiles Number of files to create (defaults to 5000).
 * @returns Object with tmpDir and array of file paths created.
 */
export async function generatePerfTree(
  options?: { prefix?: string; totalFiles?: number }
): Promise<{ tmpDir: string; files: string[] }> {
  const prefix = options?.prefix ?? 'perf-';
  const totalFiles = options?.totalFiles ?? 5000;
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const files: string[] = [];
  for (let i = 0; i < totalFiles; i++) {
    const ext = extensions[i % extensions.length];
    const dir = path.join(tmpDir, `task${Math.floor(i / 50)}`);
    await fs.mkdir(dir, { recursive: true });
    const filename = path.join(dir, `file${i}.${ext}`);
    const lines: string[] = [`// file ${i}`, 'pub fn solve() -> u64 {'];
    lines.push('    // compose::begin_private(unimplemented)');
    for (let j = 0; j < 100; j++) {
      lines.push(`    let v${j} = ${j};`);
    }
    lines.push('    // compose::end_private');
    lines.push('}', '', `const SEED: u64 = ${i}; // compose::private(no_hint)`, '');
    await fs.writeFile(filename, lines.join('\n'), 'utf-8');
    files.push(filename);
  }
  return { tmpDir, files };
}
