import { processDir } from '../src/TreeSync';
import { generatePerfTree } from './utils';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Performance benchmark: mirror and redact a large generated tree.
 */
// Increase timeout for performance benchmarks
jest.setTimeout(60000);
test('performance benchmark for tree redaction', async () => {
  const { tmpDir, files } = await generatePerfTree({ prefix: 'redact-' });
  const outDir = `${tmpDir}-out`;
  try {
    const hrStart = process.hrtime();
    const cpuStart = process.cpuUsage();
    await processDir(tmpDir, outDir, new Set());
    const hrDiff = process.hrtime(hrStart);
    const cpuDiff = process.cpuUsage(cpuStart);
    const elapsed = hrDiff[0] + hrDiff[1] / 1e9;
    const userMs = cpuDiff.user / 1000;
    const sysMs = cpuDiff.system / 1000;
    console.log(
      `Redacted ${files.length} files in ${elapsed.toFixed(3)}s; ` +
      `CPU user ${userMs.toFixed(1)}ms sys ${sysMs.toFixed(1)}ms`
    );
    const sample = await fs.readFile(path.join(outDir, 'task0', 'file0.rs'), 'utf-8');
    expect(sample).toBe(
      '// file 0\npub fn solve() -> u64 {\n    // TODO: your code here.\n    unimplemented!()\n}\n\n'
    );
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
    await fs.rm(outDir, { recursive: true, force: true });
  }
});
