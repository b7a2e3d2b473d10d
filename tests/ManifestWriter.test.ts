import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  collectTasks,
  renderWorkspaceManifest,
  writeWorkspaceManifest
} from '../src/ManifestWriter';

describe('renderWorkspaceManifest', () => {
  test('lists tasks then tools', () => {
    expect(renderWorkspaceManifest(['add', 'sort'], ['tools/checker'])).toBe(
      [
        '[workspace]',
        'members = [',
        '    # Tasks',
        '    "add",',
        '    "sort",',
        '',
        '    # Tools',
        '    "tools/checker",',
        ']',
        ''
      ].join('\n')
    );
  });

  test('keeps only the comment for an empty section', () => {
    expect(renderWorkspaceManifest([], [])).toBe(
      '[workspace]\nmembers = [\n    # Tasks\n\n    # Tools\n]\n'
    );
  });

  test('quotes members as TOML strings', () => {
    expect(renderWorkspaceManifest(['we"ird'], [])).toContain('    "we\\"ird",\n');
  });
});

describe('workspace manifest on disk', () => {
  let out: string;
  beforeEach(async () => {
    out = await fs.mkdtemp(path.join(os.tmpdir(), 'skeleton-manifest-'));
  });
  afterEach(async () => {
    await fs.rm(out, { recursive: true, force: true });
  });

  test('collectTasks keeps declared entries holding a Cargo.toml, in order', async () => {
    await fs.mkdir(path.join(out, 'b'));
    await fs.writeFile(path.join(out, 'b', 'Cargo.toml'), '[package]\n');
    await fs.mkdir(path.join(out, 'a'));
    await fs.writeFile(path.join(out, 'a', 'Cargo.toml'), '[package]\n');
    await fs.mkdir(path.join(out, 'docs'));
    await fs.writeFile(path.join(out, 'notes.txt'), 'notes');

    expect(await collectTasks(out, ['b', 'docs', 'notes.txt', 'missing', 'a'])).toEqual(['b', 'a']);
  });

  test('writeWorkspaceManifest writes Cargo.toml at the output root', async () => {
    await fs.mkdir(path.join(out, 'add'));
    await fs.writeFile(path.join(out, 'add', 'Cargo.toml'), '[package]\n');

    const content = await writeWorkspaceManifest(out, ['add'], ['tools/checker']);

    expect(await fs.readFile(path.join(out, 'Cargo.toml'), 'utf-8')).toBe(content);
    expect(content).toBe(renderWorkspaceManifest(['add'], ['tools/checker']));
  });
});
