#!/usr/bin/env node
// file: src/main.ts
import * as fs from 'fs/promises';
import { Command } from 'commander';
import { loadConfig } from './ConfigLoader';
import { processEntries, pruneEntries, buildSpareSet } from './TreeSync';
import { writeWorkspaceManifest } from './ManifestWriter';
import { withContext } from './ErrorContext';
import { verboseLog, logFatal } from './logger';

/**
 * Everything a compose run needs besides the config file.
 */
export interface ComposeOptions {
  /** Root of the private tree (holds `.compose.yml`). */
  inPath: string;
  /** Root of the public tree to produce. */
  outPath: string;
  /** Skip copying and redaction; only prune and write the manifest. */
  noProcess: boolean;
  /** Extra top-level names spared from pruning. */
  spare: string[];
  /** Extra workspace tools appended after the configured ones. */
  addTools: string[];
  /** Config file to use instead of `<inPath>/.compose.yml`. */
  configPath?: string;
  verbose: boolean;
}

/**
 * Runs the whole pipeline: load config, mirror and redact entries, prune the
 * output root, write the workspace manifest. The first failure rejects with a
 * chain of causes describing where it happened.
 */
export async function runCompose(options: ComposeOptions): Promise<void> {
  const { inPath, outPath, verbose } = options;
  const config = await withContext(loadConfig(inPath, options.configPath), 'failed to read config');

  if (!options.noProcess) {
    await withContext(fs.mkdir(outPath, { recursive: true }), `failed to create dir ${outPath}`);
    await withContext(
      processEntries(inPath, outPath, config.entries, new Set(config.noCopy), verbose),
      'failed to process entries'
    );
  } else if (verbose) {
    verboseLog('Skipping file processing');
  }

  const spare = buildSpareSet(config, options.spare);
  const removed = await withContext(pruneEntries(outPath, spare, verbose), 'failed to prune entries');
  if (verbose) verboseLog(`Pruned ${removed.length} entries`);

  await withContext(
    writeWorkspaceManifest(outPath, config.entries, [...config.workspaceTools, ...options.addTools]),
    'failed to write workspace manifest'
  );
}

type CliOptionValues = {
  inPath?: string;
  outPath?: string;
  process: boolean;
  spare: string[];
  addTool: string[];
  config?: string;
  verbose?: boolean;
  help?: boolean;
};

/** Options that take a value, as [short, long]. */
const VALUE_OPTIONS: ReadonlyArray<[string, string]> = [
  ['-i', '--in-path'],
  ['-o', '--out-path'],
  ['-s', '--spare'],
  ['-t', '--add-tool'],
  ['-c', '--config']
];

/**
 * Parses CLI arguments for the tool.
 * @param rawArgs - Array of arguments (excluding node and script path)
 * @returns Parsed options and any error message.
 */
export function parseCliArgs(rawArgs: string[]): {
  showHelp: boolean;
  verbose: boolean;
  noProcess: boolean;
  spare: string[];
  addTools: string[];
  inPath?: string;
  outPath?: string;
  configPath?: string;
  error?: string;
} {
  let showHelp = false;
  let verbose = false;
  let noProcess = false;
  const spare: string[] = [];
  const addTools: string[] = [];

  // Report a dangling value option ourselves instead of commander's wording
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    const option = VALUE_OPTIONS.find(([short, long]) => arg === short || arg === long);
    if (option && rawArgs[i + 1] === undefined) {
      return { showHelp, verbose, noProcess, spare, addTools, error: `Missing value for ${option[1]}` };
    }
  }

  const collect = (val: string, prev: string[]): string[] => {
    prev.push(val);
    return prev;
  };
  const program = new Command();
  program
    .helpOption(false)
    .exitOverride()
    .configureOutput({ writeErr: () => {} });

  program
    .option('-i, --in-path <path>', 'Path to the private repo')
    .option('-o, --out-path <path>', 'Path to the public repo')
    .option('--no-process', 'Disable file processing (prune and write the manifest only)')
    .option('-s, --spare <name>', 'Spare the given top-level entry from pruning (repeatable)', collect, new Array<string>())
    .option('-t, --add-tool <path>', 'Add the given tool to the workspace manifest (repeatable)', collect, new Array<string>())
    .option('-c, --config <path>', 'Config file to use instead of <in-path>/.compose.yml')
    .option('-v, --verbose', 'Show verbose logging (files being processed)')
    .option('-h, --help', 'Show this help message and exit');

  let opts: CliOptionValues;
  try {
    program.parse(rawArgs, { from: 'user' });
    opts = program.opts<CliOptionValues>();
  } catch (err: unknown) {
    return {
      showHelp,
      verbose,
      noProcess,
      spare,
      addTools,
      error: err instanceof Error ? err.message : String(err)
    };
  }

  showHelp = !!opts.help;
  verbose = !!opts.verbose;
  noProcess = !opts.process;
  spare.push(...opts.spare);
  addTools.push(...opts.addTool);
  const { inPath, outPath } = opts;
  const configPath = opts.config;

  if (program.args.length > 0) {
    return { showHelp, verbose, noProcess, spare, addTools, error: 'Too many arguments' };
  }
  if (!showHelp && inPath === undefined) {
    return { showHelp, verbose, noProcess, spare, addTools, error: 'Missing required option --in-path' };
  }
  if (!showHelp && outPath === undefined) {
    return { showHelp, verbose, noProcess, spare, addTools, error: 'Missing required option --out-path' };
  }
  return { showHelp, verbose, noProcess, spare, addTools, inPath, outPath, configPath };
}

// Execute when run as a CLI script
if (require.main === module) {
  const { showHelp, verbose, noProcess, spare, addTools, inPath, outPath, configPath, error } =
    parseCliArgs(process.argv.slice(2));
  const usage = [
    'Usage: rs-skeleton -i <in-path> -o <out-path> [options]',
    '',
    'Options:',
    '  -i, --in-path <path>   Path to the private repo',
    '  -o, --out-path <path>  Path to the public repo',
    '      --no-process       Disable file processing (prune and write the manifest only)',
    '  -s, --spare <name>     Spare the given top-level entry from pruning (repeatable)',
    '  -t, --add-tool <path>  Add the given tool to the workspace manifest (repeatable)',
    '  -c, --config <path>    Config file to use instead of <in-path>/.compose.yml',
    '  -v, --verbose          Show verbose logging (files being processed)',
    '  -h, --help             Show this help message and exit'
  ].join('\n');
  if (showHelp) {
    console.log(usage);
    process.exit(0);
  }
  if (error !== undefined || inPath === undefined || outPath === undefined) {
    console.error(error ?? 'Missing required options');
    console.log(usage);
    process.exit(2);
  }
  runCompose({ inPath, outPath, noProcess, spare, addTools, configPath, verbose })
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(err, verbose);
      process.exit(1);
    });
}
