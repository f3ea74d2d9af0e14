#!/usr/bin/env node
// file: src/main.ts
import * as os from 'os';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Command, InvalidOptionArgumentError } from 'commander';
import { glob } from 'glob';
import Piscina from 'piscina';
import { parseFileDirectives } from './DirectiveMatcher';
import { validateDirectivePairing } from './DirectiveValidator';
import { FsFileAccessor } from './FileAccessor';
import { LineDirective } from './IgnorePrimitives';
import { IgnoreRangeManager } from './IgnoreRangeManager';
import { describeError, LOG_PREFIX, verboseLog } from './logger';
import { Diagnostic, parseDiagnostics, partitionDiagnostics } from './ResultFilter';
import { JsonSnapshotStore } from './SnapshotStore';

/**
 * Formats a diagnostic that survived filtering as one report line.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const location = d.line === undefined ? d.file : `${d.file}:${d.line}:${d.column ?? 0}`;
  const source = d.rule === undefined ? d.analyzer : `${d.analyzer}(${d.rule})`;
  return `${LOG_PREFIX} ${location} -> ${source}: ${d.message}`;
}

/**
 * Filters diagnostics through inline ignore directives, prints the ones that
 * remain and returns an exit code.
 *
 * @param input - Where to read diagnostics from: filePath, text directly, or a stdin stream.
 * @param verbose - Log scanning progress to stderr.
 * @param cachePath - Optional JSON snapshot cache reused across runs.
 * @returns Promise resolving to 0 if every diagnostic was ignored, 1 otherwise.
 */
export async function runFilter(
  input: { filePath?: string; text?: string; stdin?: NodeJS.ReadableStream },
  verbose: boolean = false,
  cachePath?: string
): Promise<number> {
  let text: string;
  const { stdin } = input;
  if (input.filePath && input.filePath !== '-') {
    text = await fs.readFile(input.filePath, 'utf-8');
  } else if (input.text !== undefined) {
    text = input.text;
  } else if (stdin) {
    text = await new Promise<string>((resolve, reject) => {
      let data = '';
      stdin.setEncoding('utf-8');
      stdin.on('data', (chunk: string) => { data += chunk; });
      stdin.on('end', () => resolve(data));
      stdin.on('error', err => reject(err));
    });
  } else {
    const details = `filePath=${input.filePath ?? 'undefined'}, textProvided=${input.text !== undefined}, stdinProvided=${!!stdin}`;
    throw new Error(`No diagnostics input provided (${details})`);
  }

  const diagnostics = parseDiagnostics(text);
  const store = cachePath ? new JsonSnapshotStore(cachePath, verbose) : undefined;
  const manager = new IgnoreRangeManager({ accessor: new FsFileAccessor(), store, verbose });
  const { kept, ignored, failedFiles } = await partitionDiagnostics(diagnostics, manager, verbose);
  for (const d of kept) {
    console.log(formatDiagnostic(d));
  }
  for (const file of failedFiles) {
    console.error(`${LOG_PREFIX} ${file} -> unreadable; its diagnostics are reported unfiltered`);
  }
  if (verbose) {
    verboseLog(`Ignored ${ignored.length} of ${diagnostics.length} diagnostic(s)`);
  }
  await manager.persist();
  return kept.length > 0 ? 1 : 0;
}

/**
 * Parses CLI arguments for the tool.
 * @param rawArgs - Array of arguments (excluding node and script path)
 * @returns Parsed options and any error message.
 */
export function parseCliArgs(rawArgs: string[]): {
  warnMode: boolean;
  showHelp: boolean;
  verbose: boolean;
  parallelism: number;
  cachePath?: string;
  diagnosticsFile?: string;
  scanDir?: string;
  error?: string;
} {
  const defaults = { warnMode: false, showHelp: false, verbose: false, parallelism: -1 };

  // Commander reports a missing option value through its own error text; name the option instead
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if (rawArgs[i + 1] !== undefined) continue;
    if (arg === '--parallelism' || arg === '-p') {
      return { ...defaults, error: 'Missing value for --parallelism' };
    }
    if (arg === '--cache' || arg === '-c') {
      return { ...defaults, error: 'Missing value for --cache' };
    }
    if (arg === '--scan' || arg === '-s') {
      return { ...defaults, error: 'Missing value for --scan' };
    }
  }

  const program = new Command();
  program
    .helpOption(false)
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });

  program
    .option('-w, --warn', 'Report remaining diagnostics but exit with code 0')
    .option('-h, --help', 'Show this help message and exit')
    .option('-v, --verbose', 'Show verbose logging (files being scanned)')
    .option(
      '-p, --parallelism <number>',
      'Number of scan workers (>=0), or -1 to default to CPU cores',
      (val: string) => {
        const num = Number(val);
        if (!Number.isInteger(num) || num < -1) {
          throw new InvalidOptionArgumentError(`Invalid parallelism value: ${val}`);
        }
        return num;
      },
      -1
    )
    .option('-c, --cache <file>', 'Reuse and update directive snapshots stored in this JSON file')
    .option('-s, --scan <dir>', 'Check start/stop ignore directives under a directory')
    .argument('[diagnosticsFile]', "Diagnostics file (or '-' or omitted to read from stdin)");

  try {
    program.parse(rawArgs, { from: 'user' });
  } catch (err: unknown) {
    return { ...defaults, error: describeError(err) };
  }

  const args = program.args;
  if (args.length > 1) {
    return { ...defaults, error: 'Too many arguments' };
  }
  const opts = program.opts<{
    warn?: boolean;
    help?: boolean;
    verbose?: boolean;
    parallelism: number;
    cache?: string;
    scan?: string;
  }>();
  return {
    warnMode: !!opts.warn,
    showHelp: !!opts.help,
    verbose: !!opts.verbose,
    parallelism: opts.parallelism,
    cachePath: opts.cache,
    diagnosticsFile: args[0],
    scanDir: opts.scan
  };
}

/**
 * Finds the ignore directives in every file under a directory and checks that
 * start and stop directives pair up.
 * @param dir Directory path to scan.
 * @param parallelism Number of worker threads; 0 parses on the main thread.
 * @param verbose Whether to enable verbose logging.
 * @returns Promise resolving to exit code: 0 if no errors, 1 if validation errors found.
 */
export async function runScan(dir: string, parallelism: number, verbose: boolean): Promise<number> {
  const relative = await glob('**/*', {
    cwd: dir,
    nodir: true,
    ignore: ['**/node_modules/**', '**/.git/**']
  });
  const files = relative.sort().map(f => path.join(dir, f));
  if (files.length === 0) {
    if (verbose) verboseLog(`No files found in ${dir}`);
    return 0;
  }
  const pool = parallelism > 0
    ? new Piscina({ filename: path.resolve(__dirname, 'parserWorker.js'), maxThreads: parallelism })
    : null;
  const parse = (file: string): Promise<LineDirective[]> =>
    pool ? pool.run(file) : parseFileDirectives(file);
  let errors = 0;
  try {
    await Promise.all(files.map(async file => {
      try {
        const directives = await parse(file);
        if (verbose && directives.length > 0) {
          verboseLog(`Validating ${directives.length} directive(s) in ${file}`);
        }
        errors += validateDirectivePairing(directives, file, msg => console.error(msg));
      } catch (err: unknown) {
        console.error(`${LOG_PREFIX} ${file} -> ${describeError(err)}`);
        errors++;
      }
    }));
  } finally {
    await pool?.destroy();
  }
  return errors > 0 ? 1 : 0;
}

// Execute when run as a CLI script
if (require.main === module) {
  const { warnMode, showHelp, verbose, parallelism, cachePath, diagnosticsFile, scanDir, error } =
    parseCliArgs(process.argv.slice(2));
  const usage = [
    'Usage: lazy-ignore [options] [diagnosticsFile]',
    '',
    'Options:',
    '  -h, --help              Show this help message and exit',
    '  -w, --warn              Report remaining diagnostics but exit with code 0',
    '  -v, --verbose           Show verbose logging (files being scanned)',
    '  -c, --cache <file>      Reuse and update directive snapshots stored in this JSON file',
    '  -p, --parallelism <n>   Number of scan workers, or -1 for CPU cores',
    '  -s, --scan <dir>        Check start/stop ignore directives under a directory',
    '',
    "Diagnostics are a JSON array or JSON Lines. If diagnosticsFile is '-' or omitted, input is read from stdin"
  ].join('\n');
  if (showHelp) {
    console.log(usage);
    process.exit(0);
  }
  if (error) {
    console.error(error);
    console.log(usage);
    process.exit(2);
  }
  const run = scanDir
    ? runScan(scanDir, parallelism >= 0 ? parallelism : Math.max(os.cpus().length, 1), verbose)
    : runFilter({ filePath: diagnosticsFile, stdin: process.stdin }, verbose, cachePath);
  run
    .then(code => process.exit(warnMode && code === 1 ? 0 : code))
    .catch((err: unknown) => {
      console.error(err instanceof Error && err.stack ? err.stack : err);
      process.exit(2);
    });
}
