// Utility to generate a temp directory with many files containing ignore directives
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

// Supported file extensions and which use hash-style comments
export const langs = [
  'ts', 'js', 'py', 'bzl', 'java', 'c', 'cpp', 'go', 'rs', 'rb', 'php', 'swift', 'kt', 'scala', 'sh', 'sql'
];
export const hashLangs = new Set(['py', 'bzl', 'rb', 'sh']);
export const dashLangs = new Set(['sql']);

/**
 * Generates a temporary directory of source files. Each file opens a
 * `start ignoring` region near the top, closes it after `linesPerFile / 2`
 * filler lines, and carries an inline `ignore` on every tenth line after that.
 * @param options.prefix Prefix for mkdtemp (defaults to 'perf-').
 * @param options.totalFiles Number of files to create (defaults to 2000).
 * @param options.linesPerFile Number of filler lines per file (defaults to 200).
 * @returns Object with tmpDir and array of file paths created.
 */
export async function generatePerfFiles(
  options?: { prefix?: string; totalFiles?: number; linesPerFile?: number }
): Promise<{ tmpDir: string; files: string[] }> {
  const prefix = options?.prefix ?? 'perf-';
  const totalFiles = options?.totalFiles ?? 2000;
  const linesPerFile = options?.linesPerFile ?? 200;
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const files: string[] = [];
  for (let i = 0; i < totalFiles; i++) {
    const ext = langs[i % langs.length];
    const comment = hashLangs.has(ext) ? '#' : dashLangs.has(ext) ? '--' : '//';
    const filename = path.join(tmpDir, `file${i}.${ext}`);
    const lines: string[] = [`${comment} start ignoring analyzer${i % 3}`];
    for (let j = 1; j <= linesPerFile; j++) {
      if (j === Math.floor(linesPerFile / 2)) {
        lines.push(`${comment} stop ignoring analyzer${i % 3}`);
      } else if (j % 10 === 0) {
        lines.push(`value_${j} = ${j} ${comment} ignore lint(R${j})`);
      } else {
        lines.push(`value_${j} = ${j}`);
      }
    }
    await fs.writeFile(filename, lines.join('\n') + '\n', 'utf-8');
    files.push(filename);
  }
  return { tmpDir, files };
}
