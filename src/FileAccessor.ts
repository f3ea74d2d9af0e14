// file: src/FileAccessor.ts
import * as crypto from 'crypto';
import * as fs from 'fs/promises';

/**
 * Line-level read access to source files, keyed by file identity.
 */
export interface FileAccessor {
  /** Content-derived identity used to validate cached snapshots. */
  fingerprint(file: string): Promise<string>;
  /** Number of lines in the file. */
  lineCount(file: string): Promise<number>;
  /** Text of a 1-based line, without its line terminator. */
  readLine(file: string, line: number): Promise<string>;
  /** Drops whatever is held for `file`; a later read loads it again. */
  release?(file: string): void;
}

/**
 * A file could not be read. Fatal for the query that triggered it only.
 */
export class FileAccessError extends Error {
  constructor(readonly file: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read ${file}: ${detail}`, { cause });
    this.name = 'FileAccessError';
  }
}

interface LoadedFile {
  lines: string[];
  fingerprint: string;
}

/**
 * Reads files from the local filesystem, loading each file once.
 */
export class FsFileAccessor implements FileAccessor {
  private readonly files = new Map<string, Promise<LoadedFile>>();

  async fingerprint(file: string): Promise<string> {
    return (await this.load(file)).fingerprint;
  }

  async lineCount(file: string): Promise<number> {
    return (await this.load(file)).lines.length;
  }

  async readLine(file: string, line: number): Promise<string> {
    const { lines } = await this.load(file);
    if (!Number.isInteger(line) || line < 1 || line > lines.length) {
      throw new FileAccessError(file, new RangeError(`line ${line} is outside 1..${lines.length}`));
    }
    return lines[line - 1];
  }

  release(file: string): void {
    this.files.delete(file);
  }

  private load(file: string): Promise<LoadedFile> {
    let loading = this.files.get(file);
    if (!loading) {
      // A failed read is retried on the next request
      loading = readLoadedFile(file).catch((err: unknown) => {
        this.files.delete(file);
        throw err;
      });
      this.files.set(file, loading);
    }
    return loading;
  }
}

async function readLoadedFile(file: string): Promise<LoadedFile> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (err: unknown) {
    throw new FileAccessError(file, err);
  }
  const fingerprint = crypto.createHash('sha256').update(content).digest('hex');
  if (content.length === 0) {
    return { lines: [], fingerprint };
  }
  const lines = content.split(/\r?\n/);
  // A trailing newline ends the last line rather than starting a new one
  if (content.endsWith('\n')) {
    lines.pop();
  }
  return { lines, fingerprint };
}
