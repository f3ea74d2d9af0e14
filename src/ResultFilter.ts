// file: src/ResultFilter.ts
import Ajv from 'ajv';
import { FileAccessError } from './FileAccessor';
import { IgnoreRangeManager } from './IgnoreRangeManager';
import { describeError, verboseLog } from './logger';
import diagnosticSchema from './schema/diagnostic.schema.json';
import { createRange, SourceRange, wholeFile } from './SourceRange';

/**
 * One finding reported by an analyzer.
 */
export interface Diagnostic {
  /** Path of the file the finding is in. */
  file: string;
  analyzer: string;
  rule?: string;
  message: string;
  /** 1-based first line; absent for findings about the whole file. */
  line?: number;
  /** 0-based column on `line`. */
  column?: number;
  endLine?: number;
  endColumn?: number;
}

export interface FilterOutcome {
  /** Diagnostics to report, in input order. */
  kept: Diagnostic[];
  /** Diagnostics covered by an ignore directive, in input order. */
  ignored: Diagnostic[];
  /** Files that could not be read; their diagnostics are all kept. */
  failedFiles: string[];
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDiagnostic = ajv.compile<Diagnostic>(diagnosticSchema);

/**
 * The source range a diagnostic refers to.
 * @throws RangeError when the end position precedes the start.
 */
export function affectedCode(diagnostic: Diagnostic): SourceRange {
  if (diagnostic.line === undefined) {
    return wholeFile(diagnostic.file);
  }
  const start = { line: diagnostic.line, column: diagnostic.column ?? 0 };
  const stop = {
    line: diagnostic.endLine ?? start.line,
    column: diagnostic.endColumn ?? start.column
  };
  return createRange(diagnostic.file, start, stop);
}

/**
 * Parses diagnostics given as a JSON array or as JSON Lines (one object per line).
 * @throws Error naming the first record that is not a valid diagnostic.
 */
export function parseDiagnostics(text: string): Diagnostic[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return [];
  }
  let records: unknown[];
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed)) {
      throw new Error('Invalid diagnostics input: expected a JSON array');
    }
    records = parsed;
  } else {
    records = trimmed
      .split(/\r?\n/)
      .filter(line => line.trim().length > 0)
      .map((line, index) => {
        try {
          return JSON.parse(line);
        } catch (err: unknown) {
          throw new Error(`Invalid diagnostics input: record ${index} is not JSON (${describeError(err)})`);
        }
      });
  }
  return records.map((record, index) => {
    if (!validateDiagnostic(record)) {
      const details = ajv.errorsText(validateDiagnostic.errors);
      throw new Error(`Invalid diagnostics input: record ${index}: ${details}`);
    }
    try {
      affectedCode(record);
    } catch (err: unknown) {
      throw new Error(`Invalid diagnostics input: record ${index}: ${describeError(err)}`, { cause: err });
    }
    return record;
  });
}

/**
 * Splits diagnostics into those to report and those covered by ignore
 * directives. A diagnostic whose file cannot be read, or whose range is
 * malformed, is reported rather than dropped, and never stops the others
 * from being decided.
 */
export async function partitionDiagnostics(
  diagnostics: Diagnostic[],
  manager: IgnoreRangeManager,
  verbose: boolean = false
): Promise<FilterOutcome> {
  const failedFiles = new Set<string>();
  const decisions = await Promise.all(diagnostics.map(async diagnostic => {
    const origin = { analyzer: diagnostic.analyzer, rule: diagnostic.rule };
    let range: SourceRange;
    try {
      range = affectedCode(diagnostic);
    } catch (err: unknown) {
      if (!(err instanceof RangeError)) {
        throw err;
      }
      if (verbose) verboseLog(`Reporting diagnostic in ${diagnostic.file} unfiltered: ${err.message}`);
      return false;
    }
    try {
      return await manager.isIgnored(range, origin);
    } catch (err: unknown) {
      if (!(err instanceof FileAccessError)) {
        throw err;
      }
      if (verbose && !failedFiles.has(err.file)) {
        verboseLog(`Reporting diagnostics in ${err.file} unfiltered: ${err.message}`);
      }
      failedFiles.add(err.file);
      return false;
    }
  }));
  const kept: Diagnostic[] = [];
  const ignored: Diagnostic[] = [];
  diagnostics.forEach((diagnostic, index) => {
    (decisions[index] ? ignored : kept).push(diagnostic);
  });
  return { kept, ignored, failedFiles: Array.from(failedFiles) };
}
