// file: src/SourceRange.ts

/**
 * A location within a file.
 */
export interface Position {
  /** The 1-based line number. */
  readonly line: number;
  /** The 0-based column offset within the line. */
  readonly column: number;
}

/**
 * A span of source text in one file. `start` and `stop` are both null for a
 * range covering the whole file (a result without a precise location).
 */
export interface SourceRange {
  readonly file: string;
  readonly start: Position | null;
  readonly stop: Position | null;
}

/** A range that names a line span rather than the whole file. */
export interface LineSourceRange extends SourceRange {
  readonly start: Position;
  readonly stop: Position;
}

export type Ordering = -1 | 0 | 1;

/** Stop column used for spans that reach the end of their last line. */
export const LINE_END_COLUMN = Number.MAX_SAFE_INTEGER;

/**
 * Raised when two ranges from different files are compared.
 */
export class RangeFileMismatchError extends Error {
  constructor(readonly left: string, readonly right: string) {
    super(`Cannot order ranges from different files: '${left}' and '${right}'`);
    this.name = 'RangeFileMismatchError';
  }
}

function assertPosition(position: Position, role: string): void {
  if (!Number.isInteger(position.line) || position.line < 1) {
    throw new RangeError(`Invalid ${role} line ${position.line}: expected an integer >= 1`);
  }
  if (!Number.isInteger(position.column) || position.column < 0) {
    throw new RangeError(`Invalid ${role} column ${position.column}: expected an integer >= 0`);
  }
}

export function comparePositions(a: Position, b: Position): Ordering {
  if (a.line !== b.line) {
    return a.line < b.line ? -1 : 1;
  }
  if (a.column !== b.column) {
    return a.column < b.column ? -1 : 1;
  }
  return 0;
}

/**
 * Builds a line range. `stop` defaults to `start`.
 * @throws RangeError if a position is malformed or `stop` precedes `start`.
 */
export function createRange(file: string, start: Position, stop: Position = start): LineSourceRange {
  assertPosition(start, 'start');
  assertPosition(stop, 'stop');
  if (comparePositions(start, stop) > 0) {
    throw new RangeError(
      `Invalid range in ${file}: start ${start.line}:${start.column} is after stop ${stop.line}:${stop.column}`
    );
  }
  return { file, start: { ...start }, stop: { ...stop } };
}

export function wholeFile(file: string): SourceRange {
  return { file, start: null, stop: null };
}

export function isWholeFile(range: SourceRange): boolean {
  return range.start === null || range.stop === null;
}

export function isLineRange(range: SourceRange): range is LineSourceRange {
  return range.start !== null && range.stop !== null;
}

/**
 * Orders two ranges of the same file by start, then stop. Whole-file ranges
 * sort before line ranges.
 * @throws RangeFileMismatchError when the ranges belong to different files.
 */
export function compareRanges(a: SourceRange, b: SourceRange): Ordering {
  if (a.file !== b.file) {
    throw new RangeFileMismatchError(a.file, b.file);
  }
  if (!isLineRange(a) || !isLineRange(b)) {
    if (isLineRange(a)) return 1;
    if (isLineRange(b)) return -1;
    return 0;
  }
  const byStart = comparePositions(a.start, b.start);
  return byStart !== 0 ? byStart : comparePositions(a.stop, b.stop);
}

/**
 * Tests whether `inner` lies inside `outer`. A whole-file `outer` contains
 * every range of its file; a whole-file `inner` lies inside no line range.
 */
export function containsRange(outer: SourceRange, inner: SourceRange): boolean {
  if (outer.file !== inner.file) {
    return false;
  }
  if (!isLineRange(outer)) {
    return true;
  }
  if (!isLineRange(inner)) {
    return false;
  }
  return comparePositions(inner.start, outer.start) >= 0 &&
    comparePositions(inner.stop, outer.stop) <= 0;
}

export function formatRange(range: SourceRange): string {
  if (!isLineRange(range)) {
    return range.file;
  }
  const { start, stop } = range;
  const head = `${range.file}:${start.line}:${start.column}`;
  return comparePositions(start, stop) === 0 ? head : `${head}-${stop.line}:${stop.column}`;
}
