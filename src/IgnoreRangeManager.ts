// file: src/IgnoreRangeManager.ts
import { DirectiveMatcher, matchDirective } from './DirectiveMatcher';
import { FileAccessor } from './FileAccessor';
import { IgnoreInterval, LineDirective, ResultOrigin } from './IgnorePrimitives';
import { addInlineInterval, applyDirective, intervalsCover, targetsApply } from './IgnoreIntervals';
import { describeError, verboseLog } from './logger';
import { FileSnapshot, SnapshotStore } from './SnapshotStore';
import { formatRange, isLineRange, LineSourceRange, SourceRange } from './SourceRange';

export interface IgnoreRangeManagerOptions {
  /** Source of file lines and fingerprints. */
  accessor: FileAccessor;
  /** Snapshots from earlier runs; omitted means every file starts cold. */
  store?: SnapshotStore;
  /** Directive grammar; defaults to the flat target grammar. */
  matcher?: DirectiveMatcher;
  verbose?: boolean;
}

/**
 * Per-file state. Mutated only inside the file's lock.
 */
interface FileRecord {
  fingerprint: string;
  lineCount: number;
  /** Every line in 1..watermark has been classified. */
  watermark: number;
  /** Sorted by start line. */
  intervals: IgnoreInterval[];
  /** Changed since it was loaded or created. */
  dirty: boolean;
}

type ScanOutcome =
  | { kind: 'inline'; directive: LineDirective }
  | { kind: 'complete'; from: number; directives: LineDirective[] };

/**
 * Answers whether a result lies in a region its author marked as ignored.
 *
 * Files are scanned lazily: the first query for a line reads backward from
 * that line to the highest line already classified (the watermark), so a file
 * is only read as far as the results reported in it require. What was found
 * is kept per file, reused by later queries and can be persisted to a
 * {@link SnapshotStore} so unchanged files are not read again on the next run.
 */
export class IgnoreRangeManager {
  private readonly accessor: FileAccessor;
  private readonly store?: SnapshotStore;
  private readonly matcher: DirectiveMatcher;
  private readonly verbose: boolean;
  private readonly records = new Map<string, FileRecord>();
  private readonly locks = new Map<string, Promise<void>>();

  constructor(options: IgnoreRangeManagerOptions) {
    this.accessor = options.accessor;
    this.store = options.store;
    this.matcher = options.matcher ?? matchDirective;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Whether `range`, reported by `origin`, is covered by an ignore directive.
   * A whole-file range is ignored when any directive in the file applies to
   * `origin`.
   * @throws FileAccessError when the file cannot be read.
   */
  isIgnored(range: SourceRange, origin: ResultOrigin): Promise<boolean> {
    return this.withFileLock(range.file, async () => {
      const record = await this.resolveRecord(range.file);
      const ignored = isLineRange(range)
        ? await this.queryLines(record, range, origin)
        : await this.queryWholeFile(record, range.file, origin);
      if (record.watermark >= record.lineCount) {
        // Every line is classified; the text is not needed again
        this.accessor.release?.(range.file);
      }
      return ignored;
    });
  }

  /**
   * Snapshot of what is known about `file`, or undefined if it was never queried.
   */
  snapshotOf(file: string): FileSnapshot | undefined {
    const record = this.records.get(file);
    return record ? toSnapshot(record) : undefined;
  }

  /**
   * Saves the snapshot of every file whose state changed in this run, then
   * flushes the store.
   */
  async persist(): Promise<void> {
    const store = this.store;
    if (!store) {
      return;
    }
    for (const [file, record] of this.records) {
      await this.withFileLock(file, async () => {
        if (!record.dirty) return;
        await store.save(file, record.fingerprint, toSnapshot(record));
        record.dirty = false;
      });
    }
    await store.flush();
  }

  /**
   * Runs `task` after every earlier task for `file` has settled, so one
   * file's scan and commit never interleave with another query of that file.
   * The lock entry is removed once the last queued task settles.
   */
  private withFileLock<T>(file: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(file) ?? Promise.resolve();
    const next = previous.then(task);
    const settle = (): void => {
      if (this.locks.get(file) === tail) {
        this.locks.delete(file);
      }
    };
    const tail: Promise<void> = next.then(settle, settle);
    this.locks.set(file, tail);
    return next;
  }

  private async resolveRecord(file: string): Promise<FileRecord> {
    const known = this.records.get(file);
    if (known) {
      return known;
    }
    const fingerprint = await this.accessor.fingerprint(file);
    const lineCount = await this.accessor.lineCount(file);
    const snapshot = await this.loadSnapshot(file, fingerprint, lineCount);
    const record: FileRecord = snapshot
      ? { fingerprint, lineCount, watermark: snapshot.watermark, intervals: snapshot.intervals, dirty: false }
      : { fingerprint, lineCount, watermark: 0, intervals: [], dirty: true };
    this.records.set(file, record);
    return record;
  }

  private async loadSnapshot(file: string, fingerprint: string, lineCount: number): Promise<FileSnapshot | null> {
    if (!this.store) {
      return null;
    }
    let snapshot: FileSnapshot | null;
    try {
      snapshot = await this.store.load(file, fingerprint);
    } catch (err: unknown) {
      if (this.verbose) verboseLog(`Snapshot for ${file} unavailable (${describeError(err)}); scanning cold`);
      return null;
    }
    if (snapshot && snapshot.watermark > lineCount) {
      if (this.verbose) verboseLog(`Snapshot for ${file} runs past the end of the file; scanning cold`);
      return null;
    }
    if (snapshot && this.verbose) {
      verboseLog(`Seeded ${file} from snapshot (watermark ${snapshot.watermark})`);
    }
    return snapshot;
  }

  private async queryLines(record: FileRecord, range: LineSourceRange, origin: ResultOrigin): Promise<boolean> {
    if (intervalsCover(record.intervals, range, origin, horizonOf(record))) {
      return true;
    }
    const from = Math.min(range.stop.line, record.lineCount);
    if (record.watermark >= from) {
      return false;
    }
    const outcome = await this.scanBackward(range.file, record.watermark, from, range, origin);
    if (outcome.kind === 'inline') {
      record.intervals = addInlineInterval(record.intervals, outcome.directive);
      record.dirty = true;
      if (this.verbose) verboseLog(`Ignored ${formatRange(range)} by inline directive`);
      return true;
    }
    commit(record, outcome.from, outcome.directives);
    return intervalsCover(record.intervals, range, origin, horizonOf(record));
  }

  private async queryWholeFile(record: FileRecord, file: string, origin: ResultOrigin): Promise<boolean> {
    const applies = (): boolean => record.intervals.some(i => targetsApply(i.targets, origin));
    if (applies() || record.watermark >= record.lineCount) {
      return applies();
    }
    const outcome = await this.scanBackward(file, record.watermark, record.lineCount, null, origin);
    if (outcome.kind === 'complete') {
      commit(record, outcome.from, outcome.directives);
    }
    return applies();
  }

  /**
   * Reads lines `from` down to `watermark + 1`. When `query` is a single line
   * and that line carries an inline directive applying to `origin`, stops
   * right there.
   */
  private async scanBackward(
    file: string,
    watermark: number,
    from: number,
    query: LineSourceRange | null,
    origin: ResultOrigin
  ): Promise<ScanOutcome> {
    if (this.verbose) verboseLog(`Scanning ${file} lines ${from} down to ${watermark + 1}`);
    const found: LineDirective[] = [];
    for (let line = from; line > watermark; line--) {
      const directive = this.matcher(await this.accessor.readLine(file, line));
      if (!directive) {
        continue;
      }
      const lineDirective: LineDirective = { ...directive, line };
      if (
        query !== null &&
        directive.kind === 'Inline' &&
        line === query.start.line &&
        line === query.stop.line &&
        targetsApply(directive.targets, origin)
      ) {
        return { kind: 'inline', directive: lineDirective };
      }
      found.push(lineDirective);
    }
    return { kind: 'complete', from, directives: found.reverse() };
  }
}

/**
 * Folds directives found on lines `watermark + 1..from`, in ascending order,
 * into the record and advances its watermark.
 */
function commit(record: FileRecord, from: number, directives: LineDirective[]): void {
  record.intervals = directives.reduce(applyDirective, record.intervals);
  record.watermark = from;
  record.dirty = true;
}

/**
 * Last line an open interval is known to reach.
 */
function horizonOf(record: FileRecord): number {
  return record.watermark >= record.lineCount ? Number.MAX_SAFE_INTEGER : record.watermark;
}

function toSnapshot(record: FileRecord): FileSnapshot {
  return { watermark: record.watermark, intervals: structuredClone(record.intervals) };
}
