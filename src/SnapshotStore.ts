// file: src/SnapshotStore.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import Ajv from 'ajv';
import { IgnoreInterval } from './IgnorePrimitives';
import { verboseLog } from './logger';
import snapshotCacheSchema from './schema/snapshot-cache.schema.json';

/**
 * What the range manager knows about one file: every line up to `watermark`
 * has been classified, and `intervals` holds what was found.
 */
export interface FileSnapshot {
  watermark: number;
  intervals: IgnoreInterval[];
}

/**
 * Persistent keyed storage for file snapshots across runs.
 */
export interface SnapshotStore {
  /** Snapshot saved for `file`, or null when none matches `fingerprint`. */
  load(file: string, fingerprint: string): Promise<FileSnapshot | null>;
  save(file: string, fingerprint: string, snapshot: FileSnapshot): Promise<void>;
  /** Writes saved snapshots to durable storage. */
  flush(): Promise<void>;
}

export interface SnapshotCacheEntry {
  fingerprint: string;
  snapshot: FileSnapshot;
}

interface SnapshotCacheFile {
  version: 1;
  files: Record<string, SnapshotCacheEntry>;
}

const CACHE_VERSION = 1;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSnapshotCache = ajv.compile<SnapshotCacheFile>(snapshotCacheSchema);

function intervalIsWellFormed(interval: IgnoreInterval): boolean {
  return interval.endLine === 'open' || interval.endLine >= interval.startLine;
}

/**
 * Parses a snapshot cache document. Returns null for anything that is not a
 * well-formed cache: callers treat that as an empty cache.
 */
export function decodeSnapshotCache(text: string): Record<string, SnapshotCacheEntry> | null {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  if (!validateSnapshotCache(data)) {
    return null;
  }
  const entries = Object.values(data.files);
  if (!entries.every(e => e.snapshot.intervals.every(intervalIsWellFormed))) {
    return null;
  }
  return data.files;
}

export function encodeSnapshotCache(files: Record<string, SnapshotCacheEntry>): string {
  const document: SnapshotCacheFile = { version: CACHE_VERSION, files };
  return JSON.stringify(document, null, 2) + '\n';
}

/**
 * Keeps every file's snapshot in one JSON document at `cachePath`. The
 * document is read on first use and written back by `flush`.
 */
export class JsonSnapshotStore implements SnapshotStore {
  private entries?: Promise<Map<string, SnapshotCacheEntry>>;
  private dirty = false;

  constructor(readonly cachePath: string, private readonly verbose: boolean = false) {}

  async load(file: string, fingerprint: string): Promise<FileSnapshot | null> {
    const entry = (await this.readEntries()).get(file);
    if (!entry) {
      return null;
    }
    if (entry.fingerprint !== fingerprint) {
      if (this.verbose) verboseLog(`Cached snapshot for ${file} is stale; rescanning`);
      return null;
    }
    return structuredClone(entry.snapshot);
  }

  async save(file: string, fingerprint: string, snapshot: FileSnapshot): Promise<void> {
    const entries = await this.readEntries();
    entries.set(file, { fingerprint, snapshot: structuredClone(snapshot) });
    this.dirty = true;
  }

  async flush(): Promise<void> {
    if (!this.dirty) {
      return;
    }
    const entries = await this.readEntries();
    await fs.mkdir(path.dirname(this.cachePath), { recursive: true });
    await fs.writeFile(this.cachePath, encodeSnapshotCache(Object.fromEntries(entries)), 'utf-8');
    this.dirty = false;
    if (this.verbose) verboseLog(`Wrote ${entries.size} snapshot(s) to ${this.cachePath}`);
  }

  private readEntries(): Promise<Map<string, SnapshotCacheEntry>> {
    if (!this.entries) {
      this.entries = this.readCacheFile();
    }
    return this.entries;
  }

  private async readCacheFile(): Promise<Map<string, SnapshotCacheEntry>> {
    let text: string;
    try {
      text = await fs.readFile(this.cachePath, 'utf-8');
    } catch (err: unknown) {
      // A missing cache is a cold start
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
        return new Map();
      }
      throw err;
    }
    const files = decodeSnapshotCache(text);
    if (!files) {
      if (this.verbose) verboseLog(`Ignoring corrupt snapshot cache ${this.cachePath}`);
      return new Map();
    }
    return new Map(Object.entries(files));
  }
}
