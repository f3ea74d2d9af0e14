import { FileAccessError, FsFileAccessor } from '../src/FileAccessor';
import { ResultOrigin } from '../src/IgnorePrimitives';
import { IgnoreRangeManager } from '../src/IgnoreRangeManager';
import { FileSnapshot, JsonSnapshotStore, SnapshotStore } from '../src/SnapshotStore';
import { createRange, SourceRange, wholeFile } from '../src/SourceRange';
import * as crypto from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

/**
 * Writes a file of `lineCount` plain code lines, with `directives` placed at
 * the given 1-based lines.
 */
async function writeSource(
  dir: string,
  name: string,
  lineCount: number,
  directives: Record<number, string> = {}
): Promise<string> {
  const lines: string[] = [];
  for (let i = 1; i <= lineCount; i++) {
    lines.push(directives[i] ?? `value_${i} = ${i}`);
  }
  const file = path.join(dir, name);
  await fs.writeFile(file, lines.join('\n') + '\n', 'utf-8');
  return file;
}

const at = (file: string, line: number): SourceRange => createRange(file, { line, column: 0 });

describe('IgnoreRangeManager', () => {
  let dir: string;
  let accessor: FsFileAccessor;
  let readLine: jest.SpyInstance;
  let manager: IgnoreRangeManager;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ignore-ranges-'));
    accessor = new FsFileAccessor();
    readLine = jest.spyOn(accessor, 'readLine');
    manager = new IgnoreRangeManager({ accessor });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('inline directives', () => {
    test('an inline directive suppresses only the named rule on its line', async () => {
      const file = await writeSource(dir, 'a.py', 6, { 5: '# ignore flake8(E501)' });
      expect(await manager.isIgnored(at(file, 5), { analyzer: 'flake8', rule: 'E501' })).toBe(true);
      expect(await manager.isIgnored(at(file, 5), { analyzer: 'flake8', rule: 'E302' })).toBe(false);
      expect(await manager.isIgnored(at(file, 6), { analyzer: 'flake8', rule: 'E501' })).toBe(false);
    });

    test('short-circuits on the queried line without reading further', async () => {
      const file = await writeSource(dir, 'a.py', 8, { 4: 'call()  # ignore' });
      expect(await manager.isIgnored(at(file, 4), { analyzer: 'mypy' })).toBe(true);
      expect(readLine).toHaveBeenCalledTimes(1);
      expect(manager.snapshotOf(file)).toEqual({
        watermark: 0,
        intervals: [{ origin: 'Inline', startLine: 4, endLine: 4, targets: [] }]
      });
    });

    test('an inline directive does not cover a range spanning several lines', async () => {
      const file = await writeSource(dir, 'a.py', 8, { 4: '# ignore' });
      const span = createRange(file, { line: 4, column: 0 }, { line: 5, column: 0 });
      expect(await manager.isIgnored(span, { analyzer: 'mypy' })).toBe(false);
    });

    test('an inline directive on the queried line wins inside a closed region', async () => {
      const file = await writeSource(dir, 'a.py', 8, {
        1: '# start ignoring pylint',
        3: '# stop ignoring pylint',
        6: 'x = 1  # ignore pylint'
      });
      expect(await manager.isIgnored(at(file, 6), { analyzer: 'pylint' })).toBe(true);
      expect(await manager.isIgnored(at(file, 5), { analyzer: 'pylint' })).toBe(false);
      expect(await manager.isIgnored(at(file, 2), { analyzer: 'pylint' })).toBe(true);
    });
  });

  describe('start and stop regions', () => {
    test('a bounded region covers its lines for its analyzer only', async () => {
      const file = await writeSource(dir, 'b.py', 12, {
        2: '# start ignoring pylint',
        10: '# stop ignoring pylint'
      });
      expect(await manager.isIgnored(at(file, 7), { analyzer: 'pylint' })).toBe(true);
      expect(await manager.isIgnored(at(file, 12), { analyzer: 'pylint' })).toBe(false);
      expect(await manager.isIgnored(at(file, 7), { analyzer: 'mypy' })).toBe(false);
    });

    test('a region includes its start and stop lines', async () => {
      const file = await writeSource(dir, 'b.py', 12, {
        2: '# start ignoring pylint',
        10: '# stop ignoring pylint'
      });
      expect(await manager.isIgnored(at(file, 10), { analyzer: 'pylint' })).toBe(true);
      expect(await manager.isIgnored(at(file, 2), { analyzer: 'pylint' })).toBe(true);
      expect(await manager.isIgnored(at(file, 1), { analyzer: 'pylint' })).toBe(false);
    });

    test('a region without stop runs to the end of the file', async () => {
      const file = await writeSource(dir, 'c.py', 1200, { 1: '# start ignoring all' });
      expect(await manager.isIgnored(at(file, 1000), { analyzer: 'flake8', rule: 'W291' })).toBe(true);
    });

    test('an open region covers results reported past the last line', async () => {
      const file = await writeSource(dir, 'c.py', 3, { 1: '# start ignoring' });
      expect(await manager.isIgnored(at(file, 50), { analyzer: 'flake8' })).toBe(true);
    });

    test('a region with no targets suppresses every analyzer', async () => {
      const file = await writeSource(dir, 'c.py', 20, { 4: '# start ignoring', 15: '# stop ignoring' });
      const origins: ResultOrigin[] = [
        { analyzer: 'pylint' },
        { analyzer: 'mypy', rule: 'arg-type' },
        { analyzer: 'eslint', rule: 'no-console' }
      ];
      for (const origin of origins) {
        expect(await manager.isIgnored(at(file, 9), origin)).toBe(true);
      }
    });

    test('only covers multi-line ranges lying entirely inside a region', async () => {
      const file = await writeSource(dir, 'd.py', 10, { 2: '# start ignoring mypy', 5: '# stop ignoring mypy' });
      const inside = createRange(file, { line: 3, column: 4 }, { line: 4, column: 10 });
      const crossing = createRange(file, { line: 4, column: 0 }, { line: 7, column: 0 });
      expect(await manager.isIgnored(inside, { analyzer: 'mypy' })).toBe(true);
      expect(await manager.isIgnored(crossing, { analyzer: 'mypy' })).toBe(false);
    });

    test('a stop for some of a region\'s targets ends only those', async () => {
      const file = await writeSource(dir, 'd.py', 5, {
        1: '# start ignoring pylint mypy',
        3: '# stop ignoring pylint'
      });
      expect(await manager.isIgnored(at(file, 5), { analyzer: 'pylint' })).toBe(false);
      expect(await manager.isIgnored(at(file, 5), { analyzer: 'mypy' })).toBe(true);
      expect(await manager.isIgnored(at(file, 3), { analyzer: 'pylint' })).toBe(true);
      expect(await manager.isIgnored(at(file, 4), { analyzer: 'mypy' })).toBe(true);
    });

    test('a stop for other targets leaves a region open', async () => {
      const file = await writeSource(dir, 'd.py', 10, {
        1: '# start ignoring mypy',
        3: '# start ignoring pylint',
        4: '# stop ignoring pylint'
      });
      expect(await manager.isIgnored(at(file, 8), { analyzer: 'mypy' })).toBe(true);
      expect(await manager.isIgnored(at(file, 8), { analyzer: 'pylint' })).toBe(false);
    });
  });

  describe('whole-file results', () => {
    test('are ignored when any compatible directive exists anywhere', async () => {
      const file = await writeSource(dir, 'e.py', 5, { 3: '# ignore pylint' });
      expect(await manager.isIgnored(wholeFile(file), { analyzer: 'pylint' })).toBe(true);
      expect(await manager.isIgnored(wholeFile(file), { analyzer: 'mypy' })).toBe(false);
    });

    test('are not ignored in a file without directives', async () => {
      const file = await writeSource(dir, 'e.py', 5);
      expect(await manager.isIgnored(wholeFile(file), { analyzer: 'pylint' })).toBe(false);
    });

    test('a lone stop directive does not suppress', async () => {
      const file = await writeSource(dir, 'e.py', 5, { 2: '# stop ignoring' });
      expect(await manager.isIgnored(wholeFile(file), { analyzer: 'pylint' })).toBe(false);
    });

    test('an empty file ignores nothing', async () => {
      const file = path.join(dir, 'empty.py');
      await fs.writeFile(file, '', 'utf-8');
      expect(await manager.isIgnored(wholeFile(file), { analyzer: 'pylint' })).toBe(false);
      expect(await manager.isIgnored(at(file, 1), { analyzer: 'pylint' })).toBe(false);
    });
  });

  describe('incremental scanning', () => {
    test('a file without directives ignores nothing', async () => {
      const file = await writeSource(dir, 'f.py', 5);
      for (let line = 1; line <= 5; line++) {
        expect(await manager.isIgnored(at(file, line), { analyzer: 'pylint' })).toBe(false);
      }
    });

    test('repeated queries do not read lines below the watermark again', async () => {
      const file = await writeSource(dir, 'f.py', 5);
      expect(await manager.isIgnored(at(file, 3), { analyzer: 'pylint' })).toBe(false);
      expect(readLine).toHaveBeenCalledTimes(3);
      expect(await manager.isIgnored(at(file, 3), { analyzer: 'pylint' })).toBe(false);
      expect(readLine).toHaveBeenCalledTimes(3);
      expect(await manager.isIgnored(at(file, 5), { analyzer: 'pylint' })).toBe(false);
      expect(readLine).toHaveBeenCalledTimes(5);
      expect(readLine.mock.calls.map(call => call[1])).toEqual([3, 2, 1, 5, 4]);
    });

    test('answers from a known open region without reading', async () => {
      const file = await writeSource(dir, 'f.py', 12, { 2: '# start ignoring pylint' });
      expect(await manager.isIgnored(at(file, 9), { analyzer: 'pylint' })).toBe(true);
      readLine.mockClear();
      expect(await manager.isIgnored(at(file, 6), { analyzer: 'pylint' })).toBe(true);
      expect(readLine).not.toHaveBeenCalled();
      expect(manager.snapshotOf(file)).toEqual({
        watermark: 9,
        intervals: [{ origin: 'Start', startLine: 2, endLine: 'open', targets: [{ analyzer: 'pylint' }] }]
      });
    });

    test('releases a file once every line is classified', async () => {
      const release = jest.spyOn(accessor, 'release');
      const file = await writeSource(dir, 'f.py', 5, { 2: '# start ignoring' });
      expect(await manager.isIgnored(at(file, 3), { analyzer: 'pylint' })).toBe(true);
      expect(release).not.toHaveBeenCalled();
      expect(await manager.isIgnored(at(file, 5), { analyzer: 'pylint' })).toBe(true);
      expect(release).toHaveBeenCalledWith(file);
      readLine.mockClear();
      expect(await manager.isIgnored(at(file, 1), { analyzer: 'pylint' })).toBe(false);
      expect(await manager.isIgnored(wholeFile(file), { analyzer: 'pylint' })).toBe(true);
      expect(readLine).not.toHaveBeenCalled();
    });

    test('concurrent queries on one file see consistent state', async () => {
      const file = await writeSource(dir, 'g.py', 20, { 1: '# start ignoring pylint', 10: '# stop ignoring pylint' });
      const lines = Array.from({ length: 20 }, (_, i) => i + 1);
      const results = await Promise.all(lines.map(line => manager.isIgnored(at(file, line), { analyzer: 'pylint' })));
      expect(results).toEqual(lines.map(line => line <= 10));
      expect(readLine).toHaveBeenCalledTimes(20);
    });

    test('queries on different files do not interfere', async () => {
      const a = await writeSource(dir, 'a.py', 4, { 1: '# start ignoring' });
      const b = await writeSource(dir, 'b.py', 4);
      const [ignoredA, ignoredB] = await Promise.all([
        manager.isIgnored(at(a, 3), { analyzer: 'mypy' }),
        manager.isIgnored(at(b, 3), { analyzer: 'mypy' })
      ]);
      expect(ignoredA).toBe(true);
      expect(ignoredB).toBe(false);
    });
  });

  describe('failures', () => {
    test('an unreadable file raises FileAccessError and leaves no state behind', async () => {
      const missing = path.join(dir, 'missing.py');
      await expect(manager.isIgnored(at(missing, 1), { analyzer: 'pylint' })).rejects.toThrow(FileAccessError);
      expect(manager.snapshotOf(missing)).toBeUndefined();
    });

    test('a failed query does not block later queries of the same file', async () => {
      const file = path.join(dir, 'late.py');
      await expect(manager.isIgnored(at(file, 1), { analyzer: 'pylint' })).rejects.toThrow(FileAccessError);
      await writeSource(dir, 'late.py', 2, { 1: '# ignore' });
      expect(await manager.isIgnored(at(file, 1), { analyzer: 'pylint' })).toBe(true);
    });

    test('malformed directives never suppress', async () => {
      const file = await writeSource(dir, 'h.py', 3, { 2: '# ignore flake8(E501' });
      expect(await manager.isIgnored(at(file, 2), { analyzer: 'flake8', rule: 'E501' })).toBe(false);
      expect(await manager.isIgnored(wholeFile(file), { analyzer: 'mypy' })).toBe(false);
    });

    test('an unavailable store means a cold start', async () => {
      const file = await writeSource(dir, 'i.py', 3, { 1: '# ignore' });
      const failing: SnapshotStore = {
        load: () => Promise.reject(new Error('store offline')),
        save: () => Promise.resolve(),
        flush: () => Promise.resolve()
      };
      const cold = new IgnoreRangeManager({ accessor, store: failing });
      expect(await cold.isIgnored(at(file, 1), { analyzer: 'pylint' })).toBe(true);
    });
  });

  describe('snapshots', () => {
    const queries: Array<[(file: string) => SourceRange, ResultOrigin]> = [
      [file => at(file, 7), { analyzer: 'pylint' }],
      [file => at(file, 12), { analyzer: 'pylint' }],
      [file => at(file, 7), { analyzer: 'mypy' }],
      [file => at(file, 11), { analyzer: 'flake8', rule: 'E501' }],
      [file => wholeFile(file), { analyzer: 'pylint' }]
    ];
    const directives = {
      2: '# start ignoring pylint',
      10: '# stop ignoring pylint',
      11: 'x = "long"  # ignore flake8(E501)'
    };

    async function answers(m: IgnoreRangeManager, file: string): Promise<boolean[]> {
      const result: boolean[] = [];
      for (const [range, origin] of queries) {
        result.push(await m.isIgnored(range(file), origin));
      }
      return result;
    }

    test('a reloaded snapshot gives the same answers without reading lines', async () => {
      const file = await writeSource(dir, 'b.py', 12, directives);
      const cachePath = path.join(dir, 'cache', 'snapshots.json');
      const first = new IgnoreRangeManager({ accessor, store: new JsonSnapshotStore(cachePath) });
      const expected = await answers(first, file);
      expect(expected).toEqual([true, false, false, true, true]);
      await first.persist();

      const secondAccessor = new FsFileAccessor();
      const secondReads = jest.spyOn(secondAccessor, 'readLine');
      const second = new IgnoreRangeManager({ accessor: secondAccessor, store: new JsonSnapshotStore(cachePath) });
      expect(await answers(second, file)).toEqual(expected);
      expect(secondReads).not.toHaveBeenCalled();
    });

    test('persists intervals, targets and the watermark keyed by fingerprint', async () => {
      const file = await writeSource(dir, 'b.py', 12, directives);
      const cachePath = path.join(dir, 'snapshots.json');
      const m = new IgnoreRangeManager({ accessor, store: new JsonSnapshotStore(cachePath) });
      expect(await m.isIgnored(at(file, 12), { analyzer: 'pylint' })).toBe(false);
      await m.persist();

      const content = await fs.readFile(file, 'utf-8');
      const saved = JSON.parse(await fs.readFile(cachePath, 'utf-8'));
      const expected: FileSnapshot = {
        watermark: 12,
        intervals: [
          { origin: 'Start', startLine: 2, endLine: 10, targets: [{ analyzer: 'pylint' }] },
          { origin: 'Inline', startLine: 11, endLine: 11, targets: [{ analyzer: 'flake8', rule: 'E501' }] }
        ]
      };
      expect(saved).toEqual({
        version: 1,
        files: {
          [file]: {
            fingerprint: crypto.createHash('sha256').update(content).digest('hex'),
            snapshot: expected
          }
        }
      });
    });

    test('a changed file is scanned again', async () => {
      const file = await writeSource(dir, 'b.py', 12, directives);
      const cachePath = path.join(dir, 'snapshots.json');
      const first = new IgnoreRangeManager({ accessor, store: new JsonSnapshotStore(cachePath) });
      expect(await first.isIgnored(at(file, 7), { analyzer: 'mypy' })).toBe(false);
      await first.persist();

      await writeSource(dir, 'b.py', 12, { ...directives, 7: 'y = 2  # ignore mypy' });
      const second = new IgnoreRangeManager({ accessor: new FsFileAccessor(), store: new JsonSnapshotStore(cachePath) });
      expect(await second.isIgnored(at(file, 7), { analyzer: 'mypy' })).toBe(true);
    });

    test('a corrupt cache file means a cold start', async () => {
      const file = await writeSource(dir, 'b.py', 12, directives);
      const cachePath = path.join(dir, 'snapshots.json');
      await fs.writeFile(cachePath, '{"version": 1, "files": ', 'utf-8');
      const m = new IgnoreRangeManager({ accessor, store: new JsonSnapshotStore(cachePath) });
      expect(await answers(m, file)).toEqual([true, false, false, true, true]);
    });

    test('persist without a store is a no-op', async () => {
      const file = await writeSource(dir, 'b.py', 3);
      await manager.isIgnored(at(file, 2), { analyzer: 'pylint' });
      await expect(manager.persist()).resolves.toBeUndefined();
    });
  });
});
