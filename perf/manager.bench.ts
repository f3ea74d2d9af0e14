import { FsFileAccessor } from '../src/FileAccessor';
import { IgnoreRangeManager } from '../src/IgnoreRangeManager';
import { JsonSnapshotStore } from '../src/SnapshotStore';
import { createRange } from '../src/SourceRange';
import { generatePerfFiles } from './utils';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Performance benchmark: ignore queries against cold files, then against the
 * same files seeded from a snapshot cache.
 */
jest.setTimeout(60000);
test('performance benchmark for cold and cached queries', async () => {
  const { tmpDir, files } = await generatePerfFiles({ prefix: 'queries-', totalFiles: 500, linesPerFile: 400 });
  const cachePath = path.join(tmpDir, '.cache', 'snapshots.json');
  const queryLines = [390, 200, 120, 50, 7];

  const run = async (label: string): Promise<number> => {
    const manager = new IgnoreRangeManager({
      accessor: new FsFileAccessor(),
      store: new JsonSnapshotStore(cachePath)
    });
    const hrStart = process.hrtime();
    let ignored = 0;
    for (const file of files) {
      for (const line of queryLines) {
        if (await manager.isIgnored(createRange(file, { line, column: 0 }), { analyzer: 'analyzer1' })) {
          ignored++;
        }
      }
    }
    await manager.persist();
    const hrDiff = process.hrtime(hrStart);
    console.log(`${label}: ${files.length * queryLines.length} queries in ${(hrDiff[0] + hrDiff[1] / 1e9).toFixed(3)}s`);
    return ignored;
  };

  try {
    const cold = await run('cold');
    const cached = await run('cached');
    expect(cached).toBe(cold);
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
});
