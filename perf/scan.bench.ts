import { runScan } from '../src/main';
import { generatePerfFiles } from './utils';
import * as fs from 'fs/promises';

/**
 * Performance benchmark: test scan mode speed over many files with ignore directives.
 */
// Increase timeout for performance benchmarks
jest.setTimeout(60000);
test('performance benchmark for scan mode', async () => {
  const { tmpDir, files } = await generatePerfFiles({ prefix: 'scan-' });
  try {
    // Warm-up: verify no errors
    const warm = await runScan(tmpDir, 0, false);
    expect(warm).toBe(0);
    const hrStart = process.hrtime();
    const cpuStart = process.cpuUsage();
    await runScan(tmpDir, 0, false);
    const hrDiff = process.hrtime(hrStart);
    const cpuDiff = process.cpuUsage(cpuStart);
    const elapsed = hrDiff[0] + hrDiff[1] / 1e9;
    console.log(
      `Scanned ${files.length} files in ${elapsed.toFixed(3)}s; ` +
      `CPU user ${(cpuDiff.user / 1000).toFixed(1)}ms sys ${(cpuDiff.system / 1000).toFixed(1)}ms`
    );
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
});
