import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { renderSummary, writeRunReport, REPORT_VERSION } from '@/lib/report.js';
import { readJson } from '@/lib/fs.js';
import type { RunResult } from '@/types/step.js';
import { makeTempDir, removeTempDir } from '../helpers/mocks.js';

const RESULT: RunResult = {
  started_at: '2026-01-02T03:04:05.000Z',
  finished_at: '2026-01-02T03:04:07.000Z',
  log_path: '/srv/lab/install.log',
  steps: [
    { step: 'Alpha', outcome: { status: 'succeeded' }, duration_ms: 5 },
    { step: 'Beta step', outcome: { status: 'failed', exitCode: 2 }, duration_ms: 1500 },
    { step: 'C', outcome: { status: 'skipped', reason: 'precondition' }, duration_ms: 0 },
  ],
};

describe('renderSummary', () => {
  it('renders one aligned line per step and a totals line', () => {
    expect(renderSummary(RESULT)).toEqual([
      '  [OK]   Alpha      5ms',
      '  [FAIL] Beta step (exit 2)  1.5s',
      '  [SKIP] C         (precondition)  0ms',
      '3 step(s): 1 succeeded, 1 failed, 1 skipped',
    ]);
  });

  it('renders only totals for an empty run', () => {
    expect(renderSummary({ ...RESULT, steps: [] })).toEqual(['0 step(s): 0 succeeded, 0 failed, 0 skipped']);
  });
});

describe('writeRunReport', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('writes the run result with totals as JSON', async () => {
    const reportPath = join(testDir, 'reports', 'install.report.json');

    await writeRunReport(reportPath, RESULT);

    expect(await readJson(reportPath)).toEqual({
      report_version: REPORT_VERSION,
      ...RESULT,
      totals: { succeeded: 1, failed: 1, skipped: 1 },
    });
  });
});
