/**
 * End-of-run reporting: a console summary table and an optional JSON report.
 */

import type { RunResult, StepRecord } from '../types/step.js';
import { atomicWriteJson } from './fs.js';
import { tallyOutcomes } from './sequencer.js';

/** Version of the JSON report layout */
export const REPORT_VERSION = 1;

export interface RunReport extends RunResult {
  report_version: number;
  totals: { succeeded: number; failed: number; skipped: number };
}

const TAGS: Record<StepRecord['outcome']['status'], string> = {
  succeeded: '[OK]',
  failed: '[FAIL]',
  skipped: '[SKIP]',
};

function detail(record: StepRecord): string {
  switch (record.outcome.status) {
    case 'succeeded':
      return '';
    case 'failed':
      return ` (exit ${record.outcome.exitCode})`;
    case 'skipped':
      return ` (${record.outcome.reason})`;
  }
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Renders one line per step followed by a totals line.
 */
export function renderSummary(result: RunResult): string[] {
  const width = Math.max(0, ...result.steps.map((r) => r.step.length));
  const lines = result.steps.map((record) => {
    const tag = TAGS[record.outcome.status].padEnd(6);
    return `  ${tag} ${record.step.padEnd(width)}${detail(record)}  ${formatDuration(record.duration_ms)}`;
  });
  const totals = tallyOutcomes(result);
  lines.push(`${result.steps.length} step(s): ${totals.succeeded} succeeded, ${totals.failed} failed, ${totals.skipped} skipped`);
  return lines;
}

export function buildRunReport(result: RunResult): RunReport {
  return { report_version: REPORT_VERSION, ...result, totals: tallyOutcomes(result) };
}

/**
 * Writes the run report as JSON.
 *
 * @throws {AtomicFsError} If the report cannot be written
 */
export async function writeRunReport(filePath: string, result: RunResult): Promise<RunReport> {
  const report = buildRunReport(result);
  await atomicWriteJson(filePath, report);
  return report;
}
