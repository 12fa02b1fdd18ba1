import { resolve } from 'node:path';

import { configuredLogFile, loadConfig } from '../lib/config.js';
import { createActionRunner, createSpawnCommandRunner } from '../lib/exec.js';
import type { ActionRunner } from '../lib/exec.js';
import { FileLogSink, MemoryLogSink } from '../lib/log_sink.js';
import type { LineWriter } from '../lib/log_sink.js';
import { buildPlan } from '../lib/plan.js';
import { renderSummary, writeRunReport } from '../lib/report.js';
import { runPlan, tallyOutcomes } from '../lib/sequencer.js';
import type { LogSink } from '../types/log.js';
import type { RunResult } from '../types/step.js';

export interface RunCommandOptions {
  configPath?: string;
  /** Overrides the configured log file */
  logFile?: string;
  /** Overrides the configured report file */
  reportFile?: string;
  only?: string[];
  dryRun?: boolean;
  /** Exit 1 when any step failed */
  strictExit?: boolean;
  /** Injection points for tests */
  actionRunner?: ActionRunner;
  mirror?: LineWriter;
  home?: string;
}

export interface RunCommandResult {
  result: RunResult;
  exitCode: number;
  reportPath: string | null;
}

/**
 * Loads the plan, runs it and prints the summary.
 *
 * Exits 0 even when steps failed unless `strictExit` is set; failures are in
 * the log and the summary.
 *
 * @throws {ConfigError} If the configuration is invalid
 * @throws {LogSinkUnavailableError} If the log file cannot be opened or written
 */
export async function runCommand(options: RunCommandOptions = {}): Promise<RunCommandResult> {
  const { config, path, isDefault } = await loadConfig(options.configPath);
  const plan = buildPlan(config, { home: options.home });

  if (isDefault) {
    console.log(`No config file found; using the bundled plan (${path})`);
  }

  const sink: LogSink = options.dryRun
    ? new MemoryLogSink(options.mirror ?? ((line) => console.log(line)))
    : new FileLogSink(options.logFile ?? configuredLogFile(config), options.mirror);

  let result: RunResult;
  try {
    result = await runPlan(plan, sink, {
      actionRunner: options.actionRunner ?? createActionRunner(createSpawnCommandRunner({ home: options.home })),
      only: options.only,
      dryRun: options.dryRun,
    });
  } finally {
    sink.close();
  }

  console.log('\n--- Summary ---');
  for (const line of renderSummary(result)) {
    console.log(line);
  }

  const reportFile = options.reportFile ?? config.report_file;
  let reportPath: string | null = null;
  if (reportFile && !options.dryRun) {
    reportPath = resolve(reportFile);
    await writeRunReport(reportPath, result);
    console.log(`Report written to ${reportPath}`);
  }

  const { failed } = tallyOutcomes(result);
  return {
    result,
    exitCode: options.strictExit && failed > 0 ? 1 : 0,
    reportPath,
  };
}
