/**
 * Provisioning sequencer.
 *
 * Runs a plan strictly in order, one step at a time. Every step produces
 * exactly one outcome. A failing step is recorded and, when it allows it, the
 * next step runs anyway; nothing a step does can make `runPlan` throw. The
 * only fatal condition is the log sink itself.
 */

import micromatch from 'micromatch';
import type { LogSink } from '../types/log.js';
import type { Plan, Precondition, RunResult, Step, StepOutcome, StepRecord } from '../types/step.js';
import { createActionRunner } from './exec.js';
import type { ActionRunner } from './exec.js';
import { entry, LogSinkUnavailableError } from './log_sink.js';

export interface RunPlanOptions {
  /** Runs step actions; defaults to spawning real processes */
  actionRunner?: ActionRunner;
  /** Step-name globs; steps that match none are skipped */
  only?: readonly string[];
  /** Evaluate preconditions but invoke no action */
  dryRun?: boolean;
  /** Clock for log timestamps and step durations; passed on to the action runner */
  now?: () => Date;
}

/**
 * Short label for an outcome, used in logs and summaries.
 */
export function describeOutcome(outcome: StepOutcome): string {
  switch (outcome.status) {
    case 'succeeded':
      return 'succeeded';
    case 'failed':
      return `failed (exit ${outcome.exitCode})`;
    case 'skipped':
      return `skipped (${outcome.reason})`;
  }
}

function describePrecondition(precondition: Precondition): string {
  return precondition.kind === 'not_dir_exists'
    ? `${precondition.path} is not a directory`
    : `${precondition.path} already exists`;
}

function selects(step: Step, only: readonly string[] | undefined): boolean {
  if (!only || only.length === 0) return true;
  return micromatch.isMatch(step.name, [...only], { nocase: true });
}

async function runAction(
  runner: ActionRunner,
  step: Step,
  sink: LogSink,
  now: () => Date
): Promise<number> {
  try {
    return await runner.run(step, sink, now);
  } catch (error) {
    if (error instanceof LogSinkUnavailableError) {
      throw error;
    }
    sink.write(
      entry('INFO', `Step "${step.name}" raised: ${error instanceof Error ? error.message : String(error)}`, now)
    );
    return 1;
  }
}

/**
 * Evaluates a precondition. A predicate that throws counts as not holding,
 * so the step runs.
 */
function preconditionHolds(precondition: Precondition, log: (message: string) => void): boolean {
  try {
    return precondition.holds();
  } catch (error) {
    log(
      `Could not check ${precondition.kind} ${precondition.path}: ${error instanceof Error ? error.message : String(error)}`
    );
    return false;
  }
}

/**
 * Runs every step of `plan` in order and returns one record per step.
 *
 * @throws {LogSinkUnavailableError} If the sink cannot be written
 *
 * @example
 * ```typescript
 * const sink = new FileLogSink('install.log');
 * try {
 *   const result = await runPlan(plan, sink);
 * } finally {
 *   sink.close();
 * }
 * ```
 */
export async function runPlan(plan: Plan, sink: LogSink, options: RunPlanOptions = {}): Promise<RunResult> {
  const now = options.now ?? (() => new Date());
  const runner = options.actionRunner ?? createActionRunner();
  const log = (level: 'INFO' | 'ERROR', message: string) => sink.write(entry(level, message, now));

  const startedAt = now();
  log('INFO', `===== Starting installation at ${startedAt.toISOString()} =====`);
  if (options.dryRun) {
    log('INFO', 'Dry run: no step actions will be invoked');
  }

  const records: StepRecord[] = [];
  let haltedBy: string | null = null;

  for (const [index, step] of plan.entries()) {
    log('INFO', `===== STEP ${index + 1}: ${step.name} =====`);
    const stepStart = now().getTime();
    let outcome: StepOutcome;

    if (haltedBy !== null) {
      log('INFO', `Not running "${step.name}": run halted after "${haltedBy}" failed`);
      outcome = { status: 'skipped', reason: 'halted' };
    } else if (!selects(step, options.only)) {
      log('INFO', `Not selected: "${step.name}"`);
      outcome = { status: 'skipped', reason: 'filtered' };
    } else if (step.precondition && preconditionHolds(step.precondition, (message) => log('INFO', message))) {
      log('INFO', `${describePrecondition(step.precondition)}. Skipping "${step.name}".`);
      outcome = { status: 'skipped', reason: 'precondition' };
    } else if (options.dryRun) {
      log('INFO', `Would run "${step.name}" (${step.action.length} command(s))`);
      outcome = { status: 'skipped', reason: 'dry_run' };
    } else {
      const exitCode = await runAction(runner, step, sink, now);
      if (exitCode === 0) {
        outcome = { status: 'succeeded' };
      } else {
        outcome = { status: 'failed', exitCode };
        log('ERROR', `Step "${step.name}" failed with exit code ${exitCode}`);
        if (!step.continueOnFailure) {
          haltedBy = step.name;
        }
      }
    }

    records.push({ step: step.name, outcome, duration_ms: now().getTime() - stepStart });
  }

  const finishedAt = now();
  log('INFO', `===== Installation completed at ${finishedAt.toISOString()} =====`);
  const destination = sink.destination ?? 'the console';
  log('INFO', `All output has been logged to ${destination}. Check for [ERROR] lines if a step did not succeed.`);

  return {
    started_at: startedAt.toISOString(),
    finished_at: finishedAt.toISOString(),
    log_path: sink.destination,
    steps: records,
  };
}

/**
 * Outcome counts for a run.
 */
export function tallyOutcomes(result: RunResult): { succeeded: number; failed: number; skipped: number } {
  const tally = { succeeded: 0, failed: 0, skipped: 0 };
  for (const record of result.steps) {
    tally[record.outcome.status]++;
  }
  return tally;
}
