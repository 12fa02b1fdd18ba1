/**
 * Types for provisioning plans and their outcomes.
 */

/**
 * Filesystem check that decides whether a step's effect already exists.
 */
export type PreconditionKind = 'dir_exists' | 'path_exists' | 'not_dir_exists';

/**
 * A resolved precondition. `path` has had `~` and `$HOME` expanded.
 */
export interface Precondition {
  kind: PreconditionKind;
  path: string;
  /** Evaluates the check against the current filesystem state */
  holds: () => boolean;
}

/**
 * One external command of a step's action. Run without a shell.
 */
export interface StepCommand {
  cmd: string;
  args: readonly string[];
  /** Working directory; falls back to the home directory when missing */
  cwd?: string;
  /** Behaves like `cmd || true`: a non-zero status does not end the action */
  allowFailure: boolean;
}

/**
 * One unit of work in a provisioning plan.
 */
export interface Step {
  name: string;
  precondition?: Precondition;
  action: readonly StepCommand[];
  continueOnFailure: boolean;
}

export type Plan = readonly Step[];

export type SkipReason = 'precondition' | 'halted' | 'filtered' | 'dry_run';

export type StepOutcome =
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'succeeded' }
  | { status: 'failed'; exitCode: number };

export interface StepRecord {
  step: string;
  outcome: StepOutcome;
  duration_ms: number;
}

/**
 * Per-step outcomes of one sequencer invocation, in plan order.
 */
export interface RunResult {
  started_at: string;
  finished_at: string;
  log_path: string | null;
  steps: StepRecord[];
}
