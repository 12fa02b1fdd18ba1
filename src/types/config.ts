/**
 * TypeScript interfaces for hostprep.config.json.
 *
 * Mirrors schemas/hostprep.config.schema.json.
 */

import type { PreconditionKind } from './step.js';

export interface PreconditionConfig {
  kind: PreconditionKind;
  /** May start with `~`, `$HOME` or `${HOME}` */
  path: string;
}

export interface CommandConfig {
  cmd: string;
  args?: string[];
  cwd?: string;
  allow_failure?: boolean;
}

export interface StepConfig {
  name: string;
  precondition?: PreconditionConfig;
  commands: CommandConfig[];
  /** Defaults to true */
  continue_on_failure?: boolean;
}

export interface HostprepConfig {
  version: string;
  /** Log file path, relative to the working directory */
  log_file?: string;
  /** Optional JSON run report path */
  report_file?: string;
  steps: StepConfig[];
}
