/**
 * Builds an immutable provisioning plan from configuration.
 */

import { statSync } from 'node:fs';
import type { Stats } from 'node:fs';
import { homedir } from 'node:os';
import type { HostprepConfig, PreconditionConfig, CommandConfig } from '../types/config.js';
import type { Plan, Precondition, PreconditionKind, Step, StepCommand } from '../types/step.js';
import { expandHome } from './paths.js';

export interface BuildPlanOptions {
  /** Home directory used for `~` / `$HOME` expansion */
  home?: string;
}

/**
 * Stats a path, treating any error (ENOENT, ENOTDIR, EACCES, ...) as absent.
 */
export function statOrNull(path: string): Stats | null {
  try {
    return statSync(path, { throwIfNoEntry: false }) ?? null;
  } catch {
    return null;
  }
}

export function isDirectory(path: string): boolean {
  return statOrNull(path)?.isDirectory() ?? false;
}

function exists(path: string): boolean {
  return statOrNull(path) !== null;
}

const CHECKS: Record<PreconditionKind, (path: string) => boolean> = {
  dir_exists: isDirectory,
  path_exists: exists,
  not_dir_exists: (path) => !isDirectory(path),
};

/**
 * Resolves a configured precondition into a filesystem predicate.
 */
export function resolvePrecondition(cfg: PreconditionConfig, home: string): Precondition {
  const path = expandHome(cfg.path, home);
  const check = CHECKS[cfg.kind];
  return Object.freeze({ kind: cfg.kind, path, holds: () => check(path) });
}

function resolveCommand(cfg: CommandConfig, home: string): StepCommand {
  return Object.freeze({
    cmd: cfg.cmd,
    // Only whole-argument home references are expanded, as a shell would
    args: Object.freeze((cfg.args ?? []).map((arg) => expandHome(arg, home))),
    cwd: cfg.cwd === undefined ? undefined : expandHome(cfg.cwd, home),
    allowFailure: cfg.allow_failure ?? false,
  });
}

/**
 * Turns config steps into frozen Step objects, in config order.
 */
export function buildPlan(config: HostprepConfig, options: BuildPlanOptions = {}): Plan {
  const home = options.home ?? homedir();
  const steps = config.steps.map((cfg): Step =>
    Object.freeze({
      name: cfg.name,
      precondition: cfg.precondition ? resolvePrecondition(cfg.precondition, home) : undefined,
      action: Object.freeze(cfg.commands.map((c) => resolveCommand(c, home))),
      continueOnFailure: cfg.continue_on_failure ?? true,
    })
  );
  return Object.freeze(steps);
}

/**
 * Renders a command the way an operator would type it.
 */
export function renderCommand(command: Pick<StepCommand, 'cmd' | 'args'>): string {
  return [command.cmd, ...command.args].join(' ');
}

/**
 * Distinct executables the plan invokes, in first-use order. For `sudo`
 * commands the program sudo runs is included when it is a bare name.
 */
export function planExecutables(plan: Plan): string[] {
  const seen = new Set<string>();
  for (const step of plan) {
    for (const command of step.action) {
      seen.add(command.cmd);
      const target = command.args[0];
      if (command.cmd === 'sudo' && target !== undefined && !target.startsWith('-') && !target.includes('/')) {
        seen.add(target);
      }
    }
  }
  return [...seen];
}
