/**
 * Doctor checks for a hostprep plan and its environment.
 */

import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, isAbsolute, join } from 'node:path';
import type { Plan } from '../types/step.js';
import { planExecutables } from './plan.js';

/**
 * Result of looking up one executable.
 */
export interface ExecutableCheck {
  /** The command as written in the plan (e.g. "sudo") */
  command: string;
  /** Absolute path it resolves to, or null when not found */
  resolved: string | null;
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves a command the way execvp would: paths containing a slash are
 * checked directly, bare names are looked up on PATH.
 */
export function resolveExecutable(
  command: string,
  pathEnv: string = process.env.PATH ?? '',
  cwd: string = process.cwd()
): string | null {
  if (command.includes('/')) {
    const candidate = isAbsolute(command) ? command : join(cwd, command);
    return isExecutableFile(candidate) ? candidate : null;
  }
  for (const dir of pathEnv.split(delimiter)) {
    if (dir === '') continue;
    const candidate = join(dir, command);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Checks every distinct executable the plan invokes.
 */
export function checkExecutables(plan: Plan, pathEnv?: string): ExecutableCheck[] {
  return planExecutables(plan).map((command) => ({
    command,
    resolved: resolveExecutable(command, pathEnv),
  }));
}
