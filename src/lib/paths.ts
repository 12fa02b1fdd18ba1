/**
 * Path helpers for plan configuration.
 *
 * Step paths are written the way an operator would type them in a shell:
 * - "~/mininet"
 * - "$HOME/mininet" or "${HOME}/mininet"
 * - absolute or relative paths, used as-is
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const HOME_PREFIX = /^(~|\$HOME|\$\{HOME\})(?=$|\/)/;

/**
 * Expands a leading home reference into `home`.
 */
export function expandHome(p: string, home: string = homedir()): string {
  const match = HOME_PREFIX.exec(p);
  if (!match) return p;
  const rest = p.slice(match[0].length).replace(/^\/+/, '');
  return rest === '' ? home : join(home, rest);
}
