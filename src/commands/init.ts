import { access, copyFile } from 'node:fs/promises';
import { join } from 'node:path';

import { CONFIG_FILE_NAME, DEFAULT_CONFIG_PATH } from '../lib/config.js';

interface InitOptions {
  force?: boolean;
  dir?: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes the bundled plan as hostprep.config.json for editing.
 *
 * @returns Path of the written file
 * @throws Error if the file exists and `force` is not set
 */
export async function initCommand(options: InitOptions = {}): Promise<string> {
  const target = join(options.dir ?? process.cwd(), CONFIG_FILE_NAME);
  if (!options.force && (await exists(target))) {
    throw new Error(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`);
  }
  await copyFile(DEFAULT_CONFIG_PATH, target);
  console.log(`Created ${target}`);
  return target;
}
