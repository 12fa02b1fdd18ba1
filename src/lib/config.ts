/**
 * Configuration loading and validation utilities.
 *
 * Provides functions to find, load, and validate hostprep config files. When
 * no config file exists the bundled default plan is used, so `hostprep`
 * runs without arguments.
 */

import { access } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readJson, AtomicFsError } from './fs.js';
import { CONFIG_SCHEMA_PATH, loadSchema, validateWithSchema } from './schema.js';
import type { HostprepConfig } from '../types/config.js';
import { CONFIG_FILE_CANDIDATES, CONFIG_FILE_NAME, DEFAULT_LOG_FILE } from './branding.js';

export { CONFIG_FILE_NAME };

/** Bundled default plan, resolved beside the package root from src/ or dist/ */
export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL('../../templates/hostprep.config.json', import.meta.url)
);

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A validated config plus where it came from.
 */
export interface LoadedConfig {
  config: HostprepConfig;
  /** Path of the file that was read */
  path: string;
  /** True when no config file was found and the bundled plan was used */
  isDefault: boolean;
}

/**
 * Searches for a configuration file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    for (const fileName of CONFIG_FILE_CANDIDATES) {
      const configPath = join(currentDir, fileName);
      try {
        await access(configPath);
        return configPath;
      } catch {
        // Continue checking candidates.
      }
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/**
 * Validates raw JSON against the bundled config schema and checks that step
 * names are unique.
 *
 * @throws {ConfigError} Listing every schema violation
 */
export async function validateConfig(raw: unknown, configPath?: string): Promise<HostprepConfig> {
  const schema = await loadSchema(CONFIG_SCHEMA_PATH);
  const result = validateWithSchema<HostprepConfig>(raw, schema);
  if (!result.valid || !result.data) {
    throw new ConfigError(
      `Invalid configuration file: ${result.errors.join('; ')}`,
      configPath,
      result.errors
    );
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const step of result.data.steps) {
    if (seen.has(step.name)) {
      duplicates.push(step.name);
    }
    seen.add(step.name);
  }
  if (duplicates.length > 0) {
    const issues = duplicates.map((name) => `duplicate step name "${name}"`);
    throw new ConfigError(`Invalid configuration file: ${issues.join('; ')}`, configPath, issues);
  }

  return result.data;
}

/**
 * Loads and validates a hostprep configuration file.
 *
 * @param configPath - Optional explicit path (no search). Otherwise searches
 *                     upward from the working directory, then falls back to
 *                     the bundled default plan.
 * @throws {ConfigError} If the file cannot be read or is invalid
 *
 * @example
 * ```typescript
 * const { config } = await loadConfig();
 * const { config } = await loadConfig('/srv/lab/hostprep.config.json');
 * ```
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  let resolvedPath: string;
  let isDefault = false;

  if (configPath) {
    resolvedPath = resolve(configPath);
  } else {
    const found = await findConfigFile();
    if (found) {
      resolvedPath = found;
    } else {
      resolvedPath = DEFAULT_CONFIG_PATH;
      isDefault = true;
    }
  }

  let raw: unknown;
  try {
    raw = await readJson(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(`Failed to read configuration file: ${error.message}`, resolvedPath);
    }
    throw error;
  }

  const config = await validateConfig(raw, resolvedPath);
  return { config, path: resolvedPath, isDefault };
}

/**
 * Log file path for a config, before any command-line override.
 */
export function configuredLogFile(config: HostprepConfig): string {
  return config.log_file ?? DEFAULT_LOG_FILE;
}
