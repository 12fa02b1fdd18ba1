import { access } from 'node:fs/promises';
import { dirname } from 'node:path';

import { ConfigError, configuredLogFile, loadConfig } from '../lib/config.js';
import type { LoadedConfig } from '../lib/config.js';
import { checkExecutables } from '../lib/doctor.js';
import { buildPlan } from '../lib/plan.js';

interface DoctorCommandOptions {
  configPath?: string;
  pathEnv?: string;
}

/**
 * Checks the config and the tools the plan calls.
 *
 * @returns Number of issues found; missing tools are warnings, not issues,
 *          since earlier steps may install them
 */
export async function doctorCommand(options: DoctorCommandOptions = {}): Promise<number> {
  console.log('hostprep doctor - checking configuration and environment\n');

  let loaded: LoadedConfig;
  try {
    loaded = await loadConfig(options.configPath);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    console.log(`[FAIL] ${error.message}`);
    for (const issue of error.issues) {
      console.log(`  - ${issue}`);
    }
    return 1;
  }

  const { config, path, isDefault } = loaded;
  console.log(`[OK] Config ${isDefault ? '(bundled default) ' : ''}is valid: ${path}`);
  const plan = buildPlan(config);
  console.log(`[OK] Plan has ${plan.length} step(s)`);

  const logDir = dirname(configuredLogFile(config));
  try {
    await access(logDir);
    console.log(`[OK] Log directory exists: ${logDir}`);
  } catch {
    console.log(`[WARN] Log directory will be created: ${logDir}`);
  }

  let missing = 0;
  for (const check of checkExecutables(plan, options.pathEnv)) {
    if (check.resolved) {
      console.log(`[OK] ${check.command} -> ${check.resolved}`);
    } else {
      missing++;
      console.log(`[WARN] ${check.command} not found on PATH`);
    }
  }

  console.log('\n--- Summary ---');
  if (missing > 0) {
    console.log(`${missing} command(s) not found; steps using them will fail unless an earlier step installs them.`);
  }
  console.log('Configuration is ready to run.');
  return 0;
}
