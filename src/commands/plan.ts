import { loadConfig } from '../lib/config.js';
import { buildPlan, renderCommand } from '../lib/plan.js';

interface PlanCommandOptions {
  configPath?: string;
  json?: boolean;
  home?: string;
}

/**
 * Prints the resolved plan and whether each precondition currently holds.
 */
export async function planCommand(options: PlanCommandOptions = {}): Promise<void> {
  const { config, path } = await loadConfig(options.configPath);
  const plan = buildPlan(config, { home: options.home });

  if (options.json) {
    const output = plan.map((step) => ({
      name: step.name,
      precondition: step.precondition
        ? { kind: step.precondition.kind, path: step.precondition.path, holds: step.precondition.holds() }
        : null,
      continue_on_failure: step.continueOnFailure,
      commands: step.action.map((c) => ({
        cmd: c.cmd,
        args: c.args,
        cwd: c.cwd ?? null,
        allow_failure: c.allowFailure,
      })),
    }));
    console.log(JSON.stringify({ config: path, steps: output }, null, 2));
    return;
  }

  console.log(`Plan from ${path} (${plan.length} step(s))`);
  plan.forEach((step, index) => {
    console.log(`\n${index + 1}. ${step.name}${step.continueOnFailure ? '' : ' [halts on failure]'}`);
    if (step.precondition) {
      const state = step.precondition.holds() ? 'holds, will skip' : 'does not hold';
      console.log(`   skip if ${step.precondition.kind} ${step.precondition.path} (${state})`);
    }
    for (const command of step.action) {
      const cwd = command.cwd ? ` (in ${command.cwd})` : '';
      const tolerant = command.allowFailure ? ' || true' : '';
      console.log(`   $ ${renderCommand(command)}${tolerant}${cwd}`);
    }
  });
}
