#!/usr/bin/env node

import { Command } from "commander";
import { ConfigError } from "./lib/config.js";
import { LogSinkUnavailableError } from "./lib/log_sink.js";
import { CLI_NAME } from "./lib/branding.js";

const program = new Command();

// Global config option
let globalConfigPath: string | undefined;

program
  .name(CLI_NAME)
  .description("Best-effort provisioning sequencer: runs every step, logs every failure, never stops early")
  .version("1.0.0")
  .option("-c, --config <path>", "Path to configuration file")
  .hook("preAction", (thisCommand) => {
    globalConfigPath = thisCommand.opts<{ config?: string }>().config;
  });

function handleError(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
    process.exit(1);
  }
  if (error instanceof LogSinkUnavailableError) {
    console.error(`Log sink error: ${error.message}`);
    process.exit(1);
  }
  console.error("Fatal error:", error);
  process.exit(1);
}

interface RunCliOptions {
  log?: string;
  report?: string;
  only?: string[];
  dryRun?: boolean;
  strictExit?: boolean;
}

program
  .command("run", { isDefault: true })
  .description("Run every step of the plan, logging to the log file")
  .option("--log <path>", "Log file (overrides log_file)")
  .option("--report <path>", "Write a JSON run report (overrides report_file)")
  .option("--only <glob...>", "Run only steps whose names match")
  .option("--dry-run", "Evaluate preconditions without running any command")
  .option("--strict-exit", "Exit 1 when any step failed")
  .action(async (options: RunCliOptions) => {
    try {
      const { runCommand } = await import("./commands/run.js");
      const { exitCode } = await runCommand({
        configPath: globalConfigPath,
        logFile: options.log,
        reportFile: options.report,
        only: options.only,
        dryRun: options.dryRun,
        strictExit: options.strictExit,
      });
      process.exitCode = exitCode;
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("plan")
  .description("Show the resolved plan and which steps would be skipped")
  .option("--json", "Output in JSON format")
  .action(async (options: { json?: boolean }) => {
    try {
      const { planCommand } = await import("./commands/plan.js");
      await planCommand({ configPath: globalConfigPath, json: options.json });
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("doctor")
  .description("Check the configuration and the tools the plan calls")
  .action(async () => {
    try {
      const { doctorCommand } = await import("./commands/doctor.js");
      const issues = await doctorCommand({ configPath: globalConfigPath });
      if (issues > 0) {
        process.exit(1);
      }
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("init")
  .description("Write the bundled plan to hostprep.config.json for editing")
  .option("-f, --force", "Overwrite an existing file")
  .action(async (options: { force?: boolean }) => {
    try {
      const { initCommand } = await import("./commands/init.js");
      await initCommand({ force: options.force });
    } catch (error) {
      console.error(`Failed to initialize: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
