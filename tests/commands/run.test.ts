import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { access, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { runCommand } from '@/commands/run.js';
import { LogSinkUnavailableError } from '@/lib/log_sink.js';
import { ConfigError } from '@/lib/config.js';
import { readJson } from '@/lib/fs.js';
import type { HostprepConfig } from '@/types/config.js';
import { calledSteps, createSpyRunner, isLevelLine, makeTempDir, removeTempDir } from '../helpers/mocks.js';

describe('run command', () => {
  let testDir: string;
  let configPath: string;
  let logPath: string;

  const writeConfig = async (config: HostprepConfig) => {
    await writeFile(configPath, JSON.stringify(config, null, 2));
  };

  beforeEach(async () => {
    testDir = await makeTempDir();
    configPath = join(testDir, 'hostprep.config.json');
    logPath = join(testDir, 'install.log');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await writeConfig({
      version: '1.0',
      steps: [
        { name: 'Clone tools', precondition: { kind: 'dir_exists', path: testDir }, commands: [{ cmd: 'git' }] },
        { name: 'Install tools', commands: [{ cmd: 'installer' }] },
        { name: 'Pull image', commands: [{ cmd: 'docker', args: ['pull', 'example/image'] }] },
      ],
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(testDir);
  });

  it('exits 0 even when a step failed', async () => {
    const { runner, run } = createSpyRunner({ 'Install tools': 1 });

    const { result, exitCode } = await runCommand({ configPath, logFile: logPath, actionRunner: runner, mirror: () => {} });

    expect(exitCode).toBe(0);
    expect(calledSteps(run)).toEqual(['Install tools', 'Pull image']);
    expect(result.steps.map((r) => r.outcome.status)).toEqual(['skipped', 'failed', 'succeeded']);
    expect(result.log_path).toBe(logPath);
  });

  it('exits 1 with strictExit when a step failed', async () => {
    const { runner } = createSpyRunner({ 'Pull image': 125 });

    const { exitCode } = await runCommand({
      configPath,
      logFile: logPath,
      actionRunner: runner,
      mirror: () => {},
      strictExit: true,
    });

    expect(exitCode).toBe(1);
  });

  it('exits 0 with strictExit when nothing failed', async () => {
    const { exitCode } = await runCommand({
      configPath,
      logFile: logPath,
      actionRunner: createSpyRunner().runner,
      mirror: () => {},
      strictExit: true,
    });

    expect(exitCode).toBe(0);
  });

  it('writes one ERROR line for the failed step to the log file', async () => {
    await runCommand({
      configPath,
      logFile: logPath,
      actionRunner: createSpyRunner({ 'Install tools': 7 }).runner,
      mirror: () => {},
    });

    const lines = (await readFile(logPath, 'utf-8')).trimEnd().split('\n');
    const errors = lines.filter((line) => isLevelLine(line, 'ERROR'));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/\[ERROR\] Step "Install tools" failed with exit code 7$/);
    expect(lines[0]).toMatch(/\[INFO\] ===== Starting installation at /);
    expect(lines.at(-1)?.split('] [INFO] ')[1]).toBe(
      `All output has been logged to ${logPath}. Check for [ERROR] lines if a step did not succeed.`
    );
  });

  it('uses log_file from the config', async () => {
    await writeConfig({ version: '1.0', log_file: join(testDir, 'logs', 'from-config.log'), steps: [] });

    const { result } = await runCommand({ configPath, actionRunner: createSpyRunner().runner, mirror: () => {} });

    expect(result.log_path).toBe(join(testDir, 'logs', 'from-config.log'));
    await expect(access(join(testDir, 'logs', 'from-config.log'))).resolves.toBeUndefined();
  });

  it('writes a JSON report when asked', async () => {
    const reportFile = join(testDir, 'report.json');

    const { reportPath } = await runCommand({
      configPath,
      logFile: logPath,
      reportFile,
      actionRunner: createSpyRunner({ 'Install tools': 2 }).runner,
      mirror: () => {},
    });

    expect(reportPath).toBe(reportFile);
    const report = await readJson(reportFile);
    expect(report).toMatchObject({
      report_version: 1,
      log_path: logPath,
      totals: { succeeded: 1, failed: 1, skipped: 1 },
    });
  });

  it('fails before any step when the log file cannot be opened', async () => {
    const blocker = join(testDir, 'blocker');
    await writeFile(blocker, '');
    const { runner, run } = createSpyRunner();

    await expect(
      runCommand({ configPath, logFile: join(blocker, 'install.log'), actionRunner: runner, mirror: () => {} })
    ).rejects.toThrow(LogSinkUnavailableError);
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects an invalid config', async () => {
    await writeFile(configPath, JSON.stringify({ version: '1.0' }));

    await expect(runCommand({ configPath, logFile: logPath })).rejects.toThrow(ConfigError);
  });

  it('writes no log file and runs nothing in a dry run', async () => {
    const { runner, run } = createSpyRunner();

    const { result, reportPath } = await runCommand({
      configPath,
      logFile: logPath,
      reportFile: join(testDir, 'report.json'),
      actionRunner: runner,
      mirror: () => {},
      dryRun: true,
    });

    expect(run).not.toHaveBeenCalled();
    expect(reportPath).toBeNull();
    expect(result.steps.map((r) => r.outcome)).toEqual([
      { status: 'skipped', reason: 'precondition' },
      { status: 'skipped', reason: 'dry_run' },
      { status: 'skipped', reason: 'dry_run' },
    ]);
    await expect(access(logPath)).rejects.toThrow();
  });

  it('runs real commands and logs their output', async () => {
    await writeConfig({
      version: '1.0',
      steps: [
        { name: 'Already there', precondition: { kind: 'dir_exists', path: testDir }, commands: [{ cmd: 'false' }] },
        { name: 'Broken installer', commands: [{ cmd: process.execPath, args: ['-e', 'process.exit(4)'] }] },
        { name: 'Greeter', commands: [{ cmd: process.execPath, args: ['-e', "console.log('hello from greeter')"] }] },
      ],
    });

    const { result } = await runCommand({ configPath, logFile: logPath, mirror: () => {} });

    expect(result.steps.map((r) => r.outcome)).toEqual([
      { status: 'skipped', reason: 'precondition' },
      { status: 'failed', exitCode: 4 },
      { status: 'succeeded' },
    ]);
    const lines = (await readFile(logPath, 'utf-8')).split('\n');
    expect(lines).toContain('hello from greeter');
    expect(lines.filter((line) => isLevelLine(line, 'ERROR'))).toHaveLength(1);
  });
});
