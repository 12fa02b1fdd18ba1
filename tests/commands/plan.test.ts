import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { planCommand } from '@/commands/plan.js';
import { makeTempDir, removeTempDir } from '../helpers/mocks.js';

describe('plan command', () => {
  let testDir: string;
  let configPath: string;
  let output: string[];

  beforeEach(async () => {
    testDir = await makeTempDir();
    configPath = join(testDir, 'hostprep.config.json');
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(' '));
    });
    await mkdir(join(testDir, 'mininet'));
    await writeFile(
      configPath,
      JSON.stringify({
        version: '1.0',
        steps: [
          {
            name: 'Clone Mininet',
            precondition: { kind: 'dir_exists', path: '~/mininet' },
            commands: [{ cmd: 'git', args: ['clone', 'https://example.test/mininet.git', '~/mininet'] }],
          },
          {
            name: 'Install Mininet-WiFi',
            continue_on_failure: false,
            commands: [
              { cmd: 'sudo', args: ['apt-get', 'remove', '-y', 'old'], allow_failure: true },
              { cmd: 'sudo', args: ['util/install.sh', '-Wlnfv'], cwd: '~/mininet-wifi' },
            ],
          },
        ],
      })
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(testDir);
  });

  it('prints each step with its precondition state and commands', async () => {
    await planCommand({ configPath, home: testDir });

    expect(output).toEqual([
      `Plan from ${configPath} (2 step(s))`,
      '\n1. Clone Mininet',
      `   skip if dir_exists ${join(testDir, 'mininet')} (holds, will skip)`,
      `   $ git clone https://example.test/mininet.git ${join(testDir, 'mininet')}`,
      '\n2. Install Mininet-WiFi [halts on failure]',
      '   $ sudo apt-get remove -y old || true',
      `   $ sudo util/install.sh -Wlnfv (in ${join(testDir, 'mininet-wifi')})`,
    ]);
  });

  it('prints JSON with --json', async () => {
    await planCommand({ configPath, home: testDir, json: true });

    expect(output).toHaveLength(1);
    const parsed: unknown = JSON.parse(output[0]);
    expect(parsed).toEqual({
      config: configPath,
      steps: [
        {
          name: 'Clone Mininet',
          precondition: { kind: 'dir_exists', path: join(testDir, 'mininet'), holds: true },
          continue_on_failure: true,
          commands: [
            {
              cmd: 'git',
              args: ['clone', 'https://example.test/mininet.git', join(testDir, 'mininet')],
              cwd: null,
              allow_failure: false,
            },
          ],
        },
        {
          name: 'Install Mininet-WiFi',
          precondition: null,
          continue_on_failure: false,
          commands: [
            { cmd: 'sudo', args: ['apt-get', 'remove', '-y', 'old'], cwd: null, allow_failure: true },
            { cmd: 'sudo', args: ['util/install.sh', '-Wlnfv'], cwd: join(testDir, 'mininet-wifi'), allow_failure: false },
          ],
        },
      ],
    });
  });
});
