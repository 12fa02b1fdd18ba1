/**
 * External command execution for step actions.
 *
 * Commands run with spawn and shell:false. Their stdout and stderr are split
 * into lines and streamed into the run's log sink as they arrive; the exit
 * status is the only other thing the sequencer learns from them.
 */

import { spawn } from 'node:child_process';
import { homedir, constants } from 'node:os';
import type { Readable } from 'node:stream';
import type { LogSink } from '../types/log.js';
import type { Step, StepCommand } from '../types/step.js';
import { entry } from './log_sink.js';
import { isDirectory, renderCommand } from './plan.js';

/** Shell status for a command that could not be found */
export const EXIT_NOT_FOUND = 127;
/** Shell status for a command that was found but could not be executed */
export const EXIT_NOT_EXECUTABLE = 126;

/**
 * Runs one command to completion and resolves with its exit status.
 * Never rejects for a failed or missing command; rejects only when the
 * log sink fails. `now` stamps the entries it writes.
 */
export type CommandRunner = (command: StepCommand, sink: LogSink, now?: () => Date) => Promise<number>;

/**
 * Runs a whole step action and resolves with its exit status.
 */
export interface ActionRunner {
  /** `now` stamps the entries the runner writes; defaults to the wall clock */
  run(step: Step, sink: LogSink, now?: () => Date): Promise<number>;
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/**
 * Maps a child's close event to a shell-style exit status.
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal !== null) {
    return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  }
  return 1;
}

function spawnErrorStatus(error: NodeJS.ErrnoException): number {
  if (error.code === 'ENOENT') return EXIT_NOT_FOUND;
  if (error.code === 'EACCES') return EXIT_NOT_EXECUTABLE;
  return 1;
}

/**
 * Forwards complete lines from a stream to `onLine`; flushes a trailing
 * partial line when the stream ends.
 */
function pipeLines(stream: Readable | null, onLine: (line: string) => void): void {
  if (!stream) return;
  let buffered = '';
  stream.setEncoding('utf-8');
  stream.on('data', (chunk: string) => {
    buffered += chunk;
    const lines = buffered.split(/\r?\n/);
    buffered = lines.pop() ?? '';
    for (const line of lines) {
      onLine(line);
    }
  });
  stream.on('end', () => {
    if (buffered !== '') {
      onLine(buffered);
      buffered = '';
    }
  });
}

export interface SpawnCommandOptions {
  /** Directory used when a command's cwd is missing */
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Creates a CommandRunner backed by child_process.spawn.
 *
 * A missing `cwd` falls back to the home directory, like `cd dir || true`
 * followed by the command.
 */
export function createSpawnCommandRunner(options: SpawnCommandOptions = {}): CommandRunner {
  const home = options.home ?? homedir();

  return (command, sink, now) => {
    let cwd = command.cwd;
    if (cwd !== undefined && !isDirectory(cwd)) {
      sink.write(entry('INFO', `Directory ${cwd} not found; running in ${home}`, now));
      cwd = home;
    }

    return new Promise<number>((resolve, reject) => {
      let settled = false;
      let sinkError: unknown = null;
      const settle = (status: number) => {
        if (settled) return;
        settled = true;
        if (sinkError !== null) {
          reject(sinkError);
          return;
        }
        resolve(status);
      };

      try {
        const child = spawn(command.cmd, [...command.args], {
          cwd,
          env: options.env ?? process.env,
          shell: false,
          stdio: ['ignore', 'pipe', 'pipe'],
        });

        const forward = (line: string) => {
          if (sinkError !== null) return;
          try {
            sink.passthrough(line);
          } catch (error) {
            sinkError = error;
            child.kill('SIGTERM');
          }
        };
        pipeLines(child.stdout, forward);
        pipeLines(child.stderr, forward);

        child.once('error', (error: NodeJS.ErrnoException) => {
          forward(`${command.cmd}: ${error.message}`);
          settle(spawnErrorStatus(error));
        });

        child.once('close', (code, signal) => {
          settle(exitStatus(code, signal));
        });
      } catch (error) {
        try {
          sink.passthrough(
            `${command.cmd}: failed to spawn: ${error instanceof Error ? error.message : String(error)}`
          );
        } catch (writeError) {
          sinkError = writeError;
        }
        settle(1);
      }
    });
  };
}

/**
 * Creates an ActionRunner that runs a step's commands in order.
 *
 * The first failing command ends the action with its status, as `a && b`
 * would. A command marked allowFailure behaves like `cmd || true`.
 */
export function createActionRunner(runCommand: CommandRunner = createSpawnCommandRunner()): ActionRunner {
  return {
    async run(step, sink, now) {
      for (const command of step.action) {
        sink.write(entry('INFO', `$ ${renderCommand(command)}`, now));
        const status = await runCommand(command, sink, now);
        if (status === 0) {
          continue;
        }
        if (command.allowFailure) {
          sink.write(entry('INFO', `Ignoring exit code ${status} from ${command.cmd}`, now));
          continue;
        }
        return status;
      }
      return 0;
    },
  };
}
