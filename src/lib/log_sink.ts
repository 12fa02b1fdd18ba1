/**
 * Log sinks for provisioning runs.
 *
 * A run writes every line twice: once to the persistent log file and once to
 * the console. Logging has no fallback, so any failure to open or write the
 * file raises LogSinkUnavailableError and the run stops.
 */

import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { LogEntry, LogLevel, LogSink } from '../types/log.js';

/**
 * Error thrown when the log file cannot be opened or written.
 */
export class LogSinkUnavailableError extends Error {
  constructor(
    message: string,
    public readonly logPath: string,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'LogSinkUnavailableError';
  }
}

/** Receives each rendered line, without its trailing newline */
export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Renders an entry as `[<ISO timestamp>] [<LEVEL>] <message>`.
 */
export function formatEntry(entry: LogEntry): string {
  return `[${entry.timestamp.toISOString()}] [${entry.level}] ${entry.message}`;
}

/**
 * Builds an entry stamped with the current time.
 */
export function entry(level: LogLevel, message: string, now: () => Date = () => new Date()): LogEntry {
  return { timestamp: now(), level, message };
}

/**
 * Appends to a log file and mirrors every line to the console.
 */
export class FileLogSink implements LogSink {
  readonly destination: string;
  private fd: number | null;

  /**
   * Opens `logPath` for appending, creating parent directories.
   *
   * @throws {LogSinkUnavailableError} If the file cannot be opened
   */
  constructor(logPath: string, private readonly mirror: LineWriter = stdoutWriter) {
    this.destination = resolve(logPath);
    try {
      mkdirSync(dirname(this.destination), { recursive: true });
      this.fd = openSync(this.destination, 'a');
    } catch (error) {
      throw new LogSinkUnavailableError(
        `Cannot open log file ${this.destination}: ${error instanceof Error ? error.message : String(error)}`,
        this.destination,
        error instanceof Error ? error : undefined
      );
    }
  }

  write(logEntry: LogEntry): void {
    this.emit(formatEntry(logEntry));
  }

  passthrough(line: string): void {
    this.emit(line);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }

  private emit(line: string): void {
    if (this.fd === null) {
      throw new LogSinkUnavailableError(`Log file ${this.destination} is closed`, this.destination);
    }
    try {
      writeSync(this.fd, `${line}\n`);
    } catch (error) {
      throw new LogSinkUnavailableError(
        `Cannot write log file ${this.destination}: ${error instanceof Error ? error.message : String(error)}`,
        this.destination,
        error instanceof Error ? error : undefined
      );
    }
    this.mirror(line);
  }
}

/**
 * Keeps rendered lines in memory. Used for dry runs and tests.
 */
export class MemoryLogSink implements LogSink {
  readonly destination = null;
  readonly lines: string[] = [];
  readonly entries: LogEntry[] = [];

  constructor(private readonly mirror?: LineWriter) {}

  write(logEntry: LogEntry): void {
    this.entries.push(logEntry);
    this.push(formatEntry(logEntry));
  }

  passthrough(line: string): void {
    this.push(line);
  }

  close(): void {}

  private push(line: string): void {
    this.lines.push(line);
    this.mirror?.(line);
  }
}
