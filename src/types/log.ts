export type LogLevel = 'INFO' | 'ERROR';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
}

/**
 * Destination for everything a run prints: its own entries and the
 * passthrough output of the commands it spawns.
 */
export interface LogSink {
  /** Where the log is persisted, or null for sinks that keep nothing on disk */
  readonly destination: string | null;
  write(entry: LogEntry): void;
  /** Writes a line of child-process output verbatim */
  passthrough(line: string): void;
  close(): void;
}
