/**
 * File helpers for run reports and configuration.
 *
 * Reports are written with the write-tmp-fsync-rename pattern so a report
 * file is never left half-written if the run is killed while saving it.
 */

import { mkdir, open, rename, unlink, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Error thrown when a JSON file cannot be read or written.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'AtomicFsError';
  }
}

/**
 * Atomically writes JSON data to a file, creating the parent directory.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('reports/install.report.json', result);
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    const content = JSON.stringify(data, null, 2) + '\n';

    await mkdir(dirname(filePath), { recursive: true });
    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      try {
        await fileHandle.close();
      } catch {
        // Ignore close errors during cleanup
      }
    }

    try {
      await unlink(tmpPath);
    } catch {
      // Ignore unlink errors - file may not exist
    }

    throw new AtomicFsError(
      `Failed to atomically write JSON to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads and parses a JSON file. The result is unvalidated; callers
 * narrow it themselves.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}
