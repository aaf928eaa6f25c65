/**
 * File system helpers for crash-safe JSON reads and writes.
 *
 * Writes use the write-tmp-fsync-rename pattern so a reader never sees a
 * partially written report or config file.
 */

import { open, rename, unlink, readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

/**
 * Returns true if `error` is a Node errno exception with the given code.
 */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Atomically writes JSON data to a file, creating the parent directory.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('out/outcome.json', { code: 'SUCCEEDED' });
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

    // Atomic rename (POSIX guarantees atomicity)
    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await unlink(tmpPath).catch((unlinkError: unknown) => {
      if (!hasErrnoCode(unlinkError, 'ENOENT')) {
        throw unlinkError;
      }
    });

    throw new AtomicFsError(
      `Failed to atomically write JSON to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads and parses a JSON file.
 *
 * The result is `unknown`; callers validate the shape before use.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson(filePath: string): Promise<unknown> {
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
