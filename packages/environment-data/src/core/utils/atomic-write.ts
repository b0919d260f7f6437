/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a crash mid-download leaves either the
 * previous file or the new one on disk, never a truncated one.
 *
 * **Pattern:**
 * 1. Write to temporary file (unique name with PID to prevent conflicts)
 * 2. Rename temp file to target path (atomic operation on POSIX)
 * 3. Cleanup temp file on error
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from './logger.js';

const logger = createLogger('atomic-write');

/**
 * Atomically write data to file, replacing any existing file
 *
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/data/downloads/annual_deforestation.csv', bytes);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger.debug('Temp file cleanup skipped', {
        tempPath,
        reason: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 *
 * @param space - JSON.stringify space parameter (default: 2 for pretty-print)
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, space));
}
