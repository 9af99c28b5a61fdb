/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a crash mid-write leaves either the old
 * file or the new one in place, never a partial map. The rename is atomic
 * on POSIX when source and target share a directory.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from '@leader-geo/geo-rules';

const log = createLogger('atomic-write');

/**
 * Atomically write bytes or text to a file, creating parent directories
 *
 * @throws Error if the directory, write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('data/leader_geo_map.bin', encodeGeoMap(entries));
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent writers off each other's temp files
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      log.debug('Temp file cleanup failed', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Atomically write pretty-printed JSON
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(data, null, space)}\n`);
}
