/**
 * Temp File Utility
 *
 * Writes binary tool output (screenshots) to uniquely named files in the OS
 * temp directory when it is too large to inline in an MCP response.
 */

import { writeFile, unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('temp-file');

/** Files written by this process, removed on shutdown */
const trackedFiles = new Set<string>();

/**
 * Write binary data to a temporary file.
 *
 * @param extension - without dot (e.g. 'png', 'jpeg')
 * @returns Absolute path to the written file
 */
export async function writeTempFile(
  data: Uint8Array,
  extension: string,
  prefix = 'screenshot'
): Promise<string> {
  const filename = `${prefix}-${randomBytes(6).toString('hex')}.${extension}`;
  const filepath = join(tmpdir(), filename);

  await writeFile(filepath, data);
  trackedFiles.add(filepath);
  return filepath;
}

/**
 * Paths written so far and not yet cleaned up.
 */
export function getTrackedTempFiles(): string[] {
  return [...trackedFiles];
}

/**
 * Remove all temp files written by this process.
 * Files already deleted by someone else are ignored.
 */
export async function cleanupTempFiles(): Promise<void> {
  const deletions = [...trackedFiles].map((filepath) =>
    unlink(filepath).catch((err: NodeJS.ErrnoException) => {
      if (err.code !== 'ENOENT') {
        logger.warning('Failed to delete temp file', { filepath, error: err.message });
      }
    })
  );
  await Promise.all(deletions);
  trackedFiles.clear();
}
