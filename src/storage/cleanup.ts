/**
 * Directory Cleanup
 *
 * Removes a working directory, refusing anything that is not a directory.
 *
 * @module storage/cleanup
 */

import * as fs from 'node:fs/promises';
import type { Logger } from '../pipeline/types.js';

/**
 * The cleanup target is missing or not a directory.
 */
export class CleanupTargetError extends Error {
  constructor(public readonly target: string) {
    super(`'${target}' does not appear to be a directory!`);
    this.name = 'CleanupTargetError';
  }
}

/**
 * Remove a directory and everything in it.
 *
 * @param target - Directory to remove
 * @param logger - Optional logger for progress output
 * @throws CleanupTargetError if target is not a directory
 */
export async function cleanupDirectory(target: string, logger?: Logger): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(target)).isDirectory();
  } catch {
    isDirectory = false;
  }

  if (!isDirectory) {
    throw new CleanupTargetError(target);
  }

  logger?.info('Cleaning up...');
  await fs.rm(target, { recursive: true, force: true });
}
