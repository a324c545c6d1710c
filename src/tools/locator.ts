/**
 * Tool Locator
 *
 * Resolves an executable the way a shell would: bare names are searched on
 * PATH, anything containing a path separator must point at an executable
 * file.
 *
 * @module tools/locator
 */

import * as fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import * as path from 'node:path';
import which from 'which';

/**
 * Finds executables.
 */
export interface ToolLocator {
  /**
   * @param command - Bare command name or path
   * @returns Absolute path of the executable, or null when not found
   */
  locate(command: string): Promise<string | null>;
}

function hasPathSeparator(command: string): boolean {
  return command.includes('/') || command.includes(path.sep);
}

/**
 * {@link ToolLocator} using the `which` package for PATH lookups.
 */
export class PathToolLocator implements ToolLocator {
  async locate(command: string): Promise<string | null> {
    if (hasPathSeparator(command)) {
      return (await isExecutableFile(command)) ? path.resolve(command) : null;
    }
    return which(command, { nothrow: true });
  }
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      return false;
    }
    await fs.access(filePath, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create the default tool locator.
 */
export function createToolLocator(): ToolLocator {
  return new PathToolLocator();
}
