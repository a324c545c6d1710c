/**
 * Cleanup Command
 *
 * @module cli/commands/cleanup
 */

import type { Command } from 'commander';
import * as path from 'node:path';
import { cleanupDirectory } from '../../storage/index.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { resolveContext, type CliDependencies } from './context.js';

/**
 * Remove a working directory.
 *
 * @returns SUCCESS, or ERROR when the target is not a directory
 */
export async function handleCleanup(
  target: string,
  base: BaseCommand,
  deps: CliDependencies = {}
): Promise<ExitCode> {
  const context = resolveContext(deps);

  try {
    await cleanupDirectory(path.resolve(context.cwd, target), base.toLogger());
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return base.report(error);
  }
}

/**
 * Register the cleanup command.
 */
export function registerCleanupCommand(program: Command, deps: CliDependencies = {}): void {
  program
    .command('cleanup <dir>')
    .description('Remove a working directory and everything in it')
    .action(async (dir: string, _options: Record<string, unknown>, cmd: Command) => {
      process.exitCode = await handleCleanup(dir, getBaseCommand(cmd.parent ?? cmd), deps);
    });
}
