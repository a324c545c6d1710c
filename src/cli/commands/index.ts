/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - transcribe: Transcribe a URL or local file (default command)
 * - check: Report required tools
 * - tidy: Clean an existing transcript
 * - cleanup: Remove a working directory
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCheckCommand } from './check.js';
import { registerCleanupCommand } from './cleanup.js';
import type { CliDependencies } from './context.js';
import { registerTidyCommand } from './tidy.js';
import { registerTranscribeCommand } from './transcribe.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 * @param deps - Collaborators passed to every command
 */
export function registerCommands(program: Command, deps: CliDependencies = {}): void {
  registerTranscribeCommand(program, deps);
  registerCheckCommand(program, deps);
  registerTidyCommand(program, deps);
  registerCleanupCommand(program, deps);
}

export { handleTranscribe, type TranscribeOptions } from './transcribe.js';
export { handleCheck } from './check.js';
export { handleTidy, type TidyOptions } from './tidy.js';
export { handleCleanup } from './cleanup.js';
export type { CliDependencies } from './context.js';
