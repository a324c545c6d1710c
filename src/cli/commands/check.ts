/**
 * Check Command
 *
 * Reports where each required tool was found, and how to install the
 * ones that were not.
 *
 * @module cli/commands/check
 */

import type { Command } from 'commander';
import { checkRequirements } from '../../tools/index.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatMissingTools, formatRequirementReport } from '../formatters/requirements.js';
import { loadCommandConfig, resolveContext, writeOutput, type CliDependencies } from './context.js';

/**
 * Run the check command.
 *
 * @returns SUCCESS when every tool is installed, ERROR otherwise
 */
export async function handleCheck(base: BaseCommand, deps: CliDependencies = {}): Promise<ExitCode> {
  const context = resolveContext(deps);

  try {
    const config = loadCommandConfig(context);
    const report = await checkRequirements(config, context.locator);

    writeOutput(context, formatRequirementReport(report));

    if (!report.ok) {
      base.blank();
      base.fail(`${report.missing.length} required tool(s) missing`);
      console.error(formatMissingTools(report.missing));
      return EXIT_CODES.ERROR;
    }

    base.success('All required tools found');
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return base.report(error);
  }
}

/**
 * Register the check command.
 */
export function registerCheckCommand(program: Command, deps: CliDependencies = {}): void {
  program
    .command('check')
    .description('Check that ffmpeg, yt-dlp and whisper.cpp are installed')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      process.exitCode = await handleCheck(getBaseCommand(cmd.parent ?? cmd), deps);
    });
}
