/**
 * Tidy Command
 *
 * Runs the cleanup rules over an existing transcript, printing the result
 * or writing it beside the transcript.
 *
 * @module cli/commands/tidy
 */

import type { Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { InputError } from '../../input/index.js';
import { cleanedTranscriptPath } from '../../pipeline/index.js';
import { cleanTranscript, loadCleanupRules } from '../../postprocess/index.js';
import { atomicWriteText } from '../../storage/index.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { loadCommandConfig, resolveContext, writeOutput, type CliDependencies } from './context.js';

export interface TidyOptions {
  /** Write `<name>.clean.txt` instead of printing */
  write?: boolean;
  /** Custom cleanup rules (JSON) */
  rules?: string;
}

async function readTranscript(transcriptPath: string): Promise<string> {
  try {
    return await fs.readFile(transcriptPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new InputError(`Transcript not found: ${transcriptPath}`, transcriptPath);
    }
    throw error;
  }
}

/**
 * Run the tidy command.
 *
 * @param transcript - Transcript file to clean
 * @param options - Command options
 * @param base - Output helper
 * @param deps - Injected collaborators
 * @returns Exit code
 */
export async function handleTidy(
  transcript: string,
  options: TidyOptions,
  base: BaseCommand,
  deps: CliDependencies = {}
): Promise<ExitCode> {
  const context = resolveContext(deps);

  try {
    const config = loadCommandConfig(context);
    const transcriptPath = path.resolve(context.cwd, transcript);
    const rulesPath = options.rules ? path.resolve(context.cwd, options.rules) : config.postprocess.rulesPath;

    const [text, rules] = await Promise.all([readTranscript(transcriptPath), loadCleanupRules(rulesPath)]);
    const cleaned = cleanTranscript(text, rules);

    if (options.write) {
      const target = cleanedTranscriptPath(transcriptPath);
      await atomicWriteText(target, `${cleaned}\n`);
      base.success(`Cleaned transcript written to ${target}`);
    } else {
      writeOutput(context, cleaned);
    }

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return base.report(error);
  }
}

/**
 * Register the tidy command.
 */
export function registerTidyCommand(program: Command, deps: CliDependencies = {}): void {
  program
    .command('tidy <transcript>')
    .description('Clean an existing transcript with the cleanup rules')
    .option('-w, --write', 'Write <name>.clean.txt beside the transcript')
    .option('--rules <file>', 'Custom cleanup rules (JSON)')
    .action(async (transcript: string, options: TidyOptions, cmd: Command) => {
      process.exitCode = await handleTidy(transcript, options, getBaseCommand(cmd.parent ?? cmd), deps);
    });
}
