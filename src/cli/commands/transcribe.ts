/**
 * Transcribe Command
 *
 * Turns a video URL or local media file into a transcript:
 * - Checks that ffmpeg, yt-dlp and whisper.cpp are installed
 * - Runs the pipeline with live stage progress on stderr
 * - Echoes the transcript to stdout while it is written
 *
 * Also the default command, so `vodscript <source>` works.
 *
 * @module cli/commands/transcribe
 */

import type { Command } from 'commander';
import {
  applyOverrides,
  isDeliverySinkName,
  DELIVERY_SINKS,
  type ConfigOverrides,
} from '../../config/index.js';
import { DeliveryError, createSink } from '../../delivery/index.js';
import { createTranscriptionPipeline } from '../../pipeline/index.js';
import { assertRequirements } from '../../tools/index.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import {
  createSpinner,
  createStageProgress,
  formatDryRunCommands,
  formatRunSummary,
  formatTimingBreakdown,
} from '../formatters/index.js';
import {
  loadCommandConfig,
  resolveContext,
  withInterruptSignal,
  writeOutput,
  type CliDependencies,
} from './context.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the transcribe command, as commander parses them.
 */
export interface TranscribeOptions {
  /** Model file */
  model?: string;
  /** Spoken language */
  language?: string;
  /** Thread count (validated here) */
  threads?: string;
  /** Transcript directory */
  outputDir?: string;
  /** Ignore an existing transcript */
  force?: boolean;
  /** Write a cleaned copy */
  postprocess?: boolean;
  /** Delivery sink name (validated here) */
  deliver?: string;
  /** Drop silent stretches before transcription */
  silenceRemoval?: boolean;
  /** Custom cleanup rules file */
  rules?: string;
  /** Print the commands instead of running them */
  dryRun?: boolean;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ============================================================================
// Option Parsing
// ============================================================================

/**
 * Turn command options into configuration overrides.
 *
 * @throws UsageError for an invalid thread count or sink name
 */
function toOverrides(options: TranscribeOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {
    modelPath: options.model,
    language: options.language,
    outputDir: options.outputDir,
    postprocess: options.postprocess,
    silenceRemoval: options.silenceRemoval,
    rulesPath: options.rules,
  };

  if (options.threads !== undefined) {
    const threads = Number(options.threads);
    if (!/^\d+$/.test(options.threads.trim()) || threads < 1) {
      throw new UsageError(`--threads must be a positive integer (got "${options.threads}")`);
    }
    overrides.threads = threads;
  }

  if (options.deliver !== undefined) {
    if (!isDeliverySinkName(options.deliver)) {
      throw new UsageError(
        `--deliver must be one of ${DELIVERY_SINKS.join(', ')} (got "${options.deliver}")`
      );
    }
    overrides.delivery = options.deliver;
  }

  return overrides;
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Run the transcribe command.
 *
 * @param source - URL, identifier fragment or local file
 * @param options - Command options
 * @param base - Output helper
 * @param deps - Injected collaborators
 * @returns Exit code
 */
export async function handleTranscribe(
  source: string,
  options: TranscribeOptions,
  base: BaseCommand,
  deps: CliDependencies = {}
): Promise<ExitCode> {
  let overrides: ConfigOverrides;
  try {
    overrides = toOverrides(options);
  } catch (error) {
    base.error(error instanceof Error ? error.message : String(error));
    return EXIT_CODES.USAGE_ERROR;
  }

  const context = resolveContext(deps);

  try {
    const config = applyOverrides(loadCommandConfig(context), overrides, context.cwd);
    base.debug(`Transcripts go to ${config.output.dir}`);

    if (!options.dryRun) {
      const spinner = base.isQuiet() ? null : createSpinner('Checking requirements...').start();
      try {
        await assertRequirements(config, context.locator);
        spinner?.succeed('Requirements met');
      } catch (error) {
        spinner?.fail('Missing requirements');
        throw error;
      }
    }

    const pipeline = createTranscriptionPipeline(config, {
      runner: context.runner,
      logger: base.toLogger(),
      sink: createSink(config, context.runner),
      stdout: context.stdout,
      cwd: context.cwd,
    });
    if (!base.isQuiet()) {
      pipeline.setCallbacks(createStageProgress().callbacks());
    }

    const result = await withInterruptSignal((signal) =>
      pipeline.run(source, { force: options.force, dryRun: options.dryRun, signal })
    );

    if (result.status === 'dry-run') {
      writeOutput(context, formatDryRunCommands(result));
      return EXIT_CODES.SUCCESS;
    }

    if (!base.isQuiet()) {
      base.blank();
      base.info(formatRunSummary(result));
      if (base.isVerbose()) {
        base.blank();
        base.info(formatTimingBreakdown(result.timing));
      }
    }

    if (result.delivery && !result.delivery.ok) {
      throw new DeliveryError(config.delivery.sink, result.delivery.error);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return base.report(error);
  }
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Register the transcribe command as the program's default command.
 *
 * @param program - Commander program instance
 * @param deps - Injected collaborators
 */
export function registerTranscribeCommand(program: Command, deps: CliDependencies = {}): void {
  program
    .command('transcribe <source>', { isDefault: true })
    .description('Transcribe a video URL or local media file')
    .option('-m, --model <path>', 'whisper.cpp model file')
    .option('-l, --language <lang>', 'Spoken language passed to whisper.cpp')
    .option('-t, --threads <n>', 'Threads for whisper.cpp')
    .option('-o, --output-dir <dir>', 'Directory for transcripts')
    .option('-f, --force', 'Transcribe again even if the transcript is current')
    .option('--postprocess', 'Write a cleaned copy of the transcript')
    .option('--no-postprocess', 'Do not write a cleaned copy')
    .option('--deliver <sink>', `Deliver the transcript (${DELIVERY_SINKS.join(', ')})`)
    .option('--silence-removal', 'Drop silent stretches before transcription')
    .option('--no-silence-removal', 'Keep silent stretches')
    .option('--rules <file>', 'Custom cleanup rules (JSON)')
    .option('--dry-run', 'Print the commands that would run without running them')
    .action(async (source: string, options: TranscribeOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      process.exitCode = await handleTranscribe(source, options, base, deps);
    });
}
