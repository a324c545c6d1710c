/**
 * Run Summary Formatters
 *
 * CLI output formatters for transcription runs including:
 * - Standard run summary display
 * - Per-stage timing breakdown
 * - Dry-run command listing
 * - Compact one-line status
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import { describeInput } from '../../input/index.js';
import type { PipelineResult } from '../../pipeline/index.js';
import { STAGE_ORDER } from '../../pipeline/index.js';
import { formatCommand, formatPipeline } from '../../process/index.js';
import { formatDuration } from './progress.js';

const STATUS_HEADERS: Record<PipelineResult['status'], string> = {
  completed: '=== Transcript Ready ===',
  cached: '=== Transcript Cached ===',
  'dry-run': '=== Dry Run ===',
};

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format a complete run summary.
 *
 * @param result - Pipeline result
 * @returns Formatted string for terminal output
 *
 * @example
 * ```
 * === Transcript Ready ===
 * Input:      https://www.youtube.com/watch?v=abc123 (abc123)
 * Transcript: /data/ytabc123.txt
 * Cleaned:    /data/ytabc123.clean.txt
 * Delivered:  /data/notes/my-talk-2024.01.31.md
 *
 * Status:   COMPLETED
 * Duration: 2m 34s
 * Stages:   4/4 run
 * ```
 */
export function formatRunSummary(result: PipelineResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold(STATUS_HEADERS[result.status]));
  lines.push(`Input:      ${chalk.cyan(describeInput(result.input))}`);
  lines.push(`Transcript: ${chalk.cyan(result.outputPath)}`);
  if (result.metadata?.title) {
    lines.push(`Title:      ${result.metadata.title}`);
  }
  if (result.cleanedPath) {
    lines.push(`Cleaned:    ${chalk.cyan(result.cleanedPath)}`);
  }
  if (result.delivery) {
    lines.push(
      result.delivery.ok
        ? `Delivered:  ${chalk.cyan(result.delivery.location)}`
        : `Delivery:   ${chalk.red(`FAILED - ${result.delivery.error}`)}`
    );
  }
  lines.push('');

  lines.push(`Status:   ${formatStatus(result)}`);
  lines.push(`Duration: ${formatDuration(result.timing.durationMs)}`);
  lines.push(`Stages:   ${result.stagesExecuted.length}/${STAGE_ORDER.length} run`);

  return lines.join('\n');
}

function formatStatus(result: PipelineResult): string {
  switch (result.status) {
    case 'completed':
      return result.delivery && !result.delivery.ok
        ? chalk.yellow('COMPLETED (delivery failed)')
        : chalk.green('COMPLETED');
    case 'cached':
      return chalk.green(`CACHED (${result.cacheReason})`);
    case 'dry-run':
      return chalk.yellow('DRY RUN');
  }
}

/**
 * Format the commands a dry run would spawn.
 *
 * The metadata lookup runs on its own; the remaining commands form one
 * pipe chain whose output goes to the transcript.
 *
 * @param result - Dry-run result
 * @returns Shell-like listing, one command or chain per block
 */
export function formatDryRunCommands(result: PipelineResult): string {
  const standalone = result.commands.filter((command) => command.stage === 'metadata');
  const chain = result.commands.filter((command) => command.stage !== 'metadata');

  const blocks = standalone.map(formatCommand);
  if (chain.length > 0) {
    blocks.push(`${formatPipeline(chain)} \\\n  > ${result.outputPath}`);
  }
  return blocks.join('\n\n');
}

/**
 * Format per-stage timing breakdown.
 *
 * @param timing - Timing information from pipeline result
 * @returns Formatted timing summary
 */
export function formatTimingBreakdown(timing: PipelineResult['timing']): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Timing Breakdown ==='));
  lines.push('');

  const stages = STAGE_ORDER.flatMap((stage) => {
    const durationMs = timing.perStage[stage];
    return durationMs === undefined ? [] : [{ stage, durationMs }];
  });

  const maxDuration = Math.max(...stages.map((entry) => entry.durationMs), 1);
  const barWidth = 30;

  for (const { stage, durationMs } of stages) {
    const percentage = timing.durationMs > 0 ? Math.round((durationMs / timing.durationMs) * 100) : 0;
    const barLength = Math.round((durationMs / maxDuration) * barWidth);
    const bar = chalk.green('\u2588'.repeat(barLength));

    lines.push(`${stage.padEnd(12)} ${bar} ${formatDuration(durationMs).padStart(8)} (${percentage}%)`);
  }

  lines.push('');
  lines.push(`${'Total'.padEnd(12)} ${' '.repeat(barWidth)} ${formatDuration(timing.durationMs)}`);

  return lines.join('\n');
}
