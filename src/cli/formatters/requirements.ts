/**
 * Requirement Report Formatters
 *
 * @module cli/formatters/requirements
 */

import chalk from 'chalk';
import type { RequirementReport, RequiredTool } from '../../tools/index.js';

/**
 * Format the outcome of a requirement check, one tool per line.
 *
 * @example
 * ```
 * [+] ffmpeg       /usr/bin/ffmpeg
 * [X] yt-dlp       not found (yt-dlp)
 * [+] whisper.cpp  /opt/whisper.cpp/build/bin/whisper-cli
 * ```
 */
export function formatRequirementReport(report: RequirementReport): string {
  const rows = [
    ...report.found.map((entry) => ({
      tool: entry.tool,
      line: chalk.green(`[+] ${entry.tool.name.padEnd(12)} ${entry.path}`),
    })),
    ...report.missing.map((tool) => ({
      tool,
      line: chalk.red(`[X] ${tool.name.padEnd(12)} not found (${tool.command})`),
    })),
  ];
  const order: RequiredTool['id'][] = ['ffmpeg', 'yt-dlp', 'whisper'];
  rows.sort((a, b) => order.indexOf(a.tool.id) - order.indexOf(b.tool.id));
  return rows.map((row) => row.line).join('\n');
}

/**
 * Remediation text for every missing tool.
 */
export function formatMissingTools(tools: RequiredTool[]): string {
  return tools.flatMap((tool) => tool.remediation).join('\n');
}
