/**
 * Requirement Checker
 *
 * Verifies that the downloader, transcoder and transcription engine are
 * available before any work starts. Missing tools are reported together,
 * each with a pointer to where it can be installed.
 *
 * @module tools/requirements
 */

import type { AppConfig } from '../config/index.js';
import type { ToolLocator } from './locator.js';

// ============================================================================
// Types
// ============================================================================

export type ToolId = 'ffmpeg' | 'yt-dlp' | 'whisper';

/**
 * An external program the driver depends on.
 */
export interface RequiredTool {
  id: ToolId;
  /** Display name */
  name: string;
  /** Configured command (bare name or path) */
  command: string;
  /** Lines printed when the tool is missing */
  remediation: string[];
}

export interface FoundTool {
  tool: RequiredTool;
  /** Resolved absolute path */
  path: string;
}

export interface RequirementReport {
  found: FoundTool[];
  missing: RequiredTool[];
  ok: boolean;
}

/**
 * One or more required tools are not installed.
 */
export class MissingDependencyError extends Error {
  constructor(public readonly tools: RequiredTool[]) {
    super(`Missing required tools: ${tools.map((tool) => tool.name).join(', ')}`);
    this.name = 'MissingDependencyError';
  }
}

// ============================================================================
// Tool Definitions
// ============================================================================

/**
 * The three tools, in the order they are checked.
 *
 * @param config - Application configuration (supplies the commands)
 */
export function getRequiredTools(config: AppConfig): RequiredTool[] {
  return [
    {
      id: 'ffmpeg',
      name: 'ffmpeg',
      command: config.ffmpeg.command,
      remediation: ['ffmpeg is required: https://ffmpeg.org'],
    },
    {
      id: 'yt-dlp',
      name: 'yt-dlp',
      command: config.ytdlp.command,
      remediation: ['yt-dlp is required: https://github.com/yt-dlp/yt-dlp'],
    },
    {
      id: 'whisper',
      name: 'whisper.cpp',
      command: config.whisper.executable,
      remediation: [
        'The C++ implementation of Whisper is required: https://github.com/ggerganov/whisper.cpp',
        `Expected the engine at: ${config.whisper.executable}`,
        'Sample usage:',
        '',
        '  git clone https://github.com/ggerganov/whisper.cpp',
        '  cd whisper.cpp',
        '  cmake -B build && cmake --build build -j --config Release',
        '  WHISPER_CPP_DIR=$PWD vodscript https://www.youtube.com/watch?v=1234567890',
        '',
      ],
    },
  ];
}

// ============================================================================
// Checking
// ============================================================================

/**
 * Resolve every required tool.
 *
 * @param config - Application configuration
 * @param locator - How executables are found
 * @returns Report of found and missing tools
 */
export async function checkRequirements(
  config: AppConfig,
  locator: ToolLocator
): Promise<RequirementReport> {
  const found: FoundTool[] = [];
  const missing: RequiredTool[] = [];

  for (const tool of getRequiredTools(config)) {
    const resolved = await locator.locate(tool.command);
    if (resolved) {
      found.push({ tool, path: resolved });
    } else {
      missing.push(tool);
    }
  }

  return { found, missing, ok: missing.length === 0 };
}

/**
 * Like {@link checkRequirements} but throws when anything is missing.
 *
 * @throws MissingDependencyError carrying every missing tool
 */
export async function assertRequirements(
  config: AppConfig,
  locator: ToolLocator
): Promise<RequirementReport> {
  const report = await checkRequirements(config, locator);
  if (!report.ok) {
    throw new MissingDependencyError(report.missing);
  }
  return report;
}
