/**
 * Input Resolver
 *
 * Decides whether the positional argument is a local media file or a
 * remote video reference, and derives the transcript file name from it.
 *
 * @module input/resolver
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { buildWatchUrl, InputError, parseVideoId } from './video-id.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A local media file given by path.
 */
export interface LocalInput {
  kind: 'local';
  /** Absolute path to the media file */
  path: string;
  /** File name with its last extension removed */
  baseName: string;
}

/**
 * A remote video given by URL or identifier fragment.
 */
export interface RemoteInput {
  kind: 'remote';
  videoId: string;
  /** Canonical watch URL built from the identifier */
  url: string;
}

export type ResolvedInput = LocalInput | RemoteInput;

export interface ResolveOptions {
  /** Base directory for relative file paths (default: process.cwd()) */
  cwd?: string;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve the positional argument into an input reference.
 *
 * An argument naming an existing regular file is local; anything else is
 * treated as a remote reference.
 *
 * @param source - Positional argument (URL or file path)
 * @param options - Resolution options
 * @returns The resolved input
 * @throws InputError if the argument is empty or the identifier is unusable
 */
export async function resolveInput(
  source: string,
  options: ResolveOptions = {}
): Promise<ResolvedInput> {
  if (source.trim().length === 0) {
    throw new InputError('A URL or file path is required', source);
  }

  const absolute = path.resolve(options.cwd ?? process.cwd(), source);
  if (await isRegularFile(absolute)) {
    return {
      kind: 'local',
      path: absolute,
      baseName: stripExtension(path.basename(absolute)),
    };
  }

  const videoId = parseVideoId(source);
  return {
    kind: 'remote',
    videoId,
    url: buildWatchUrl(videoId),
  };
}

/**
 * Remove the last extension from a file name.
 *
 * Dotfiles without a further extension keep their name.
 *
 * @example
 * ```typescript
 * stripExtension('talk.final.mp4'); // 'talk.final'
 * stripExtension('.bashrc');        // '.bashrc'
 * ```
 */
export function stripExtension(fileName: string): string {
  return path.parse(fileName).name;
}

/**
 * Transcript file name for an input (without directory).
 */
export function transcriptFileName(input: ResolvedInput): string {
  return input.kind === 'local' ? `${input.baseName}.txt` : `yt${input.videoId}.txt`;
}

/**
 * Absolute transcript path for an input.
 *
 * @param input - Resolved input
 * @param outputDir - Directory transcripts are written to
 */
export function deriveOutputPath(input: ResolvedInput, outputDir: string): string {
  return path.join(outputDir, transcriptFileName(input));
}

/**
 * Short human-readable description of the input for logs.
 */
export function describeInput(input: ResolvedInput): string {
  return input.kind === 'local' ? input.path : `${input.url} (${input.videoId})`;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
