/**
 * Command Builders
 *
 * Argument lists for yt-dlp, ffmpeg and whisper.cpp. Each builder is a pure
 * function of the configuration so the exact invocations can be asserted
 * in tests and printed by `--dry-run`.
 *
 * @module process/commands
 */

import type { AppConfig, SilenceRemovalConfig } from '../config/index.js';
import { PCM_CHANNELS, PCM_CODEC, PCM_SAMPLE_RATE } from '../config/index.js';
import type { CommandSpec } from './types.js';

/** Read from stdin / write to stdout. */
const STDIO = '-';

function cookieArgs(config: AppConfig): string[] {
  return config.ytdlp.cookiesFromBrowser ? ['--cookies-from-browser', config.ytdlp.cookiesFromBrowser] : [];
}

/**
 * yt-dlp metadata lookup. Prints the title on the first line and the
 * upload date (YYYYMMDD) on the second.
 *
 * @param url - Watch URL
 * @param config - Application configuration
 */
export function buildMetadataCommand(url: string, config: AppConfig): CommandSpec {
  return {
    stage: 'metadata',
    file: config.ytdlp.command,
    args: ['--print', 'title', '--print', 'upload_date', ...cookieArgs(config), '--no-warnings', url],
  };
}

/**
 * yt-dlp best-audio download streamed to stdout.
 *
 * @param url - Watch URL
 * @param config - Application configuration
 */
export function buildDownloadCommand(url: string, config: AppConfig): CommandSpec {
  return {
    stage: 'download',
    file: config.ytdlp.command,
    args: [
      '-f',
      config.ytdlp.audioFormat,
      ...cookieArgs(config),
      '-q',
      '--no-warnings',
      '--no-part',
      '-o',
      STDIO,
      url,
    ],
  };
}

/**
 * ffmpeg `silenceremove` filter expression. Removes every silent stretch
 * longer than the minimum duration, anywhere in the stream.
 */
export function buildSilenceFilter(options: SilenceRemovalConfig): string {
  return (
    `silenceremove=start_periods=1:start_threshold=${options.thresholdDb}dB` +
    `:stop_periods=-1:stop_duration=${options.minDurationSeconds}` +
    `:stop_threshold=${options.thresholdDb}dB`
  );
}

/**
 * ffmpeg resample to 16 kHz mono signed 16-bit PCM WAV on stdout.
 *
 * @param input - Media file path, or undefined to read from stdin
 * @param config - Application configuration
 */
export function buildTranscodeCommand(input: string | undefined, config: AppConfig): CommandSpec {
  const filterArgs = config.ffmpeg.silenceRemoval.enabled
    ? ['-af', buildSilenceFilter(config.ffmpeg.silenceRemoval)]
    : [];

  return {
    stage: 'transcode',
    file: config.ffmpeg.command,
    args: [
      '-hide_banner',
      '-loglevel',
      'error',
      '-i',
      input ?? STDIO,
      ...filterArgs,
      '-ar',
      String(PCM_SAMPLE_RATE),
      '-ac',
      String(PCM_CHANNELS),
      '-c:a',
      PCM_CODEC,
      '-f',
      'wav',
      STDIO,
    ],
  };
}

/**
 * whisper.cpp reading PCM from stdin and printing text to stdout.
 *
 * Flags: `-bs` beam size, `-np` no extra prints, `-fa` flash attention.
 *
 * @param config - Application configuration
 */
export function buildTranscribeCommand(config: AppConfig): CommandSpec {
  const { whisper } = config;
  return {
    stage: 'transcribe',
    file: whisper.executable,
    args: [
      '-bs',
      String(whisper.beamSize),
      '-np',
      '-fa',
      '-m',
      whisper.modelPath,
      '-l',
      whisper.language,
      '-f',
      STDIO,
      '-t',
      String(whisper.threads),
    ],
  };
}

/**
 * Full pipe chain for a local file: transcode → transcribe.
 */
export function buildLocalPipeline(filePath: string, config: AppConfig): CommandSpec[] {
  return [buildTranscodeCommand(filePath, config), buildTranscribeCommand(config)];
}

/**
 * Full pipe chain for a remote video: download → transcode → transcribe.
 */
export function buildRemotePipeline(url: string, config: AppConfig): CommandSpec[] {
  return [
    buildDownloadCommand(url, config),
    buildTranscodeCommand(undefined, config),
    buildTranscribeCommand(config),
  ];
}
