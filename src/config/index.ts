/**
 * Configuration Module
 *
 * Loads and validates environment variables for the transcription driver.
 * Uses Zod for runtime validation with sensible defaults. The configuration
 * is read once at startup and handed to every component as a plain object.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import * as path from 'node:path';
import {
  DEFAULT_AUDIO_FORMAT,
  DEFAULT_BEAM_SIZE,
  DEFAULT_COOKIES_BROWSER_DARWIN,
  DEFAULT_LANGUAGE,
  DEFAULT_MODEL_NAME,
  DEFAULT_NOTES_FOLDER,
  DEFAULT_SILENCE_MIN_DURATION,
  DEFAULT_SILENCE_THRESHOLD_DB,
  DEFAULT_THREAD_COUNT,
  DEFAULT_WHISPER_BINARY,
} from './defaults.js';

// ============================================================================
// Types
// ============================================================================

export const CACHE_MODES = ['presence', 'fingerprint'] as const;
export type CacheMode = (typeof CACHE_MODES)[number];

export const DELIVERY_SINKS = ['none', 'file', 'apple-notes'] as const;
export type DeliverySinkName = (typeof DELIVERY_SINKS)[number];

export interface WhisperConfig {
  /** Engine executable (whisper-cli) */
  executable: string;
  /** ggml model file */
  modelPath: string;
  /** Value for `-l` */
  language: string;
  /** Value for `-t` */
  threads: number;
  /** Value for `-bs` */
  beamSize: number;
}

export interface SilenceRemovalConfig {
  enabled: boolean;
  thresholdDb: number;
  minDurationSeconds: number;
}

export interface AppConfig {
  whisper: WhisperConfig;
  ffmpeg: {
    command: string;
    silenceRemoval: SilenceRemovalConfig;
  };
  ytdlp: {
    command: string;
    /** Browser for --cookies-from-browser, null to disable */
    cookiesFromBrowser: string | null;
    audioFormat: string;
  };
  output: {
    dir: string;
    cacheMode: CacheMode;
  };
  postprocess: {
    enabled: boolean;
    /** Custom rules file, null for the bundled rules */
    rulesPath: string | null;
  };
  delivery: {
    sink: DeliverySinkName;
    dir: string;
    /** False when dir was derived from the transcript directory */
    dirIsExplicit: boolean;
    notesFolder: string;
    osascriptCommand: string;
  };
}

/**
 * Per-run overrides coming from CLI flags.
 */
export interface ConfigOverrides {
  modelPath?: string;
  language?: string;
  threads?: number;
  outputDir?: string;
  silenceRemoval?: boolean;
  postprocess?: boolean;
  delivery?: DeliverySinkName;
  rulesPath?: string;
}

/**
 * Error raised when environment variables fail validation.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Environment Schema
// ============================================================================

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const optionalPositiveInt = z.preprocess(
  emptyToUndefined,
  z.coerce.number().int().positive().optional()
);

const optionalNumber = z.preprocess(emptyToUndefined, z.coerce.number().finite().optional());

const optionalBoolean = z.preprocess(
  emptyToUndefined,
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
    .optional()
);

const envSchema = z.object({
  WHISPER_CPP_DIR: optionalString,
  MODEL_PATH: optionalString,
  WHISPER_EXECUTABLE: optionalString,
  WHISPER_LANG: optionalString,
  WHISPER_THREAD_COUNT: optionalPositiveInt,
  WHISPER_BEAM_SIZE: optionalPositiveInt,

  FFMPEG_CMD: optionalString,
  YTDLP_CMD: optionalString,
  // An empty value is meaningful here: it turns cookies off
  YTDLP_COOKIES_BROWSER: z.string().optional(),
  YTDLP_AUDIO_FORMAT: optionalString,

  SILENCE_REMOVAL: optionalBoolean,
  SILENCE_THRESHOLD_DB: optionalNumber.refine(
    (value) => value === undefined || value <= 0,
    'must be zero or negative (dB)'
  ),
  SILENCE_MIN_DURATION: optionalNumber.refine(
    (value) => value === undefined || value > 0,
    'must be greater than zero (seconds)'
  ),

  TRANSCRIPT_DIR: optionalString,
  CACHE_MODE: z.preprocess(emptyToUndefined, z.enum(CACHE_MODES).optional()),

  POSTPROCESS: optionalBoolean,
  CLEANUP_RULES: optionalString,
  DELIVERY: z.preprocess(emptyToUndefined, z.enum(DELIVERY_SINKS).optional()),
  DELIVERY_DIR: optionalString,
  NOTES_FOLDER: optionalString,
  OSASCRIPT_CMD: optionalString,
});

type Env = z.infer<typeof envSchema>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Options controlling how relative defaults are resolved.
 */
export interface LoadConfigOptions {
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Platform used for platform-specific defaults (default: process.platform) */
  platform?: NodeJS.Platform;
}

/**
 * Load and validate configuration from environment variables.
 *
 * @param env - Environment to read (default: process.env)
 * @param options - Resolution options
 * @returns Validated configuration
 * @throws ConfigError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * console.log(config.whisper.modelPath);
 * ```
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const platform = options.platform ?? process.platform;

  const parseResult = envSchema.safeParse(env);
  if (!parseResult.success) {
    throw new ConfigError(
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed: Env = parseResult.data;
  const resolve = (value: string): string => path.resolve(cwd, value);

  const whisperCppDir = resolve(parsed.WHISPER_CPP_DIR ?? '.');
  const outputDir = resolve(parsed.TRANSCRIPT_DIR ?? '.');

  let cookiesFromBrowser: string | null;
  if (parsed.YTDLP_COOKIES_BROWSER === undefined) {
    cookiesFromBrowser = platform === 'darwin' ? DEFAULT_COOKIES_BROWSER_DARWIN : null;
  } else {
    cookiesFromBrowser = parsed.YTDLP_COOKIES_BROWSER.trim() || null;
  }

  return {
    whisper: {
      executable: parsed.WHISPER_EXECUTABLE
        ? resolveCommand(parsed.WHISPER_EXECUTABLE, cwd)
        : path.join(whisperCppDir, ...DEFAULT_WHISPER_BINARY),
      modelPath: parsed.MODEL_PATH
        ? resolve(parsed.MODEL_PATH)
        : path.join(whisperCppDir, 'models', `${DEFAULT_MODEL_NAME}.bin`),
      language: parsed.WHISPER_LANG ?? DEFAULT_LANGUAGE,
      threads: parsed.WHISPER_THREAD_COUNT ?? DEFAULT_THREAD_COUNT,
      beamSize: parsed.WHISPER_BEAM_SIZE ?? DEFAULT_BEAM_SIZE,
    },
    ffmpeg: {
      command: parsed.FFMPEG_CMD ? resolveCommand(parsed.FFMPEG_CMD, cwd) : 'ffmpeg',
      silenceRemoval: {
        enabled: parsed.SILENCE_REMOVAL ?? false,
        thresholdDb: parsed.SILENCE_THRESHOLD_DB ?? DEFAULT_SILENCE_THRESHOLD_DB,
        minDurationSeconds: parsed.SILENCE_MIN_DURATION ?? DEFAULT_SILENCE_MIN_DURATION,
      },
    },
    ytdlp: {
      command: parsed.YTDLP_CMD ? resolveCommand(parsed.YTDLP_CMD, cwd) : 'yt-dlp',
      cookiesFromBrowser,
      audioFormat: parsed.YTDLP_AUDIO_FORMAT ?? DEFAULT_AUDIO_FORMAT,
    },
    output: {
      dir: outputDir,
      cacheMode: parsed.CACHE_MODE ?? 'fingerprint',
    },
    postprocess: {
      enabled: parsed.POSTPROCESS ?? false,
      rulesPath: parsed.CLEANUP_RULES ? resolve(parsed.CLEANUP_RULES) : null,
    },
    delivery: {
      sink: parsed.DELIVERY ?? 'none',
      dir: parsed.DELIVERY_DIR ? resolve(parsed.DELIVERY_DIR) : path.join(outputDir, 'notes'),
      dirIsExplicit: Boolean(parsed.DELIVERY_DIR),
      notesFolder: parsed.NOTES_FOLDER ?? DEFAULT_NOTES_FOLDER,
      osascriptCommand: parsed.OSASCRIPT_CMD ? resolveCommand(parsed.OSASCRIPT_CMD, cwd) : 'osascript',
    },
  };
}

/**
 * Bare command names stay as-is so they are looked up on PATH;
 * anything containing a path separator is resolved against cwd.
 */
function resolveCommand(command: string, cwd: string): string {
  return command.includes('/') || command.includes('\\') ? path.resolve(cwd, command) : command;
}

/**
 * Apply per-run CLI overrides on top of a loaded configuration.
 *
 * @param config - Base configuration
 * @param overrides - Values from CLI flags; undefined entries are ignored
 * @param cwd - Base directory for relative paths
 * @returns New configuration object (the input is not mutated)
 */
export function applyOverrides(
  config: AppConfig,
  overrides: ConfigOverrides,
  cwd: string = process.cwd()
): AppConfig {
  if (overrides.threads !== undefined && (!Number.isInteger(overrides.threads) || overrides.threads < 1)) {
    throw new ConfigError([`threads: must be a positive integer (got ${overrides.threads})`]);
  }

  const outputDir = overrides.outputDir ? path.resolve(cwd, overrides.outputDir) : config.output.dir;

  return {
    ...config,
    whisper: {
      ...config.whisper,
      modelPath: overrides.modelPath ? path.resolve(cwd, overrides.modelPath) : config.whisper.modelPath,
      language: overrides.language ?? config.whisper.language,
      threads: overrides.threads ?? config.whisper.threads,
    },
    ffmpeg: {
      ...config.ffmpeg,
      silenceRemoval: {
        ...config.ffmpeg.silenceRemoval,
        enabled: overrides.silenceRemoval ?? config.ffmpeg.silenceRemoval.enabled,
      },
    },
    output: { ...config.output, dir: outputDir },
    postprocess: {
      enabled: overrides.postprocess ?? config.postprocess.enabled,
      rulesPath: overrides.rulesPath ? path.resolve(cwd, overrides.rulesPath) : config.postprocess.rulesPath,
    },
    delivery: {
      ...config.delivery,
      sink: overrides.delivery ?? config.delivery.sink,
      dir: config.delivery.dirIsExplicit ? config.delivery.dir : path.join(outputDir, 'notes'),
    },
  };
}

/**
 * Check whether a string names a known delivery sink.
 */
export function isDeliverySinkName(value: string): value is DeliverySinkName {
  return DELIVERY_SINKS.some((sink) => sink === value);
}

export * from './defaults.js';
