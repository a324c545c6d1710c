/**
 * Configuration Defaults
 *
 * Default values for the transcription engine, transcoder and downloader.
 * Everything here can be overridden through environment variables
 * (see ./index.ts) or CLI flags.
 *
 * @module config/defaults
 */

/**
 * Model file name (without extension) looked up under `<whisper.cpp>/models`.
 *
 * Unless a multilingual model is used, the language setting is ignored by the
 * engine and the audio is transcribed as English.
 */
export const DEFAULT_MODEL_NAME = 'ggml-large-v3-turbo';

/** Engine binary relative to a whisper.cpp checkout. */
export const DEFAULT_WHISPER_BINARY = ['build', 'bin', 'whisper-cli'] as const;

/** Language passed to the engine's `-l` flag. */
export const DEFAULT_LANGUAGE = 'Chinese';

/** Worker threads for the engine. 4 is a good fit for 8-core laptops. */
export const DEFAULT_THREAD_COUNT = 4;

/** Beam search width for the engine. */
export const DEFAULT_BEAM_SIZE = 6;

/** Audio format selector for yt-dlp. */
export const DEFAULT_AUDIO_FORMAT = 'bestaudio[ext=m4a]';

/** Browser to read YouTube cookies from, only on macOS. */
export const DEFAULT_COOKIES_BROWSER_DARWIN = 'safari';

/** Silence removal: threshold and minimum silence length. */
export const DEFAULT_SILENCE_THRESHOLD_DB = -50;
export const DEFAULT_SILENCE_MIN_DURATION = 1;

/** Folder created in the notes application on first delivery. */
export const DEFAULT_NOTES_FOLDER = 'Transcripts';

/** PCM format fed to the engine. */
export const PCM_SAMPLE_RATE = 16000;
export const PCM_CHANNELS = 1;
export const PCM_CODEC = 'pcm_s16le';

/**
 * Check whether a model file can translate / transcribe non-English audio.
 * English-only ggml models carry `.en` in their file name.
 *
 * @param modelPath - Path or file name of the ggml model
 */
export function isMultilingualModel(modelPath: string): boolean {
  const fileName = modelPath.split(/[\\/]/).pop() ?? modelPath;
  return !/\.en([.-]|$)/.test(fileName);
}
