/**
 * Input Resolution
 *
 * @module input
 */

export {
  resolveInput,
  stripExtension,
  transcriptFileName,
  deriveOutputPath,
  describeInput,
  type LocalInput,
  type RemoteInput,
  type ResolvedInput,
  type ResolveOptions,
} from './resolver.js';

export {
  extractVideoId,
  parseVideoId,
  isValidVideoId,
  buildWatchUrl,
  InputError,
} from './video-id.js';
