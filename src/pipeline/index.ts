/**
 * Transcription Pipeline
 *
 * @module pipeline
 */

export {
  STAGE_ORDER,
  type StageName,
  type Logger,
  type PipelineDependencies,
  type RunOptions,
  type PipelineCallbacks,
  type VideoMetadata,
  type PipelineTiming,
  type PipelineStatus,
  type PipelineResult,
} from './types.js';

export {
  TranscriptionPipeline,
  createTranscriptionPipeline,
  parseMetadata,
  cleanedTranscriptPath,
} from './executor.js';
