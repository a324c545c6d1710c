/**
 * Process Layer
 *
 * Building and running the external program invocations.
 *
 * @module process
 */

export {
  StageFailedError,
  PipelineAbortedError,
  formatCommand,
  formatPipeline,
  type ProcessStage,
  type CommandSpec,
  type PipelineOutput,
  type PipelineRunOptions,
  type CaptureOptions,
  type ProcessRunner,
} from './types.js';

export {
  buildMetadataCommand,
  buildDownloadCommand,
  buildTranscodeCommand,
  buildTranscribeCommand,
  buildSilenceFilter,
  buildLocalPipeline,
  buildRemotePipeline,
} from './commands.js';

export { ExecaProcessRunner, createProcessRunner } from './runner.js';
