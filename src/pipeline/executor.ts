/**
 * Transcription Pipeline
 *
 * Runs one input through the whole flow:
 * 1. Resolve the input and its transcript path
 * 2. Skip everything when a usable transcript already exists
 * 3. Look up title and upload date (remote only)
 * 4. Run the download → transcode → transcribe process chain
 * 5. Write the sidecar record
 * 6. Optionally clean the transcript and deliver it
 *
 * The transcript is written to `<transcript>.part` and renamed into place
 * only once every stage exited successfully.
 *
 * @module pipeline/executor
 */

import { createWriteStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isMultilingualModel, type AppConfig } from '../config/index.js';
import type { DeliverySink } from '../delivery/index.js';
import { deriveOutputPath, describeInput, resolveInput, type ResolvedInput } from '../input/index.js';
import {
  buildHeading,
  cleanTranscript,
  formatLocalDate,
  formatUploadDate,
  loadCleanupRules,
} from '../postprocess/index.js';
import {
  PipelineAbortedError,
  buildLocalPipeline,
  buildMetadataCommand,
  buildRemotePipeline,
  formatPipeline,
  type CommandSpec,
  type PipelineOutput,
  type ProcessRunner,
} from '../process/index.js';
import type { RecordInput } from '../schemas/index.js';
import { atomicWriteText } from '../storage/atomic.js';
import {
  checkCache,
  computeFingerprint,
  describeRecordInput,
  selectTranscriptionSettings,
  writeRecord,
} from '../storage/cache.js';
import {
  STAGE_ORDER,
  type Logger,
  type PipelineCallbacks,
  type PipelineDependencies,
  type PipelineResult,
  type PipelineStatus,
  type RunOptions,
  type StageName,
  type VideoMetadata,
} from './types.js';

const SILENT_LOGGER: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Parse `yt-dlp --print title --print upload_date` output.
 *
 * yt-dlp prints `NA` for fields it does not know, so only an 8-digit
 * date is kept.
 */
export function parseMetadata(output: string): VideoMetadata {
  const [title = '', uploadDate = ''] = output.split(/\r?\n/).map((line) => line.trim());
  const metadata: VideoMetadata = { title };
  if (/^\d{8}$/.test(uploadDate)) {
    metadata.uploadDate = uploadDate;
  }
  return metadata;
}

/**
 * Path of the cleaned transcript beside the raw one.
 *
 * @example
 * ```typescript
 * cleanedTranscriptPath('/out/talk.txt'); // '/out/talk.clean.txt'
 * ```
 */
export function cleanedTranscriptPath(transcriptPath: string): string {
  const parsed = path.parse(transcriptPath);
  return path.join(parsed.dir, `${parsed.name}.clean.txt`);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PipelineAbortedError();
  }
}

/**
 * Tracks what ran and how long it took.
 */
class RunTracker {
  readonly executed: StageName[] = [];
  readonly skipped: StageName[] = [];
  readonly perStage: Partial<Record<StageName, number>> = {};
  readonly startedAt = new Date().toISOString();
  private readonly startMs = Date.now();

  constructor(private readonly callbacks: PipelineCallbacks) {}

  async stage<T>(stage: StageName, work: () => Promise<T>): Promise<T> {
    const stageStart = Date.now();
    this.callbacks.onStageStart?.(stage);
    try {
      const result = await work();
      this.perStage[stage] = Date.now() - stageStart;
      this.executed.push(stage);
      this.callbacks.onStageComplete?.(stage, this.perStage[stage] ?? 0);
      return result;
    } catch (error) {
      this.perStage[stage] = Date.now() - stageStart;
      this.callbacks.onStageError?.(stage, error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  skip(stage: StageName, reason: string): void {
    this.skipped.push(stage);
    this.callbacks.onStageSkip?.(stage, reason);
  }

  timing(): PipelineResult['timing'] {
    return {
      startedAt: this.startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - this.startMs,
      perStage: this.perStage,
    };
  }
}

/**
 * Transcription pipeline for a single input.
 *
 * @example
 * ```typescript
 * const pipeline = new TranscriptionPipeline(config, { runner: createProcessRunner() });
 * pipeline.setCallbacks({ onStageStart: (stage) => console.error(`> ${stage}`) });
 *
 * const result = await pipeline.run('https://www.youtube.com/watch?v=abc123');
 * console.error(result.status, result.outputPath);
 * ```
 */
export class TranscriptionPipeline {
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly sink: DeliverySink | null;
  private readonly stdout: PipelineOutput['stream'] | null;
  private readonly cwd: string;
  private callbacks: PipelineCallbacks = {};

  constructor(
    private readonly config: AppConfig,
    dependencies: PipelineDependencies
  ) {
    this.runner = dependencies.runner;
    this.logger = dependencies.logger ?? SILENT_LOGGER;
    this.sink = dependencies.sink ?? null;
    this.stdout = dependencies.stdout === undefined ? process.stdout : dependencies.stdout;
    this.cwd = dependencies.cwd ?? process.cwd();
  }

  /**
   * Set event callbacks for stage lifecycle.
   */
  setCallbacks(callbacks: PipelineCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * Transcribe one source.
   *
   * @param source - Local file path, URL or identifier fragment
   * @param options - Run options
   * @returns What happened
   * @throws InputError for an unusable source
   * @throws StageFailedError when a subprocess fails
   * @throws PipelineAbortedError when the signal aborts
   */
  async run(source: string, options: RunOptions = {}): Promise<PipelineResult> {
    const tracker = new RunTracker(this.callbacks);
    const { signal } = options;

    const input = await resolveInput(source, { cwd: this.cwd });
    const outputPath = deriveOutputPath(input, this.config.output.dir);
    this.logger.debug(`Input: ${describeInput(input)}`);
    this.logger.debug(`Transcript: ${outputPath}`);
    this.warnOnEnglishOnlyModel();

    const settings = selectTranscriptionSettings(this.config);
    let identity: Promise<{ input: RecordInput; fingerprint: string }> | undefined;
    const getIdentity = (): Promise<{ input: RecordInput; fingerprint: string }> => {
      identity ??= describeRecordInput(input).then((recordInput) => ({
        input: recordInput,
        fingerprint: computeFingerprint(recordInput, settings),
      }));
      return identity;
    };

    const decision = await checkCache(outputPath, {
      mode: this.config.output.cacheMode,
      force: options.force,
      fingerprint: async () => (await getIdentity()).fingerprint,
    });
    this.logger.debug(`Cache check: ${decision.reason}`);

    const finish = (status: PipelineStatus, extra: Partial<PipelineResult> = {}): PipelineResult => ({
      status,
      input,
      outputPath,
      cacheReason: decision.reason,
      stagesExecuted: tracker.executed,
      stagesSkipped: tracker.skipped,
      commands: [],
      ...extra,
      timing: tracker.timing(),
    });

    if (decision.skip) {
      this.logger.info(`Transcript already exists: ${outputPath}`);
      for (const stage of STAGE_ORDER) {
        tracker.skip(stage, 'cached');
      }
      return finish('cached');
    }

    const metadataCommand = input.kind === 'remote' ? buildMetadataCommand(input.url, this.config) : null;
    const chain =
      input.kind === 'local'
        ? buildLocalPipeline(input.path, this.config)
        : buildRemotePipeline(input.url, this.config);

    if (options.dryRun) {
      const commands = metadataCommand ? [metadataCommand, ...chain] : chain;
      for (const stage of STAGE_ORDER) {
        tracker.skip(stage, 'dry run');
      }
      return finish('dry-run', { commands });
    }

    const commands: CommandSpec[] = [];

    // 3. Metadata
    let metadata: VideoMetadata | undefined;
    if (metadataCommand) {
      throwIfAborted(signal);
      metadata = await tracker.stage('metadata', async () => {
        commands.push(metadataCommand);
        return parseMetadata(await this.runner.capture(metadataCommand, { signal }));
      });
      this.logger.debug(`Title: ${metadata.title || '(none)'}`);
    } else {
      tracker.skip('metadata', 'local input');
    }

    // 4. Process chain
    throwIfAborted(signal);
    await tracker.stage('transcribe', async () => {
      commands.push(...chain);
      this.logger.debug(`Running:\n  ${formatPipeline(chain)}`);
      await this.runChain(chain, outputPath, signal);
    });
    const transcript = await fs.readFile(outputPath, 'utf-8');

    // 5. Record
    const { input: recordInput, fingerprint } = await getIdentity();
    await writeRecord(outputPath, {
      input: recordInput,
      settings,
      fingerprint,
      transcript,
      title: metadata?.title || undefined,
      uploadDate: metadata?.uploadDate,
    });

    // 6. Post-processing and delivery
    let cleanedPath: string | undefined;
    let body = transcript.trim();
    if (this.config.postprocess.enabled) {
      throwIfAborted(signal);
      const cleanedFile = cleanedTranscriptPath(outputPath);
      body = await tracker.stage('postprocess', async () => {
        const rules = await loadCleanupRules(this.config.postprocess.rulesPath);
        const cleaned = cleanTranscript(transcript, rules);
        await atomicWriteText(cleanedFile, `${cleaned}\n`);
        return cleaned;
      });
      cleanedPath = cleanedFile;
      this.logger.debug(`Cleaned transcript: ${cleanedFile}`);
    } else {
      tracker.skip('postprocess', 'disabled');
    }

    const sink = this.sink;
    let delivery: PipelineResult['delivery'];
    if (sink) {
      throwIfAborted(signal);
      const title = await this.buildNoteTitle(input, metadata);
      delivery = await tracker.stage('deliver', () => sink.deliver({ title, body }, { signal }));
      if (delivery.ok) {
        this.logger.info(`Delivered to ${delivery.location}`);
      } else {
        this.logger.error(`Delivery to ${sink.name} failed: ${delivery.error}`);
      }
    } else {
      tracker.skip('deliver', 'no sink');
    }

    return finish('completed', { metadata, cleanedPath, delivery, commands });
  }

  /**
   * Run the process chain, writing to a part file that replaces the
   * transcript only on success.
   */
  private async runChain(chain: CommandSpec[], outputPath: string, signal?: AbortSignal): Promise<void> {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    const partPath = `${outputPath}.part`;
    const file = createWriteStream(partPath);

    const outputs: PipelineOutput[] = [{ stream: file, end: true }];
    if (this.stdout) {
      outputs.push({ stream: this.stdout, end: false });
    }

    try {
      await this.runner.pipeline(chain, { outputs, signal });
    } catch (error) {
      file.destroy();
      await fs.rm(partPath, { force: true });
      throw error;
    }

    await fs.rename(partPath, outputPath);
  }

  /**
   * Heading for a delivered note. Remote inputs use the video title and
   * upload date; local files use their name and modification date.
   */
  private async buildNoteTitle(input: ResolvedInput, metadata: VideoMetadata | undefined): Promise<string> {
    if (input.kind === 'remote') {
      const date = metadata?.uploadDate ? formatUploadDate(metadata.uploadDate) : null;
      return buildHeading(metadata?.title || `yt${input.videoId}`, date);
    }
    const stat = await fs.stat(input.path);
    return buildHeading(input.baseName, formatLocalDate(stat.mtime));
  }

  private warnOnEnglishOnlyModel(): void {
    const { modelPath, language } = this.config.whisper;
    if (!isMultilingualModel(modelPath) && !/^(en|english)$/i.test(language)) {
      this.logger.warn(
        `${path.basename(modelPath)} is an English-only model; language "${language}" will be ignored`
      );
    }
  }
}

/**
 * Create a new TranscriptionPipeline instance.
 */
export function createTranscriptionPipeline(
  config: AppConfig,
  dependencies: PipelineDependencies
): TranscriptionPipeline {
  return new TranscriptionPipeline(config, dependencies);
}
