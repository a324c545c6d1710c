import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { CollectingStream } from '../../tests/helpers/streams.js';
import { ExecaProcessRunner } from './runner.js';
import { PipelineAbortedError, StageFailedError, type CommandSpec } from './types.js';

function sh(stage: CommandSpec['stage'], script: string): CommandSpec {
  return { stage, file: 'sh', args: ['-c', script] };
}

function cat(stage: CommandSpec['stage']): CommandSpec {
  return { stage, file: 'cat', args: [] };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('ExecaProcessRunner', () => {
  const runner = new ExecaProcessRunner();
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'runner-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('capture', () => {
    it('should return stdout of a successful command', async () => {
      expect(await runner.capture(sh('metadata', 'printf "A Talk\\n20240131\\n"'))).toBe('A Talk\n20240131');
    });

    it('should reject with the stage and exit code', async () => {
      await expect(runner.capture(sh('metadata', 'exit 4'))).rejects.toMatchObject({
        name: 'StageFailedError',
        stage: 'metadata',
        exitCode: 4,
      });
    });
  });

  describe('pipeline', () => {
    it('should tee the last stage to every output', async () => {
      const file = new CollectingStream();
      const terminal = new CollectingStream();

      await runner.pipeline([sh('download', 'printf "hello\\nworld\\n"'), cat('transcode'), cat('transcribe')], {
        outputs: [
          { stream: file, end: true },
          { stream: terminal, end: false },
        ],
      });

      expect(file.text).toBe('hello\nworld\n');
      expect(terminal.text).toBe('hello\nworld\n');
      expect(file.writableEnded).toBe(true);
      expect(terminal.writableEnded).toBe(false);
    });

    it('should report an upstream failure even when later stages exit 0', async () => {
      const error = await runner
        .pipeline([sh('download', 'exit 3'), cat('transcode'), cat('transcribe')], {
          outputs: [{ stream: new CollectingStream(), end: true }],
        })
        .catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(StageFailedError);
      expect(error).toMatchObject({ stage: 'download', exitCode: 3 });
    });

    it('should stop an endless producer when its consumer fails', async () => {
      await expect(
        runner.pipeline([{ stage: 'download', file: 'yes', args: [] }, sh('transcode', 'exit 2')], {
          outputs: [{ stream: new CollectingStream(), end: true }],
        })
      ).rejects.toMatchObject({ name: 'StageFailedError', stage: 'transcode', exitCode: 2 });
    });

    it('should kill the remaining stages after a failure', async () => {
      const marker = path.join(tempDir, 'still-running');

      await expect(
        runner.pipeline([sh('download', `sleep 1 && touch '${marker}'`), sh('transcode', 'exit 1')], {
          outputs: [{ stream: new CollectingStream(), end: true }],
        })
      ).rejects.toThrow(StageFailedError);

      await sleep(1500);
      await expect(fs.access(marker)).rejects.toThrow();
    });

    it('should fail the stage whose executable does not exist', async () => {
      await expect(
        runner.pipeline([{ stage: 'transcribe', file: 'vodscript-no-such-tool', args: [] }], {
          outputs: [{ stream: new CollectingStream(), end: true }],
        })
      ).rejects.toMatchObject({ name: 'StageFailedError', stage: 'transcribe' });
    });

    it('should reject with PipelineAbortedError when aborted', async () => {
      const controller = new AbortController();
      const run = runner.pipeline([sh('download', 'exec sleep 5'), cat('transcribe')], {
        outputs: [{ stream: new CollectingStream(), end: true }],
        signal: controller.signal,
      });

      setTimeout(() => controller.abort(), 100);

      await expect(run).rejects.toThrow(PipelineAbortedError);
    });

    it('should refuse to start after the signal has aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        runner.pipeline([cat('transcribe')], { outputs: [], signal: controller.signal })
      ).rejects.toThrow(PipelineAbortedError);
    });
  });
});
