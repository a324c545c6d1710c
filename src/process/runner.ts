/**
 * Execa Process Runner
 *
 * Runs pipeline stages as child processes. Stages are connected with
 * Node stream pipes, so a slow consumer applies backpressure to its
 * producer exactly as an OS pipe would. stderr of every stage is inherited
 * so tool diagnostics reach the terminal unchanged.
 *
 * @module process/runner
 */

import execa from 'execa';
import { finished } from 'node:stream/promises';
import {
  PipelineAbortedError,
  StageFailedError,
  formatCommand,
  type CaptureOptions,
  type CommandSpec,
  type PipelineRunOptions,
  type ProcessRunner,
} from './types.js';

type Child = execa.ExecaChildProcess<string>;
type ChildResult = execa.ExecaReturnValue<string>;

function exitCodeOf(result: ChildResult): number | null {
  return typeof result.exitCode === 'number' ? result.exitCode : null;
}

function isBrokenPipe(error: Error): boolean {
  return (error as NodeJS.ErrnoException).code === 'EPIPE';
}

/**
 * {@link ProcessRunner} backed by execa.
 *
 * @example
 * ```typescript
 * const runner = new ExecaProcessRunner();
 * await runner.pipeline(buildLocalPipeline('talk.mp4', config), {
 *   outputs: [{ stream: fs.createWriteStream('talk.txt'), end: true }],
 * });
 * ```
 */
export class ExecaProcessRunner implements ProcessRunner {
  async capture(command: CommandSpec, options: CaptureOptions = {}): Promise<string> {
    const child = execa(command.file, command.args, {
      stdin: 'ignore',
      stderr: 'pipe',
      reject: false,
    });

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await child;
      if (options.signal?.aborted) {
        throw new PipelineAbortedError();
      }
      if (result.failed || result.exitCode !== 0) {
        throw new StageFailedError(
          command.stage,
          exitCodeOf(result),
          formatCommand(command),
          result.stderr.trim() || undefined
        );
      }
      return result.stdout;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  async pipeline(commands: CommandSpec[], options: PipelineRunOptions): Promise<void> {
    if (commands.length === 0) {
      throw new Error('Pipeline needs at least one command');
    }
    if (options.signal?.aborted) {
      throw new PipelineAbortedError();
    }

    const children: Child[] = commands.map((command, index) =>
      execa(command.file, command.args, {
        stdin: index === 0 ? 'ignore' : 'pipe',
        stdout: 'pipe',
        stderr: 'inherit',
        buffer: false,
        reject: false,
      })
    );

    let stopping = false;
    const killAll = (): void => {
      stopping = true;
      for (const child of children) {
        if (child.exitCode === null) {
          child.kill('SIGTERM');
        }
      }
    };

    const streamErrors: Error[] = [];
    const recordStreamError = (error: Error): void => {
      // A downstream stage that exits early closes its stdin; the exit code
      // of that stage is what gets reported.
      if (!isBrokenPipe(error)) {
        streamErrors.push(error);
      }
    };

    for (let i = 0; i < children.length - 1; i++) {
      const from = children[i].stdout;
      const to = children[i + 1].stdin;
      if (!from || !to) {
        killAll();
        throw new Error(`Could not connect ${commands[i].stage} to ${commands[i + 1].stage}`);
      }
      to.on('error', recordStreamError);
      from.pipe(to);
    }

    const last = children[children.length - 1].stdout;
    if (!last) {
      killAll();
      throw new Error(`No output stream for ${commands[commands.length - 1].stage}`);
    }
    for (const output of options.outputs) {
      output.stream.on('error', recordStreamError);
      last.pipe(output.stream, { end: output.end });
    }

    const onAbort = (): void => killAll();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await Promise.all(
        children.map(async (child, index) => {
          const result = await child;
          if (options.signal?.aborted) {
            throw new PipelineAbortedError();
          }
          if (result.failed || result.exitCode !== 0) {
            const alreadyStopping = stopping;
            killAll();
            throw new StageFailedError(
              commands[index].stage,
              exitCodeOf(result),
              formatCommand(commands[index]),
              alreadyStopping ? 'terminated after an earlier stage failed' : undefined
            );
          }
        })
      );

      await Promise.all(
        options.outputs.filter((output) => output.end).map((output) => finished(output.stream))
      );
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }

    if (streamErrors.length > 0) {
      throw streamErrors[0];
    }
  }
}

/**
 * Create the default process runner.
 */
export function createProcessRunner(): ProcessRunner {
  return new ExecaProcessRunner();
}
