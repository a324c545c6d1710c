/**
 * Command Context
 *
 * Collaborators shared by every command. The defaults talk to the real
 * system; tests pass fakes.
 *
 * @module cli/commands/context
 */

import type { Writable } from 'node:stream';
import { loadConfig, type AppConfig } from '../../config/index.js';
import { createProcessRunner, type ProcessRunner } from '../../process/index.js';
import { createToolLocator, type ToolLocator } from '../../tools/index.js';

/**
 * Injectable dependencies for the CLI.
 */
export interface CliDependencies {
  runner?: ProcessRunner;
  locator?: ToolLocator;
  /** Environment read for configuration (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Platform used for platform-specific defaults (default: process.platform) */
  platform?: NodeJS.Platform;
  /** Primary output: transcript echo, command listings, reports (default: process.stdout) */
  stdout?: Writable;
}

export interface CommandContext {
  runner: ProcessRunner;
  locator: ToolLocator;
  env: NodeJS.ProcessEnv;
  cwd: string;
  platform: NodeJS.Platform;
  stdout: Writable;
}

/**
 * Fill in defaults for everything not injected.
 */
export function resolveContext(deps: CliDependencies = {}): CommandContext {
  return {
    runner: deps.runner ?? createProcessRunner(),
    locator: deps.locator ?? createToolLocator(),
    env: deps.env ?? process.env,
    cwd: deps.cwd ?? process.cwd(),
    platform: deps.platform ?? process.platform,
    stdout: deps.stdout ?? process.stdout,
  };
}

/**
 * Load configuration the way every command sees it.
 *
 * @throws ConfigError when the environment is invalid
 */
export function loadCommandConfig(context: CommandContext): AppConfig {
  return loadConfig(context.env, { cwd: context.cwd, platform: context.platform });
}

/**
 * Write one block of primary output, newline-terminated.
 */
export function writeOutput(context: CommandContext, text: string): void {
  context.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

/**
 * Run work with an AbortSignal that fires on SIGINT or SIGTERM.
 * The handlers are removed once the work settles.
 */
export async function withInterruptSignal<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSignal = (): void => {
    controller.abort();
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  try {
    return await work(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}
