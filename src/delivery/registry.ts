/**
 * Sink selection
 *
 * @module delivery/registry
 */

import type { AppConfig } from '../config/index.js';
import type { ProcessRunner } from '../process/index.js';
import { AppleNotesSink } from './apple-notes-sink.js';
import { FileSink } from './file-sink.js';
import type { DeliverySink } from './types.js';

/**
 * Build the configured sink.
 *
 * @returns The sink, or null when delivery is off
 */
export function createSink(config: AppConfig, runner: ProcessRunner): DeliverySink | null {
  switch (config.delivery.sink) {
    case 'none':
      return null;
    case 'file':
      return new FileSink(config.delivery.dir);
    case 'apple-notes':
      return new AppleNotesSink(runner, config.delivery.notesFolder, config.delivery.osascriptCommand);
  }
}
