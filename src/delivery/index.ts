/**
 * Transcript Delivery
 *
 * @module delivery
 */

export type { DeliverySink, DeliveryResult, NoteInput, DeliverOptions } from './types.js';
export { DeliveryError } from './types.js';
export { FileSink, slugify } from './file-sink.js';
export { AppleNotesSink, renderNoteHtml, buildNoteScriptArgs } from './apple-notes-sink.js';
export { createSink } from './registry.js';
