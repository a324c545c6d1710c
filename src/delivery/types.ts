/**
 * Delivery Type Definitions
 *
 * @module delivery/types
 */

import type { DeliverySinkName } from '../config/index.js';

/**
 * A cleaned transcript ready to hand off.
 */
export interface NoteInput {
  /** Heading, e.g. `Weekly sync (2024.01.31)` */
  title: string;
  /** Cleaned transcript text */
  body: string;
}

export type DeliveryResult =
  | { ok: true; location: string }
  | { ok: false; error: string };

export interface DeliverOptions {
  signal?: AbortSignal;
}

/**
 * A destination for cleaned transcripts.
 */
export interface DeliverySink {
  readonly name: Exclude<DeliverySinkName, 'none'>;
  deliver(note: NoteInput, options?: DeliverOptions): Promise<DeliveryResult>;
}

/**
 * A sink reported failure. The transcript is kept.
 */
export class DeliveryError extends Error {
  constructor(
    public readonly sink: string,
    detail: string
  ) {
    super(`Delivery to ${sink} failed: ${detail}`);
    this.name = 'DeliveryError';
  }
}
