/**
 * Markdown File Sink
 *
 * @module delivery/file-sink
 */

import * as path from 'node:path';
import { atomicWriteText } from '../storage/atomic.js';
import type { DeliveryResult, DeliverySink, NoteInput } from './types.js';

const MAX_SLUG_LENGTH = 120;

/**
 * Turn a heading into a file name. Unicode letters are kept; characters
 * that are unsafe in file names become dashes.
 *
 * @example
 * ```typescript
 * slugify('Weekly sync (2024.01.31)'); // 'weekly-sync-2024.01.31'
 * ```
 */
export function slugify(title: string): string {
  const slug = title
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[\\/:*?"'<>|()[\]{}#%&,;!@^~`\u0000-\u001f]+/g, ' ')
    .trim()
    .replace(/\s+/g, '-')
    .replace(/-{2,}/g, '-')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/^[-.]+|[-.]+$/g, '');

  return slug || 'transcript';
}

/**
 * Writes each note to `<dir>/<slug>.md`.
 */
export class FileSink implements DeliverySink {
  readonly name = 'file';

  constructor(private readonly dir: string) {}

  async deliver(note: NoteInput): Promise<DeliveryResult> {
    const location = path.join(this.dir, `${slugify(note.title)}.md`);
    try {
      await atomicWriteText(location, `# ${note.title}\n\n${note.body}\n`);
      return { ok: true, location };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}
