/**
 * Apple Notes Sink
 *
 * Creates a note through osascript. Title and folder travel as script
 * arguments; the body is read from a file in a per-invocation temp
 * directory.
 *
 * @module delivery/apple-notes-sink
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ProcessRunner } from '../process/index.js';
import type { DeliverOptions, DeliveryResult, DeliverySink, NoteInput } from './types.js';

const NOTE_SCRIPT = [
  'on run argv',
  'set noteTitle to item 1 of argv',
  'set folderName to item 2 of argv',
  'set noteBody to read (POSIX file (item 3 of argv)) as «class utf8»',
  'tell application "Notes"',
  'if not (exists folder folderName) then make new folder with properties {name:folderName}',
  'make new note at folder folderName with properties {name:noteTitle, body:noteBody}',
  'end tell',
  'end run',
];

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Notes stores bodies as HTML: the heading becomes an `<h1>`, each line a `<div>`.
 */
export function renderNoteHtml(note: NoteInput): string {
  const lines = note.body
    .split('\n')
    .map((line) => `<div>${line.length > 0 ? escapeHtml(line) : '<br>'}</div>`);
  return [`<h1>${escapeHtml(note.title)}</h1>`, ...lines].join('\n');
}

/**
 * osascript arguments for one note.
 */
export function buildNoteScriptArgs(title: string, folder: string, bodyPath: string): string[] {
  return [...NOTE_SCRIPT.flatMap((line) => ['-e', line]), title, folder, bodyPath];
}

export class AppleNotesSink implements DeliverySink {
  readonly name = 'apple-notes';

  constructor(
    private readonly runner: ProcessRunner,
    private readonly folder: string,
    private readonly osascript = 'osascript'
  ) {}

  async deliver(note: NoteInput, options: DeliverOptions = {}): Promise<DeliveryResult> {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vodscript-note-'));
    try {
      const bodyPath = path.join(tempDir, 'body.html');
      await fs.writeFile(bodyPath, renderNoteHtml(note), 'utf-8');

      await this.runner.capture(
        {
          stage: 'deliver',
          file: this.osascript,
          args: buildNoteScriptArgs(note.title, this.folder, bodyPath),
        },
        { signal: options.signal }
      );
      return { ok: true, location: `Notes folder "${this.folder}"` };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }
}
