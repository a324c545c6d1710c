/**
 * Tests for delivery sinks
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileSink, slugify } from './file-sink.js';
import { AppleNotesSink, buildNoteScriptArgs, renderNoteHtml } from './apple-notes-sink.js';
import { createSink } from './registry.js';
import { loadConfig, type AppConfig } from '../config/index.js';
import type { CommandSpec, ProcessRunner } from '../process/index.js';
import { FakeProcessRunner } from '../../tests/helpers/fake-runner.js';

/**
 * Runner that reads the note body before the sink removes it.
 */
class BodyCapturingRunner implements ProcessRunner {
  readonly commands: CommandSpec[] = [];
  bodyPath = '';
  body = '';

  async capture(command: CommandSpec): Promise<string> {
    this.commands.push(command);
    this.bodyPath = command.args[command.args.length - 1] ?? '';
    this.body = await fs.readFile(this.bodyPath, 'utf-8');
    return '';
  }

  async pipeline(): Promise<void> {
    throw new Error('not used');
  }
}

describe('slugify', () => {
  it('replaces unsafe characters and spaces with dashes', () => {
    expect(slugify('Weekly sync (2024.01.31)')).toBe('weekly-sync-2024.01.31');
  });

  it('keeps non-latin letters', () => {
    expect(slugify('周会 记录')).toBe('周会-记录');
  });

  it('falls back when nothing usable remains', () => {
    expect(slugify('///')).toBe('transcript');
  });
});

describe('FileSink', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-sink-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('writes a markdown note named after the heading', async () => {
    const sink = new FileSink(path.join(tempDir, 'notes'));

    const result = await sink.deliver({ title: 'Weekly sync (2024.01.31)', body: 'line one\nline two' });

    const location = path.join(tempDir, 'notes', 'weekly-sync-2024.01.31.md');
    expect(result).toEqual({ ok: true, location });
    await expect(fs.readFile(location, 'utf-8')).resolves.toBe(
      '# Weekly sync (2024.01.31)\n\nline one\nline two\n'
    );
  });

  it('reports failure instead of throwing', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const sink = new FileSink(blocker);

    const result = await sink.deliver({ title: 'x', body: 'y' });

    expect(result.ok).toBe(false);
  });
});

describe('AppleNotesSink', () => {
  it('passes title and folder as arguments and the body as a file', async () => {
    const runner = new BodyCapturingRunner();
    const sink = new AppleNotesSink(runner, 'Transcripts', 'osascript');

    const result = await sink.deliver({ title: 'A "quoted" title', body: 'a < b\n\nend' });

    expect(result).toEqual({ ok: true, location: 'Notes folder "Transcripts"' });
    expect(runner.commands).toHaveLength(1);
    const [command] = runner.commands;
    expect(command?.stage).toBe('deliver');
    expect(command?.file).toBe('osascript');
    expect(command?.args.slice(-3, -1)).toEqual(['A "quoted" title', 'Transcripts']);
    expect(runner.body).toBe(
      '<h1>A &quot;quoted&quot; title</h1>\n<div>a &lt; b</div>\n<div><br></div>\n<div>end</div>'
    );
  });

  it('removes the temporary body file afterwards', async () => {
    const runner = new BodyCapturingRunner();
    const sink = new AppleNotesSink(runner, 'Transcripts');

    await sink.deliver({ title: 't', body: 'b' });

    await expect(fs.stat(path.dirname(runner.bodyPath))).rejects.toThrow();
  });

  it('reports a failing osascript run', async () => {
    const runner = new FakeProcessRunner({ failStage: 'deliver' });
    const sink = new AppleNotesSink(runner, 'Transcripts');

    const result = await sink.deliver({ title: 't', body: 'b' });

    expect(result).toEqual({ ok: false, error: expect.stringContaining('deliver stage failed') });
  });
});

describe('buildNoteScriptArgs', () => {
  it('never interpolates values into the script', () => {
    const args = buildNoteScriptArgs('"; do shell script "x', 'Folder', '/tmp/body.html');
    const scriptLines = args.slice(0, -3).filter((_, index) => index % 2 === 1);

    expect(scriptLines.some((line) => line.includes('do shell script'))).toBe(false);
    expect(args.slice(-3)).toEqual(['"; do shell script "x', 'Folder', '/tmp/body.html']);
  });
});

describe('renderNoteHtml', () => {
  it('escapes markup', () => {
    expect(renderNoteHtml({ title: 'T&C', body: '<b>' })).toBe('<h1>T&amp;C</h1>\n<div>&lt;b&gt;</div>');
  });
});

describe('createSink', () => {
  function configWith(delivery: string): AppConfig {
    return loadConfig({ DELIVERY: delivery, TRANSCRIPT_DIR: '/tmp/out' }, { cwd: '/tmp', platform: 'linux' });
  }

  it('returns null when delivery is off', () => {
    expect(createSink(configWith('none'), new FakeProcessRunner())).toBeNull();
  });

  it('builds the file sink', () => {
    expect(createSink(configWith('file'), new FakeProcessRunner())?.name).toBe('file');
  });

  it('builds the notes sink', () => {
    expect(createSink(configWith('apple-notes'), new FakeProcessRunner())?.name).toBe('apple-notes');
  });
});
