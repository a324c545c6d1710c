import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  InputError,
  buildWatchUrl,
  deriveOutputPath,
  describeInput,
  extractVideoId,
  isValidVideoId,
  parseVideoId,
  resolveInput,
  stripExtension,
  transcriptFileName,
} from './index.js';

describe('video identifiers', () => {
  describe('extractVideoId', () => {
    it.each([
      ['v=ABC123&t=5', 'ABC123'],
      ['v=ABC123', 'ABC123'],
      ['https://www.youtube.com/watch?v=ABC123&t=5', 'ABC123'],
      ['https://www.youtube.com/watch?list=PL1&v=ABC123', 'ABC123'],
      ['https://youtu.be/ABC123?si=xyz', 'ABC123'],
      ['https://www.youtube.com/shorts/ABC123', 'ABC123'],
      ['https://www.youtube.com/embed/ABC123', 'ABC123'],
      ['watch?v=dQ-_x9&feature=share', 'dQ-_x9'],
      ['  v=ABC123  ', 'ABC123'],
    ])('should extract the identifier from %s', (reference, expected) => {
      expect(extractVideoId(reference)).toBe(expected);
    });

    it('should return the whole text when there is no marker', () => {
      expect(extractVideoId('ABC123')).toBe('ABC123');
    });
  });

  describe('parseVideoId', () => {
    it('should accept a safe identifier', () => {
      expect(parseVideoId('v=ABC123&t=5')).toBe('ABC123');
    });

    it('should reject an empty identifier', () => {
      expect(() => parseVideoId('v=&t=5')).toThrow('No video identifier found in "v=&t=5"');
    });

    it('should reject characters that cannot appear in a file name', () => {
      expect(() => parseVideoId('v=../etc')).toThrow(InputError);
      expect(() => parseVideoId('v=bad id!')).toThrow(InputError);
    });

    it('should carry the raw input on the error', () => {
      try {
        parseVideoId('v=a/b');
        throw new Error('expected parseVideoId to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InputError);
        expect(error instanceof InputError ? error.input : null).toBe('v=a/b');
      }
    });
  });

  it('should validate identifiers', () => {
    expect(isValidVideoId('a-B_9')).toBe(true);
    expect(isValidVideoId('a.b')).toBe(false);
    expect(isValidVideoId('')).toBe(false);
  });

  it('should build the canonical watch URL', () => {
    expect(buildWatchUrl('ABC123')).toBe('https://www.youtube.com/watch?v=ABC123');
  });
});

describe('resolveInput', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'input-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should treat an existing file as local input', async () => {
    await fs.writeFile(path.join(tempDir, 'talk.final.mp4'), 'x');

    const input = await resolveInput('talk.final.mp4', { cwd: tempDir });

    expect(input).toEqual({
      kind: 'local',
      path: path.join(tempDir, 'talk.final.mp4'),
      baseName: 'talk.final',
    });
  });

  it('should treat anything else as a remote reference', async () => {
    const input = await resolveInput('v=ABC123&t=5', { cwd: tempDir });

    expect(input).toEqual({
      kind: 'remote',
      videoId: 'ABC123',
      url: 'https://www.youtube.com/watch?v=ABC123',
    });
  });

  it('should not treat a directory as a local file', async () => {
    await fs.mkdir(path.join(tempDir, 'ABC123'));

    const input = await resolveInput('ABC123', { cwd: tempDir });

    expect(input.kind).toBe('remote');
  });

  it('should reject an empty argument', async () => {
    await expect(resolveInput('  ', { cwd: tempDir })).rejects.toThrow('A URL or file path is required');
  });
});

describe('output naming', () => {
  it('should strip only the last extension', () => {
    expect(stripExtension('talk.final.mp4')).toBe('talk.final');
    expect(stripExtension('noext')).toBe('noext');
    expect(stripExtension('.bashrc')).toBe('.bashrc');
  });

  it('should name transcripts by input kind', () => {
    expect(transcriptFileName({ kind: 'local', path: '/m/foo.mp4', baseName: 'foo' })).toBe('foo.txt');
    expect(
      transcriptFileName({ kind: 'remote', videoId: 'ABC123', url: buildWatchUrl('ABC123') })
    ).toBe('ytABC123.txt');
  });

  it('should place transcripts in the output directory', () => {
    const input = { kind: 'remote', videoId: 'ABC123', url: buildWatchUrl('ABC123') } as const;

    expect(deriveOutputPath(input, '/data')).toBe(path.join('/data', 'ytABC123.txt'));
    expect(describeInput(input)).toBe('https://www.youtube.com/watch?v=ABC123 (ABC123)');
  });
});
