import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig } from '../config/index.js';
import {
  calculateFileHash,
  canonicalJson,
  checkCache,
  computeFingerprint,
  describeRecordInput,
  getRecordPath,
  hashText,
  readRecord,
  selectTranscriptionSettings,
  writeRecord,
} from './cache.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

const settings = selectTranscriptionSettings(
  loadConfig({ WHISPER_EXECUTABLE: 'whisper-cli' }, { cwd: '/work', platform: 'linux' })
);

describe('cache', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cache-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('hashing', () => {
    it('should hash text and files alike', async () => {
      const filePath = path.join(tempDir, 'abc.bin');
      await fs.writeFile(filePath, 'abc');

      expect(hashText('abc')).toBe(ABC_SHA256);
      expect(await calculateFileHash(filePath)).toBe(ABC_SHA256);
    });

    it('should sort keys and drop undefined values in canonical JSON', () => {
      expect(canonicalJson({ b: 1, a: [true, null, { d: 'x', c: undefined }] })).toBe(
        '{"a":[true,null,{"d":"x"}],"b":1}'
      );
    });
  });

  describe('fingerprint', () => {
    it('should identify local files by content, not path', async () => {
      const first = path.join(tempDir, 'a.mp4');
      const second = path.join(tempDir, 'moved', 'b.mp4');
      await fs.mkdir(path.dirname(second));
      await fs.writeFile(first, 'abc');
      await fs.writeFile(second, 'abc');

      const a = await describeRecordInput({ kind: 'local', path: first, baseName: 'a' });
      const b = await describeRecordInput({ kind: 'local', path: second, baseName: 'b' });

      expect(a).toEqual({ kind: 'local', path: first, sizeBytes: 3, sha256: ABC_SHA256 });
      expect(computeFingerprint(a, settings)).toBe(computeFingerprint(b, settings));
    });

    it('should change when a transcription setting changes', () => {
      const input = { kind: 'remote', videoId: 'ABC123', url: 'https://www.youtube.com/watch?v=ABC123' } as const;

      const base = computeFingerprint(input, settings);

      expect(computeFingerprint(input, { ...settings, language: 'en' })).not.toBe(base);
      expect(computeFingerprint(input, { ...settings, threads: settings.threads + 1 })).not.toBe(base);
      expect(computeFingerprint(input, settings)).toBe(base);
      expect(base).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  describe('records', () => {
    it('should write a sidecar beside the transcript and read it back', async () => {
      const transcriptPath = path.join(tempDir, 'ytABC123.txt');
      const input = { kind: 'remote', videoId: 'ABC123', url: 'https://www.youtube.com/watch?v=ABC123' } as const;
      const fingerprint = computeFingerprint(input, settings);

      await writeRecord(transcriptPath, {
        input,
        settings,
        fingerprint,
        transcript: 'abc',
        title: 'A Talk',
        uploadDate: '20240131',
      });

      expect(getRecordPath(transcriptPath)).toBe(`${transcriptPath}.json`);
      const record = await readRecord(transcriptPath);
      expect(record).toMatchObject({
        schemaVersion: 1,
        input,
        fingerprint,
        transcriptSha256: ABC_SHA256,
        title: 'A Talk',
        uploadDate: '20240131',
      });
    });

    it('should return null when there is no record', async () => {
      expect(await readRecord(path.join(tempDir, 'none.txt'))).toBeNull();
    });
  });

  describe('checkCache', () => {
    let transcriptPath: string;
    const fingerprint = jest.fn(async () => 'f'.repeat(64));

    beforeEach(() => {
      transcriptPath = path.join(tempDir, 'foo.txt');
      fingerprint.mockClear();
    });

    async function writeMatchingRecord(value: string): Promise<void> {
      await writeRecord(transcriptPath, {
        input: { kind: 'remote', videoId: 'foo', url: 'https://www.youtube.com/watch?v=foo' },
        settings,
        fingerprint: value,
        transcript: 'text',
      });
    }

    it('should run when the transcript is missing', async () => {
      expect(await checkCache(transcriptPath, { mode: 'fingerprint', fingerprint })).toEqual({
        skip: false,
        reason: 'missing',
      });
    });

    it('should run when forced', async () => {
      await fs.writeFile(transcriptPath, 'text');

      expect(await checkCache(transcriptPath, { mode: 'presence', force: true, fingerprint })).toEqual({
        skip: false,
        reason: 'forced',
      });
    });

    it('should skip on presence alone in presence mode', async () => {
      await fs.writeFile(transcriptPath, 'text');

      expect(await checkCache(transcriptPath, { mode: 'presence', fingerprint })).toEqual({
        skip: true,
        reason: 'present',
      });
      expect(fingerprint).not.toHaveBeenCalled();
    });

    it('should skip a transcript without a record', async () => {
      await fs.writeFile(transcriptPath, 'text');

      expect(await checkCache(transcriptPath, { mode: 'fingerprint', fingerprint })).toEqual({
        skip: true,
        reason: 'no-record',
      });
      expect(fingerprint).not.toHaveBeenCalled();
    });

    it('should compare fingerprints when a record exists', async () => {
      await fs.writeFile(transcriptPath, 'text');
      await writeMatchingRecord('f'.repeat(64));

      expect(await checkCache(transcriptPath, { mode: 'fingerprint', fingerprint })).toEqual({
        skip: true,
        reason: 'fingerprint-match',
      });

      await writeMatchingRecord('0'.repeat(64));
      expect(await checkCache(transcriptPath, { mode: 'fingerprint', fingerprint })).toEqual({
        skip: false,
        reason: 'fingerprint-mismatch',
      });
    });

    it('should run again over an unreadable record', async () => {
      await fs.writeFile(transcriptPath, 'text');
      await fs.writeFile(getRecordPath(transcriptPath), '{"schemaVersion": 99}');

      expect(await checkCache(transcriptPath, { mode: 'fingerprint', fingerprint })).toEqual({
        skip: false,
        reason: 'invalid-record',
      });
    });
  });
});
