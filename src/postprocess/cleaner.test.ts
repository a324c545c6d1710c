/**
 * Tests for the transcript cleaner
 */

import { describe, it, expect } from '@jest/globals';
import { cleanTranscript, collapseDuplicateLines } from './cleaner.js';
import { CleanupRulesSchema } from '../schemas/index.js';

const rules = CleanupRulesSchema.parse({
  annotationPatterns: [
    '\\[\\d{2}:\\d{2}:\\d{2}[.,]\\d{3} --> \\d{2}:\\d{2}:\\d{2}[.,]\\d{3}\\]',
    '\\[[^\\[\\]\\n]*\\]',
    '\\([A-Z][A-Z0-9 _-]*\\)',
    '^\\s*>>\\s*',
  ],
  fillerWords: ['um', 'uh'],
  fillerPhrases: ['嗯'],
  substitutions: [
    { pattern: '，{2,}', replacement: '，' },
    { pattern: '^[,，、]+', flags: 'gm' },
    { pattern: '[ \\t]+([,.!?;:，。！？；：])', replacement: '$1' },
  ],
});

describe('cleanTranscript', () => {
  it('removes timestamps, filler words and repeated lines', () => {
    const raw = '[00:00:00.000 --> 00:00:02.000]  um, hello\nhello';
    expect(cleanTranscript(raw, rules)).toBe('hello');
  });

  it('removes bracketed annotations and speaker markers', () => {
    const raw = '[MUSIC]\n(APPLAUSE) Thanks for watching\n>> Next speaker';
    expect(cleanTranscript(raw, rules)).toBe('Thanks for watching\nNext speaker');
  });

  it('matches filler words case-insensitively', () => {
    expect(cleanTranscript('Um, OK', rules)).toBe('OK');
  });

  it('keeps words that only contain a filler word', () => {
    expect(cleanTranscript('umbrella humming', rules)).toBe('umbrella humming');
  });

  it('removes filler phrases and tidies the punctuation left behind', () => {
    expect(cleanTranscript('嗯，我们今天，，讲一下', rules)).toBe('我们今天，讲一下');
  });

  it('removes whitespace before punctuation', () => {
    expect(cleanTranscript('so uh , this works .', rules)).toBe('so, this works.');
  });

  it('normalizes line endings and drops blank lines', () => {
    expect(cleanTranscript('a\r\n\r\n  b  \r\n', rules)).toBe('a\nb');
  });

  it('keeps duplicates that are not adjacent', () => {
    expect(cleanTranscript('a\nb\na', rules)).toBe('a\nb\na');
  });

  it('returns an empty string for annotation-only input', () => {
    expect(cleanTranscript('[MUSIC]\n[00:00:01.000 --> 00:00:02.000]', rules)).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      '[00:00:00.000 --> 00:00:02.000]  um, hello\nhello',
      '嗯，，，好的 ， 开始\n开始',
      'uh uh uh\n  [Applause]  right .\nright.',
    ];
    for (const sample of samples) {
      const once = cleanTranscript(sample, rules);
      expect(cleanTranscript(once, rules)).toBe(once);
    }
  });

  it('only normalizes whitespace with an empty rule set', () => {
    const empty = CleanupRulesSchema.parse({});
    expect(cleanTranscript('  hello   world  ', empty)).toBe('hello world');
  });
});

describe('collapseDuplicateLines', () => {
  it('drops runs of identical lines', () => {
    expect(collapseDuplicateLines(['a', 'a', 'b', 'b', 'b', 'a'])).toEqual(['a', 'b', 'a']);
  });

  it('handles empty input', () => {
    expect(collapseDuplicateLines([])).toEqual([]);
  });
});
