/**
 * Transcript Cleaner
 *
 * Turns raw engine output into readable text:
 * 1. Remove annotations (timestamps, [MUSIC], speaker tags)
 * 2. Remove filler words and filler phrases
 * 3. Apply rule substitutions
 * 4. Normalize whitespace, drop empty lines
 * 5. Collapse consecutive duplicate lines
 *
 * The passes repeat until the text stops changing, which makes the cleaner
 * idempotent: cleaning already-cleaned text returns it unchanged.
 *
 * @module postprocess/cleaner
 */

import type { CleanupRules } from '../schemas/index.js';

/** Upper bound on repeated passes for rule sets that never settle. */
const MAX_PASSES = 10;

/** Trailing punctuation ignored when matching filler words. */
const TRAILING_PUNCTUATION = /[,.!?;:，。！？；：、…]+$/u;

/** Horizontal whitespace, including no-break and ideographic spaces. */
const HORIZONTAL_SPACE = /[ \t\f\v 　]+/g;

interface CompiledRules {
  annotations: RegExp[];
  fillerWords: Set<string>;
  fillerPhrases: string[];
  substitutions: Array<{ regex: RegExp; replacement: string }>;
}

function compileRules(rules: CleanupRules): CompiledRules {
  return {
    annotations: rules.annotationPatterns.map((pattern) => new RegExp(pattern, 'gm')),
    fillerWords: new Set(rules.fillerWords.map((word) => word.toLowerCase())),
    fillerPhrases: rules.fillerPhrases,
    substitutions: rules.substitutions.map((rule) => ({
      regex: new RegExp(rule.pattern, rule.flags),
      replacement: rule.replacement,
    })),
  };
}

/**
 * Drop whitespace-delimited tokens that are filler words.
 */
function removeFillerWords(line: string, fillerWords: Set<string>): string {
  if (fillerWords.size === 0) {
    return line;
  }
  return line
    .split(/(\s+)/)
    .filter((token) => !fillerWords.has(token.replace(TRAILING_PUNCTUATION, '').toLowerCase()))
    .join('');
}

/**
 * Drop runs of identical adjacent lines, keeping the first.
 *
 * @param lines - Lines to process
 * @returns Lines without consecutive duplicates
 */
export function collapseDuplicateLines(lines: string[]): string[] {
  return lines.filter((line, index) => index === 0 || line !== lines[index - 1]);
}

function cleanPass(text: string, rules: CompiledRules): string {
  let result = text;

  for (const annotation of rules.annotations) {
    result = result.replace(annotation, ' ');
  }

  result = result
    .split('\n')
    .map((line) => removeFillerWords(line, rules.fillerWords))
    .join('\n');

  for (const phrase of rules.fillerPhrases) {
    result = result.split(phrase).join('');
  }

  for (const substitution of rules.substitutions) {
    result = result.replace(substitution.regex, substitution.replacement);
  }

  const lines = result
    .split('\n')
    .map((line) => line.replace(HORIZONTAL_SPACE, ' ').trim())
    .filter((line) => line.length > 0);

  return collapseDuplicateLines(lines).join('\n');
}

/**
 * Clean a transcript.
 *
 * @param text - Raw transcript text
 * @param rules - Validated cleanup rules
 * @returns Cleaned text, lines joined with `\n`, no trailing newline
 *
 * @example
 * ```typescript
 * const rules = await loadCleanupRules();
 * cleanTranscript('[00:00:00.000 --> 00:00:02.000]  um, hello\nhello', rules);
 * // 'hello'
 * ```
 */
export function cleanTranscript(text: string, rules: CleanupRules): string {
  const compiled = compileRules(rules);
  let current = text.replace(/\r\n?/g, '\n');

  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const next = cleanPass(current, compiled);
    if (next === current) {
      return next;
    }
    current = next;
  }

  return current;
}
