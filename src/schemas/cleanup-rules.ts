/**
 * Cleanup Rules Schema
 *
 * Post-processing heuristics live in a JSON file rather than in code so they
 * can be reviewed and adjusted per language or speaker.
 *
 * @module schemas/cleanup-rules
 */

import { z } from 'zod';

/**
 * Validate that a pattern/flags pair compiles.
 */
function compiles(pattern: string, flags: string): boolean {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
}

const RegexFlagsSchema = z
  .string()
  .regex(/^[gimsuy]*$/, 'only g, i, m, s, u and y flags are allowed')
  .default('g');

export const SubstitutionRuleSchema = z
  .object({
    /** Short label shown in verbose output */
    description: z.string().optional(),
    pattern: z.string().min(1),
    flags: RegexFlagsSchema,
    replacement: z.string().default(''),
  })
  .refine((rule) => compiles(rule.pattern, rule.flags), {
    message: 'pattern is not a valid regular expression',
    path: ['pattern'],
  });

export type SubstitutionRule = z.infer<typeof SubstitutionRuleSchema>;

export const CleanupRulesSchema = z.object({
  /** Removed wherever they match (timestamps, [MUSIC], speaker tags) */
  annotationPatterns: z
    .array(
      z.string().min(1).refine((pattern) => compiles(pattern, 'gm'), 'not a valid regular expression')
    )
    .default([]),
  /** Removed when they make up a whole whitespace-delimited token */
  fillerWords: z.array(z.string().min(1)).default([]),
  /** Removed wherever they occur as a substring */
  fillerPhrases: z.array(z.string().min(1)).default([]),
  /** Applied after filler removal, in order */
  substitutions: z.array(SubstitutionRuleSchema).default([]),
});

export type CleanupRules = z.infer<typeof CleanupRulesSchema>;
