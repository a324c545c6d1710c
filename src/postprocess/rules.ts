/**
 * Cleanup Rules Loading
 *
 * @module postprocess/rules
 */

import * as path from 'node:path';
import { readJson } from '../storage/atomic.js';
import { CleanupRulesSchema, type CleanupRules } from '../schemas/index.js';

/**
 * Rules shipped with the package, at `<package>/config/cleanup-rules.json`.
 * The relative path holds for both `src/postprocess` and `dist/postprocess`.
 */
export const BUNDLED_RULES_PATH = path.resolve(__dirname, '..', '..', 'config', 'cleanup-rules.json');

/**
 * Error raised when a rules file fails validation.
 */
export class CleanupRulesError extends Error {
  constructor(
    public readonly rulesPath: string,
    public readonly issues: string[]
  ) {
    super(`Invalid cleanup rules in ${rulesPath}:\n  ${issues.join('\n  ')}`);
    this.name = 'CleanupRulesError';
  }
}

/**
 * Load and validate cleanup rules.
 *
 * @param rulesPath - Custom rules file, or null for the bundled rules
 * @returns Validated rules
 * @throws CleanupRulesError if the file does not match the schema
 */
export async function loadCleanupRules(rulesPath: string | null = null): Promise<CleanupRules> {
  const filePath = rulesPath ?? BUNDLED_RULES_PATH;
  const data = await readJson(filePath);

  const result = CleanupRulesSchema.safeParse(data);
  if (!result.success) {
    throw new CleanupRulesError(
      filePath,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
