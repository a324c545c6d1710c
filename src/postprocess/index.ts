/**
 * Transcript Post-Processing
 *
 * @module postprocess
 */

export { cleanTranscript, collapseDuplicateLines } from './cleaner.js';
export { loadCleanupRules, BUNDLED_RULES_PATH, CleanupRulesError } from './rules.js';
export { buildHeading, formatUploadDate, formatLocalDate } from './heading.js';
