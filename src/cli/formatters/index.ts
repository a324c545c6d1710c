/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  StageProgressDisplay,
  createSpinner,
  createStageProgress,
  formatDuration,
} from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  formatDryRunCommands,
  formatTimingBreakdown,
} from './run-summary.js';

// Requirement report
export { formatRequirementReport, formatMissingTools } from './requirements.js';
