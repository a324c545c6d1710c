/**
 * External Tool Checks
 *
 * @module tools
 */

export {
  PathToolLocator,
  createToolLocator,
  type ToolLocator,
} from './locator.js';

export {
  getRequiredTools,
  checkRequirements,
  assertRequirements,
  MissingDependencyError,
  type ToolId,
  type RequiredTool,
  type FoundTool,
  type RequirementReport,
} from './requirements.js';
