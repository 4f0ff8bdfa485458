export {
  LevelCoordinator,
  createLevelCoordinator,
  buildResolutionPrompt,
  matchesConflictPath,
  COORDINATOR_CAPABILITIES,
  type LevelCoordinatorOptions,
  type CoordinateOptions,
} from './level-coordinator.js';
export { detectConflicts, collectWriters, conflictKey, type ConflictCheckResult } from './conflict-detector.js';
export {
  summarizeTrace,
  createLevelContext,
  renderLevelContext,
  renderLevelContexts,
  mergeReviews,
  MAX_KEY_OUTPUT_CHARS,
  MAX_LEVEL_CONTEXT_CHARS,
  MAX_FILES_PER_ITEM,
} from './level-context.js';
