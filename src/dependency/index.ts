export {
  DependencyAnalyzer,
  createDependencyAnalyzer,
  buildDependencyPrompt,
  singleLevelGraph,
  type DependencyAnalyzerOptions,
} from './analyzer.js';
export { buildLevels, sanitizeDependencies, type LayeringResult } from './layering.js';
