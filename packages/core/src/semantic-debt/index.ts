export {
  analyze,
  SemanticDebtAnalyzer,
  summarizeConflicts,
  buildRecommendations,
  entitySeverity,
  DEFAULT_SIMILARITY_THRESHOLD,
} from './analyzer.js';
export { textSimilarity, jaccard } from './similarity.js';
export { renderDebtMarkdown } from './render.js';
export { CONFLICT_KINDS, CONFLICT_SEVERITIES } from './types.js';
export type {
  ConflictKind,
  ConflictSeverity,
  SemanticConflict,
  DebtSummary,
  SemanticDebtReport,
  AnalyzeOptions,
} from './types.js';
