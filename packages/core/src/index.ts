// Shared
export { ValidationError, InsufficientInputError, ModelLoadError } from './shared/errors.js';

// Model
export {
  parseModel,
  serializeModel,
  loadModelFromFile,
  loadModelsFromDirectory,
  MODEL_SCHEMA,
} from './model/index.js';
export type {
  Model,
  Entity,
  Property,
  Relationship,
  BusinessRule,
  Constraint,
  MetadataValue,
  ModelDocument,
  EntityDocument,
  PropertyDocument,
  RelationshipDocument,
  BusinessRuleDocument,
  ConstraintDocument,
  ParseModelOptions,
} from './model/index.js';

// Comparator
export { indexBy, compareKeyed, compareFields, diffCollections } from './comparator/index.js';
export type {
  KeyedItem,
  CommonPair,
  FieldDifference,
  KeyedComparison,
  Modification,
  CollectionDiff,
  FieldComparator,
} from './comparator/index.js';

// Diff Engine
export {
  diff,
  hasChanges,
  summarizeChanges,
  diffReportToJSON,
  renderChangelog,
  renderUnifiedDiff,
  relationshipKey,
  ELEMENT_TYPES,
} from './diff-engine/index.js';
export type {
  Change,
  ChangeType,
  ElementType,
  ElementRef,
  DiffReport,
  DiffReportDocument,
  DiffSummary,
  ModelVersionRef,
} from './diff-engine/index.js';

// Merge Engine
export { merge, isMergeStrategy, incrementVersion, MERGE_STRATEGIES } from './merge-engine/index.js';
export type { MergeStrategy, MergeConflict, MergeResult } from './merge-engine/index.js';

// Semantic Debt
export {
  analyze,
  SemanticDebtAnalyzer,
  renderDebtMarkdown,
  textSimilarity,
  DEFAULT_SIMILARITY_THRESHOLD,
  CONFLICT_KINDS,
} from './semantic-debt/index.js';
export type {
  ConflictKind,
  ConflictSeverity,
  SemanticConflict,
  DebtSummary,
  SemanticDebtReport,
  AnalyzeOptions,
} from './semantic-debt/index.js';

// Observability
export { getTracer, startSpan, endSpan, SpanStatusCode } from './observability/index.js';
