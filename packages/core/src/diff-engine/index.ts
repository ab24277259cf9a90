export {
  diff,
  hasChanges,
  summarizeChanges,
  diffReportToJSON,
  formatValue,
  relationshipKey,
} from './diff-engine.js';
export { renderChangelog, renderUnifiedDiff } from './render.js';
export { ELEMENT_TYPES } from './types.js';
export type {
  Change,
  ChangeType,
  ElementType,
  ElementRef,
  EntityField,
  PropertyField,
  RelationshipField,
  RuleField,
  DiffReport,
  DiffReportDocument,
  DiffSummary,
  ModelVersionRef,
} from './types.js';
