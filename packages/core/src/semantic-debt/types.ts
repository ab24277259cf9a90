export type ConflictSeverity = 'critical' | 'warning' | 'info';

export const CONFLICT_SEVERITIES: readonly ConflictSeverity[] = ['critical', 'warning', 'info'];

export type ConflictKind =
  | 'entity_conflict' // same entity name, different property sets
  | 'type_conflict' // same entity property, different data types
  | 'relationship_conflict' // same entity pair, different cardinalities
  | 'rule_conflict'; // same rule name, different conditions

export const CONFLICT_KINDS: readonly ConflictKind[] = [
  'entity_conflict',
  'type_conflict',
  'relationship_conflict',
  'rule_conflict',
];

export interface SemanticConflict {
  conflict_type: ConflictKind;
  severity: ConflictSeverity;
  name: string;
  sources: string[];
  /** Keyed by source model name. */
  details: Record<string, string>;
  description: string;
  recommendation: string;
}

export interface DebtSummary {
  total_conflicts: number;
  critical: number;
  warning: number;
  info: number;
  by_type: Partial<Record<ConflictKind, number>>;
}

export interface SemanticDebtReport {
  models_analyzed: string[];
  conflicts: SemanticConflict[];
  summary: DebtSummary;
  recommendations: string[];
}

export interface AnalyzeOptions {
  /** Rule conditions less similar than this are critical. Default 0.8. */
  similarityThreshold?: number;
}
