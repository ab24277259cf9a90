import { relationshipKey } from '../diff-engine/index.js';
import type { Model } from '../model/index.js';
import { traced } from '../observability/index.js';
import { InsufficientInputError, ValidationError } from '../shared/errors.js';
import { jaccard, textSimilarity } from './similarity.js';
import { CONFLICT_KINDS } from './types.js';
import type {
  AnalyzeOptions,
  ConflictSeverity,
  DebtSummary,
  SemanticConflict,
  SemanticDebtReport,
} from './types.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

const MIN_MODELS = 2;

type SourceMap<T> = Map<string, T>;

/**
 * Group items from every model by identity key: key -> (model name -> item).
 * Keys keep first-seen order; within one model a repeated key keeps the later item.
 */
function groupAcrossModels<T>(
  models: ReadonlyMap<string, Model>,
  itemsOf: (model: Model) => Iterable<T>,
  keyOf: (item: T) => string,
): Map<string, SourceMap<T>> {
  const groups = new Map<string, SourceMap<T>>();
  for (const [modelName, model] of models) {
    for (const item of itemsOf(model)) {
      const key = keyOf(item);
      let sources = groups.get(key);
      if (!sources) {
        sources = new Map();
        groups.set(key, sources);
      }
      sources.set(modelName, item);
    }
  }
  return groups;
}

function distinct(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export function entitySeverity(overlap: number): ConflictSeverity {
  if (overlap < 0.5) return 'critical';
  if (overlap < 0.8) return 'warning';
  return 'info';
}

function detectEntityConflicts(models: ReadonlyMap<string, Model>): SemanticConflict[] {
  const conflicts: SemanticConflict[] = [];
  const groups = groupAcrossModels(models, (m) => m.entities, (e) => e.name);

  for (const [entityName, sources] of groups) {
    const entries = [...sources];
    for (let i = 0; i < entries.length; i++) {
      for (let j = i + 1; j < entries.length; j++) {
        const [src1, entity1] = entries[i];
        const [src2, entity2] = entries[j];
        const props1 = new Set(entity1.properties.map((p) => p.name));
        const props2 = new Set(entity2.properties.map((p) => p.name));

        const onlyIn1 = [...props1].filter((p) => !props2.has(p)).sort();
        const onlyIn2 = [...props2].filter((p) => !props1.has(p)).sort();
        if (onlyIn1.length === 0 && onlyIn2.length === 0) continue;

        const missing: string[] = [];
        if (onlyIn1.length > 0) missing.push(`only in ${src1}: ${onlyIn1.join(', ')}`);
        if (onlyIn2.length > 0) missing.push(`only in ${src2}: ${onlyIn2.join(', ')}`);

        conflicts.push({
          conflict_type: 'entity_conflict',
          severity: entitySeverity(jaccard(props1, props2)),
          name: entityName,
          sources: [src1, src2],
          details: {
            [src1]: `Properties: ${[...props1].sort().join(', ')}`,
            [src2]: `Properties: ${[...props2].sort().join(', ')}`,
          },
          description: `Entity '${entityName}' has different structures: ${missing.join('; ')}`,
          recommendation: `Unify entity '${entityName}' structure across models or rename to avoid confusion.`,
        });
      }
    }
  }

  return conflicts;
}

function detectTypeConflicts(models: ReadonlyMap<string, Model>): SemanticConflict[] {
  const conflicts: SemanticConflict[] = [];
  const groups = groupAcrossModels(
    models,
    (m) => m.entities.flatMap((entity) => entity.properties.map((property) => ({ entity, property }))),
    ({ entity, property }) => JSON.stringify([entity.name, property.name]),
  );

  for (const sources of groups.values()) {
    if (sources.size < MIN_MODELS) continue;

    const types = distinct([...sources.values()].map(({ property }) => property.data_type));
    if (types.length < 2) continue;

    const [{ entity, property }] = sources.values();
    const name = `${entity.name}.${property.name}`;
    const details: Record<string, string> = {};
    for (const [source, item] of sources) {
      details[source] = `Type: ${item.property.data_type}`;
    }

    conflicts.push({
      conflict_type: 'type_conflict',
      severity: 'critical',
      name,
      sources: [...sources.keys()],
      details,
      description: `Property '${name}' has different types: ${types.join(', ')}`,
      recommendation: `Standardize the data type for '${property.name}' across all models.`,
    });
  }

  return conflicts;
}

function detectRelationshipConflicts(models: ReadonlyMap<string, Model>): SemanticConflict[] {
  const conflicts: SemanticConflict[] = [];
  const groups = groupAcrossModels(models, (m) => m.relationships, relationshipKey);

  for (const sources of groups.values()) {
    if (sources.size < MIN_MODELS) continue;

    const cardinalities = distinct([...sources.values()].map((r) => r.cardinality));
    if (cardinalities.length < 2) continue;

    const [first] = sources.values();
    const name = `${first.from_entity} → ${first.to_entity}`;
    const details: Record<string, string> = {};
    for (const [source, rel] of sources) {
      details[source] = `Type: ${rel.relationship_type}, Cardinality: ${rel.cardinality}`;
    }

    conflicts.push({
      conflict_type: 'relationship_conflict',
      severity: 'warning',
      name,
      sources: [...sources.keys()],
      details,
      description: `Relationship '${name}' has different cardinalities: ${cardinalities.join(', ')}`,
      recommendation: 'Verify the correct cardinality and update models accordingly.',
    });
  }

  return conflicts;
}

/**
 * Lowest similarity over every pair of distinct conditions.
 */
function minPairwiseSimilarity(conditions: readonly string[]): number {
  let lowest = 1;
  for (let i = 0; i < conditions.length; i++) {
    for (let j = i + 1; j < conditions.length; j++) {
      lowest = Math.min(lowest, textSimilarity(conditions[i], conditions[j]));
    }
  }
  return lowest;
}

function detectRuleConflicts(
  models: ReadonlyMap<string, Model>,
  similarityThreshold: number,
): SemanticConflict[] {
  const conflicts: SemanticConflict[] = [];
  const groups = groupAcrossModels(models, (m) => m.business_rules, (r) => r.name);

  for (const [ruleName, sources] of groups) {
    if (sources.size < MIN_MODELS) continue;

    const conditions = distinct([...sources.values()].map((r) => r.condition));
    if (conditions.length < 2) continue;

    const details: Record<string, string> = {};
    for (const [source, rule] of sources) {
      details[source] = `Condition: ${rule.condition}, Action: ${rule.action}`;
    }

    conflicts.push({
      conflict_type: 'rule_conflict',
      severity: minPairwiseSimilarity(conditions) < similarityThreshold ? 'critical' : 'warning',
      name: ruleName,
      sources: [...sources.keys()],
      details,
      description: `Business rule '${ruleName}' has different conditions across models.`,
      recommendation: `Consolidate rule '${ruleName}' into a single source of truth.`,
    });
  }

  return conflicts;
}

export function summarizeConflicts(conflicts: readonly SemanticConflict[]): DebtSummary {
  const byType: DebtSummary['by_type'] = {};
  for (const kind of CONFLICT_KINDS) {
    const count = conflicts.filter((c) => c.conflict_type === kind).length;
    if (count > 0) byType[kind] = count;
  }

  return {
    total_conflicts: conflicts.length,
    critical: conflicts.filter((c) => c.severity === 'critical').length,
    warning: conflicts.filter((c) => c.severity === 'warning').length,
    info: conflicts.filter((c) => c.severity === 'info').length,
    by_type: byType,
  };
}

export function buildRecommendations(
  conflicts: readonly SemanticConflict[],
  summary: DebtSummary,
): string[] {
  if (conflicts.length === 0) {
    return ['No semantic conflicts detected.'];
  }

  const recommendations: string[] = [];
  if (summary.critical > 0) {
    recommendations.push(
      `Address ${summary.critical} critical conflict(s) immediately - they may cause data inconsistencies.`,
    );
  }
  if (summary.by_type.type_conflict) {
    recommendations.push('Create a shared data dictionary to standardize property types across models.');
  }
  if (summary.by_type.entity_conflict) {
    recommendations.push('Consider creating a master schema that all models inherit from.');
  }
  if (summary.by_type.rule_conflict) {
    recommendations.push('Centralize business rules in a single repository to ensure consistency.');
  }
  if (summary.warning > 3) {
    recommendations.push(
      'Schedule a semantic alignment review with the teams that own the conflicting models.',
    );
  }
  return recommendations;
}

function resolveThreshold(options: AnalyzeOptions): number {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ValidationError(
      `Similarity threshold must be between 0 and 1, got ${threshold}`,
      'similarityThreshold',
    );
  }
  return threshold;
}

/**
 * Compare every model against every other and quantify the semantic debt between them:
 * entity structure drift, property type mismatches, cardinality disagreements and
 * diverging business rule conditions.
 */
export function analyze(
  models: Readonly<Record<string, Model>>,
  options: AnalyzeOptions = {},
): SemanticDebtReport {
  const byName: ReadonlyMap<string, Model> = new Map(Object.entries(models));

  if (byName.size < MIN_MODELS) {
    throw new InsufficientInputError(MIN_MODELS, byName.size);
  }
  const threshold = resolveThreshold(options);

  return traced('semdiff.analyze', { 'semdiff.models': byName.size }, (span) => {
    const conflicts = [
      ...detectEntityConflicts(byName),
      ...detectTypeConflicts(byName),
      ...detectRelationshipConflicts(byName),
      ...detectRuleConflicts(byName, threshold),
    ];
    span.setAttribute('semdiff.conflicts', conflicts.length);

    const summary = summarizeConflicts(conflicts);
    return {
      models_analyzed: [...byName.keys()],
      conflicts,
      summary,
      recommendations: buildRecommendations(conflicts, summary),
    };
  });
}

/**
 * Incremental form: register models one by one, then analyze them together.
 */
export class SemanticDebtAnalyzer {
  private models: Map<string, Model> = new Map();

  constructor(private readonly options: AnalyzeOptions = {}) {}

  addModel(name: string, model: Model): void {
    this.models.set(name, model);
  }

  get modelNames(): string[] {
    return [...this.models.keys()];
  }

  analyze(): SemanticDebtReport {
    return analyze(Object.fromEntries(this.models), this.options);
  }
}
