import {
  compareFields,
  compareKeyed,
  diffCollections,
  indexBy,
} from '../comparator/index.js';
import type { FieldDifference } from '../comparator/index.js';
import type {
  BusinessRule,
  Entity,
  MetadataValue,
  Model,
  Property,
  Relationship,
} from '../model/index.js';
import { traced } from '../observability/index.js';
import { ELEMENT_TYPES } from './types.js';
import type {
  Change,
  DiffReport,
  DiffReportDocument,
  DiffSummary,
  EntityField,
  PropertyField,
  RelationshipField,
  RuleField,
} from './types.js';

const ENTITY_FIELDS: readonly EntityField[] = ['entity_type', 'description'];
const PROPERTY_FIELDS: readonly PropertyField[] = ['data_type', 'required', 'unique'];
const RELATIONSHIP_FIELDS: readonly RelationshipField[] = ['relationship_type', 'cardinality'];
const RULE_FIELDS: readonly RuleField[] = ['condition', 'action', 'classification'];

const FIELD_DETAILS: Record<EntityField | PropertyField | RelationshipField | RuleField, string> = {
  entity_type: 'Entity type changed',
  description: 'Description updated',
  data_type: 'Data type changed',
  required: 'Required flag changed',
  unique: 'Unique flag changed',
  relationship_type: 'Relationship type changed',
  cardinality: 'Cardinality changed',
  condition: 'Condition changed',
  action: 'Action changed',
  classification: 'Classification changed',
};

// Relationship paths keep the short ".type" suffix.
const RELATIONSHIP_PATH_SUFFIX: Record<RelationshipField, string> = {
  relationship_type: 'type',
  cardinality: 'cardinality',
};

export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value) ?? String(value);
}

export function relationshipKey(relationship: Pick<Relationship, 'from_entity' | 'to_entity'>): string {
  return `${relationship.from_entity}→${relationship.to_entity}`;
}

export function ruleKey(name: string): string {
  return `rule:${name}`;
}

export function metadataKey(key: string): string {
  return `metadata:${key}`;
}

function entitySummary(entity: Entity): string {
  return `type=${entity.entity_type}, properties=${entity.properties.length}`;
}

function propertySummary(property: Property): string {
  return `type=${property.data_type}, required=${property.required}`;
}

function relationshipSummary(relationship: Relationship): string {
  return `type=${relationship.relationship_type}, cardinality=${relationship.cardinality}`;
}

function ruleSummary(rule: BusinessRule): string {
  return `condition=${rule.condition}, action=${rule.action}`;
}

function modifiedValues(difference: FieldDifference): Pick<Change, 'old_value' | 'new_value'> {
  return {
    old_value: formatValue(difference.old_value),
    new_value: formatValue(difference.new_value),
  };
}

function diffProperties(entityName: string, source: Entity, target: Entity): Change[] {
  const changes: Change[] = [];
  const { added, removed, modified } = diffCollections(
    source.properties,
    target.properties,
    (p) => p.name,
    (a, b) => compareFields(a, b, PROPERTY_FIELDS),
  );

  for (const { key, item } of added) {
    changes.push({
      change_type: 'added',
      element_type: 'property',
      element_name: key,
      path: `${entityName}.${key}`,
      old_value: null,
      new_value: propertySummary(item),
      details: item.description,
      ref: { element: 'property', entity: entityName, property: key },
    });
  }

  for (const { key, item } of removed) {
    changes.push({
      change_type: 'removed',
      element_type: 'property',
      element_name: key,
      path: `${entityName}.${key}`,
      old_value: propertySummary(item),
      new_value: null,
      details: item.description,
      ref: { element: 'property', entity: entityName, property: key },
    });
  }

  for (const { key, differences } of modified) {
    for (const difference of differences) {
      changes.push({
        change_type: 'modified',
        element_type: 'property',
        element_name: key,
        path: `${entityName}.${key}.${difference.field}`,
        ...modifiedValues(difference),
        details: FIELD_DETAILS[difference.field],
        ref: { element: 'property', entity: entityName, property: key, field: difference.field },
      });
    }
  }

  return changes;
}

function diffEntities(source: Model, target: Model): Change[] {
  const changes: Change[] = [];
  const { added, removed, common } = compareKeyed(
    indexBy(source.entities, (e) => e.name),
    indexBy(target.entities, (e) => e.name),
  );

  for (const { key, item } of added) {
    changes.push({
      change_type: 'added',
      element_type: 'entity',
      element_name: key,
      path: key,
      old_value: null,
      new_value: entitySummary(item),
      details: item.description,
      ref: { element: 'entity', entity: key },
    });
  }

  for (const { key, item } of removed) {
    changes.push({
      change_type: 'removed',
      element_type: 'entity',
      element_name: key,
      path: key,
      old_value: entitySummary(item),
      new_value: null,
      details: item.description,
      ref: { element: 'entity', entity: key },
    });
  }

  // Entities in both: own scalars first, then their properties.
  for (const pair of common) {
    for (const difference of compareFields(pair.source, pair.target, ENTITY_FIELDS)) {
      changes.push({
        change_type: 'modified',
        element_type: 'entity',
        element_name: pair.key,
        path: `${pair.key}.${difference.field}`,
        ...modifiedValues(difference),
        details: FIELD_DETAILS[difference.field],
        ref: { element: 'entity', entity: pair.key, field: difference.field },
      });
    }
    changes.push(...diffProperties(pair.key, pair.source, pair.target));
  }

  return changes;
}

function diffRelationships(source: Model, target: Model): Change[] {
  const changes: Change[] = [];
  const { added, removed, modified } = diffCollections(
    source.relationships,
    target.relationships,
    relationshipKey,
    (a, b) => compareFields(a, b, RELATIONSHIP_FIELDS),
  );

  for (const { key, item } of added) {
    changes.push({
      change_type: 'added',
      element_type: 'relationship',
      element_name: key,
      path: key,
      old_value: null,
      new_value: relationshipSummary(item),
      details: item.description,
      ref: { element: 'relationship', key, from_entity: item.from_entity, to_entity: item.to_entity },
    });
  }

  for (const { key, item } of removed) {
    changes.push({
      change_type: 'removed',
      element_type: 'relationship',
      element_name: key,
      path: key,
      old_value: relationshipSummary(item),
      new_value: null,
      details: item.description,
      ref: { element: 'relationship', key, from_entity: item.from_entity, to_entity: item.to_entity },
    });
  }

  for (const { key, source: rel, differences } of modified) {
    for (const difference of differences) {
      changes.push({
        change_type: 'modified',
        element_type: 'relationship',
        element_name: key,
        path: `${key}.${RELATIONSHIP_PATH_SUFFIX[difference.field]}`,
        ...modifiedValues(difference),
        details: FIELD_DETAILS[difference.field],
        ref: {
          element: 'relationship',
          key,
          from_entity: rel.from_entity,
          to_entity: rel.to_entity,
          field: difference.field,
        },
      });
    }
  }

  return changes;
}

function diffBusinessRules(source: Model, target: Model): Change[] {
  const changes: Change[] = [];
  const { added, removed, modified } = diffCollections(
    source.business_rules,
    target.business_rules,
    (r) => r.name,
    (a, b) => compareFields(a, b, RULE_FIELDS),
  );

  for (const { key, item } of added) {
    changes.push({
      change_type: 'added',
      element_type: 'rule',
      element_name: key,
      path: ruleKey(key),
      old_value: null,
      new_value: ruleSummary(item),
      details: item.description,
      ref: { element: 'rule', rule: key },
    });
  }

  for (const { key, item } of removed) {
    changes.push({
      change_type: 'removed',
      element_type: 'rule',
      element_name: key,
      path: ruleKey(key),
      old_value: ruleSummary(item),
      new_value: null,
      details: item.description,
      ref: { element: 'rule', rule: key },
    });
  }

  for (const { key, differences } of modified) {
    for (const difference of differences) {
      changes.push({
        change_type: 'modified',
        element_type: 'rule',
        element_name: key,
        path: `${ruleKey(key)}.${difference.field}`,
        ...modifiedValues(difference),
        details: FIELD_DETAILS[difference.field],
        ref: { element: 'rule', rule: key, field: difference.field },
      });
    }
  }

  return changes;
}

type MetadataEntry = [string, MetadataValue];

function diffMetadata(source: Model, target: Model): Change[] {
  const changes: Change[] = [];
  const { added, removed, modified } = diffCollections<MetadataEntry, 'value'>(
    Object.entries(source.metadata),
    Object.entries(target.metadata),
    ([key]) => key,
    ([, a], [, b]) => compareFields({ value: a }, { value: b }, ['value']),
  );

  for (const { key, item } of added) {
    changes.push({
      change_type: 'added',
      element_type: 'metadata',
      element_name: key,
      path: metadataKey(key),
      old_value: null,
      new_value: formatValue(item[1]),
      details: '',
      ref: { element: 'metadata', key },
    });
  }

  for (const { key, item } of removed) {
    changes.push({
      change_type: 'removed',
      element_type: 'metadata',
      element_name: key,
      path: metadataKey(key),
      old_value: formatValue(item[1]),
      new_value: null,
      details: '',
      ref: { element: 'metadata', key },
    });
  }

  for (const { key, differences } of modified) {
    for (const difference of differences) {
      changes.push({
        change_type: 'modified',
        element_type: 'metadata',
        element_name: key,
        path: metadataKey(key),
        ...modifiedValues(difference),
        details: '',
        ref: { element: 'metadata', key },
      });
    }
  }

  return changes;
}

export function summarizeChanges(changes: readonly Change[]): DiffSummary {
  const byElement: DiffSummary['by_element'] = {};
  for (const elementType of ELEMENT_TYPES) {
    const count = changes.filter((c) => c.element_type === elementType).length;
    if (count > 0) byElement[elementType] = count;
  }

  return {
    total_changes: changes.length,
    added: changes.filter((c) => c.change_type === 'added').length,
    removed: changes.filter((c) => c.change_type === 'removed').length,
    modified: changes.filter((c) => c.change_type === 'modified').length,
    by_element: byElement,
  };
}

/**
 * Compare two versions of a model: entities (with their properties), relationships,
 * business rules, then metadata. Within each group: added, removed, modified.
 */
export function diff(source: Model, target: Model): DiffReport {
  return traced(
    'semdiff.diff',
    { 'semdiff.source': source.name, 'semdiff.target': target.name },
    (span) => {
      const changes = [
        ...diffEntities(source, target),
        ...diffRelationships(source, target),
        ...diffBusinessRules(source, target),
        ...diffMetadata(source, target),
      ];
      span.setAttribute('semdiff.changes', changes.length);

      return {
        source: { name: source.name, version: source.version },
        target: { name: target.name, version: target.version },
        changes,
        summary: summarizeChanges(changes),
      };
    },
  );
}

export function hasChanges(report: DiffReport): boolean {
  return report.changes.length > 0;
}

export function diffReportToJSON(report: DiffReport): DiffReportDocument {
  return {
    source: report.source,
    target: report.target,
    has_changes: hasChanges(report),
    summary: report.summary,
    changes: report.changes.map(({ ref: _ref, ...change }) => change),
  };
}
