import AjvModule from 'ajv';
import type { ErrorObject } from 'ajv';
import { ValidationError } from '../shared/errors.js';
import { MODEL_SCHEMA } from './model-schema.js';
import type {
  BusinessRule,
  BusinessRuleDocument,
  Constraint,
  ConstraintDocument,
  Entity,
  EntityDocument,
  MetadataValue,
  Model,
  ModelDocument,
  ParseModelOptions,
  Property,
  PropertyDocument,
  Relationship,
  RelationshipDocument,
} from './types.js';

// ajv ships CommonJS; under NodeNext its class sits on the default export's `default`.
const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true });
const validateDocument = ajv.compile<ModelDocument>(MODEL_SCHEMA);

function errorField(error: ErrorObject): string {
  const missing: unknown = error.params['missingProperty'];
  if (error.keyword === 'required' && typeof missing === 'string') {
    return `${error.instancePath}/${missing}`;
  }
  return error.instancePath || '/';
}

function toConstraint(doc: ConstraintDocument): Constraint {
  return { type: doc.type, value: doc.value, message: doc.message ?? '' };
}

function toProperty(doc: PropertyDocument): Property {
  return {
    name: doc.name,
    data_type: doc.data_type ?? 'String',
    required: doc.required ?? false,
    unique: doc.unique ?? false,
    description: doc.description ?? '',
    constraints: (doc.constraints ?? []).map(toConstraint),
    ...(doc.source_column !== undefined ? { source_column: doc.source_column } : {}),
  };
}

function toEntity(doc: EntityDocument): Entity {
  return {
    name: doc.name,
    description: doc.description ?? '',
    entity_type: doc.entity_type ?? 'standard',
    properties: (doc.properties ?? []).map(toProperty),
    constraints: (doc.constraints ?? []).map(toConstraint),
    ...(doc.source_table !== undefined ? { source_table: doc.source_table } : {}),
  };
}

function toRelationship(doc: RelationshipDocument): Relationship {
  return {
    from_entity: doc.from_entity,
    to_entity: doc.to_entity,
    from_property: doc.from_property ?? '',
    to_property: doc.to_property ?? '',
    relationship_type: doc.relationship_type ?? 'related_to',
    cardinality: doc.cardinality ?? 'one-to-many',
    description: doc.description ?? '',
    ...(doc.source_relationship !== undefined ? { source_relationship: doc.source_relationship } : {}),
  };
}

function toBusinessRule(doc: BusinessRuleDocument): BusinessRule {
  return {
    name: doc.name,
    entity: doc.entity ?? '',
    condition: doc.condition ?? '',
    action: doc.action ?? '',
    classification: doc.classification ?? '',
    description: doc.description ?? '',
    priority: doc.priority ?? 1,
    ...(doc.source_measure !== undefined ? { source_measure: doc.source_measure } : {}),
  };
}

function copyMetadata(
  metadata: Readonly<Record<string, MetadataValue>>,
): Record<string, MetadataValue> {
  const copy: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(metadata)) {
    copy[key] = Array.isArray(value) ? [...value] : value;
  }
  return copy;
}

function assertUnique(keys: string[], scope: string, field: string): void {
  const seen = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) {
      throw new ValidationError(`Duplicate ${scope} name "${key}"`, field, { scope, key });
    }
    seen.add(key);
  }
}

function assertNoDuplicates(model: Model): void {
  assertUnique(model.entities.map((e) => e.name), 'entity', '/entities');
  model.entities.forEach((entity, index) =>
    assertUnique(
      entity.properties.map((p) => p.name),
      `property in entity ${entity.name}`,
      `/entities/${index}/properties`,
    ),
  );
  assertUnique(
    model.relationships.map((r) => `${r.from_entity}→${r.to_entity}`),
    'relationship',
    '/relationships',
  );
  assertUnique(model.business_rules.map((r) => r.name), 'business rule', '/business_rules');
}

/**
 * Validate an interchange document and build a fully-populated Model from it.
 * Omitted optional fields take the interchange defaults (e.g. data_type "String").
 */
export function parseModel(input: unknown, options: ParseModelOptions = {}): Model {
  if (!validateDocument(input)) {
    const errors = validateDocument.errors ?? [];
    const first = errors[0];
    const summary = errors
      .map((e) => `${errorField(e)} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new ValidationError(`Invalid model: ${summary}`, first ? errorField(first) : undefined, {
      errors: errors.map((e) => ({ path: errorField(e), message: e.message })),
    });
  }

  const model: Model = {
    name: input.name,
    version: input.version ?? '1.0',
    source: input.source ?? '',
    entities: (input.entities ?? []).map(toEntity),
    relationships: (input.relationships ?? []).map(toRelationship),
    business_rules: (input.business_rules ?? []).map(toBusinessRule),
    metadata: copyMetadata(input.metadata ?? {}),
  };

  if (options.rejectDuplicates) {
    assertNoDuplicates(model);
  }

  return model;
}

function fromConstraint(constraint: Constraint): ConstraintDocument {
  return { type: constraint.type, value: constraint.value, message: constraint.message };
}

/**
 * Plain JSON-ready form of a Model, the inverse of parseModel.
 */
export function serializeModel(model: Model): ModelDocument {
  return {
    name: model.name,
    version: model.version,
    source: model.source,
    entities: model.entities.map((e) => ({
      name: e.name,
      description: e.description,
      entity_type: e.entity_type,
      ...(e.source_table !== undefined ? { source_table: e.source_table } : {}),
      properties: e.properties.map((p) => ({
        name: p.name,
        data_type: p.data_type,
        required: p.required,
        unique: p.unique,
        description: p.description,
        ...(p.source_column !== undefined ? { source_column: p.source_column } : {}),
        constraints: p.constraints.map(fromConstraint),
      })),
      constraints: e.constraints.map(fromConstraint),
    })),
    relationships: model.relationships.map((r) => ({ ...r })),
    business_rules: model.business_rules.map((r) => ({ ...r })),
    metadata: copyMetadata(model.metadata),
  };
}
