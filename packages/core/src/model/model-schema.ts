import type { Schema } from 'ajv';

const constraintSchema = {
  type: 'object',
  required: ['type', 'value'],
  properties: {
    type: { type: 'string' },
    value: { type: 'string' },
    message: { type: 'string' },
  },
} as const;

const propertySchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    data_type: { type: 'string' },
    required: { type: 'boolean' },
    unique: { type: 'boolean' },
    description: { type: 'string' },
    source_column: { type: 'string' },
    constraints: { type: 'array', items: constraintSchema },
  },
} as const;

const entitySchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    entity_type: { type: 'string' },
    source_table: { type: 'string' },
    properties: { type: 'array', items: propertySchema },
    constraints: { type: 'array', items: constraintSchema },
  },
} as const;

const relationshipSchema = {
  type: 'object',
  required: ['from_entity', 'to_entity'],
  properties: {
    from_entity: { type: 'string', minLength: 1 },
    to_entity: { type: 'string', minLength: 1 },
    from_property: { type: 'string' },
    to_property: { type: 'string' },
    relationship_type: { type: 'string' },
    cardinality: { type: 'string' },
    description: { type: 'string' },
    source_relationship: { type: 'string' },
  },
} as const;

const businessRuleSchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    entity: { type: 'string' },
    condition: { type: 'string' },
    action: { type: 'string' },
    classification: { type: 'string' },
    description: { type: 'string' },
    priority: { type: 'integer' },
    source_measure: { type: 'string' },
  },
} as const;

const metadataValueSchema = {
  anyOf: [
    { type: 'string' },
    { type: 'number' },
    { type: 'boolean' },
    { type: 'array', items: { type: 'string' } },
  ],
} as const;

export const MODEL_SCHEMA: Schema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    version: { type: 'string' },
    source: { type: 'string' },
    entities: { type: 'array', items: entitySchema },
    relationships: { type: 'array', items: relationshipSchema },
    business_rules: { type: 'array', items: businessRuleSchema },
    metadata: { type: 'object', additionalProperties: metadataValueSchema },
  },
};
