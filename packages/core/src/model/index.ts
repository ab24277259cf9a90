export { parseModel, serializeModel } from './model-parser.js';
export { loadModelFromFile, loadModelsFromDirectory } from './model-loader.js';
export { MODEL_SCHEMA } from './model-schema.js';
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
} from './types.js';
