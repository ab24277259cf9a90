export type MetadataValue = string | number | boolean | string[];

export interface Constraint {
  readonly type: string;
  readonly value: string;
  readonly message: string;
}

export interface Property {
  readonly name: string;
  readonly data_type: string;
  readonly required: boolean;
  readonly unique: boolean;
  readonly description: string;
  readonly constraints: readonly Constraint[];
  readonly source_column?: string;
}

export interface Entity {
  readonly name: string;
  readonly description: string;
  readonly entity_type: string;
  readonly properties: readonly Property[];
  readonly constraints: readonly Constraint[];
  readonly source_table?: string;
}

/**
 * Identity across models is the (from_entity, to_entity) pair; two relationships
 * between the same entities inside one model collapse to the later one.
 */
export interface Relationship {
  readonly from_entity: string;
  readonly to_entity: string;
  readonly from_property: string;
  readonly to_property: string;
  readonly relationship_type: string;
  readonly cardinality: string;
  readonly description: string;
  readonly source_relationship?: string;
}

export interface BusinessRule {
  readonly name: string;
  readonly entity: string;
  readonly condition: string;
  readonly action: string;
  readonly classification: string;
  readonly description: string;
  readonly priority: number;
  readonly source_measure?: string;
}

export interface Model {
  readonly name: string;
  readonly version: string;
  readonly source: string;
  readonly entities: readonly Entity[];
  readonly relationships: readonly Relationship[];
  readonly business_rules: readonly BusinessRule[];
  readonly metadata: Readonly<Record<string, MetadataValue>>;
}

/** Loosely-typed interchange shape accepted at the model boundary; omitted fields take defaults. */
export interface ConstraintDocument {
  type: string;
  value: string;
  message?: string;
}

export interface PropertyDocument {
  name: string;
  data_type?: string;
  required?: boolean;
  unique?: boolean;
  description?: string;
  source_column?: string;
  constraints?: ConstraintDocument[];
}

export interface EntityDocument {
  name: string;
  description?: string;
  entity_type?: string;
  source_table?: string;
  properties?: PropertyDocument[];
  constraints?: ConstraintDocument[];
}

export interface RelationshipDocument {
  from_entity: string;
  to_entity: string;
  from_property?: string;
  to_property?: string;
  relationship_type?: string;
  cardinality?: string;
  description?: string;
  source_relationship?: string;
}

export interface BusinessRuleDocument {
  name: string;
  entity?: string;
  condition?: string;
  action?: string;
  classification?: string;
  description?: string;
  priority?: number;
  source_measure?: string;
}

export interface ModelDocument {
  name: string;
  version?: string;
  source?: string;
  entities?: EntityDocument[];
  relationships?: RelationshipDocument[];
  business_rules?: BusinessRuleDocument[];
  metadata?: Record<string, MetadataValue>;
}

export interface ParseModelOptions {
  /** Throw instead of letting the later record win when a name repeats within its scope. */
  rejectDuplicates?: boolean;
}
