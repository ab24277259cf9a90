export type ChangeType = 'added' | 'removed' | 'modified';

export type ElementType = 'entity' | 'property' | 'relationship' | 'rule' | 'metadata';

export const ELEMENT_TYPES: readonly ElementType[] = [
  'entity',
  'property',
  'relationship',
  'rule',
  'metadata',
];

export type EntityField = 'entity_type' | 'description';
export type PropertyField = 'data_type' | 'required' | 'unique';
export type RelationshipField = 'relationship_type' | 'cardinality';
export type RuleField = 'condition' | 'action' | 'classification';

/**
 * Structured location of the changed element. `field` is set only on modifications.
 */
export type ElementRef =
  | { element: 'entity'; entity: string; field?: EntityField }
  | { element: 'property'; entity: string; property: string; field?: PropertyField }
  | {
      element: 'relationship';
      key: string;
      from_entity: string;
      to_entity: string;
      field?: RelationshipField;
    }
  | { element: 'rule'; rule: string; field?: RuleField }
  | { element: 'metadata'; key: string };

export interface Change {
  change_type: ChangeType;
  element_type: ElementType;
  element_name: string;
  /** e.g. "Customer", "Customer.Email.data_type", "Order→Customer.cardinality", "rule:HighValue" */
  path: string;
  old_value: string | null;
  new_value: string | null;
  details: string;
  ref: ElementRef;
}

export interface DiffSummary {
  total_changes: number;
  added: number;
  removed: number;
  modified: number;
  /** Only element types with at least one change appear. */
  by_element: Partial<Record<ElementType, number>>;
}

export interface ModelVersionRef {
  name: string;
  version: string;
}

export interface DiffReport {
  source: ModelVersionRef;
  target: ModelVersionRef;
  changes: Change[];
  summary: DiffSummary;
}

/** JSON-ready report without the internal element refs. */
export interface DiffReportDocument {
  source: ModelVersionRef;
  target: ModelVersionRef;
  has_changes: boolean;
  summary: DiffSummary;
  changes: Array<Omit<Change, 'ref'>>;
}
