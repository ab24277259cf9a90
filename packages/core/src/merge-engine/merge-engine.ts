import { indexBy } from '../comparator/index.js';
import { diff, relationshipKey } from '../diff-engine/index.js';
import type { Change } from '../diff-engine/index.js';
import type {
  BusinessRule,
  Entity,
  MetadataValue,
  Model,
  Property,
  Relationship,
} from '../model/index.js';
import { traced } from '../observability/index.js';
import { ValidationError } from '../shared/errors.js';
import { MERGE_STRATEGIES } from './types.js';
import type { MergeConflict, MergeResult, MergeStrategy } from './types.js';
import { incrementVersion } from './version.js';

interface ModelIndex {
  entities: Map<string, Entity>;
  relationships: Map<string, Relationship>;
  rules: Map<string, BusinessRule>;
  metadata: Record<string, MetadataValue>;
}

function indexModel(model: Model): ModelIndex {
  return {
    entities: indexBy(model.entities, (e) => e.name),
    relationships: indexBy(model.relationships, relationshipKey),
    rules: indexBy(model.business_rules, (r) => r.name),
    metadata: { ...model.metadata },
  };
}

function withField<T, K extends keyof T>(target: T, from: T, field: K): T {
  return { ...target, [field]: from[field] };
}

function upsertProperty(entity: Entity, property: Property): Entity {
  const exists = entity.properties.some((p) => p.name === property.name);
  return {
    ...entity,
    properties: exists
      ? entity.properties.map((p) => (p.name === property.name ? property : p))
      : [...entity.properties, property],
  };
}

function removeProperty(entity: Entity, name: string): Entity {
  return { ...entity, properties: entity.properties.filter((p) => p.name !== name) };
}

function findProperty(entity: Entity | undefined, name: string): Property | undefined {
  return entity?.properties.find((p) => p.name === name);
}

function setOrDelete<T>(map: Map<string, T>, key: string, value: T | undefined): void {
  if (value === undefined) {
    map.delete(key);
  } else {
    map.set(key, value);
  }
}

/**
 * Bring in an element that only their side added.
 */
function applyAddition(state: ModelIndex, change: Change, theirs: ModelIndex): void {
  const ref = change.ref;
  switch (ref.element) {
    case 'entity': {
      const entity = theirs.entities.get(ref.entity);
      if (entity) state.entities.set(ref.entity, entity);
      return;
    }
    case 'property': {
      const target = state.entities.get(ref.entity);
      const property = findProperty(theirs.entities.get(ref.entity), ref.property);
      if (target && property) state.entities.set(ref.entity, upsertProperty(target, property));
      return;
    }
    case 'relationship': {
      const relationship = theirs.relationships.get(ref.key);
      if (relationship) state.relationships.set(ref.key, relationship);
      return;
    }
    case 'rule': {
      const rule = theirs.rules.get(ref.rule);
      if (rule) state.rules.set(ref.rule, rule);
      return;
    }
    case 'metadata':
      // Already present through the metadata union.
      return;
  }
}

function takeTheirs(state: ModelIndex, change: Change, theirs: ModelIndex): void {
  const ref = change.ref;
  switch (ref.element) {
    case 'entity': {
      const theirEntity = theirs.entities.get(ref.entity);
      if (ref.field === undefined) {
        setOrDelete(state.entities, ref.entity, theirEntity);
        return;
      }
      const current = state.entities.get(ref.entity);
      if (current && theirEntity) {
        state.entities.set(ref.entity, withField(current, theirEntity, ref.field));
      }
      return;
    }
    case 'property': {
      const current = state.entities.get(ref.entity);
      if (!current) return;
      const theirProperty = findProperty(theirs.entities.get(ref.entity), ref.property);
      if (ref.field === undefined) {
        state.entities.set(
          ref.entity,
          theirProperty ? upsertProperty(current, theirProperty) : removeProperty(current, ref.property),
        );
        return;
      }
      const ourProperty = findProperty(current, ref.property);
      if (ourProperty && theirProperty) {
        state.entities.set(
          ref.entity,
          upsertProperty(current, withField(ourProperty, theirProperty, ref.field)),
        );
      }
      return;
    }
    case 'relationship': {
      const theirRelationship = theirs.relationships.get(ref.key);
      if (ref.field === undefined) {
        setOrDelete(state.relationships, ref.key, theirRelationship);
        return;
      }
      const current = state.relationships.get(ref.key);
      if (current && theirRelationship) {
        state.relationships.set(ref.key, withField(current, theirRelationship, ref.field));
      }
      return;
    }
    case 'rule': {
      const theirRule = theirs.rules.get(ref.rule);
      if (ref.field === undefined) {
        setOrDelete(state.rules, ref.rule, theirRule);
        return;
      }
      const current = state.rules.get(ref.rule);
      if (current && theirRule) {
        state.rules.set(ref.rule, withField(current, theirRule, ref.field));
      }
      return;
    }
    case 'metadata': {
      const value = theirs.metadata[ref.key];
      if (value === undefined) {
        delete state.metadata[ref.key];
      } else {
        state.metadata[ref.key] = value;
      }
      return;
    }
  }
}

function takeUnion(state: ModelIndex, change: Change, theirs: ModelIndex): void {
  const ref = change.ref;
  if (ref.element !== 'entity' || ref.field !== undefined) return;

  const current = state.entities.get(ref.entity);
  const theirEntity = theirs.entities.get(ref.entity);
  if (!current || !theirEntity) return;

  const known = new Set(current.properties.map((p) => p.name));
  const extra = theirEntity.properties.filter((p) => !known.has(p.name));
  if (extra.length > 0) {
    state.entities.set(ref.entity, { ...current, properties: [...current.properties, ...extra] });
  }
}

function resolveConflict(
  state: ModelIndex,
  change: Change,
  theirs: ModelIndex,
  strategy: MergeStrategy,
): void {
  if (strategy === 'theirs') {
    takeTheirs(state, change, theirs);
  } else if (strategy === 'union') {
    takeUnion(state, change, theirs);
  }
}

export function isMergeStrategy(value: unknown): value is MergeStrategy {
  return typeof value === 'string' && MERGE_STRATEGIES.some((s) => s === value);
}

/**
 * Three-way merge of two divergent edits of a common ancestor.
 *
 * The merge starts from `ours`, adds everything only `theirs` added, and records one
 * conflict per path both sides changed; the strategy decides which value that path keeps.
 * Name and source come from `ours`; the version is `ours.version` bumped.
 */
export function merge(
  base: Model,
  ours: Model,
  theirs: Model,
  strategy: MergeStrategy = 'ours',
): MergeResult {
  if (!isMergeStrategy(strategy)) {
    throw new ValidationError(
      `Unknown merge strategy "${String(strategy)}" (expected ${MERGE_STRATEGIES.join(', ')})`,
      'strategy',
    );
  }

  return traced(
    'semdiff.merge',
    { 'semdiff.ours': ours.name, 'semdiff.theirs': theirs.name, 'semdiff.strategy': strategy },
    (span) => {
      const ourDiff = diff(base, ours);
      const theirDiff = diff(base, theirs);

      const ourChanges = new Map(ourDiff.changes.map((c) => [c.path, c]));
      const conflictPaths = new Set(
        theirDiff.changes.map((c) => c.path).filter((path) => ourChanges.has(path)),
      );

      const state = indexModel(ours);
      state.metadata = { ...base.metadata, ...theirs.metadata, ...ours.metadata };
      const theirIndex = indexModel(theirs);

      for (const change of theirDiff.changes) {
        if (change.change_type === 'added' && !conflictPaths.has(change.path)) {
          applyAddition(state, change, theirIndex);
        }
      }

      const conflicts: MergeConflict[] = [];
      const recorded = new Set<string>();
      for (const change of theirDiff.changes) {
        if (!conflictPaths.has(change.path)) continue;

        const key = `${change.element_type}|${change.path}`;
        if (recorded.has(key)) continue;
        recorded.add(key);

        conflicts.push({
          path: change.path,
          element_type: change.element_type,
          resolution: strategy,
          ours_value: ourChanges.get(change.path)?.new_value ?? null,
          theirs_value: change.new_value,
        });
        resolveConflict(state, change, theirIndex, strategy);
      }
      span.setAttribute('semdiff.conflicts', conflicts.length);

      const merged: Model = {
        name: ours.name,
        version: incrementVersion(ours.version),
        source: ours.source,
        entities: [...state.entities.values()],
        relationships: [...state.relationships.values()],
        business_rules: [...state.rules.values()],
        metadata: { ...state.metadata, merged_from: [ours.name, theirs.name] },
      };

      return { merged, conflicts };
    },
  );
}
