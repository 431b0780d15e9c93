import type {
  AttributeValue,
  Entity,
  GroupKey,
  ScalarValue,
  Snapshot,
  SnapshotSource,
  StructuralTypes,
  TypeTag
} from './types';

function requireNonBlank(value: string, field: string): void {
  if (value.trim().length === 0) {
    throw new Error(`${field} must be a non-empty string`);
  }
}

export function createTypeTag(fullName: string): TypeTag {
  requireNonBlank(fullName, 'TypeTag.fullName');
  return { kind: 'type', fullName };
}

/** Single-level sources use the catalog name for both parts. */
export function createGroupKey(catalog: string, schema?: string): GroupKey {
  requireNonBlank(catalog, 'GroupKey.catalog');
  return { catalog, schema: schema ?? catalog };
}

export type CreateEntityInput = {
  type: TypeTag;
  name: string;
  group?: GroupKey | null;
  attributes?: Record<string, AttributeValue>;
  raw?: Record<string, string | null>;
};

export function createEntity(input: CreateEntityInput): Entity {
  requireNonBlank(input.name, 'Entity.name');
  const entity: Entity = {
    kind: 'entity',
    type: input.type,
    name: input.name,
    group: input.group ?? null,
    attributes: { ...(input.attributes ?? {}) }
  };
  if (input.raw) entity.raw = { ...input.raw };
  return entity;
}

export type CreateSnapshotInput = {
  source: SnapshotSource;
  structuralTypes: StructuralTypes;
  includedTypes: TypeTag[];
  groupingKeys?: GroupKey[];
  supportsTwoLevelGrouping?: boolean;
  /** Entities of any type; bucketed by `entity.type.fullName`. */
  entities?: Entity[];
};

export function createSnapshot(input: CreateSnapshotInput): Snapshot {
  const entities: Record<string, Entity[]> = {};
  for (const entity of input.entities ?? []) {
    const key = entity.type.fullName;
    (entities[key] ??= []).push(entity);
  }
  return {
    source: { ...input.source },
    supportsTwoLevelGrouping: input.supportsTwoLevelGrouping ?? true,
    groupingKeys: [...(input.groupingKeys ?? [])],
    includedTypes: [...input.includedTypes],
    entities,
    structuralTypes: { ...input.structuralTypes }
  };
}

export function getEntitiesOf(snapshot: Snapshot, type: TypeTag): readonly Entity[] {
  return snapshot.entities[type.fullName] ?? [];
}

// Attribute value constructors.

export function scalar(value: ScalarValue): AttributeValue {
  return { kind: 'scalar', value };
}

export function ref(target: Entity): AttributeValue {
  return { kind: 'ref', target };
}

export function entities(items: Entity[]): AttributeValue {
  return { kind: 'entities', items };
}

export function scalars(items: ScalarValue[]): AttributeValue {
  return { kind: 'scalars', items };
}

export const NULL_VALUE: AttributeValue = { kind: 'null' };
