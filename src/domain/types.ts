/**
 * Core domain types for database snapshots.
 *
 * A snapshot is captured elsewhere and handed to the serializers fully built. Everything
 * in here is plain data; the serializers only read it.
 */

export type TypeTag = {
  kind: 'type';
  /** Fully-qualified type name, e.g. "db.core.Table". Used for ordering and listing headers. */
  fullName: string;
};

/** Owning namespace of an entity: a catalog + schema pair. Compared structurally. */
export type GroupKey = {
  catalog: string;
  schema: string;
};

export type ScalarValue = string | number | boolean | bigint;

export type AttributeValue =
  | { kind: 'scalar'; value: ScalarValue }
  | { kind: 'ref'; target: Entity }
  | { kind: 'entities'; items: Entity[] }
  | { kind: 'scalars'; items: ScalarValue[] }
  | { kind: 'null' };

export type AttributeValueKind = AttributeValue['kind'];

export interface Entity {
  kind: 'entity';
  type: TypeTag;
  name: string;
  group: GroupKey | null;
  attributes: Record<string, AttributeValue>;
  /**
   * Opaque display strings supplied by the snapshot provider, keyed by attribute name.
   * Used in place of the derived representation whenever a value is not expanded.
   */
  raw?: Record<string, string | null>;
}

/** Descriptive connection strings printed in the document header. Never interpreted. */
export type SnapshotSource = {
  url: string;
  productName: string;
  productVersion: string;
  user: string;
};

export type StructuralTypes = {
  /** The type whose instances are the group keys (e.g. Schema). */
  group: TypeTag;
  /** The type containing groups (e.g. Catalog). */
  container?: TypeTag;
  /** Fine-grained leaf type rendered only inside its owners (e.g. Column). */
  leaf?: TypeTag;
};

export interface Snapshot {
  source: SnapshotSource;
  /** Whether the source distinguishes schemas inside catalogs. */
  supportsTwoLevelGrouping: boolean;
  groupingKeys: GroupKey[];
  includedTypes: TypeTag[];
  /** Entity instances keyed by type full name. */
  entities: Record<string, Entity[]>;
  structuralTypes: StructuralTypes;
}
