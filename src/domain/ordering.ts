import type { Entity, GroupKey, TypeTag } from './types';
import { UnsupportedComparisonError, describeValue } from './errors';

/**
 * Deterministic ordering for snapshot output.
 *
 * All comparisons use UTF-16 code unit order (not locale collation) so the output does not
 * depend on the host's locale. Every sort returns a new array.
 */

export type Sortable = Entity | TypeTag;

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isEntity(value: unknown): value is Entity {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'entity';
}

export function isTypeTag(value: unknown): value is TypeTag {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'type';
}

export function compareTypeTags(a: TypeTag, b: TypeTag): number {
  return compareStrings(a.fullName, b.fullName);
}

function compareGroupKeys(a: GroupKey | null, b: GroupKey | null): number {
  if (!a || !b) return a ? 1 : b ? -1 : 0;
  return compareStrings(a.catalog, b.catalog) || compareStrings(a.schema, b.schema);
}

/** Natural entity order: name, then owning group (ungrouped first), then type. */
export function compareEntities(a: Entity, b: Entity): number {
  return compareStrings(a.name, b.name) || compareGroupKeys(a.group, b.group) || compareTypeTags(a.type, b.type);
}

export function compareElements(a: Sortable, b: Sortable): number {
  if (isEntity(a) && isEntity(b)) return compareEntities(a, b);
  if (isTypeTag(a) && isTypeTag(b)) return compareTypeTags(a, b);
  throw new UnsupportedComparisonError(describeValue(a), describeValue(b));
}

/** Order a homogeneous collection of entities or type tags. Mixed input throws. */
export function sortElements<T extends Sortable>(items: readonly T[]): T[] {
  return [...items].sort(compareElements);
}

export function sortTypeTags(types: readonly TypeTag[]): TypeTag[] {
  return [...types].sort(compareTypeTags);
}

export function sortEntities(list: readonly Entity[]): Entity[] {
  return [...list].sort(compareEntities);
}

export function sortAttributeNames(names: Iterable<string>): string[] {
  return [...names].sort(compareStrings);
}
