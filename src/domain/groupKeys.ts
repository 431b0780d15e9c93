import type { GroupKey } from './types';

export function groupKeyEquals(a: GroupKey | null, b: GroupKey | null): boolean {
  if (!a || !b) return false;
  return a.catalog === b.catalog && a.schema === b.schema;
}

/** "catalog / schema" when the source has two-level namespaces, else just the catalog. */
export function getGroupKeyLabel(key: GroupKey, twoLevel: boolean): string {
  return twoLevel ? `${key.catalog} / ${key.schema}` : key.catalog;
}

/** Equal keys collapse to the first occurrence. */
export function uniqueGroupKeys(keys: readonly GroupKey[]): GroupKey[] {
  const out: GroupKey[] = [];
  for (const key of keys) {
    if (!out.some((k) => groupKeyEquals(k, key))) out.push(key);
  }
  return out;
}
