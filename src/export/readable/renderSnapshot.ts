import type { Entity, GroupKey, Snapshot, TypeTag } from '../../domain/types';
import { getEntitiesOf } from '../../domain/factories';
import { getGroupKeyLabel, groupKeyEquals, uniqueGroupKeys } from '../../domain/groupKeys';
import { compareStrings, sortEntities, sortTypeTags } from '../../domain/ordering';
import { DIVIDER, indent, normalizeNewlines } from '../helpers/text';
import { renderEntityBlock, type RenderContext } from './renderEntity';

function isStructuralType(snapshot: Snapshot, type: TypeTag): boolean {
  const { group, container, leaf } = snapshot.structuralTypes;
  return [group, container, leaf].some((t) => t?.fullName === type.fullName);
}

/** "<Type>:" followed by each entity block, or null when the type has nothing to list. */
export function renderTypeListing(type: TypeTag, list: readonly Entity[], ctx: RenderContext): string | null {
  if (list.length === 0) return null;
  const blocks = sortEntities(list).map((entity) => renderEntityBlock(entity, ctx));
  return `${type.fullName}:\n${indent(blocks.join('\n'))}`;
}

/** Type listings (sorted types, one blank line apart) of the entities owned by `group`. */
export function renderGroupSection(snapshot: Snapshot, group: GroupKey, ctx: RenderContext): string {
  const listings: string[] = [];
  for (const type of sortTypeTags(snapshot.includedTypes)) {
    if (isStructuralType(snapshot, type)) continue;
    const owned = getEntitiesOf(snapshot, type).filter((entity) => groupKeyEquals(entity.group, group));
    const listing = renderTypeListing(type, owned, ctx);
    if (listing !== null) listings.push(listing);
  }
  return listings.join('\n\n');
}

export function sortGroupKeys(snapshot: Snapshot): GroupKey[] {
  const twoLevel = snapshot.supportsTwoLevelGrouping;
  return uniqueGroupKeys(snapshot.groupingKeys).sort((a, b) =>
    compareStrings(getGroupKeyLabel(a, twoLevel), getGroupKeyLabel(b, twoLevel))
  );
}

function groupHeader(group: GroupKey, twoLevel: boolean): string {
  return twoLevel ? `Catalog & Schema: ${getGroupKeyLabel(group, true)}` : `Catalog: ${getGroupKeyLabel(group, false)}`;
}

/** The whole readable document. Pure: same snapshot and depth give the same text. */
export function renderSnapshot(snapshot: Snapshot, expandDepth: number): string {
  const ctx: RenderContext = { expandDepth, groupType: snapshot.structuralTypes.group };
  const { source } = snapshot;

  const lines: string[] = [
    `Database snapshot for ${source.url}`,
    DIVIDER,
    `Database type: ${source.productName}`,
    `Database version: ${source.productVersion}`,
    `Database user: ${source.user}`,
    'Included types:'
  ];
  const typeNames = sortTypeTags(snapshot.includedTypes).map((t) => t.fullName);
  if (typeNames.length > 0) lines.push(indent(typeNames.join('\n')));

  for (const group of sortGroupKeys(snapshot)) {
    lines.push('', groupHeader(group, snapshot.supportsTwoLevelGrouping));
    const section = renderGroupSection(snapshot, group, ctx);
    if (section) lines.push(indent(section));
  }

  return normalizeNewlines(`${lines.join('\n')}\n`);
}
