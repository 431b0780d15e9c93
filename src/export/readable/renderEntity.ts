import type { AttributeValue, Entity, TypeTag } from '../../domain/types';
import { UnexpectedStateError, describeValue } from '../../domain/errors';
import { sortAttributeNames } from '../../domain/ordering';
import { indent } from '../helpers/text';

/** Attributes that place an entity rather than describe it. */
const STRUCTURAL_ATTRIBUTES: ReadonlySet<string> = new Set(['name', 'schema', 'catalog']);

export type RenderContext = {
  expandDepth: number;
  /** References to entities of this type are structural and never rendered. */
  groupType?: TypeTag;
};

function unsupportedValue(entity: Entity, attribute: string, value: never): UnexpectedStateError {
  return new UnexpectedStateError(
    `Unsupported value ${describeValue(value)} for attribute "${attribute}" of "${entity.name}"`
  );
}

/**
 * The representation used when a value is printed as-is (not expanded).
 * Provider-supplied `raw` strings win over the derived form; `null` means "no line".
 */
export function rawRepresentation(entity: Entity, attribute: string, value: AttributeValue): string | null {
  if (entity.raw && Object.hasOwn(entity.raw, attribute)) return entity.raw[attribute] ?? null;
  switch (value.kind) {
    case 'scalar':
      return String(value.value);
    case 'ref':
      return value.target.name;
    case 'entities':
      return value.items.map((item) => item.name).join(', ');
    case 'scalars':
      return value.items.map((item) => String(item)).join(', ');
    case 'null':
      return null;
    default:
      throw unsupportedValue(entity, attribute, value);
  }
}

function line(attribute: string, value: string | null): string | null {
  if (value === null || value.length === 0) return null;
  return `${attribute}: ${value}`;
}

/** Name line, followed by the entity's own block one level deeper (if it has one). */
function renderNested(target: Entity, pathNames: ReadonlySet<string>, ownerName: string, ctx: RenderContext): string {
  const block = renderEntity(target, pathNames, ownerName, ctx);
  return block ? `${target.name}\n${indent(block)}` : target.name;
}

function renderAttribute(
  entity: Entity,
  attribute: string,
  pathNames: ReadonlySet<string>,
  expand: boolean,
  ctx: RenderContext
): string | null {
  const value = entity.attributes[attribute];
  switch (value.kind) {
    case 'ref': {
      const target = value.target;
      if (ctx.groupType && target.type.fullName === ctx.groupType.fullName) return null;
      if (pathNames.has(target.name)) return null;
      if (!expand) return line(attribute, rawRepresentation(entity, attribute, value));
      return line(attribute, renderNested(target, pathNames, entity.name, ctx));
    }
    case 'entities': {
      if (value.items.length === 0) return null;
      if (!expand) return line(attribute, rawRepresentation(entity, attribute, value));
      // Every element sees the same path; one sibling's expansion never suppresses another.
      const blocks = value.items
        .filter((item) => !pathNames.has(item.name))
        .map((item) => renderNested(item, pathNames, entity.name, ctx));
      if (blocks.length === 0) return null;
      return `${attribute}:\n${indent(blocks.join('\n'))}`;
    }
    case 'scalar':
    case 'scalars':
    case 'null':
      return line(attribute, rawRepresentation(entity, attribute, value));
    default:
      throw unsupportedValue(entity, attribute, value);
  }
}

/**
 * Render the attribute block of one entity (without its name line).
 *
 * `visitedNames` are the names already on the recursive path and `ownerName` is the entity
 * whose attribute led here (the entity itself at the top level). Nested entities are expanded
 * while the path holds at most `ctx.expandDepth` names; a reference to a name already on the
 * path is dropped. Names are compared by string only, regardless of type.
 */
export function renderEntity(
  entity: Entity,
  visitedNames: ReadonlySet<string>,
  ownerName: string,
  ctx: RenderContext
): string {
  const pathNames = new Set(visitedNames);
  pathNames.add(ownerName);
  const expand = pathNames.size <= ctx.expandDepth;

  const lines: string[] = [];
  for (const attribute of sortAttributeNames(Object.keys(entity.attributes))) {
    if (STRUCTURAL_ATTRIBUTES.has(attribute)) continue;
    const rendered = renderAttribute(entity, attribute, pathNames, expand, ctx);
    if (rendered !== null) lines.push(rendered);
  }
  return lines.join('\n');
}

/** Top-level rendering of a listed entity: its name, then its attribute block. */
export function renderEntityBlock(entity: Entity, ctx: RenderContext): string {
  return renderNested(entity, new Set<string>(), entity.name, ctx);
}
