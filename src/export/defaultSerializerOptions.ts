import type { SerializerOptions } from './contracts/SerializerOptions';

export const DEFAULT_SERIALIZER_OPTIONS: Readonly<SerializerOptions> = {
  expandDepth: 1
};

function warn(msg: string): void {
  // eslint-disable-next-line no-console
  console.warn(`[snapshot-serializer] ${msg}`);
}

function isValidDepth(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Merge caller options over the defaults.
 * Invalid values are dropped (with a warning) rather than failing serializer construction.
 */
export function resolveSerializerOptions(options?: Partial<SerializerOptions>): SerializerOptions {
  const resolved: SerializerOptions = { ...DEFAULT_SERIALIZER_OPTIONS };
  const depth = options?.expandDepth;
  if (depth !== undefined) {
    if (isValidDepth(depth)) resolved.expandDepth = depth;
    else warn(`Ignoring invalid expandDepth ${String(depth)}; using ${DEFAULT_SERIALIZER_OPTIONS.expandDepth}.`);
  }
  return resolved;
}
