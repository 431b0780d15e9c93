import type { SnapshotSerializer } from './contracts/SnapshotSerializer';

const registry: SnapshotSerializer[] = [];

export class UnsupportedSerializerFormatError extends Error {
  readonly extension: string;

  constructor(extension: string, message?: string) {
    super(message ?? `No serializer registered for extension: ${extension}`);
    this.name = 'UnsupportedSerializerFormatError';
    this.extension = extension;
  }
}

function warn(msg: string): void {
  // eslint-disable-next-line no-console
  console.warn(`[snapshot-serializer] ${msg}`);
}

export type RegisterSerializerOptions = {
  /** Replace an existing serializer with the same id instead of throwing. */
  replace?: boolean;
};

export function registerSerializer(serializer: SnapshotSerializer, options: RegisterSerializerOptions = {}): void {
  const id = serializer.id.trim();
  if (!id) throw new Error('Serializer id must be a non-empty string.');

  const idx = registry.findIndex((x) => x.id === id);
  if (idx >= 0) {
    if (!options.replace) throw new Error(`Serializer id already registered: "${id}"`);
    warn(`Replacing serializer "${id}".`);
    registry.splice(idx, 1);
  }
  registry.push(serializer);
  // Deterministic lookup order when several serializers claim an extension.
  registry.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export function getSerializers(): readonly SnapshotSerializer[] {
  return registry;
}

export function clearSerializersForTests(): void {
  registry.length = 0;
}

/** "out/snapshot.TXT" -> "txt"; a bare extension is returned lowercased. */
export function getExtension(fileNameOrExtension: string): string {
  const trimmed = fileNameOrExtension.trim();
  const idx = trimmed.lastIndexOf('.');
  return (idx >= 0 ? trimmed.slice(idx + 1) : trimmed).toLowerCase();
}

/** Select the serializer for a file name or extension. */
export function pickSerializer(fileNameOrExtension: string): SnapshotSerializer {
  const extension = getExtension(fileNameOrExtension);
  const match = registry.find((s) => s.extensions.includes(extension));
  if (!match) {
    throw new UnsupportedSerializerFormatError(
      extension,
      `No serializer matched "${fileNameOrExtension}" (ext: ${extension || 'none'})`
    );
  }
  return match;
}
