import { getSerializers, registerSerializer } from './registry';

// Keep these imports pointed at concrete modules (avoid importing ./index to prevent cycles).
import { READABLE_SERIALIZER_ID, createReadableSnapshotSerializer } from './readable/readableSnapshotSerializer';

/** Register built-in serializers once (default options). */
export function registerBuiltInSerializers(): void {
  if (getSerializers().some((s) => s.id === READABLE_SERIALIZER_ID)) return;
  registerSerializer(createReadableSnapshotSerializer());
}
