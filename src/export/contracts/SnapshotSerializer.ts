import type { Snapshot } from '../../domain/types';

/**
 * A short, stable identifier for a serializer implementation (e.g. "readable-text").
 * Must be unique in the registry.
 */
export type SerializerId = string;

/** Byte destination for `write`. Mirrors a Node stream / file handle's synchronous write. */
export type ByteSink = {
  write: (bytes: Uint8Array) => void;
};

export type SnapshotSerializer = {
  id: SerializerId;
  /** A short format label, e.g. "txt". */
  format: string;
  /** File extensions (lowercase, without dot) this serializer produces. */
  extensions: string[];
  serialize: (snapshot: Snapshot) => string;
  /** Serialize and hand the UTF-8 bytes to `out`. */
  write: (snapshot: Snapshot, out: ByteSink) => void;
};
