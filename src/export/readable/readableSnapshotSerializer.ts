import type { Snapshot } from '../../domain/types';
import { UnexpectedStateError } from '../../domain/errors';
import type { SerializerOptions } from '../contracts/SerializerOptions';
import type { ByteSink, SnapshotSerializer } from '../contracts/SnapshotSerializer';
import { resolveSerializerOptions } from '../defaultSerializerOptions';
import { renderSnapshot } from './renderSnapshot';

export const READABLE_SERIALIZER_ID = 'readable-text';

export type ReadableSnapshotSerializer = SnapshotSerializer & {
  readonly expandDepth: number;
};

/**
 * Plain-text snapshot rendering for diffing and review. Write-only: the output is not meant
 * to be parsed back.
 */
export function createReadableSnapshotSerializer(options?: Partial<SerializerOptions>): ReadableSnapshotSerializer {
  const { expandDepth } = resolveSerializerOptions(options);

  const serialize = (snapshot: Snapshot): string => {
    try {
      return renderSnapshot(snapshot, expandDepth);
    } catch (e) {
      if (e instanceof UnexpectedStateError) throw e;
      const reason = e instanceof Error ? e.message : String(e);
      throw new UnexpectedStateError(`Failed to serialize snapshot: ${reason}`, { cause: e });
    }
  };

  return {
    id: READABLE_SERIALIZER_ID,
    format: 'txt',
    extensions: ['txt'],
    expandDepth,
    serialize,
    write: (snapshot: Snapshot, out: ByteSink) => {
      out.write(new TextEncoder().encode(serialize(snapshot)));
    }
  };
}
