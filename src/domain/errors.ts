export class UnsupportedComparisonError extends Error {
  readonly left: string;
  readonly right: string;

  constructor(left: string, right: string, message?: string) {
    super(message ?? `Cannot order ${left} against ${right}: neither comparable entities nor type tags`);
    this.name = 'UnsupportedComparisonError';
    this.left = left;
    this.right = right;
  }
}

/**
 * Raised for anything that goes wrong while walking a snapshot: a malformed attribute value,
 * or a provider throwing while a value is read. Serialization never returns partial output.
 */
export class UnexpectedStateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnexpectedStateError';
  }
}

/** Short label of an arbitrary value for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  if ('kind' in value && typeof value.kind === 'string') return `"${value.kind}"`;
  return Array.isArray(value) ? 'array' : 'object';
}
