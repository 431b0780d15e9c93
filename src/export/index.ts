export * from './contracts/SerializerOptions';
export * from './contracts/SnapshotSerializer';
export * from './defaultSerializerOptions';

export * from './helpers/text';

export * from './readable/renderEntity';
export * from './readable/renderSnapshot';
export * from './readable/readableSnapshotSerializer';

export * from './registry';
export * from './builtins';
