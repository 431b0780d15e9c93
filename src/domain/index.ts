export * from './types';
export * from './errors';
export * from './factories';
export * from './groupKeys';
export * from './ordering';
