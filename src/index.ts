export * from './domain';
export * from './export';
