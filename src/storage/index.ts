export * from './manager';
export * from './memory-manager';
