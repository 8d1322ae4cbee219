/**
 * Domain model exports.
 */

export * from './error-mapping';
export * from './errors';
export * from './payload';
export * from './tenant';
