/**
 * Domain model exports.
 */

export * from './entity';
export * from './errors';
export * from './event';
export * from './test-run';
