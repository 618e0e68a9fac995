/**
 * Metrics exports.
 */

export * from './collector';
