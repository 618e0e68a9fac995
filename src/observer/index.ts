/**
 * Observer exports.
 */

export * from './watch';
export * from './handoff-registry';
export * from './observer';
export * from './watch-observer';
export * from './pvc-observer';
export * from './pod-observer';
export * from './volume-attachment-observer';
export * from './entity-number-observer';
