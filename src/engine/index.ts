/**
 * Runner exports.
 */

export * from './completion-barrier';
export * from './runner';
