/**
 * Volume lifecycle observer.
 *
 * Watches claims, pods and volume attachments while a storage test case
 * runs, records every lifecycle transition as a timestamped event and
 * derives stage durations from the recorded timeline afterwards.
 */

export { createApp, createAppContext } from './server';
export type { AppContext } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './storage';
export * from './observer';
export * from './engine';
export * from './metrics';
export * from './kube';
