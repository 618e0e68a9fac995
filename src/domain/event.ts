/**
 * Lifecycle event domain model.
 *
 * An event is an immutable fact: entity E underwent transition T at time t
 * within test case C. Observers buffer events in memory and persist them as
 * one batch when their session ends.
 */

import { v4 as uuid } from 'uuid';

/** Transition tags, grouped by the observer that records them. */
export enum EventType {
  PvcAdded = 'PVC_ADDED',
  PvcBound = 'PVC_BOUND',
  PvcDeletingStarted = 'PVC_DELETING_STARTED',
  PvcDeletingEnded = 'PVC_DELETING_ENDED',
  PodAdded = 'POD_ADDED',
  PodReady = 'POD_READY',
  PodTerminating = 'POD_TERMINATING',
  PodDeleted = 'POD_DELETED',
  VaAdded = 'VA_ADDED',
  VaAttached = 'VA_ATTACHED',
  VaDeletingStarted = 'VA_DELETING_STARTED',
  VaDeletingEnded = 'VA_DELETING_ENDED',
}

export const ALL_EVENT_TYPES: readonly EventType[] = Object.values(EventType);

/** A persisted lifecycle event. */
export interface Event {
  id: string;
  /** Debug name, e.g. "event-pvc-added-1a2b3c4d". */
  name: string;
  tcId: string;
  entityId: string;
  type: EventType;
  /** ISO-8601 timestamp taken when the notification was handled. */
  timestamp: string;
}

/** Short random suffix for generated resource and event names. */
export function randomSuffix(): string {
  return uuid().replace(/-/g, '').slice(0, 8);
}

/** Build an event debug name from the observed kind and notification verb. */
export function eventName(kind: string, verb: 'added' | 'modified' | 'deleted'): string {
  return `event-${kind}-${verb}-${randomSuffix()}`;
}

/** Order events by timestamp; equal timestamps keep their relative order. */
export function sortByTimestamp(events: readonly Event[]): Event[] {
  return events
    .map((event, index) => ({ event, index, at: Date.parse(event.timestamp) }))
    .sort((a, b) => a.at - b.at || a.index - b.index)
    .map(({ event }) => event);
}
