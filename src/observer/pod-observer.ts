import type { V1Pod } from '@kubernetes/client-node';
import { EntityType } from '../domain/entity';
import { EventType } from '../domain/event';
import { ObservedKind, WatchObserver } from './watch-observer';
import { isKubeObject } from './watch';

export function isPod(value: unknown): value is V1Pod {
  return isKubeObject(value, 'Pod');
}

/** A pod is ready once its Ready condition reports True. */
export function isPodReady(pod: V1Pod): boolean {
  return pod.status?.conditions?.some((c) => c.type === 'Ready' && c.status === 'True') ?? false;
}

/** Pods: Added -> Ready -> Terminating -> Deleted. */
export const POD_KIND: ObservedKind<V1Pod> = {
  name: 'PodObserver',
  slug: 'pod',
  resource: 'pods',
  matches: isPod,
  nameOf: (pod) => pod.metadata?.name ?? '',
  uidOf: (pod) => pod.metadata?.uid ?? '',
  entities: { mode: 'owned', entityType: EntityType.Pod },
  created: EventType.PodAdded,
  transitions: [
    { type: EventType.PodReady, when: isPodReady },
    { type: EventType.PodTerminating, when: (pod) => pod.metadata?.deletionTimestamp != null },
  ],
  deleted: EventType.PodDeleted,
};

export function createPodObserver(): WatchObserver<V1Pod> {
  return new WatchObserver(POD_KIND);
}
