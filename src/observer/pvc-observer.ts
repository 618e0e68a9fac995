import type { V1PersistentVolumeClaim } from '@kubernetes/client-node';
import { EntityType } from '../domain/entity';
import { EventType } from '../domain/event';
import { ObservedKind, WatchObserver } from './watch-observer';
import { isKubeObject } from './watch';

export function isPersistentVolumeClaim(value: unknown): value is V1PersistentVolumeClaim {
  return isKubeObject(value, 'PersistentVolumeClaim');
}

/**
 * Claims: Added -> Bound -> DeletingStarted -> DeletingEnded.
 *
 * While a claim is bound its entity is published to the hand-off registry
 * under the bound volume's name, where the volume-attachment observer
 * picks it up.
 */
export const PVC_KIND: ObservedKind<V1PersistentVolumeClaim> = {
  name: 'PersistentVolumeClaimObserver',
  slug: 'pvc',
  resource: 'persistentvolumeclaims',
  matches: isPersistentVolumeClaim,
  nameOf: (pvc) => pvc.metadata?.name ?? '',
  uidOf: (pvc) => pvc.metadata?.uid ?? '',
  entities: { mode: 'owned', entityType: EntityType.Pvc },
  created: EventType.PvcAdded,
  transitions: [
    {
      type: EventType.PvcBound,
      when: (pvc) => pvc.status?.phase === 'Bound',
      handoffKey: (pvc) => pvc.spec?.volumeName || undefined,
    },
    {
      type: EventType.PvcDeletingStarted,
      when: (pvc) => pvc.metadata?.deletionTimestamp != null,
    },
  ],
  deleted: EventType.PvcDeletingEnded,
};

export function createPvcObserver(): WatchObserver<V1PersistentVolumeClaim> {
  return new WatchObserver(PVC_KIND);
}
