import type { V1VolumeAttachment } from '@kubernetes/client-node';
import { EventType } from '../domain/event';
import { ObservedKind, WatchObserver } from './watch-observer';
import { isKubeObject } from './watch';

export function isVolumeAttachment(value: unknown): value is V1VolumeAttachment {
  return isKubeObject(value, 'VolumeAttachment');
}

/**
 * Volume attachments: Added -> Attached -> DeletingStarted -> DeletingEnded.
 *
 * Attachments own no entities. Their events attach to the claim entity
 * published under the attached persistent volume's name; until the claim
 * observer publishes it the events wait in the session, keeping the time
 * they were observed.
 */
export const VOLUME_ATTACHMENT_KIND: ObservedKind<V1VolumeAttachment> = {
  name: 'VolumeAttachmentObserver',
  slug: 'va',
  resource: 'volumeattachments',
  matches: isVolumeAttachment,
  nameOf: (va) => va.metadata?.name ?? '',
  uidOf: (va) => va.metadata?.uid ?? '',
  entities: {
    mode: 'correlated',
    key: (va) => va.spec?.source?.persistentVolumeName || undefined,
  },
  created: EventType.VaAdded,
  transitions: [
    { type: EventType.VaAttached, when: (va) => va.status?.attached === true },
    { type: EventType.VaDeletingStarted, when: (va) => va.metadata?.deletionTimestamp != null },
  ],
  deleted: EventType.VaDeletingEnded,
};

export function createVolumeAttachmentObserver(): WatchObserver<V1VolumeAttachment> {
  return new WatchObserver(VOLUME_ATTACHMENT_KIND);
}
