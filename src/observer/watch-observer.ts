/**
 * Table-driven watch observer.
 *
 * The run loop, payload checks, per-entity guards and the end-of-session
 * flush are written once here. Each watched kind supplies an ObservedKind
 * table: how to recognise its resources, which event marks creation, which
 * predicates mark intermediate transitions, and which event is terminal.
 *
 * State per resource name: Unknown -> Tracked -> intermediate transitions
 * -> DeletionStarted -> DeletionEnded. Every transition except the terminal
 * one fires at most once per session; after the terminal event further
 * notifications for that name are ignored.
 */

import { v4 as uuid } from 'uuid';
import { Entity, EntityType } from '../domain/entity';
import { Event, EventType, eventName } from '../domain/event';
import {
  flushFailedError,
  unexpectedPayloadError,
  unknownNotificationError,
  watchOpenError,
} from '../domain/errors';
import { Logger, errorContext } from '../logger';
import { BaseObserver, RunnerHandle } from './observer';
import { NotificationType, WatchNotification, WatchResource, WatchStream } from './watch';

/** An intermediate transition recorded when `when` first holds on a MODIFIED notification. */
export interface Transition<R> {
  type: EventType;
  when(resource: R): boolean;
  /** When set, the entity is published to the hand-off registry under this key while `when` holds. */
  handoffKey?(resource: R): string | undefined;
}

/** The kind records its own entities. */
export interface OwnedEntities {
  mode: 'owned';
  entityType: EntityType;
}

/** The kind attaches its events to an entity another observer published under `key`. */
export interface CorrelatedEntities<R> {
  mode: 'correlated';
  key(resource: R): string | undefined;
}

export interface ObservedKind<R> {
  /** Observer name, e.g. "PersistentVolumeClaimObserver". */
  name: string;
  /** Short tag used in event names, e.g. "pvc". */
  slug: string;
  resource: WatchResource;
  matches(value: unknown): value is R;
  nameOf(resource: R): string;
  uidOf(resource: R): string;
  entities: OwnedEntities | CorrelatedEntities<R>;
  created: EventType;
  transitions: readonly Transition<R>[];
  deleted: EventType;
}

const NOTIFICATION_TYPES: ReadonlySet<string> = new Set<NotificationType>(['ADDED', 'MODIFIED', 'DELETED']);

function isNotificationType(type: string): type is NotificationType {
  return NOTIFICATION_TYPES.has(type);
}

const VERBS = {
  ADDED: 'added',
  MODIFIED: 'modified',
  DELETED: 'deleted',
} as const satisfies Record<NotificationType, 'added' | 'modified' | 'deleted'>;

/** Where a session's events attach: a tracked entity, or a correlation key awaiting one. */
type Anchor = { mode: 'owned'; entity: Entity } | { mode: 'correlated'; key: string };

interface PendingEvent {
  key: string;
  name: string;
  type: EventType;
  timestamp: string;
}

/** Guard and buffer state of one watch session; discarded when the session returns. */
class WatchSession<R> {
  readonly events: Event[] = [];
  private entities = new Map<string, Entity>();
  private fired = new Map<string, Set<EventType>>();
  private terminated = new Set<string>();
  private pending: PendingEvent[] = [];

  constructor(
    private kind: ObservedKind<R>,
    private runner: RunnerHandle,
    private log: Logger,
  ) {}

  get pendingCount(): number {
    return this.pending.length;
  }

  async handle(notification: WatchNotification): Promise<void> {
    const receivedAt = new Date().toISOString();
    if (notification.object === null || notification.object === undefined) {
      this.log.debug('ignoring notification without payload', { type: notification.type });
      return;
    }
    const resource = notification.object;
    if (!this.kind.matches(resource)) {
      this.log.error(unexpectedPayloadError(this.kind.name, notification.type).message);
      return;
    }
    if (!isNotificationType(notification.type)) {
      this.log.error(unknownNotificationError(this.kind.name, notification.type).message);
      return;
    }

    this.resolvePending();

    const key = this.kind.nameOf(resource);
    if (this.terminated.has(key)) {
      this.log.debug('ignoring notification for deleted resource', { resource: key, type: notification.type });
      return;
    }

    const anchor = await this.anchor(resource, key);
    if (!anchor) return;

    const verb = VERBS[notification.type];
    const fired = this.firedFor(key);

    if (notification.type === 'DELETED') {
      this.record(anchor, this.kind.deleted, verb, receivedAt);
      this.terminated.add(key);
      return;
    }

    if (!fired.has(this.kind.created)) {
      fired.add(this.kind.created);
      this.record(anchor, this.kind.created, verb, receivedAt);
    }

    if (notification.type !== 'MODIFIED') return;

    for (const transition of this.kind.transitions) {
      if (!transition.when(resource)) continue;
      const handoffKey = transition.handoffKey?.(resource);
      if (handoffKey && anchor.mode === 'owned') {
        this.runner.registry.publish(handoffKey, anchor.entity);
      }
      if (fired.has(transition.type)) continue;
      fired.add(transition.type);
      this.record(anchor, transition.type, verb, receivedAt);
    }
  }

  /** Attach pending correlated events whose entity has since been published. */
  resolvePending(): void {
    if (this.pending.length === 0) return;
    const waiting: PendingEvent[] = [];
    const blocked = new Set<string>();
    for (const event of this.pending) {
      const entity = blocked.has(event.key) ? null : this.runner.registry.lookup(event.key);
      if (!entity) {
        blocked.add(event.key);
        waiting.push(event);
        continue;
      }
      this.events.push(this.toEvent(entity, event));
    }
    this.pending = waiting;
  }

  private firedFor(key: string): Set<EventType> {
    let fired = this.fired.get(key);
    if (!fired) {
      fired = new Set();
      this.fired.set(key, fired);
    }
    return fired;
  }

  /**
   * Resolve what this notification's events attach to. Owned kinds save the
   * entity on first sight; a failed save leaves the resource untracked so a
   * later notification tries again.
   */
  private async anchor(resource: R, key: string): Promise<Anchor | null> {
    const ownership = this.kind.entities;
    if (ownership.mode === 'correlated') {
      const correlationKey = ownership.key(resource);
      if (!correlationKey) {
        this.log.debug('ignoring resource without correlation key', { resource: key });
        return null;
      }
      return { mode: 'correlated', key: correlationKey };
    }

    const known = this.entities.get(key);
    if (known) return { mode: 'owned', entity: known };

    const candidate: Entity = {
      id: `ent_${uuid()}`,
      name: key,
      k8sUid: this.kind.uidOf(resource),
      tcId: this.runner.testCase.id,
      type: ownership.entityType,
    };
    try {
      const [stored] = await this.runner.store.entities.save([candidate]);
      this.entities.set(key, stored);
      return { mode: 'owned', entity: stored };
    } catch (err) {
      this.log.error("can't save entity", { resource: key, ...errorContext(err) });
      return null;
    }
  }

  private record(anchor: Anchor, type: EventType, verb: 'added' | 'modified' | 'deleted', timestamp: string): void {
    const name = eventName(this.kind.slug, verb);
    if (anchor.mode === 'owned') {
      this.events.push(this.toEvent(anchor.entity, { key: anchor.entity.name, name, type, timestamp }));
      return;
    }
    const entity = this.pending.some((p) => p.key === anchor.key) ? null : this.runner.registry.lookup(anchor.key);
    const event: PendingEvent = { key: anchor.key, name, type, timestamp };
    if (entity) {
      this.events.push(this.toEvent(entity, event));
    } else {
      this.pending.push(event);
    }
  }

  private toEvent(entity: Entity, event: PendingEvent): Event {
    return {
      id: `evt_${uuid()}`,
      name: event.name,
      tcId: this.runner.testCase.id,
      entityId: entity.id,
      type: event.type,
      timestamp: event.timestamp,
    };
  }
}

/** Observer for one watched resource kind, driven by its ObservedKind table. */
export class WatchObserver<R> extends BaseObserver {
  constructor(readonly kind: ObservedKind<R>) {
    super();
  }

  getName(): string {
    return this.kind.name;
  }

  protected async observe(shutdown: AbortSignal, runner: RunnerHandle, log: Logger): Promise<void> {
    if (!runner.watchSource) {
      log.error("watch source can't be null");
      return;
    }

    let stream: WatchStream;
    try {
      stream = await runner.watchSource.open(this.kind.resource, {
        namespace: runner.config.namespace,
        timeoutSeconds: runner.config.watchTimeoutSeconds,
      });
    } catch (err) {
      log.error(watchOpenError(this.kind.resource, err).message);
      return;
    }

    const session = new WatchSession(this.kind, runner, log);
    try {
      for (;;) {
        const next = await stream.next(shutdown);
        if (!next.done) {
          await session.handle(next.value);
          continue;
        }
        if (shutdown.aborted) {
          for (const notification of stream.drain()) {
            await session.handle(notification);
          }
          await this.flush(session, runner, log);
          return;
        }
        log.warn('watch ended before shutdown; buffered events were not persisted', {
          buffered: session.events.length,
        });
        return;
      }
    } finally {
      stream.stop();
    }
  }

  private async flush(session: WatchSession<R>, runner: RunnerHandle, log: Logger): Promise<void> {
    session.resolvePending();
    if (session.pendingCount > 0) {
      log.warn('dropping events whose correlated entity never appeared', { dropped: session.pendingCount });
    }
    if (session.events.length > 0) {
      try {
        await runner.store.events.save(session.events);
      } catch (err) {
        log.error(flushFailedError(this.kind.name, runner.testCase.id, session.events.length, err).message);
        return;
      }
    }
    log.debug('finished watching', { saved: session.events.length });
  }
}
