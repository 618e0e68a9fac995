/**
 * Watch stream contracts.
 *
 * A watch source opens one bounded watch per resource kind. The stream
 * hands notifications to exactly one consumer in delivery order and ends
 * when the server closes the watch (timeout) or the consumer stops it.
 */

/** Resource collections the observers watch or list. */
export type WatchResource = 'persistentvolumeclaims' | 'pods' | 'volumeattachments';

/** Change types a watch can deliver. Anything else is unexpected. */
export type NotificationType = 'ADDED' | 'MODIFIED' | 'DELETED';

/** One notification as delivered; the payload is not trusted. */
export interface WatchNotification {
  type: string;
  object: unknown;
}

export interface WatchOptions {
  /** Namespace to watch; ignored for cluster-scoped resources. */
  namespace: string;
  /** Server-side bound on the watch session. */
  timeoutSeconds: number;
}

export interface WatchStream {
  /**
   * Resolves with the next notification, or `done` once the watch has ended
   * or `signal` has aborted. Callers tell the two apart by `signal.aborted`.
   */
  next(signal?: AbortSignal): Promise<IteratorResult<WatchNotification, undefined>>;
  /** Take every notification already delivered without waiting. */
  drain(): WatchNotification[];
  /** Stop the watch. Pending and later `next()` calls resolve as done. */
  stop(): void;
}

export interface WatchSource {
  open(resource: WatchResource, options: WatchOptions): Promise<WatchStream>;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Unbounded single-consumer queue backing a WatchStream.
 *
 * Producers push and close; the consumer awaits `next()`. Items pushed
 * after close are dropped.
 */
export class NotificationQueue<T> {
  private items: T[] = [];
  private waiting: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter({ done: false, value: item });
      return;
    }
    this.items.push(item);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter(DONE);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Take the next item, waiting if none is queued. An aborted `signal`
   * withdraws the wait so no item is handed to a consumer that left.
   */
  next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    if (signal?.aborted) return Promise.resolve(DONE);
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve({ done: false, value: item });
    }
    if (this.closed) return Promise.resolve(DONE);

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiting = this.waiting.filter((w) => w !== waiter);
        resolve(DONE);
      };
      const waiter = (result: IteratorResult<T, undefined>) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };
      this.waiting.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  drain(): T[] {
    return this.items.splice(0);
  }
}

/** Adapt a queue to the WatchStream contract, running `onStop` once. */
export function queueStream(queue: NotificationQueue<WatchNotification>, onStop?: () => void): WatchStream {
  let stopped = false;
  return {
    next: (signal) => queue.next(signal),
    drain: () => queue.drain(),
    stop: () => {
      if (stopped) return;
      stopped = true;
      queue.close();
      onStop?.();
    },
  };
}

/**
 * Narrow an untrusted payload to a Kubernetes object of the given kind.
 * Name and uid must both be non-empty: entities are keyed on them.
 */
export function isKubeObject<K extends string>(
  value: unknown,
  kind: K,
): value is { kind: K; metadata: { name: string; uid: string } } {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || value.kind !== kind) return false;
  if (!('metadata' in value)) return false;
  const metadata = value.metadata;
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    'name' in metadata &&
    typeof metadata.name === 'string' &&
    metadata.name.length > 0 &&
    'uid' in metadata &&
    typeof metadata.uid === 'string' &&
    metadata.uid.length > 0
  );
}
