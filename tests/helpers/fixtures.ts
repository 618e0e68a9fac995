/**
 * Shared fixtures for observer and runner tests: an in-process watch
 * source, resource builders and a runner handle over the memory store.
 */

import type { V1PersistentVolumeClaim, V1Pod, V1VolumeAttachment } from '@kubernetes/client-node';
import { mergeObservationConfig, ObservationConfig } from '../../src/config';
import { Entity } from '../../src/domain/entity';
import { TestCase } from '../../src/domain/test-run';
import { CompletionBarrier } from '../../src/engine/completion-barrier';
import { LogEntry, setLogHandler } from '../../src/logger';
import { HandoffRegistry } from '../../src/observer/handoff-registry';
import { ClusterLister, Observer, RunnerHandle } from '../../src/observer/observer';
import {
  NotificationQueue,
  WatchNotification,
  WatchOptions,
  WatchResource,
  WatchSource,
  WatchStream,
  queueStream,
} from '../../src/observer/watch';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';

/** Watch source whose notifications are pushed by the test. */
export class FakeWatchSource implements WatchSource {
  readonly opened: Array<{ resource: WatchResource; options: WatchOptions }> = [];
  readonly stopped: WatchResource[] = [];
  readonly failOpen = new Set<WatchResource>();
  private queues = new Map<WatchResource, NotificationQueue<WatchNotification>>();

  async open(resource: WatchResource, options: WatchOptions): Promise<WatchStream> {
    this.opened.push({ resource, options });
    if (this.failOpen.has(resource)) {
      throw new Error(`connection refused for ${resource}`);
    }
    return queueStream(this.queue(resource), () => this.stopped.push(resource));
  }

  push(resource: WatchResource, type: string, object: unknown): void {
    this.queue(resource).push({ type, object });
  }

  /** End the watch as the API server does when its timeout elapses. */
  expire(resource: WatchResource): void {
    this.queue(resource).close();
  }

  queue(resource: WatchResource): NotificationQueue<WatchNotification> {
    let queue = this.queues.get(resource);
    if (!queue) {
      queue = new NotificationQueue<WatchNotification>();
      this.queues.set(resource, queue);
    }
    return queue;
  }
}

/** Lister returning fixed resources, or failing when `error` is set. */
export class FakeLister implements ClusterLister {
  calls = 0;
  error: Error | null = null;

  constructor(
    public pods: V1Pod[] = [],
    public pvcs: V1PersistentVolumeClaim[] = [],
  ) {}

  async listPods(): Promise<V1Pod[]> {
    this.calls++;
    if (this.error) throw this.error;
    return this.pods;
  }

  async listPersistentVolumeClaims(): Promise<V1PersistentVolumeClaim[]> {
    if (this.error) throw this.error;
    return this.pvcs;
  }
}

const DELETION_TIME = new Date('2024-01-01T00:00:00Z');

export function pvc(
  name: string,
  opts: { phase?: string; volumeName?: string; deleting?: boolean } = {},
): V1PersistentVolumeClaim {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name,
      uid: `uid-${name}`,
      deletionTimestamp: opts.deleting ? DELETION_TIME : undefined,
    },
    spec: { volumeName: opts.volumeName },
    status: { phase: opts.phase ?? 'Pending' },
  };
}

export function pod(name: string, opts: { ready?: boolean; deleting?: boolean } = {}): V1Pod {
  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: {
      name,
      uid: `uid-${name}`,
      deletionTimestamp: opts.deleting ? DELETION_TIME : undefined,
    },
    status: {
      phase: 'Running',
      conditions: [{ type: 'Ready', status: opts.ready ? 'True' : 'False' }],
    },
  };
}

export function volumeAttachment(
  name: string,
  opts: { volume?: string; attached?: boolean; deleting?: boolean } = {},
): V1VolumeAttachment {
  return {
    apiVersion: 'storage.k8s.io/v1',
    kind: 'VolumeAttachment',
    metadata: {
      name,
      uid: `uid-${name}`,
      deletionTimestamp: opts.deleting ? DELETION_TIME : undefined,
    },
    spec: {
      attacher: 'csi.example.com',
      nodeName: 'node-1',
      source: { persistentVolumeName: opts.volume },
    },
    status: { attached: opts.attached ?? false },
  };
}

export interface ObserverFixture {
  store: Store;
  testCase: TestCase;
  watchSource: FakeWatchSource;
  handle: RunnerHandle;
}

/** A fresh store holding one run and one test case, and a handle over it. */
export async function createObserverFixture(
  options: { lister?: ClusterLister | null; config?: Partial<ObservationConfig> } = {},
): Promise<ObserverFixture> {
  const store = createMemoryStore();
  const run = await store.testRuns.create({ name: 'run-fixture', storageClass: 'standard' });
  const testCase = await store.testCases.create({ runId: run.id, name: 'tc-fixture' });
  const watchSource = new FakeWatchSource();
  const handle: RunnerHandle = {
    store,
    watchSource,
    lister: options.lister ?? null,
    registry: new HandoffRegistry<Entity>(),
    testCase,
    config: mergeObservationConfig({ namespace: 'storage-tests', ...options.config }),
    completion: new CompletionBarrier(),
  };
  return { store, testCase, watchSource, handle };
}

/** Start one observer session the way the runner does. */
export function startObserver(
  observer: Observer,
  handle: RunnerHandle,
  signal: AbortSignal = new AbortController().signal,
): Promise<void> {
  observer.makeChannel();
  handle.completion.add(1);
  return observer.startWatching(signal, handle);
}

/** Let every queued microtask and pending I/O callback run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Route log output into an array for the rest of the test. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => entries.push(entry));
  return entries;
}
