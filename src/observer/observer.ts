/**
 * Observer contract and shared session lifecycle.
 *
 * An observer records the lifecycle of one resource kind for one test case.
 * The runner starts every observer as a detached task and only learns that
 * a session ended through the completion barrier; failures are logged,
 * never returned.
 */

import type { V1PersistentVolumeClaim, V1Pod } from '@kubernetes/client-node';
import { ObservationConfig } from '../config';
import { Entity } from '../domain/entity';
import { TestCase } from '../domain/test-run';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { CompletionBarrier } from '../engine/completion-barrier';
import { HandoffRegistry } from './handoff-registry';
import { WatchSource } from './watch';

/** Point-in-time listing of the resources the entity-count observer samples. */
export interface ClusterLister {
  listPods(namespace: string): Promise<V1Pod[]>;
  listPersistentVolumeClaims(namespace: string): Promise<V1PersistentVolumeClaim[]>;
}

/** What an observer session may use from the runner that started it. */
export interface RunnerHandle {
  readonly store: Store;
  readonly watchSource: WatchSource | null;
  readonly lister: ClusterLister | null;
  readonly registry: HandoffRegistry<Entity>;
  readonly testCase: TestCase;
  readonly config: ObservationConfig;
  readonly completion: CompletionBarrier;
}

export interface Observer {
  /** Stable name used in logs. */
  getName(): string;
  /** Reset the shutdown signal. Call before every startWatching(). */
  makeChannel(): void;
  /**
   * Observe until `signal` aborts, stopWatching() is called or the watch
   * expires. Releases one slot of `runner.completion` before settling and
   * never rejects.
   */
  startWatching(signal: AbortSignal, runner: RunnerHandle): Promise<void>;
  /** Request a graceful shutdown: flush buffered events, then return. */
  stopWatching(): void;
}

/** Base class owning the shutdown signal and the completion guarantee. */
export abstract class BaseObserver implements Observer {
  private shutdown = new AbortController();

  abstract getName(): string;

  makeChannel(): void {
    this.shutdown = new AbortController();
  }

  stopWatching(): void {
    this.shutdown.abort();
  }

  async startWatching(signal: AbortSignal, runner: RunnerHandle): Promise<void> {
    const log = rootLogger.child({ observer: this.getName(), testCaseId: runner.testCase.id });
    const own = this.shutdown;
    const forward = () => own.abort();
    if (signal.aborted) own.abort();
    signal.addEventListener('abort', forward, { once: true });

    log.debug('started watching');
    try {
      await this.observe(own.signal, runner, log);
    } catch (err) {
      log.error('observer session failed', errorContext(err));
    } finally {
      signal.removeEventListener('abort', forward);
      runner.completion.done();
    }
  }

  /**
   * Run one session. `shutdown` aborts when either the runner's signal or
   * stopWatching() fires; implementations flush before returning on it.
   */
  protected abstract observe(shutdown: AbortSignal, runner: RunnerHandle, log: Logger): Promise<void>;
}
