/**
 * Observer runner for one test case.
 *
 * Starts every observer as a detached task sharing one hand-off registry,
 * broadcasts shutdown to all of them, and waits on the completion barrier
 * before the test case's timeline is considered final.
 */

import { ObservationConfig, mergeObservationConfig } from '../config';
import { Entity } from '../domain/entity';
import { RunnerError, runnerAlreadyStartedError } from '../domain/errors';
import { TestCase } from '../domain/test-run';
import { Logger, logger, setLogLevel } from '../logger';
import { HandoffRegistry } from '../observer/handoff-registry';
import { ClusterLister, Observer, RunnerHandle } from '../observer/observer';
import { createPvcObserver } from '../observer/pvc-observer';
import { createPodObserver } from '../observer/pod-observer';
import { createVolumeAttachmentObserver } from '../observer/volume-attachment-observer';
import { EntityNumberObserver } from '../observer/entity-number-observer';
import { WatchSource } from '../observer/watch';
import { Store } from '../storage/store';
import { CompletionBarrier } from './completion-barrier';

export interface RunnerOptions {
  store: Store;
  testCase: TestCase;
  watchSource?: WatchSource | null;
  lister?: ClusterLister | null;
  /** Defaults to defaultObservers(). */
  observers?: Observer[];
  config?: Partial<ObservationConfig>;
}

/** The full observer set: claims, attachments, pods and entity counts. */
export function defaultObservers(): Observer[] {
  return [
    createPvcObserver(),
    createVolumeAttachmentObserver(),
    createPodObserver(),
    new EntityNumberObserver(),
  ];
}

export class Runner implements RunnerHandle {
  readonly store: Store;
  readonly testCase: TestCase;
  readonly watchSource: WatchSource | null;
  readonly lister: ClusterLister | null;
  readonly config: ObservationConfig;
  readonly registry = new HandoffRegistry<Entity>();
  readonly completion = new CompletionBarrier();
  readonly observers: readonly Observer[];

  private log: Logger;
  private sessions: Promise<void>[] = [];
  private running = false;
  private stopping = false;
  private early: string[] = [];

  constructor(options: RunnerOptions) {
    this.store = options.store;
    this.testCase = options.testCase;
    this.watchSource = options.watchSource ?? null;
    this.lister = options.lister ?? null;
    this.config = mergeObservationConfig(options.config);
    this.observers = options.observers ?? defaultObservers();
    if (options.config?.logLevel) setLogLevel(options.config.logLevel);
    this.log = logger.child({ runner: options.testCase.name, testCaseId: options.testCase.id });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start every observer concurrently. Aborting `signal` shuts all of them
   * down as stop() would, without waiting.
   */
  start(signal: AbortSignal = new AbortController().signal): void {
    if (this.running) {
      throw new RunnerError(runnerAlreadyStartedError(this.testCase.id));
    }
    this.running = true;
    this.stopping = false;
    this.early = [];

    for (const observer of this.observers) {
      observer.makeChannel();
      this.completion.add(1);
      const session = observer.startWatching(signal, this).then(() => {
        if (!this.stopping && !signal.aborted) {
          this.early.push(observer.getName());
          this.log.warn('observation ended early', { observer: observer.getName() });
        }
      });
      this.sessions.push(session);
    }
    this.log.debug('started observers', { count: this.observers.length });
  }

  /**
   * Signal every observer to flush and stop, then wait for all of them.
   * Resolves false when some observer is still running after
   * `config.stopTimeoutMs`.
   */
  async stop(): Promise<boolean> {
    if (!this.running) return true;
    this.stopping = true;
    for (const observer of this.observers) {
      observer.stopWatching();
    }
    const finished = await this.completion.wait(this.config.stopTimeoutMs);
    if (!finished) {
      this.log.error('observers did not finish before the stop timeout', {
        pending: this.completion.count,
        timeoutMs: this.config.stopTimeoutMs,
      });
      return false;
    }
    await Promise.all(this.sessions);
    this.sessions = [];
    this.running = false;
    this.log.debug('stopped observers');
    return true;
  }

  /** Wait until every session has ended, without signalling anyone. */
  async wait(): Promise<void> {
    await this.completion.wait();
    await Promise.all(this.sessions);
  }

  /** Names of observers whose session ended before shutdown was requested. */
  endedEarly(): string[] {
    return [...this.early];
  }
}
