import { EntityType } from '../../src/domain/entity';
import { EventType } from '../../src/domain/event';
import { RunnerError } from '../../src/domain/errors';
import { TestCase } from '../../src/domain/test-run';
import { Runner, defaultObservers } from '../../src/engine/runner';
import { LogEntry, LogLevel, logger, resetLogging } from '../../src/logger';
import { Observer, RunnerHandle } from '../../src/observer/observer';
import { createPodObserver } from '../../src/observer/pod-observer';
import { createPvcObserver } from '../../src/observer/pvc-observer';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';
import {
  FakeLister,
  FakeWatchSource,
  captureLogs,
  pod,
  pvc,
  settle,
  volumeAttachment,
} from '../helpers/fixtures';

/** Never finishes its session. */
class StuckObserver implements Observer {
  getName(): string {
    return 'StuckObserver';
  }
  makeChannel(): void {}
  startWatching(_signal: AbortSignal, _runner: RunnerHandle): Promise<void> {
    return new Promise<void>(() => undefined);
  }
  stopWatching(): void {}
}

describe('Runner', () => {
  let store: Store;
  let testCase: TestCase;
  let watchSource: FakeWatchSource;
  let logs: LogEntry[];

  beforeEach(async () => {
    store = createMemoryStore();
    const run = await store.testRuns.create({ name: 'run-runner', storageClass: 'standard' });
    testCase = await store.testCases.create({ runId: run.id, name: 'tc-runner' });
    watchSource = new FakeWatchSource();
    logs = captureLogs();
  });

  afterEach(() => {
    resetLogging();
  });

  it('runs the default observer set', () => {
    expect(defaultObservers().map((o) => o.getName())).toEqual([
      'PersistentVolumeClaimObserver',
      'VolumeAttachmentObserver',
      'PodObserver',
      'EntityNumberObserver',
    ]);
  });

  it('correlates attachments with claims and persists every timeline at stop', async () => {
    const lister = new FakeLister([pod('web-1', { ready: true })], [pvc('data-1', { phase: 'Bound' })]);
    const runner = new Runner({ store, testCase, watchSource, lister, config: { entityPollIntervalMs: 60_000 } });
    runner.start();

    watchSource.push('volumeattachments', 'ADDED', volumeAttachment('csi-1', { volume: 'pv-1' }));
    watchSource.push('persistentvolumeclaims', 'ADDED', pvc('data-1'));
    watchSource.push('persistentvolumeclaims', 'MODIFIED', pvc('data-1', { phase: 'Bound', volumeName: 'pv-1' }));
    watchSource.push('volumeattachments', 'MODIFIED', volumeAttachment('csi-1', { volume: 'pv-1', attached: true }));
    watchSource.push('pods', 'ADDED', pod('web-1'));
    watchSource.push('pods', 'MODIFIED', pod('web-1', { ready: true }));
    await settle();

    await expect(runner.stop()).resolves.toBe(true);
    expect(runner.isRunning).toBe(false);
    expect(runner.endedEarly()).toEqual([]);

    const entities = await store.entities.listByTestCase(testCase.id);
    const claim = entities.find((e) => e.type === EntityType.Pvc);
    const workload = entities.find((e) => e.type === EntityType.Pod);
    expect(claim?.name).toBe('data-1');
    expect(workload?.name).toBe('web-1');

    const claimEvents = await store.events.listByEntity(claim?.id ?? '');
    expect(claimEvents.map((e) => e.type).sort()).toEqual(
      [EventType.PvcAdded, EventType.PvcBound, EventType.VaAdded, EventType.VaAttached].sort(),
    );
    const podEvents = await store.events.listByEntity(workload?.id ?? '');
    expect(podEvents.map((e) => e.type)).toEqual([EventType.PodAdded, EventType.PodReady]);
    expect(await store.numberEntities.listByTestCase(testCase.id)).toHaveLength(1);
    expect(watchSource.opened.map((o) => o.resource).sort()).toEqual([
      'persistentvolumeclaims',
      'pods',
      'volumeattachments',
    ]);
  });

  it('reports observers whose watch expired before stop', async () => {
    const runner = new Runner({ store, testCase, watchSource, observers: [createPvcObserver(), createPodObserver()] });
    runner.start();
    watchSource.expire('pods');
    await settle();

    expect(runner.endedEarly()).toEqual(['PodObserver']);
    expect(runner.completion.count).toBe(1);
    const warning = logs.find((l) => l.message === 'observation ended early');
    expect(warning?.level).toBe(LogLevel.Warn);
    expect(warning?.context).toMatchObject({ observer: 'PodObserver', testCaseId: testCase.id });

    await expect(runner.stop()).resolves.toBe(true);
    expect(runner.endedEarly()).toEqual(['PodObserver']);
  });

  it('releases the barrier for an observer whose watch cannot be opened', async () => {
    watchSource.failOpen.add('pods');
    const runner = new Runner({ store, testCase, watchSource, observers: [createPodObserver()] });
    runner.start();
    await runner.wait();

    expect(runner.completion.count).toBe(0);
    expect(logs.filter((l) => l.level === LogLevel.Error).map((l) => l.message)).toEqual([
      'Cannot open watch on pods: connection refused for pods',
    ]);
  });

  it('shuts every observer down when the start signal aborts', async () => {
    const controller = new AbortController();
    const runner = new Runner({ store, testCase, watchSource, observers: [createPvcObserver()] });
    runner.start(controller.signal);
    watchSource.push('persistentvolumeclaims', 'ADDED', pvc('data-1'));
    await settle();

    controller.abort();
    await runner.wait();

    expect(runner.endedEarly()).toEqual([]);
    const events = await store.events.listByTestCase(testCase.id);
    expect(events.map((e) => e.type)).toEqual([EventType.PvcAdded]);
  });

  it('refuses to start twice', async () => {
    const runner = new Runner({ store, testCase, watchSource, observers: [createPvcObserver()] });
    runner.start();

    expect(() => runner.start()).toThrow(RunnerError);
    try {
      runner.start();
    } catch (err) {
      expect(err instanceof RunnerError && err.typedError.code).toBe('RUNNER.ALREADY_STARTED');
    }
    await runner.stop();
  });

  it('returns false when observers outlive the stop timeout', async () => {
    const runner = new Runner({ store, testCase, observers: [new StuckObserver()], config: { stopTimeoutMs: 10 } });
    runner.start();

    await expect(runner.stop()).resolves.toBe(false);
    expect(runner.isRunning).toBe(true);
    const error = logs.find((l) => l.level === LogLevel.Error);
    expect(error?.message).toBe('observers did not finish before the stop timeout');
    expect(error?.context).toMatchObject({ pending: 1, timeoutMs: 10 });
  });

  it('applies a configured log level', () => {
    new Runner({ store, testCase, observers: [], config: { logLevel: LogLevel.Error } });
    logger.warn('suppressed');
    logger.error('kept');

    expect(logs.map((l) => l.message)).toEqual(['kept']);
  });

  it('treats stop before start as already stopped', async () => {
    const runner = new Runner({ store, testCase, watchSource });
    await expect(runner.stop()).resolves.toBe(true);
  });
});
