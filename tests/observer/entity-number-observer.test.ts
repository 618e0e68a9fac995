import { LogEntry, LogLevel, resetLogging } from '../../src/logger';
import { EntityNumberObserver, countEntities } from '../../src/observer/entity-number-observer';
import {
  FakeLister,
  captureLogs,
  createObserverFixture,
  pod,
  pvc,
  settle,
  startObserver,
} from '../helpers/fixtures';

describe('countEntities', () => {
  it('buckets pods and claims by lifecycle state', () => {
    const pods = [
      pod('web-1'),
      pod('web-2', { ready: true }),
      pod('web-3', { ready: true }),
      pod('web-4', { ready: true, deleting: true }),
    ];
    const pvcs = [pvc('data-1'), pvc('data-2', { phase: 'Bound' }), pvc('data-3', { phase: 'Bound', deleting: true })];

    expect(countEntities(pods, pvcs)).toEqual({
      podsCreating: 1,
      podsReady: 2,
      podsTerminating: 1,
      pvcCreating: 1,
      pvcBound: 1,
      pvcTerminating: 1,
    });
  });

  it('returns zeros for an empty namespace', () => {
    expect(countEntities([], [])).toEqual({
      podsCreating: 0,
      podsReady: 0,
      podsTerminating: 0,
      pvcCreating: 0,
      pvcBound: 0,
      pvcTerminating: 0,
    });
  });
});

describe('EntityNumberObserver', () => {
  let logs: LogEntry[];

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    resetLogging();
  });

  it('samples once per interval and saves the samples at shutdown', async () => {
    const lister = new FakeLister([pod('web-1', { ready: true })], [pvc('data-1', { phase: 'Bound' })]);
    const fx = await createObserverFixture({ lister, config: { entityPollIntervalMs: 60_000 } });
    const observer = new EntityNumberObserver();
    const session = startObserver(observer, fx.handle);
    await settle();
    observer.stopWatching();
    await session;

    const samples = await fx.store.numberEntities.listByTestCase(fx.testCase.id);
    expect(lister.calls).toBe(1);
    expect(samples).toHaveLength(1);
    expect(samples[0]).toMatchObject({
      tcId: fx.testCase.id,
      podsReady: 1,
      podsCreating: 0,
      pvcBound: 1,
      pvcCreating: 0,
    });
    expect(samples[0].id).toMatch(/^ne_/);
    expect(fx.handle.completion.count).toBe(0);
  });

  it('keeps polling after a failed listing', async () => {
    const lister = new FakeLister();
    lister.error = new Error('apiserver unavailable');
    const fx = await createObserverFixture({ lister, config: { entityPollIntervalMs: 60_000 } });
    const observer = new EntityNumberObserver();
    const session = startObserver(observer, fx.handle);
    await settle();
    observer.stopWatching();
    await session;

    expect(await fx.store.numberEntities.listByTestCase(fx.testCase.id)).toEqual([]);
    const warning = logs.find((l) => l.level === LogLevel.Warn);
    expect(warning?.message).toBe('failed to sample entity counts');
    expect(warning?.context).toMatchObject({ observer: 'EntityNumberObserver', error: 'apiserver unavailable' });
  });

  it('logs and returns when no lister is configured', async () => {
    const fx = await createObserverFixture();
    await startObserver(new EntityNumberObserver(), fx.handle);

    expect(fx.handle.completion.count).toBe(0);
    expect(logs.filter((l) => l.level === LogLevel.Error).map((l) => l.message)).toEqual([
      "cluster lister can't be null",
    ]);
  });
});
