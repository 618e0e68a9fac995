import { EntityType } from '../../src/domain/entity';
import { EventType } from '../../src/domain/event';
import { resetLogging, setLogHandler } from '../../src/logger';
import { createPodObserver, isPodReady } from '../../src/observer/pod-observer';
import { ObserverFixture, createObserverFixture, pod, settle, startObserver } from '../helpers/fixtures';

describe('PodObserver', () => {
  let fx: ObserverFixture;

  beforeEach(async () => {
    fx = await createObserverFixture();
    setLogHandler(() => undefined);
  });

  afterEach(() => {
    resetLogging();
  });

  async function observe(drive: () => void): Promise<EventType[]> {
    const observer = createPodObserver();
    const session = startObserver(observer, fx.handle);
    drive();
    await settle();
    observer.stopWatching();
    await session;
    const events = await fx.store.events.listByTestCase(fx.testCase.id);
    return events.map((e) => e.type);
  }

  it('records Added, Ready, Terminating and Deleted', async () => {
    const types = await observe(() => {
      fx.watchSource.push('pods', 'ADDED', pod('web-1'));
      fx.watchSource.push('pods', 'MODIFIED', pod('web-1', { ready: true }));
      fx.watchSource.push('pods', 'MODIFIED', pod('web-1', { ready: true, deleting: true }));
      fx.watchSource.push('pods', 'DELETED', pod('web-1', { deleting: true }));
    });

    expect(types).toEqual([EventType.PodAdded, EventType.PodReady, EventType.PodTerminating, EventType.PodDeleted]);
    const entities = await fx.store.entities.listByTestCase(fx.testCase.id);
    expect(entities).toHaveLength(1);
    expect(entities[0].type).toBe(EntityType.Pod);
  });

  it('fires every matching transition of one notification in table order', async () => {
    const types = await observe(() => {
      fx.watchSource.push('pods', 'ADDED', pod('web-1'));
      fx.watchSource.push('pods', 'MODIFIED', pod('web-1', { ready: true, deleting: true }));
    });

    expect(types).toEqual([EventType.PodAdded, EventType.PodReady, EventType.PodTerminating]);
  });

  it('waits for the Ready condition', async () => {
    const types = await observe(() => {
      fx.watchSource.push('pods', 'ADDED', pod('web-1'));
      fx.watchSource.push('pods', 'MODIFIED', pod('web-1'));
      fx.watchSource.push('pods', 'MODIFIED', pod('web-1'));
    });

    expect(types).toEqual([EventType.PodAdded]);
  });

  it('does not publish pods to the hand-off registry', async () => {
    await observe(() => {
      fx.watchSource.push('pods', 'MODIFIED', pod('web-1', { ready: true }));
    });

    expect(fx.handle.registry.size).toBe(0);
  });
});

describe('isPodReady', () => {
  it('requires a Ready condition with status True', () => {
    expect(isPodReady(pod('web-1', { ready: true }))).toBe(true);
    expect(isPodReady(pod('web-1'))).toBe(false);
    expect(isPodReady({ kind: 'Pod', metadata: { name: 'web-2' } })).toBe(false);
    expect(
      isPodReady({
        kind: 'Pod',
        metadata: { name: 'web-3' },
        status: { conditions: [{ type: 'ContainersReady', status: 'True' }] },
      }),
    ).toBe(false);
  });
});
