/**
 * Entity-count observer.
 *
 * Samples pods and claims in the test namespace at a fixed interval and
 * records how many are creating, ready/bound and terminating. Samples are
 * buffered like watch events and persisted in one batch at shutdown.
 */

import type { V1PersistentVolumeClaim, V1Pod } from '@kubernetes/client-node';
import { v4 as uuid } from 'uuid';
import { EntityCounts, NumberEntities, emptyEntityCounts } from '../domain/test-run';
import { flushFailedError } from '../domain/errors';
import { Logger, errorContext } from '../logger';
import { BaseObserver, RunnerHandle } from './observer';
import { isPodReady } from './pod-observer';

/** Count resources by lifecycle state. */
export function countEntities(pods: V1Pod[], pvcs: V1PersistentVolumeClaim[]): EntityCounts {
  const counts = emptyEntityCounts();
  for (const pod of pods) {
    if (pod.metadata?.deletionTimestamp != null) counts.podsTerminating++;
    else if (isPodReady(pod)) counts.podsReady++;
    else counts.podsCreating++;
  }
  for (const pvc of pvcs) {
    if (pvc.metadata?.deletionTimestamp != null) counts.pvcTerminating++;
    else if (pvc.status?.phase === 'Bound') counts.pvcBound++;
    else counts.pvcCreating++;
  }
  return counts;
}

/** Resolve after `ms`, or as soon as `signal` aborts. */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class EntityNumberObserver extends BaseObserver {
  getName(): string {
    return 'EntityNumberObserver';
  }

  protected async observe(shutdown: AbortSignal, runner: RunnerHandle, log: Logger): Promise<void> {
    const lister = runner.lister;
    if (!lister) {
      log.error("cluster lister can't be null");
      return;
    }

    const namespace = runner.config.namespace;
    const samples: NumberEntities[] = [];
    while (!shutdown.aborted) {
      try {
        const [pods, pvcs] = await Promise.all([
          lister.listPods(namespace),
          lister.listPersistentVolumeClaims(namespace),
        ]);
        samples.push({
          id: `ne_${uuid()}`,
          tcId: runner.testCase.id,
          timestamp: new Date().toISOString(),
          ...countEntities(pods, pvcs),
        });
      } catch (err) {
        log.warn('failed to sample entity counts', errorContext(err));
      }
      await pause(runner.config.entityPollIntervalMs, shutdown);
    }

    if (samples.length > 0) {
      try {
        await runner.store.numberEntities.save(samples);
      } catch (err) {
        log.error(flushFailedError(this.getName(), runner.testCase.id, samples.length, err).message);
        return;
      }
    }
    log.debug('finished watching', { saved: samples.length });
  }
}
