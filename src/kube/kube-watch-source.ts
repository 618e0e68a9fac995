/**
 * WatchSource over the Kubernetes API, using @kubernetes/client-node's Watch.
 *
 * Each open() starts one watch request bounded by `timeoutSeconds`; the
 * API server ends it when the bound elapses, which closes the stream.
 */

import { logger, errorContext } from '../logger';
import {
  NotificationQueue,
  WatchNotification,
  WatchOptions,
  WatchResource,
  WatchSource,
  WatchStream,
  queueStream,
} from '../observer/watch';

/** The subset of @kubernetes/client-node's Watch this source drives. */
export interface KubeWatcher {
  watch(
    path: string,
    queryParams: Record<string, unknown>,
    callback: (phase: string, apiObj: unknown) => void,
    done: (err: unknown) => void,
  ): Promise<unknown>;
}

const log = logger.child({ source: 'kube-watch' });

/** API path of a watched collection. */
export function resourcePath(resource: WatchResource, namespace: string): string {
  switch (resource) {
    case 'persistentvolumeclaims':
    case 'pods':
      return `/api/v1/namespaces/${encodeURIComponent(namespace)}/${resource}`;
    case 'volumeattachments':
      return '/apis/storage.k8s.io/v1/volumeattachments';
  }
}

function hasAbort(value: unknown): value is { abort(): void } {
  return typeof value === 'object' && value !== null && 'abort' in value && typeof value.abort === 'function';
}

export class KubeWatchSource implements WatchSource {
  constructor(private watcher: KubeWatcher) {}

  async open(resource: WatchResource, options: WatchOptions): Promise<WatchStream> {
    const queue = new NotificationQueue<WatchNotification>();
    const path = resourcePath(resource, options.namespace);

    const request = await this.watcher.watch(
      path,
      { timeoutSeconds: options.timeoutSeconds },
      (phase, apiObj) => queue.push({ type: phase, object: apiObj }),
      (err) => {
        if (err && !queue.isClosed) {
          log.warn('watch closed with error', { path, ...errorContext(err) });
        }
        queue.close();
      },
    );

    return queueStream(queue, () => {
      if (hasAbort(request)) request.abort();
    });
  }
}
