/**
 * Kubernetes adapters.
 */

import { CoreV1Api, KubeConfig, Watch } from '@kubernetes/client-node';
import { KubeClusterLister } from './kube-cluster-lister';
import { KubeWatchSource } from './kube-watch-source';

export * from './kube-watch-source';
export * from './kube-cluster-lister';

/** Watch source and lister for an already-loaded kubeconfig. */
export function createKubeClients(kubeConfig: KubeConfig): {
  watchSource: KubeWatchSource;
  lister: KubeClusterLister;
} {
  return {
    watchSource: new KubeWatchSource(new Watch(kubeConfig)),
    lister: new KubeClusterLister(kubeConfig.makeApiClient(CoreV1Api)),
  };
}
