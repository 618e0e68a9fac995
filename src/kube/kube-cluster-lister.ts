/**
 * ClusterLister over CoreV1Api.
 */

import type { V1PersistentVolumeClaim, V1PersistentVolumeClaimList, V1Pod, V1PodList } from '@kubernetes/client-node';
import { ClusterLister } from '../observer/observer';

/** The subset of client-node's CoreV1Api the lister calls. */
export interface CoreListApi {
  listNamespacedPod(namespace: string): Promise<{ body: V1PodList }>;
  listNamespacedPersistentVolumeClaim(namespace: string): Promise<{ body: V1PersistentVolumeClaimList }>;
}

export class KubeClusterLister implements ClusterLister {
  constructor(private api: CoreListApi) {}

  async listPods(namespace: string): Promise<V1Pod[]> {
    const { body } = await this.api.listNamespacedPod(namespace);
    return body.items;
  }

  async listPersistentVolumeClaims(namespace: string): Promise<V1PersistentVolumeClaim[]> {
    const { body } = await this.api.listNamespacedPersistentVolumeClaim(namespace);
    return body.items;
  }
}
