/**
 * Entity domain model.
 *
 * An entity is the durable anchor for one observed cluster resource within
 * one test case. Entities are created the first time an observer sees the
 * resource and are never updated or deleted afterwards.
 */

/** Resource kinds that own entities. */
export enum EntityType {
  Pvc = 'PVC',
  Pod = 'POD',
}

/** A persisted entity. */
export interface Entity {
  id: string;
  /** Resource name, unique within (type, tcId). */
  name: string;
  /** Orchestrator-assigned uid, unique across the store. */
  k8sUid: string;
  tcId: string;
  type: EntityType;
}

/** Natural key of an entity: (type, name, test case). */
export function entityKey(entity: Pick<Entity, 'type' | 'name' | 'tcId'>): string {
  return `${entity.tcId}/${entity.type}/${entity.name}`;
}
