/**
 * Storage layer interfaces.
 *
 * Defines the persistence contract the observers, the runner and the
 * metrics collector agree on, with pluggable backends (memory, SQLite).
 */

import { Entity } from '../domain/entity';
import { Event } from '../domain/event';
import {
  CreateTestCaseInput,
  CreateTestRunInput,
  NumberEntities,
  TestCase,
  TestRun,
} from '../domain/test-run';

/** Store interface for test runs. */
export interface TestRunStore {
  /** Fails with STORE.CONFLICT when the name is taken. */
  create(input: CreateTestRunInput): Promise<TestRun>;
  getById(id: string): Promise<TestRun | null>;
  getByName(name: string): Promise<TestRun | null>;
}

/** Store interface for test cases. */
export interface TestCaseStore {
  create(input: CreateTestCaseInput): Promise<TestCase>;
  getById(id: string): Promise<TestCase | null>;
  listByRun(runId: string): Promise<TestCase[]>;
  markSucceeded(id: string): Promise<TestCase | null>;
  markFailed(id: string, errorMessage: string): Promise<TestCase | null>;
}

/**
 * Store interface for entities.
 *
 * `save` is idempotent: an entity whose (type, name, tcId) or k8sUid is
 * already stored is not inserted again, and the stored row is returned in
 * its place. Any other failure rejects with a StoreError.
 */
export interface EntityStore {
  save(entities: Entity[]): Promise<Entity[]>;
  getById(id: string): Promise<Entity | null>;
  listByTestCase(tcId: string): Promise<Entity[]>;
}

/**
 * Store interface for events.
 *
 * `save` is atomic per batch: either every event becomes visible or none
 * does. Events are listed by timestamp, then by insertion order.
 */
export interface EventStore {
  save(events: Event[]): Promise<void>;
  listByTestCase(tcId: string): Promise<Event[]>;
  listByEntity(entityId: string): Promise<Event[]>;
}

/** Store interface for entity-count samples. */
export interface NumberEntitiesStore {
  save(samples: NumberEntities[]): Promise<void>;
  listByTestCase(tcId: string): Promise<NumberEntities[]>;
}

/** Composite store interface. */
export interface Store {
  /** Backend name, reported by the health endpoint. */
  readonly kind: 'memory' | 'sqlite';
  testRuns: TestRunStore;
  testCases: TestCaseStore;
  entities: EntityStore;
  events: EventStore;
  numberEntities: NumberEntitiesStore;
  close(): Promise<void>;
}
