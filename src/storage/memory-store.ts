/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. It enforces the
 * same uniqueness and referential rules as the SQLite store so observer
 * tests exercise the idempotent and atomic paths for real.
 */

import { v4 as uuid } from 'uuid';
import { Entity, entityKey } from '../domain/entity';
import { Event, sortByTimestamp } from '../domain/event';
import {
  CreateTestCaseInput,
  CreateTestRunInput,
  NumberEntities,
  TestCase,
  TestRun,
} from '../domain/test-run';
import {
  StoreError,
  duplicateNameError,
  missingEntityError,
  notFoundError,
  storeWriteError,
} from '../domain/errors';
import {
  Store,
  TestRunStore,
  TestCaseStore,
  EntityStore,
  EventStore,
  NumberEntitiesStore,
} from './store';

/** Returned values never alias the store's internal records. */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryTestRunStore implements TestRunStore {
  private data = new Map<string, TestRun>();

  async create(input: CreateTestRunInput): Promise<TestRun> {
    for (const run of this.data.values()) {
      if (run.name === input.name) {
        throw new StoreError(duplicateNameError('Test run', input.name));
      }
    }
    const run: TestRun = {
      id: `tr_${uuid()}`,
      name: input.name,
      storageClass: input.storageClass,
      clusterAddress: input.clusterAddress ?? '',
      startTimestamp: new Date().toISOString(),
    };
    this.data.set(run.id, run);
    return deepCopy(run);
  }

  async getById(id: string): Promise<TestRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async getByName(name: string): Promise<TestRun | null> {
    for (const run of this.data.values()) {
      if (run.name === name) return deepCopy(run);
    }
    return null;
  }
}

class MemoryTestCaseStore implements TestCaseStore {
  private data = new Map<string, TestCase>();

  constructor(private runs: MemoryTestRunStore) {}

  async create(input: CreateTestCaseInput): Promise<TestCase> {
    if (!(await this.runs.getById(input.runId))) {
      throw new StoreError(storeWriteError('create test case', notFoundError('Test run', input.runId).message));
    }
    const testCase: TestCase = {
      id: `tc_${uuid()}`,
      runId: input.runId,
      name: input.name,
      parameters: input.parameters ?? '',
      startTimestamp: new Date().toISOString(),
    };
    this.data.set(testCase.id, testCase);
    return deepCopy(testCase);
  }

  async getById(id: string): Promise<TestCase | null> {
    const testCase = this.data.get(id);
    return testCase ? deepCopy(testCase) : null;
  }

  async listByRun(runId: string): Promise<TestCase[]> {
    return [...this.data.values()].filter((tc) => tc.runId === runId).map(deepCopy);
  }

  async markSucceeded(id: string): Promise<TestCase | null> {
    return this.close(id, { success: true, errorMessage: undefined });
  }

  async markFailed(id: string, errorMessage: string): Promise<TestCase | null> {
    return this.close(id, { success: false, errorMessage });
  }

  private close(id: string, outcome: Pick<TestCase, 'success' | 'errorMessage'>): TestCase | null {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: TestCase = { ...existing, ...outcome, endTimestamp: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }
}

class MemoryEntityStore implements EntityStore {
  private data = new Map<string, Entity>();
  private byNaturalKey = new Map<string, string>();
  private byUid = new Map<string, string>();

  async save(entities: Entity[]): Promise<Entity[]> {
    const stored: Entity[] = [];
    for (const entity of entities) {
      const existingId = this.byNaturalKey.get(entityKey(entity)) ?? this.byUid.get(entity.k8sUid);
      const existing = existingId ? this.data.get(existingId) : undefined;
      if (existing) {
        stored.push(deepCopy(existing));
        continue;
      }
      if (this.data.has(entity.id)) {
        throw new StoreError(storeWriteError('save entities', `duplicate entity id ${entity.id}`));
      }
      const copy = deepCopy(entity);
      this.data.set(copy.id, copy);
      this.byNaturalKey.set(entityKey(copy), copy.id);
      this.byUid.set(copy.k8sUid, copy.id);
      stored.push(deepCopy(copy));
    }
    return stored;
  }

  async getById(id: string): Promise<Entity | null> {
    const entity = this.data.get(id);
    return entity ? deepCopy(entity) : null;
  }

  async listByTestCase(tcId: string): Promise<Entity[]> {
    return [...this.data.values()].filter((e) => e.tcId === tcId).map(deepCopy);
  }

  has(id: string): boolean {
    return this.data.has(id);
  }
}

class MemoryEventStore implements EventStore {
  private data: Event[] = [];
  private ids = new Set<string>();

  constructor(private entities: MemoryEntityStore) {}

  async save(events: Event[]): Promise<void> {
    // Validate the whole batch before appending anything.
    const batchIds = new Set<string>();
    for (const event of events) {
      if (!this.entities.has(event.entityId)) {
        throw new StoreError(missingEntityError(event.name, event.entityId));
      }
      if (this.ids.has(event.id) || batchIds.has(event.id)) {
        throw new StoreError(storeWriteError('save events', `duplicate event id ${event.id}`));
      }
      batchIds.add(event.id);
    }
    for (const event of events) {
      this.data.push(deepCopy(event));
      this.ids.add(event.id);
    }
  }

  async listByTestCase(tcId: string): Promise<Event[]> {
    return sortByTimestamp(this.data.filter((e) => e.tcId === tcId)).map(deepCopy);
  }

  async listByEntity(entityId: string): Promise<Event[]> {
    return sortByTimestamp(this.data.filter((e) => e.entityId === entityId)).map(deepCopy);
  }
}

class MemoryNumberEntitiesStore implements NumberEntitiesStore {
  private data: NumberEntities[] = [];

  async save(samples: NumberEntities[]): Promise<void> {
    this.data.push(...samples.map(deepCopy));
  }

  async listByTestCase(tcId: string): Promise<NumberEntities[]> {
    return this.data
      .filter((s) => s.tcId === tcId)
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp))
      .map(deepCopy);
  }
}

/** Create a new in-memory store. */
export function createMemoryStore(): Store {
  const testRuns = new MemoryTestRunStore();
  const entities = new MemoryEntityStore();
  return {
    kind: 'memory',
    testRuns,
    testCases: new MemoryTestCaseStore(testRuns),
    entities,
    events: new MemoryEventStore(entities),
    numberEntities: new MemoryNumberEntitiesStore(),
    close: async () => undefined,
  };
}
