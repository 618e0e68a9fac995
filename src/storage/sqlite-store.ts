/**
 * SQLite storage implementation (better-sqlite3).
 *
 * Tables are created on open if missing; there is no migration history.
 * Entity inserts rely on the table's unique constraints for idempotence,
 * event batches run in a single transaction.
 */

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { v4 as uuid } from 'uuid';
import { Entity, EntityType } from '../domain/entity';
import { ALL_EVENT_TYPES, Event, EventType } from '../domain/event';
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
  storeReadError,
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

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS test_runs (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    storage_class TEXT NOT NULL,
    cluster_address TEXT NOT NULL,
    start_timestamp TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS test_cases (
    id TEXT PRIMARY KEY,
    run_id TEXT NOT NULL REFERENCES test_runs(id),
    name TEXT NOT NULL,
    parameters TEXT NOT NULL,
    start_timestamp TEXT NOT NULL,
    end_timestamp TEXT,
    success INTEGER,
    error_message TEXT
  );
  CREATE TABLE IF NOT EXISTS entities (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    k8s_uid TEXT NOT NULL UNIQUE,
    tc_id TEXT NOT NULL,
    type TEXT NOT NULL,
    UNIQUE (type, name, tc_id)
  );
  CREATE TABLE IF NOT EXISTS events (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    tc_id TEXT NOT NULL,
    entity_id TEXT NOT NULL REFERENCES entities(id),
    type TEXT NOT NULL,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS events_tc_idx ON events (tc_id, timestamp, seq);
  CREATE TABLE IF NOT EXISTS number_entities (
    id TEXT PRIMARY KEY,
    tc_id TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    pods_creating INTEGER NOT NULL,
    pods_ready INTEGER NOT NULL,
    pods_terminating INTEGER NOT NULL,
    pvc_creating INTEGER NOT NULL,
    pvc_bound INTEGER NOT NULL,
    pvc_terminating INTEGER NOT NULL
  );
`;

type TestRunRow = {
  id: string;
  name: string;
  storage_class: string;
  cluster_address: string;
  start_timestamp: string;
};

type TestCaseRow = {
  id: string;
  run_id: string;
  name: string;
  parameters: string;
  start_timestamp: string;
  end_timestamp: string | null;
  success: number | null;
  error_message: string | null;
};

type EntityRow = {
  id: string;
  name: string;
  k8s_uid: string;
  tc_id: string;
  type: string;
};

type EventRow = {
  id: string;
  name: string;
  tc_id: string;
  entity_id: string;
  type: string;
  timestamp: string;
};

type NumberEntitiesRow = {
  id: string;
  tc_id: string;
  timestamp: string;
  pods_creating: number;
  pods_ready: number;
  pods_terminating: number;
  pvc_creating: number;
  pvc_bound: number;
  pvc_terminating: number;
};

const ENTITY_TYPES: ReadonlySet<string> = new Set<string>(Object.values(EntityType));
const EVENT_TYPES: ReadonlySet<string> = new Set<string>(ALL_EVENT_TYPES);

function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.has(value);
}

function isEventType(value: string): value is EventType {
  return EVENT_TYPES.has(value);
}

function toTestRun(row: TestRunRow): TestRun {
  return {
    id: row.id,
    name: row.name,
    storageClass: row.storage_class,
    clusterAddress: row.cluster_address,
    startTimestamp: row.start_timestamp,
  };
}

function toTestCase(row: TestCaseRow): TestCase {
  const testCase: TestCase = {
    id: row.id,
    runId: row.run_id,
    name: row.name,
    parameters: row.parameters,
    startTimestamp: row.start_timestamp,
  };
  if (row.end_timestamp !== null) testCase.endTimestamp = row.end_timestamp;
  if (row.success !== null) testCase.success = row.success === 1;
  if (row.error_message !== null) testCase.errorMessage = row.error_message;
  return testCase;
}

function toEntity(row: EntityRow): Entity {
  if (!isEntityType(row.type)) {
    throw new StoreError(storeReadError('read entity', `unknown entity type ${row.type}`));
  }
  return { id: row.id, name: row.name, k8sUid: row.k8s_uid, tcId: row.tc_id, type: row.type };
}

function toEvent(row: EventRow): Event {
  if (!isEventType(row.type)) {
    throw new StoreError(storeReadError('read event', `unknown event type ${row.type}`));
  }
  return {
    id: row.id,
    name: row.name,
    tcId: row.tc_id,
    entityId: row.entity_id,
    type: row.type,
    timestamp: row.timestamp,
  };
}

function toNumberEntities(row: NumberEntitiesRow): NumberEntities {
  return {
    id: row.id,
    tcId: row.tc_id,
    timestamp: row.timestamp,
    podsCreating: row.pods_creating,
    podsReady: row.pods_ready,
    podsTerminating: row.pods_terminating,
    pvcCreating: row.pvc_creating,
    pvcBound: row.pvc_bound,
    pvcTerminating: row.pvc_terminating,
  };
}

/** Run a write, rethrowing driver failures as StoreError. */
function write<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StoreError) throw error;
    throw new StoreError(storeWriteError(operation, error));
  }
}

/** Run a read, rethrowing driver failures as StoreError. */
function read<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StoreError) throw error;
    throw new StoreError(storeReadError(operation, error));
  }
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

class SqliteTestRunStore implements TestRunStore {
  constructor(private db: SqliteDatabase) {}

  async create(input: CreateTestRunInput): Promise<TestRun> {
    const run: TestRun = {
      id: `tr_${uuid()}`,
      name: input.name,
      storageClass: input.storageClass,
      clusterAddress: input.clusterAddress ?? '',
      startTimestamp: new Date().toISOString(),
    };
    try {
      this.db
        .prepare(
          `INSERT INTO test_runs (id, name, storage_class, cluster_address, start_timestamp)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(run.id, run.name, run.storageClass, run.clusterAddress, run.startTimestamp);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StoreError(duplicateNameError('Test run', input.name));
      }
      throw new StoreError(storeWriteError('create test run', error));
    }
    return run;
  }

  async getById(id: string): Promise<TestRun | null> {
    const row = read('get test run', () =>
      this.db.prepare<[string], TestRunRow>('SELECT * FROM test_runs WHERE id = ?').get(id),
    );
    return row ? toTestRun(row) : null;
  }

  async getByName(name: string): Promise<TestRun | null> {
    const row = read('get test run', () =>
      this.db.prepare<[string], TestRunRow>('SELECT * FROM test_runs WHERE name = ?').get(name),
    );
    return row ? toTestRun(row) : null;
  }
}

class SqliteTestCaseStore implements TestCaseStore {
  constructor(private db: SqliteDatabase) {}

  async create(input: CreateTestCaseInput): Promise<TestCase> {
    const testCase: TestCase = {
      id: `tc_${uuid()}`,
      runId: input.runId,
      name: input.name,
      parameters: input.parameters ?? '',
      startTimestamp: new Date().toISOString(),
    };
    write('create test case', () =>
      this.db
        .prepare(
          `INSERT INTO test_cases (id, run_id, name, parameters, start_timestamp)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(testCase.id, testCase.runId, testCase.name, testCase.parameters, testCase.startTimestamp),
    );
    return testCase;
  }

  async getById(id: string): Promise<TestCase | null> {
    const row = read('get test case', () =>
      this.db.prepare<[string], TestCaseRow>('SELECT * FROM test_cases WHERE id = ?').get(id),
    );
    return row ? toTestCase(row) : null;
  }

  async listByRun(runId: string): Promise<TestCase[]> {
    const rows = read('list test cases', () =>
      this.db
        .prepare<[string], TestCaseRow>('SELECT * FROM test_cases WHERE run_id = ? ORDER BY start_timestamp, rowid')
        .all(runId),
    );
    return rows.map(toTestCase);
  }

  async markSucceeded(id: string): Promise<TestCase | null> {
    return this.close(id, 1, null);
  }

  async markFailed(id: string, errorMessage: string): Promise<TestCase | null> {
    return this.close(id, 0, errorMessage);
  }

  private async close(id: string, success: number, errorMessage: string | null): Promise<TestCase | null> {
    const result = write('close test case', () =>
      this.db
        .prepare('UPDATE test_cases SET end_timestamp = ?, success = ?, error_message = ? WHERE id = ?')
        .run(new Date().toISOString(), success, errorMessage, id),
    );
    if (result.changes === 0) return null;
    return this.getById(id);
  }
}

class SqliteEntityStore implements EntityStore {
  constructor(private db: SqliteDatabase) {}

  async save(entities: Entity[]): Promise<Entity[]> {
    const insert = this.db.prepare(
      `INSERT INTO entities (id, name, k8s_uid, tc_id, type) VALUES (?, ?, ?, ?, ?)
       ON CONFLICT DO NOTHING`,
    );
    const byNaturalKey = this.db.prepare<[string, string, string], EntityRow>(
      'SELECT * FROM entities WHERE type = ? AND name = ? AND tc_id = ?',
    );
    const byUid = this.db.prepare<[string], EntityRow>('SELECT * FROM entities WHERE k8s_uid = ?');

    const saveAll = this.db.transaction((batch: Entity[]): Entity[] =>
      batch.map((entity) => {
        insert.run(entity.id, entity.name, entity.k8sUid, entity.tcId, entity.type);
        const row = byNaturalKey.get(entity.type, entity.name, entity.tcId) ?? byUid.get(entity.k8sUid);
        if (!row) {
          throw new StoreError(storeWriteError('save entities', `entity ${entity.name} not readable after insert`));
        }
        return toEntity(row);
      }),
    );
    return write('save entities', () => saveAll(entities));
  }

  async getById(id: string): Promise<Entity | null> {
    const row = read('get entity', () =>
      this.db.prepare<[string], EntityRow>('SELECT * FROM entities WHERE id = ?').get(id),
    );
    return row ? toEntity(row) : null;
  }

  async listByTestCase(tcId: string): Promise<Entity[]> {
    const rows = read('list entities', () =>
      this.db.prepare<[string], EntityRow>('SELECT * FROM entities WHERE tc_id = ? ORDER BY rowid').all(tcId),
    );
    return rows.map(toEntity);
  }
}

class SqliteEventStore implements EventStore {
  constructor(private db: SqliteDatabase) {}

  async save(events: Event[]): Promise<void> {
    const insert = this.db.prepare(
      `INSERT INTO events (id, name, tc_id, entity_id, type, timestamp) VALUES (?, ?, ?, ?, ?, ?)`,
    );
    const saveAll = this.db.transaction((batch: Event[]) => {
      for (const event of batch) {
        insert.run(event.id, event.name, event.tcId, event.entityId, event.type, event.timestamp);
      }
    });
    write('save events', () => saveAll(events));
  }

  async listByTestCase(tcId: string): Promise<Event[]> {
    const rows = read('list events', () =>
      this.db
        .prepare<[string], EventRow>('SELECT * FROM events WHERE tc_id = ? ORDER BY timestamp, seq')
        .all(tcId),
    );
    return rows.map(toEvent);
  }

  async listByEntity(entityId: string): Promise<Event[]> {
    const rows = read('list events', () =>
      this.db
        .prepare<[string], EventRow>('SELECT * FROM events WHERE entity_id = ? ORDER BY timestamp, seq')
        .all(entityId),
    );
    return rows.map(toEvent);
  }
}

class SqliteNumberEntitiesStore implements NumberEntitiesStore {
  constructor(private db: SqliteDatabase) {}

  async save(samples: NumberEntities[]): Promise<void> {
    const insert = this.db.prepare(
      `INSERT INTO number_entities
         (id, tc_id, timestamp, pods_creating, pods_ready, pods_terminating, pvc_creating, pvc_bound, pvc_terminating)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const saveAll = this.db.transaction((batch: NumberEntities[]) => {
      for (const s of batch) {
        insert.run(
          s.id,
          s.tcId,
          s.timestamp,
          s.podsCreating,
          s.podsReady,
          s.podsTerminating,
          s.pvcCreating,
          s.pvcBound,
          s.pvcTerminating,
        );
      }
    });
    write('save entity counts', () => saveAll(samples));
  }

  async listByTestCase(tcId: string): Promise<NumberEntities[]> {
    const rows = read('list entity counts', () =>
      this.db
        .prepare<[string], NumberEntitiesRow>('SELECT * FROM number_entities WHERE tc_id = ? ORDER BY timestamp, rowid')
        .all(tcId),
    );
    return rows.map(toNumberEntities);
  }
}

export interface SqliteStoreOptions {
  /** Database file path, or ":memory:". */
  filename: string;
}

/** Open (or create) a SQLite-backed store. */
export function createSqliteStore(options: SqliteStoreOptions): Store {
  let db: SqliteDatabase;
  try {
    db = new Database(options.filename);
  } catch (error) {
    throw new StoreError(storeWriteError(`open database ${options.filename}`, error));
  }
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);

  return {
    kind: 'sqlite',
    testRuns: new SqliteTestRunStore(db),
    testCases: new SqliteTestCaseStore(db),
    entities: new SqliteEntityStore(db),
    events: new SqliteEventStore(db),
    numberEntities: new SqliteNumberEntitiesStore(db),
    close: async () => {
      if (db.open) db.close();
    },
  };
}
