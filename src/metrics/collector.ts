/**
 * Metrics collector.
 *
 * Reads a finalized test case back from the store, rebuilds each entity's
 * timeline ordered by recorded timestamp, and derives event counts and
 * stage durations. Arrival order across observers is never used.
 */

import { Entity } from '../domain/entity';
import { Event, EventType, sortByTimestamp } from '../domain/event';
import { MetricsError, isRunNotFound, runNotFoundError } from '../domain/errors';
import { EntityCounts, NumberEntities, TestCase, TestRun, emptyEntityCounts } from '../domain/test-run';
import { Store } from '../storage/store';

/** Measured phases, each bounded by a start and an end event type. */
export enum Stage {
  PvcCreation = 'PVCCreation',
  PvcDeletion = 'PVCDeletion',
  PodCreation = 'PodCreation',
  PodDeletion = 'PodDeletion',
  PvcAttachment = 'PVCAttachment',
  PvcUnattachment = 'PVCUnattachment',
}

export const STAGE_BOUNDARIES: Readonly<Record<Stage, { start: EventType; end: EventType }>> = {
  [Stage.PvcCreation]: { start: EventType.PvcAdded, end: EventType.PvcBound },
  [Stage.PvcDeletion]: { start: EventType.PvcDeletingStarted, end: EventType.PvcDeletingEnded },
  [Stage.PodCreation]: { start: EventType.PodAdded, end: EventType.PodReady },
  [Stage.PodDeletion]: { start: EventType.PodTerminating, end: EventType.PodDeleted },
  [Stage.PvcAttachment]: { start: EventType.VaAdded, end: EventType.VaAttached },
  [Stage.PvcUnattachment]: { start: EventType.VaDeletingStarted, end: EventType.VaDeletingEnded },
};

export interface DurationStats {
  count: number;
  minMs: number;
  maxMs: number;
  avgMs: number;
  medianMs: number;
}

export interface EntityTimeline {
  entity: Entity;
  /** Sorted by timestamp. */
  events: Event[];
}

export interface TestCaseMetrics {
  testCase: TestCase;
  timelines: EntityTimeline[];
  /** Every event type, zero when none was recorded. */
  eventCounts: Record<EventType, number>;
  /** Every stage, with count 0 when no entity completed it. */
  stages: Record<Stage, DurationStats>;
  entityCounts: {
    samples: number;
    peak: EntityCounts;
  };
}

export interface RunMetrics {
  run: TestRun;
  testCases: TestCaseMetrics[];
}

/** Summarise a list of durations. An empty list yields all zeros. */
export function durationStats(durations: readonly number[]): DurationStats {
  if (durations.length === 0) {
    return { count: 0, minMs: 0, maxMs: 0, avgMs: 0, medianMs: 0 };
  }
  const sorted = [...durations].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const medianMs = sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
  return {
    count: sorted.length,
    minMs: sorted[0],
    maxMs: sorted[sorted.length - 1],
    avgMs: sorted.reduce((sum, d) => sum + d, 0) / sorted.length,
    medianMs,
  };
}

/**
 * Durations of one stage within a single timeline. Each end event closes
 * the oldest open start, so an entity attached twice yields two durations.
 */
export function stageDurations(events: readonly Event[], stage: Stage): number[] {
  const { start, end } = STAGE_BOUNDARIES[stage];
  const open: number[] = [];
  const durations: number[] = [];
  for (const event of events) {
    const at = Date.parse(event.timestamp);
    if (event.type === start) {
      open.push(at);
    } else if (event.type === end) {
      const startedAt = open.shift();
      if (startedAt !== undefined) durations.push(at - startedAt);
    }
  }
  return durations;
}

/** Build per-entity timelines; events of unknown entities are skipped. */
export function buildTimelines(entities: readonly Entity[], events: readonly Event[]): EntityTimeline[] {
  const byEntity = new Map<string, Event[]>();
  for (const entity of entities) byEntity.set(entity.id, []);
  for (const event of events) byEntity.get(event.entityId)?.push(event);
  return entities.map((entity) => ({ entity, events: sortByTimestamp(byEntity.get(entity.id) ?? []) }));
}

/** Count events per type, listing every type. */
export function countEvents(events: readonly Event[]): Record<EventType, number> {
  const counts: Record<EventType, number> = {
    [EventType.PvcAdded]: 0,
    [EventType.PvcBound]: 0,
    [EventType.PvcDeletingStarted]: 0,
    [EventType.PvcDeletingEnded]: 0,
    [EventType.PodAdded]: 0,
    [EventType.PodReady]: 0,
    [EventType.PodTerminating]: 0,
    [EventType.PodDeleted]: 0,
    [EventType.VaAdded]: 0,
    [EventType.VaAttached]: 0,
    [EventType.VaDeletingStarted]: 0,
    [EventType.VaDeletingEnded]: 0,
  };
  for (const event of events) counts[event.type] += 1;
  return counts;
}

function peakCounts(samples: readonly NumberEntities[]): EntityCounts {
  const peak = emptyEntityCounts();
  for (const s of samples) {
    peak.podsCreating = Math.max(peak.podsCreating, s.podsCreating);
    peak.podsReady = Math.max(peak.podsReady, s.podsReady);
    peak.podsTerminating = Math.max(peak.podsTerminating, s.podsTerminating);
    peak.pvcCreating = Math.max(peak.pvcCreating, s.pvcCreating);
    peak.pvcBound = Math.max(peak.pvcBound, s.pvcBound);
    peak.pvcTerminating = Math.max(peak.pvcTerminating, s.pvcTerminating);
  }
  return peak;
}

export class MetricsCollector {
  constructor(private store: Store) {}

  /**
   * Metrics for one test case. Rejects with METRICS.RUN_NOT_FOUND when the
   * test case is unknown or recorded no entities.
   */
  async collect(testCaseId: string): Promise<TestCaseMetrics> {
    const [testCase, entities] = await Promise.all([
      this.store.testCases.getById(testCaseId),
      this.store.entities.listByTestCase(testCaseId),
    ]);
    if (!testCase || entities.length === 0) {
      throw new MetricsError(runNotFoundError(`test case ${testCaseId}`));
    }

    const [events, samples] = await Promise.all([
      this.store.events.listByTestCase(testCaseId),
      this.store.numberEntities.listByTestCase(testCaseId),
    ]);
    const timelines = buildTimelines(entities, events);

    const stats = (stage: Stage) => durationStats(timelines.flatMap((t) => stageDurations(t.events, stage)));

    return {
      testCase,
      timelines,
      eventCounts: countEvents(events),
      stages: {
        [Stage.PvcCreation]: stats(Stage.PvcCreation),
        [Stage.PvcDeletion]: stats(Stage.PvcDeletion),
        [Stage.PodCreation]: stats(Stage.PodCreation),
        [Stage.PodDeletion]: stats(Stage.PodDeletion),
        [Stage.PvcAttachment]: stats(Stage.PvcAttachment),
        [Stage.PvcUnattachment]: stats(Stage.PvcUnattachment),
      },
      entityCounts: { samples: samples.length, peak: peakCounts(samples) },
    };
  }

  /** Metrics for every test case of a run that recorded entities. */
  async collectRun(runName: string): Promise<RunMetrics> {
    const run = await this.store.testRuns.getByName(runName);
    if (!run) {
      throw new MetricsError(runNotFoundError(`run ${runName}`));
    }
    const testCases = await this.store.testCases.listByRun(run.id);
    const metrics: TestCaseMetrics[] = [];
    for (const testCase of testCases) {
      try {
        metrics.push(await this.collect(testCase.id));
      } catch (err) {
        if (!isRunNotFound(err)) throw err;
      }
    }
    return { run, testCases: metrics };
  }
}
