/**
 * Test run and test case records.
 *
 * A test run groups the test cases executed against one storage class.
 * Every entity, event and entity-count sample belongs to one test case.
 */

/** A named certification run. */
export interface TestRun {
  id: string;
  /** Unique run name, e.g. "test-run-1a2b3c4d". */
  name: string;
  storageClass: string;
  clusterAddress: string;
  startTimestamp: string;
}

/** One scenario executed inside a test run. */
export interface TestCase {
  id: string;
  runId: string;
  name: string;
  /** Free-form scenario parameters, recorded for the reporter. */
  parameters: string;
  startTimestamp: string;
  endTimestamp?: string;
  success?: boolean;
  errorMessage?: string;
}

export interface CreateTestRunInput {
  name: string;
  storageClass: string;
  clusterAddress?: string;
}

export interface CreateTestCaseInput {
  runId: string;
  name: string;
  parameters?: string;
}

/** Counts of resources by lifecycle state at one sampling instant. */
export interface EntityCounts {
  podsCreating: number;
  podsReady: number;
  podsTerminating: number;
  pvcCreating: number;
  pvcBound: number;
  pvcTerminating: number;
}

/** A persisted entity-count sample. */
export interface NumberEntities extends EntityCounts {
  id: string;
  tcId: string;
  timestamp: string;
}

export function emptyEntityCounts(): EntityCounts {
  return {
    podsCreating: 0,
    podsReady: 0,
    podsTerminating: 0,
    pvcCreating: 0,
    pvcBound: 0,
    pvcTerminating: 0,
  };
}
