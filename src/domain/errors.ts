/**
 * Typed error model.
 *
 * Observers never let errors escape their run loop; they log the typed
 * error instead. Store and metrics failures that callers must handle are
 * thrown as error classes carrying the same typed payload.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'WATCH'
  | 'STORE'
  | 'OBSERVER'
  | 'RUNNER'
  | 'METRICS'
  | 'VALIDATION'
  | 'SYSTEM';

/** The typed error structure used in logs and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "STORE.WRITE_FAILED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated test case if applicable. */
  testCaseId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  testCaseId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    testCaseId: params.testCaseId,
    retryable: params.retryable ?? false,
    details: params.details,
  };
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// --- Watch ---

export function watchOpenError(resource: string, cause: unknown): TypedError {
  return createTypedError({
    code: 'WATCH.OPEN_FAILED',
    message: `Cannot open watch on ${resource}: ${causeMessage(cause)}`,
    retryable: true,
    details: { resource },
  });
}

export function unexpectedPayloadError(observer: string, notificationType: string): TypedError {
  return createTypedError({
    code: 'WATCH.UNEXPECTED_PAYLOAD',
    message: `${observer}: unexpected payload in ${notificationType} notification`,
    details: { observer, notificationType },
  });
}

export function unknownNotificationError(observer: string, notificationType: string): TypedError {
  return createTypedError({
    code: 'WATCH.UNKNOWN_TYPE',
    message: `${observer}: unexpected notification type "${notificationType}"`,
    details: { observer, notificationType },
  });
}

// --- Store ---

export function storeWriteError(operation: string, cause: unknown): TypedError {
  return createTypedError({
    code: 'STORE.WRITE_FAILED',
    message: `${operation} failed: ${causeMessage(cause)}`,
    retryable: true,
    details: { operation },
  });
}

export function storeReadError(operation: string, cause: unknown): TypedError {
  return createTypedError({
    code: 'STORE.READ_FAILED',
    message: `${operation} failed: ${causeMessage(cause)}`,
    retryable: true,
    details: { operation },
  });
}

export function missingEntityError(eventName: string, entityId: string): TypedError {
  return createTypedError({
    code: 'STORE.MISSING_ENTITY',
    message: `Event ${eventName} references unknown entity ${entityId}`,
    details: { eventName, entityId },
  });
}

export function duplicateNameError(resourceType: string, name: string): TypedError {
  return createTypedError({
    code: 'STORE.CONFLICT',
    message: `${resourceType} already exists: ${name}`,
    details: { resourceType, name },
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
  });
}

// --- Observer ---

export function flushFailedError(observer: string, testCaseId: string, eventCount: number, cause: unknown): TypedError {
  return createTypedError({
    code: 'OBSERVER.FLUSH_FAILED',
    message: `${observer} could not persist ${eventCount} events: ${causeMessage(cause)}`,
    testCaseId,
    details: { observer, eventCount },
  });
}

// --- Metrics ---

export function runNotFoundError(identifier: string): TypedError {
  return createTypedError({
    code: 'METRICS.RUN_NOT_FOUND',
    message: `No recorded run for ${identifier}`,
    details: { identifier },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

/** Thrown by store implementations for any failure other than an idempotent conflict. */
export class StoreError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'StoreError';
  }
}

/** Thrown by the metrics collector. */
export class MetricsError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'MetricsError';
  }
}

/** True when `err` is the collector's "no such run" condition. */
export function isRunNotFound(err: unknown): err is MetricsError {
  return err instanceof MetricsError && err.typedError.code === 'METRICS.RUN_NOT_FOUND';
}

export function runnerAlreadyStartedError(testCaseId: string): TypedError {
  return createTypedError({
    code: 'RUNNER.ALREADY_STARTED',
    message: `Observers for test case ${testCaseId} are already running`,
    testCaseId,
  });
}

/** Thrown by the runner on lifecycle misuse. */
export class RunnerError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'RunnerError';
  }
}
