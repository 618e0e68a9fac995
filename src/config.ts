/**
 * Observation configuration.
 *
 * Defaults suit a single certification test case against a real cluster.
 * Callers override only the fields they care about; process environment
 * values are read by loadObservationConfigFromEnv().
 */

import { LogLevel, parseLogLevel } from './logger';

export interface ObservationConfig {
  /** Server-side bound on each watch session. Default: 1800 (30 min). */
  watchTimeoutSeconds: number;
  /** How long Runner.stop() waits for observers to flush. Default: 60_000. */
  stopTimeoutMs: number;
  /** Sampling interval of the entity-count observer. Default: 1_000. */
  entityPollIntervalMs: number;
  /** Namespace the namespaced watches and lists run in. Default: "default". */
  namespace: string;
  /** Minimum level written by the logger; a Runner given one applies it. Default: info. */
  logLevel: LogLevel;
}

export const DEFAULT_OBSERVATION_CONFIG: Readonly<ObservationConfig> = {
  watchTimeoutSeconds: 1800,
  stopTimeoutMs: 60_000,
  entityPollIntervalMs: 1_000,
  namespace: 'default',
  logLevel: LogLevel.Info,
};

/** Merge a partial config with the defaults. */
export function mergeObservationConfig(override?: Partial<ObservationConfig>): ObservationConfig {
  if (!override) return { ...DEFAULT_OBSERVATION_CONFIG };
  return {
    ...DEFAULT_OBSERVATION_CONFIG,
    ...override,
  };
}

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Read overrides from environment variables:
 * WATCH_TIMEOUT_SECONDS, STOP_TIMEOUT_MS, ENTITY_POLL_INTERVAL_MS,
 * OBSERVER_NAMESPACE, LOG_LEVEL. Unset or invalid values fall back to
 * the defaults.
 */
export function loadObservationConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ObservationConfig {
  const override: Partial<ObservationConfig> = {};

  const watchTimeoutSeconds = positiveInt(env.WATCH_TIMEOUT_SECONDS);
  if (watchTimeoutSeconds !== undefined) override.watchTimeoutSeconds = watchTimeoutSeconds;

  const stopTimeoutMs = positiveInt(env.STOP_TIMEOUT_MS);
  if (stopTimeoutMs !== undefined) override.stopTimeoutMs = stopTimeoutMs;

  const entityPollIntervalMs = positiveInt(env.ENTITY_POLL_INTERVAL_MS);
  if (entityPollIntervalMs !== undefined) override.entityPollIntervalMs = entityPollIntervalMs;

  const namespace = env.OBSERVER_NAMESPACE?.trim();
  if (namespace) override.namespace = namespace;

  override.logLevel = parseLogLevel(env.LOG_LEVEL, DEFAULT_OBSERVATION_CONFIG.logLevel);

  return mergeObservationConfig(override);
}
