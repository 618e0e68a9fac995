/**
 * Shared hand-off registry.
 *
 * One observer publishes a value under a correlation key (the claim
 * observer publishes the claim entity under its bound volume name); other
 * observers look it up. A lookup before the publish returns null; callers
 * treat that as "not correlated yet" and try again on their next
 * notification. Nobody waits on a key: the producer's resource may never
 * appear.
 *
 * Operations are synchronous, so concurrent observer tasks on the event
 * loop never see a partial write.
 */
export class HandoffRegistry<V> {
  private entries = new Map<string, V>();

  /** Store `value` under `key`, replacing any earlier value. */
  publish(key: string, value: V): void {
    this.entries.set(key, value);
  }

  lookup(key: string): V | null {
    return this.entries.get(key) ?? null;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
