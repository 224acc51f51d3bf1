/**
 * Short-lived memoisation for expensive read queries (stats endpoints are
 * polled by dashboards every second or so).
 *
 * @packageDocumentation
 */

interface Slot<T> {
  value: T;
  expiresAt: number;
}

export class QueryCache<T> {
  private readonly slots = new Map<string, Slot<T>>();
  readonly ttlMs: number;

  constructor(ttlMs = 1000) {
    this.ttlMs = ttlMs;
  }

  get(key: string, compute: () => T): T {
    const now = Date.now();
    const slot = this.slots.get(key);
    if (slot && now < slot.expiresAt) return slot.value;

    const value = compute();
    if (this.ttlMs > 0) {
      this.slots.set(key, { value, expiresAt: now + this.ttlMs });
    }
    return value;
  }

  invalidate(key?: string): void {
    if (key === undefined) this.slots.clear();
    else this.slots.delete(key);
  }
}
