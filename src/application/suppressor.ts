/**
 * Fields whose updates are worth a notification.
 * Changes to anything else (sort_order, labels, ...) are dropped.
 */
export const NOTIFIABLE_FIELDS: ReadonlySet<string> = new Set([
  'name',
  'priority',
  'state',
  'state_id',
  'assignee_ids',
  'target_date',
  'parent',
  'estimate_point',
]);

export function isNotifiableField(field: string): boolean {
  return NOTIFIABLE_FIELDS.has(field);
}

export interface UpdateDebouncerOptions {
  /** Minimum spacing between accepted updates for one entity. Default 2s. */
  readonly windowSeconds?: number;
  /** Map size above which elapsed entries are evicted. Default 10 000. */
  readonly maxEntries?: number;
  /** Clock in milliseconds, injectable for tests. */
  readonly nowFn?: () => number;
}

/**
 * Per-entity debounce for update notifications.
 *
 * Keys on the entity id alone, not on the changed field: two different
 * fields updated inside one window yield a single notification.
 *
 * `tryAccept()` reads and writes the map in one synchronous call. Node.js
 * runs it to completion before any other request handler resumes, so the
 * check-and-set cannot interleave with a concurrent request for the same id.
 *
 * Time has second granularity: an update at second `t` is accepted only if
 * the previous acceptance was at or before `t - windowSeconds`.
 */
export class UpdateDebouncer {
  /** entity id → last accepted time (unix seconds). */
  private readonly lastAccepted: Map<string, number> = new Map();
  private readonly windowSeconds: number;
  private readonly maxEntries: number;
  private readonly nowFn: () => number;

  constructor(options: UpdateDebouncerOptions = {}) {
    this.windowSeconds = options.windowSeconds ?? 2;
    this.maxEntries = options.maxEntries ?? 10_000;
    this.nowFn = options.nowFn ?? Date.now;
  }

  /**
   * Returns true and records the acceptance if no update for `entityId`
   * was accepted inside the window; returns false otherwise.
   */
  tryAccept(entityId: string): boolean {
    const now = Math.floor(this.nowFn() / 1000);
    const last = this.lastAccepted.get(entityId);

    if (last !== undefined && now < last + this.windowSeconds) {
      return false;
    }

    this.lastAccepted.set(entityId, now);

    if (this.lastAccepted.size > this.maxEntries) {
      this.evictElapsed(now);
    }

    return true;
  }

  /** Drops entries whose window has passed; they can no longer suppress anything. */
  private evictElapsed(now: number): void {
    for (const [id, last] of this.lastAccepted) {
      if (now >= last + this.windowSeconds) {
        this.lastAccepted.delete(id);
      }
    }
  }

  /** Number of entities tracked. */
  get size(): number {
    return this.lastAccepted.size;
  }
}
