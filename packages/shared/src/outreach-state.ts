/**
 * @layover/shared -- History of (trip, contact-city) pairs that already
 * received outreach tasks.
 *
 * Pairs are only ever added. Each first insertion is written through to
 * the storage backend before markNotified returns, so an interrupted run
 * keeps every pair it confirmed.
 *
 * ignoreHistoryForThisRun() makes isNotified answer false for the rest
 * of this object's life without touching what is stored; marks made
 * while it is active still persist.
 */

import type { NotifiedPairStorage } from "./storage";
import type { NotifiedPairRecord } from "./types";

export interface OutreachStateStoreOptions {
  readonly storage: NotifiedPairStorage;
  readonly now?: () => Date;
}

/** Pairs are kept as one string; the separator cannot appear in a normalized key. */
function pairKey(tripId: string, cityKey: string): string {
  return `${tripId}\u0000${cityKey}`;
}

export class OutreachStateStore {
  private readonly storage: NotifiedPairStorage;
  private readonly now: () => Date;
  private readonly pairs = new Set<string>();
  private ignoreHistory = false;
  private loaded = false;

  constructor(options: OutreachStateStoreOptions) {
    this.storage = options.storage;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read the persisted history. With a runId, also records it as the
   * run that last opened the store.
   *
   * @throws StorePersistenceError when the backend cannot be read or written.
   */
  load(runId?: string): void {
    this.pairs.clear();
    for (const record of this.storage.loadAll()) {
      this.pairs.add(pairKey(record.trip_id, record.city_key));
    }
    this.loaded = true;
    if (runId !== undefined) {
      this.storage.recordRun(runId);
    }
  }

  isNotified(tripId: string, cityKey: string): boolean {
    this.ensureLoaded();
    if (this.ignoreHistory) {
      return false;
    }
    return this.pairs.has(pairKey(tripId, cityKey));
  }

  /**
   * Record a delivered pair. A second call for the same pair is a no-op
   * and writes nothing.
   */
  markNotified(tripId: string, cityKey: string): void {
    this.ensureLoaded();
    const key = pairKey(tripId, cityKey);
    if (this.pairs.has(key)) {
      return;
    }

    const record: NotifiedPairRecord = {
      trip_id: tripId,
      city_key: cityKey,
      notified_at: this.now().toISOString(),
    };
    this.storage.add(record);
    this.pairs.add(key);
  }

  ignoreHistoryForThisRun(): void {
    this.ignoreHistory = true;
  }

  get ignoringHistory(): boolean {
    return this.ignoreHistory;
  }

  /** Number of persisted pairs, regardless of the override. */
  get size(): number {
    this.ensureLoaded();
    return this.pairs.size;
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      this.load();
    }
  }
}
