/**
 * @layover/shared -- Storage backends for the two persistent stores.
 *
 * GeocodeCache and OutreachStateStore own their in-memory view and write
 * through one of these backends on every new entry. Backends are
 * synchronous; a backend that cannot read or write throws
 * StorePersistenceError and the run stops.
 *
 * Implementations:
 * - JSON files (persistence.ts) -- default, human-inspectable
 * - SQLite (@layover/registry) -- better-sqlite3
 * - In-memory (below) -- tests and dry runs
 */

import type { GeocodeCacheEntry, NotifiedPairRecord } from "./types";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Durable mapping from normalized location key to geocode result. */
export interface GeocodeCacheStorage {
  /** Every persisted entry, at most one per key. */
  loadAll(): GeocodeCacheEntry[];
  /** Insert or wholesale-overwrite the entry for `entry.key`. */
  put(entry: GeocodeCacheEntry): void;
}

/** Durable set of notified (trip_id, city_key) pairs. */
export interface NotifiedPairStorage {
  loadAll(): NotifiedPairRecord[];
  /** Persist a new pair. Callers never add the same pair twice. */
  add(record: NotifiedPairRecord): void;
  /** Record the run that last opened this store (debugging aid). */
  recordRun(runId: string): void;
}

// ---------------------------------------------------------------------------
// In-memory implementations
// ---------------------------------------------------------------------------

export class MemoryGeocodeCacheStorage implements GeocodeCacheStorage {
  private readonly entries = new Map<string, GeocodeCacheEntry>();

  constructor(initial: readonly GeocodeCacheEntry[] = []) {
    for (const entry of initial) {
      this.entries.set(entry.key, entry);
    }
  }

  loadAll(): GeocodeCacheEntry[] {
    return [...this.entries.values()];
  }

  put(entry: GeocodeCacheEntry): void {
    this.entries.set(entry.key, entry);
  }
}

export class MemoryNotifiedPairStorage implements NotifiedPairStorage {
  private readonly records: NotifiedPairRecord[];
  lastRunId: string | null = null;

  constructor(initial: readonly NotifiedPairRecord[] = []) {
    this.records = [...initial];
  }

  loadAll(): NotifiedPairRecord[] {
    return [...this.records];
  }

  add(record: NotifiedPairRecord): void {
    this.records.push(record);
  }

  recordRun(runId: string): void {
    this.lastRunId = runId;
  }
}
