/**
 * @layover/shared -- Persistent, lazily filled geocode cache.
 *
 * Maps a normalized location key to a GeoPoint. Lookups that miss call
 * the injected GeocodeFn exactly once; the result (or a failure marker)
 * is stored and written through to the storage backend immediately.
 *
 * Retry policy:
 * - A failure recorded during this run is final for the run. The
 *   geocoder is not asked again for that key until the next run.
 * - Failure markers loaded from an earlier run are treated as misses and
 *   retried once.
 */

import type { GeocodeCacheStorage } from "./storage";
import type { GeocodeCacheEntry, GeocodeFn, GeoPoint, Logger } from "./types";
import { isValidGeoPoint } from "./geo";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GeocodeCacheOptions {
  readonly storage: GeocodeCacheStorage;
  readonly geocode: GeocodeFn;
  readonly logger?: Logger;
  /** Clock for fetched_at timestamps. */
  readonly now?: () => Date;
}

/** Per-run counters reported in the run summary. */
export interface GeocodeCacheStats {
  /** Lookups answered from the cache (points and this-run failures). */
  readonly hits: number;
  /** Lookups that called the geocoder. */
  readonly misses: number;
  /** Geocoder calls that produced no usable point. */
  readonly failures: number;
}

// ---------------------------------------------------------------------------
// GeocodeCache
// ---------------------------------------------------------------------------

export class GeocodeCache {
  private readonly storage: GeocodeCacheStorage;
  private readonly geocode: GeocodeFn;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly points = new Map<string, GeoPoint>();
  /** Keys whose lookup failed during this run. */
  private readonly failedThisRun = new Set<string>();
  private loaded = false;

  private hits = 0;
  private misses = 0;
  private failures = 0;

  constructor(options: GeocodeCacheOptions) {
    this.storage = options.storage;
    this.geocode = options.geocode;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read every persisted entry. Called once per run before the first
   * resolve(); resolve() loads lazily when it was not.
   *
   * @throws StorePersistenceError when the backend cannot be read.
   */
  load(): void {
    this.points.clear();
    this.failedThisRun.clear();
    for (const entry of this.storage.loadAll()) {
      if (entry.point !== null) {
        this.points.set(entry.key, entry.point);
      }
    }
    this.loaded = true;
  }

  /**
   * Resolve a normalized key to a point. `query` is what the geocoder is
   * asked for on a miss (defaults to the key itself).
   *
   * Never throws for geocoder failures; persistence failures propagate.
   */
  async resolve(key: string, query: string = key): Promise<GeoPoint | null> {
    if (!this.loaded) {
      this.load();
    }

    const cached = this.points.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }
    if (this.failedThisRun.has(key)) {
      this.hits++;
      return null;
    }

    this.misses++;
    let point: GeoPoint | null;
    try {
      point = await this.geocode(query);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`geocode: lookup for "${query}" failed: ${message}`);
      point = null;
    }

    if (point !== null && !isValidGeoPoint(point)) {
      this.logger.warn(
        `geocode: lookup for "${query}" returned out-of-range coordinates (${point.lat}, ${point.lon})`,
      );
      point = null;
    }

    if (point === null) {
      this.failures++;
      this.failedThisRun.add(key);
      this.logger.warn(`geocode: could not resolve "${query}"`);
    } else {
      this.points.set(key, point);
    }

    const entry: GeocodeCacheEntry = {
      key,
      point,
      fetched_at: this.now().toISOString(),
    };
    this.storage.put(entry);

    return point;
  }

  stats(): GeocodeCacheStats {
    return { hits: this.hits, misses: this.misses, failures: this.failures };
  }
}
