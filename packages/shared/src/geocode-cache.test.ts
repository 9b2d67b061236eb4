/**
 * Unit tests for GeocodeCache.
 *
 * Tests cover:
 * - Cache hits never call the geocoder
 * - One geocoder call per key per run, success or failure
 * - Failures from earlier runs are retried
 * - Write-through of every new entry
 * - Persistence failures propagate
 */

import { describe, it, expect, vi } from "vitest";
import { GeocodeCache } from "./geocode-cache";
import { MemoryGeocodeCacheStorage } from "./storage";
import { StorePersistenceError } from "./persistence";
import type { GeocodeCacheEntry, GeoPoint, Logger } from "./types";

const NOW = new Date("2026-03-01T12:00:00.000Z");
const PARIS: GeoPoint = { lat: 48.8566, lon: 2.3522 };

function silentLogger(): Logger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeCache(
  geocode: (q: string) => Promise<GeoPoint | null>,
  initial: GeocodeCacheEntry[] = [],
) {
  const storage = new MemoryGeocodeCacheStorage(initial);
  const logger = silentLogger();
  const cache = new GeocodeCache({ storage, geocode, logger, now: () => NOW });
  cache.load();
  return { cache, storage, logger };
}

describe("GeocodeCache.resolve", () => {
  it("returns a cached point without calling the geocoder", async () => {
    const geocode = vi.fn(async () => PARIS);
    const { cache } = makeCache(geocode, [
      { key: "paris", point: PARIS, fetched_at: "2025-01-01T00:00:00.000Z" },
    ]);

    expect(await cache.resolve("paris")).toEqual(PARIS);
    expect(geocode).not.toHaveBeenCalled();
    expect(cache.stats()).toEqual({ hits: 1, misses: 0, failures: 0 });
  });

  it("calls the geocoder once for a key resolved twice", async () => {
    const geocode = vi.fn(async () => PARIS);
    const { cache } = makeCache(geocode);

    await cache.resolve("paris");
    await cache.resolve("paris");

    expect(geocode).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, failures: 0 });
  });

  it("passes the query, not the key, to the geocoder", async () => {
    const geocode = vi.fn(async () => PARIS);
    const { cache } = makeCache(geocode);

    await cache.resolve("paris, fr", "Paris, FR");

    expect(geocode).toHaveBeenCalledWith("Paris, FR");
  });

  it("writes new points through with the current timestamp", async () => {
    const { cache, storage } = makeCache(async () => PARIS);

    await cache.resolve("paris");

    expect(storage.loadAll()).toEqual([
      { key: "paris", point: PARIS, fetched_at: "2026-03-01T12:00:00.000Z" },
    ]);
  });

  it("records a failure marker for a null result and does not retry this run", async () => {
    const geocode = vi.fn(async () => null);
    const { cache, storage, logger } = makeCache(geocode);

    expect(await cache.resolve("atlantis")).toBeNull();
    expect(await cache.resolve("atlantis")).toBeNull();

    expect(geocode).toHaveBeenCalledTimes(1);
    expect(storage.loadAll()).toEqual([
      { key: "atlantis", point: null, fetched_at: "2026-03-01T12:00:00.000Z" },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('geocode: could not resolve "atlantis"');
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, failures: 1 });
  });

  it("treats a thrown geocoder error as a failure", async () => {
    const geocode = vi.fn(async (): Promise<GeoPoint | null> => {
      throw new Error("socket hang up");
    });
    const { cache, logger } = makeCache(geocode);

    expect(await cache.resolve("paris")).toBeNull();
    expect(await cache.resolve("paris")).toBeNull();

    expect(geocode).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'geocode: lookup for "paris" failed: socket hang up',
    );
  });

  it("rejects out-of-range coordinates from the geocoder", async () => {
    const { cache } = makeCache(async () => ({ lat: 123, lon: 0 }));
    expect(await cache.resolve("bogus")).toBeNull();
    expect(cache.stats()).toEqual({ hits: 0, misses: 1, failures: 1 });
  });

  it("retries a failure marker loaded from a previous run", async () => {
    const geocode = vi.fn(async () => PARIS);
    const { cache, storage } = makeCache(geocode, [
      { key: "paris", point: null, fetched_at: "2025-01-01T00:00:00.000Z" },
    ]);

    expect(await cache.resolve("paris")).toEqual(PARIS);
    expect(geocode).toHaveBeenCalledTimes(1);
    expect(storage.loadAll()).toEqual([
      { key: "paris", point: PARIS, fetched_at: "2026-03-01T12:00:00.000Z" },
    ]);
  });

  it("loads lazily when load() was not called", async () => {
    const storage = new MemoryGeocodeCacheStorage([
      { key: "paris", point: PARIS, fetched_at: "t" },
    ]);
    const geocode = vi.fn(async () => null);
    const cache = new GeocodeCache({ storage, geocode, logger: silentLogger() });

    expect(await cache.resolve("paris")).toEqual(PARIS);
    expect(geocode).not.toHaveBeenCalled();
  });

  it("propagates persistence failures", async () => {
    const storage = new MemoryGeocodeCacheStorage();
    vi.spyOn(storage, "put").mockImplementation(() => {
      throw new StorePersistenceError("disk full", "/tmp/geo_cache.json");
    });
    const cache = new GeocodeCache({
      storage,
      geocode: async () => PARIS,
      logger: silentLogger(),
    });

    await expect(cache.resolve("paris")).rejects.toBeInstanceOf(StorePersistenceError);
  });
});
