/**
 * @layover/shared -- Decides whether a trip destination and a contact
 * city refer to the same place.
 *
 * Two passes:
 * 1. Exact: the normalized destination equals a city key. No geocoding.
 * 2. Radius: geocode the destination and each city, keep cities within
 *    radiusKm (inclusive), pick the closest. Ties within
 *    DISTANCE_TIE_TOLERANCE_KM go to the lexicographically smallest key.
 *
 * City keys are assumed to be normalized already (the contact directory
 * loader builds them with normalizeLocation).
 */

import type { ContactCity, MatchResult, TripRecord } from "./types";
import type { GeocodeCache } from "./geocode-cache";
import { normalizeLocation } from "./normalize";
import { haversineKm } from "./geo";
import { DEFAULT_RADIUS_KM, DISTANCE_TIE_TOLERANCE_KM } from "./constants";

export interface CityMatcherOptions {
  readonly cache: GeocodeCache;
  /** Inclusive match radius. Must be > 0. */
  readonly radiusKm?: number;
}

/** The part of a MatchResult that does not depend on the trip. */
export type CityMatch = Omit<MatchResult, "trip">;

export class CityMatcher {
  private readonly cache: GeocodeCache;
  readonly radiusKm: number;

  constructor(options: CityMatcherOptions) {
    const radiusKm = options.radiusKm ?? DEFAULT_RADIUS_KM;
    if (!(radiusKm > 0) || !Number.isFinite(radiusKm)) {
      throw new RangeError(`radiusKm must be a positive number, got ${radiusKm}`);
    }
    this.cache = options.cache;
    this.radiusKm = radiusKm;
  }

  /**
   * Match a raw destination against the known cities.
   * Returns null when nothing qualifies (including when the destination
   * cannot be geocoded).
   */
  async match(
    destinationRaw: string,
    cities: readonly ContactCity[],
  ): Promise<CityMatch | null> {
    const destinationKey = normalizeLocation(destinationRaw);
    if (destinationKey === "" || cities.length === 0) {
      return null;
    }

    const exact = cities.find((city) => city.key === destinationKey);
    if (exact !== undefined) {
      return { city: exact, match_kind: "EXACT", distance_km: null };
    }

    const destination = await this.cache.resolve(destinationKey, destinationRaw);
    if (destination === null) {
      return null;
    }

    const ordered = [...cities].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

    let best: { city: ContactCity; distance: number } | null = null;
    for (const city of ordered) {
      const point = await this.cache.resolve(city.key, city.display_name);
      if (point === null) {
        continue;
      }

      const distance = haversineKm(destination, point);
      if (distance > this.radiusKm) {
        continue;
      }

      // Keys are visited in ascending order, so an equal distance never
      // displaces the current best.
      if (best === null || distance < best.distance - DISTANCE_TIE_TOLERANCE_KM) {
        best = { city, distance };
      }
    }

    if (best === null) {
      return null;
    }
    return { city: best.city, match_kind: "RADIUS", distance_km: best.distance };
  }

  /** Match a trip and attach it to the result. */
  async matchTrip(
    trip: TripRecord,
    cities: readonly ContactCity[],
  ): Promise<MatchResult | null> {
    const result = await this.match(trip.destination_raw, cities);
    return result === null ? null : { trip, ...result };
  }
}
