/**
 * @layover/shared -- Great-circle distance and coordinate helpers.
 *
 * Used by the radius pass of CityMatcher. All distances are kilometres
 * on a spherical Earth (EARTH_RADIUS_KM), which is well inside the
 * accuracy needed to decide "same metro area".
 */

import type { GeoPoint } from "./types";
import { EARTH_RADIUS_KM } from "./constants";

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Haversine distance between two points, in kilometres.
 *
 * Symmetric and exactly 0 for identical points.
 */
export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLon / 2) ** 2;

  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Whether a value is a finite coordinate inside the WGS84 bounds.
 * Geocoder responses and cache files are checked with this before use.
 */
export function isValidGeoPoint(point: GeoPoint): boolean {
  return (
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lon) &&
    Math.abs(point.lat) <= 90 &&
    Math.abs(point.lon) <= 180
  );
}
