/**
 * @layover/shared -- Domain types for the Layover outreach engine.
 *
 * Records coming from the trip feed and the contact directory are
 * immutable value objects; the engine never mutates them. Snake_case
 * field names match the persisted file formats so rows and files can be
 * compared field for field while debugging.
 */

// ---------------------------------------------------------------------------
// Trips
// ---------------------------------------------------------------------------

/** One itinerary entry from the trip feed. */
export interface TripRecord {
  /** Opaque, stable across feed reads. */
  readonly trip_id: string;
  /** Destination as written in the feed (LOCATION, else SUMMARY). */
  readonly destination_raw: string;
  /** Local date YYYY-MM-DD, or null when the feed has none. */
  readonly start_date: string | null;
  /** Local date YYYY-MM-DD, or null when the feed has none. */
  readonly end_date: string | null;
}

// ---------------------------------------------------------------------------
// Contact directory
// ---------------------------------------------------------------------------

/** A single line of a city contacts file. */
export interface ContactLine {
  readonly name: string;
  readonly notes: string | null;
}

/**
 * One contacts file. `key` is the normalized file base name and is the
 * identity used for matching and for notified-pair history.
 */
export interface ContactCity {
  readonly key: string;
  readonly display_name: string;
  readonly contacts: readonly ContactLine[];
}

// ---------------------------------------------------------------------------
// Geography
// ---------------------------------------------------------------------------

/** A resolved coordinate in decimal degrees. */
export interface GeoPoint {
  readonly lat: number;
  readonly lon: number;
}

/**
 * A geocode cache entry. `point: null` records a failed resolution
 * (no result, network error, timeout).
 */
export interface GeocodeCacheEntry {
  readonly key: string;
  readonly point: GeoPoint | null;
  /** ISO 8601 timestamp of the lookup. */
  readonly fetched_at: string;
}

/** Injected geocoding function. Resolves to null when nothing was found. */
export type GeocodeFn = (query: string) => Promise<GeoPoint | null>;

// ---------------------------------------------------------------------------
// Matching and reminders
// ---------------------------------------------------------------------------

/** How a destination was matched to a contact city. */
export type MatchKind = "EXACT" | "RADIUS";

/** Outcome of CityMatcher.match() when a city qualified. */
export interface MatchResult {
  readonly trip: TripRecord;
  readonly city: ContactCity;
  readonly match_kind: MatchKind;
  /** Great-circle distance in km; null for EXACT matches. */
  readonly distance_km: number | null;
}

/** A reminder the task collaborator should turn into outreach tasks. */
export type ActionableReminder = MatchResult;

/** A (trip, contact-city) combination for which a reminder was delivered. */
export interface NotifiedPair {
  readonly trip_id: string;
  readonly city_key: string;
}

/** Persisted form of a notified pair. */
export interface NotifiedPairRecord extends NotifiedPair {
  /** ISO 8601 timestamp of the confirmation. */
  readonly notified_at: string;
}

/**
 * Task-creation collaborator. Resolves when every task for the reminder
 * was created; rejects otherwise.
 */
export type CreateTasksFn = (reminder: ActionableReminder) => Promise<void>;

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

/** The subset of console used across the codebase. Injectable for tests. */
export interface Logger {
  log(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

/**
 * Injectable fetch function. In production this is globalThis.fetch; in
 * tests it is replaced with a mock.
 */
export type FetchFn = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;
