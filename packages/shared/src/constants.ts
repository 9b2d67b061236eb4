/**
 * @layover/shared -- Constants for the Layover outreach engine.
 *
 * All magic strings, default values, and prefix maps live here so that
 * the worker, the workflow, and the stores reference the same values.
 */

// ---------------------------------------------------------------------------
// Matching defaults
// ---------------------------------------------------------------------------

/** Default radius for geocoded matches, in kilometres. */
export const DEFAULT_RADIUS_KM = 50;

/** Mean Earth radius used by the haversine formula, in kilometres. */
export const EARTH_RADIUS_KM = 6371.0;

/**
 * Two candidate distances closer than this are considered equal and the
 * lexicographically smaller city key wins.
 */
export const DISTANCE_TIE_TOLERANCE_KM = 1e-9;

// ---------------------------------------------------------------------------
// Feed and directory defaults
// ---------------------------------------------------------------------------

/** Only trips overlapping the next N days are reconciled. */
export const DEFAULT_LOOKAHEAD_DAYS = 90;

/** Default IANA timezone for converting feed datetimes to dates. */
export const DEFAULT_TIMEZONE = "UTC";

/** Default contacts directory (one `<city>.txt` file per city). */
export const DEFAULT_CONTACTS_DIR = "~/travel-contacts";

/** Extension of contact city files (matched case-insensitively). */
export const CONTACT_FILE_EXTENSION = ".txt" as const;

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

/** JSON backend: notified-pair history file name. */
export const STATE_FILE = "state.json" as const;

/** JSON backend: geocode cache file name. */
export const GEO_CACHE_FILE = "geo_cache.json" as const;

/** SQLite backend: database file name. */
export const SQLITE_DB_FILE = "layover.db" as const;

/** Version stamped into both JSON store files. */
export const STORE_FILE_VERSION = 1 as const;

// ---------------------------------------------------------------------------
// External services
// ---------------------------------------------------------------------------

/** Client marker sent with every outbound request (Nominatim usage policy). */
export const DEFAULT_USER_AGENT = "layover/1.0 (personal use)" as const;

/** Public Nominatim instance. */
export const DEFAULT_NOMINATIM_BASE_URL =
  "https://nominatim.openstreetmap.org" as const;

/** Nominatim allows at most one request per second. */
export const DEFAULT_GEOCODE_MIN_INTERVAL_MS = 1100;

/** Abort a geocode request after this long. */
export const DEFAULT_GEOCODE_TIMEOUT_MS = 20_000;

/** Todoist REST endpoint for task creation. */
export const TODOIST_TASKS_URL = "https://api.todoist.com/api/v1/tasks" as const;

/** Abort a task creation request after this long. */
export const TODOIST_TIMEOUT_MS = 20_000;

/** Abort a feed download after this long. */
export const FEED_FETCH_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// ID prefix map
// ---------------------------------------------------------------------------

/**
 * Prefix map for generating branded IDs.
 * Usage: `ID_PREFIXES.run + ulid()` => "run_01HXYZ..."
 */
export const ID_PREFIXES = {
  run: "run_",
  task: "tsk_",
} as const;
