/**
 * @layover/shared -- shared types, constants, and the matching engine
 * pieces for the Layover trip outreach job.
 */

/** Application name constant. */
export const APP_NAME = "layover" as const;

// Re-export all domain types
export type {
  TripRecord,
  ContactLine,
  ContactCity,
  GeoPoint,
  GeocodeCacheEntry,
  GeocodeFn,
  MatchKind,
  MatchResult,
  ActionableReminder,
  NotifiedPair,
  NotifiedPairRecord,
  CreateTasksFn,
  Logger,
  FetchFn,
} from "./types";

// Re-export all constants
export {
  DEFAULT_RADIUS_KM,
  EARTH_RADIUS_KM,
  DISTANCE_TIE_TOLERANCE_KM,
  DEFAULT_LOOKAHEAD_DAYS,
  DEFAULT_TIMEZONE,
  DEFAULT_CONTACTS_DIR,
  CONTACT_FILE_EXTENSION,
  STATE_FILE,
  GEO_CACHE_FILE,
  SQLITE_DB_FILE,
  STORE_FILE_VERSION,
  DEFAULT_USER_AGENT,
  DEFAULT_NOMINATIM_BASE_URL,
  DEFAULT_GEOCODE_MIN_INTERVAL_MS,
  DEFAULT_GEOCODE_TIMEOUT_MS,
  TODOIST_TASKS_URL,
  TODOIST_TIMEOUT_MS,
  FEED_FETCH_TIMEOUT_MS,
  ID_PREFIXES,
} from "./constants";

// Re-export ID utilities
export { generateId } from "./id";
export type { EntityType } from "./id";

// Re-export location normalization and distance math
export { normalizeLocation } from "./normalize";
export { haversineKm, isValidGeoPoint } from "./geo";

// Re-export the two stores and their backends
export { GeocodeCache } from "./geocode-cache";
export type { GeocodeCacheOptions, GeocodeCacheStats } from "./geocode-cache";
export { OutreachStateStore } from "./outreach-state";
export type { OutreachStateStoreOptions } from "./outreach-state";
export { MemoryGeocodeCacheStorage, MemoryNotifiedPairStorage } from "./storage";
export type { GeocodeCacheStorage, NotifiedPairStorage } from "./storage";
export {
  StorePersistenceError,
  JsonGeocodeCacheFile,
  JsonNotifiedPairFile,
  GeoCacheFileSchema,
  LegacyGeoCacheFileSchema,
  StateFileSchema,
  readJsonFile,
  writeJsonFile,
  parseGeoCacheFile,
  serializeGeoCacheFile,
  parseStateFile,
} from "./persistence";
export type { GeoCacheFile, StateFile } from "./persistence";

// Re-export the city matcher
export { CityMatcher } from "./city-matcher";
export type { CityMatcherOptions, CityMatch } from "./city-matcher";

// Re-export iCalendar parsing and the trip feed reader
export {
  unfoldLines,
  unescapeText,
  parsePropertyLine,
  parseVEvents,
  parseICalDateTime,
} from "./ical-parse";
export type { ParsedVEvent, ICalDateTime } from "./ical-parse";
export {
  validateFeedUrl,
  fetchTripFeed,
  FeedFetchError,
  extractTrips,
  isValidTimeZone,
  localDateInZone,
  addDays,
} from "./ics-feed";
export type {
  FeedValidationResult,
  FetchTripFeedOptions,
  ExtractTripsOptions,
} from "./ics-feed";

// Re-export the contact directory loader
export { loadContactDirectory, parseContactFile, parseContactLine } from "./contacts";
export type { LoadContactDirectoryOptions } from "./contacts";

// Re-export the geocoding client
export {
  NominatimGeocoder,
  GeocodeApiError,
  GeocodeRateLimitError,
  GeocodeTimeoutError,
} from "./nominatim";
export type { NominatimGeocoderOptions } from "./nominatim";

// Re-export the task client
export {
  TodoistClient,
  TodoistApiError,
  TodoistAuthError,
  TodoistRateLimitError,
  buildOutreachTasks,
  createOutreachTasks,
} from "./todoist";
export type { TodoistTaskInput, TodoistTask, TodoistClientOptions } from "./todoist";

// Re-export configuration
export {
  ConfigFileSchema,
  TodoistSectionSchema,
  GeocoderSectionSchema,
  StoreKindSchema,
} from "./config-schema";
export type { ConfigFile, StoreKind } from "./config-schema";
export {
  ConfigError,
  loadConfig,
  parseConfig,
  parseConfigText,
  applyEnvOverrides,
  resolveConfig,
  expandPath,
} from "./config";
export type { LayoverConfig, LoadConfigOptions, Env } from "./config";
