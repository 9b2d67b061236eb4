/**
 * @layover/registry -- SQLite schema for the optional database backend.
 *
 * Migrations are kept as SQL constants and applied in order by
 * applyMigrations(); the applied version is tracked in _schema_meta so a
 * database created by an older release is upgraded in place.
 */

/**
 * Migration 0001: Initial store schema.
 *
 * Creates two tables:
 * - geocode_cache: normalized location key -> coordinates (NULL = failed lookup)
 * - notified_pairs: (trip_id, city_key) pairs that received outreach tasks
 */
export const MIGRATION_0001_INITIAL_SCHEMA = `
-- Geocode cache, one row per normalized key
CREATE TABLE geocode_cache (
  key          TEXT PRIMARY KEY,
  lat          REAL,
  lon          REAL,
  fetched_at   TEXT NOT NULL,
  CHECK ((lat IS NULL) = (lon IS NULL))
);

-- Notified (trip, contact city) pairs; rows are only ever inserted
CREATE TABLE notified_pairs (
  trip_id      TEXT NOT NULL,
  city_key     TEXT NOT NULL,
  notified_at  TEXT NOT NULL,
  PRIMARY KEY (trip_id, city_key)
);
` as const;

/**
 * Migration 0002: Run log.
 *
 * One row per run that opened the store. Used when debugging duplicate
 * or missing reminders.
 */
export const MIGRATION_0002_RUN_LOG = `
CREATE TABLE runs (
  run_id       TEXT PRIMARY KEY,
  started_at   TEXT NOT NULL
);

CREATE INDEX idx_runs_started ON runs(started_at);
` as const;

/** A single schema migration. */
export interface Migration {
  readonly version: number;
  readonly sql: string;
  readonly description: string;
}

/** All migrations in order. */
export const ALL_MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    sql: MIGRATION_0001_INITIAL_SCHEMA,
    description: "Geocode cache and notified pairs",
  },
  {
    version: 2,
    sql: MIGRATION_0002_RUN_LOG,
    description: "Run log",
  },
] as const;
