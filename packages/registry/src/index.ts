/**
 * @layover/registry -- SQLite backend for the geocode cache and the
 * notified-pair history.
 *
 * Provides the migration SQL, TypeScript row types and better-sqlite3
 * storage classes implementing the @layover/shared storage interfaces.
 */

export {
  MIGRATION_0001_INITIAL_SCHEMA,
  MIGRATION_0002_RUN_LOG,
  ALL_MIGRATIONS,
} from "./schema";
export type { Migration } from "./schema";

export type { GeocodeCacheRow, NotifiedPairRow, RunRow, SchemaMetaRow } from "./types";

export {
  applyMigrations,
  getSchemaVersion,
  openRegistryDatabase,
  SqliteGeocodeCacheStorage,
  SqliteNotifiedPairStorage,
} from "./storage";
