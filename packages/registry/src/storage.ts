/**
 * @layover/registry -- better-sqlite3 storage backends.
 *
 * Same contracts as the JSON file backends in @layover/shared: every
 * write is committed before the call returns, and any SQLite error
 * surfaces as StorePersistenceError.
 */

import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import {
  StorePersistenceError,
  type GeocodeCacheEntry,
  type GeocodeCacheStorage,
  type NotifiedPairRecord,
  type NotifiedPairStorage,
} from "@layover/shared";
import { ALL_MIGRATIONS, type Migration } from "./schema";
import type { GeocodeCacheRow, NotifiedPairRow, SchemaMetaRow } from "./types";

const SCHEMA_NAME = "layover";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function wrap<T>(db: DatabaseType, action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorePersistenceError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new StorePersistenceError(`${action} failed: ${message}`, db.name, { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Migrations
// ---------------------------------------------------------------------------

/** Current schema version, 0 for a fresh database. */
export function getSchemaVersion(db: DatabaseType): number {
  db.exec("CREATE TABLE IF NOT EXISTS _schema_meta (key TEXT PRIMARY KEY, value TEXT)");
  const row = db
    .prepare<[string], SchemaMetaRow>("SELECT key, value FROM _schema_meta WHERE key = ?")
    .get(`${SCHEMA_NAME}_version`);
  return row?.value ? parseInt(row.value, 10) : 0;
}

/**
 * Apply every migration newer than the stored version. Each migration
 * and its version bump run in one transaction.
 */
export function applyMigrations(
  db: DatabaseType,
  migrations: readonly Migration[] = ALL_MIGRATIONS,
): void {
  let currentVersion = getSchemaVersion(db);
  const setVersion = db.prepare<[string, string]>(
    "INSERT OR REPLACE INTO _schema_meta (key, value) VALUES (?, ?)",
  );

  for (const migration of migrations) {
    if (migration.version <= currentVersion) {
      continue;
    }
    db.transaction(() => {
      db.exec(migration.sql);
      setVersion.run(`${SCHEMA_NAME}_version`, String(migration.version));
    })();
    currentVersion = migration.version;
  }
}

/**
 * Open (creating if needed) the store database and bring its schema up
 * to date.
 *
 * @throws StorePersistenceError
 */
export function openRegistryDatabase(path: string): DatabaseType {
  let db: DatabaseType;
  try {
    db = new Database(path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new StorePersistenceError(`cannot open ${path}: ${message}`, path, { cause: err });
  }

  try {
    return wrap(db, "schema migration", () => {
      db.pragma("journal_mode = WAL");
      applyMigrations(db);
      return db;
    });
  } catch (err) {
    db.close();
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Geocode cache
// ---------------------------------------------------------------------------

export class SqliteGeocodeCacheStorage implements GeocodeCacheStorage {
  private readonly db: DatabaseType;

  constructor(db: DatabaseType) {
    this.db = db;
  }

  loadAll(): GeocodeCacheEntry[] {
    return wrap(this.db, "geocode cache read", () =>
      this.db
        .prepare<[], GeocodeCacheRow>(
          "SELECT key, lat, lon, fetched_at FROM geocode_cache ORDER BY key",
        )
        .all()
        .map((row) => ({
          key: row.key,
          point: row.lat !== null && row.lon !== null ? { lat: row.lat, lon: row.lon } : null,
          fetched_at: row.fetched_at,
        })),
    );
  }

  put(entry: GeocodeCacheEntry): void {
    wrap(this.db, "geocode cache write", () => {
      this.db
        .prepare<[string, number | null, number | null, string]>(
          `INSERT INTO geocode_cache (key, lat, lon, fetched_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(key) DO UPDATE SET
             lat = excluded.lat, lon = excluded.lon, fetched_at = excluded.fetched_at`,
        )
        .run(entry.key, entry.point?.lat ?? null, entry.point?.lon ?? null, entry.fetched_at);
    });
  }
}

// ---------------------------------------------------------------------------
// Notified pairs
// ---------------------------------------------------------------------------

export class SqliteNotifiedPairStorage implements NotifiedPairStorage {
  private readonly db: DatabaseType;
  private readonly now: () => Date;

  constructor(db: DatabaseType, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  loadAll(): NotifiedPairRecord[] {
    return wrap(this.db, "notified pairs read", () =>
      this.db
        .prepare<[], NotifiedPairRow>(
          "SELECT trip_id, city_key, notified_at FROM notified_pairs ORDER BY trip_id, city_key",
        )
        .all()
        .map((row) => ({
          trip_id: row.trip_id,
          city_key: row.city_key,
          notified_at: row.notified_at,
        })),
    );
  }

  add(record: NotifiedPairRecord): void {
    wrap(this.db, "notified pair write", () => {
      this.db
        .prepare<[string, string, string]>(
          "INSERT OR IGNORE INTO notified_pairs (trip_id, city_key, notified_at) VALUES (?, ?, ?)",
        )
        .run(record.trip_id, record.city_key, record.notified_at);
    });
  }

  recordRun(runId: string): void {
    wrap(this.db, "run log write", () => {
      this.db
        .prepare<[string, string]>("INSERT OR IGNORE INTO runs (run_id, started_at) VALUES (?, ?)")
        .run(runId, this.now().toISOString());
    });
  }
}
