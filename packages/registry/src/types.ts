/**
 * @layover/registry -- TypeScript row types for the SQLite tables.
 *
 * These types represent the rows as they come back from better-sqlite3.
 */

/** Row shape for the `geocode_cache` table. lat/lon are both NULL for a failed lookup. */
export interface GeocodeCacheRow {
  readonly key: string;
  readonly lat: number | null;
  readonly lon: number | null;
  readonly fetched_at: string;
}

/** Row shape for the `notified_pairs` table. */
export interface NotifiedPairRow {
  readonly trip_id: string;
  readonly city_key: string;
  readonly notified_at: string;
}

/** Row shape for the `runs` table. */
export interface RunRow {
  readonly run_id: string;
  readonly started_at: string;
}

/** Row shape for the `_schema_meta` table. */
export interface SchemaMetaRow {
  readonly key: string;
  readonly value: string | null;
}
