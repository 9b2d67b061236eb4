/**
 * Opens the configured store backend for both persistent stores.
 *
 * - json:   geo_cache.json and state.json in state_dir
 * - sqlite: layover.db in state_dir (@layover/registry)
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import {
  GEO_CACHE_FILE,
  JsonGeocodeCacheFile,
  JsonNotifiedPairFile,
  SQLITE_DB_FILE,
  STATE_FILE,
  StorePersistenceError,
  type GeocodeCacheStorage,
  type NotifiedPairStorage,
  type StoreKind,
} from "@layover/shared";
import {
  openRegistryDatabase,
  SqliteGeocodeCacheStorage,
  SqliteNotifiedPairStorage,
} from "@layover/registry";

export interface OpenedStores {
  readonly geocodeStorage: GeocodeCacheStorage;
  readonly pairStorage: NotifiedPairStorage;
  /** Where the stores live, for the start log line. */
  readonly location: string;
  close(): void;
}

/** @throws StorePersistenceError */
export function openStores(kind: StoreKind, stateDir: string, now?: () => Date): OpenedStores {
  if (kind === "sqlite") {
    const path = join(stateDir, SQLITE_DB_FILE);
    try {
      mkdirSync(stateDir, { recursive: true });
    } catch (err) {
      throw new StorePersistenceError(`cannot create ${stateDir}`, stateDir, { cause: err });
    }
    const db = openRegistryDatabase(path);
    return {
      geocodeStorage: new SqliteGeocodeCacheStorage(db),
      pairStorage: new SqliteNotifiedPairStorage(db, now),
      location: path,
      close: () => {
        db.close();
      },
    };
  }

  return {
    geocodeStorage: new JsonGeocodeCacheFile(join(stateDir, GEO_CACHE_FILE)),
    pairStorage: new JsonNotifiedPairFile(join(stateDir, STATE_FILE)),
    location: stateDir,
    close: () => {},
  };
}
