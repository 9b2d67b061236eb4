/**
 * @layover/shared -- JSON file backends for the geocode cache and the
 * notified-pair history.
 *
 * File formats (pretty-printed, keys sorted, trailing newline):
 *
 *   geo_cache.json
 *     { "version": 1,
 *       "entries": { "<key>": { "lat": n|null, "lon": n|null, "fetched_at": iso } } }
 *
 *   state.json
 *     { "version": 1, "last_run_id": "run_..."|null,
 *       "notified": [ { "trip_id", "city_key", "notified_at" } ] }
 *
 * A missing file is an empty store. A file that cannot be read, is not
 * JSON, or does not match its schema raises StorePersistenceError: the
 * run must not continue on a blank or unverifiable history.
 *
 * Writes go to a temp file in the same directory and are renamed over
 * the target, so a crash mid-write leaves the previous file intact.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod/v4";
import { STORE_FILE_VERSION } from "./constants";
import { isValidGeoPoint } from "./geo";
import type { GeocodeCacheStorage, NotifiedPairStorage } from "./storage";
import type { GeocodeCacheEntry, NotifiedPairRecord } from "./types";

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

/** A store could not be read, validated, or written. Fatal for the run. */
export class StorePersistenceError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorePersistenceError";
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const GeoCacheEntrySchema = z.object({
  lat: z.number().nullable(),
  lon: z.number().nullable(),
  fetched_at: z.string().min(1),
});

export const GeoCacheFileSchema = z.object({
  version: z.literal(STORE_FILE_VERSION),
  entries: z.record(z.string(), GeoCacheEntrySchema),
});

/** Flat `{ key: { lat, lon } }` cache written by earlier tooling. */
export const LegacyGeoCacheFileSchema = z.record(
  z.string(),
  z.object({ lat: z.number(), lon: z.number() }),
);

const NotifiedPairRecordSchema = z.object({
  trip_id: z.string().min(1),
  city_key: z.string().min(1),
  notified_at: z.string().min(1),
});

export const StateFileSchema = z.object({
  version: z.literal(STORE_FILE_VERSION),
  last_run_id: z.string().nullable(),
  notified: z.array(NotifiedPairRecordSchema),
});

export type GeoCacheFile = z.infer<typeof GeoCacheFileSchema>;
export type StateFile = z.infer<typeof StateFileSchema>;

// ---------------------------------------------------------------------------
// Low-level JSON IO
// ---------------------------------------------------------------------------

/** Read and parse a JSON file. Returns undefined when the file does not exist. */
export function readJsonFile(path: string): unknown {
  if (!existsSync(path)) {
    return undefined;
  }

  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new StorePersistenceError(`cannot read ${path}`, path, { cause: err });
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new StorePersistenceError(`${path} is not valid JSON`, path, { cause: err });
  }
}

/** Atomically replace `path` with the pretty-printed JSON of `data`. */
export function writeJsonFile(path: string, data: unknown): void {
  const tmpPath = `${path}.tmp`;
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(tmpPath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
    renameSync(tmpPath, path);
  } catch (err) {
    throw new StorePersistenceError(`cannot write ${path}`, path, { cause: err });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

// ---------------------------------------------------------------------------
// Geocode cache file
// ---------------------------------------------------------------------------

/** Parse the content of a geocode cache file (current or legacy format). */
export function parseGeoCacheFile(raw: unknown, path: string): GeocodeCacheEntry[] {
  const isVersioned =
    typeof raw === "object" && raw !== null && "version" in raw;

  if (isVersioned) {
    const parsed = GeoCacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorePersistenceError(
        `${path} does not match the geocode cache schema: ${describeIssues(parsed.error)}`,
        path,
      );
    }
    return Object.entries(parsed.data.entries).map(([key, e]) => ({
      key,
      point: e.lat !== null && e.lon !== null ? { lat: e.lat, lon: e.lon } : null,
      fetched_at: e.fetched_at,
    }));
  }

  const legacy = LegacyGeoCacheFileSchema.safeParse(raw);
  if (!legacy.success) {
    throw new StorePersistenceError(
      `${path} does not match the geocode cache schema: ${describeIssues(legacy.error)}`,
      path,
    );
  }
  // Legacy entries carry no timestamp; the epoch marks them as "unknown".
  return Object.entries(legacy.data).map(([key, e]) => ({
    key,
    point: { lat: e.lat, lon: e.lon },
    fetched_at: new Date(0).toISOString(),
  }));
}

/** Serialize cache entries into the current file format, keys sorted. */
export function serializeGeoCacheFile(entries: Iterable<GeocodeCacheEntry>): GeoCacheFile {
  const sorted = [...entries].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  const out: GeoCacheFile["entries"] = {};
  for (const entry of sorted) {
    out[entry.key] = {
      lat: entry.point?.lat ?? null,
      lon: entry.point?.lon ?? null,
      fetched_at: entry.fetched_at,
    };
  }
  return { version: STORE_FILE_VERSION, entries: out };
}

export class JsonGeocodeCacheFile implements GeocodeCacheStorage {
  readonly path: string;
  private entries = new Map<string, GeocodeCacheEntry>();

  constructor(path: string) {
    this.path = path;
  }

  loadAll(): GeocodeCacheEntry[] {
    const raw = readJsonFile(this.path);
    const loaded = raw === undefined ? [] : parseGeoCacheFile(raw, this.path);

    for (const entry of loaded) {
      if (entry.point !== null && !isValidGeoPoint(entry.point)) {
        throw new StorePersistenceError(
          `${this.path}: entry "${entry.key}" has out-of-range coordinates`,
          this.path,
        );
      }
    }

    this.entries = new Map(loaded.map((e) => [e.key, e]));
    return loaded;
  }

  put(entry: GeocodeCacheEntry): void {
    this.entries.set(entry.key, entry);
    writeJsonFile(this.path, serializeGeoCacheFile(this.entries.values()));
  }
}

// ---------------------------------------------------------------------------
// State file
// ---------------------------------------------------------------------------

function compareRecords(a: NotifiedPairRecord, b: NotifiedPairRecord): number {
  if (a.trip_id !== b.trip_id) return a.trip_id < b.trip_id ? -1 : 1;
  if (a.city_key !== b.city_key) return a.city_key < b.city_key ? -1 : 1;
  return 0;
}

// State written by the earlier single-file tool: { "processed_trip_ids": [...] }.
// Its ids are trip-level, so they cannot be turned into notified pairs.
const LegacyStateFileSchema = z.object({ processed_trip_ids: z.array(z.unknown()) });

export function parseStateFile(raw: unknown, path: string): StateFile {
  const parsed = StateFileSchema.safeParse(raw);
  if (!parsed.success) {
    if (LegacyStateFileSchema.safeParse(raw).success) {
      throw new StorePersistenceError(
        `${path} is a state file from an older tool (processed_trip_ids); ` +
          `move it aside or point state_dir elsewhere`,
        path,
      );
    }
    throw new StorePersistenceError(
      `${path} does not match the state file schema: ${describeIssues(parsed.error)}`,
      path,
    );
  }
  return parsed.data;
}

export class JsonNotifiedPairFile implements NotifiedPairStorage {
  readonly path: string;
  private records: NotifiedPairRecord[] = [];
  private lastRunId: string | null = null;

  constructor(path: string) {
    this.path = path;
  }

  loadAll(): NotifiedPairRecord[] {
    const raw = readJsonFile(this.path);
    if (raw === undefined) {
      this.records = [];
      this.lastRunId = null;
      return [];
    }

    const state = parseStateFile(raw, this.path);
    this.records = [...state.notified];
    this.lastRunId = state.last_run_id;
    return [...state.notified];
  }

  add(record: NotifiedPairRecord): void {
    this.records.push(record);
    this.flush();
  }

  recordRun(runId: string): void {
    this.lastRunId = runId;
    this.flush();
  }

  private flush(): void {
    const state: StateFile = {
      version: STORE_FILE_VERSION,
      last_run_id: this.lastRunId,
      notified: [...this.records].sort(compareRecords),
    };
    writeJsonFile(this.path, state);
  }
}
