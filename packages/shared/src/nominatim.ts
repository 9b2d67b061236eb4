/**
 * @layover/shared -- Nominatim (OpenStreetMap) geocoding client.
 *
 * Nominatim's usage policy requires an identifying User-Agent and at most
 * one request per second, so requests from one client are spaced by
 * minIntervalMs. Accepts an injectable FetchFn (and clock/sleep) for tests.
 *
 * Error mapping:
 * - 429 -> GeocodeRateLimitError
 * - Other non-2xx -> GeocodeApiError
 * - Aborted after timeoutMs -> GeocodeTimeoutError
 * - Empty result list -> null (not an error)
 */

import { z } from "zod/v4";
import type { FetchFn, GeocodeFn, GeoPoint } from "./types";
import { untilAborted } from "./http";
import {
  DEFAULT_GEOCODE_MIN_INTERVAL_MS,
  DEFAULT_GEOCODE_TIMEOUT_MS,
  DEFAULT_NOMINATIM_BASE_URL,
  DEFAULT_USER_AGENT,
} from "./constants";

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

/** Base class for geocoding failures. statusCode is 0 when no response arrived. */
export class GeocodeApiError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = "GeocodeApiError";
    this.statusCode = statusCode;
  }
}

/** 429 -- the public instance throttled us. */
export class GeocodeRateLimitError extends GeocodeApiError {
  constructor(message = "Geocoder rate limit exceeded") {
    super(message, 429);
    this.name = "GeocodeRateLimitError";
  }
}

export class GeocodeTimeoutError extends GeocodeApiError {
  constructor(timeoutMs: number) {
    super(`Geocode request timed out after ${timeoutMs}ms`, 0);
    this.name = "GeocodeTimeoutError";
  }
}

// ---------------------------------------------------------------------------
// Response shape
// ---------------------------------------------------------------------------

const NominatimResultSchema = z.array(
  z.object({
    lat: z.union([z.string(), z.number()]),
    lon: z.union([z.string(), z.number()]),
    display_name: z.string().optional(),
  }),
);

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface NominatimGeocoderOptions {
  readonly baseUrl?: string;
  readonly userAgent?: string;
  /** Sent as the `email` parameter, as the usage policy asks for bulk users. */
  readonly email?: string;
  readonly minIntervalMs?: number;
  readonly timeoutMs?: number;
  readonly fetchFn?: FetchFn;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

/** Nominatim sends coordinates as decimal strings. */
function toCoordinate(value: string | number): number {
  if (typeof value === "number") return value;
  return value.trim() === "" ? Number.NaN : Number(value);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class NominatimGeocoder {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly email: string | undefined;
  private readonly minIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRequestAt: number | null = null;

  constructor(options: NominatimGeocoderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_NOMINATIM_BASE_URL).replace(/\/+$/, "");
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.email = options.email;
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_GEOCODE_MIN_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GEOCODE_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Look up the first match for a free-form query.
   * Resolves to null when Nominatim has no result or returns unusable
   * coordinates.
   */
  async geocode(query: string): Promise<GeoPoint | null> {
    const params = new URLSearchParams({ q: query, format: "json", limit: "1" });
    if (this.email) {
      params.set("email", this.email);
    }
    const url = `${this.baseUrl}/search?${params.toString()}`;

    await this.throttle();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    // The timer covers the request and the body read.
    try {
      return await this.request(url, controller.signal);
    } catch (err) {
      if (controller.signal.aborted) {
        throw new GeocodeTimeoutError(this.timeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private async request(url: string, signal: AbortSignal): Promise<GeoPoint | null> {
    const response = await this.fetchFn(url, {
      method: "GET",
      headers: { "User-Agent": this.userAgent, Accept: "application/json" },
      signal,
    });

    if (!response.ok) {
      const errorText = await untilAborted(response.text(), signal).catch(() => "Unknown error");
      if (response.status === 429) {
        throw new GeocodeRateLimitError(errorText);
      }
      throw new GeocodeApiError(errorText, response.status);
    }

    const parsed = NominatimResultSchema.safeParse(await untilAborted(response.json(), signal));
    if (!parsed.success) {
      throw new GeocodeApiError("Unexpected geocoder response shape", response.status);
    }

    const first = parsed.data[0];
    if (first === undefined) {
      return null;
    }

    const lat = toCoordinate(first.lat);
    const lon = toCoordinate(first.lon);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      return null;
    }
    return { lat, lon };
  }

  /** Bound geocode function for GeocodeCache. */
  asGeocodeFn(): GeocodeFn {
    return (query) => this.geocode(query);
  }

  private async throttle(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const wait = this.lastRequestAt + this.minIntervalMs - this.now();
      if (wait > 0) {
        await this.sleep(wait);
      }
    }
    this.lastRequestAt = this.now();
  }
}
