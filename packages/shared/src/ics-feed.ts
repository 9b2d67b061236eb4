/**
 * @layover/shared -- Trip feed download and trip extraction.
 *
 * The trip feed is a private iCalendar URL (TripIt and similar services
 * publish one per account). Each VEVENT is a leg of a trip; legs going to
 * the same place are grouped into a single TripRecord.
 *
 * Key design decisions:
 * - HTTPS required for feed URLs (they embed a secret token)
 * - Destination = LOCATION when non-blank, else SUMMARY
 * - UTC and TZID datetimes are converted to local dates in the configured
 *   zone; floating datetimes and all-day dates are taken as written
 * - trip_id = normalized destination, so the same destination keeps the
 *   same id across feed reads
 */

import type { FetchFn, TripRecord } from "./types";
import { parseVEvents, parseICalDateTime } from "./ical-parse";
import { normalizeLocation } from "./normalize";
import { untilAborted } from "./http";
import {
  DEFAULT_LOOKAHEAD_DAYS,
  DEFAULT_TIMEZONE,
  DEFAULT_USER_AGENT,
  FEED_FETCH_TIMEOUT_MS,
} from "./constants";

// ---------------------------------------------------------------------------
// URL validation
// ---------------------------------------------------------------------------

/** Result of validating a feed URL. */
export interface FeedValidationResult {
  readonly valid: boolean;
  /** Trimmed URL. Present only when valid. */
  readonly url?: string;
  /** Present only when invalid. */
  readonly error?: string;
}

/**
 * Validate a trip feed URL.
 *
 * Requirements:
 * - Must be a valid URL
 * - Must use HTTPS
 * - .ics extension is optional (many feeds use query strings)
 * - Whitespace is trimmed
 */
export function validateFeedUrl(url: string): FeedValidationResult {
  const trimmed = url.trim();

  if (!trimmed) {
    return { valid: false, error: "URL is required" };
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return { valid: false, error: "Invalid URL format" };
  }

  if (parsed.protocol !== "https:") {
    return { valid: false, error: "HTTPS is required for feed URLs" };
  }

  return { valid: true, url: trimmed };
}

// ---------------------------------------------------------------------------
// Fetching
// ---------------------------------------------------------------------------

/** The feed could not be downloaded. statusCode is null for network errors and timeouts. */
export class FeedFetchError extends Error {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FeedFetchError";
    this.statusCode = statusCode;
  }
}

export interface FetchTripFeedOptions {
  readonly fetchFn?: FetchFn;
  readonly userAgent?: string;
  readonly timeoutMs?: number;
}

/**
 * Download the feed and return its text.
 *
 * @throws FeedFetchError on invalid URL, non-2xx status, network error or timeout
 */
export async function fetchTripFeed(
  url: string,
  options: FetchTripFeedOptions = {},
): Promise<string> {
  const validation = validateFeedUrl(url);
  if (!validation.valid || validation.url === undefined) {
    throw new FeedFetchError(`Invalid feed URL: ${validation.error ?? "unknown"}`, null);
  }

  const fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
  const timeoutMs = options.timeoutMs ?? FEED_FETCH_TIMEOUT_MS;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  // The timer covers the request and the body read.
  try {
    const response = await fetchFn(validation.url, {
      method: "GET",
      headers: {
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: "text/calendar, */*;q=0.5",
      },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new FeedFetchError(`Feed returned HTTP ${response.status}`, response.status);
    }
    return await untilAborted(response.text(), controller.signal);
  } catch (err) {
    if (err instanceof FeedFetchError) throw err;
    if (controller.signal.aborted) {
      throw new FeedFetchError(`Feed request timed out after ${timeoutMs}ms`, null, {
        cause: err,
      });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new FeedFetchError(`Feed request failed: ${message}`, null, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

/** Whether `timeZone` is an IANA zone name the runtime knows. */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/** The calendar date (YYYY-MM-DD) of an instant in the given zone. */
export function localDateInZone(instant: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(instant);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  return `${get("year")}-${get("month")}-${get("day")}`;
}

/** Add whole days to a YYYY-MM-DD date. */
export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/** Offset of `timeZone` from UTC at `instant`, in milliseconds. */
function zoneOffsetMs(instant: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  }).formatToParts(instant);

  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? "0");

  const asUtc = Date.UTC(
    get("year"),
    get("month") - 1,
    get("day"),
    get("hour"),
    get("minute"),
    get("second"),
  );
  return asUtc - Math.floor(instant.getTime() / 1000) * 1000;
}

/**
 * The instant at which the wall clock in `timeZone` reads `wallTime`
 * (YYYY-MM-DDTHH:MM:SS). The second pass picks up an offset change
 * between the guess and the answer.
 */
function zonedTimeToInstant(wallTime: string, timeZone: string): Date {
  const asUtc = new Date(`${wallTime}Z`).getTime();
  const first = asUtc - zoneOffsetMs(new Date(asUtc), timeZone);
  const second = asUtc - zoneOffsetMs(new Date(first), timeZone);
  return new Date(second);
}

function eventDate(
  value: string | undefined,
  params: Record<string, string> | undefined,
  timeZone: string,
): string | null {
  if (!value) return null;
  const parsed = parseICalDateTime(value, params);
  if (parsed === null) return null;
  if (parsed.date !== undefined) return parsed.date;
  if (parsed.dateTime === undefined) return null;
  if (parsed.dateTime.endsWith("Z")) {
    return localDateInZone(new Date(parsed.dateTime), timeZone);
  }
  // An unknown TZID falls back to the floating wall time.
  if (parsed.timeZone !== undefined && isValidTimeZone(parsed.timeZone)) {
    return localDateInZone(zonedTimeToInstant(parsed.dateTime, parsed.timeZone), timeZone);
  }
  return parsed.dateTime.slice(0, 10);
}

// ---------------------------------------------------------------------------
// Trip extraction
// ---------------------------------------------------------------------------

export interface ExtractTripsOptions {
  readonly now?: Date;
  /** IANA zone used to turn datetimes into dates and to pick "today". */
  readonly timezone?: string;
  readonly lookaheadDays?: number;
}

interface TripDraft {
  trip_id: string;
  destination_raw: string;
  start_date: string | null;
  end_date: string | null;
}

/**
 * Turn feed text into trips inside the look-ahead window.
 *
 * An event is kept when it has a destination and a parseable DTSTART and
 * overlaps [today, today + lookaheadDays]. Events with the same normalized
 * destination merge into one trip spanning the earliest start and the
 * latest end. Trips are returned in order of first appearance.
 *
 * @throws RangeError when the timezone is unknown
 */
export function extractTrips(
  icsText: string,
  options: ExtractTripsOptions = {},
): TripRecord[] {
  const timezone = options.timezone ?? DEFAULT_TIMEZONE;
  if (!isValidTimeZone(timezone)) {
    throw new RangeError(`Unknown timezone: ${timezone}`);
  }
  if (!icsText.trim()) {
    return [];
  }

  const today = localDateInZone(options.now ?? new Date(), timezone);
  const windowEnd = addDays(today, options.lookaheadDays ?? DEFAULT_LOOKAHEAD_DAYS);

  const grouped = new Map<string, TripDraft>();

  for (const vevent of parseVEvents(icsText)) {
    const destination = vevent.location?.trim() || vevent.summary?.trim() || "";
    if (!destination) continue;

    const start = eventDate(vevent.dtstart, vevent.dtstartParams, timezone);
    if (start === null) continue;
    const end = eventDate(vevent.dtend, vevent.dtendParams, timezone);

    if (start > windowEnd || (end ?? start) < today) continue;

    const key = normalizeLocation(destination);
    if (!key) continue;

    const existing = grouped.get(key);
    if (existing === undefined) {
      grouped.set(key, {
        trip_id: key,
        destination_raw: destination,
        start_date: start,
        end_date: end,
      });
      continue;
    }

    if (existing.start_date === null || start < existing.start_date) {
      existing.start_date = start;
    }
    if (end !== null && (existing.end_date === null || end > existing.end_date)) {
      existing.end_date = end;
    }
  }

  return [...grouped.values()].map((draft) => ({ ...draft }));
}
