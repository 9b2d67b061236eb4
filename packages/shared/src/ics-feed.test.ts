/**
 * Unit tests for trip feed validation, download and trip extraction.
 *
 * Tests cover:
 * - URL validation: HTTPS required, whitespace trimmed
 * - Download: User-Agent header, HTTP and network errors
 * - Look-ahead window and timezone conversion
 * - LOCATION/SUMMARY fallback
 * - Grouping of legs with the same destination
 */

import { describe, it, expect, vi } from "vitest";
import {
  validateFeedUrl,
  fetchTripFeed,
  FeedFetchError,
  extractTrips,
  localDateInZone,
  addDays,
  isValidTimeZone,
} from "./ics-feed";
import type { FetchFn } from "./types";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const NOW = new Date("2026-03-01T12:00:00Z");

function calendar(...events: string[][]): string {
  return [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    "PRODID:-//Test//Test//EN",
    ...events.flatMap((lines) => ["BEGIN:VEVENT", ...lines, "END:VEVENT"]),
    "END:VCALENDAR",
  ].join("\r\n");
}

// ---------------------------------------------------------------------------
// validateFeedUrl
// ---------------------------------------------------------------------------

describe("validateFeedUrl", () => {
  it("accepts and trims an https URL", () => {
    expect(validateFeedUrl("  https://feeds.example.com/ical/abc.ics  ")).toEqual({
      valid: true,
      url: "https://feeds.example.com/ical/abc.ics",
    });
  });

  it("rejects http, garbage and empty input", () => {
    expect(validateFeedUrl("http://feeds.example.com/a.ics")).toEqual({
      valid: false,
      error: "HTTPS is required for feed URLs",
    });
    expect(validateFeedUrl("not a url")).toEqual({ valid: false, error: "Invalid URL format" });
    expect(validateFeedUrl("   ")).toEqual({ valid: false, error: "URL is required" });
  });
});

// ---------------------------------------------------------------------------
// fetchTripFeed
// ---------------------------------------------------------------------------

describe("fetchTripFeed", () => {
  it("sends the User-Agent and returns the body", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("BEGIN:VCALENDAR", { status: 200 }));

    const text = await fetchTripFeed("https://feeds.example.com/a.ics", {
      fetchFn,
      userAgent: "layover-test/0.1",
    });

    expect(text).toBe("BEGIN:VCALENDAR");
    const call = fetchFn.mock.calls[0];
    expect(call?.[0]).toBe("https://feeds.example.com/a.ics");
    expect(new Headers(call?.[1]?.headers).get("User-Agent")).toBe("layover-test/0.1");
  });

  it("maps non-2xx responses to FeedFetchError with the status", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("nope", { status: 404 }));

    const err = await fetchTripFeed("https://feeds.example.com/a.ics", { fetchFn }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(FeedFetchError);
    expect(err).toMatchObject({ statusCode: 404, message: "Feed returned HTTP 404" });
  });

  it("maps network errors to FeedFetchError without a status", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(
      fetchTripFeed("https://feeds.example.com/a.ics", { fetchFn }),
    ).rejects.toMatchObject({
      name: "FeedFetchError",
      statusCode: null,
      message: "Feed request failed: fetch failed",
    });
  });

  it("bounds a stalled body by the request timeout", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response(new ReadableStream<Uint8Array>()));

    await expect(
      fetchTripFeed("https://feeds.example.com/a.ics", { fetchFn, timeoutMs: 20 }),
    ).rejects.toMatchObject({
      name: "FeedFetchError",
      statusCode: null,
      message: "Feed request timed out after 20ms",
    });
  });

  it("rejects an invalid URL without fetching", async () => {
    const fetchFn = vi.fn<FetchFn>();
    await expect(fetchTripFeed("http://x.test/a.ics", { fetchFn })).rejects.toBeInstanceOf(
      FeedFetchError,
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Date helpers
// ---------------------------------------------------------------------------

describe("date helpers", () => {
  it("computes the local date in a zone", () => {
    expect(localDateInZone(new Date("2026-03-02T03:00:00Z"), "UTC")).toBe("2026-03-02");
    expect(localDateInZone(new Date("2026-03-02T03:00:00Z"), "America/Chicago")).toBe(
      "2026-03-01",
    );
  });

  it("adds days across month boundaries", () => {
    expect(addDays("2026-03-01", 90)).toBe("2026-05-30");
    expect(addDays("2026-12-31", 1)).toBe("2027-01-01");
  });

  it("validates zone names", () => {
    expect(isValidTimeZone("Europe/Paris")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// extractTrips
// ---------------------------------------------------------------------------

describe("extractTrips", () => {
  it("builds a trip from an all-day event", () => {
    const ics = calendar([
      "UID:leg-1",
      "SUMMARY:Conference",
      "LOCATION:New Orleans\\, LA",
      "DTSTART;VALUE=DATE:20260310",
      "DTEND;VALUE=DATE:20260313",
    ]);

    expect(extractTrips(ics, { now: NOW })).toEqual([
      {
        trip_id: "new orleans, la",
        destination_raw: "New Orleans, LA",
        start_date: "2026-03-10",
        end_date: "2026-03-13",
      },
    ]);
  });

  it("falls back to SUMMARY when LOCATION is blank and skips events with neither", () => {
    const ics = calendar(
      ["UID:a", "SUMMARY:Houston", "LOCATION:  ", "DTSTART;VALUE=DATE:20260320"],
      ["UID:b", "DTSTART;VALUE=DATE:20260321"],
    );

    expect(extractTrips(ics, { now: NOW })).toEqual([
      { trip_id: "houston", destination_raw: "Houston", start_date: "2026-03-20", end_date: null },
    ]);
  });

  it("skips events without a usable DTSTART", () => {
    const ics = calendar(
      ["UID:a", "LOCATION:Paris"],
      ["UID:b", "LOCATION:Lyon", "DTSTART:garbage"],
    );
    expect(extractTrips(ics, { now: NOW })).toEqual([]);
  });

  it("keeps events overlapping the window and drops the rest", () => {
    const ics = calendar(
      // ended yesterday
      ["UID:past", "LOCATION:Past", "DTSTART;VALUE=DATE:20260225", "DTEND;VALUE=DATE:20260228"],
      // started earlier, still going
      ["UID:now", "LOCATION:Ongoing", "DTSTART;VALUE=DATE:20260225", "DTEND;VALUE=DATE:20260301"],
      // last day of the window
      ["UID:edge", "LOCATION:Edge", "DTSTART;VALUE=DATE:20260530"],
      // one day past the window
      ["UID:far", "LOCATION:Far", "DTSTART;VALUE=DATE:20260531"],
    );

    expect(extractTrips(ics, { now: NOW }).map((t) => t.trip_id)).toEqual(["ongoing", "edge"]);
  });

  it("honours a custom look-ahead", () => {
    const ics = calendar(["UID:a", "LOCATION:Paris", "DTSTART;VALUE=DATE:20260310"]);
    expect(extractTrips(ics, { now: NOW, lookaheadDays: 7 })).toEqual([]);
    expect(extractTrips(ics, { now: NOW, lookaheadDays: 9 })).toHaveLength(1);
  });

  it("converts UTC datetimes into the configured zone", () => {
    const ics = calendar([
      "UID:a",
      "LOCATION:Austin",
      "DTSTART:20260302T030000Z",
      "DTEND:20260303T050000Z",
    ]);

    expect(extractTrips(ics, { now: NOW, timezone: "America/Chicago" })).toEqual([
      { trip_id: "austin", destination_raw: "Austin", start_date: "2026-03-01", end_date: "2026-03-02" },
    ]);
  });

  it("converts TZID datetimes into the configured zone and keeps floating ones as written", () => {
    const ics = calendar(
      ["UID:a", "LOCATION:Tokyo", "DTSTART;TZID=Asia/Tokyo:20260405T080000"],
      ["UID:b", "LOCATION:Lisbon", "DTSTART:20260406T233000"],
    );

    // 08:00 in Tokyo is 16:00 the day before in Los Angeles.
    expect(extractTrips(ics, { now: NOW, timezone: "America/Los_Angeles" })).toEqual([
      { trip_id: "tokyo", destination_raw: "Tokyo", start_date: "2026-04-04", end_date: null },
      { trip_id: "lisbon", destination_raw: "Lisbon", start_date: "2026-04-06", end_date: null },
    ]);
  });

  it("applies the TZID offset in force on the event date", () => {
    const ics = calendar(
      ["UID:a", "LOCATION:Tokyo", "DTSTART;TZID=Asia/Tokyo:20260405T080000"],
      // 23:30 EDT is 03:30Z the next day.
      ["UID:b", "LOCATION:Boston", "DTSTART;TZID=America/New_York:20260405T233000"],
      // 01:00 EST in January is 06:00Z, still the same day in UTC.
      ["UID:c", "LOCATION:Albany", "DTSTART;TZID=America/New_York:20270110T010000"],
    );

    expect(extractTrips(ics, { now: NOW, timezone: "America/Chicago", lookaheadDays: 400 })).toEqual([
      { trip_id: "tokyo", destination_raw: "Tokyo", start_date: "2026-04-04", end_date: null },
      { trip_id: "boston", destination_raw: "Boston", start_date: "2026-04-05", end_date: null },
      { trip_id: "albany", destination_raw: "Albany", start_date: "2027-01-10", end_date: null },
    ]);
    expect(extractTrips(ics, { now: NOW, timezone: "UTC", lookaheadDays: 400 })).toEqual([
      { trip_id: "tokyo", destination_raw: "Tokyo", start_date: "2026-04-04", end_date: null },
      { trip_id: "boston", destination_raw: "Boston", start_date: "2026-04-06", end_date: null },
      { trip_id: "albany", destination_raw: "Albany", start_date: "2027-01-10", end_date: null },
    ]);
  });

  it("takes a datetime with an unknown TZID as written", () => {
    const ics = calendar(["UID:a", "LOCATION:Oslo", "DTSTART;TZID=Custom/Zone:20260407T230000"]);
    expect(extractTrips(ics, { now: NOW, timezone: "UTC" })).toEqual([
      { trip_id: "oslo", destination_raw: "Oslo", start_date: "2026-04-07", end_date: null },
    ]);
  });

  it("keeps events that carry no UID", () => {
    const ics = calendar(["LOCATION:Austin, TX", "DTSTART;VALUE=DATE:20260310"]);
    expect(extractTrips(ics, { now: NOW })).toEqual([
      { trip_id: "austin, tx", destination_raw: "Austin, TX", start_date: "2026-03-10", end_date: null },
    ]);
  });

  it("groups legs with the same normalized destination", () => {
    const ics = calendar(
      ["UID:1", "LOCATION:Paris", "DTSTART;VALUE=DATE:20260410", "DTEND;VALUE=DATE:20260412"],
      ["UID:2", "LOCATION:Lyon", "DTSTART;VALUE=DATE:20260411"],
      ["UID:3", "LOCATION:PARIS ", "DTSTART;VALUE=DATE:20260408", "DTEND;VALUE=DATE:20260409"],
      ["UID:4", "LOCATION:paris", "DTSTART;VALUE=DATE:20260412", "DTEND;VALUE=DATE:20260415"],
    );

    expect(extractTrips(ics, { now: NOW })).toEqual([
      { trip_id: "paris", destination_raw: "Paris", start_date: "2026-04-08", end_date: "2026-04-15" },
      { trip_id: "lyon", destination_raw: "Lyon", start_date: "2026-04-11", end_date: null },
    ]);
  });

  it("returns an empty list for empty text", () => {
    expect(extractTrips("   ", { now: NOW })).toEqual([]);
  });

  it("rejects an unknown timezone", () => {
    expect(() => extractTrips("", { timezone: "Nowhere/Special" })).toThrow(RangeError);
  });
});
