/**
 * @layover/shared -- iCalendar (RFC 5545) parsing for the trip feed.
 *
 * Parses raw iCalendar text into ParsedVEvent objects. Pure functions.
 *
 * Key design decisions:
 * - Only VEVENT components are parsed (VTODO, VJOURNAL, VTIMEZONE ignored)
 * - Line unfolding per RFC 5545 Section 3.1
 * - Text unescaping per RFC 5545 Section 3.3.11
 * - Property parameters are parsed (VALUE=DATE, TZID=...)
 * - UID is optional; events without one are kept
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A VEVENT as written in the feed, TEXT values unescaped. */
export interface ParsedVEvent {
  readonly uid?: string;
  readonly summary?: string;
  readonly location?: string;
  /** Raw DTSTART value ("" when absent). */
  readonly dtstart: string;
  readonly dtstartParams?: Record<string, string>;
  readonly dtend?: string;
  readonly dtendParams?: Record<string, string>;
}

/** Parsed date or date-time property value. */
export interface ICalDateTime {
  /** All-day value, YYYY-MM-DD. */
  readonly date?: string;
  /** ISO 8601 date-time; ends in Z for UTC values. */
  readonly dateTime?: string;
  readonly timeZone?: string;
}

// ---------------------------------------------------------------------------
// Line unfolding (RFC 5545 Section 3.1)
// ---------------------------------------------------------------------------

/**
 * Unfold content lines per RFC 5545.
 * Continuation lines begin with a single space or tab.
 */
export function unfoldLines(text: string): string {
  return text
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .replace(/\n[ \t]/g, "");
}

// ---------------------------------------------------------------------------
// Text unescaping (RFC 5545 Section 3.3.11)
// ---------------------------------------------------------------------------

/** Unescape an iCalendar TEXT value in a single left-to-right pass. */
export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_match, ch: string) =>
    ch === "n" || ch === "N" ? "\n" : ch,
  );
}

// ---------------------------------------------------------------------------
// Property parsing
// ---------------------------------------------------------------------------

/**
 * Parse an iCalendar property line into name, parameters, and value.
 *
 * Format: NAME;PARAM1=VAL1;PARAM2="VAL:2":VALUE
 *
 * @returns null if the line has no name/value separator
 */
export function parsePropertyLine(
  line: string,
): { name: string; params: Record<string, string>; value: string } | null {
  // The separating colon is the first one outside a quoted parameter value.
  let colonIdx = -1;
  let inQuote = false;
  for (let i = 0; i < line.length; i++) {
    if (line[i] === '"') {
      inQuote = !inQuote;
    } else if (line[i] === ":" && !inQuote) {
      colonIdx = i;
      break;
    }
  }

  if (colonIdx === -1) return null;

  const nameAndParams = line.substring(0, colonIdx);
  const value = line.substring(colonIdx + 1);

  const semicolonIdx = nameAndParams.indexOf(";");
  const params: Record<string, string> = {};

  if (semicolonIdx === -1) {
    return { name: nameAndParams.toUpperCase(), params, value };
  }

  const name = nameAndParams.substring(0, semicolonIdx).toUpperCase();
  for (const param of nameAndParams.substring(semicolonIdx + 1).split(";")) {
    const eqIdx = param.indexOf("=");
    if (eqIdx === -1) continue;
    const pKey = param.substring(0, eqIdx).toUpperCase();
    let pVal = param.substring(eqIdx + 1);
    if (pVal.length >= 2 && pVal.startsWith('"') && pVal.endsWith('"')) {
      pVal = pVal.slice(1, -1);
    }
    params[pKey] = pVal;
  }

  return { name, params, value };
}

// ---------------------------------------------------------------------------
// VEVENT extraction
// ---------------------------------------------------------------------------

type PropertyBag = Record<string, { value: string; params: Record<string, string> }>;

function textProp(props: PropertyBag, name: string): string | undefined {
  const prop = props[name];
  return prop === undefined ? undefined : unescapeText(prop.value);
}

/**
 * Parse iCalendar text and extract all VEVENT components.
 *
 * Components nested inside a VEVENT (VALARM) are skipped so that their
 * properties do not overwrite the event's own.
 */
export function parseVEvents(icalText: string): ParsedVEvent[] {
  const lines = unfoldLines(icalText)
    .split("\n")
    .filter((l) => l.trim().length > 0);

  const events: ParsedVEvent[] = [];
  let inVEvent = false;
  let nestedDepth = 0;
  let props: PropertyBag = {};

  for (const line of lines) {
    const trimmed = line.trim();
    const upper = trimmed.toUpperCase();

    if (upper === "BEGIN:VEVENT") {
      inVEvent = true;
      nestedDepth = 0;
      props = {};
      continue;
    }

    if (!inVEvent) continue;

    if (upper.startsWith("BEGIN:")) {
      nestedDepth++;
      continue;
    }

    if (upper === "END:VEVENT" && nestedDepth === 0) {
      inVEvent = false;

      const uid = props["UID"]?.value.trim();
      events.push({
        uid: uid || undefined,
        summary: textProp(props, "SUMMARY"),
        location: textProp(props, "LOCATION"),
        dtstart: props["DTSTART"]?.value.trim() ?? "",
        dtstartParams: props["DTSTART"]?.params,
        dtend: props["DTEND"]?.value.trim(),
        dtendParams: props["DTEND"]?.params,
      });
      continue;
    }

    if (upper.startsWith("END:")) {
      nestedDepth = Math.max(0, nestedDepth - 1);
      continue;
    }

    if (nestedDepth > 0) continue;

    const parsed = parsePropertyLine(trimmed);
    if (parsed) {
      props[parsed.name] = { value: parsed.value, params: parsed.params };
    }
  }

  return events;
}

// ---------------------------------------------------------------------------
// DateTime conversion
// ---------------------------------------------------------------------------

/**
 * Convert an iCalendar DATE or DATE-TIME value.
 *
 * - VALUE=DATE or YYYYMMDD -> { date: "YYYY-MM-DD" }
 * - YYYYMMDDTHHMMSSZ -> { dateTime: "YYYY-MM-DDTHH:MM:SSZ" }
 * - TZID=... with YYYYMMDDTHHMMSS -> { dateTime, timeZone }
 * - Floating YYYYMMDDTHHMMSS -> { dateTime }
 *
 * Returns null for values that are neither.
 */
export function parseICalDateTime(
  value: string,
  params?: Record<string, string>,
): ICalDateTime | null {
  const dateOnly = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (dateOnly) {
    return { date: `${dateOnly[1]}-${dateOnly[2]}-${dateOnly[3]}` };
  }
  if (params?.["VALUE"] === "DATE") {
    return null;
  }

  const m = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z?)$/.exec(value);
  if (!m) {
    return null;
  }

  const isUTC = m[7] === "Z";
  const dateTime = `${m[1]}-${m[2]}-${m[3]}T${m[4]}:${m[5]}:${m[6]}${isUTC ? "Z" : ""}`;

  if (isUTC) {
    return { dateTime };
  }

  const tzid = params?.["TZID"];
  if (tzid) {
    return { dateTime, timeZone: tzid };
  }
  return { dateTime };
}
