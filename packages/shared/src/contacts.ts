/**
 * @layover/shared -- Contact directory loader.
 *
 * One plain-text file per city, named after the city:
 *
 *   ~/travel-contacts/
 *     New Orleans, LA.txt
 *     Austin.txt
 *
 * Each non-blank line is a contact, `Name — notes` (em dash) or
 * `Name - notes` (hyphen with spaces). Lines starting with `#` are
 * comments.
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { extname, basename, join } from "node:path";
import type { ContactCity, ContactLine, Logger } from "./types";
import { normalizeLocation } from "./normalize";
import { CONTACT_FILE_EXTENSION } from "./constants";

const NOTES_SEPARATORS = ["—", " - "] as const;

/**
 * Parse a single contact line. Returns null for blank lines, comments
 * and lines without a name.
 */
export function parseContactLine(line: string): ContactLine | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  let cut = -1;
  let sepLength = 0;
  for (const sep of NOTES_SEPARATORS) {
    const idx = trimmed.indexOf(sep);
    if (idx !== -1 && (cut === -1 || idx < cut)) {
      cut = idx;
      sepLength = sep.length;
    }
  }

  if (cut === -1) {
    return { name: trimmed, notes: null };
  }

  const name = trimmed.slice(0, cut).trim();
  const notes = trimmed.slice(cut + sepLength).trim();
  if (!name) {
    return null;
  }
  return { name, notes: notes || null };
}

/** Parse the text of one city file. */
export function parseContactFile(text: string): ContactLine[] {
  const contacts: ContactLine[] = [];
  for (const line of text.split(/\r?\n/)) {
    const contact = parseContactLine(line);
    if (contact !== null) {
      contacts.push(contact);
    }
  }
  return contacts;
}

export interface LoadContactDirectoryOptions {
  readonly logger?: Logger;
}

/**
 * Read every city file in `dir`.
 *
 * A missing directory yields an empty list. When two files normalize to
 * the same key the first in sorted filename order wins and the other is
 * logged and ignored. Result is sorted by key.
 */
export function loadContactDirectory(
  dir: string,
  options: LoadContactDirectoryOptions = {},
): ContactCity[] {
  const logger = options.logger ?? console;

  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    return [];
  }

  const files = readdirSync(dir)
    .filter((entry) => extname(entry).toLowerCase() === CONTACT_FILE_EXTENSION)
    .sort();

  const byKey = new Map<string, ContactCity>();
  const sourceFile = new Map<string, string>();
  for (const file of files) {
    const path = join(dir, file);
    if (!statSync(path).isFile()) continue;

    const displayName = basename(file, extname(file));
    const key = normalizeLocation(displayName);
    if (!key) {
      logger.warn(`contacts: ignoring "${file}": name has no letters or digits`);
      continue;
    }

    const winner = sourceFile.get(key);
    if (winner !== undefined) {
      logger.warn(`contacts: ignoring "${file}": same city as "${winner}"`);
      continue;
    }

    byKey.set(key, {
      key,
      display_name: displayName,
      contacts: parseContactFile(readFileSync(path, "utf-8")),
    });
    sourceFile.set(key, file);
  }

  return [...byKey.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}
