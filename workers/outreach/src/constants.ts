/**
 * Constants for the outreach worker.
 */

/** Run finished; nothing failed (also used when there was nothing to do). */
export const EXIT_OK = 0;

/** Configuration error or a fatal failure (store, feed fetch, empty contacts directory). */
export const EXIT_FAILURE = 1;

/** Run finished but at least one reminder's task creation failed. */
export const EXIT_PARTIAL = 2;

export const USAGE = `Usage: layover <config.toml> [--ignore-state] [--dry-run]

  --ignore-state  treat every trip as not yet notified for this run only
  --dry-run       print the reminders and their task titles; create nothing
  -h, --help      show this help`;

export const NO_TRIPS_MESSAGE = "No upcoming trips found.";
