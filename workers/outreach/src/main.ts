/**
 * Process entry point: `layover <config> [--ignore-state] [--dry-run]`.
 */

import { runOutreach } from "./index";

runOutreach(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("outreach: unexpected failure:", err);
    process.exitCode = 1;
  },
);
