/**
 * @layover/shared -- prefixed ULID generation.
 *
 * Run IDs and task request IDs are prefixed ULIDs, e.g. "run_01HXYZ...".
 */

import { monotonicFactory } from "ulid";
import { ID_PREFIXES } from "./constants";

// Within the same millisecond the random component is incremented, so
// successive IDs sort in generation order.
const monotonic = monotonicFactory();

/** Entity types that have prefixed IDs, derived from ID_PREFIXES keys. */
export type EntityType = keyof typeof ID_PREFIXES;

/** A new prefixed ULID for the given entity type (e.g. "run_01HXYZ..."). */
export function generateId(entity: EntityType): string {
  return ID_PREFIXES[entity] + monotonic();
}
