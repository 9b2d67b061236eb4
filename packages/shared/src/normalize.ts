/**
 * @layover/shared -- Location string normalization.
 *
 * Turns a raw location ("New Orleans, LA", "  st. louis ") into the
 * canonical comparison key used for exact matching, geocode cache keys
 * and notified-pair history.
 *
 * Pure, total, idempotent. Deliberately conservative: it only removes
 * differences of case, spacing and punctuation. Diacritics are kept and
 * no aliases are applied, so two distinct places never collapse into
 * one key.
 */

// Anything that is not a letter, combining mark, digit, whitespace or comma.
const NON_KEY_CHARS = /[^\p{L}\p{M}\p{N}\s,]/gu;

/**
 * Normalize a raw location string into its comparison key.
 *
 * The comma separating city from region survives as ", ":
 *   "New Orleans , LA"  -> "new orleans, la"
 *   "St. Louis"         -> "st louis"
 *   "Winston-Salem, NC" -> "winston salem, nc"
 *   ",, ,"              -> ""
 */
export function normalizeLocation(raw: string): string {
  const folded = raw
    .normalize("NFKC")
    .toLowerCase()
    .normalize("NFKC")
    .replace(NON_KEY_CHARS, " ");

  return folded
    .split(",")
    .map((part) => part.trim().replace(/\s+/g, " "))
    .filter((part) => part.length > 0)
    .join(", ");
}
