/**
 * Zod schemas for the Layover configuration file.
 *
 * The file is snake_case (TOML or JSON). Every field except feed_url and
 * todoist.api_token is optional; defaults are applied by resolveConfig()
 * in config.ts so the schema describes exactly what a user may write.
 */

import { z } from "zod/v4";
import { validateFeedUrl, isValidTimeZone } from "./ics-feed";

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const StoreKindSchema = z.enum(["json", "sqlite"]);
export type StoreKind = z.infer<typeof StoreKindSchema>;

export const TodoistSectionSchema = z.object({
  /** Personal API token (Settings -> Integrations -> Developer). */
  api_token: z.string().min(1, "api_token is required"),
  /** Target project; tasks go to the inbox when absent. */
  project_id: z.string().min(1).optional(),
});

export const GeocoderSectionSchema = z.object({
  base_url: z
    .string()
    .refine(isAbsoluteUrl, "base_url must be an absolute URL")
    .optional(),
  user_agent: z.string().min(1).optional(),
  email: z.string().email().optional(),
  min_interval_ms: z.number().int().min(0).optional(),
  timeout_ms: z.number().int().positive().optional(),
});

// ---------------------------------------------------------------------------
// Whole file
// ---------------------------------------------------------------------------

export const ConfigFileSchema = z.object({
  /** Private iCalendar trip feed. */
  feed_url: z.string().refine((url) => validateFeedUrl(url).valid, {
    message: "feed_url must be an https URL",
  }),
  todoist: TodoistSectionSchema,
  contacts_dir: z.string().min(1).optional(),
  radius_km: z.number().positive("radius_km must be greater than 0").optional(),
  timezone: z
    .string()
    .refine(isValidTimeZone, { message: "timezone must be a valid IANA zone name" })
    .optional(),
  lookahead_days: z.number().int().min(1).max(366).optional(),
  state_dir: z.string().min(1).optional(),
  store: StoreKindSchema.optional(),
  geocoder: GeocoderSectionSchema.optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
