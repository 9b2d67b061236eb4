/**
 * @layover/shared -- Configuration loading.
 *
 * Reads a TOML (smol-toml) or JSON file, applies environment overrides,
 * validates with ConfigFileSchema and fills in defaults.
 *
 * Environment overrides (so secrets need not live in the file):
 * - LAYOVER_TODOIST_TOKEN -> todoist.api_token
 * - LAYOVER_FEED_URL      -> feed_url
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { extname } from "node:path";
import { parse as parseToml } from "smol-toml";
import { ConfigFileSchema, type ConfigFile, type StoreKind } from "./config-schema";
import {
  DEFAULT_CONTACTS_DIR,
  DEFAULT_GEOCODE_MIN_INTERVAL_MS,
  DEFAULT_GEOCODE_TIMEOUT_MS,
  DEFAULT_LOOKAHEAD_DAYS,
  DEFAULT_NOMINATIM_BASE_URL,
  DEFAULT_RADIUS_KM,
  DEFAULT_TIMEZONE,
  DEFAULT_USER_AGENT,
} from "./constants";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Fully resolved configuration. Paths are expanded. */
export interface LayoverConfig {
  readonly feedUrl: string;
  readonly todoist: {
    readonly apiToken: string;
    readonly projectId?: string;
  };
  readonly contactsDir: string;
  readonly radiusKm: number;
  readonly timezone: string;
  readonly lookaheadDays: number;
  readonly stateDir: string;
  readonly store: StoreKind;
  readonly geocoder: {
    readonly baseUrl: string;
    readonly userAgent: string;
    readonly email?: string;
    readonly minIntervalMs: number;
    readonly timeoutMs: number;
  };
}

export type Env = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  readonly env?: Env;
  readonly homeDir?: string;
}

/** The configuration file is missing, unparseable or invalid. */
export class ConfigError extends Error {
  /** One entry per offending field. */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Path expansion
// ---------------------------------------------------------------------------

/**
 * Expand a leading `~` to the home directory and `$VAR` / `${VAR}` to
 * environment values. Unknown variables are left as written.
 */
export function expandPath(path: string, env: Env, homeDir: string): string {
  let out = path.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (match, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      if (name === undefined) return match;
      return env[name] ?? match;
    });

  if (out === "~") {
    out = homeDir;
  } else if (out.startsWith("~/")) {
    out = homeDir + out.slice(1);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse file text by extension: .json with JSON.parse, anything else as TOML. */
export function parseConfigText(text: string, path: string): unknown {
  try {
    if (extname(path).toLowerCase() === ".json") {
      return JSON.parse(text);
    }
    return parseToml(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse ${path}: ${message}`);
  }
}

/** Overlay LAYOVER_* environment variables onto the raw file content. */
export function applyEnvOverrides(raw: unknown, env: Env): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const out: Record<string, unknown> = { ...raw };

  const feedUrl = env["LAYOVER_FEED_URL"];
  if (feedUrl) {
    out.feed_url = feedUrl;
  }

  const token = env["LAYOVER_TODOIST_TOKEN"];
  if (token) {
    out.todoist = { ...(isRecord(raw.todoist) ? raw.todoist : {}), api_token: token };
  }
  return out;
}

/** Fill defaults and expand paths. */
export function resolveConfig(file: ConfigFile, env: Env, homeDir: string): LayoverConfig {
  const geocoder = file.geocoder ?? {};
  return {
    feedUrl: file.feed_url.trim(),
    todoist: {
      apiToken: file.todoist.api_token,
      ...(file.todoist.project_id ? { projectId: file.todoist.project_id } : {}),
    },
    contactsDir: expandPath(file.contacts_dir ?? DEFAULT_CONTACTS_DIR, env, homeDir),
    radiusKm: file.radius_km ?? DEFAULT_RADIUS_KM,
    timezone: file.timezone ?? DEFAULT_TIMEZONE,
    lookaheadDays: file.lookahead_days ?? DEFAULT_LOOKAHEAD_DAYS,
    stateDir: expandPath(file.state_dir ?? ".", env, homeDir),
    store: file.store ?? "json",
    geocoder: {
      baseUrl: geocoder.base_url ?? DEFAULT_NOMINATIM_BASE_URL,
      userAgent: geocoder.user_agent ?? DEFAULT_USER_AGENT,
      ...(geocoder.email ? { email: geocoder.email } : {}),
      minIntervalMs: geocoder.min_interval_ms ?? DEFAULT_GEOCODE_MIN_INTERVAL_MS,
      timeoutMs: geocoder.timeout_ms ?? DEFAULT_GEOCODE_TIMEOUT_MS,
    },
  };
}

/** Validate raw (already parsed) content and resolve it. */
export function parseConfig(raw: unknown, options: LoadConfigOptions = {}): LayoverConfig {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? homedir();

  const parsed = ConfigFileSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError("Invalid configuration", issues);
  }
  return resolveConfig(parsed.data, env, homeDir);
}

/**
 * Load, validate and resolve a configuration file.
 *
 * @throws ConfigError
 */
export function loadConfig(path: string, options: LoadConfigOptions = {}): LayoverConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read ${path}: ${message}`);
  }

  return parseConfig(parseConfigText(text, path), options);
}
