/**
 * layover outreach worker -- the scheduled batch job.
 *
 * One run:
 * 1. Parse arguments and load the config (exit 1 on any config error)
 * 2. Open both stores (fatal on failure)
 * 3. Load the contact directory (none -> exit 1)
 * 4. Fetch the trip feed and extract upcoming trips (none -> exit 0)
 * 5. Reconcile and deliver reminders as Todoist tasks
 * 6. Log the summary; exit 2 when any reminder failed
 *
 * Every collaborator that reaches the network takes the injected fetchFn,
 * so tests drive a whole run against in-process stubs.
 */

import {
  CityMatcher,
  ConfigError,
  FeedFetchError,
  GeocodeCache,
  NominatimGeocoder,
  OutreachStateStore,
  StorePersistenceError,
  TodoistClient,
  buildOutreachTasks,
  createOutreachTasks,
  extractTrips,
  fetchTripFeed,
  generateId,
  loadConfig,
  loadContactDirectory,
} from "@layover/shared";
import type {
  ActionableReminder,
  ContactCity,
  Env,
  FetchFn,
  LayoverConfig,
  Logger,
  TripRecord,
} from "@layover/shared";
import { ReconciliationEngine } from "@layover/workflow-reconcile";
import { CliUsageError, parseCliArgs, type CliOptions } from "./cli";
import { openStores } from "./stores";
import { EXIT_FAILURE, EXIT_OK, EXIT_PARTIAL, NO_TRIPS_MESSAGE, USAGE } from "./constants";

export { parseCliArgs, CliUsageError } from "./cli";
export type { CliOptions, CliParseResult } from "./cli";
export { openStores } from "./stores";
export type { OpenedStores } from "./stores";
export { EXIT_OK, EXIT_FAILURE, EXIT_PARTIAL, USAGE, NO_TRIPS_MESSAGE } from "./constants";

// ---------------------------------------------------------------------------
// Injectable dependencies (for testability)
// ---------------------------------------------------------------------------

export interface OutreachDeps {
  readonly env?: Env;
  readonly homeDir?: string;
  /** Used for the feed, Nominatim and Todoist. */
  readonly fetchFn?: FetchFn;
  readonly logger?: Logger;
  readonly now?: () => Date;
  /** Geocoder throttle sleep. */
  readonly sleep?: (ms: number) => Promise<void>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeReminder(reminder: ActionableReminder): string {
  const how =
    reminder.match_kind === "EXACT"
      ? "exact"
      : `within ${(reminder.distance_km ?? 0).toFixed(1)} km`;
  return `${reminder.trip.destination_raw} -> ${reminder.city.display_name} (${how})`;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/** Run the job for argv (without the node and script entries). Resolves to the exit code. */
export async function runOutreach(
  argv: readonly string[],
  deps: OutreachDeps = {},
): Promise<number> {
  const logger = deps.logger ?? console;

  let cli: CliOptions;
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.kind === "help") {
      logger.log(USAGE);
      return EXIT_OK;
    }
    cli = parsed.options;
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    logger.error(`layover: ${err.message}`);
    logger.error(USAGE);
    return EXIT_FAILURE;
  }

  let config: LayoverConfig;
  try {
    config = loadConfig(cli.configPath, { env: deps.env, homeDir: deps.homeDir });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logger.error(`config: ${err.message}`);
    return EXIT_FAILURE;
  }

  try {
    return await runWithConfig(config, cli, deps, logger);
  } catch (err) {
    if (err instanceof StorePersistenceError) {
      logger.error(`store: ${err.message}`);
    } else if (err instanceof FeedFetchError) {
      logger.error(`feed: ${err.message}`);
    } else {
      logger.error(`outreach: run failed: ${errorMessage(err)}`);
    }
    return EXIT_FAILURE;
  }
}

async function runWithConfig(
  config: LayoverConfig,
  cli: CliOptions,
  deps: OutreachDeps,
  logger: Logger,
): Promise<number> {
  const now = deps.now ?? (() => new Date());
  const runId = generateId("run");
  const mode = cli.dryRun ? " (dry run)" : cli.ignoreState ? " (ignoring notified history)" : "";
  logger.log(`outreach: run ${runId} started${mode}`);

  const stores = openStores(config.store, config.stateDir, now);
  try {
    const geocoder = new NominatimGeocoder({
      baseUrl: config.geocoder.baseUrl,
      userAgent: config.geocoder.userAgent,
      email: config.geocoder.email,
      minIntervalMs: config.geocoder.minIntervalMs,
      timeoutMs: config.geocoder.timeoutMs,
      fetchFn: deps.fetchFn,
      sleep: deps.sleep,
    });
    const cache = new GeocodeCache({
      storage: stores.geocodeStorage,
      geocode: geocoder.asGeocodeFn(),
      logger,
      now,
    });
    cache.load();

    const state = new OutreachStateStore({ storage: stores.pairStorage, now });
    // A dry run leaves the state file untouched.
    state.load(cli.dryRun ? undefined : runId);
    if (cli.ignoreState) {
      state.ignoreHistoryForThisRun();
    }
    logger.log(`outreach: ${state.size} notified pair(s) on record in ${stores.location}`);

    const cities = loadContactDirectory(config.contactsDir, { logger });
    if (cities.length === 0) {
      logger.error(`contacts: no contact files found in ${config.contactsDir}`);
      return EXIT_FAILURE;
    }

    const ics = await fetchTripFeed(config.feedUrl, {
      fetchFn: deps.fetchFn,
      userAgent: config.geocoder.userAgent,
    });
    const trips = extractTrips(ics, {
      now: now(),
      timezone: config.timezone,
      lookaheadDays: config.lookaheadDays,
    });
    if (trips.length === 0) {
      logger.log(NO_TRIPS_MESSAGE);
      return EXIT_OK;
    }
    logger.log(`outreach: ${trips.length} upcoming trip(s), ${cities.length} contact cit${cities.length === 1 ? "y" : "ies"}`);

    const matcher = new CityMatcher({ cache, radiusKm: config.radiusKm });
    const engine = new ReconciliationEngine({ matcher, state, logger });

    const exitCode = cli.dryRun
      ? await dryRun(engine, trips, cities, config, logger)
      : await deliverAll(engine, trips, cities, config, deps, logger);

    const stats = cache.stats();
    logger.log(
      `geocode: ${stats.hits} hit(s), ${stats.misses} lookup(s), ${stats.failures} failure(s)`,
    );
    return exitCode;
  } finally {
    stores.close();
  }
}

async function dryRun(
  engine: ReconciliationEngine,
  trips: readonly TripRecord[],
  cities: readonly ContactCity[],
  config: LayoverConfig,
  logger: Logger,
): Promise<number> {
  const reminders = await engine.reconcile(trips, cities);
  for (const reminder of reminders) {
    logger.log(`[dry-run] ${describeReminder(reminder)}`);
    for (const task of buildOutreachTasks(reminder, config.timezone, config.todoist.projectId)) {
      logger.log(`[dry-run]   - ${task.content}`);
    }
  }
  logger.log(`Dry run: ${reminders.length} reminder(s), no tasks created`);
  return EXIT_OK;
}

async function deliverAll(
  engine: ReconciliationEngine,
  trips: readonly TripRecord[],
  cities: readonly ContactCity[],
  config: LayoverConfig,
  deps: OutreachDeps,
  logger: Logger,
): Promise<number> {
  const client = new TodoistClient({
    apiToken: config.todoist.apiToken,
    fetchFn: deps.fetchFn,
    requestId: () => generateId("task"),
  });

  let tasksCreated = 0;
  const summary = await engine.run(trips, cities, async (reminder) => {
    const created = await createOutreachTasks(
      client,
      reminder,
      config.timezone,
      config.todoist.projectId,
    );
    tasksCreated += created.length;
  });

  logger.log(`Created ${tasksCreated} task(s) for ${summary.delivered} reminder(s)`);
  if (summary.skippedAsNotified > 0) {
    logger.log(`outreach: ${summary.skippedAsNotified} match(es) already notified`);
  }

  if (summary.failed.length > 0) {
    for (const failure of summary.failed) {
      logger.error(`outreach: "${failure.trip_id}" / "${failure.city_key}" not delivered: ${failure.message}`);
    }
    return EXIT_PARTIAL;
  }
  return EXIT_OK;
}
