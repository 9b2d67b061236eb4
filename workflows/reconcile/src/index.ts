/**
 * ReconciliationEngine -- one reconciliation pass over the upcoming trips.
 *
 * For each trip, in feed order:
 * 1. Match the destination against the contact cities (CityMatcher)
 * 2. Skip the pair when OutreachStateStore already has it
 * 3. Hand the reminder to the task collaborator
 * 4. Mark the pair notified only after every task was created
 *
 * Processing is sequential and there are no internal retries. A failed
 * reminder is recorded and left unmarked, so the next run reissues it.
 * StorePersistenceError is never caught here: a store that cannot be
 * written ends the run.
 *
 * Stores and the matcher are injected, so tests run against in-memory
 * backends and a scripted geocode function.
 */

import { StorePersistenceError } from "@layover/shared";
import type {
  ActionableReminder,
  CityMatcher,
  ContactCity,
  CreateTasksFn,
  Logger,
  OutreachStateStore,
  TripRecord,
} from "@layover/shared";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ReconciliationEngineOptions {
  readonly matcher: Pick<CityMatcher, "matchTrip">;
  readonly state: OutreachStateStore;
  readonly logger?: Logger;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/** A reminder whose task creation failed. */
export interface DeliveryFailure {
  readonly trip_id: string;
  readonly city_key: string;
  readonly message: string;
}

/** Outcome of deliver(). */
export interface DeliverySummary {
  /** Reminders whose tasks were all created and whose pair is now marked. */
  readonly delivered: number;
  readonly failed: readonly DeliveryFailure[];
}

/** Outcome of the matching half of a pass. */
export interface ReconcilePass {
  readonly reminders: readonly ActionableReminder[];
  readonly tripsSeen: number;
  /** Trips that matched a contact city, notified or not. */
  readonly matched: number;
  readonly skippedAsNotified: number;
  /** Trips whose matching threw; they are logged and left for the next run. */
  readonly tripErrors: number;
}

/** Combined outcome of run(). */
export interface RunSummary extends DeliverySummary {
  readonly tripsSeen: number;
  readonly matched: number;
  readonly skippedAsNotified: number;
  readonly tripErrors: number;
  readonly reminders: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// ReconciliationEngine class
// ---------------------------------------------------------------------------

export class ReconciliationEngine {
  private readonly matcher: Pick<CityMatcher, "matchTrip">;
  private readonly state: OutreachStateStore;
  private readonly logger: Logger;

  constructor(options: ReconciliationEngineOptions) {
    this.matcher = options.matcher;
    this.state = options.state;
    this.logger = options.logger ?? console;
  }

  /**
   * Reminders for every matched, not-yet-notified trip, in feed order.
   * Does not touch the notified-pair history.
   */
  async reconcile(
    trips: readonly TripRecord[],
    cities: readonly ContactCity[],
  ): Promise<ActionableReminder[]> {
    const pass = await this.scan(trips, cities);
    return [...pass.reminders];
  }

  /** Matching pass with counters for the run summary. */
  async scan(
    trips: readonly TripRecord[],
    cities: readonly ContactCity[],
  ): Promise<ReconcilePass> {
    const reminders: ActionableReminder[] = [];
    const emitted = new Set<string>();
    let matched = 0;
    let skippedAsNotified = 0;
    let tripErrors = 0;

    for (const trip of trips) {
      let reminder: ActionableReminder | null;
      try {
        reminder = await this.matcher.matchTrip(trip, cities);
      } catch (err) {
        if (err instanceof StorePersistenceError) throw err;
        tripErrors++;
        this.logger.error(`reconcile: trip "${trip.trip_id}" skipped: ${errorMessage(err)}`);
        continue;
      }

      if (reminder === null) {
        continue;
      }
      matched++;

      const tripId = trip.trip_id;
      const cityKey = reminder.city.key;
      const pair = `${tripId}\u0000${cityKey}`;
      if (this.state.isNotified(tripId, cityKey) || emitted.has(pair)) {
        skippedAsNotified++;
        continue;
      }

      emitted.add(pair);
      reminders.push(reminder);
    }

    return { reminders, tripsSeen: trips.length, matched, skippedAsNotified, tripErrors };
  }

  /** Record a delivered reminder. */
  confirmDelivered(reminder: ActionableReminder): void {
    this.state.markNotified(reminder.trip.trip_id, reminder.city.key);
  }

  /**
   * Create tasks for each reminder in order. A reminder is confirmed only
   * when createTasks resolves; a rejection is recorded and the loop moves
   * on.
   *
   * @throws StorePersistenceError when a confirmation cannot be persisted.
   */
  async deliver(
    reminders: readonly ActionableReminder[],
    createTasks: CreateTasksFn,
  ): Promise<DeliverySummary> {
    let delivered = 0;
    const failed: DeliveryFailure[] = [];

    for (const reminder of reminders) {
      const tripId = reminder.trip.trip_id;
      const cityKey = reminder.city.key;

      try {
        await createTasks(reminder);
      } catch (err) {
        const message = errorMessage(err);
        failed.push({ trip_id: tripId, city_key: cityKey, message });
        this.logger.warn(
          `reconcile: task creation for "${tripId}" / "${cityKey}" failed: ${message}`,
        );
        continue;
      }

      this.confirmDelivered(reminder);
      delivered++;
      this.logger.log(
        `reconcile: notified "${tripId}" / "${cityKey}" (${reminder.match_kind.toLowerCase()})`,
      );
    }

    return { delivered, failed };
  }

  /** reconcile() then deliver(). */
  async run(
    trips: readonly TripRecord[],
    cities: readonly ContactCity[],
    createTasks: CreateTasksFn,
  ): Promise<RunSummary> {
    const pass = await this.scan(trips, cities);
    const delivery = await this.deliver(pass.reminders, createTasks);

    return {
      tripsSeen: pass.tripsSeen,
      matched: pass.matched,
      skippedAsNotified: pass.skippedAsNotified,
      tripErrors: pass.tripErrors,
      reminders: pass.reminders.length,
      delivered: delivery.delivered,
      failed: delivery.failed,
    };
  }
}
