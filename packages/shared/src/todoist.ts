/**
 * @layover/shared -- Todoist task client and outreach task builder.
 *
 * Thin wrapper over the Todoist REST API that:
 * - Creates tasks (the only call Layover needs)
 * - Sends an X-Request-Id per task so Todoist can drop a retried duplicate
 * - Throws specific error types for 401/403, 429, and general API errors
 * - Accepts injectable FetchFn for testability
 */

import type { ActionableReminder, ContactLine, FetchFn } from "./types";
import { TODOIST_TASKS_URL, TODOIST_TIMEOUT_MS } from "./constants";
import { generateId } from "./id";
import { untilAborted } from "./http";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TodoistTaskInput {
  readonly content: string;
  readonly description: string;
  readonly project_id?: string;
}

/** The fields Layover reads back from a created task. */
export interface TodoistTask {
  readonly id: string;
  readonly content: string;
}

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

/** Base class for all Todoist API errors. statusCode is 0 when no response arrived. */
export class TodoistApiError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = "TodoistApiError";
    this.statusCode = statusCode;
  }
}

/** 401/403 -- token missing, revoked or without access to the project. */
export class TodoistAuthError extends TodoistApiError {
  constructor(message = "Todoist token rejected", statusCode = 401) {
    super(message, statusCode);
    this.name = "TodoistAuthError";
  }
}

/** 429 -- too many requests. */
export class TodoistRateLimitError extends TodoistApiError {
  constructor(message = "Todoist rate limit exceeded") {
    super(message, 429);
    this.name = "TodoistRateLimitError";
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface TodoistClientOptions {
  readonly apiToken: string;
  readonly tasksUrl?: string;
  readonly timeoutMs?: number;
  readonly fetchFn?: FetchFn;
  /** Produces the X-Request-Id for each request. */
  readonly requestId?: () => string;
}

export class TodoistClient {
  private readonly apiToken: string;
  private readonly tasksUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly requestId: () => string;

  constructor(options: TodoistClientOptions) {
    this.apiToken = options.apiToken;
    this.tasksUrl = options.tasksUrl ?? TODOIST_TASKS_URL;
    this.timeoutMs = options.timeoutMs ?? TODOIST_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.requestId = options.requestId ?? (() => generateId("task"));
  }

  /**
   * Create one task.
   *
   * Error mapping:
   * - 401, 403 -> TodoistAuthError
   * - 429 -> TodoistRateLimitError
   * - Other non-2xx, timeouts -> TodoistApiError
   *
   * A 2xx whose body is not readable before the timeout resolves with an
   * empty id.
   */
  async createTask(input: TodoistTaskInput): Promise<TodoistTask> {
    const body: Record<string, string> = {
      content: input.content,
      description: input.description,
    };
    if (input.project_id) {
      body.project_id = input.project_id;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    // The timer covers the request and the body read.
    try {
      return await this.post(body, input.content, controller.signal);
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TodoistApiError(`Todoist request timed out after ${this.timeoutMs}ms`, 0);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private async post(
    body: Record<string, string>,
    content: string,
    signal: AbortSignal,
  ): Promise<TodoistTask> {
    const response = await this.fetchFn(this.tasksUrl, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiToken}`,
        "Content-Type": "application/json",
        "X-Request-Id": this.requestId(),
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errorText = await untilAborted(response.text(), signal).catch(() => "Unknown error");
      switch (response.status) {
        case 401:
        case 403:
          throw new TodoistAuthError(errorText, response.status);
        case 429:
          throw new TodoistRateLimitError(errorText);
        default:
          throw new TodoistApiError(errorText, response.status);
      }
    }

    // The task exists once Todoist answers 2xx; an unreadable body only
    // loses the id.
    const created: unknown = await untilAborted(response.json(), signal).catch(() => null);
    if (
      typeof created === "object" &&
      created !== null &&
      "id" in created &&
      typeof created.id === "string"
    ) {
      return { id: created.id, content };
    }
    return { id: "", content };
  }
}

// ---------------------------------------------------------------------------
// Outreach tasks
// ---------------------------------------------------------------------------

function formatDescription(
  reminder: ActionableReminder,
  contact: ContactLine | null,
  timezone: string,
): string {
  const { trip, city } = reminder;
  const lines = [`Trip to ${trip.destination_raw}`];

  if (trip.start_date !== null || trip.end_date !== null) {
    lines.push(
      `Dates (${timezone}): ${trip.start_date ?? "unknown"} → ${trip.end_date ?? "unknown"}`,
    );
  }

  if (reminder.match_kind === "EXACT") {
    lines.push("Match: exact city name");
  } else if (reminder.distance_km !== null) {
    lines.push(`Match: within ${reminder.distance_km.toFixed(1)} km`);
  }

  lines.push(`Contact list: ${city.display_name}`);

  if (contact?.notes) {
    lines.push(`Notes: ${contact.notes}`);
  }
  return lines.join("\n");
}

/**
 * The tasks for one reminder: one per contact line, or a single
 * city-level task when the city file lists nobody.
 */
export function buildOutreachTasks(
  reminder: ActionableReminder,
  timezone: string,
  projectId?: string,
): TodoistTaskInput[] {
  const destination = reminder.trip.destination_raw;
  const withProject = (task: TodoistTaskInput): TodoistTaskInput =>
    projectId ? { ...task, project_id: projectId } : task;

  if (reminder.city.contacts.length === 0) {
    return [
      withProject({
        content: `Reach out to contacts in ${reminder.city.display_name} re: ${destination} trip`,
        description: formatDescription(reminder, null, timezone),
      }),
    ];
  }

  return reminder.city.contacts.map((contact) =>
    withProject({
      content: `Reach out to ${contact.name} re: ${destination} trip`,
      description: formatDescription(reminder, contact, timezone),
    }),
  );
}

/**
 * Create every task for a reminder, in order. The first failure aborts
 * the rest and is rethrown, so the reminder is not confirmed.
 */
export async function createOutreachTasks(
  client: Pick<TodoistClient, "createTask">,
  reminder: ActionableReminder,
  timezone: string,
  projectId?: string,
): Promise<TodoistTask[]> {
  const created: TodoistTask[] = [];
  for (const task of buildOutreachTasks(reminder, timezone, projectId)) {
    created.push(await client.createTask(task));
  }
  return created;
}
