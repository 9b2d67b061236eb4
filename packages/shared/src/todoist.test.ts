/**
 * @layover/shared -- Unit tests for the Todoist client and task builder.
 *
 * All tests use a mock FetchFn to verify:
 * - Endpoint, method, bearer token, X-Request-Id and JSON body
 * - Error mapping (401, 403, 429, general, timeout, stalled body)
 * - Task titles and descriptions per reminder
 * - First failure aborts the remaining tasks of a reminder
 */
import { describe, it, expect, vi } from "vitest";
import {
  TodoistClient,
  TodoistApiError,
  TodoistAuthError,
  TodoistRateLimitError,
  buildOutreachTasks,
  createOutreachTasks,
  type TodoistTaskInput,
} from "./todoist";
import type { ActionableReminder, FetchFn } from "./types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TEST_TOKEN = "test-secret";

function okFetch(id = "task-1") {
  return vi.fn<FetchFn>(async () =>
    new Response(JSON.stringify({ id, content: "x" }), {
      status: 200,
      headers: { "Content-Type": "application/json" },
    }),
  );
}

function errorFetch(status: number, body = "Error") {
  return vi.fn<FetchFn>(async () => new Response(body, { status }));
}

const RADIUS_REMINDER: ActionableReminder = {
  trip: {
    trip_id: "new orleans",
    destination_raw: "New Orleans",
    start_date: "2026-03-10",
    end_date: "2026-03-13",
  },
  city: {
    key: "new orleans, la",
    display_name: "New Orleans, LA",
    contacts: [
      { name: "Jane Doe", notes: "jazz fest" },
      { name: "Sam", notes: null },
    ],
  },
  match_kind: "RADIUS",
  distance_km: 0,
};

// ---------------------------------------------------------------------------
// TodoistClient
// ---------------------------------------------------------------------------

describe("TodoistClient.createTask", () => {
  it("POSTs JSON to the tasks endpoint with auth and request id", async () => {
    const fetchFn = okFetch("8123");
    const client = new TodoistClient({
      apiToken: TEST_TOKEN,
      fetchFn,
      requestId: () => "tsk_TEST",
    });

    const task = await client.createTask({
      content: "Reach out to Sam re: Paris trip",
      description: "Trip to Paris",
      project_id: "proj-1",
    });

    expect(task).toEqual({ id: "8123", content: "Reach out to Sam re: Paris trip" });

    const [url, init] = fetchFn.mock.calls[0] ?? ["", undefined];
    expect(url).toBe("https://api.todoist.com/api/v1/tasks");
    expect(init?.method).toBe("POST");
    const headers = new Headers(init?.headers);
    expect(headers.get("Authorization")).toBe("Bearer test-secret");
    expect(headers.get("Content-Type")).toBe("application/json");
    expect(headers.get("X-Request-Id")).toBe("tsk_TEST");
    expect(JSON.parse(String(init?.body))).toEqual({
      content: "Reach out to Sam re: Paris trip",
      description: "Trip to Paris",
      project_id: "proj-1",
    });
  });

  it("omits project_id when not given and uses a fresh request id per call", async () => {
    const fetchFn = okFetch();
    const client = new TodoistClient({ apiToken: TEST_TOKEN, fetchFn });

    await client.createTask({ content: "a", description: "" });
    await client.createTask({ content: "b", description: "" });

    const first = fetchFn.mock.calls[0]?.[1];
    const second = fetchFn.mock.calls[1]?.[1];
    expect(JSON.parse(String(first?.body))).toEqual({ content: "a", description: "" });

    const id1 = new Headers(first?.headers).get("X-Request-Id");
    const id2 = new Headers(second?.headers).get("X-Request-Id");
    expect(id1).toMatch(/^tsk_[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(id1).not.toBe(id2);
  });

  it.each([
    [401, TodoistAuthError],
    [403, TodoistAuthError],
    [429, TodoistRateLimitError],
    [500, TodoistApiError],
  ] as const)("maps HTTP %i to the matching error", async (status, ErrorClass) => {
    const client = new TodoistClient({ apiToken: TEST_TOKEN, fetchFn: errorFetch(status, "nope") });

    const err = await client.createTask({ content: "a", description: "" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ErrorClass);
    expect(err).toBeInstanceOf(TodoistApiError);
    expect(err).toMatchObject({ statusCode: status, message: "nope" });
  });

  it("maps a timeout to TodoistApiError", async () => {
    const fetchFn = vi.fn<FetchFn>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const client = new TodoistClient({ apiToken: TEST_TOKEN, fetchFn, timeoutMs: 5 });

    await expect(client.createTask({ content: "a", description: "" })).rejects.toMatchObject({
      name: "TodoistApiError",
      statusCode: 0,
    });
  });

  it("bounds a stalled error body by the same timeout", async () => {
    const fetchFn = vi.fn<FetchFn>(
      async () => new Response(new ReadableStream<Uint8Array>(), { status: 500 }),
    );
    const client = new TodoistClient({ apiToken: TEST_TOKEN, fetchFn, timeoutMs: 20 });

    await expect(client.createTask({ content: "a", description: "" })).rejects.toMatchObject({
      name: "TodoistApiError",
      statusCode: 0,
      message: "Todoist request timed out after 20ms",
    });
  });

  it("resolves with an empty id when a 2xx body stalls past the timeout", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response(new ReadableStream<Uint8Array>()));
    const client = new TodoistClient({ apiToken: TEST_TOKEN, fetchFn, timeoutMs: 20 });

    await expect(client.createTask({ content: "a", description: "" })).resolves.toEqual({
      id: "",
      content: "a",
    });
  });
});

// ---------------------------------------------------------------------------
// buildOutreachTasks
// ---------------------------------------------------------------------------

describe("buildOutreachTasks", () => {
  it("builds one task per contact line", () => {
    expect(buildOutreachTasks(RADIUS_REMINDER, "America/Chicago")).toEqual([
      {
        content: "Reach out to Jane Doe re: New Orleans trip",
        description: [
          "Trip to New Orleans",
          "Dates (America/Chicago): 2026-03-10 → 2026-03-13",
          "Match: within 0.0 km",
          "Contact list: New Orleans, LA",
          "Notes: jazz fest",
        ].join("\n"),
      },
      {
        content: "Reach out to Sam re: New Orleans trip",
        description: [
          "Trip to New Orleans",
          "Dates (America/Chicago): 2026-03-10 → 2026-03-13",
          "Match: within 0.0 km",
          "Contact list: New Orleans, LA",
        ].join("\n"),
      },
    ]);
  });

  it("describes exact matches and unknown dates", () => {
    const reminder: ActionableReminder = {
      ...RADIUS_REMINDER,
      trip: { ...RADIUS_REMINDER.trip, end_date: null },
      match_kind: "EXACT",
      distance_km: null,
    };

    const [task] = buildOutreachTasks(reminder, "UTC");
    expect(task?.description.split("\n").slice(1, 3)).toEqual([
      "Dates (UTC): 2026-03-10 → unknown",
      "Match: exact city name",
    ]);
  });

  it("omits the dates line when neither date is known", () => {
    const reminder: ActionableReminder = {
      ...RADIUS_REMINDER,
      trip: { ...RADIUS_REMINDER.trip, start_date: null, end_date: null },
      distance_km: 42.26,
    };

    const [task] = buildOutreachTasks(reminder, "UTC");
    expect(task?.description.split("\n").slice(0, 2)).toEqual([
      "Trip to New Orleans",
      "Match: within 42.3 km",
    ]);
  });

  it("creates a single city-level task when the city lists nobody", () => {
    const reminder: ActionableReminder = {
      ...RADIUS_REMINDER,
      city: { ...RADIUS_REMINDER.city, contacts: [] },
    };

    const tasks = buildOutreachTasks(reminder, "UTC", "proj-9");
    expect(tasks).toHaveLength(1);
    expect(tasks[0]?.content).toBe(
      "Reach out to contacts in New Orleans, LA re: New Orleans trip",
    );
    expect(tasks[0]?.project_id).toBe("proj-9");
  });
});

// ---------------------------------------------------------------------------
// createOutreachTasks
// ---------------------------------------------------------------------------

describe("createOutreachTasks", () => {
  it("creates the tasks in order", async () => {
    const createTask = vi.fn(async (input: TodoistTaskInput) => ({ id: "1", content: input.content }));

    const created = await createOutreachTasks({ createTask }, RADIUS_REMINDER, "UTC");

    expect(created.map((t) => t.content)).toEqual([
      "Reach out to Jane Doe re: New Orleans trip",
      "Reach out to Sam re: New Orleans trip",
    ]);
  });

  it("stops at the first failure and rethrows it", async () => {
    const createTask = vi.fn(async (): Promise<{ id: string; content: string }> => {
      throw new TodoistRateLimitError();
    });

    await expect(
      createOutreachTasks({ createTask }, RADIUS_REMINDER, "UTC"),
    ).rejects.toBeInstanceOf(TodoistRateLimitError);
    expect(createTask).toHaveBeenCalledTimes(1);
  });
});
