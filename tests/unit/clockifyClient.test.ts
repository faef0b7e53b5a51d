import test from "node:test";
import assert from "node:assert/strict";
import { Effect } from "effect";
import { makeClockifyClient } from "../../src/clockify/client.ts";
import type { ClockifyConfigType } from "../../src/config/index.ts";
import { createFakeFetch, hangUntilAborted, jsonResponse } from "../support/fakeFetch.ts";

const config: ClockifyConfigType = {
  apiKey: "test-api-key",
  workspaceId: "ws-1",
  projectId: "proj-1",
  baseUrl: "http://clockify.test/api/v1",
  timeoutMs: 2000,
  userAgent: "auto-timetracker",
};

test("listTags sends the key header and decodes tags", async () => {
  const fake = createFakeFetch([
    () =>
      jsonResponse([
        { id: "tag-work", name: "@Work", archived: false },
        { id: "tag-pc", name: "@PC", archived: false },
      ]),
  ]);
  const client = makeClockifyClient(config, { fetchImpl: fake.fetchImpl });

  const tags = await Effect.runPromise(client.listTags());

  assert.deepEqual(tags, [
    { id: "tag-work", name: "@Work" },
    { id: "tag-pc", name: "@PC" },
  ]);
  assert.equal(fake.calls.length, 1);
  const [call] = fake.calls;
  assert.equal(call.method, "GET");
  assert.equal(call.url, "http://clockify.test/api/v1/workspaces/ws-1/tags");
  assert.equal(call.headers.get("x-api-key"), "test-api-key");
  assert.equal(call.headers.get("content-type"), "application/json");
  assert.equal(call.headers.get("user-agent"), "auto-timetracker");
  assert.equal(call.body, undefined);
});

test("startTimeEntry posts a billable entry and returns its ids", async () => {
  const fake = createFakeFetch([
    () =>
      jsonResponse({
        id: "entry-1",
        userId: "user-1",
        description: "Normal Work",
        timeInterval: { start: "2024-03-04T08:30:00Z", end: null },
      }, 201),
  ]);
  const client = makeClockifyClient(config, { fetchImpl: fake.fetchImpl });

  const entry = await Effect.runPromise(
    client.startTimeEntry({
      start: new Date(Date.UTC(2024, 2, 4, 8, 30, 0)),
      description: "Normal Work",
      tagIds: ["tag-work"],
    })
  );

  assert.deepEqual(entry, { id: "entry-1", userId: "user-1" });
  const [call] = fake.calls;
  assert.equal(call.method, "POST");
  assert.equal(call.url, "http://clockify.test/api/v1/workspaces/ws-1/time-entries");
  assert.deepEqual(call.body, {
    start: "2024-03-04T08:30:00.000Z",
    billable: true,
    description: "Normal Work",
    projectId: "proj-1",
    tagIds: ["tag-work"],
  });
});

test("stopRunningEntry patches the user's running entry", async () => {
  const fake = createFakeFetch([() => jsonResponse({ id: "entry-1", userId: "user-1" })]);
  const client = makeClockifyClient(config, { fetchImpl: fake.fetchImpl });

  await Effect.runPromise(
    client.stopRunningEntry("user-1", new Date(Date.UTC(2024, 2, 4, 17, 0, 0)))
  );

  const [call] = fake.calls;
  assert.equal(call.method, "PATCH");
  assert.equal(call.url, "http://clockify.test/api/v1/workspaces/ws-1/user/user-1/time-entries");
  assert.deepEqual(call.body, { end: "2024-03-04T17:00:00.000Z" });
});

test("stopRunningEntry accepts an empty body", async () => {
  const fake = createFakeFetch([() => new Response(null, { status: 204 })]);
  const client = makeClockifyClient(config, { fetchImpl: fake.fetchImpl });
  await Effect.runPromise(client.stopRunningEntry("user-1", new Date(0)));
  assert.equal(fake.calls.length, 1);
});

test("non-2xx responses fail with the status", async () => {
  const fake = createFakeFetch([() => jsonResponse({ message: "nope" }, 401)]);
  const client = makeClockifyClient(config, { fetchImpl: fake.fetchImpl });

  const error = await Effect.runPromise(Effect.flip(client.listTags()));

  assert.equal(error._tag, "ClockifyError");
  assert.equal(error.operation, "listTags");
  assert.equal(error.status, 401);
  assert.equal(error.message, 'GET /workspaces/ws-1/tags returned 401: {"message":"nope"}');
});

test("invalid JSON fails the call", async () => {
  const fake = createFakeFetch([() => new Response("<html>", { status: 200 })]);
  const client = makeClockifyClient(config, { fetchImpl: fake.fetchImpl });

  const error = await Effect.runPromise(
    Effect.flip(client.startTimeEntry({ start: new Date(0), description: "x", tagIds: [] }))
  );

  assert.equal(error.operation, "startTimeEntry");
  assert.equal(error.message, "POST /workspaces/ws-1/time-entries returned invalid JSON");
});

test("responses missing ids fail schema decoding", async () => {
  const fake = createFakeFetch([() => jsonResponse({ id: "entry-1" })]);
  const client = makeClockifyClient(config, { fetchImpl: fake.fetchImpl });

  const error = await Effect.runPromise(
    Effect.flip(client.startTimeEntry({ start: new Date(0), description: "x", tagIds: [] }))
  );

  assert.equal(error.operation, "startTimeEntry");
  assert.match(error.message, /^unexpected response: /);
  assert.match(error.message, /userId/);
});

test("transport errors are wrapped", async () => {
  const fake = createFakeFetch([
    () => {
      throw new Error("connect ECONNREFUSED");
    },
  ]);
  const client = makeClockifyClient(config, { fetchImpl: fake.fetchImpl });

  const error = await Effect.runPromise(Effect.flip(client.listTags()));

  assert.equal(error.message, "GET /workspaces/ws-1/tags failed: connect ECONNREFUSED");
  assert.equal(error.status, undefined);
});

test("slow responses time out", async () => {
  const fake = createFakeFetch([hangUntilAborted]);
  const client = makeClockifyClient({ ...config, timeoutMs: 20 }, { fetchImpl: fake.fetchImpl });

  const error = await Effect.runPromise(Effect.flip(client.listTags()));

  assert.equal(error.message, "GET /workspaces/ws-1/tags timed out after 20ms");
});

test("the timeout also covers a body that never finishes", async () => {
  let requestSignal: AbortSignal | undefined;
  const fake = createFakeFetch([
    (_call, signal) => {
      requestSignal = signal;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"id":"entry-1",'));
        },
      });
      return new Response(body, { status: 201 });
    },
  ]);
  const client = makeClockifyClient({ ...config, timeoutMs: 50 }, { fetchImpl: fake.fetchImpl });

  const error = await Effect.runPromise(
    Effect.flip(client.startTimeEntry({ start: new Date(0), description: "x", tagIds: [] }))
  );

  assert.equal(error.message, "POST /workspaces/ws-1/time-entries timed out after 50ms");
  assert.equal(requestSignal?.aborted, true);
});
