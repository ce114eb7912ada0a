import test, { afterEach, beforeEach } from "node:test";
import assert from "node:assert/strict";
import type { Server } from "node:http";
import fs from "fs";
import os from "os";
import path from "path";

import { ActionStore } from "../actions/actions.store.js";
import { createApp, listen } from "../app.js";
import { parseActionId } from "./actions.routes.js";

const clock = () => new Date(2025, 5, 15, 12, 0, 0);

let dir: string;
let filePath: string;
let server: Server;
let base: string;

beforeEach(async () => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "actions-api-"));
  filePath = path.join(dir, "actions.json");
  const store = new ActionStore({ filePath, clock });
  await store.open();

  server = await listen(createApp(store), 0, "127.0.0.1");
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no port");
  base = `http://127.0.0.1:${addr.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  fs.rmSync(dir, { recursive: true, force: true });
});

function send(method: string, url: string, body?: unknown) {
  return fetch(`${base}${url}`, {
    method,
    headers: body === undefined ? {} : { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

const recycling = { action: "Recycling", date: "2025-01-08", points: 25 };

test("routes: POST creates an action", async () => {
  const res = await send("POST", "/api/actions", recycling);
  assert.equal(res.status, 201);
  assert.deepEqual(await res.json(), { id: 1, ...recycling });
});

test("routes: POST with invalid fields returns 400 with field details", async () => {
  const res = await send("POST", "/api/actions", { action: "", date: "2099-01-01", points: 0 });
  assert.equal(res.status, 400);
  assert.deepEqual(await res.json(), {
    error: "Invalid request data",
    details: {
      action: ["Action cannot be empty."],
      date: ["Date cannot be in the future."],
      points: ["Points must be a positive integer."],
    },
  });
});

test("routes: POST with malformed JSON returns 400", async () => {
  const res = await fetch(`${base}/api/actions`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: "{bad",
  });
  assert.equal(res.status, 400);
  assert.deepEqual(await res.json(), { error: "Malformed JSON body" });
});

test("routes: a body over the size limit returns 413", async (t) => {
  const errorLog = t.mock.method(console, "error", () => undefined);

  const res = await send("POST", "/api/actions", { ...recycling, action: "a".repeat(200_000) });
  assert.equal(res.status, 413);
  assert.deepEqual(await res.json(), { error: "request entity too large" });
  assert.equal(errorLog.mock.callCount(), 0);
});

test("routes: a non-UTF charset returns 415", async (t) => {
  const errorLog = t.mock.method(console, "error", () => undefined);

  const res = await fetch(`${base}/api/actions`, {
    method: "POST",
    headers: { "content-type": "application/json; charset=latin9" },
    body: JSON.stringify(recycling),
  });
  assert.equal(res.status, 415);
  assert.deepEqual(await res.json(), { error: 'unsupported charset "LATIN9"' });
  assert.equal(errorLog.mock.callCount(), 0);
});

test("routes: GET lists actions in insertion order", async () => {
  await send("POST", "/api/actions", recycling);
  await send("POST", "/api/actions", { action: "Cycling", date: "2025-01-09", points: 10 });

  const res = await send("GET", "/api/actions/");
  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), [
    { id: 1, ...recycling },
    { id: 2, action: "Cycling", date: "2025-01-09", points: 10 },
  ]);
});

test("routes: GET by id, with or without trailing slash", async () => {
  await send("POST", "/api/actions", recycling);

  for (const url of ["/api/actions/1", "/api/actions/1/"]) {
    const res = await send("GET", url);
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { id: 1, ...recycling });
  }
});

test("routes: unknown or non-numeric ids return 404", async () => {
  for (const url of ["/api/actions/999", "/api/actions/abc", "/api/actions/-1"]) {
    const res = await send("GET", url);
    assert.equal(res.status, 404, url);
    assert.deepEqual(await res.json(), { error: "Action not found" });
  }
});

test("routes: PUT replaces the action", async () => {
  await send("POST", "/api/actions", recycling);

  const res = await send("PUT", "/api/actions/1", { action: "Composting", date: "2025-02-01", points: 15 });
  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), { id: 1, action: "Composting", date: "2025-02-01", points: 15 });
});

test("routes: PUT with missing fields returns 400", async () => {
  await send("POST", "/api/actions", recycling);

  const res = await send("PUT", "/api/actions/1", { points: 15 });
  assert.equal(res.status, 400);
  assert.deepEqual(await res.json(), {
    error: "Invalid request data",
    details: { action: ["This field is required."], date: ["This field is required."] },
  });
});

test("routes: PUT on a missing action returns 404", async () => {
  const res = await send("PUT", "/api/actions/3", recycling);
  assert.equal(res.status, 404);
});

test("routes: PATCH merges supplied fields", async () => {
  await send("POST", "/api/actions", recycling);

  const res = await send("PATCH", "/api/actions/1", { points: 30 });
  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), { id: 1, action: "Recycling", date: "2025-01-08", points: 30 });
});

test("routes: DELETE removes the action", async () => {
  await send("POST", "/api/actions", recycling);

  const res = await send("DELETE", "/api/actions/1");
  assert.equal(res.status, 204);
  assert.equal(await res.text(), "");

  const after = await send("GET", "/api/actions/1");
  assert.equal(after.status, 404);
});

test("routes: DELETE on a missing action returns 404", async () => {
  const res = await send("DELETE", "/api/actions/8");
  assert.equal(res.status, 404);
  assert.deepEqual(await res.json(), { error: "Action not found" });
});

test("routes: storage failures return 500 without details", async (t) => {
  const errorLog = t.mock.method(console, "error", () => undefined);
  fs.writeFileSync(filePath, "{not json");

  const res = await send("GET", "/api/actions");
  assert.equal(res.status, 500);
  assert.deepEqual(await res.json(), { error: "Internal server error" });
  assert.equal(errorLog.mock.callCount(), 1);
  assert.equal(errorLog.mock.calls[0]?.arguments[0], "actions list error:");
});

test("routes: unknown paths return 404", async () => {
  const res = await send("GET", "/api/other");
  assert.equal(res.status, 404);
  assert.deepEqual(await res.json(), { error: "Not found" });
});

test("routes: parseActionId", () => {
  assert.equal(parseActionId("12"), 12);
  assert.equal(parseActionId("007"), 7);
  assert.equal(parseActionId("1.5"), null);
  assert.equal(parseActionId(""), null);
  assert.equal(parseActionId(undefined), null);
  assert.equal(parseActionId("99999999999999999999"), null);
});
