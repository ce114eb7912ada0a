import test from "node:test";
import assert from "node:assert/strict";

import { ConfigError, loadConfig } from "./config.js";

test("config: defaults", () => {
  assert.deepEqual(loadConfig({}), {
    port: 8000,
    host: "0.0.0.0",
    actionsDataPath: "data/actions_data.json",
  });
});

test("config: reads values from env", () => {
  assert.deepEqual(
    loadConfig({ PORT: "3001", HOST: "127.0.0.1", ACTIONS_DATA_PATH: "/var/lib/actions.json" }),
    { port: 3001, host: "127.0.0.1", actionsDataPath: "/var/lib/actions.json" }
  );
});

test("config: blank values fall back to defaults", () => {
  assert.equal(loadConfig({ PORT: "", ACTIONS_DATA_PATH: "  " }).port, 8000);
  assert.equal(loadConfig({ ACTIONS_DATA_PATH: "  " }).actionsDataPath, "data/actions_data.json");
});

test("config: rejects a bad PORT", () => {
  for (const PORT of ["abc", "70000", "80.5", "-1"]) {
    assert.throws(
      () => loadConfig({ PORT }),
      (err: unknown) => err instanceof ConfigError && err.variable === "PORT",
      PORT
    );
  }
});
