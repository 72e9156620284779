import assert from "node:assert/strict";
import test from "node:test";
import { HealthRegistry } from "./health.js";

test("health tracks ticks and failures per instrument", () => {
  let clock = 100;
  const health = new HealthRegistry(() => clock);
  health.register("BTCUSDT");

  clock = 200;
  health.noteTick("BTCUSDT");
  clock = 300;
  health.noteFailure("ETHUSDT", "timeout");

  const summary = health.summary();
  assert.equal(summary.running, 1);
  assert.equal(summary.errored, 1);
  assert.deepEqual(health.get("BTCUSDT"), {
    symbol: "BTCUSDT",
    status: "RUNNING",
    startedAt: 100,
    lastTickAt: 200,
    ticks: 1,
    failedTicks: 0,
    lastErrorReason: null
  });
  assert.equal(health.get("ETHUSDT")?.lastErrorReason, "timeout");
});

test("a successful tick clears the last error", () => {
  const health = new HealthRegistry(() => 0);
  health.noteFailure("BTCUSDT", "timeout");
  health.noteTick("BTCUSDT");

  assert.equal(health.get("BTCUSDT")?.status, "RUNNING");
  assert.equal(health.get("BTCUSDT")?.lastErrorReason, null);
  assert.equal(health.get("SOLUSDT"), null);
});
