import test from "node:test";
import assert from "node:assert/strict";
import { pollUntil } from "../poll.ts";

function clock() {
  let current = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
  };
}

test("pollUntil returns as soon as the probe yields a value", async () => {
  const c = clock();
  let calls = 0;

  const result = await pollUntil(async () => {
    calls += 1;
    return calls === 3 ? "ready" : null;
  }, { timeoutMs: 5000, intervalMs: 250, now: c.now, sleep: c.sleep });

  assert.equal(result, "ready");
  assert.equal(calls, 3);
  assert.deepEqual(c.sleeps, [250, 250]);
});

test("pollUntil returns null at the deadline without oversleeping", async () => {
  const c = clock();

  const result = await pollUntil(async () => null, { timeoutMs: 1000, intervalMs: 300, now: c.now, sleep: c.sleep });

  assert.equal(result, null);
  assert.deepEqual(c.sleeps, [300, 300, 300, 100]);
});

test("pollUntil probes once even with a zero timeout", async () => {
  const c = clock();
  let calls = 0;

  const result = await pollUntil(async () => {
    calls += 1;
    return null;
  }, { timeoutMs: 0, intervalMs: 100, now: c.now, sleep: c.sleep });

  assert.equal(result, null);
  assert.equal(calls, 1);
  assert.deepEqual(c.sleeps, []);
});
