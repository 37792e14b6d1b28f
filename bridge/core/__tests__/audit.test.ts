import test from "node:test";
import assert from "node:assert/strict";
import { logStage, preview } from "../audit/logger.ts";
import { __resetAuditForTest, listAuditByTrace, writeAudit } from "../audit/persistence.ts";

test("audit keeps records per trace in write order", () => {
  __resetAuditForTest();
  logStage("trace-a", "event", { sender: "42" });
  logStage("trace-b", "event", { sender: "43" });
  logStage("trace-a", "outbound", { length: 5 });

  const records = listAuditByTrace("trace-a");
  assert.deepEqual(records.map((r) => r.stage), ["event", "outbound"]);
  assert.deepEqual(records[1]?.payload, { length: 5 });
});

test("audit drops the oldest records past the cap", () => {
  __resetAuditForTest();
  for (let i = 0; i < 2005; i += 1) {
    writeAudit({ trace_id: `trace-${i}`, stage: "event", payload: {}, created_at: new Date(0).toISOString() });
  }

  assert.deepEqual(listAuditByTrace("trace-4"), []);
  assert.equal(listAuditByTrace("trace-5").length, 1);
  assert.equal(listAuditByTrace("trace-2004").length, 1);
});

test("preview shortens long chat text", () => {
  assert.equal(preview("short"), "short");
  assert.equal(preview("x".repeat(60)), `${"x".repeat(50)}...`);
});
