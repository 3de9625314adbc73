import assert from "node:assert/strict";
import test from "node:test";
import { asCorrelationId } from "@civic-assist/shared";
import { toStructuredLogEvent } from "./logging.js";

test("toStructuredLogEvent keeps context keys and merges details", () => {
  const context = { correlationId: asCorrelationId("corr-9"), stage: "complete" as const, provider: "stub", question: "secret" };

  assert.deepEqual(toStructuredLogEvent(context, "completion_failed", { errorReason: "timeout", elapsedMs: 12 }), {
    correlationId: "corr-9",
    stage: "complete",
    provider: "stub",
    event: "completion_failed",
    errorReason: "timeout",
    elapsedMs: 12
  });
});

test("toStructuredLogEvent leaves absent context keys undefined", () => {
  assert.deepEqual(toStructuredLogEvent({ provider: "openai" }, "catalog_loaded", { serviceCount: 6 }), {
    correlationId: undefined,
    stage: undefined,
    provider: "openai",
    event: "catalog_loaded",
    serviceCount: 6
  });
});
