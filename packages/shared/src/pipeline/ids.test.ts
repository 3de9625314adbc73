import assert from "node:assert/strict";
import test from "node:test";
import { asCorrelationId, isCorrelationId, newCorrelationId, parseCorrelationId } from "./ids.js";

test("newCorrelationId returns distinct uuids", () => {
  const first = newCorrelationId();
  const second = newCorrelationId();

  assert.match(first, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  assert.notEqual(first, second);
});

test("asCorrelationId trims and rejects unusable ids", () => {
  assert.equal(asCorrelationId("  corr-1 "), "corr-1");
  assert.throws(() => asCorrelationId("   "), TypeError);
  assert.throws(() => asCorrelationId("has space"), TypeError);
  assert.throws(() => asCorrelationId("x".repeat(129)), TypeError);
  assert.equal(isCorrelationId("x".repeat(128)), true);
});

test("parseCorrelationId reads the first header value or returns null", () => {
  assert.equal(parseCorrelationId("req:42"), "req:42");
  assert.equal(parseCorrelationId(["corr-a", "corr-b"]), "corr-a");
  assert.equal(parseCorrelationId(undefined), null);
  assert.equal(parseCorrelationId(""), null);
  assert.equal(parseCorrelationId("<script>"), null);
});
