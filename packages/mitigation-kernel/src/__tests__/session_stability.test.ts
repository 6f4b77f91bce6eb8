import test from "node:test";
import assert from "node:assert/strict";

import { InvalidParameterError, evaluateSessionStability, profileDrift } from "../index";
import { ghzProfile, profile } from "./fixtures";

test("drift is the largest change in any error rate", () => {
  const a = ghzProfile(0.01);
  const b = { ...a, perGateErrorRate: { ...a.perGateErrorRate, "cx:1,2": 0.025 } };
  assert.ok(Math.abs(profileDrift(a, b) - 0.015) < 1e-12);
});

test("a rate reported in only one snapshot counts against zero", () => {
  const a = profile({ readoutErrorRate: { "0": 0.01 } });
  const b = profile({ readoutErrorRate: { "0": 0.01, "3": 0.04 } });
  assert.equal(profileDrift(a, b), 0.04);
});

test("drift within the threshold reuses the decision", () => {
  const r = evaluateSessionStability(ghzProfile(0.01), ghzProfile(0.02), 0.02);
  assert.equal(r.reuse, true);
  assert.equal(r.rationale.ruleId, "R6-session-stability");
  assert.equal(r.rationale.outcome, "triggered");
  assert.equal(r.rationale.threshold, 0.02);
});

test("drift beyond the threshold forces re-selection", () => {
  const r = evaluateSessionStability(ghzProfile(0.01), ghzProfile(0.08), 0.02);
  assert.equal(r.reuse, false);
  assert.equal(r.rationale.outcome, "not_triggered");
  assert.ok(Math.abs(r.drift - 0.07) < 1e-12);
});

test("invalid comparisons are rejected", () => {
  assert.throws(() => evaluateSessionStability(ghzProfile(0.01), ghzProfile(0.01), -1), InvalidParameterError);
  assert.throws(
    () => evaluateSessionStability(ghzProfile(0.01), { ...ghzProfile(0.01), backendName: "other_backend" }, 0.02),
    InvalidParameterError
  );
});
