import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import {
  gateKey,
  isStructuralOp,
  parseExecutionRequestV1,
  parseMitigationConfigV1,
  RawCalibrationV1Z,
  StrategyDecisionV1Z,
  TranspiledCircuitV1Z,
} from "../index";

const here = path.dirname(fileURLToPath(import.meta.url));

test("gate keys join the gate name and its qubits", () => {
  assert.equal(gateKey("ecr", [3, 4]), "ecr:3,4");
  assert.equal(gateKey("sx", [0]), "sx:0");
});

test("barrier and delay are structural, gates are not", () => {
  assert.equal(isStructuralOp("barrier"), true);
  assert.equal(isStructuralOp("delay"), true);
  assert.equal(isStructuralOp("cx"), false);
  assert.equal(isStructuralOp("measure"), false);
});

test("transpiled circuit rejects a qubit outside num_qubits", () => {
  const r = TranspiledCircuitV1Z.safeParse({
    num_qubits: 2,
    instructions: [{ name: "cx", qubits: [0, 2], duration: 100 }],
    layout: { initial: [0, 1] },
  });
  assert.equal(r.success, false);
});

test("transpiled circuit rejects unknown keys", () => {
  const r = TranspiledCircuitV1Z.safeParse({
    num_qubits: 1,
    instructions: [],
    layout: null,
    extra: true,
  });
  assert.equal(r.success, false);
});

test("execution request keeps observables opaque", () => {
  const req = parseExecutionRequestV1({
    pub: {
      circuit: { num_qubits: 1, instructions: [{ name: "x", qubits: [0], duration: 160 }], layout: { initial: [0] } },
      observables: ["Z"],
    },
    backend: { name: "fake_backend" },
    mode: "single",
  });
  assert.deepEqual(req.pub.observables, ["Z"]);
  assert.equal(req.mode, "single");
});

test("execution request rejects an unknown mode", () => {
  assert.throws(() =>
    parseExecutionRequestV1({
      pub: { circuit: { num_qubits: 1, instructions: [] }, observables: null },
      backend: { name: "fake_backend" },
      mode: "stream",
    })
  );
});

test("raw calibration defaults simulator=false and gates=[]", () => {
  const raw = RawCalibrationV1Z.parse({ backend_name: "fake_backend", qubits: [{ qubit: 0, readout_error: 0.01 }] });
  assert.equal(raw.simulator, false);
  assert.deepEqual(raw.gates, []);
});

test("decision parameters must match the selected techniques", () => {
  const base = {
    type: "strategy_decision_v1",
    schema_version: "1.0.0",
    mode: "single",
    selectedTechniques: ["TREX"],
    rationale: [],
    overallScore: 0.4,
    decisionHash: "sha256:abc",
  };
  const trex = { numRandomizations: 32, shotsPerRandomization: 128, maxReadoutError: 0.08, triggeringQubits: [1] };

  assert.equal(StrategyDecisionV1Z.safeParse({ ...base, parameters: { TREX: trex } }).success, true);
  assert.equal(StrategyDecisionV1Z.safeParse({ ...base, parameters: {} }).success, false);
  assert.equal(
    StrategyDecisionV1Z.safeParse({
      ...base,
      parameters: {
        TREX: trex,
        DD: { sequenceType: "XX", schedulingMethod: "alap", pulseDurationDt: 160, targets: [] },
      },
    }).success,
    false
  );
});

test("the shipped SSOT config parses", () => {
  const p = path.resolve(here, "..", "..", "..", "..", "config", "mitigation", "default.json");
  const cfg = parseMitigationConfigV1(JSON.parse(fs.readFileSync(p, "utf8")));
  assert.equal(cfg.thresholds.min_actionable, 0.1);
  assert.equal(cfg.execution.default_shots, 4096);
  assert.deepEqual(cfg.zne.noise_factor_steps, [0, 2, 4]);
});
