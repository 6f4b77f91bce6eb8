// Shared test fixtures: hand-built circuits and noise snapshots.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import {
  parseMitigationConfigV1,
  type CircuitInstructionV1,
  type MitigationConfigV1,
  type NoiseProfileV1,
  type TranspiledCircuitV1,
} from "@qem/contracts";

const here = path.dirname(fileURLToPath(import.meta.url));

export function loadDefaultConfig(): MitigationConfigV1 {
  const p = path.resolve(here, "..", "..", "..", "..", "config", "mitigation", "default.json");
  return parseMitigationConfigV1(JSON.parse(fs.readFileSync(p, "utf8")));
}

export function withThresholds(cfg: MitigationConfigV1, t: Partial<MitigationConfigV1["thresholds"]>): MitigationConfigV1 {
  return { ...cfg, thresholds: { ...cfg.thresholds, ...t } };
}

export function profile(overrides: Partial<NoiseProfileV1> = {}): NoiseProfileV1 {
  return {
    type: "noise_profile_v1",
    schema_version: "1.0.0",
    backendName: "fake_backend",
    perQubitErrorRate: {},
    perGateErrorRate: {},
    readoutErrorRate: {},
    t1: {},
    t2: {},
    dt: 2.2e-10,
    timestamp: 0,
    capturedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

/**
 * Three-qubit GHZ preparation followed by its inverse, unscheduled.
 * ALAP places it on [0, 5320] dt; q0 idles 2000 dt, q1 320 dt, q2 2320 dt.
 */
export function ghzEcho(): TranspiledCircuitV1 {
  const cx = (a: number, b: number): CircuitInstructionV1 => ({ name: "cx", qubits: [a, b], duration: 1000 });
  return {
    name: "ghz_echo",
    num_qubits: 3,
    layout: { initial: [0, 1, 2] },
    instructions: [
      { name: "h", qubits: [0], duration: 160 },
      cx(0, 1),
      cx(1, 2),
      cx(1, 2),
      cx(0, 1),
      { name: "h", qubits: [0], duration: 160 },
      { name: "measure", qubits: [0], duration: 1000 },
      { name: "measure", qubits: [1], duration: 1000 },
      { name: "measure", qubits: [2], duration: 1000 },
    ],
  };
}

export function ghzProfile(readout: number): NoiseProfileV1 {
  return profile({
    perQubitErrorRate: { "0": 0.0005, "1": 0.0005, "2": 0.0005 },
    perGateErrorRate: { "cx:0,1": 0.01, "cx:1,2": 0.01 },
    readoutErrorRate: { "0": readout, "1": readout, "2": readout },
  });
}

/** Two qubits, three back-to-back cx, pre-scheduled with no idle time. */
export function denseCxChain(): TranspiledCircuitV1 {
  return {
    num_qubits: 2,
    layout: { initial: [0, 1] },
    duration: 1000,
    instructions: [
      { name: "cx", qubits: [0, 1], duration: 300, start: 0 },
      { name: "cx", qubits: [0, 1], duration: 300, start: 300 },
      { name: "cx", qubits: [0, 1], duration: 300, start: 600 },
      { name: "measure", qubits: [0], duration: 100, start: 900 },
      { name: "measure", qubits: [1], duration: 100, start: 900 },
    ],
  };
}

export function denseProfile(): NoiseProfileV1 {
  return profile({
    perQubitErrorRate: { "0": 0.001, "1": 0.001 },
    perGateErrorRate: { "cx:0,1": 0.14 },
    readoutErrorRate: { "0": 0.03, "1": 0.03 },
  });
}

/**
 * EfficientSU2-style ansatz on four qubits with linear entanglement.
 * Parameterisations share one structure, so they share one schedule.
 */
export function efficientSu2(name: string): TranspiledCircuitV1 {
  const rot = (q: number): CircuitInstructionV1 => ({ name: "sx", qubits: [q], duration: 160 });
  const cx = (a: number, b: number): CircuitInstructionV1 => ({ name: "cx", qubits: [a, b], duration: 1000 });
  const meas = (q: number): CircuitInstructionV1 => ({ name: "measure", qubits: [q], duration: 1000 });
  return {
    name,
    num_qubits: 4,
    layout: { initial: [0, 1, 2, 3] },
    instructions: [rot(0), rot(1), rot(2), rot(3), cx(0, 1), cx(1, 2), cx(2, 3), rot(0), rot(1), rot(2), rot(3), meas(0), meas(1), meas(2), meas(3)],
  };
}
