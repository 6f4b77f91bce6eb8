// Circuit Feature Extractor (pure).
//
// Input: a transpiled, physically laid-out circuit.
// Output: a frozen CircuitFeaturesV1 keyed by physical qubit.
//
// Scheduling:
// - If every computational instruction carries `start`, the compiler's schedule is used as-is.
// - Otherwise instructions are placed as-late-as-possible from their durations.
// Barriers synchronise their qubits; delays are idle time and never count as busy.

import {
  gateKey,
  isStructuralOp,
  qubitKey,
  type CircuitFeaturesV1,
  type CircuitInstructionV1,
  type IdleWindowV1,
  type TranspiledCircuitV1,
  type TwoQubitGateV1,
} from "@qem/contracts";

import { UnsupportedCircuitError } from "../errors";
import { contentHash, deepFreeze, sortedNumeric } from "../util";

export const CIRCUIT_FEATURES_SCHEMA_VERSION = "1.0.0";

const NON_GATE_OPS = new Set(["measure", "reset"]);

type BusyInterval = { start: number; end: number };

type ScheduledOp = {
  inst: CircuitInstructionV1;
  start: number;
  end: number;
};

function buildLayoutMap(circuit: TranspiledCircuitV1): Record<string, number> {
  const layout = circuit.layout;
  if (!layout) {
    throw new UnsupportedCircuitError("circuit has no layout metadata; transpile it for a physical backend first");
  }

  const out: Record<string, number> = {};
  const seen = new Set<number>();
  layout.initial.forEach((physical, logical) => {
    if (physical === null) return;
    if (physical >= circuit.num_qubits) {
      throw new UnsupportedCircuitError(`layout maps logical ${logical} to physical ${physical} outside num_qubits=${circuit.num_qubits}`);
    }
    if (seen.has(physical)) {
      throw new UnsupportedCircuitError(`layout is not injective: physical qubit ${physical} assigned twice`);
    }
    seen.add(physical);
    out[qubitKey(logical)] = physical;
  });

  if (seen.size === 0) {
    throw new UnsupportedCircuitError("circuit layout maps no logical qubit");
  }
  return out;
}

function durationOf(inst: CircuitInstructionV1, index: number): number {
  if (inst.duration === undefined) {
    throw new UnsupportedCircuitError(`instruction ${index} (${inst.name}) has no duration; cannot schedule`);
  }
  return inst.duration;
}

function readMax(ready: Map<number, number>, qubits: ReadonlyArray<number>): number {
  let m = 0;
  for (const q of qubits) m = Math.max(m, ready.get(q) ?? 0);
  return m;
}

/** Uses the compiler-provided start times. */
function useGivenSchedule(ops: ReadonlyArray<CircuitInstructionV1>): ScheduledOp[] {
  return ops.map((inst, i) => {
    const start = inst.start ?? 0;
    return { inst, start, end: start + durationOf(inst, i) };
  });
}

/**
 * ALAP placement: walk the instruction list backwards, stacking each operation
 * as close to the end of the circuit as its successors allow, then flip the
 * reversed times around the total duration.
 */
function scheduleAlap(
  instructions: ReadonlyArray<CircuitInstructionV1>,
  declaredDuration: number
): { ops: ScheduledOp[]; total: number } {
  const revReady = new Map<number, number>();
  const placed: { inst: CircuitInstructionV1; revStart: number; revEnd: number }[] = [];

  for (let i = instructions.length - 1; i >= 0; i--) {
    const inst = instructions[i];
    if (inst.qubits.length === 0) continue;
    const at = readMax(revReady, inst.qubits);

    if (inst.name === "barrier") {
      for (const q of inst.qubits) revReady.set(q, at);
      continue;
    }

    const dur = inst.name === "delay" ? inst.duration ?? 0 : durationOf(inst, i);
    for (const q of inst.qubits) revReady.set(q, at + dur);
    if (inst.name !== "delay") placed.push({ inst, revStart: at, revEnd: at + dur });
  }

  let total = declaredDuration;
  for (const v of revReady.values()) total = Math.max(total, v);

  const ops = placed
    .map((p) => ({ inst: p.inst, start: total - p.revEnd, end: total - p.revStart }))
    .reverse();
  return { ops, total };
}

function idleWindows(busy: BusyInterval[], total: number): IdleWindowV1[] {
  const sorted = [...busy].sort((a, b) => a.start - b.start || a.end - b.end);
  const out: IdleWindowV1[] = [];
  let cursor = 0;
  for (const b of sorted) {
    if (b.start > cursor) out.push({ start: cursor, end: b.start });
    cursor = Math.max(cursor, b.end);
  }
  if (total > cursor) out.push({ start: cursor, end: total });
  return out;
}

/** Layer index per operation, ignoring barriers and delays. */
function assignLayers(ops: ReadonlyArray<CircuitInstructionV1>): number[] {
  const qubitLayer = new Map<number, number>();
  return ops.map((inst) => {
    const layer = readMax(qubitLayer, inst.qubits) + 1;
    for (const q of inst.qubits) qubitLayer.set(q, layer);
    return layer;
  });
}

export function extractCircuitFeatures(circuit: TranspiledCircuitV1): CircuitFeaturesV1 {
  const layoutMap = buildLayoutMap(circuit);

  const computational = circuit.instructions.filter((inst) => inst.qubits.length > 0 && !isStructuralOp(inst.name));
  const declaredDuration = circuit.duration ?? 0;

  let scheduled: ScheduledOp[];
  let totalDuration: number;
  if (computational.every((inst) => inst.start !== undefined)) {
    scheduled = useGivenSchedule(computational);
    totalDuration = scheduled.reduce((m, op) => Math.max(m, op.end), declaredDuration);
  } else {
    const alap = scheduleAlap(circuit.instructions, declaredDuration);
    scheduled = alap.ops;
    totalDuration = alap.total;
  }

  const busy = new Map<number, BusyInterval[]>();
  for (const op of scheduled) {
    for (const q of op.inst.qubits) {
      const list = busy.get(q) ?? [];
      list.push({ start: op.start, end: op.end });
      busy.set(q, list);
    }
  }

  const physicalQubits = sortedNumeric(busy.keys());
  const perQubitIdleWindows: Record<string, IdleWindowV1[]> = {};
  const idleFraction: Record<string, number> = {};
  for (const q of physicalQubits) {
    const windows = idleWindows(busy.get(q) ?? [], totalDuration);
    const idle = windows.reduce((s, w) => s + (w.end - w.start), 0);
    perQubitIdleWindows[qubitKey(q)] = windows;
    idleFraction[qubitKey(q)] = totalDuration > 0 ? idle / totalDuration : 0;
  }

  const layers = assignLayers(computational);
  const depth = layers.reduce((m, l) => Math.max(m, l), 0);

  let oneQubitGateCount = 0;
  let measurementCount = 0;
  const twoQubitGates: TwoQubitGateV1[] = [];
  const gateOccurrences: Record<string, number> = {};
  const measured: number[] = [];

  computational.forEach((inst, i) => {
    if (inst.name === "measure") {
      measurementCount += 1;
      measured.push(...inst.qubits);
    }
    if (inst.qubits.length === 2) {
      twoQubitGates.push({ gate: inst.name, qubits: [inst.qubits[0], inst.qubits[1]], layer: layers[i] });
    }
    if (NON_GATE_OPS.has(inst.name)) return;
    if (inst.qubits.length === 1) oneQubitGateCount += 1;
    const key = gateKey(inst.name, inst.qubits);
    gateOccurrences[key] = (gateOccurrences[key] ?? 0) + 1;
  });

  const twoQubitGateCount = twoQubitGates.length;
  const cells = physicalQubits.length * depth;

  const features: CircuitFeaturesV1 = {
    type: "circuit_features_v1",
    schema_version: CIRCUIT_FEATURES_SCHEMA_VERSION,
    circuitHash: contentHash(circuit),
    depth,
    twoQubitGateCount,
    twoQubitGateDensity: cells > 0 ? (2 * twoQubitGateCount) / cells : 0,
    oneQubitGateCount,
    measurementCount,
    totalDuration,
    perQubitIdleWindows,
    idleFraction,
    layoutMap,
    physicalQubits,
    measuredQubits: measured.length > 0 ? sortedNumeric(measured) : [...physicalQubits],
    gateOccurrences,
    twoQubitGates,
  };

  return deepFreeze(features);
}

/** Longest idle window (dt) per physical qubit; 0 when the qubit is never idle. */
export function longestIdleWindow(features: CircuitFeaturesV1, qubit: number): number {
  const windows = features.perQubitIdleWindows[qubitKey(qubit)] ?? [];
  return windows.reduce((m, w) => Math.max(m, w.end - w.start), 0);
}
