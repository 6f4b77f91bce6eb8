import { z } from "zod";

export const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // SemVer: no free-form versions

export const QubitIndexZ = z.number().int().nonnegative();

// Qubit-keyed maps travel as JSON objects keyed by the decimal physical index.
export const QubitKeyZ = z.string().regex(/^\d+$/);

// "<gate>:<q0>,<q1>,..." e.g. "ecr:3,4"
export const GateKeyZ = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*:\d+(,\d+)*$/);

export const ProbabilityZ = z.number().finite().min(0).max(1);

export const NonNegativeZ = z.number().finite().nonnegative();

export const QubitProbabilityMapZ = z.record(QubitKeyZ, ProbabilityZ);

export function qubitKey(q: number): string {
  return String(q);
}

export function gateKey(gate: string, qubits: ReadonlyArray<number>): string {
  return `${gate}:${qubits.join(",")}`;
}
