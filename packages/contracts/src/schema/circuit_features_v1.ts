import { z } from "zod";

import { GateKeyZ, NonNegativeZ, ProbabilityZ, QubitIndexZ, QubitKeyZ, SemVerZ } from "./common_v1";

export const IdleWindowV1Z = z
  .object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  })
  .strict()
  .refine((w) => w.end > w.start, { message: "idle window must have positive length" });

export const TwoQubitGateV1Z = z
  .object({
    gate: z.string().min(1),
    qubits: z.tuple([QubitIndexZ, QubitIndexZ]),
    layer: z.number().int().positive(), // 1-based depth layer
  })
  .strict();

export const CircuitFeaturesV1Z = z
  .object({
    type: z.literal("circuit_features_v1"),
    schema_version: SemVerZ,
    circuitHash: z.string().min(1),
    depth: z.number().int().nonnegative(),
    twoQubitGateCount: z.number().int().nonnegative(),
    twoQubitGateDensity: ProbabilityZ,
    oneQubitGateCount: z.number().int().nonnegative(),
    measurementCount: z.number().int().nonnegative(),
    totalDuration: z.number().int().nonnegative(),
    perQubitIdleWindows: z.record(QubitKeyZ, z.array(IdleWindowV1Z)),
    idleFraction: z.record(QubitKeyZ, ProbabilityZ),
    layoutMap: z.record(QubitKeyZ, QubitIndexZ),
    physicalQubits: z.array(QubitIndexZ),
    measuredQubits: z.array(QubitIndexZ),
    gateOccurrences: z.record(GateKeyZ, z.number().int().positive()),
    twoQubitGates: z.array(TwoQubitGateV1Z),
  })
  .strict();

export type IdleWindowV1 = z.infer<typeof IdleWindowV1Z>;
export type TwoQubitGateV1 = z.infer<typeof TwoQubitGateV1Z>;
export type CircuitFeaturesV1 = z.infer<typeof CircuitFeaturesV1Z>;
