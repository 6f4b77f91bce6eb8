import { z } from "zod";

import { TranspiledCircuitV1Z } from "./circuit_v1";
import { ExecutionModeZ } from "./strategy_decision_v1";

export const BackendRefV1Z = z
  .object({
    name: z.string().min(1),
    simulator: z.boolean().optional(),
  })
  .strict();

// Observables are opaque to the engine and passed through to the boundary untouched.
export const PubV1Z = z
  .object({
    circuit: TranspiledCircuitV1Z,
    observables: z.unknown(),
  })
  .strict();

export const ExecutionRequestV1Z = z
  .object({
    pub: PubV1Z,
    backend: BackendRefV1Z,
    mode: ExecutionModeZ,
  })
  .strict();

export type BackendRefV1 = z.infer<typeof BackendRefV1Z>;
export type PubV1 = z.infer<typeof PubV1Z>;
export type ExecutionRequestV1 = z.infer<typeof ExecutionRequestV1Z>;

export function parseExecutionRequestV1(input: unknown): ExecutionRequestV1 {
  return ExecutionRequestV1Z.parse(input);
}
