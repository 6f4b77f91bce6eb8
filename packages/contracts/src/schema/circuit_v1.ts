import { z } from "zod";

import { QubitIndexZ } from "./common_v1";

/**
 * One operation of a transpiled circuit. `qubits` are physical indices.
 * `duration` and `start` are in backend dt units; `start` is only present
 * when the compiler already scheduled the circuit.
 */
export const CircuitInstructionV1Z = z
  .object({
    name: z.string().min(1),
    qubits: z.array(QubitIndexZ),
    duration: z.number().int().nonnegative().optional(),
    start: z.number().int().nonnegative().optional(),
  })
  .strict();

// index = logical qubit, value = physical qubit (null for unmapped ancillas)
export const CircuitLayoutV1Z = z
  .object({
    initial: z.array(QubitIndexZ.nullable()),
    final: z.array(QubitIndexZ.nullable()).optional(),
  })
  .strict();

export const TranspiledCircuitV1Z = z
  .object({
    name: z.string().min(1).optional(),
    num_qubits: z.number().int().positive(),
    instructions: z.array(CircuitInstructionV1Z),
    layout: CircuitLayoutV1Z.nullable().optional(),
    duration: z.number().int().nonnegative().nullable().optional(),
    dt: z.number().positive().optional(),
  })
  .strict()
  .superRefine((c, ctx) => {
    c.instructions.forEach((inst, i) => {
      for (const q of inst.qubits) {
        if (q >= c.num_qubits) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `qubit ${q} out of range for num_qubits=${c.num_qubits}`,
            path: ["instructions", i, "qubits"],
          });
        }
      }
    });
  });

export type CircuitInstructionV1 = z.infer<typeof CircuitInstructionV1Z>;
export type CircuitLayoutV1 = z.infer<typeof CircuitLayoutV1Z>;
export type TranspiledCircuitV1 = z.infer<typeof TranspiledCircuitV1Z>;

// barrier synchronises its qubits, delay is idle time; neither is computation.
export function isStructuralOp(name: string): boolean {
  return name === "barrier" || name === "delay";
}
