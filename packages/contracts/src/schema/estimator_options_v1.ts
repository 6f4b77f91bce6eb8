import { z } from "zod";

import { QubitIndexZ } from "./common_v1";
import { DdSequenceTypeZ, SchedulingMethodZ, ZneAmplifierZ, ZneExtrapolatorZ } from "./strategy_decision_v1";

/**
 * Estimator configuration handed to the execution boundary.
 * Field names follow the runtime's own wire format (snake_case).
 */
export const EstimatorOptionsV1Z = z
  .object({
    default_shots: z.number().int().positive(),
    resilience_level: z.union([z.literal(0), z.literal(1), z.literal(2)]),
    resilience: z
      .object({
        measure_mitigation: z.boolean(),
        measure_noise_learning: z
          .object({
            num_randomizations: z.number().int().positive(),
            shots_per_randomization: z.number().int().positive(),
          })
          .strict()
          .optional(),
        zne_mitigation: z.boolean(),
        zne: z
          .object({
            noise_factors: z.array(z.number().min(1)).min(2),
            extrapolator: ZneExtrapolatorZ,
            amplifier: ZneAmplifierZ,
          })
          .strict()
          .optional(),
      })
      .strict(),
    twirling: z
      .object({
        enable_gates: z.boolean(),
        enable_measure: z.boolean(),
        num_randomizations: z.number().int().positive().optional(),
        shots_per_randomization: z.number().int().positive().optional(),
      })
      .strict(),
    dynamical_decoupling: z
      .object({
        enable: z.boolean(),
        sequence_type: DdSequenceTypeZ.optional(),
        scheduling_method: SchedulingMethodZ.optional(),
        targets: z
          .array(
            z
              .object({
                qubit: QubitIndexZ,
                repetitions: z.number().int().positive(),
                duty_cycle: z.number().min(0).max(1),
              })
              .strict()
          )
          .optional(),
      })
      .strict(),
  })
  .strict();

export type EstimatorOptionsV1 = z.infer<typeof EstimatorOptionsV1Z>;
export type ResilienceLevel = EstimatorOptionsV1["resilience_level"];

// What a single technique contributes; merged onto the no-mitigation base.
export type EstimatorOptionsFragmentV1 = {
  resilience_level?: ResilienceLevel;
  resilience?: Partial<EstimatorOptionsV1["resilience"]>;
  twirling?: Partial<EstimatorOptionsV1["twirling"]>;
  dynamical_decoupling?: Partial<EstimatorOptionsV1["dynamical_decoupling"]>;
};

export function parseEstimatorOptionsV1(input: unknown): EstimatorOptionsV1 {
  return EstimatorOptionsV1Z.parse(input);
}
