import { z } from "zod";

import { NonNegativeZ, ProbabilityZ, SemVerZ } from "./common_v1";
import { DdSequenceTypeZ, SchedulingMethodZ, ZneAmplifierZ, ZneExtrapolatorZ } from "./strategy_decision_v1";

/**
 * Mitigation policy SSOT (config/mitigation/default.json).
 * Thresholds and weights are data, never constants in code.
 */
export const MitigationConfigV1Z = z
  .object({
    schema_version: SemVerZ,
    name: z.string().min(1).optional(),
    thresholds: z
      .object({
        min_actionable: NonNegativeZ,
        dd: ProbabilityZ, // compared against an idle fraction
        trex: ProbabilityZ, // compared against a readout error rate
        zne: NonNegativeZ,
        drift: NonNegativeZ,
      })
      .strict(),
    session: z
      .object({
        refresh_cadence_ms: z.number().int().nonnegative(),
      })
      .strict(),
    analyzer: z
      .object({
        weights: z
          .object({
            idle: NonNegativeZ,
            readout: NonNegativeZ,
            gate: NonNegativeZ,
            decoherence: NonNegativeZ,
          })
          .strict(),
        region_depth_window: z.number().int().positive(),
      })
      .strict(),
    execution: z
      .object({
        default_shots: z.number().int().positive(),
        calibration_timeout_ms: z.number().int().positive(),
      })
      .strict(),
    trex: z
      .object({
        num_randomizations: z.number().int().positive(),
      })
      .strict(),
    dd: z
      .object({
        sequence_type: DdSequenceTypeZ,
        scheduling_method: SchedulingMethodZ,
        pulse_duration_dt: z.number().int().positive(),
      })
      .strict(),
    zne: z
      .object({
        scale_gain: z.number().finite().positive(),
        noise_factor_steps: z.array(NonNegativeZ).min(2),
        extrapolator: ZneExtrapolatorZ,
        amplifier: ZneAmplifierZ,
        num_randomizations: z.number().int().positive(),
      })
      .strict(),
  })
  .strict();

export type MitigationConfigV1 = z.infer<typeof MitigationConfigV1Z>;
export type AnalyzerConfigV1 = MitigationConfigV1["analyzer"];

export function parseMitigationConfigV1(input: unknown): MitigationConfigV1 {
  return MitigationConfigV1Z.parse(input);
}
