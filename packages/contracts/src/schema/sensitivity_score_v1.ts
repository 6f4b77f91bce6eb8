import { z } from "zod";

import { NonNegativeZ, QubitIndexZ, QubitKeyZ, SemVerZ } from "./common_v1";

export const SensitivityRegionV1Z = z
  .object({
    regionId: z.string().min(1),
    window: z.number().int().nonnegative(), // depth-window index the region was first found in
    qubits: z.array(QubitIndexZ).min(1),
  })
  .strict();

export const SensitivityScoreV1Z = z
  .object({
    type: z.literal("sensitivity_score_v1"),
    schema_version: SemVerZ,
    perQubitScore: z.record(QubitKeyZ, NonNegativeZ),
    perRegionScore: z.record(z.string().min(1), NonNegativeZ),
    regions: z.array(SensitivityRegionV1Z),
    overallScore: NonNegativeZ,
    hotspots: z
      .object({
        qubits: z.array(QubitIndexZ),
        regions: z.array(z.string().min(1)),
      })
      .strict(),
  })
  .strict();

export type SensitivityRegionV1 = z.infer<typeof SensitivityRegionV1Z>;
export type SensitivityScoreV1 = z.infer<typeof SensitivityScoreV1Z>;
