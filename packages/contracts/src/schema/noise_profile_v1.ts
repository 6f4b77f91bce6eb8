import { z } from "zod";

import { GateKeyZ, ProbabilityZ, QubitKeyZ, QubitProbabilityMapZ, SemVerZ } from "./common_v1";

export const NoiseProfileV1Z = z
  .object({
    type: z.literal("noise_profile_v1"),
    schema_version: SemVerZ,
    backendName: z.string().min(1),
    perQubitErrorRate: QubitProbabilityMapZ,
    perGateErrorRate: z.record(GateKeyZ, ProbabilityZ),
    readoutErrorRate: QubitProbabilityMapZ,
    t1: z.record(QubitKeyZ, z.number().finite().nonnegative()),
    t2: z.record(QubitKeyZ, z.number().finite().nonnegative()),
    dt: z.number().positive().nullable(),
    timestamp: z.number().finite().nonnegative(), // monotonic capture time (ms)
    capturedAt: z.string().datetime(), // wall clock, audit only
  })
  .strict();

export type NoiseProfileV1 = z.infer<typeof NoiseProfileV1Z>;
