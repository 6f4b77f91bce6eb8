import { z } from "zod";

import { NonNegativeZ, ProbabilityZ, QubitIndexZ, SemVerZ } from "./common_v1";

/**
 * Closed technique set. Canonical order (TREX, DD, ZNE) is the order of
 * `selectedTechniques` and of fragment merging.
 */
export const TECHNIQUES = Object.freeze(["TREX", "DD", "ZNE"] as const);
export const TechniqueZ = z.enum(TECHNIQUES);
export type Technique = z.infer<typeof TechniqueZ>;

export const EXECUTION_MODES = Object.freeze(["single", "batch", "session"] as const);
export const ExecutionModeZ = z.enum(EXECUTION_MODES);
export type ExecutionMode = z.infer<typeof ExecutionModeZ>;

export const DdSequenceTypeZ = z.enum(["XX", "XpXm", "XY4"]);
export const SchedulingMethodZ = z.enum(["alap", "asap"]);
export const ZneExtrapolatorZ = z.enum([
  "linear",
  "exponential",
  "double_exponential",
  "polynomial_degree_2",
  "polynomial_degree_3",
  "fallback",
]);
export const ZneAmplifierZ = z.enum(["gate_folding", "gate_folding_front", "gate_folding_back", "pea"]);

export const TrexParamsV1Z = z
  .object({
    numRandomizations: z.number().int(),
    shotsPerRandomization: z.number().int(),
    maxReadoutError: ProbabilityZ,
    triggeringQubits: z.array(QubitIndexZ),
  })
  .strict();

export const DdTargetV1Z = z
  .object({
    qubit: QubitIndexZ,
    longestIdleDt: z.number().int(),
    repetitions: z.number().int(),
    dutyCycle: z.number(),
  })
  .strict();

export const DdParamsV1Z = z
  .object({
    sequenceType: DdSequenceTypeZ,
    schedulingMethod: SchedulingMethodZ,
    pulseDurationDt: z.number().int(),
    targets: z.array(DdTargetV1Z),
  })
  .strict();

export const ZneParamsV1Z = z
  .object({
    noiseScalingFactor: z.number(),
    noiseFactors: z.array(z.number()),
    extrapolator: ZneExtrapolatorZ,
    amplifier: ZneAmplifierZ,
    numRandomizations: z.number().int(),
    shotsPerRandomization: z.number().int(),
  })
  .strict();

// Parameter ranges are deliberately not constrained here: domain checks belong
// to the fragment builders, which raise InvalidParameterError.
export const TechniqueParametersV1Z = z
  .object({
    TREX: TrexParamsV1Z.optional(),
    DD: DdParamsV1Z.optional(),
    ZNE: ZneParamsV1Z.optional(),
  })
  .strict();

export const RULE_IDS = Object.freeze([
  "R1-min-actionable",
  "R2-dd-idle-density",
  "R3-trex-readout",
  "R4-zne-overall",
  "R5-baseline-suppression",
  "R6-session-stability",
] as const);
export const RuleIdZ = z.enum(RULE_IDS);
export type RuleId = z.infer<typeof RuleIdZ>;

export const RationaleEntryV1Z = z
  .object({
    ruleId: RuleIdZ,
    outcome: z.enum(["triggered", "not_triggered", "suppressed"]),
    triggeringValue: NonNegativeZ,
    threshold: NonNegativeZ,
  })
  .strict();

export const StrategyDecisionV1Z = z
  .object({
    type: z.literal("strategy_decision_v1"),
    schema_version: SemVerZ,
    mode: ExecutionModeZ,
    selectedTechniques: z.array(TechniqueZ),
    parameters: TechniqueParametersV1Z,
    rationale: z.array(RationaleEntryV1Z),
    overallScore: NonNegativeZ,
    decisionHash: z.string().min(1),
  })
  .strict()
  .superRefine((d, ctx) => {
    const selected = new Set(d.selectedTechniques);
    for (const t of TECHNIQUES) {
      const has = d.parameters[t] !== undefined;
      if (has !== selected.has(t)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `parameters.${t} must be present exactly when ${t} is selected`,
          path: ["parameters", t],
        });
      }
    }
  });

export type TrexParamsV1 = z.infer<typeof TrexParamsV1Z>;
export type DdTargetV1 = z.infer<typeof DdTargetV1Z>;
export type DdParamsV1 = z.infer<typeof DdParamsV1Z>;
export type ZneParamsV1 = z.infer<typeof ZneParamsV1Z>;
export type TechniqueParametersV1 = z.infer<typeof TechniqueParametersV1Z>;
export type RationaleEntryV1 = z.infer<typeof RationaleEntryV1Z>;
export type StrategyDecisionV1 = z.infer<typeof StrategyDecisionV1Z>;
export type DdSequenceType = z.infer<typeof DdSequenceTypeZ>;
export type ZneExtrapolator = z.infer<typeof ZneExtrapolatorZ>;
export type ZneAmplifier = z.infer<typeof ZneAmplifierZ>;
