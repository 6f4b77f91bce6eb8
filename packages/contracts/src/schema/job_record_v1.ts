import { z } from "zod";

import { NonNegativeZ, SemVerZ } from "./common_v1";
import { EstimatorOptionsV1Z } from "./estimator_options_v1";
import { ExecutionModeZ, RationaleEntryV1Z, StrategyDecisionV1Z } from "./strategy_decision_v1";

export const PIPELINE_STATES = Object.freeze([
  "Idle",
  "Extracting",
  "ProfilingNoise",
  "Scoring",
  "Selecting",
  "Applying",
  "Submitted",
  "Success",
  "Failed",
] as const);
export const PipelineStateZ = z.enum(PIPELINE_STATES);
export type PipelineState = z.infer<typeof PipelineStateZ>;

export const SessionStabilityTraceV1Z = z
  .object({
    reused: z.boolean(),
    drift: NonNegativeZ,
    driftThreshold: NonNegativeZ,
    refreshed: z.boolean(),
    rationale: RationaleEntryV1Z,
  })
  .strict();

export const JobRecordV1Z = z
  .object({
    type: z.literal("job_record_v1"),
    schema_version: SemVerZ,
    jobId: z.string().min(1), // assigned by the execution boundary
    backendName: z.string().min(1),
    mode: ExecutionModeZ,
    estOptions: EstimatorOptionsV1Z,
    decision: StrategyDecisionV1Z,
    effectiveConfigHash: z.string().min(1),
    trace: z
      .object({
        states: z.array(PipelineStateZ),
        sessionStability: SessionStabilityTraceV1Z.optional(),
      })
      .strict(),
    createdAt: z.string().datetime(),
  })
  .strict();

export type SessionStabilityTraceV1 = z.infer<typeof SessionStabilityTraceV1Z>;
export type JobRecordV1 = z.infer<typeof JobRecordV1Z>;

export const JOB_STATUSES = Object.freeze(["QUEUED", "RUNNING", "DONE", "ERROR", "CANCELLED"] as const);
export const JobStatusZ = z.enum(JOB_STATUSES);
export type JobStatus = z.infer<typeof JobStatusZ>;

export function parseJobRecordV1(input: unknown): JobRecordV1 {
  return JobRecordV1Z.parse(input);
}
