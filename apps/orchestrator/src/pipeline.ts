// Adaptive estimator pipeline: one pub, one pass through the state machine.
//
//   Idle -> Extracting -> ProfilingNoise -> Scoring -> Selecting -> Applying -> Submitted -> Success
//   any stage -> Failed
//
// Session jobs only may enter at ProfilingNoise (features already extracted)
// and jump ProfilingNoise -> Applying when the stability policy reuses a decision.

import type {
  BackendRefV1,
  CircuitFeaturesV1,
  EstimatorOptionsV1,
  ExecutionMode,
  JobRecordV1,
  NoiseProfileV1,
  PipelineState,
  PubV1,
  SessionStabilityTraceV1,
  StrategyDecisionV1,
} from "@qem/contracts";
import {
  MitigationError,
  RequestCancelledError,
  SubmissionError,
  analyzeSensitivity,
  buildEstimatorOptions,
  contentHash,
  deepFreeze,
  evaluateSessionStability,
  extractCircuitFeatures,
  selectStrategy,
} from "@qem/mitigation-kernel";

import type { ExecutionBackend } from "./boundary/execution_backend";
import type { EffectiveConfig } from "./config/patch";
import type { BaseLogger } from "./logger";
import { collectNoiseProfile } from "./noise/collector";
import type { MitigationSession } from "./session";
import type { JobLedger } from "./store/job_ledger";
import { errorMessage } from "./util";

export const JOB_RECORD_SCHEMA_VERSION = "1.0.0";

const TRANSITIONS: Readonly<Record<PipelineState, ReadonlyArray<PipelineState>>> = {
  Idle: ["Extracting"],
  Extracting: ["ProfilingNoise"],
  ProfilingNoise: ["Scoring"],
  Scoring: ["Selecting"],
  Selecting: ["Applying"],
  Applying: ["Submitted"],
  Submitted: ["Success"],
  Success: [],
  Failed: [],
};

const SESSION_SHORTCUTS: Readonly<Partial<Record<PipelineState, PipelineState>>> = {
  Idle: "ProfilingNoise",
  ProfilingNoise: "Applying",
};

export type PipelineRunOptions = {
  signal?: AbortSignal;
  // enables the session shortcuts
  session?: boolean;
};

/** Tracks one item's progress and refuses transitions the machine does not have. */
export class PipelineRun {
  private current: PipelineState = "Idle";
  private readonly visited: PipelineState[] = ["Idle"];
  private readonly signal: AbortSignal | undefined;
  private readonly session: boolean;
  private readonly log: BaseLogger;
  private readonly label: string;
  private submittedJobId: string | undefined;

  constructor(label: string, log: BaseLogger, opts: PipelineRunOptions = {}) {
    this.label = label;
    this.log = log;
    this.signal = opts.signal;
    this.session = opts.session ?? false;
  }

  get state(): PipelineState {
    return this.current;
  }

  get states(): PipelineState[] {
    return [...this.visited];
  }

  /** Backend job id, once the backend has accepted the submission. */
  get jobId(): string | undefined {
    return this.submittedJobId;
  }

  accepted(jobId: string): void {
    this.submittedJobId = jobId;
  }

  private allows(next: PipelineState): boolean {
    if (TRANSITIONS[this.current].includes(next)) return true;
    return this.session && SESSION_SHORTCUTS[this.current] === next;
  }

  to(next: PipelineState): void {
    if (!this.allows(next)) {
      throw new Error(`illegal pipeline transition ${this.current} -> ${next}`);
    }
    // cancellation is honoured up to, but not after, submission
    if (next !== "Success" && this.signal?.aborted) {
      throw new RequestCancelledError(`cancelled before ${next}`);
    }
    this.log.debug({ item: this.label, from: this.current, to: next }, "pipeline transition");
    this.current = next;
    this.visited.push(next);
  }

  /** Moves to Failed and returns the stage that failed. */
  fail(): PipelineState {
    const at = this.current;
    if (at !== "Failed") {
      this.current = "Failed";
      this.visited.push("Failed");
    }
    return at;
  }
}

export type PubFailure = {
  name: string;
  code?: string;
  message: string;
  status?: number;
  body?: string;
};

export type PubRunResult =
  | { ok: true; job: JobRecordV1; estOptions: EstimatorOptionsV1 }
  | { ok: false; error: PubFailure; failedState: PipelineState; jobId?: string };

export function describeError(err: unknown): PubFailure {
  if (err instanceof SubmissionError) {
    return { name: err.name, code: err.code, message: err.message, status: err.status, body: err.body };
  }
  if (err instanceof MitigationError) return { name: err.name, code: err.code, message: err.message };
  if (err instanceof Error) return { name: err.name, message: err.message };
  return { name: "Error", message: errorMessage(err) };
}

export type PipelineDeps = {
  backend: ExecutionBackend;
  log: BaseLogger;
  ledger?: JobLedger;
  clock: () => number;
  now: () => Date;
};

export type PipelineItem = {
  label: string;
  pub: PubV1;
  backend: BackendRefV1;
  mode: ExecutionMode;
  effective: EffectiveConfig;
  session?: MitigationSession;
  signal?: AbortSignal;
};

type Decided = {
  decision: StrategyDecisionV1;
  profile: NoiseProfileV1;
  sessionStability?: SessionStabilityTraceV1;
};

export class MitigationPipelineV1 {
  private readonly deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  async run(item: PipelineItem): Promise<PubRunResult> {
    const run = new PipelineRun(item.label, this.deps.log, { signal: item.signal, session: item.session !== undefined });
    try {
      return await this.execute(run, item);
    } catch (err) {
      const failedState = run.fail();
      const error = describeError(err);
      const jobId = run.jobId;
      this.deps.log.error({ item: item.label, failedState, jobId, error }, "pipeline item failed");
      // a job the backend accepted stays traceable even when recording it failed
      return jobId === undefined ? { ok: false, error, failedState } : { ok: false, error, failedState, jobId };
    }
  }

  private async execute(run: PipelineRun, item: PipelineItem): Promise<PubRunResult> {
    const { pub, session } = item;
    const circuitHash = contentHash(pub.circuit);

    let features = session?.features(circuitHash);
    if (!features) {
      run.to("Extracting");
      features = extractCircuitFeatures(pub.circuit);
      session?.rememberFeatures(features);
    }

    run.to("ProfilingNoise");
    const decided = session
      ? await this.decideInSession(run, item, session, features, circuitHash)
      : await this.decideFresh(run, item, features);

    run.to("Applying");
    const shots = item.effective.config.execution.default_shots;
    const estOptions = buildEstimatorOptions(decided.decision, features, decided.profile, shots);

    run.to("Submitted");
    const jobId = await this.deps.backend.submit({
      backend: item.backend,
      circuit: pub.circuit,
      observables: pub.observables,
      options: estOptions,
      mode: item.mode,
    });
    run.accepted(jobId);

    const record: JobRecordV1 = {
      type: "job_record_v1",
      schema_version: JOB_RECORD_SCHEMA_VERSION,
      jobId,
      backendName: item.backend.name,
      mode: item.mode,
      estOptions,
      decision: decided.decision,
      effectiveConfigHash: item.effective.hash,
      trace: {
        states: [...run.states, "Success"],
        ...(decided.sessionStability ? { sessionStability: decided.sessionStability } : {}),
      },
      createdAt: this.deps.now().toISOString(),
    };
    const job = deepFreeze(record);
    if (this.deps.ledger) await this.deps.ledger.append(job);

    run.to("Success");
    this.deps.log.info({ item: item.label, jobId, techniques: decided.decision.selectedTechniques }, "job submitted");
    return { ok: true, job, estOptions };
  }

  private score(run: PipelineRun, item: PipelineItem, features: CircuitFeaturesV1, profile: NoiseProfileV1): StrategyDecisionV1 {
    const config = item.effective.config;
    run.to("Scoring");
    const score = analyzeSensitivity(features, profile, config.analyzer);
    run.to("Selecting");
    const decision = selectStrategy({ score, features, profile, mode: item.mode, config });
    this.deps.log.info(
      {
        item: item.label,
        overallScore: score.overallScore,
        hotspots: score.hotspots,
        selected: decision.selectedTechniques,
        rationale: decision.rationale,
      },
      "mitigation strategy selected"
    );
    return decision;
  }

  private async decideFresh(run: PipelineRun, item: PipelineItem, features: CircuitFeaturesV1): Promise<Decided> {
    const profile = await collectNoiseProfile(this.deps.backend, item.backend, {
      timeoutMs: item.effective.config.execution.calibration_timeout_ms,
      signal: item.signal,
      clock: this.deps.clock,
    });
    return { decision: this.score(run, item, features, profile), profile };
  }

  private decideInSession(
    run: PipelineRun,
    item: PipelineItem,
    session: MitigationSession,
    features: CircuitFeaturesV1,
    circuitHash: string
  ): Promise<Decided> {
    const config = item.effective.config;
    const driftThreshold = config.thresholds.drift;

    return session.decide(config.session.refresh_cadence_ms, item.signal, (snap): Decided => {
      const prior = session.decisionFor(circuitHash);
      const stability = evaluateSessionStability(snap.baseline, snap.current, driftThreshold);
      const sessionStability: SessionStabilityTraceV1 = {
        reused: prior !== undefined && stability.reuse,
        drift: stability.drift,
        driftThreshold,
        refreshed: snap.refreshed,
        // with no earlier decision for this circuit there is nothing to reuse
        rationale: prior ? stability.rationale : { ...stability.rationale, outcome: "not_triggered" },
      };
      this.deps.log.debug({ item: item.label, session: session.id, ...sessionStability }, "session stability check");
      if (prior && stability.reuse) return { decision: prior, profile: snap.current, sessionStability };

      const decision = this.score(run, item, features, snap.current);
      session.rememberDecision(circuitHash, decision);
      return { decision, profile: snap.current, sessionStability };
    });
  }
}
