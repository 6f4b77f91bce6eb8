import type { BackendRefV1, ExecutionMode, JobRecordV1, JobStatus, MitigationConfigV1, PubV1 } from "@qem/contracts";
import { InvalidRequestError } from "@qem/mitigation-kernel";

import type { ExecutionBackend } from "./boundary/execution_backend";
import { resolveEffectiveConfig, type EffectiveConfig } from "./config/patch";
import { getManifest, type MitigationConfigManifestV1 } from "./config/ssot";
import { silentLogger, type BaseLogger } from "./logger";
import { collectNoiseProfile } from "./noise/collector";
import { MitigationPipelineV1, type PubRunResult } from "./pipeline";
import { MitigationSession } from "./session";
import type { JobLedger } from "./store/job_ledger";
import { monotonicMs } from "./util";

export type MitigationRuntimeDeps = {
  backend: ExecutionBackend;
  config: MitigationConfigV1;
  log?: BaseLogger;
  ledger?: JobLedger;
  // monotonic ms, shared by snapshot timestamps and session refresh
  clock?: () => number;
  now?: () => Date;
};

export type RunOptions = {
  signal?: AbortSignal;
};

export type SessionHandle = {
  readonly id: string;
  run(pubs: ReadonlyArray<PubV1>, opts?: RunOptions): Promise<PubRunResult[]>;
};

export class MitigationRuntime {
  private readonly backend: ExecutionBackend;
  private readonly baseConfig: MitigationConfigV1;
  private readonly manifestV1: MitigationConfigManifestV1;
  private readonly log: BaseLogger;
  private readonly ledger: JobLedger | undefined;
  private readonly clock: () => number;
  private readonly pipeline: MitigationPipelineV1;

  constructor(deps: MitigationRuntimeDeps) {
    this.backend = deps.backend;
    this.baseConfig = deps.config;
    this.manifestV1 = getManifest(deps.config);
    this.log = deps.log ?? silentLogger();
    this.ledger = deps.ledger;
    this.clock = deps.clock ?? monotonicMs;
    this.pipeline = new MitigationPipelineV1({
      backend: deps.backend,
      log: this.log,
      ledger: deps.ledger,
      clock: this.clock,
      now: deps.now ?? (() => new Date()),
    });
  }

  manifest(): MitigationConfigManifestV1 {
    return this.manifestV1;
  }

  get hasLedger(): boolean {
    return this.ledger !== undefined;
  }

  /**
   * Runs every pub through the pipeline and returns one result per pub, in
   * order. A failing pub never aborts its siblings. Caller input and config
   * overrides are checked up front and reject the whole call.
   */
  async run(
    pubs: ReadonlyArray<PubV1>,
    backend: BackendRefV1,
    mode: ExecutionMode,
    config?: unknown,
    opts: RunOptions = {}
  ): Promise<PubRunResult[]> {
    if (pubs.length === 0) throw new InvalidRequestError("at least one pub is required");
    if (mode === "single" && pubs.length !== 1) {
      throw new InvalidRequestError(`single mode takes exactly one pub, got ${pubs.length}`);
    }

    const effective = this.resolve(config);
    const session = mode === "session" ? this.newSession(backend, effective) : undefined;
    return this.runAll(pubs, backend, mode, effective, session, opts);
  }

  /** Long-lived session: snapshots, features and decisions persist across `run` calls. */
  openSession(backend: BackendRefV1, config?: unknown): SessionHandle {
    const effective = this.resolve(config);
    const session = this.newSession(backend, effective);
    this.log.info({ session: session.id, backend: backend.name }, "session opened");
    return {
      id: session.id,
      run: (pubs, opts = {}) => {
        if (pubs.length === 0) return Promise.reject(new InvalidRequestError("at least one pub is required"));
        return this.runAll(pubs, backend, "session", effective, session, opts);
      },
    };
  }

  async status(jobId: string): Promise<JobStatus> {
    if (!jobId.trim()) throw new InvalidRequestError("jobId is required");
    return this.backend.getStatus(jobId);
  }

  async listJobs(limit = 100): Promise<JobRecordV1[]> {
    if (!this.ledger) throw new InvalidRequestError("no job ledger configured");
    return this.ledger.listRecent(limit);
  }

  private resolve(config: unknown): EffectiveConfig {
    const effective = resolveEffectiveConfig(this.baseConfig, this.manifestV1, config);
    const shots = effective.config.execution.default_shots;
    this.log.debug(
      { effectiveConfigHash: effective.hash, shots, defaultPrecision: 1 / Math.sqrt(shots) },
      "effective mitigation config"
    );
    return effective;
  }

  private newSession(backend: BackendRefV1, effective: EffectiveConfig): MitigationSession {
    const timeoutMs = effective.config.execution.calibration_timeout_ms;
    return new MitigationSession(
      backend,
      effective,
      (signal) => collectNoiseProfile(this.backend, backend, { timeoutMs, signal, clock: this.clock }),
      this.clock
    );
  }

  private async runAll(
    pubs: ReadonlyArray<PubV1>,
    backend: BackendRefV1,
    mode: ExecutionMode,
    effective: EffectiveConfig,
    session: MitigationSession | undefined,
    opts: RunOptions
  ): Promise<PubRunResult[]> {
    const results: PubRunResult[] = [];
    // sequential: each item sees its own snapshot, sessions see a stable order
    for (let i = 0; i < pubs.length; i++) {
      const pub = pubs[i];
      results.push(
        await this.pipeline.run({
          label: pub.circuit.name ?? `${mode}[${i}]`,
          pub,
          backend,
          mode,
          effective,
          session,
          signal: opts.signal,
        })
      );
    }
    return results;
  }
}
