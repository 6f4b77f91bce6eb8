import type { BackendRefV1, CircuitFeaturesV1, NoiseProfileV1, StrategyDecisionV1 } from "@qem/contracts";

import type { EffectiveConfig } from "./config/patch";

export type ProfileSource = (signal?: AbortSignal) => Promise<NoiseProfileV1>;

export type SessionSnapshot = {
  baseline: NoiseProfileV1;
  current: NoiseProfileV1;
  refreshed: boolean;
};

let sessionSeq = 0;

/**
 * State shared by the jobs of one session: the baseline snapshot, the current
 * snapshot, extracted features and the last decision per circuit.
 *
 * Profile refreshes, the reuse check and the decision stages of a job run
 * under one lock, so concurrent jobs of a session see each other's decisions
 * and every decision is taken against a single, complete snapshot.
 */
export class MitigationSession {
  readonly id: string;
  readonly backend: BackendRefV1;
  readonly effective: EffectiveConfig;

  private readonly source: ProfileSource;
  private readonly clock: () => number;
  private baseline: NoiseProfileV1 | undefined;
  private current: NoiseProfileV1 | undefined;
  private readonly featureCache = new Map<string, CircuitFeaturesV1>();
  private readonly decisions = new Map<string, StrategyDecisionV1>();
  private tail: Promise<void> = Promise.resolve();

  constructor(backend: BackendRefV1, effective: EffectiveConfig, source: ProfileSource, clock: () => number) {
    sessionSeq += 1;
    this.id = `session_${sessionSeq}`;
    this.backend = backend;
    this.effective = effective;
    this.source = source;
    this.clock = clock;
  }

  private async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    const prev = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await prev;
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Runs `fn` under the session lock against the current snapshot. The first
   * call captures the baseline; later calls refresh once the cadence has elapsed.
   */
  decide<T>(refreshCadenceMs: number, signal: AbortSignal | undefined, fn: (snap: SessionSnapshot) => Promise<T> | T): Promise<T> {
    return this.withLock(async () => fn(await this.snapshot(refreshCadenceMs, signal)));
  }

  private async snapshot(refreshCadenceMs: number, signal?: AbortSignal): Promise<SessionSnapshot> {
    let baseline = this.baseline;
    let current = this.current;
    let refreshed = false;
    if (!baseline || !current) {
      const first = await this.source(signal);
      baseline = first;
      current = first;
    } else if (this.clock() - current.timestamp >= refreshCadenceMs) {
      current = await this.source(signal);
      refreshed = true;
    }
    this.baseline = baseline;
    this.current = current;
    return { baseline, current, refreshed };
  }

  features(circuitHash: string): CircuitFeaturesV1 | undefined {
    return this.featureCache.get(circuitHash);
  }

  rememberFeatures(features: CircuitFeaturesV1): void {
    this.featureCache.set(features.circuitHash, features);
  }

  decisionFor(circuitHash: string): StrategyDecisionV1 | undefined {
    return this.decisions.get(circuitHash);
  }

  rememberDecision(circuitHash: string, decision: StrategyDecisionV1): void {
    this.decisions.set(circuitHash, decision);
  }
}
