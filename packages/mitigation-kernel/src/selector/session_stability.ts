import type { NoiseProfileV1, RationaleEntryV1 } from "@qem/contracts";

import { InvalidParameterError } from "../errors";

export type SessionStabilityResult = {
  reuse: boolean;
  drift: number;
  rationale: RationaleEntryV1;
};

function maxAbsDiff(a: Readonly<Record<string, number>>, b: Readonly<Record<string, number>>): number {
  let m = 0;
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const k of keys) {
    // a rate present in only one snapshot counts against 0
    m = Math.max(m, Math.abs((a[k] ?? 0) - (b[k] ?? 0)));
  }
  return m;
}

/** Largest absolute change of any per-qubit, per-gate or readout error rate. */
export function profileDrift(baseline: NoiseProfileV1, current: NoiseProfileV1): number {
  return Math.max(
    maxAbsDiff(baseline.perQubitErrorRate, current.perQubitErrorRate),
    maxAbsDiff(baseline.perGateErrorRate, current.perGateErrorRate),
    maxAbsDiff(baseline.readoutErrorRate, current.readoutErrorRate)
  );
}

/**
 * Session reuse policy: a previous decision stays valid while the backend has
 * drifted no more than `driftThreshold` from the session baseline.
 */
export function evaluateSessionStability(
  baseline: NoiseProfileV1,
  current: NoiseProfileV1,
  driftThreshold: number
): SessionStabilityResult {
  if (!Number.isFinite(driftThreshold) || driftThreshold < 0) {
    throw new InvalidParameterError(`drift threshold must be >= 0, got ${driftThreshold}`);
  }
  if (baseline.backendName !== current.backendName) {
    throw new InvalidParameterError(`cannot compare snapshots of ${baseline.backendName} and ${current.backendName}`);
  }

  const drift = profileDrift(baseline, current);
  const reuse = drift <= driftThreshold;
  return {
    reuse,
    drift,
    rationale: {
      ruleId: "R6-session-stability",
      outcome: reuse ? "triggered" : "not_triggered",
      triggeringValue: drift,
      threshold: driftThreshold,
    },
  };
}
