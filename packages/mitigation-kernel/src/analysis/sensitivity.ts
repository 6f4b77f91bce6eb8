// Noise Sensitivity Analyzer (pure, deterministic).
//
// Combines circuit features with a noise snapshot into per-qubit and per-region
// scores. Regions are connected components of two-qubit interactions within a
// window of depth layers.

import {
  gateKey,
  qubitKey,
  type AnalyzerConfigV1,
  type CircuitFeaturesV1,
  type NoiseProfileV1,
  type SensitivityRegionV1,
  type SensitivityScoreV1,
} from "@qem/contracts";

import { InvalidParameterError } from "../errors";
import { deepFreeze, maxOf } from "../util";

export const SENSITIVITY_SCORE_SCHEMA_VERSION = "1.0.0";

// Float noise when comparing a score against mean + stddev of equal scores.
const HOTSPOT_EPS = 1e-12;

function assertAnalyzerConfig(cfg: AnalyzerConfigV1): void {
  for (const [name, w] of Object.entries(cfg.weights)) {
    if (!Number.isFinite(w) || w < 0) throw new InvalidParameterError(`analyzer weight ${name} must be >= 0, got ${w}`);
  }
  if (!Number.isInteger(cfg.region_depth_window) || cfg.region_depth_window < 1) {
    throw new InvalidParameterError(`region_depth_window must be a positive integer, got ${cfg.region_depth_window}`);
  }
}

function parseGateKey(key: string): { gate: string; qubits: number[] } {
  const idx = key.lastIndexOf(":");
  return { gate: key.slice(0, idx), qubits: key.slice(idx + 1).split(",").map(Number) };
}

/**
 * Error rate of one gate occurrence. Two-qubit entries are looked up in both
 * orientations; an unlisted single-qubit gate falls back to the qubit's mean
 * single-qubit error.
 */
export function gateErrorRate(profile: NoiseProfileV1, gate: string, qubits: ReadonlyArray<number>): number {
  const direct = profile.perGateErrorRate[gateKey(gate, qubits)];
  if (direct !== undefined) return direct;
  if (qubits.length === 2) {
    const flipped = profile.perGateErrorRate[gateKey(gate, [qubits[1], qubits[0]])];
    if (flipped !== undefined) return flipped;
  }
  if (qubits.length === 1) return profile.perQubitErrorRate[qubitKey(qubits[0])] ?? 0;
  return 0;
}

/**
 * Probability that a qubit dephases while idle: `1 - exp(-idle / T2)`, with the
 * idle time converted from dt to seconds. 0 when the snapshot has no dt or no
 * usable T2 for the qubit.
 */
export function decoherenceProbability(features: CircuitFeaturesV1, profile: NoiseProfileV1, qubit: number): number {
  const k = qubitKey(qubit);
  const t2 = profile.t2[k];
  if (profile.dt === null || t2 === undefined || t2 <= 0) return 0;
  const idleDt = (features.perQubitIdleWindows[k] ?? []).reduce((s, w) => s + (w.end - w.start), 0);
  return 1 - Math.exp(-(idleDt * profile.dt) / t2);
}

function gateExposure(features: CircuitFeaturesV1, profile: NoiseProfileV1): Map<number, number> {
  const out = new Map<number, number>();
  for (const [key, count] of Object.entries(features.gateOccurrences)) {
    const { gate, qubits } = parseGateKey(key);
    const err = gateErrorRate(profile, gate, qubits);
    for (const q of qubits) out.set(q, (out.get(q) ?? 0) + count * err);
  }
  return out;
}

class DisjointSet {
  private parent = new Map<number, number>();

  find(x: number): number {
    const p = this.parent.get(x);
    if (p === undefined) {
      this.parent.set(x, x);
      return x;
    }
    if (p === x) return x;
    const root = this.find(p);
    this.parent.set(x, root);
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    // smaller index is the root so component ids are stable
    if (ra < rb) this.parent.set(rb, ra);
    else this.parent.set(ra, rb);
  }

  groups(): number[][] {
    const byRoot = new Map<number, number[]>();
    for (const x of this.parent.keys()) {
      const r = this.find(x);
      const g = byRoot.get(r) ?? [];
      g.push(x);
      byRoot.set(r, g);
    }
    return Array.from(byRoot.values())
      .map((g) => g.sort((a, b) => a - b))
      .sort((a, b) => a[0] - b[0]);
  }
}

export function buildRegions(features: CircuitFeaturesV1, regionDepthWindow: number): SensitivityRegionV1[] {
  const byWindow = new Map<number, DisjointSet>();
  const linked = new Set<number>();
  for (const g of features.twoQubitGates) {
    const w = Math.floor((g.layer - 1) / regionDepthWindow);
    const ds = byWindow.get(w) ?? new DisjointSet();
    ds.union(g.qubits[0], g.qubits[1]);
    byWindow.set(w, ds);
    linked.add(g.qubits[0]);
    linked.add(g.qubits[1]);
  }

  const candidates: { window: number; qubits: number[] }[] = [];
  const windows = Array.from(byWindow.keys()).sort((a, b) => a - b);
  for (const w of windows) {
    const ds = byWindow.get(w);
    if (!ds) continue;
    for (const g of ds.groups()) candidates.push({ window: w, qubits: g });
  }
  for (const q of features.physicalQubits) {
    if (!linked.has(q)) candidates.push({ window: 0, qubits: [q] });
  }

  const seen = new Set<string>();
  const regions: SensitivityRegionV1[] = [];
  for (const c of candidates) {
    const members = c.qubits.join("-");
    if (seen.has(members)) continue;
    seen.add(members);
    regions.push({ regionId: `w${c.window}:${members}`, window: c.window, qubits: c.qubits });
  }
  return regions;
}

function hotspotCut(values: ReadonlyArray<number>): number {
  if (values.length === 0) return Number.POSITIVE_INFINITY;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) * (v - mean), 0) / values.length;
  return mean + Math.sqrt(variance) - HOTSPOT_EPS;
}

export function analyzeSensitivity(
  features: CircuitFeaturesV1,
  profile: NoiseProfileV1,
  cfg: AnalyzerConfigV1
): SensitivityScoreV1 {
  assertAnalyzerConfig(cfg);

  const exposure = gateExposure(features, profile);
  const perQubitScore: Record<string, number> = {};
  for (const q of features.physicalQubits) {
    const k = qubitKey(q);
    const idle = features.idleFraction[k] ?? 0;
    const readout = profile.readoutErrorRate[k] ?? 0;
    perQubitScore[k] =
      cfg.weights.idle * idle +
      cfg.weights.readout * readout +
      cfg.weights.gate * (exposure.get(q) ?? 0) +
      cfg.weights.decoherence * decoherenceProbability(features, profile, q);
  }

  const regions = buildRegions(features, cfg.region_depth_window);
  const perRegionScore: Record<string, number> = {};
  for (const r of regions) {
    perRegionScore[r.regionId] = r.qubits.reduce((s, q) => s + (perQubitScore[qubitKey(q)] ?? 0), 0);
  }

  const qubitCut = hotspotCut(Object.values(perQubitScore));
  const regionCut = hotspotCut(Object.values(perRegionScore));

  const score: SensitivityScoreV1 = {
    type: "sensitivity_score_v1",
    schema_version: SENSITIVITY_SCORE_SCHEMA_VERSION,
    perQubitScore,
    perRegionScore,
    regions,
    overallScore: maxOf(Object.values(perRegionScore)),
    hotspots: {
      qubits: features.physicalQubits.filter((q) => (perQubitScore[qubitKey(q)] ?? 0) >= qubitCut),
      regions: regions.filter((r) => (perRegionScore[r.regionId] ?? 0) >= regionCut).map((r) => r.regionId),
    },
  };

  return deepFreeze(score);
}
