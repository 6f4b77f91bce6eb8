// Strategy Selector (pure).
//
// Rules run in a fixed order and every rule leaves a rationale entry, whether
// it fired or not. Thresholds come from the mitigation config, never from code.

import {
  TECHNIQUES,
  qubitKey,
  type CircuitFeaturesV1,
  type DdParamsV1,
  type DdSequenceType,
  type DdTargetV1,
  type ExecutionMode,
  type MitigationConfigV1,
  type NoiseProfileV1,
  type RationaleEntryV1,
  type SensitivityScoreV1,
  type StrategyDecisionV1,
  type Technique,
  type TechniqueParametersV1,
  type TrexParamsV1,
  type ZneAmplifier,
  type ZneParamsV1,
} from "@qem/contracts";

import { longestIdleWindow } from "../features/circuit_features";
import { InvalidParameterError } from "../errors";
import { contentHash, deepFreeze, maxOf } from "../util";

export const STRATEGY_DECISION_SCHEMA_VERSION = "1.0.0";

export type SelectStrategyInput = {
  score: SensitivityScoreV1;
  features: CircuitFeaturesV1;
  profile: NoiseProfileV1;
  mode: ExecutionMode;
  config: MitigationConfigV1;
  // falls back to config.execution.default_shots
  shots?: number;
};

const PULSES_PER_SEQUENCE: Record<DdSequenceType, number> = {
  XX: 2,
  XpXm: 2,
  XY4: 4,
};

export function shotsPerRandomization(shots: number, numRandomizations: number): number {
  if (!Number.isInteger(shots) || shots < 1) throw new InvalidParameterError(`shots must be a positive integer, got ${shots}`);
  if (!Number.isInteger(numRandomizations) || numRandomizations < 1) {
    throw new InvalidParameterError(`num_randomizations must be a positive integer, got ${numRandomizations}`);
  }
  return Math.ceil(shots / numRandomizations);
}

/** Largest idle fraction over the circuit's touched qubits. */
export function idleDensity(features: CircuitFeaturesV1): number {
  return maxOf(features.physicalQubits.map((q) => features.idleFraction[qubitKey(q)] ?? 0));
}

export function maxMeasuredReadoutError(features: CircuitFeaturesV1, profile: NoiseProfileV1): number {
  return maxOf(features.measuredQubits.map((q) => profile.readoutErrorRate[qubitKey(q)] ?? 0));
}

function ddTargets(features: CircuitFeaturesV1, qubits: ReadonlyArray<number>, cfg: MitigationConfigV1["dd"]): DdTargetV1[] {
  const slot = PULSES_PER_SEQUENCE[cfg.sequence_type] * cfg.pulse_duration_dt;
  const out: DdTargetV1[] = [];
  for (const q of qubits) {
    const longestIdleDt = longestIdleWindow(features, q);
    const repetitions = Math.floor(longestIdleDt / slot);
    // a window shorter than one full sequence gets no pulses
    if (repetitions < 1) continue;
    out.push({ qubit: q, longestIdleDt, repetitions, dutyCycle: (repetitions * slot) / longestIdleDt });
  }
  return out;
}

function ddParams(features: CircuitFeaturesV1, qubits: ReadonlyArray<number>, cfg: MitigationConfigV1["dd"]): DdParamsV1 {
  return {
    sequenceType: cfg.sequence_type,
    schedulingMethod: cfg.scheduling_method,
    pulseDurationDt: cfg.pulse_duration_dt,
    targets: ddTargets(features, qubits, cfg),
  };
}

/**
 * Noise factors for ZNE: 1 + step * scale. Gate folding can only realise odd
 * integer factors, so those are rounded to the nearest odd integer and kept
 * strictly increasing.
 */
export function zneNoiseFactors(steps: ReadonlyArray<number>, scale: number, amplifier: ZneAmplifier): number[] {
  const raw = steps.map((s) => 1 + s * scale);
  if (amplifier === "pea") return raw.map((f) => Math.round(f * 1e4) / 1e4);

  const out: number[] = [];
  for (const f of raw) {
    let odd = 2 * Math.round((f - 1) / 2) + 1;
    const prev = out[out.length - 1];
    if (prev !== undefined && odd <= prev) odd = prev + 2;
    out.push(odd);
  }
  return out;
}

function entry(ruleId: RationaleEntryV1["ruleId"], outcome: RationaleEntryV1["outcome"], triggeringValue: number, threshold: number): RationaleEntryV1 {
  return { ruleId, outcome, triggeringValue, threshold };
}

export function selectStrategy(input: SelectStrategyInput): StrategyDecisionV1 {
  const { score, features, profile, mode, config } = input;
  const t = config.thresholds;
  const shots = input.shots ?? config.execution.default_shots;
  const overall = score.overallScore;

  const density = idleDensity(features);
  const readout = maxMeasuredReadoutError(features, profile);

  const rationale: RationaleEntryV1[] = [];
  const parameters: TechniqueParametersV1 = {};

  if (overall <= t.min_actionable) {
    rationale.push(
      entry("R1-min-actionable", "triggered", overall, t.min_actionable),
      entry("R2-dd-idle-density", "suppressed", density, t.dd),
      entry("R3-trex-readout", "suppressed", readout, t.trex),
      entry("R4-zne-overall", "suppressed", overall, t.zne),
      entry("R5-baseline-suppression", "suppressed", overall, t.min_actionable)
    );
  } else {
    rationale.push(entry("R1-min-actionable", "not_triggered", overall, t.min_actionable));

    if (density > t.dd) {
      const idleQubits = features.physicalQubits.filter((q) => (features.idleFraction[qubitKey(q)] ?? 0) > t.dd);
      parameters.DD = ddParams(features, idleQubits, config.dd);
      rationale.push(entry("R2-dd-idle-density", "triggered", density, t.dd));
    } else {
      rationale.push(entry("R2-dd-idle-density", "not_triggered", density, t.dd));
    }

    if (readout > t.trex) {
      const trex: TrexParamsV1 = {
        numRandomizations: config.trex.num_randomizations,
        shotsPerRandomization: shotsPerRandomization(shots, config.trex.num_randomizations),
        maxReadoutError: readout,
        triggeringQubits: features.measuredQubits.filter((q) => (profile.readoutErrorRate[qubitKey(q)] ?? 0) > t.trex),
      };
      parameters.TREX = trex;
      rationale.push(entry("R3-trex-readout", "triggered", readout, t.trex));
    } else {
      rationale.push(entry("R3-trex-readout", "not_triggered", readout, t.trex));
    }

    if (overall > t.zne) {
      const noiseScalingFactor = config.zne.scale_gain * overall;
      const zne: ZneParamsV1 = {
        noiseScalingFactor,
        noiseFactors: zneNoiseFactors(config.zne.noise_factor_steps, noiseScalingFactor, config.zne.amplifier),
        extrapolator: config.zne.extrapolator,
        amplifier: config.zne.amplifier,
        numRandomizations: config.zne.num_randomizations,
        shotsPerRandomization: shotsPerRandomization(shots, config.zne.num_randomizations),
      };
      parameters.ZNE = zne;
      rationale.push(entry("R4-zne-overall", "triggered", overall, t.zne));
    } else {
      rationale.push(entry("R4-zne-overall", "not_triggered", overall, t.zne));
    }

    // Actionable noise with no specific signal: suppress idle errors wherever they fit.
    if (!parameters.DD && !parameters.TREX && !parameters.ZNE) {
      parameters.DD = ddParams(features, features.physicalQubits, config.dd);
      rationale.push(entry("R5-baseline-suppression", "triggered", overall, t.min_actionable));
    } else {
      rationale.push(entry("R5-baseline-suppression", "not_triggered", overall, t.min_actionable));
    }
  }

  const selectedTechniques: Technique[] = TECHNIQUES.filter((tech) => parameters[tech] !== undefined);
  const content = { mode, selectedTechniques, parameters, rationale, overallScore: overall };

  const decision: StrategyDecisionV1 = {
    type: "strategy_decision_v1",
    schema_version: STRATEGY_DECISION_SCHEMA_VERSION,
    ...content,
    decisionHash: contentHash(content),
  };
  return deepFreeze(decision);
}
