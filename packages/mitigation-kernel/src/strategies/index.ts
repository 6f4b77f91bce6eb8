import {
  EstimatorOptionsV1Z,
  type CircuitFeaturesV1,
  type EstimatorOptionsFragmentV1,
  type EstimatorOptionsV1,
  type NoiseProfileV1,
  type StrategyDecisionV1,
  type Technique,
  type TechniqueParametersV1,
} from "@qem/contracts";

import { InvalidParameterError } from "../errors";
import { deepFreeze, isPlainObject, stableStringify } from "../util";
import { buildDdFragment } from "./dd";
import { buildTrexFragment } from "./trex";
import { assertPositiveInt } from "./validate";
import { buildZneFragment } from "./zne";

export { buildDdFragment } from "./dd";
export { buildTrexFragment } from "./trex";
export { buildZneFragment } from "./zne";

function missing(t: Technique): never {
  throw new InvalidParameterError(`no parameters for selected technique ${t}`);
}

export function buildFragment(
  technique: Technique,
  features: CircuitFeaturesV1,
  profile: NoiseProfileV1,
  parameters: TechniqueParametersV1
): EstimatorOptionsFragmentV1 {
  switch (technique) {
    case "TREX":
      return buildTrexFragment(features, profile, parameters.TREX ?? missing(technique));
    case "DD":
      return buildDdFragment(features, profile, parameters.DD ?? missing(technique));
    case "ZNE":
      return buildZneFragment(features, profile, parameters.ZNE ?? missing(technique));
    default: {
      const unreachable: never = technique;
      throw new InvalidParameterError(`unknown technique ${String(unreachable)}`);
    }
  }
}

/** No mitigation at all; every fragment is layered on top of this. */
export function baseEstimatorOptions(shots: number): EstimatorOptionsV1 {
  assertPositiveInt(shots, "shots");
  return {
    default_shots: shots,
    resilience_level: 0,
    resilience: { measure_mitigation: false, zne_mitigation: false },
    twirling: { enable_gates: false, enable_measure: false },
    dynamical_decoupling: { enable: false },
  };
}

// resilience_level merges by max; every other leaf must agree.
function combine(a: unknown, b: unknown, path: string, onConflict: "reject" | "override"): unknown {
  if (isPlainObject(a) && isPlainObject(b)) {
    const out: Record<string, unknown> = { ...a };
    for (const [k, v] of Object.entries(b)) {
      if (v === undefined) continue;
      const childPath = path ? `${path}.${k}` : k;
      out[k] = k in out && out[k] !== undefined ? combine(out[k], v, childPath, onConflict) : v;
    }
    return out;
  }
  if (path === "resilience_level" && typeof a === "number" && typeof b === "number") {
    return Math.max(a, b);
  }
  if (onConflict === "override" || stableStringify(a) === stableStringify(b)) return b;
  throw new InvalidParameterError(`conflicting values for ${path}: ${stableStringify(a)} vs ${stableStringify(b)}`);
}

/**
 * Deep-merges technique fragments onto `base`. Fragments may not disagree on
 * any leaf except resilience_level; the merged fragments then override `base`.
 */
export function mergeFragments(
  base: EstimatorOptionsV1,
  fragments: ReadonlyArray<EstimatorOptionsFragmentV1>
): EstimatorOptionsV1 {
  let combined: unknown = {};
  for (const f of fragments) combined = combine(combined, f, "", "reject");

  const merged = combine(base, combined, "", "override");
  const parsed = EstimatorOptionsV1Z.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new InvalidParameterError(`merged estimator options are invalid: ${detail}`);
  }
  return deepFreeze(parsed.data);
}

export function buildEstimatorOptions(
  decision: StrategyDecisionV1,
  features: CircuitFeaturesV1,
  profile: NoiseProfileV1,
  shots: number
): EstimatorOptionsV1 {
  const base = baseEstimatorOptions(shots);
  const fragments = decision.selectedTechniques.map((t) => buildFragment(t, features, profile, decision.parameters));
  return mergeFragments(base, fragments);
}
