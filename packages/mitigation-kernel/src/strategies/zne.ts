import type { CircuitFeaturesV1, EstimatorOptionsFragmentV1, NoiseProfileV1, ZneParamsV1 } from "@qem/contracts";

import { InvalidParameterError } from "../errors";
import { assertFinite, assertPositiveInt } from "./validate";

function isFoldingAmplifier(amplifier: ZneParamsV1["amplifier"]): boolean {
  return amplifier !== "pea";
}

/**
 * Zero-noise extrapolation with gate twirling. Maps to resilience level 2.
 *
 * Noise factors must start at 1 and increase strictly; gate folding further
 * requires odd integers.
 */
export function buildZneFragment(
  _features: CircuitFeaturesV1,
  _profile: NoiseProfileV1,
  params: ZneParamsV1
): EstimatorOptionsFragmentV1 {
  assertFinite(params.noiseScalingFactor, "ZNE.noiseScalingFactor");
  if (params.noiseScalingFactor <= 0) {
    throw new InvalidParameterError(`ZNE.noiseScalingFactor must be > 0, got ${params.noiseScalingFactor}`);
  }
  assertPositiveInt(params.numRandomizations, "ZNE.numRandomizations");
  assertPositiveInt(params.shotsPerRandomization, "ZNE.shotsPerRandomization");

  const factors = params.noiseFactors;
  if (factors.length < 2) throw new InvalidParameterError("ZNE.noiseFactors needs at least two points to extrapolate");
  if (factors[0] !== 1) throw new InvalidParameterError(`ZNE.noiseFactors must start at 1, got ${factors[0]}`);
  factors.forEach((f, i) => {
    assertFinite(f, `ZNE.noiseFactors[${i}]`);
    if (i > 0 && f <= factors[i - 1]) throw new InvalidParameterError("ZNE.noiseFactors must be strictly increasing");
    if (isFoldingAmplifier(params.amplifier) && !(Number.isInteger(f) && f % 2 === 1)) {
      throw new InvalidParameterError(`ZNE.noiseFactors[${i}]=${f} must be an odd integer under ${params.amplifier}`);
    }
  });

  return {
    resilience_level: 2,
    resilience: {
      zne_mitigation: true,
      zne: {
        noise_factors: [...factors],
        extrapolator: params.extrapolator,
        amplifier: params.amplifier,
      },
    },
    twirling: {
      enable_gates: true,
      num_randomizations: params.numRandomizations,
      shots_per_randomization: params.shotsPerRandomization,
    },
  };
}
