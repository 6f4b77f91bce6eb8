import type { CircuitFeaturesV1, EstimatorOptionsFragmentV1, NoiseProfileV1, TrexParamsV1 } from "@qem/contracts";

import { InvalidParameterError } from "../errors";
import { assertPositiveInt } from "./validate";

/**
 * Twirled readout error extinction: measurement twirling plus learned
 * readout noise. Maps to resilience level 1.
 *
 * The randomization counts belong to readout noise learning only; the
 * `twirling.*` counts are left to gate twirling.
 */
export function buildTrexFragment(
  features: CircuitFeaturesV1,
  _profile: NoiseProfileV1,
  params: TrexParamsV1
): EstimatorOptionsFragmentV1 {
  assertPositiveInt(params.numRandomizations, "TREX.numRandomizations");
  assertPositiveInt(params.shotsPerRandomization, "TREX.shotsPerRandomization");
  const measured = new Set(features.measuredQubits);
  for (const q of params.triggeringQubits) {
    if (!measured.has(q)) throw new InvalidParameterError(`TREX.triggeringQubits: qubit ${q} is not measured by the circuit`);
  }

  return {
    resilience_level: 1,
    resilience: {
      measure_mitigation: true,
      measure_noise_learning: {
        num_randomizations: params.numRandomizations,
        shots_per_randomization: params.shotsPerRandomization,
      },
    },
    twirling: { enable_measure: true },
  };
}
