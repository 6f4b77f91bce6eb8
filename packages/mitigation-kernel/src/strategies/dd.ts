import type { CircuitFeaturesV1, DdParamsV1, EstimatorOptionsFragmentV1, NoiseProfileV1 } from "@qem/contracts";

import { InvalidParameterError } from "../errors";
import { longestIdleWindow } from "../features/circuit_features";
import { assertFinite, assertPositiveInt } from "./validate";

// Dynamical decoupling fills idle windows with identity-equivalent pulse trains.
export function buildDdFragment(
  features: CircuitFeaturesV1,
  _profile: NoiseProfileV1,
  params: DdParamsV1
): EstimatorOptionsFragmentV1 {
  assertPositiveInt(params.pulseDurationDt, "DD.pulseDurationDt");

  const touched = new Set(features.physicalQubits);
  const seen = new Set<number>();
  for (const t of params.targets) {
    if (!touched.has(t.qubit)) throw new InvalidParameterError(`DD target qubit ${t.qubit} is not used by the circuit`);
    if (seen.has(t.qubit)) throw new InvalidParameterError(`DD target qubit ${t.qubit} listed twice`);
    seen.add(t.qubit);
    assertPositiveInt(t.repetitions, `DD.targets[${t.qubit}].repetitions`);
    assertFinite(t.dutyCycle, `DD.targets[${t.qubit}].dutyCycle`);
    if (t.dutyCycle <= 0 || t.dutyCycle > 1) {
      throw new InvalidParameterError(`DD.targets[${t.qubit}].dutyCycle must be in (0, 1], got ${t.dutyCycle}`);
    }
    if (t.longestIdleDt > longestIdleWindow(features, t.qubit)) {
      throw new InvalidParameterError(`DD target qubit ${t.qubit} claims an idle window longer than the circuit has`);
    }
  }

  return {
    dynamical_decoupling: {
      enable: true,
      sequence_type: params.sequenceType,
      scheduling_method: params.schedulingMethod,
      targets: params.targets.map((t) => ({ qubit: t.qubit, repetitions: t.repetitions, duty_cycle: t.dutyCycle })),
    },
  };
}
