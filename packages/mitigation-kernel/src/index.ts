export * from "./errors";
export { contentHash, deepFreeze, sha256Hex, stableStringify } from "./util";

export { CIRCUIT_FEATURES_SCHEMA_VERSION, extractCircuitFeatures, longestIdleWindow } from "./features/circuit_features";
export { SENSITIVITY_SCORE_SCHEMA_VERSION, analyzeSensitivity, buildRegions, decoherenceProbability, gateErrorRate } from "./analysis/sensitivity";
export {
  STRATEGY_DECISION_SCHEMA_VERSION,
  idleDensity,
  maxMeasuredReadoutError,
  selectStrategy,
  shotsPerRandomization,
  zneNoiseFactors,
  type SelectStrategyInput,
} from "./selector/strategy_selector";
export { evaluateSessionStability, profileDrift, type SessionStabilityResult } from "./selector/session_stability";
export {
  baseEstimatorOptions,
  buildDdFragment,
  buildEstimatorOptions,
  buildFragment,
  buildTrexFragment,
  buildZneFragment,
  mergeFragments,
} from "./strategies";
