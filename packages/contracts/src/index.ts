export * from "./schema/common_v1";
export * from "./schema/circuit_v1";
export * from "./schema/circuit_features_v1";
export * from "./schema/calibration_v1";
export * from "./schema/noise_profile_v1";
export * from "./schema/sensitivity_score_v1";
export * from "./schema/strategy_decision_v1";
export * from "./schema/estimator_options_v1";
export * from "./schema/execution_request_v1";
export * from "./schema/job_record_v1";
export * from "./schema/mitigation_config_v1";
