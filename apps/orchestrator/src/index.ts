export * from "./boundary/execution_backend";
export * from "./boundary/http_backend";
export * from "./config/patch";
export * from "./config/ssot";
export * from "./logger";
export * from "./noise/collector";
export * from "./pipeline";
export * from "./routes";
export * from "./run_request";
export * from "./runtime";
export * from "./session";
export * from "./store/job_ledger";
export * from "./store/pg_job_ledger";
