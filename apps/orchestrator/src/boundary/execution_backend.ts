import type { BackendRefV1, EstimatorOptionsV1, ExecutionMode, JobStatus, TranspiledCircuitV1 } from "@qem/contracts";

export type SubmitJobInput = {
  backend: BackendRefV1;
  circuit: TranspiledCircuitV1;
  observables: unknown;
  options: EstimatorOptionsV1;
  mode: ExecutionMode;
};

/**
 * Remote execution service. The engine never runs circuits itself; it reads
 * calibration data, hands over a configured job and polls its status.
 */
export interface ExecutionBackend {
  // raw telemetry; validated by the noise collector
  getCalibrationData(ref: BackendRefV1, signal: AbortSignal): Promise<unknown>;
  // returns the boundary-assigned job id
  submit(input: SubmitJobInput): Promise<string>;
  getStatus(jobId: string): Promise<JobStatus>;
}
