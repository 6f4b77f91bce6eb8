// In-process stand-ins for the execution backend and the job ledger, plus
// hand-built circuits and calibration payloads.

import path from "node:path";
import { fileURLToPath } from "node:url";

import type {
  BackendRefV1,
  CircuitInstructionV1,
  JobRecordV1,
  JobStatus,
  MitigationConfigV1,
  TranspiledCircuitV1,
} from "@qem/contracts";

import type { ExecutionBackend, SubmitJobInput } from "../boundary/execution_backend";
import { loadDefaultConfig } from "../config/ssot";
import type { JobLedger } from "../store/job_ledger";

export const REPO_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..");

export function defaultConfig(): MitigationConfigV1 {
  return loadDefaultConfig(REPO_ROOT);
}

export const FAKE: BackendRefV1 = { name: "fake_backend" };

export type RawCalibrationOptions = {
  numQubits: number;
  readout: number;
  oneQubitError?: number;
  cx?: Record<string, number>; // "a,b" -> error
  name?: string;
  simulator?: boolean;
};

export function rawCalibration(o: RawCalibrationOptions): Record<string, unknown> {
  const qubits: Record<string, unknown>[] = [];
  const gates: Record<string, unknown>[] = [];
  for (let q = 0; q < o.numQubits; q++) {
    qubits.push({ qubit: q, t1: 1.2e-4, t2: 9.0e-5, readout_error: o.readout });
    gates.push({ gate: "sx", qubits: [q], error: o.oneQubitError ?? 0.0005, duration: 3.5e-8 });
    gates.push({ gate: "measure", qubits: [q], error: 0.5 });
  }
  for (const [pair, error] of Object.entries(o.cx ?? {})) {
    gates.push({ gate: "cx", qubits: pair.split(",").map(Number), error });
  }
  return {
    backend_name: o.name ?? "fake_backend",
    simulator: o.simulator ?? false,
    dt: 2.2e-10,
    qubits,
    gates,
  };
}

export function ghzCalibration(readout: number): Record<string, unknown> {
  return rawCalibration({ numQubits: 3, readout, cx: { "0,1": 0.01, "1,2": 0.01 } });
}

export function denseCalibration(): Record<string, unknown> {
  return rawCalibration({ numQubits: 2, readout: 0.03, oneQubitError: 0.001, cx: { "0,1": 0.14 } });
}

export function su2Calibration(readout: number): Record<string, unknown> {
  return rawCalibration({ numQubits: 4, readout, cx: { "0,1": 0.01, "1,2": 0.01, "2,3": 0.01 } });
}

/**
 * Serves calibration payloads in order (the last one repeats) and assigns
 * sequential job ids.
 */
export class FakeBackend implements ExecutionBackend {
  calibrationCalls = 0;
  readonly submitted: SubmitJobInput[] = [];
  submitError: Error | undefined;
  statusError: Error | undefined;
  status: JobStatus = "QUEUED";
  // never answers; rejects only when its signal aborts
  hang = false;

  private readonly calibrations: unknown[];

  constructor(...calibrations: unknown[]) {
    this.calibrations = calibrations;
  }

  getCalibrationData(_ref: BackendRefV1, signal: AbortSignal): Promise<unknown> {
    this.calibrationCalls += 1;
    if (this.hang) {
      return new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    const i = Math.min(this.calibrationCalls, this.calibrations.length) - 1;
    return Promise.resolve(this.calibrations[i]);
  }

  async submit(input: SubmitJobInput): Promise<string> {
    if (this.submitError) throw this.submitError;
    this.submitted.push(input);
    return `job_${this.submitted.length}`;
  }

  async getStatus(_jobId: string): Promise<JobStatus> {
    if (this.statusError) throw this.statusError;
    return this.status;
  }
}

export class MemoryJobLedger implements JobLedger {
  readonly records: JobRecordV1[] = [];
  failWith: Error | undefined;

  async append(record: JobRecordV1): Promise<void> {
    if (this.failWith) throw this.failWith;
    if (this.records.some((r) => r.jobId === record.jobId)) return;
    this.records.push(record);
  }

  async listRecent(limit: number): Promise<JobRecordV1[]> {
    return [...this.records].reverse().slice(0, limit);
  }
}

/** Manually advanced monotonic clock. */
export class TestClock {
  t = 0;
  readonly now = (): number => this.t;
}

export function ghzEcho(): TranspiledCircuitV1 {
  const cx = (a: number, b: number): CircuitInstructionV1 => ({ name: "cx", qubits: [a, b], duration: 1000 });
  return {
    name: "ghz_echo",
    num_qubits: 3,
    layout: { initial: [0, 1, 2] },
    instructions: [
      { name: "h", qubits: [0], duration: 160 },
      cx(0, 1),
      cx(1, 2),
      cx(1, 2),
      cx(0, 1),
      { name: "h", qubits: [0], duration: 160 },
      { name: "measure", qubits: [0], duration: 1000 },
      { name: "measure", qubits: [1], duration: 1000 },
      { name: "measure", qubits: [2], duration: 1000 },
    ],
  };
}

/** Pre-scheduled, no idle time, heavy two-qubit error. */
export function denseCxChain(): TranspiledCircuitV1 {
  return {
    num_qubits: 2,
    layout: { initial: [0, 1] },
    duration: 1000,
    instructions: [
      { name: "cx", qubits: [0, 1], duration: 300, start: 0 },
      { name: "cx", qubits: [0, 1], duration: 300, start: 300 },
      { name: "cx", qubits: [0, 1], duration: 300, start: 600 },
      { name: "measure", qubits: [0], duration: 100, start: 900 },
      { name: "measure", qubits: [1], duration: 100, start: 900 },
    ],
  };
}

export function efficientSu2(name: string): TranspiledCircuitV1 {
  const rot = (q: number): CircuitInstructionV1 => ({ name: "sx", qubits: [q], duration: 160 });
  const cx = (a: number, b: number): CircuitInstructionV1 => ({ name: "cx", qubits: [a, b], duration: 1000 });
  const meas = (q: number): CircuitInstructionV1 => ({ name: "measure", qubits: [q], duration: 1000 });
  return {
    name,
    num_qubits: 4,
    layout: { initial: [0, 1, 2, 3] },
    instructions: [rot(0), rot(1), rot(2), rot(3), cx(0, 1), cx(1, 2), cx(2, 3), rot(0), rot(1), rot(2), rot(3), meas(0), meas(1), meas(2), meas(3)],
  };
}

export const OBSERVABLES = [{ pauli: "ZZI", coeff: 1 }];
