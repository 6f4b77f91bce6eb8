// Backend Noise Profile Collector.
//
// One calibration read per call, no caching. Everything that prevents a
// trustworthy hardware snapshot surfaces as BackendUnavailableError.

import {
  gateKey,
  NoiseProfileV1Z,
  qubitKey,
  RawCalibrationV1Z,
  type BackendRefV1,
  type NoiseProfileV1,
  type RawCalibrationV1,
} from "@qem/contracts";
import { BackendUnavailableError, MitigationError, RequestCancelledError, deepFreeze } from "@qem/mitigation-kernel";

import type { ExecutionBackend } from "../boundary/execution_backend";
import { errorMessage, monotonicMs } from "../util";

export const NOISE_PROFILE_SCHEMA_VERSION = "1.0.0";

// Reported alongside gates but not gate errors for scoring purposes.
const NON_GATE_ENTRIES = new Set(["measure", "reset", "delay", "barrier"]);

export type CollectOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  clock?: () => number;
};

function fetchWithDeadline(
  backend: ExecutionBackend,
  ref: BackendRefV1,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<unknown> {
  return new Promise<unknown>((resolve, reject) => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort();
      reject(new BackendUnavailableError(`calibration fetch for ${ref.name} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const onCancel = (): void => {
      controller.abort();
      reject(new RequestCancelledError());
    };
    outer?.addEventListener("abort", onCancel, { once: true });
    const settle = (): void => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onCancel);
    };

    void backend.getCalibrationData(ref, controller.signal).then(
      (data) => {
        settle();
        resolve(data);
      },
      (err: unknown) => {
        settle();
        reject(
          err instanceof MitigationError
            ? err
            : new BackendUnavailableError(`calibration fetch for ${ref.name} failed: ${errorMessage(err)}`, { cause: err })
        );
      }
    );
  });
}

function mean(xs: ReadonlyArray<number>): number | undefined {
  if (xs.length === 0) return undefined;
  return xs.reduce((s, x) => s + x, 0) / xs.length;
}

function readoutError(q: RawCalibrationV1["qubits"][number]): number {
  if (q.readout_error != null) return q.readout_error;
  // assignment-matrix fallback: mean of the two flip probabilities
  const flips = [q.prob_meas1_prep0, q.prob_meas0_prep1].filter((p): p is number => p != null);
  return mean(flips) ?? 0;
}

/** Pure conversion of validated telemetry into a snapshot. */
export function buildNoiseProfile(raw: RawCalibrationV1, timestamp: number, capturedAt: string): NoiseProfileV1 {
  const perQubitErrorRate: Record<string, number> = {};
  const readoutErrorRate: Record<string, number> = {};
  const t1: Record<string, number> = {};
  const t2: Record<string, number> = {};
  const perGateErrorRate: Record<string, number> = {};
  const singleQubitErrors = new Map<number, number[]>();

  for (const g of raw.gates) {
    if (NON_GATE_ENTRIES.has(g.gate) || g.error == null) continue;
    perGateErrorRate[gateKey(g.gate, g.qubits)] = g.error;
    if (g.qubits.length === 1) {
      const list = singleQubitErrors.get(g.qubits[0]) ?? [];
      list.push(g.error);
      singleQubitErrors.set(g.qubits[0], list);
    }
  }

  for (const q of raw.qubits) {
    const k = qubitKey(q.qubit);
    perQubitErrorRate[k] = mean(singleQubitErrors.get(q.qubit) ?? []) ?? 0;
    readoutErrorRate[k] = readoutError(q);
    if (q.t1 != null) t1[k] = q.t1;
    if (q.t2 != null) t2[k] = q.t2;
  }

  return NoiseProfileV1Z.parse({
    type: "noise_profile_v1",
    schema_version: NOISE_PROFILE_SCHEMA_VERSION,
    backendName: raw.backend_name,
    perQubitErrorRate,
    perGateErrorRate,
    readoutErrorRate,
    t1,
    t2,
    dt: raw.dt ?? null,
    timestamp,
    capturedAt,
  });
}

export async function collectNoiseProfile(
  backend: ExecutionBackend,
  ref: BackendRefV1,
  opts: CollectOptions
): Promise<NoiseProfileV1> {
  if (ref.simulator) {
    throw new BackendUnavailableError(`backend ${ref.name} is a simulator; it has no hardware noise to profile`);
  }
  if (opts.signal?.aborted) throw new RequestCancelledError();

  const data = await fetchWithDeadline(backend, ref, opts.timeoutMs, opts.signal);

  const parsed = RawCalibrationV1Z.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new BackendUnavailableError(`malformed calibration data from ${ref.name}: ${detail}`);
  }
  const raw = parsed.data;
  if (raw.simulator) {
    throw new BackendUnavailableError(`backend ${ref.name} reports itself as a simulator`);
  }
  if (raw.backend_name !== ref.name) {
    throw new BackendUnavailableError(`calibration for ${raw.backend_name} returned when ${ref.name} was requested`);
  }
  if (raw.qubits.length === 0) {
    throw new BackendUnavailableError(`backend ${ref.name} reported no qubit calibration`);
  }

  const clock = opts.clock ?? monotonicMs;
  try {
    return deepFreeze(buildNoiseProfile(raw, clock(), new Date().toISOString()));
  } catch (err) {
    throw new BackendUnavailableError(`calibration data from ${ref.name} is out of range: ${errorMessage(err)}`, { cause: err });
  }
}
