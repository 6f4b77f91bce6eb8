import { z } from "zod";

import { ProbabilityZ, QubitIndexZ } from "./common_v1";

/**
 * Raw calibration telemetry as reported by the execution backend.
 *
 * NOTE: the backend owns this shape. Unknown fields are tolerated
 * (passthrough) so that new calibration properties do not break intake,
 * but every field the collector reads is validated here.
 */
export const RawQubitCalibrationV1Z = z
  .object({
    qubit: QubitIndexZ,
    t1: z.number().finite().nonnegative().nullable().optional(), // seconds
    t2: z.number().finite().nonnegative().nullable().optional(), // seconds
    readout_error: ProbabilityZ.nullable().optional(),
    prob_meas1_prep0: ProbabilityZ.nullable().optional(),
    prob_meas0_prep1: ProbabilityZ.nullable().optional(),
  })
  .passthrough();

export const RawGateCalibrationV1Z = z
  .object({
    gate: z.string().min(1),
    qubits: z.array(QubitIndexZ).min(1),
    error: ProbabilityZ.nullable().optional(),
    duration: z.number().finite().nonnegative().nullable().optional(), // seconds
  })
  .passthrough();

export const RawCalibrationV1Z = z
  .object({
    backend_name: z.string().min(1),
    simulator: z.boolean().default(false),
    dt: z.number().positive().nullable().optional(),
    last_update_date: z.string().optional(),
    qubits: z.array(RawQubitCalibrationV1Z),
    gates: z.array(RawGateCalibrationV1Z).default([]),
  })
  .passthrough();

export type RawQubitCalibrationV1 = z.infer<typeof RawQubitCalibrationV1Z>;
export type RawGateCalibrationV1 = z.infer<typeof RawGateCalibrationV1Z>;
export type RawCalibrationV1 = z.infer<typeof RawCalibrationV1Z>;
