import test from "node:test";
import assert from "node:assert/strict";

import type { PubV1, TranspiledCircuitV1 } from "@qem/contracts";
import { InvalidRequestError } from "@qem/mitigation-kernel";

import { ConfigOverrideRejected, MitigationRuntime, type PubRunResult } from "../index";
import {
  FAKE,
  FakeBackend,
  MemoryJobLedger,
  OBSERVABLES,
  TestClock,
  defaultConfig,
  denseCalibration,
  denseCxChain,
  efficientSu2,
  ghzCalibration,
  ghzEcho,
  rawCalibration,
  su2Calibration,
} from "./fixtures";

const cfg = defaultConfig();

function pub(circuit: TranspiledCircuitV1): PubV1 {
  return { circuit, observables: OBSERVABLES };
}

function runtime(backend: FakeBackend, extra: { ledger?: MemoryJobLedger; clock?: TestClock } = {}): MitigationRuntime {
  return new MitigationRuntime({ backend, config: cfg, ledger: extra.ledger, clock: extra.clock?.now });
}

function okJob(res: PubRunResult | undefined) {
  assert.ok(res);
  if (!res.ok) throw new Error(`item failed at ${res.failedState}: ${res.error.message}`);
  return res;
}

test("idle-heavy circuit on a clean backend selects DD only", async () => {
  const results = await runtime(new FakeBackend(ghzCalibration(0.01))).run([pub(ghzEcho())], FAKE, "single");
  const { job, estOptions } = okJob(results[0]);

  assert.deepEqual(job.decision.selectedTechniques, ["DD"]);
  assert.deepEqual(estOptions.dynamical_decoupling, {
    enable: true,
    sequence_type: "XX",
    scheduling_method: "alap",
    targets: [
      { qubit: 0, repetitions: 6, duty_cycle: 0.96 },
      { qubit: 2, repetitions: 3, duty_cycle: 960 / 1160 },
    ],
  });
  assert.equal(estOptions.resilience_level, 0);
  assert.equal(estOptions.default_shots, 4096);
});

test("high readout error adds TREX to DD", async () => {
  const results = await runtime(new FakeBackend(ghzCalibration(0.08))).run([pub(ghzEcho())], FAKE, "single");
  const { job, estOptions } = okJob(results[0]);

  assert.deepEqual(job.decision.selectedTechniques, ["TREX", "DD"]);
  assert.equal(estOptions.resilience_level, 1);
  assert.equal(estOptions.resilience.measure_mitigation, true);
  assert.equal(estOptions.twirling.enable_measure, true);
  assert.deepEqual(estOptions.resilience.measure_noise_learning, { num_randomizations: 32, shots_per_randomization: 128 });
  assert.equal(estOptions.dynamical_decoupling.enable, true);
});

test("high overall score on a dense circuit selects ZNE only", async () => {
  const results = await runtime(new FakeBackend(denseCalibration())).run([pub(denseCxChain())], FAKE, "single");
  const { job, estOptions } = okJob(results[0]);

  assert.deepEqual(job.decision.selectedTechniques, ["ZNE"]);
  assert.ok(Math.abs(job.decision.overallScore - 0.9) < 1e-9);
  assert.ok(Math.abs((job.decision.parameters.ZNE?.noiseScalingFactor ?? 0) - 0.9) < 1e-9);
  assert.deepEqual(estOptions.resilience.zne?.noise_factors, [1, 3, 5]);
  assert.equal(estOptions.resilience_level, 2);
  assert.equal(estOptions.dynamical_decoupling.enable, false);
});

test("TREX and ZNE compose when their randomization counts differ", async () => {
  const config = { ...cfg, trex: { ...cfg.trex, num_randomizations: 16 } };
  const backend = new FakeBackend(rawCalibration({ numQubits: 2, readout: 0.08, oneQubitError: 0.001, cx: { "0,1": 0.14 } }));
  const results = await new MitigationRuntime({ backend, config }).run([pub(denseCxChain())], FAKE, "single");
  const { job, estOptions } = okJob(results[0]);

  assert.deepEqual(job.decision.selectedTechniques, ["TREX", "ZNE"]);
  assert.equal(estOptions.resilience_level, 2);
  assert.deepEqual(estOptions.resilience.measure_noise_learning, { num_randomizations: 16, shots_per_randomization: 256 });
  assert.deepEqual(estOptions.twirling, { enable_gates: true, enable_measure: true, num_randomizations: 32, shots_per_randomization: 128 });
  assert.equal(backend.submitted.length, 1);
});

test("a batch of parameterisations gets independent snapshots and records", async () => {
  const backend = new FakeBackend(su2Calibration(0.01), su2Calibration(0.02), su2Calibration(0.06), su2Calibration(0.08));
  const ledger = new MemoryJobLedger();
  const names = ["su2_theta_0", "su2_theta_1", "su2_theta_2", "su2_theta_3"];
  const results = await runtime(backend, { ledger }).run(names.map((n) => pub(efficientSu2(n))), FAKE, "batch");

  const jobs = results.map((r) => okJob(r).job);
  assert.equal(backend.calibrationCalls, 4);
  assert.deepEqual(
    jobs.map((j) => j.jobId),
    ["job_1", "job_2", "job_3", "job_4"]
  );
  assert.deepEqual(
    jobs.map((j) => j.decision.selectedTechniques),
    [["DD"], ["DD"], ["TREX", "DD"], ["TREX", "DD"]]
  );
  assert.equal(new Set(jobs.map((j) => j.decision.decisionHash)).size, 4);
  for (const j of jobs) {
    assert.equal(j.mode, "batch");
    assert.equal(j.decision.rationale.length, 5);
    assert.ok(Object.isFrozen(j.decision));
  }
  assert.equal(ledger.records.length, 4);
});

test("one failing item does not stop its siblings", async () => {
  const backend = new FakeBackend(ghzCalibration(0.01));
  const results = await runtime(backend).run([pub({ ...ghzEcho(), layout: null }), pub(ghzEcho())], FAKE, "batch");

  assert.equal(results[0]?.ok, false);
  assert.equal(results[1]?.ok, true);
  assert.equal(backend.submitted.length, 1);
});

test("single mode takes exactly one pub", async () => {
  const rt = runtime(new FakeBackend(ghzCalibration(0.01)));
  await assert.rejects(
    rt.run([pub(ghzEcho()), pub(ghzEcho())], FAKE, "single"),
    (e: unknown) => e instanceof InvalidRequestError && e.message === "single mode takes exactly one pub, got 2"
  );
  await assert.rejects(rt.run([], FAKE, "batch"), InvalidRequestError);
});

test("a rejected override fails the whole call before any fetch", async () => {
  const backend = new FakeBackend(ghzCalibration(0.01));
  await assert.rejects(
    runtime(backend).run([pub(ghzEcho())], FAKE, "single", { ddThreshold: 2 }),
    (e: unknown) => e instanceof ConfigOverrideRejected && e.status === 400 && e.errors[0]?.code === "VALUE_OUT_OF_RANGE"
  );
  assert.equal(backend.calibrationCalls, 0);
});

test("a per-call threshold override changes the decision and the config hash", async () => {
  const rt = runtime(new FakeBackend(ghzCalibration(0.01)));
  const results = await rt.run([pub(ghzEcho())], FAKE, "single", { trexThreshold: 0.005, shots: 1000 });
  const { job, estOptions } = okJob(results[0]);

  assert.deepEqual(job.decision.selectedTechniques, ["TREX", "DD"]);
  assert.equal(estOptions.default_shots, 1000);
  assert.equal(estOptions.resilience.measure_noise_learning?.shots_per_randomization, 32);
  assert.notEqual(job.effectiveConfigHash, rt.manifest().ssot.ssot_hash);
});

test("session reuses the decision while the backend is stable", async () => {
  const clock = new TestClock();
  const backend = new FakeBackend(ghzCalibration(0.01));
  const session = runtime(backend, { clock }).openSession(FAKE);

  const first = okJob((await session.run([pub(ghzEcho())]))[0]).job;
  clock.t = 1000;
  const second = okJob((await session.run([pub(ghzEcho())]))[0]).job;

  assert.equal(backend.calibrationCalls, 1);
  assert.deepEqual(first.trace.states, ["Idle", "Extracting", "ProfilingNoise", "Scoring", "Selecting", "Applying", "Submitted", "Success"]);
  assert.deepEqual(first.trace.sessionStability, {
    reused: false,
    drift: 0,
    driftThreshold: 0.02,
    refreshed: false,
    rationale: { ruleId: "R6-session-stability", outcome: "not_triggered", triggeringValue: 0, threshold: 0.02 },
  });
  assert.deepEqual(second.trace.states, ["Idle", "ProfilingNoise", "Applying", "Submitted", "Success"]);
  assert.deepEqual(second.trace.sessionStability, {
    reused: true,
    drift: 0,
    driftThreshold: 0.02,
    refreshed: false,
    rationale: { ruleId: "R6-session-stability", outcome: "triggered", triggeringValue: 0, threshold: 0.02 },
  });
  assert.equal(second.decision.decisionHash, first.decision.decisionHash);
  assert.equal(second.mode, "session");
});

test("session re-selects once a refresh shows drift", async () => {
  const clock = new TestClock();
  const backend = new FakeBackend(ghzCalibration(0.01), ghzCalibration(0.08));
  const session = runtime(backend, { clock }).openSession(FAKE);

  const first = okJob((await session.run([pub(ghzEcho())]))[0]).job;
  clock.t = cfg.session.refresh_cadence_ms;
  const second = okJob((await session.run([pub(ghzEcho())]))[0]).job;

  assert.equal(backend.calibrationCalls, 2);
  assert.deepEqual(first.decision.selectedTechniques, ["DD"]);
  assert.deepEqual(second.decision.selectedTechniques, ["TREX", "DD"]);
  assert.deepEqual(second.trace.states, ["Idle", "ProfilingNoise", "Scoring", "Selecting", "Applying", "Submitted", "Success"]);
  const stability = second.trace.sessionStability;
  assert.ok(stability);
  assert.equal(stability.reused, false);
  assert.equal(stability.refreshed, true);
  assert.ok(Math.abs(stability.drift - 0.07) < 1e-12);
  assert.equal(stability.rationale.ruleId, "R6-session-stability");
  assert.equal(stability.rationale.outcome, "not_triggered");
  assert.equal(stability.rationale.threshold, 0.02);
});

test("concurrent jobs in one session fetch once and reuse the first decision", async () => {
  const backend = new FakeBackend(ghzCalibration(0.01));
  const session = runtime(backend, { clock: new TestClock() }).openSession(FAKE);

  const batches = await Promise.all([1, 2, 3].map(() => session.run([pub(ghzEcho())])));
  const jobs = batches.map((b) => okJob(b[0]).job);

  assert.equal(backend.calibrationCalls, 1);
  assert.deepEqual(
    jobs.map((j) => j.trace.sessionStability?.reused),
    [false, true, true]
  );
  assert.equal(new Set(jobs.map((j) => j.decision.decisionHash)).size, 1);
  assert.deepEqual(jobs.map((j) => j.jobId).sort(), ["job_1", "job_2", "job_3"]);
});

test("session mode through run shares one session across its pubs", async () => {
  const backend = new FakeBackend(ghzCalibration(0.01));
  const results = await runtime(backend, { clock: new TestClock() }).run([pub(ghzEcho()), pub(ghzEcho())], FAKE, "session");

  assert.equal(backend.calibrationCalls, 1);
  assert.equal(okJob(results[1]).job.trace.sessionStability?.reused, true);
});

test("status delegates to the backend and listJobs needs a ledger", async () => {
  const backend = new FakeBackend(ghzCalibration(0.01));
  backend.status = "RUNNING";
  const ledger = new MemoryJobLedger();
  const rt = runtime(backend, { ledger });

  assert.equal(await rt.status("job_1"), "RUNNING");
  await assert.rejects(rt.status("  "), InvalidRequestError);

  await rt.run([pub(ghzEcho())], FAKE, "single");
  assert.deepEqual(
    (await rt.listJobs(10)).map((j) => j.jobId),
    ["job_1"]
  );
  assert.equal(rt.hasLedger, true);
  await assert.rejects(runtime(backend).listJobs(), InvalidRequestError);
});
