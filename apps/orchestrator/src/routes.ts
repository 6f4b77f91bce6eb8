import type { FastifyInstance } from "fastify";

import { BackendUnavailableError, InvalidRequestError } from "@qem/mitigation-kernel";

import { ConfigOverrideRejected } from "./config/patch";
import { formatZodIssues, RunRequestV1Z } from "./run_request";
import type { MitigationRuntime } from "./runtime";
import { assertInt } from "./util";

type JobParams = { jobId: string };
type ListQuery = { limit?: string };

export function registerMitigationRoutes(app: FastifyInstance, runtime: MitigationRuntime): void {
  app.post("/api/mitigation/run", async (req, reply) => {
    const parsed = RunRequestV1Z.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ ok: false, errors: formatZodIssues(parsed.error) });
    }
    const { pubs, backend, mode, config } = parsed.data;

    // a client that hangs up cancels whatever has not been submitted yet
    const controller = new AbortController();
    reply.raw.on("close", () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    try {
      const results = await runtime.run(pubs, backend, mode, config, { signal: controller.signal });
      return reply.send({ ok: true, results });
    } catch (e) {
      if (e instanceof ConfigOverrideRejected) {
        return reply.code(e.status).send({ ok: false, errors: e.errors });
      }
      if (e instanceof InvalidRequestError) {
        return reply.code(400).send({ ok: false, errors: [e.message] });
      }
      throw e;
    }
  });

  app.get<{ Params: JobParams }>("/api/mitigation/jobs/:jobId/status", async (req, reply) => {
    try {
      const status = await runtime.status(req.params.jobId);
      return reply.send({ ok: true, jobId: req.params.jobId, status });
    } catch (e) {
      if (e instanceof BackendUnavailableError) {
        return reply.code(503).send({ ok: false, errors: [e.message] });
      }
      if (e instanceof InvalidRequestError) {
        return reply.code(400).send({ ok: false, errors: [e.message] });
      }
      throw e;
    }
  });

  app.get("/api/mitigation/config", async (_req, reply) => {
    return reply.send(runtime.manifest());
  });

  app.get<{ Querystring: ListQuery }>("/api/mitigation/jobs", async (req, reply) => {
    if (!runtime.hasLedger) {
      return reply.code(404).send({ ok: false, errors: ["no job ledger configured"] });
    }
    let limit = 100;
    try {
      if (typeof req.query.limit !== "undefined") limit = assertInt(req.query.limit, "limit");
    } catch (e) {
      return reply.code(400).send({ ok: false, errors: [e instanceof Error ? e.message : String(e)] });
    }
    return reply.send({ ok: true, jobs: await runtime.listJobs(Math.max(1, Math.min(limit, 500))) });
  });
}
