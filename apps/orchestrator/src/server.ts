import path from "node:path";
import { fileURLToPath } from "node:url";

import Fastify from "fastify";

import { HttpExecutionBackend } from "./boundary/http_backend";
import { loadDefaultConfig } from "./config/ssot";
import { registerMitigationRoutes } from "./routes";
import { MitigationRuntime } from "./runtime";
import { PgJobLedger } from "./store/pg_job_ledger";
import { loadEnv } from "./util";

loadEnv(path.dirname(fileURLToPath(import.meta.url)));

const BACKEND_URL = process.env.QEM_BACKEND_URL ?? "";
if (!BACKEND_URL) {
  throw new Error("Missing QEM_BACKEND_URL");
}

const app = Fastify({ logger: { level: process.env.LOG_LEVEL ?? "info" } });

app.addHook("onRequest", async (req, reply) => {
  reply.header("Access-Control-Allow-Origin", "*");
  reply.header("Access-Control-Allow-Headers", "content-type");
  reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  if (req.method === "OPTIONS") return reply.code(204).send();
});

async function main(): Promise<void> {
  const backend = new HttpExecutionBackend({ baseUrl: BACKEND_URL, token: process.env.QEM_BACKEND_TOKEN ?? "" });

  let ledger: PgJobLedger | undefined;
  if (process.env.DATABASE_URL) {
    ledger = new PgJobLedger(process.env.DATABASE_URL);
    await ledger.ping();
    await ledger.ensureSchema();
  }

  const runtime = new MitigationRuntime({ backend, config: loadDefaultConfig(), log: app.log, ledger });
  registerMitigationRoutes(app, runtime);
  if (ledger) {
    const l = ledger;
    app.addHook("onClose", async () => {
      await l.close();
    });
  }

  const port = Number(process.env.PORT ?? 3110);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
