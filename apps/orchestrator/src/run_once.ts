// One-shot CLI: reads a run request (or a list of execution requests) from a
// JSON file, runs it against the HTTP backend and prints one line per pub.
//
//   tsx apps/orchestrator/src/run_once.ts --request req.json [--baseUrl URL] [--token T] [--config overrides.json]

import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { HttpExecutionBackend } from "./boundary/http_backend";
import { loadDefaultConfig } from "./config/ssot";
import { createLogger } from "./logger";
import { parseRequestFile } from "./run_request";
import { MitigationRuntime } from "./runtime";
import { loadEnv } from "./util";

type Args = {
  request: string;
  baseUrl: string;
  token: string;
  config?: string;
};

function parseArgs(argv: string[]): Args {
  const get = (k: string): string | undefined => {
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) return undefined;
    return v;
  };

  const request = get("request") ?? process.env.QEM_REQUEST_FILE;
  if (!request) throw new Error("missing request file (set --request or QEM_REQUEST_FILE)");
  const baseUrl = get("baseUrl") ?? process.env.QEM_BACKEND_URL ?? "http://127.0.0.1:8080";
  const token = get("token") ?? process.env.QEM_BACKEND_TOKEN ?? "";
  return { request, baseUrl, token, config: get("config") };
}

function readJson(fp: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(fp), "utf8"));
}

async function main(): Promise<void> {
  loadEnv(path.dirname(fileURLToPath(import.meta.url)));
  const args = parseArgs(process.argv.slice(2));
  const log = createLogger("qem-run-once");

  const req = parseRequestFile(readJson(args.request), args.config ? readJson(args.config) : undefined);
  const runtime = new MitigationRuntime({
    backend: new HttpExecutionBackend({ baseUrl: args.baseUrl, token: args.token }),
    config: loadDefaultConfig(),
    log,
  });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const results = await runtime.run(req.pubs, req.backend, req.mode, req.config, { signal: controller.signal });
  let failed = 0;
  results.forEach((r, i) => {
    if (r.ok) {
      log.info({ index: i, jobId: r.job.jobId, techniques: r.job.decision.selectedTechniques }, "submitted");
    } else {
      failed += 1;
      log.error({ index: i, failedState: r.failedState, jobId: r.jobId, error: r.error }, "failed");
    }
  });
  process.exitCode = failed > 0 ? 1 : 0;
}

main().catch((err: unknown) => {
  createLogger("qem-run-once").error({ err }, "run_once failed");
  process.exit(1);
});
