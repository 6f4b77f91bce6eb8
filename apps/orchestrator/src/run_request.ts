import { z } from "zod";

import {
  BackendRefV1Z,
  ExecutionModeZ,
  ExecutionRequestV1Z,
  PubV1Z,
  type BackendRefV1,
  type ExecutionMode,
  type ExecutionRequestV1,
  type PubV1,
} from "@qem/contracts";
import { InvalidRequestError } from "@qem/mitigation-kernel";

// Body of POST /api/mitigation/run and of a run_once request file.
export const RunRequestV1Z = z
  .object({
    pubs: z.array(PubV1Z).min(1),
    backend: BackendRefV1Z,
    mode: ExecutionModeZ,
    config: z.unknown().optional(),
  })
  .strict();

export type RunRequestV1 = z.infer<typeof RunRequestV1Z>;

export type GroupedRequests = {
  pubs: PubV1[];
  backend: BackendRefV1;
  mode: ExecutionMode;
};

/** Collapses single-pub execution requests into one batch; they must agree on backend and mode. */
export function groupExecutionRequests(reqs: ReadonlyArray<ExecutionRequestV1>): GroupedRequests {
  const first = reqs[0];
  if (!first) throw new InvalidRequestError("no execution requests");
  for (const r of reqs) {
    if (r.backend.name !== first.backend.name || r.mode !== first.mode) {
      throw new InvalidRequestError(
        `requests must share backend and mode: ${first.backend.name}/${first.mode} vs ${r.backend.name}/${r.mode}`
      );
    }
  }
  return { pubs: reqs.map((r) => r.pub), backend: first.backend, mode: first.mode };
}

export function formatZodIssues(err: z.ZodError): string[] {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/** A run request object, or an array of single-pub execution requests. */
export function parseRequestFile(input: unknown, config?: unknown): RunRequestV1 {
  if (Array.isArray(input)) {
    const reqs = z.array(ExecutionRequestV1Z).min(1).safeParse(input);
    if (!reqs.success) throw new InvalidRequestError(`invalid execution requests: ${formatZodIssues(reqs.error).join("; ")}`);
    return { ...groupExecutionRequests(reqs.data), config };
  }
  const run = RunRequestV1Z.safeParse(input);
  if (!run.success) throw new InvalidRequestError(`invalid run request: ${formatZodIssues(run.error).join("; ")}`);
  return config === undefined ? run.data : { ...run.data, config };
}
