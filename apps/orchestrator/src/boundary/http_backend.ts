import { JobStatusZ, type BackendRefV1, type JobStatus } from "@qem/contracts";
import { BackendUnavailableError, SubmissionError } from "@qem/mitigation-kernel";
import { z } from "zod";

import { errorMessage } from "../util";
import type { ExecutionBackend, SubmitJobInput } from "./execution_backend";

export type HttpExecutionBackendOptions = {
  baseUrl: string;
  token: string;
  fetchImpl?: typeof fetch;
};

const SubmitResponseZ = z.object({ job_id: z.string().min(1) }).passthrough();
const StatusResponseZ = z.object({ status: JobStatusZ }).passthrough();

type RawResponse = { status: number; ok: boolean; text: string };

/**
 * ExecutionBackend over HTTP with bearer auth:
 *   GET  /backends/:name/properties
 *   POST /jobs
 *   GET  /jobs/:id
 */
export class HttpExecutionBackend implements ExecutionBackend {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: HttpExecutionBackendOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.token = opts.token;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private async request(pathname: string, init: RequestInit): Promise<RawResponse> {
    const headers: Record<string, string> = { Accept: "application/json", Authorization: `Bearer ${this.token}` };
    if (init.body) headers["Content-Type"] = "application/json";
    const res = await this.fetchImpl(`${this.baseUrl}${pathname}`, { ...init, headers });
    // body kept as text so failures can be surfaced verbatim
    const text = await res.text();
    return { status: res.status, ok: res.ok, text };
  }

  async getCalibrationData(ref: BackendRefV1, signal: AbortSignal): Promise<unknown> {
    let res: RawResponse;
    try {
      res = await this.request(`/backends/${encodeURIComponent(ref.name)}/properties`, { method: "GET", signal });
    } catch (err) {
      if (signal.aborted) throw err;
      throw new BackendUnavailableError(`backend ${ref.name} unreachable: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      throw new BackendUnavailableError(`backend ${ref.name} properties: http ${res.status}: ${res.text}`);
    }
    try {
      return JSON.parse(res.text);
    } catch (err) {
      throw new BackendUnavailableError(`backend ${ref.name} returned non-JSON properties`, { cause: err });
    }
  }

  async submit(input: SubmitJobInput): Promise<string> {
    const body = JSON.stringify({
      backend: input.backend.name,
      mode: input.mode,
      pub: { circuit: input.circuit, observables: input.observables },
      options: input.options,
    });
    const res = await this.request("/jobs", { method: "POST", body });
    if (!res.ok) throw new SubmissionError(res.status, res.text);

    let parsed: unknown;
    try {
      parsed = JSON.parse(res.text);
    } catch {
      throw new SubmissionError(res.status, res.text);
    }
    const out = SubmitResponseZ.safeParse(parsed);
    if (!out.success) throw new SubmissionError(res.status, res.text);
    return out.data.job_id;
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    let res: RawResponse;
    try {
      res = await this.request(`/jobs/${encodeURIComponent(jobId)}`, { method: "GET" });
    } catch (err) {
      throw new BackendUnavailableError(`job status for ${jobId} unreachable: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) throw new BackendUnavailableError(`job status for ${jobId}: http ${res.status}: ${res.text}`);

    let parsed: unknown;
    try {
      parsed = JSON.parse(res.text);
    } catch (err) {
      throw new BackendUnavailableError(`job status for ${jobId} is not JSON`, { cause: err });
    }
    const out = StatusResponseZ.safeParse(parsed);
    if (!out.success) throw new BackendUnavailableError(`job status for ${jobId} has unexpected shape: ${res.text}`);
    return out.data.status;
  }
}
