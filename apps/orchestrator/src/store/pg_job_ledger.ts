import { Pool } from "pg";

import { JobRecordV1Z, type JobRecordV1 } from "@qem/contracts";

import type { JobLedger } from "./job_ledger";

type JobRecordRow = {
  record_json: unknown; // jsonb, parsed by pg
};

export class PgJobLedger implements JobLedger {
  private pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async ping(): Promise<void> {
    const r = await this.pool.query("select 1 as ok");
    if (!r.rows.length) throw new Error("pg ping failed");
  }

  async ensureSchema(): Promise<void> {
    await this.pool.query(
      `create table if not exists mitigation_job_records (
         job_id text primary key,
         backend_name text not null,
         mode text not null,
         decision_hash text not null,
         effective_config_hash text not null,
         created_at timestamptz not null,
         record_json jsonb not null
       )`
    );
  }

  async append(record: JobRecordV1): Promise<void> {
    // records are immutable: a replayed job id keeps its first record
    await this.pool.query(
      `insert into mitigation_job_records
         (job_id, backend_name, mode, decision_hash, effective_config_hash, created_at, record_json)
       values ($1, $2, $3, $4, $5, $6::timestamptz, $7::jsonb)
       on conflict (job_id) do nothing`,
      [
        record.jobId,
        record.backendName,
        record.mode,
        record.decision.decisionHash,
        record.effectiveConfigHash,
        record.createdAt,
        JSON.stringify(record),
      ]
    );
  }

  async listRecent(limit: number): Promise<JobRecordV1[]> {
    const r = await this.pool.query<JobRecordRow>(
      `select record_json from mitigation_job_records order by created_at desc, job_id asc limit $1`,
      [limit]
    );
    return r.rows.map((row) => JobRecordV1Z.parse(row.record_json));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
