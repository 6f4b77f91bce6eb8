import type { JobRecordV1 } from "@qem/contracts";

/** Append-only record of submitted jobs. The pipeline works without one. */
export interface JobLedger {
  append(record: JobRecordV1): Promise<void>;
  listRecent(limit: number): Promise<JobRecordV1[]>;
}
