/**
 * Server-side record of a database export job: the cursor token to resume from,
 * where the dump is being written and the counters reported to the client.
 */
import { ProtocolError } from "$shared/errors";
import { z } from "zod";
import { JOB_TTL_SECONDS, parseStored, type KeyValueStore } from "./key-value-store";

const dbJobSchema = z.object({
  job_id: z.string().min(1),
  created_at: z.number().int(),
  cursor: z.string().min(1),
  artifact_path: z.string().min(1),
  bytes_written: z.number().int().nonnegative(),
  total_tables: z.number().int().nonnegative(),
  total_rows: z.number().int().nonnegative(),
  completed_tables: z.number().int().nonnegative(),
  done: z.boolean()
});

export type DbJob = z.infer<typeof dbJobSchema>;

export class DbJobStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly ttlSeconds: number = JOB_TTL_SECONDS
  ) {}

  /**
   * Creates or replaces the record and restarts its TTL.
   */
  async put(job: DbJob): Promise<void> {
    await this.store.set(this.key(job.job_id), JSON.stringify(job), this.ttlSeconds);
  }

  async get(jobId: string): Promise<DbJob> {
    const parsed = dbJobSchema.safeParse(parseStored(await this.store.get(this.key(jobId))));
    if (!parsed.success) {
      throw new ProtocolError("JOB_NOT_FOUND", "Database job not found or expired.", { jobId });
    }
    return parsed.data;
  }

  async delete(jobId: string): Promise<void> {
    await this.store.delete(this.key(jobId));
  }

  private key(jobId: string): string {
    return `sitepull:db:${jobId}`;
  }
}
