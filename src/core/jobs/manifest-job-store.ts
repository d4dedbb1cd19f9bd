/**
 * Manifest Job Store
 *
 * Persists a scanned manifest across stateless requests. The entry list is written
 * in fixed-size chunks under one metadata record, and is only ever read back whole
 * (or page by page from whole chunks): a missing chunk means the job is gone.
 */
import type { ManifestEntry } from "$core/manifest/partitioner";
import { log } from "$lib/log";
import { ProtocolError } from "$shared/errors";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { JOB_TTL_SECONDS, parseStored, type KeyValueStore } from "./key-value-store";

export const MANIFEST_CHUNK_ENTRIES = 2000;

const manifestEntrySchema = z.object({
  path: z.string().min(1),
  size: z.number().int().nonnegative(),
  mtime: z.number().int()
});

const manifestJobSchema = z.object({
  job_id: z.string().min(1),
  created_at: z.number().int(),
  total_files: z.number().int().nonnegative(),
  total_bytes: z.number().int().nonnegative(),
  chunk_count: z.number().int().nonnegative()
});

export type ManifestJob = z.infer<typeof manifestJobSchema>;

export interface ManifestPage {
  files: ManifestEntry[];
  totalFiles: number;
  totalBytes: number;
}

export interface ManifestJobStoreOptions {
  ttlSeconds?: number;
  chunkEntries?: number;
  /** Seconds since the epoch, for `created_at`. */
  now?: () => number;
  jobId?: () => string;
}

const notFound = (jobId: string, reason: string) =>
  new ProtocolError("JOB_NOT_FOUND", "Manifest job not found or expired.", { jobId, reason });

export class ManifestJobStore {
  private readonly ttlSeconds: number;
  private readonly chunkEntries: number;

  constructor(
    private readonly store: KeyValueStore,
    private readonly options: ManifestJobStoreOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? JOB_TTL_SECONDS;
    this.chunkEntries = options.chunkEntries ?? MANIFEST_CHUNK_ENTRIES;
  }

  /**
   * Writes every chunk, then the metadata record that makes them visible.
   *
   * Arguments:
   * - entries: The manifest in scan order
   * - jobId: Reuses a caller-issued id instead of minting one
   */
  async save(entries: readonly ManifestEntry[], jobId: string = (this.options.jobId ?? uuidv4)()): Promise<ManifestJob> {
    let chunkCount = 0;
    for (let start = 0; start < entries.length; start += this.chunkEntries) {
      const chunk = entries.slice(start, start + this.chunkEntries);
      await this.store.set(this.chunkKey(jobId, chunkCount), JSON.stringify(chunk), this.ttlSeconds);
      chunkCount++;
    }

    const job: ManifestJob = {
      job_id: jobId,
      created_at: this.options.now?.() ?? Math.floor(Date.now() / 1000),
      total_files: entries.length,
      total_bytes: entries.reduce((total, entry) => total + entry.size, 0),
      chunk_count: chunkCount
    };
    await this.store.set(this.metaKey(jobId), JSON.stringify(job), this.ttlSeconds);

    log.debug("manifest job saved", { jobId, files: job.total_files, chunks: chunkCount });
    return job;
  }

  /**
   * @throws ProtocolError `JOB_NOT_FOUND` when the job or any of its chunks is missing.
   */
  async job(jobId: string): Promise<ManifestJob> {
    const parsed = manifestJobSchema.safeParse(parseStored(await this.store.get(this.metaKey(jobId))));
    if (!parsed.success) {
      throw notFound(jobId, "metadata missing");
    }
    return parsed.data;
  }

  async load(jobId: string): Promise<ManifestEntry[]> {
    const job = await this.job(jobId);
    const entries: ManifestEntry[] = [];
    for (let index = 0; index < job.chunk_count; index++) {
      entries.push(...(await this.chunk(jobId, index)));
    }
    if (entries.length !== job.total_files) {
      throw notFound(jobId, "entry count mismatch");
    }
    return entries;
  }

  /**
   * Reads `limit` entries from `offset`, touching only the chunks that hold them.
   */
  async page(jobId: string, offset: number, limit: number): Promise<ManifestPage> {
    const job = await this.job(jobId);
    const start = Math.max(0, offset);
    const end = Math.min(job.total_files, start + Math.max(0, limit));
    const files: ManifestEntry[] = [];

    if (start < end) {
      const first = Math.floor(start / this.chunkEntries);
      const last = Math.floor((end - 1) / this.chunkEntries);
      for (let index = first; index <= last; index++) {
        const chunk = await this.chunk(jobId, index);
        const base = index * this.chunkEntries;
        files.push(...chunk.slice(Math.max(0, start - base), end - base));
      }
    }

    return { files, totalFiles: job.total_files, totalBytes: job.total_bytes };
  }

  /**
   * Removes every chunk, then the metadata. Unknown jobs are ignored.
   */
  async delete(jobId: string): Promise<void> {
    const parsed = manifestJobSchema.safeParse(parseStored(await this.store.get(this.metaKey(jobId))));
    if (parsed.success) {
      for (let index = 0; index < parsed.data.chunk_count; index++) {
        await this.store.delete(this.chunkKey(jobId, index));
      }
    }
    await this.store.delete(this.metaKey(jobId));
  }

  private async chunk(jobId: string, index: number): Promise<ManifestEntry[]> {
    const parsed = z.array(manifestEntrySchema).safeParse(parseStored(await this.store.get(this.chunkKey(jobId, index))));
    if (!parsed.success) {
      throw notFound(jobId, `chunk ${index} missing`);
    }
    return parsed.data;
  }

  private metaKey(jobId: string): string {
    return `sitepull:manifest:${jobId}:meta`;
  }

  private chunkKey(jobId: string, index: number): string {
    return `sitepull:manifest:${jobId}:chunk:${index}`;
  }
}
