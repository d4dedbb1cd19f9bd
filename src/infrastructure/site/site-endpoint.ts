/**
 * Site Endpoint
 *
 * Serves the export protocol for one directory tree and one database. Every
 * action is a single bounded request: state that must outlive it (cursor
 * tokens, manifests) is kept in the key/value store, and the dump being built is
 * appended to a file in the work directory.
 */
import { encodeCursor } from "$core/export/cursor";
import { PaginationEngine, type PaginationEngineOptions } from "$core/export/pagination-engine";
import type { TabularSource } from "$core/export/tabular-source";
import { DbJobStore, type DbJob } from "$core/jobs/db-job-store";
import { JOB_TTL_SECONDS, type KeyValueStore } from "$core/jobs/key-value-store";
import { ManifestJobStore } from "$core/jobs/manifest-job-store";
import type { ManifestEntry } from "$core/manifest/partitioner";
import { encodeBatchHeader } from "$core/retrieval/batch-codec";
import { removeQuietly, resolveRealInside } from "$infrastructure/filesystem/local-files";
import { log } from "$lib/log";
import { AuthenticationError, ErrorFactory, NotFoundError, ProtocolError, ValidationError } from "$shared/errors";
import { createHash, timingSafeEqual } from "crypto";
import { createReadStream, promises as fs } from "fs";
import path from "path";
import { Readable } from "stream";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";

export const DEFAULT_TIME_BUDGET_SECONDS = 5;
export const MAX_TIME_BUDGET_SECONDS = 25;
export const DEFAULT_PAGE_LIMIT = 5000;
export const MAX_PAGE_LIMIT = 10_000;
export const MAX_BATCH_PATHS = 5000;

const SKIPPED_DIRECTORIES = new Set([".git", ".svn", ".hg"]);

export interface EndpointRequest {
  action: string;
  params: Record<string, string>;
  /** Access key from the request header, when one was sent. */
  key?: string;
}

export type EndpointResponse =
  | { kind: "json"; status: number; body: unknown }
  | { kind: "stream"; status: number; body: Readable; size?: number };

export interface SiteEndpointOptions {
  /** Directory tree served by the manifest and file actions. */
  root: string;
  key: string;
  store: KeyValueStore;
  /** Where database dumps are assembled. */
  workDir: string;
  /** Omit to serve files only. */
  source?: TabularSource;
  pagination?: PaginationEngineOptions;
  /** Millisecond clock for the per-request time budget. */
  clock?: () => number;
  jobId?: () => string;
}

const paramsSchema = {
  jobId: z.string().regex(/^[A-Za-z0-9-]{1,64}$/, "job_id must be an opaque job id"),
  offset: z.coerce.number().int().nonnegative(),
  limit: z.coerce.number().int().positive().max(MAX_PAGE_LIMIT),
  timeBudget: z.coerce.number().positive().max(MAX_TIME_BUDGET_SECONDS),
  paths: z.array(z.string()).max(MAX_BATCH_PATHS)
};

const json = (body: unknown, status = 200): EndpointResponse => ({ kind: "json", status, body });

const ok = (): EndpointResponse => json({ ok: true });

/**
 * Compares two secrets in time independent of where they differ.
 */
export const keysMatch = (expected: string, provided: string | undefined): boolean => {
  if (!provided) {
    return false;
  }
  const digest = (value: string) => createHash("sha256").update(value, "utf8").digest();
  return timingSafeEqual(digest(expected), digest(provided));
};

/**
 * Maps an error to the wire's `{error, message}` answer.
 */
export const errorResponse = (error: unknown): EndpointResponse => {
  if (error instanceof ProtocolError) {
    return json({ error: error.code.toLowerCase(), message: error.message }, error.statusCode);
  }
  if (error instanceof AuthenticationError) {
    return json({ error: "forbidden", message: error.message }, 403);
  }
  if (error instanceof NotFoundError) {
    return json({ error: "not_found", message: error.message }, 404);
  }
  if (error instanceof ValidationError) {
    const code = error.context?.wire === "invalid_path" ? "invalid_path" : "invalid_request";
    return json({ error: code, message: error.message }, 400);
  }
  const failure = ErrorFactory.fromUnknown(error);
  log.error(`endpoint failure: ${failure.message}`, failure.context);
  return json({ error: "internal_error", message: "Internal error." }, 500);
};

/**
 * Lists every regular file under `root`, sorted by its `/`-separated relative path.
 */
export const scanTree = async (root: string): Promise<ManifestEntry[]> => {
  const entries: ManifestEntry[] = [];

  const walk = async (directory: string, prefix: string): Promise<void> => {
    const children = await fs.readdir(directory, { withFileTypes: true });
    for (const child of children) {
      const relative = prefix ? `${prefix}/${child.name}` : child.name;
      const absolute = path.join(directory, child.name);
      if (child.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(child.name)) {
          await walk(absolute, relative);
        }
      } else if (child.isFile()) {
        const stats = await fs.stat(absolute);
        entries.push({ path: relative, size: stats.size, mtime: Math.floor(stats.mtimeMs / 1000) });
      }
    }
  };

  await walk(path.resolve(root), "");
  return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
};

export class SiteEndpoint {
  private readonly manifests: ManifestJobStore;
  private readonly dbJobs: DbJobStore;
  private readonly engine?: PaginationEngine;
  private readonly clock: () => number;
  private readonly jobId: () => string;
  private realRoot?: Promise<string>;

  constructor(private readonly options: SiteEndpointOptions) {
    if (options.key.length === 0) {
      throw new ValidationError("An access key is required");
    }
    this.jobId = options.jobId ?? uuidv4;
    this.manifests = new ManifestJobStore(options.store, { jobId: this.jobId });
    this.dbJobs = new DbJobStore(options.store);
    this.engine = options.source ? new PaginationEngine(options.source, options.pagination) : undefined;
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Answers one request. Never throws: failures become `{error, message}` answers.
   */
  async handle(request: EndpointRequest): Promise<EndpointResponse> {
    try {
      if (!keysMatch(this.options.key, request.key ?? request.params.key)) {
        throw new AuthenticationError("Invalid access key.");
      }
      log.debug(`action ${request.action}`);
      return await this.dispatch(request.action, request.params);
    } catch (error) {
      return errorResponse(error);
    }
  }

  private async dispatch(action: string, params: Record<string, string>): Promise<EndpointResponse> {
    switch (action) {
      case "db_job_init":
        return json(await this.dbJobInit());
      case "db_job_process":
        return json(await this.dbJobProcess(this.param(params, "job_id", paramsSchema.jobId), this.timeBudget(params)));
      case "db_job_download":
        return this.dbJobDownload(this.param(params, "job_id", paramsSchema.jobId));
      case "db_job_finish":
        await this.dbJobFinish(this.param(params, "job_id", paramsSchema.jobId));
        return ok();
      case "manifest_job_init":
        return json(await this.manifestJobInit());
      case "manifest_job_page": {
        const jobId = this.param(params, "job_id", paramsSchema.jobId);
        const offset = this.param(params, "offset", paramsSchema.offset);
        const limit = params.limit === undefined ? DEFAULT_PAGE_LIMIT : this.param(params, "limit", paramsSchema.limit);
        const page = await this.manifests.page(jobId, offset, limit);
        return json({ files: page.files, total_files: page.totalFiles, total_bytes: page.totalBytes });
      }
      case "manifest_job_finish":
        await this.manifests.delete(this.param(params, "job_id", paramsSchema.jobId));
        return ok();
      case "file_fetch":
        return this.fileFetch(params.path ?? "");
      case "file_batch":
        return this.fileBatch(this.batchPaths(params.paths));
      default:
        throw new ValidationError(`Unknown action: ${action}`, { action });
    }
  }

  private async dbJobInit() {
    const engine = this.requireEngine();
    const init = await engine.init();
    const jobId = this.jobId();
    const artifactPath = path.join(this.options.workDir, `${jobId}.sql`);

    try {
      await fs.mkdir(this.options.workDir, { recursive: true });
      await this.removeStaleDumps();
      await fs.writeFile(artifactPath, init.preamble, "utf8");
    } catch (error) {
      throw ErrorFactory.fromFileSystemError(error, "db_job_init");
    }

    const job: DbJob = {
      job_id: jobId,
      created_at: Math.floor(Date.now() / 1000),
      cursor: encodeCursor(init.cursor),
      artifact_path: artifactPath,
      bytes_written: Buffer.byteLength(init.preamble, "utf8"),
      total_tables: init.metadata.totalTables,
      total_rows: init.metadata.totalRows,
      completed_tables: 0,
      done: init.cursor.is_complete
    };
    await this.dbJobs.put(job);
    log.info(`DB job ${jobId} started: ${job.total_tables} tables`);

    return { job_id: jobId, total_tables: job.total_tables, total_rows: job.total_rows, bytes_written: job.bytes_written };
  }

  /**
   * Runs slices until the budget is spent or the export completes. Each slice is
   * appended to the dump before the cursor that follows it is stored.
   */
  /**
   * Dumps untouched for longer than the job TTL belong to jobs the store has
   * already forgotten, so nobody can finish or download them any more.
   */
  private async removeStaleDumps(): Promise<void> {
    const cutoff = Date.now() - JOB_TTL_SECONDS * 1000;
    const children = await fs.readdir(this.options.workDir, { withFileTypes: true });
    for (const child of children) {
      if (!child.isFile() || !child.name.endsWith(".sql")) {
        continue;
      }
      const dump = path.join(this.options.workDir, child.name);
      let modified: number;
      try {
        modified = (await fs.stat(dump)).mtimeMs;
      } catch (error) {
        log.warning(`could not check ${dump}`, { error: ErrorFactory.fromFileSystemError(error, "stat").message });
        continue;
      }
      if (modified <= cutoff) {
        await removeQuietly(dump);
        log.debug("stale dump removed", { dump });
      }
    }
  }

  private async dbJobProcess(jobId: string, timeBudgetSeconds: number) {
    const engine = this.requireEngine();
    const job = await this.dbJobs.get(jobId);
    const budgetMs = timeBudgetSeconds * 1000;
    const start = this.clock();

    while (!job.done) {
      const remainingMs = Math.max(0, budgetMs - (this.clock() - start));
      const result = await engine.next(job.cursor, { timeBudgetMs: remainingMs });
      try {
        await fs.appendFile(job.artifact_path, result.chunk);
      } catch (error) {
        throw ErrorFactory.fromFileSystemError(error, "db_job_process");
      }
      job.cursor = result.cursor;
      job.bytes_written += result.chunk.length;
      job.completed_tables = result.progress.tablesCompleted;
      job.done = result.isComplete;
      await this.dbJobs.put(job);

      if (this.clock() - start >= budgetMs) {
        break;
      }
    }

    return {
      bytes_written: job.bytes_written,
      completed_tables: job.done ? job.total_tables : job.completed_tables,
      total_tables: job.total_tables,
      done: job.done
    };
  }

  private async dbJobDownload(jobId: string): Promise<EndpointResponse> {
    const job = await this.dbJobs.get(jobId);
    if (!job.done) {
      throw new ValidationError("Database job is still running.", { jobId });
    }
    const size = await this.regularFileSize(job.artifact_path);
    if (size === undefined) {
      throw new ProtocolError("JOB_NOT_FOUND", "Database dump is missing.", { jobId });
    }
    return { kind: "stream", status: 200, body: createReadStream(job.artifact_path), size };
  }

  private async dbJobFinish(jobId: string): Promise<void> {
    const job = await this.dbJobs.get(jobId);
    await removeQuietly(job.artifact_path);
    await this.dbJobs.delete(jobId);
    log.debug("DB job finished", { jobId });
  }

  private async manifestJobInit() {
    let entries: ManifestEntry[];
    try {
      entries = await scanTree(this.options.root);
    } catch (error) {
      throw ErrorFactory.fromFileSystemError(error, "manifest scan");
    }
    const job = await this.manifests.save(entries);
    log.info(`Manifest job ${job.job_id}: ${job.total_files} files`);
    return { job_id: job.job_id, total_files: job.total_files, total_bytes: job.total_bytes };
  }

  private async fileFetch(relativePath: string): Promise<EndpointResponse> {
    const absolute = await this.confined(relativePath);
    const size = await this.regularFileSize(absolute);
    if (size === undefined) {
      throw new NotFoundError("File not found.", { path: relativePath });
    }
    return { kind: "stream", status: 200, body: createReadStream(absolute), size };
  }

  private fileBatch(paths: string[]): EndpointResponse {
    return { kind: "stream", status: 200, body: Readable.from(this.batchFrames(paths)) };
  }

  /**
   * Files are read whole, one at a time; a file that cannot be read becomes an error frame.
   */
  private async *batchFrames(paths: string[]): AsyncGenerator<Buffer> {
    for (const relativePath of paths) {
      let body: Buffer;
      try {
        body = await fs.readFile(await this.confined(relativePath));
      } catch (error) {
        const reason = error instanceof ValidationError ? "invalid path" : "not found";
        log.trace("batch entry skipped", { path: relativePath, reason });
        yield encodeBatchHeader({ path: relativePath, error: reason });
        continue;
      }
      yield encodeBatchHeader({ path: relativePath, size: body.length });
      yield body;
    }
  }

  /**
   * Symlinks are followed before the check, so a link may point anywhere
   * inside the root but never out of it.
   */
  private async confined(relativePath: string): Promise<string> {
    this.realRoot ??= fs.realpath(this.options.root).catch((error: unknown) => {
      this.realRoot = undefined;
      throw ErrorFactory.fromFileSystemError(error, "site root");
    });
    const root = await this.realRoot;
    try {
      return await resolveRealInside(root, relativePath);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError("Invalid path", { path: relativePath, wire: "invalid_path" });
      }
      throw error;
    }
  }

  private async regularFileSize(absolute: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(absolute);
      return stats.isFile() ? stats.size : undefined;
    } catch {
      return undefined;
    }
  }

  private requireEngine(): PaginationEngine {
    if (!this.engine) {
      throw new ValidationError("No database is configured for this site.");
    }
    return this.engine;
  }

  private timeBudget(params: Record<string, string>): number {
    return params.time_budget === undefined
      ? DEFAULT_TIME_BUDGET_SECONDS
      : this.param(params, "time_budget", paramsSchema.timeBudget);
  }

  private batchPaths(raw: string | undefined): string[] {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw ?? "");
    } catch {
      throw new ValidationError("paths must be a JSON list of strings");
    }
    return this.param({ paths: decoded }, "paths", paramsSchema.paths);
  }

  private param<T>(params: Record<string, unknown>, name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(params[name]);
    if (!parsed.success) {
      throw new ValidationError(`Invalid ${name}: ${parsed.error.issues.map((issue) => issue.message).join(", ")}`, {
        param: name
      });
    }
    return parsed.data;
  }
}
