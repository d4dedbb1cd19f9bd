/**
 * Orchestrator
 *
 * Runs one pull of a site: database export, manifest, partition, concurrent
 * retrieval and packaging, as a state machine that either ends in DONE with an
 * archive or in FAILED with nothing left behind.
 */
import { DEFAULT_PARTITION_OPTIONS, partitionManifest, partitionUnits, type ManifestEntry, type PartitionOptions } from "$core/manifest/partitioner";
import { ProgressAggregator } from "$core/retrieval/progress-aggregator";
import { RetrievalEngine } from "$core/retrieval/retrieval-engine";
import { emptyResult, type TransferResult } from "$core/retrieval/transfer-result";
import type { SiteTransport } from "$core/transport/site-transport";
import { removeQuietly, writeStream } from "$infrastructure/filesystem/local-files";
import { log } from "$lib/log";
import { ErrorFactory, ExitCode, InternalError, ProtocolError, TransportError, exitCodeFor, type DomainError } from "$shared/errors";
import { promises as fs } from "fs";
import path from "path";
import { BehaviorSubject, type Observable } from "rxjs";
import { setTimeout as sleep } from "timers/promises";
import { v4 as uuidv4 } from "uuid";
import type { ArchiveBuilder } from "./archive-builder";
import { assertTransition, type OrchestratorState } from "./states";

export const DEFAULT_PACING_MS = 100;
export const MANIFEST_PAGE_SIZE = 5000;
export const DATABASE_FILE = "database.sql";
export const FILES_DIR = "files";

export interface OrchestratorOptions {
  transport: SiteTransport;
  archiveBuilder: ArchiveBuilder;
  /** Site hostname, used to name the archive. */
  hostname: string;
  outputDir: string;
  concurrency: number;
  retries?: number;
  retryDelayMs?: number;
  /** Delay between database export slices. */
  pacingMs?: number;
  /** Server-side budget for each export slice. */
  timeBudgetSeconds?: number;
  manifestPageSize?: number;
  partition?: Partial<PartitionOptions>;
  aggregator?: ProgressAggregator;
  now?: () => Date;
  /** Aborting fails the run at the next step, slice or unit. */
  signal?: AbortSignal;
}

export interface RunSummary {
  state: OrchestratorState;
  exitCode: ExitCode;
  transfer: TransferResult;
  filesTotal: number;
  dbBytes: number;
  archivePath?: string;
  archiveBytes?: number;
  error?: DomainError;
  /** The state a failed run was in when it failed. */
  failedIn?: OrchestratorState;
}

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * `example.com-20240102-030405.zip`, in UTC.
 */
export const archiveName = (hostname: string, at: Date): string => {
  const safeHost = hostname.replace(/[^A-Za-z0-9.-]/g, "_") || "site";
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `${safeHost}-${date}-${time}.zip`;
};

export class Orchestrator {
  readonly aggregator: ProgressAggregator;

  private readonly state = new BehaviorSubject<OrchestratorState>("INIT");
  private readonly engine: RetrievalEngine;

  constructor(private readonly options: OrchestratorOptions) {
    this.aggregator = options.aggregator ?? new ProgressAggregator();
    this.engine = new RetrievalEngine(options.transport);
  }

  get state$(): Observable<OrchestratorState> {
    return this.state.asObservable();
  }

  get current(): OrchestratorState {
    return this.state.getValue();
  }

  /**
   * Runs the pull. Failures of the pull land in the summary with their exit code;
   * only a second call on the same instance throws.
   */
  async run(): Promise<RunSummary> {
    if (this.current !== "INIT") {
      throw new InternalError("An orchestrator runs only once", { state: this.current });
    }
    const { outputDir } = this.options;
    const summary: RunSummary = { state: "INIT", exitCode: ExitCode.Internal, transfer: emptyResult, filesTotal: 0, dbBytes: 0 };
    let workspace: string | undefined;

    try {
      await fs.mkdir(outputDir, { recursive: true });
      workspace = path.join(outputDir, `.sitepull-${uuidv4()}`);
      await fs.mkdir(path.join(workspace, FILES_DIR), { recursive: true });
      log.debug("workspace created", { workspace });

      this.transition("DB_EXPORT");
      await this.pullDatabase(summary, path.join(workspace, DATABASE_FILE));

      this.transition("MANIFEST_INIT");
      const manifest = await this.collectManifest();

      this.transition("PARTITION");
      const partition = partitionManifest(manifest, { ...DEFAULT_PARTITION_OPTIONS, ...this.options.partition });
      summary.filesTotal = partition.totalFiles;
      this.aggregator.publish({ type: "totals", files: partition.totalFiles, bytes: partition.totalBytes });
      log.info(
        `Manifest ready: ${partition.totalFiles} files (${partition.totalBytes} bytes) -> ${partition.large.length} large, ${partition.batches.length} batches`
      );

      this.transition("RETRIEVE");
      summary.transfer = await this.engine.retrieve(partitionUnits(partition), {
        destinationRoot: path.join(workspace, FILES_DIR),
        concurrency: this.options.concurrency,
        retries: this.options.retries,
        retryDelayMs: this.options.retryDelayMs,
        aggregator: this.aggregator,
        signal: this.options.signal
      });
      if (summary.transfer.filesFailed > 0) {
        throw new TransportError(`${summary.transfer.filesFailed} files failed`, undefined, {
          filesFailed: summary.transfer.filesFailed
        });
      }

      this.transition("PACKAGE");
      const archivesDir = path.join(outputDir, "archives");
      await fs.mkdir(archivesDir, { recursive: true });
      summary.archivePath = path.join(archivesDir, archiveName(this.options.hostname, (this.options.now ?? (() => new Date()))()));
      summary.archiveBytes = await this.options.archiveBuilder.build(workspace, summary.archivePath);

      this.transition("DONE");
      summary.exitCode = ExitCode.Success;
    } catch (error) {
      const failure = this.options.signal?.aborted
        ? new TransportError("Run aborted before completion", undefined, { state: this.current })
        : ErrorFactory.fromUnknown(error);
      summary.error = failure;
      summary.exitCode = exitCodeFor(failure);
      summary.failedIn = this.current;
      log.error(`pull failed in ${this.current}: ${failure.message}`, failure.context);
      this.transition("FAILED");
      if (summary.archivePath) {
        await removeQuietly(summary.archivePath);
        summary.archivePath = undefined;
        summary.archiveBytes = undefined;
      }
    } finally {
      if (workspace) {
        await removeQuietly(workspace);
      }
    }

    summary.state = this.current;
    return summary;
  }

  private transition(to: OrchestratorState): void {
    assertTransition(this.current, to);
    if (to !== "FAILED") {
      this.options.signal?.throwIfAborted();
    }
    log.trace(`state ${this.current} -> ${to}`);
    this.state.next(to);
    if (to === "DONE" || to === "FAILED") {
      this.state.complete();
    }
  }

  /**
   * Exports and downloads the dump. The server-side job is finished whether or
   * not that worked, so a failed run leaves no dump behind on the site.
   */
  private async pullDatabase(summary: RunSummary, destination: string): Promise<void> {
    const { transport } = this.options;
    const init = await transport.dbJobInit();
    log.info(`DB job ${init.jobId}: ${init.totalTables} tables, ~${init.totalRows} rows`);

    try {
      await this.exportDatabase(init.jobId, summary);
      this.transition("DB_DOWNLOAD");
      await this.downloadDatabase(init.jobId, destination);
    } finally {
      await this.bestEffort("db_job_finish", () => transport.dbJobFinish(init.jobId));
    }
  }

  /**
   * Drives the export one slice at a time; slices never overlap.
   */
  private async exportDatabase(jobId: string, summary: RunSummary): Promise<void> {
    for (;;) {
      const progress = await this.options.transport.dbJobProcess(jobId, this.options.timeBudgetSeconds);
      summary.dbBytes = progress.bytesWritten;
      this.aggregator.publish({ type: "db-bytes", bytes: progress.bytesWritten });
      log.debug(`DB: tables ${progress.completedTables}/${progress.totalTables}`, { bytes: progress.bytesWritten });

      if (progress.done) {
        return;
      }
      await sleep(this.options.pacingMs ?? DEFAULT_PACING_MS, undefined, { signal: this.options.signal });
    }
  }

  private async downloadDatabase(jobId: string, destination: string): Promise<void> {
    const bytes = await writeStream(await this.options.transport.dbJobDownload(jobId), destination);
    if (bytes === 0) {
      await removeQuietly(destination);
      throw new TransportError("Database download was empty", undefined, { jobId });
    }
    log.info(`Database downloaded (${bytes} bytes)`);
  }

  private async collectManifest(): Promise<ManifestEntry[]> {
    const { transport } = this.options;
    const pageSize = this.options.manifestPageSize ?? MANIFEST_PAGE_SIZE;
    const init = await transport.manifestJobInit();
    log.info(`Manifest job ${init.jobId}: ${init.totalFiles} files (~${init.totalBytes} bytes)`);

    try {
      const entries: ManifestEntry[] = [];
      while (entries.length < init.totalFiles) {
        const page = await transport.manifestJobPage(init.jobId, entries.length, pageSize);
        if (page.files.length === 0) {
          throw new ProtocolError("INVALID_RESPONSE", "Manifest ended before its reported size", {
            received: entries.length,
            expected: init.totalFiles
          });
        }
        entries.push(...page.files);
      }
      return entries;
    } finally {
      await this.bestEffort("manifest_job_finish", () => transport.manifestJobFinish(init.jobId));
    }
  }

  private async bestEffort(action: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      log.warning(`${action} failed`, { reason: error instanceof Error ? error.message : String(error) });
    }
  }
}
