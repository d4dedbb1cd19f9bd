import type { ArchiveBuilder } from "$core/orchestrator/archive-builder";
import { Orchestrator, type RunSummary } from "$core/orchestrator/orchestrator";
import type { OrchestratorState } from "$core/orchestrator/states";
import type { SiteTransport } from "$core/transport/site-transport";
import { ZipArchiveBuilder } from "$infrastructure/archive/zip-archive-builder";
import { endpointUrl, HttpSiteClient } from "$infrastructure/http/site-client";
import { ErrorFactory, ExitCode, exitCodeFor, ValidationError } from "$shared/errors";
import { log } from "./log";
import { formatBytes, ProgressRenderer, type LineSink } from "./renderers/progress";

export interface DownloadOptions {
  retries?: number;
  retryDelayMs?: number;
  /** Server-side budget per database export slice, in seconds. */
  timeBudgetSeconds?: number;
  /** Aborts the whole run after this many seconds; 0 or absent for no limit. */
  timeoutSeconds?: number;
  pacingMs?: number;
  flush?: boolean;
  /** Defaults to an HttpSiteClient for `url`. */
  transport?: SiteTransport;
  /** Defaults to a ZipArchiveBuilder. */
  archiveBuilder?: ArchiveBuilder;
  /** Where progress is drawn, stderr by default. */
  progress?: LineSink;
  /** Receives the summary lines, stdout by default. */
  print?: (line: string) => void;
  now?: () => Date;
}

/** States a run only reaches once the database dump is on disk. */
const AFTER_DATABASE: ReadonlySet<OrchestratorState> = new Set(["MANIFEST_INIT", "PARTITION", "RETRIEVE", "PACKAGE", "DONE"]);

const checkArguments = (url: string, key: string, outputDir: string, concurrency: number): string => {
  endpointUrl(url);
  if (key.trim().length === 0) {
    throw new ValidationError("An access key is required");
  }
  if (outputDir.trim().length === 0) {
    throw new ValidationError("An output directory is required");
  }
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError(`Concurrency must be a positive integer, got ${concurrency}`, { concurrency });
  }
  return new URL(url).hostname;
};

/**
 * The lines printed after a run.
 */
export const summaryLines = (summary: RunSummary): string[] => {
  const databaseOk = summary.state === "DONE" || (summary.failedIn !== undefined && AFTER_DATABASE.has(summary.failedIn));
  const { filesSucceeded, filesFailed } = summary.transfer;
  const lines = [
    `Database: ${databaseOk ? "OK" : "FAILED"}`,
    `Files: ${filesSucceeded}/${summary.filesTotal} (failed ${filesFailed})`
  ];

  if (summary.state === "DONE" && summary.archivePath !== undefined) {
    lines.push(`Archive: ${summary.archivePath} (${formatBytes(summary.archiveBytes ?? 0)})`);
    return lines;
  }
  if (filesFailed > 0) {
    lines.push(`Failed: files failed: ${filesFailed}`);
  } else if (summary.exitCode === ExitCode.Internal) {
    lines.push(`Failed: internal error: ${summary.error?.message ?? "unknown"}`);
  } else {
    lines.push(`Failed: ${summary.error?.message ?? "unknown"}`);
  }
  return lines;
};

/**
 * Pulls one site into `<outputDir>/archives/` and returns the process exit code.
 */
export async function handleDownload(
  url: string,
  key: string,
  outputDir: string,
  concurrency: number,
  options: DownloadOptions = {}
): Promise<ExitCode> {
  const print = options.print ?? ((line: string) => process.stdout.write(`${line}\n`));

  let hostname: string;
  let transport: SiteTransport;
  try {
    hostname = checkArguments(url, key, outputDir, concurrency);
    transport = options.transport ?? new HttpSiteClient({ baseUrl: url, key });
  } catch (error) {
    const failure = ErrorFactory.fromUnknown(error);
    log.error(failure.message, failure.context);
    return exitCodeFor(failure);
  }

  const timeoutSeconds = options.timeoutSeconds ?? 0;
  const orchestrator = new Orchestrator({
    transport,
    archiveBuilder: options.archiveBuilder ?? new ZipArchiveBuilder(),
    hostname,
    outputDir,
    concurrency,
    retries: options.retries,
    retryDelayMs: options.retryDelayMs,
    pacingMs: options.pacingMs,
    timeBudgetSeconds: options.timeBudgetSeconds,
    now: options.now,
    signal: timeoutSeconds > 0 ? AbortSignal.timeout(timeoutSeconds * 1000) : undefined
  });

  log.info(`Pulling ${hostname} into ${outputDir}`, { concurrency, timeoutSeconds });
  const states = orchestrator.state$.subscribe((state) => log.debug(`state: ${state}`));
  const renderer = new ProgressRenderer({ flush: options.flush, stream: options.progress });
  renderer.attach(orchestrator.aggregator.snapshot$);

  let summary: RunSummary;
  try {
    summary = await orchestrator.run();
  } finally {
    renderer.finish(orchestrator.aggregator.snapshot());
    states.unsubscribe();
    orchestrator.aggregator.close();
  }
  log.debugging.inspect("metrics", await orchestrator.aggregator.registry.getMetricsAsJSON());

  for (const line of summaryLines(summary)) {
    print(line);
  }
  if (summary.exitCode === ExitCode.Success) {
    log.success(`Pulled ${hostname}`);
  }
  return summary.exitCode;
}
