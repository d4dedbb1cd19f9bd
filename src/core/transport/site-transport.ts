/**
 * Operations the client consumes from a site endpoint.
 *
 * Downloads are returned as byte streams; the caller decides where they land.
 */
import type { ManifestEntry } from "$core/manifest/partitioner";
import type { Readable } from "stream";

export interface DbJobInitResponse {
  jobId: string;
  totalTables: number;
  totalRows: number;
  bytesWritten: number;
}

export interface DbJobProcessResponse {
  bytesWritten: number;
  completedTables: number;
  totalTables: number;
  done: boolean;
}

export interface ManifestJobInitResponse {
  jobId: string;
  totalFiles: number;
  totalBytes: number;
}

export interface ManifestJobPageResponse {
  files: ManifestEntry[];
  totalFiles: number;
  totalBytes: number;
}

export interface SiteTransport {
  dbJobInit(): Promise<DbJobInitResponse>;

  /**
   * Runs one export slice on the server.
   *
   * @param timeBudgetSeconds - Server-side budget for the slice; the server default applies when omitted.
   */
  dbJobProcess(jobId: string, timeBudgetSeconds?: number): Promise<DbJobProcessResponse>;

  dbJobDownload(jobId: string): Promise<Readable>;
  dbJobFinish(jobId: string): Promise<void>;

  manifestJobInit(): Promise<ManifestJobInitResponse>;
  manifestJobPage(jobId: string, offset: number, limit: number): Promise<ManifestJobPageResponse>;
  manifestJobFinish(jobId: string): Promise<void>;

  fileFetch(path: string): Promise<Readable>;

  /**
   * One request for many files; the body is a batch stream (see `decodeBatch`).
   */
  fileBatch(paths: string[]): Promise<Readable>;
}
