/**
 * Concurrent Retrieval Engine
 *
 * Pulls transfer units through a bounded pool (`mergeMap` with a concurrency limit).
 * Each unit is one request: a large file is fetched on its own, a batch arrives as
 * one framed stream. A unit that fails after its retries is counted, never thrown,
 * so the pool always drains.
 */
import { unitFiles, type BatchUnit, type LargeUnit, type TransferUnit } from "$core/manifest/partitioner";
import type { SiteTransport } from "$core/transport/site-transport";
import { removeQuietly, resolveInside, writeStream } from "$infrastructure/filesystem/local-files";
import { log } from "$lib/log";
import { DomainError, ErrorFactory, ProtocolError, TransportError } from "$shared/errors";
import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import path from "path";
import { Observable, defer, from, lastValueFrom, of, throwError, timer } from "rxjs";
import { catchError, map, mergeMap, reduce, retry, tap } from "rxjs/operators";
import { decodeBatch } from "./batch-codec";
import type { ProgressAggregator } from "./progress-aggregator";
import { combine, emptyResult, type TransferResult } from "./transfer-result";

export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 250;

export interface RetrieveOptions {
  destinationRoot: string;
  concurrency: number;
  /** Extra attempts per unit after a TransportError. */
  retries?: number;
  retryDelayMs?: number;
  /**
   * Receives every byte increment; may be called with 0 when a unit completes
   * without bytes, and with a negative count when bytes of a failed attempt are
   * taken back.
   */
  onProgress?: (bytes: number) => void;
  aggregator?: ProgressAggregator;
  /** Units not yet started fail once this is aborted. */
  signal?: AbortSignal;
}

interface FileFailure {
  path: string;
  reason: string;
}

interface UnitOutcome {
  succeeded: string[];
  failed: FileFailure[];
  bytes: number;
}

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isRetryable = (error: unknown): boolean => error instanceof DomainError && error.retryable;

export const describeUnit = (unit: TransferUnit): string =>
  unit.kind === "large" ? `file ${unit.entry.path}` : `batch of ${unit.entries.length} files`;

export class RetrievalEngine {
  constructor(private readonly transport: SiteTransport) {}

  /**
   * Transfers every unit and folds their results.
   */
  async retrieve(units: readonly TransferUnit[], options: RetrieveOptions): Promise<TransferResult> {
    return lastValueFrom(this.retrieve$(units, options).pipe(reduce(combine, emptyResult)));
  }

  /**
   * One result per unit, in completion order.
   */
  retrieve$(units: readonly TransferUnit[], options: RetrieveOptions): Observable<TransferResult> {
    const concurrency = Math.max(1, Math.trunc(options.concurrency));
    return from(units).pipe(mergeMap((unit) => this.unit$(unit, options), concurrency));
  }

  private unit$(unit: TransferUnit, options: RetrieveOptions): Observable<TransferResult> {
    const retries = options.retries ?? DEFAULT_RETRIES;
    const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    let reported = 0;
    let attemptBytes = 0;

    const onBytes = (bytes: number) => {
      reported += bytes;
      attemptBytes += bytes;
      options.onProgress?.(bytes);
      options.aggregator?.publish({ type: "bytes", bytes });
    };
    const revert = (bytes: number) => {
      if (bytes <= 0) {
        return;
      }
      reported -= bytes;
      options.onProgress?.(-bytes);
      options.aggregator?.publish({ type: "bytes-reverted", bytes });
    };

    return defer(() => {
      attemptBytes = 0;
      if (options.signal?.aborted) {
        return throwError(() => new TransportError("Run aborted"));
      }
      return from(this.attempt(unit, options.destinationRoot, onBytes));
    }).pipe(
      tap({
        error: () => {
          revert(attemptBytes);
          attemptBytes = 0;
        }
      }),
      retry({
        count: retries,
        delay: (error, attempt) => {
          if (!isRetryable(error) || options.signal?.aborted) {
            return throwError(() => error);
          }
          log.debug(`retrying ${describeUnit(unit)}`, { attempt, reason: reasonOf(error) });
          return timer(retryDelayMs * attempt);
        }
      }),
      catchError((error: unknown) => {
        log.warning(`${describeUnit(unit)} failed`, { reason: reasonOf(error) });
        const outcome: UnitOutcome = {
          succeeded: [],
          failed: unitFiles(unit).map((entry) => ({ path: entry.path, reason: reasonOf(error) })),
          bytes: 0
        };
        return of(outcome);
      }),
      map((outcome) => {
        // Files abandoned inside an otherwise good batch wrote bytes that were not kept.
        revert(attemptBytes - outcome.bytes);
        options.aggregator?.publish({ type: "bytes-committed", bytes: outcome.bytes });
        for (const file of outcome.succeeded) {
          options.aggregator?.publish({ type: "file-succeeded", path: file });
        }
        for (const failure of outcome.failed) {
          log.debug(`failed ${failure.path}`, { reason: failure.reason });
          options.aggregator?.publish({ type: "file-failed", path: failure.path, reason: failure.reason });
        }
        if (reported === 0) {
          options.onProgress?.(0);
        }
        return {
          filesSucceeded: outcome.succeeded.length,
          filesFailed: outcome.failed.length,
          bytesTransferred: outcome.bytes
        };
      })
    );
  }

  private attempt(unit: TransferUnit, root: string, onBytes: (bytes: number) => void): Promise<UnitOutcome> {
    return unit.kind === "large" ? this.fetchLarge(unit, root, onBytes) : this.fetchBatch(unit, root, onBytes);
  }

  private async fetchLarge(unit: LargeUnit, root: string, onBytes: (bytes: number) => void): Promise<UnitOutcome> {
    const destination = resolveInside(root, unit.entry.path);
    const stream = await this.transport.fileFetch(unit.entry.path);
    const bytes = await writeStream(stream, destination, onBytes);
    return { succeeded: [unit.entry.path], failed: [], bytes };
  }

  /**
   * Writes each file of the batch stream as it arrives. Files the server rejected,
   * files that cannot be written locally and files absent from the response fail
   * individually.
   */
  private async fetchBatch(unit: BatchUnit, root: string, onBytes: (bytes: number) => void): Promise<UnitOutcome> {
    const requested = new Set(unit.entries.map((entry) => entry.path));
    const seen = new Set<string>();
    const outcome: UnitOutcome = { succeeded: [], failed: [], bytes: 0 };
    const stream = await this.transport.fileBatch([...requested]);

    let current: { path: string; destination: string; handle?: FileHandle; bytes: number } | undefined;

    const abandon = async (reason: string) => {
      if (!current) {
        return;
      }
      if (current.handle) {
        await current.handle.close();
        current.handle = undefined;
        await removeQuietly(current.destination);
      }
      outcome.failed.push({ path: current.path, reason });
    };

    try {
      for await (const event of decodeBatch(stream)) {
        switch (event.type) {
          case "file": {
            if (!requested.has(event.path) || seen.has(event.path)) {
              throw new ProtocolError("INVALID_RESPONSE", `Batch returned an unexpected file: ${event.path}`);
            }
            seen.add(event.path);
            current = { path: event.path, destination: "", bytes: 0 };
            try {
              current.destination = resolveInside(root, event.path);
              await fs.mkdir(path.dirname(current.destination), { recursive: true });
              current.handle = await fs.open(current.destination, "w");
            } catch (error) {
              await abandon(reasonOf(error instanceof DomainError ? error : ErrorFactory.fromFileSystemError(error, "open")));
              current = undefined;
            }
            break;
          }
          case "data": {
            if (!current?.handle) {
              break;
            }
            try {
              await current.handle.write(event.chunk);
            } catch (error) {
              await abandon(reasonOf(ErrorFactory.fromFileSystemError(error, `write ${current.path}`)));
              current = undefined;
              break;
            }
            current.bytes += event.chunk.length;
            onBytes(event.chunk.length);
            break;
          }
          case "end": {
            if (current?.handle) {
              await current.handle.close();
              outcome.succeeded.push(current.path);
              outcome.bytes += current.bytes;
            }
            current = undefined;
            break;
          }
          case "error": {
            if (!requested.has(event.path) || seen.has(event.path)) {
              throw new ProtocolError("INVALID_RESPONSE", `Batch returned an unexpected file: ${event.path}`);
            }
            seen.add(event.path);
            outcome.failed.push({ path: event.path, reason: event.message });
            break;
          }
        }
      }
    } catch (error) {
      if (current?.handle) {
        await current.handle.close();
        await removeQuietly(current.destination);
      }
      if (error instanceof DomainError) {
        throw error;
      }
      throw new TransportError(`Batch download interrupted: ${reasonOf(error)}`);
    }

    for (const entry of unit.entries) {
      if (!seen.has(entry.path)) {
        outcome.failed.push({ path: entry.path, reason: "missing from batch response" });
      }
    }
    return outcome;
  }
}
