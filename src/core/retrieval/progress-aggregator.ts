/**
 * Progress Aggregator
 *
 * Workers publish immutable events; a single `scan` folds them into snapshots, so
 * there is exactly one writer and readers only ever see whole snapshots.
 *
 * Snapshots follow bytes live and take back those of failed attempts. The
 * prom-client counter only grows, so it counts bytes once their unit is done.
 */
import { Counter, Gauge, Registry } from "prom-client";
import { BehaviorSubject, Observable, Subject, Subscription } from "rxjs";
import { distinctUntilChanged, scan } from "rxjs/operators";

export type ProgressEvent =
  | { type: "bytes"; bytes: number }
  | { type: "bytes-reverted"; bytes: number }
  | { type: "bytes-committed"; bytes: number }
  | { type: "file-succeeded"; path: string }
  | { type: "file-failed"; path: string; reason: string }
  | { type: "totals"; files: number; bytes: number }
  | { type: "db-bytes"; bytes: number };

export interface ProgressSnapshot {
  readonly filesSucceeded: number;
  readonly filesFailed: number;
  readonly bytesTransferred: number;
  readonly filesTotal: number;
  readonly bytesTotal: number;
  readonly dbBytes: number;
}

export const initialSnapshot: ProgressSnapshot = Object.freeze({
  filesSucceeded: 0,
  filesFailed: 0,
  bytesTransferred: 0,
  filesTotal: 0,
  bytesTotal: 0,
  dbBytes: 0
});

export const applyEvent = (snapshot: ProgressSnapshot, event: ProgressEvent): ProgressSnapshot => {
  switch (event.type) {
    case "bytes":
      return { ...snapshot, bytesTransferred: snapshot.bytesTransferred + event.bytes };
    case "bytes-reverted":
      return { ...snapshot, bytesTransferred: snapshot.bytesTransferred - event.bytes };
    case "bytes-committed":
      return snapshot;
    case "file-succeeded":
      return { ...snapshot, filesSucceeded: snapshot.filesSucceeded + 1 };
    case "file-failed":
      return { ...snapshot, filesFailed: snapshot.filesFailed + 1 };
    case "totals":
      return { ...snapshot, filesTotal: event.files, bytesTotal: event.bytes };
    case "db-bytes":
      return { ...snapshot, dbBytes: event.bytes };
  }
};

export class ProgressAggregator {
  readonly registry: Registry;

  private readonly events = new Subject<ProgressEvent>();
  private readonly state = new BehaviorSubject<ProgressSnapshot>(initialSnapshot);
  private readonly subscription: Subscription;
  private readonly metrics: {
    filesSucceeded: Counter;
    filesFailed: Counter;
    bytesTransferred: Counter;
    filesTotal: Gauge;
    bytesTotal: Gauge;
    dbBytes: Gauge;
  };

  constructor(options: { registry?: Registry } = {}) {
    this.registry = options.registry ?? new Registry();
    this.metrics = {
      filesSucceeded: new Counter({
        name: "sitepull_files_succeeded_total",
        help: "Files written to the destination",
        registers: [this.registry]
      }),
      filesFailed: new Counter({
        name: "sitepull_files_failed_total",
        help: "Files that could not be retrieved",
        registers: [this.registry]
      }),
      bytesTransferred: new Counter({
        name: "sitepull_bytes_transferred_total",
        help: "File bytes written to the destination",
        registers: [this.registry]
      }),
      filesTotal: new Gauge({ name: "sitepull_files_total", help: "Files in the manifest", registers: [this.registry] }),
      bytesTotal: new Gauge({ name: "sitepull_bytes_total", help: "Bytes in the manifest", registers: [this.registry] }),
      dbBytes: new Gauge({ name: "sitepull_db_bytes", help: "Size of the database export", registers: [this.registry] })
    };

    this.subscription = this.events.pipe(scan(applyEvent, initialSnapshot), distinctUntilChanged()).subscribe(this.state);
  }

  publish(event: ProgressEvent): void {
    this.events.next(event);
    this.record(event);
  }

  /**
   * The most recent complete snapshot.
   */
  snapshot(): ProgressSnapshot {
    return this.state.getValue();
  }

  get snapshot$(): Observable<ProgressSnapshot> {
    return this.state.asObservable();
  }

  /**
   * Completes `snapshot$`; later events are dropped.
   */
  close(): void {
    this.events.complete();
    this.subscription.unsubscribe();
  }

  private record(event: ProgressEvent): void {
    switch (event.type) {
      case "bytes-committed":
        this.metrics.bytesTransferred.inc(event.bytes);
        break;
      case "file-succeeded":
        this.metrics.filesSucceeded.inc();
        break;
      case "file-failed":
        this.metrics.filesFailed.inc();
        break;
      case "totals":
        this.metrics.filesTotal.set(event.files);
        this.metrics.bytesTotal.set(event.bytes);
        break;
      case "db-bytes":
        this.metrics.dbBytes.set(event.bytes);
        break;
    }
  }
}
