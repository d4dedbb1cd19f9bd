import type { ProgressSnapshot } from "$core/retrieval/progress-aggregator";
import { asyncScheduler, type Observable, type SchedulerLike, type Subscription } from "rxjs";
import { distinctUntilChanged, map, throttleTime } from "rxjs/operators";

const UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * `1536` → `1.5 KB`. Binary steps, one decimal above bytes.
 */
export const formatBytes = (bytes: number): string => {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
};

/**
 * One status line for a snapshot. Before the manifest is known only the
 * database export size is shown.
 */
export const formatLine = (snapshot: ProgressSnapshot): string => {
  if (snapshot.filesTotal === 0 && snapshot.bytesTotal === 0) {
    return `Exporting database: ${formatBytes(snapshot.dbBytes)}`;
  }
  const files = snapshot.filesSucceeded + snapshot.filesFailed;
  const ratio = snapshot.bytesTotal > 0 ? snapshot.bytesTransferred / snapshot.bytesTotal : files / snapshot.filesTotal;
  const percentage = Math.min(100, ratio * 100).toFixed(1);
  const line = `Files ${files}/${snapshot.filesTotal} (${percentage}%) ${formatBytes(snapshot.bytesTransferred)}/${formatBytes(snapshot.bytesTotal)}`;
  return snapshot.filesFailed > 0 ? `${line}, ${snapshot.filesFailed} failed` : line;
};

export interface LineSink {
  write(chunk: string): unknown;
}

export interface ProgressRendererOptions {
  /** Print every update on its own line instead of redrawing one line. */
  flush?: boolean;
  /** Minimum time between two drawn lines. */
  intervalMs?: number;
  /** Defaults to stderr so progress never mixes with the summary. */
  stream?: LineSink;
  scheduler?: SchedulerLike;
}

export class ProgressRenderer {
  private subscription?: Subscription;
  private lastLine = "";
  private width = 0;

  constructor(private readonly options: ProgressRendererOptions = {}) {}

  attach(snapshots: Observable<ProgressSnapshot>): void {
    this.subscription?.unsubscribe();
    this.subscription = snapshots
      .pipe(
        map(formatLine),
        distinctUntilChanged(),
        throttleTime(this.options.intervalMs ?? 250, this.options.scheduler ?? asyncScheduler, { leading: true, trailing: true })
      )
      .subscribe((line) => this.draw(line));
  }

  /**
   * Stops listening and draws the final state once.
   */
  finish(snapshot: ProgressSnapshot): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    const line = formatLine(snapshot);
    if (line !== this.lastLine) {
      this.draw(line);
    }
    if (!this.options.flush && this.width > 0) {
      this.sink.write("\n");
    }
    this.width = 0;
  }

  private get sink(): LineSink {
    return this.options.stream ?? process.stderr;
  }

  private draw(line: string): void {
    this.lastLine = line;
    if (this.options.flush) {
      this.sink.write(`${line}\n`);
      return;
    }
    this.sink.write(`\r${line.padEnd(this.width)}`);
    this.width = Math.max(this.width, line.length);
  }
}
