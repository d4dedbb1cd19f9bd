import { describe, expect, it } from "vitest";
import { ProgressAggregator, applyEvent, initialSnapshot, type ProgressEvent, type ProgressSnapshot } from "./progress-aggregator";
import { combine, combineAll, emptyResult, type TransferResult } from "./transfer-result";

const results: TransferResult[] = [
  { filesSucceeded: 2000, filesFailed: 0, bytesTransferred: 1_048_576 },
  { filesSucceeded: 1, filesFailed: 0, bytesTransferred: 12_000_000 },
  { filesSucceeded: 0, filesFailed: 1, bytesTransferred: 0 },
  { filesSucceeded: 97, filesFailed: 3, bytesTransferred: 4096 }
];

const permutations = <T>(items: T[]): T[][] =>
  items.length <= 1
    ? [items]
    : items.flatMap((item, index) => permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest]));

describe("TransferResult", () => {
  it("should combine to the same totals in every order", () => {
    const expected = { filesSucceeded: 2098, filesFailed: 4, bytesTransferred: 13_052_672 };

    for (const order of permutations(results)) {
      expect(combineAll(order)).toEqual(expected);
    }
  });

  it("should be associative with an identity", () => {
    const [a, b, c] = results;

    expect(combine(combine(a, b), c)).toEqual(combine(a, combine(b, c)));
    expect(combine(a, emptyResult)).toEqual(a);
    expect(combineAll([])).toEqual(emptyResult);
  });
});

describe("ProgressAggregator", () => {
  const events: ProgressEvent[] = [
    { type: "totals", files: 3, bytes: 300 },
    { type: "bytes", bytes: 100 },
    { type: "bytes-committed", bytes: 100 },
    { type: "file-succeeded", path: "a" },
    { type: "bytes", bytes: 80 },
    { type: "bytes-reverted", bytes: 80 },
    { type: "bytes", bytes: 50 },
    { type: "bytes-committed", bytes: 50 },
    { type: "file-failed", path: "b", reason: "HTTP 500" },
    { type: "file-succeeded", path: "c" },
    { type: "db-bytes", bytes: 2048 }
  ];

  it("should fold events into snapshots", () => {
    const aggregator = new ProgressAggregator();

    for (const event of events) {
      aggregator.publish(event);
    }

    expect(aggregator.snapshot()).toEqual({
      filesSucceeded: 2,
      filesFailed: 1,
      bytesTransferred: 150,
      filesTotal: 3,
      bytesTotal: 300,
      dbBytes: 2048
    });
  });

  it("should reach the same counters for any order of worker events", () => {
    const workerEvents = events.filter((event) => event.type !== "totals" && event.type !== "db-bytes");

    const finals = permutations(workerEvents).map((order) => order.reduce(applyEvent, initialSnapshot));

    expect(new Set(finals.map((snapshot) => JSON.stringify(snapshot))).size).toBe(1);
  });

  it("should emit every intermediate snapshot to subscribers", () => {
    const aggregator = new ProgressAggregator();
    const seen: ProgressSnapshot[] = [];
    aggregator.snapshot$.subscribe((snapshot) => seen.push(snapshot));

    aggregator.publish({ type: "bytes", bytes: 10 });
    aggregator.publish({ type: "file-succeeded", path: "a" });
    aggregator.close();
    aggregator.publish({ type: "bytes", bytes: 10 });

    expect(seen.map((snapshot) => [snapshot.bytesTransferred, snapshot.filesSucceeded])).toEqual([
      [0, 0],
      [10, 0],
      [10, 1]
    ]);
  });

  it("should not emit for events that leave the snapshot unchanged", () => {
    const aggregator = new ProgressAggregator();
    const seen: ProgressSnapshot[] = [];
    aggregator.snapshot$.subscribe((snapshot) => seen.push(snapshot));

    aggregator.publish({ type: "bytes", bytes: 10 });
    aggregator.publish({ type: "bytes-committed", bytes: 10 });

    expect(seen.map((snapshot) => snapshot.bytesTransferred)).toEqual([0, 10]);
  });

  it("should count only committed bytes in its registry", async () => {
    const aggregator = new ProgressAggregator();

    for (const event of events) {
      aggregator.publish(event);
    }
    const metrics = await aggregator.registry.getMetricsAsJSON();
    const value = (name: string) => metrics.find((metric) => metric.name === name)?.values[0]?.value;

    expect(value("sitepull_files_succeeded_total")).toBe(2);
    expect(value("sitepull_files_failed_total")).toBe(1);
    expect(value("sitepull_bytes_transferred_total")).toBe(150);
    expect(value("sitepull_db_bytes")).toBe(2048);
  });
});
