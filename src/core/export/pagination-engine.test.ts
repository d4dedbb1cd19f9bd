import { ProtocolError } from "$shared/errors";
import { InMemorySource } from "$test/in-memory-source";
import { describe, expect, it, vi } from "vitest";
import { gunzipSync } from "zlib";
import { decodeCursor, encodeCursor, type Cursor } from "./cursor";
import {
  MAX_CHUNK_ROWS,
  MIN_CHUNK_ROWS,
  PaginationEngine,
  clampChunkSize,
  nextChunkSize,
  type PaginationStrategy,
  type StepOptions
} from "./pagination-engine";

const ids = (chunk: Buffer): number[] =>
  [...chunk.toString("utf8").matchAll(/VALUES \((\d+),/g)].map((match) => Number(match[1]));

/**
 * Drives the engine to completion, returning every step's outcome.
 */
const drain = async (engine: PaginationEngine, cursor: Cursor, options: StepOptions = {}) => {
  const steps: {
    table: string;
    strategy: PaginationStrategy | null;
    structure: boolean;
    rows: number[];
    cursor: Cursor;
  }[] = [];

  let current = cursor;
  while (!current.is_complete) {
    const result = await engine.step(current, options);
    steps.push({
      table: result.progress.currentTable,
      strategy: result.performance.strategy,
      structure: result.progress.structureEmitted,
      rows: ids(result.chunk),
      cursor: result.cursor
    });
    current = result.cursor;
  }
  return steps;
};

const fixedClock = () => 0;

describe("PaginationEngine", () => {
  describe("init", () => {
    it("should estimate every table and pick keyset only above the thresholds", async () => {
      const source = new InMemorySource([
        InMemorySource.counting("users", 10),
        InMemorySource.counting("events", 250_000),
        InMemorySource.counting("blobs", 5, { estimate: { bytes: 200 * 1024 * 1024 } })
      ]);
      const engine = new PaginationEngine(source, { sessionId: () => "session-1" });

      const { cursor, metadata, preamble } = await engine.init();

      expect(metadata).toEqual({
        tables: ["users", "events", "blobs"],
        totalTables: 3,
        totalRows: 250_015,
        totalBytes: 640 + 250_000 * 64 + 200 * 1024 * 1024,
        chunkSize: 1000
      });
      expect(cursor.session_id).toBe("session-1");
      expect(cursor.table_name).toBe("users");
      expect(cursor.per_table_info.users.use_keyset).toBe(false);
      expect(cursor.per_table_info.events.use_keyset).toBe(true);
      expect(cursor.per_table_info.blobs.use_keyset).toBe(true);
      expect(preamble.startsWith("-- sitepull database export\n")).toBe(true);
      expect(preamble).not.toContain("-- Export completed");
    });

    it("should clamp the chunk size hint", async () => {
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 1)]));

      expect((await engine.init(10)).cursor.chunk_size).toBe(MIN_CHUNK_ROWS);
      expect((await engine.init(90_000)).cursor.chunk_size).toBe(MAX_CHUNK_ROWS);
      expect((await engine.init(2500)).cursor.chunk_size).toBe(2500);
    });

    it("should complete immediately when there are no tables", async () => {
      const engine = new PaginationEngine(new InMemorySource([]));

      const { cursor, preamble } = await engine.init();

      expect(cursor.is_complete).toBe(true);
      expect(cursor.table_index).toBe(0);
      expect(preamble).toContain("-- Export completed\n");
    });
  });

  describe("step", () => {
    it("should export 10, 250000 and 5 rows in 252 calls with three structure emissions", async () => {
      const source = new InMemorySource([
        InMemorySource.counting("small", 10),
        InMemorySource.counting("large", 250_000),
        InMemorySource.counting("tiny", 5)
      ]);
      const engine = new PaginationEngine(source, { clock: fixedClock, adaptiveSizing: false });
      const { cursor } = await engine.init(1000);

      const steps = await drain(engine, cursor);

      expect(steps).toHaveLength(1 + 250 + 1);
      expect(steps.filter((step) => step.structure).map((step) => step.table)).toEqual(["small", "large", "tiny"]);
      expect(new Set(steps.filter((step) => step.table === "small").map((step) => step.strategy))).toEqual(new Set(["offset"]));
      expect(new Set(steps.filter((step) => step.table === "large").map((step) => step.strategy))).toEqual(new Set(["keyset"]));
      expect(new Set(steps.filter((step) => step.table === "tiny").map((step) => step.strategy))).toEqual(new Set(["offset"]));
      expect(steps.reduce((total, step) => total + step.rows.length, 0)).toBe(250_015);
      expect(steps[steps.length - 1].cursor.is_complete).toBe(true);
      expect(steps[steps.length - 1].cursor.table_index).toBe(3);
    });

    it("should emit every row exactly once in offset mode", async () => {
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 2350)]), {
        clock: fixedClock,
        adaptiveSizing: false
      });
      const { cursor } = await engine.init(100);

      const steps = await drain(engine, cursor);
      const emitted = steps.flatMap((step) => step.rows);

      expect(steps).toHaveLength(24);
      expect(emitted).toEqual(Array.from({ length: 2350 }, (_, index) => index + 1));
    });

    it("should not spend a trailing call on a table that is an exact multiple of the chunk size", async () => {
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 300)]), {
        clock: fixedClock,
        adaptiveSizing: false
      });
      const { cursor } = await engine.init(100);

      const steps = await drain(engine, cursor);

      expect(steps.map((step) => step.rows.length)).toEqual([100, 100, 100]);
    });

    it("should export an empty table in one call", async () => {
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("empty", 0)]), { clock: fixedClock });
      const { cursor } = await engine.init();

      const result = await engine.step(cursor);
      const sql = result.chunk.toString("utf8");

      expect(result.isComplete).toBe(true);
      expect(result.progress.structureEmitted).toBe(true);
      expect(result.progress.tableFinished).toBe(true);
      expect(sql).toContain("DROP TABLE IF EXISTS `empty`;\n");
      expect(sql).not.toContain("INSERT INTO");
      expect(sql.endsWith("/*!40101 SET COLLATION_CONNECTION=@OLD_COLLATION_CONNECTION */;\n")).toBe(true);
    });

    it("should keep the keyset strictly increasing", async () => {
      const source = new InMemorySource([InMemorySource.counting("t", 2500, { estimate: { rows: 200_000 } })]);
      const engine = new PaginationEngine(source, { clock: fixedClock, adaptiveSizing: false });
      const { cursor } = await engine.init(100);

      const steps = await drain(engine, cursor);
      const keys = steps.slice(0, -1).map((step) => step.cursor.last_primary_key);

      expect(steps.every((step) => step.strategy === "keyset")).toBe(true);
      expect(keys.length).toBe(24);
      for (let index = 1; index < keys.length; index++) {
        expect(Number(keys[index])).toBeGreaterThan(Number(keys[index - 1]));
      }
      expect(steps.flatMap((step) => step.rows)).toEqual(Array.from({ length: 2500 }, (_, index) => index + 1));
    });

    it("should fall back to offset mode for a composite primary key", async () => {
      const source = new InMemorySource([
        InMemorySource.counting("t", 150, { primaryKey: ["a", "b"], estimate: { rows: 500_000 } })
      ]);
      const engine = new PaginationEngine(source, { clock: fixedClock, adaptiveSizing: false });
      const { cursor } = await engine.init(100);

      const first = await engine.step(cursor);

      expect(first.performance.strategy).toBe("offset");
      expect(first.cursor.per_table_info.t.primary_key_column).toBeNull();
      expect(first.cursor.offset).toBe(100);
    });

    it("should look the primary key up only once per table", async () => {
      const source = new InMemorySource([InMemorySource.counting("t", 350, { estimate: { rows: 200_000 } })]);
      const primaryKey = vi.spyOn(source, "primaryKey");
      const engine = new PaginationEngine(source, { clock: fixedClock, adaptiveSizing: false });
      const { cursor } = await engine.init(100);

      await drain(engine, cursor);

      expect(primaryKey).toHaveBeenCalledTimes(1);
    });

    it("should stop at the time budget and resume where it left off", async () => {
      let tick = 0;
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 10)]), {
        clock: () => tick++,
        adaptiveSizing: false
      });
      const { cursor } = await engine.init(100);

      const first = await engine.step(cursor, { timeBudgetMs: 5 });
      const second = await engine.step(first.cursor, { timeBudgetMs: 5 });
      const third = await engine.step(second.cursor, { timeBudgetMs: 5 });

      expect(ids(first.chunk)).toEqual([1, 2, 3, 4]);
      expect(first.progress.tableFinished).toBe(false);
      expect(first.cursor.offset).toBe(4);
      expect(ids(second.chunk)).toEqual([5, 6, 7, 8]);
      expect(ids(third.chunk)).toEqual([9, 10]);
      expect(third.isComplete).toBe(true);
    });

    it("should emit at least one row when the budget is already spent", async () => {
      let tick = 0;
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 3)]), {
        clock: () => tick++,
        adaptiveSizing: false
      });
      const { cursor } = await engine.init();

      const steps = await drain(engine, cursor, { timeBudgetMs: 0 });

      expect(steps.map((step) => step.rows)).toEqual([[1], [2], [3]]);
    });

    it("should grow the chunk size after a fast call", async () => {
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 5000)]), { clock: fixedClock });
      const { cursor } = await engine.init(1000);

      const result = await engine.step(cursor);

      expect(result.performance.chunkSizeUsed).toBe(1000);
      expect(result.performance.chunkSizeNext).toBe(1500);
      expect(result.cursor.chunk_size).toBe(1500);
    });

    it("should leave the cursor untouched when the source fails", async () => {
      const source = new InMemorySource([InMemorySource.counting("t", 50)]);
      const engine = new PaginationEngine(source, { clock: fixedClock });
      const { cursor } = await engine.init();
      const before = structuredClone(cursor);
      vi.spyOn(source, "readOffset").mockRejectedValueOnce(new Error("connection lost"));

      await expect(engine.step(cursor)).rejects.toThrow("connection lost");
      expect(cursor).toEqual(before);

      const retried = await engine.step(cursor);
      expect(ids(retried.chunk)).toHaveLength(50);
    });

    it("should return an empty chunk for a complete cursor", async () => {
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 1)]), { clock: fixedClock });
      const { cursor } = await engine.init();
      const done = await engine.step(cursor);

      const again = await engine.step(done.cursor);

      expect(again.chunk.length).toBe(0);
      expect(again.isComplete).toBe(true);
      expect(again.cursor).toEqual(done.cursor);
    });

    it("should compress only the slice", async () => {
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 20)]), { clock: fixedClock });
      const { cursor } = await engine.init();

      const plain = await engine.step(cursor);
      const gzipped = await engine.step(cursor, { compression: "gzip" });

      expect(gunzipSync(gzipped.chunk).equals(plain.chunk)).toBe(true);
      expect(gzipped.progress.bytesInChunk).toBe(plain.chunk.length);
      expect(gzipped.cursor).toEqual(plain.cursor);
      expect(gzipped.performance.compression).toBe("gzip");
    });
  });

  describe("next", () => {
    it("should accept and return cursor tokens", async () => {
      const engine = new PaginationEngine(new InMemorySource([InMemorySource.counting("t", 20)]), { clock: fixedClock });
      const { cursor } = await engine.init();

      const result = await engine.next(encodeCursor(cursor));

      expect(decodeCursor(result.cursor).is_complete).toBe(true);
      expect(ids(result.chunk)).toHaveLength(20);
    });

    it("should reject a corrupt token", async () => {
      const engine = new PaginationEngine(new InMemorySource([]));

      await expect(engine.next("not*a*token")).rejects.toBeInstanceOf(ProtocolError);
    });
  });
});

describe("chunk sizing", () => {
  it("should grow by half on fast calls and shrink by a quarter on slow ones", () => {
    expect(nextChunkSize(1000, 500)).toBe(1500);
    expect(nextChunkSize(4000, 10)).toBe(5000);
    expect(nextChunkSize(5000, 10)).toBe(5000);
    expect(nextChunkSize(1000, 4000)).toBe(750);
    expect(nextChunkSize(120, 4000)).toBe(100);
    expect(nextChunkSize(100, 4000)).toBe(100);
    expect(nextChunkSize(1000, 2000)).toBe(1000);
  });

  it("should never leave the bounds", () => {
    let size = 1000;
    for (let index = 0; index < 500; index++) {
      size = nextChunkSize(size, index % 7 < 3 ? 100 : 5000);
      expect(size).toBeGreaterThanOrEqual(MIN_CHUNK_ROWS);
      expect(size).toBeLessThanOrEqual(MAX_CHUNK_ROWS);
    }
  });

  it("should clamp and truncate", () => {
    expect(clampChunkSize(1)).toBe(100);
    expect(clampChunkSize(1234.9)).toBe(1234);
    expect(clampChunkSize(1e9)).toBe(5000);
  });
});
