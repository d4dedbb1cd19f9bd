/**
 * Export Pagination Engine
 *
 * Exports every table of a {@link TabularSource} as SQL, one bounded slice per call.
 * All progress lives in the cursor, so successive calls may land on different
 * processes. Calls for one cursor must never overlap.
 *
 * Large tables (by row or byte estimate) with a single-column primary key are read
 * with keyset pagination (`WHERE key > last ORDER BY key`), everything else with
 * `LIMIT/OFFSET`. The chunk size adapts to how long each call took.
 */
import { InternalError } from "$shared/errors";
import { v4 as uuidv4 } from "uuid";
import { gzipSync } from "zlib";
import { CURSOR_VERSION, decodeCursor, encodeCursor, type Cursor, type PrimaryKeyValue, type TableInfo } from "./cursor";
import { SqlDumpWriter } from "./sql-dump";
import type { ColumnValue, TabularSource } from "./tabular-source";

export const DEFAULT_CHUNK_ROWS = 1000;
export const MIN_CHUNK_ROWS = 100;
export const MAX_CHUNK_ROWS = 5000;
export const KEYSET_THRESHOLD_ROWS = 100_000;
export const KEYSET_THRESHOLD_BYTES = 100 * 1024 * 1024;
export const DEFAULT_TIME_BUDGET_MS = 5000;

/** Calls faster than this grow the chunk size by half. */
export const FAST_CALL_MS = 1000;
/** Calls slower than this shrink the chunk size by a quarter. */
export const SLOW_CALL_MS = 3000;

export type Compression = "none" | "gzip";
export type PaginationStrategy = "keyset" | "offset";

export interface PaginationEngineOptions {
  /** Millisecond clock used for the time budget and chunk sizing. */
  clock?: () => number;
  /** Wall clock for the dump header. */
  now?: () => Date;
  sessionId?: () => string;
  /** Disable to keep the chunk size fixed at its initial value. */
  adaptiveSizing?: boolean;
  /** Label written into the dump header. */
  sourceLabel?: string;
}

export interface ExportMetadata {
  tables: string[];
  totalTables: number;
  totalRows: number;
  totalBytes: number;
  chunkSize: number;
}

export interface ExportInit {
  cursor: Cursor;
  preamble: string;
  metadata: ExportMetadata;
}

export interface StepOptions {
  /** Stop emitting rows once the call has run this long. */
  timeBudgetMs?: number;
  compression?: Compression;
}

export interface StepProgress {
  currentTable: string;
  currentTableIndex: number;
  tablesCompleted: number;
  rowsInChunk: number;
  bytesInChunk: number;
  structureEmitted: boolean;
  tableFinished: boolean;
}

export interface StepPerformance {
  queryTimeMs: number;
  totalTimeMs: number;
  compression: Compression;
  strategy: PaginationStrategy | null;
  chunkSizeUsed: number;
  chunkSizeNext: number;
}

export interface StepResult {
  chunk: Buffer;
  cursor: Cursor;
  isComplete: boolean;
  progress: StepProgress;
  performance: StepPerformance;
}

export interface TokenStepResult extends Omit<StepResult, "cursor"> {
  cursor: string;
}

export const clampChunkSize = (size: number): number =>
  Math.max(MIN_CHUNK_ROWS, Math.min(MAX_CHUNK_ROWS, Math.trunc(size)));

/**
 * Multiplicative increase on fast calls, multiplicative decrease on slow ones.
 */
export const nextChunkSize = (current: number, elapsedMs: number): number => {
  if (elapsedMs < FAST_CALL_MS && current < MAX_CHUNK_ROWS) {
    return Math.trunc(Math.min(MAX_CHUNK_ROWS, current * 1.5));
  }
  if (elapsedMs > SLOW_CALL_MS && current > MIN_CHUNK_ROWS) {
    return Math.trunc(Math.max(MIN_CHUNK_ROWS, current * 0.75));
  }
  return current;
};

export const prefersKeyset = (estimate: { rows: number; bytes: number }): boolean =>
  estimate.rows > KEYSET_THRESHOLD_ROWS || estimate.bytes > KEYSET_THRESHOLD_BYTES;

const toKeyValue = (value: ColumnValue | undefined, table: string, column: string): Exclude<PrimaryKeyValue, null> => {
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  throw new InternalError(`Primary key ${table}.${column} returned a value that cannot order a keyset page`, {
    table,
    column,
    type: value === null ? "null" : typeof value
  });
};

export class PaginationEngine {
  private readonly writer: SqlDumpWriter;
  private readonly clock: () => number;
  private readonly now: () => Date;
  private readonly sessionId: () => string;
  private readonly adaptiveSizing: boolean;

  constructor(
    private readonly source: TabularSource,
    private readonly options: PaginationEngineOptions = {}
  ) {
    this.writer = new SqlDumpWriter(source.dialect);
    this.clock = options.clock ?? (() => performance.now());
    this.now = options.now ?? (() => new Date());
    this.sessionId = options.sessionId ?? uuidv4;
    this.adaptiveSizing = options.adaptiveSizing ?? true;
  }

  /**
   * Enumerates the tables once and builds the first cursor.
   *
   * @param chunkSizeHint - Rows per slice, clamped to [MIN_CHUNK_ROWS, MAX_CHUNK_ROWS].
   */
  async init(chunkSizeHint?: number): Promise<ExportInit> {
    const chunkSize = chunkSizeHint === undefined ? DEFAULT_CHUNK_ROWS : clampChunkSize(chunkSizeHint);
    const tables = await this.source.listTables();

    let totalRows = 0;
    let totalBytes = 0;
    const perTableInfo: Record<string, TableInfo> = {};

    for (const table of tables) {
      const estimate = await this.source.estimate(table);
      totalRows += estimate.rows;
      totalBytes += estimate.bytes;
      perTableInfo[table] = {
        row_count_estimate: estimate.rows,
        byte_size_estimate: estimate.bytes,
        use_keyset: prefersKeyset(estimate)
      };
    }

    const cursor: Cursor = {
      version: CURSOR_VERSION,
      session_id: this.sessionId(),
      tables,
      table_index: 0,
      table_name: tables[0] ?? "",
      offset: 0,
      last_primary_key: null,
      schema_sent: false,
      chunk_size: chunkSize,
      is_complete: tables.length === 0,
      per_table_info: perTableInfo
    };

    let preamble = this.writer.header({ generatedAt: this.now(), source: this.options.sourceLabel });
    if (cursor.is_complete) {
      preamble += this.writer.footer();
    }

    return {
      cursor,
      preamble,
      metadata: {
        tables,
        totalTables: tables.length,
        totalRows,
        totalBytes,
        chunkSize
      }
    };
  }

  /**
   * Token-in, token-out variant of {@link step} for stateless callers.
   *
   * @throws ProtocolError when the token does not decode.
   */
  async next(token: string, options: StepOptions = {}): Promise<TokenStepResult> {
    const result = await this.step(decodeCursor(token), options);
    return { ...result, cursor: encodeCursor(result.cursor) };
  }

  /**
   * Produces the next slice. The given cursor is never modified, so a failed call
   * can be retried with the same cursor.
   */
  async step(input: Cursor, { timeBudgetMs = DEFAULT_TIME_BUDGET_MS, compression = "none" }: StepOptions = {}): Promise<StepResult> {
    const start = this.clock();
    const cursor = structuredClone(input);
    const chunkSizeUsed = cursor.chunk_size;

    const progress: StepProgress = {
      currentTable: cursor.table_name,
      currentTableIndex: cursor.table_index,
      tablesCompleted: cursor.table_index,
      rowsInChunk: 0,
      bytesInChunk: 0,
      structureEmitted: false,
      tableFinished: false
    };

    if (cursor.is_complete) {
      return {
        chunk: Buffer.alloc(0),
        cursor,
        isComplete: true,
        progress,
        performance: {
          queryTimeMs: 0,
          totalTimeMs: 0,
          compression,
          strategy: null,
          chunkSizeUsed,
          chunkSizeNext: chunkSizeUsed
        }
      };
    }

    const table = cursor.table_name;
    let sql = "";

    if (!cursor.schema_sent) {
      sql += this.writer.openTable(table, await this.source.createStatement(table));
      cursor.schema_sent = true;
      progress.structureEmitted = true;
    }

    const key = await this.resolveKeysetColumn(table, cursor.per_table_info[table]);
    const strategy: PaginationStrategy = key === null ? "offset" : "keyset";
    const limit = cursor.chunk_size;

    // One row of look-ahead tells an exhausted table apart from a full page.
    const queryStart = this.clock();
    const rows =
      key === null
        ? await this.source.readOffset(table, cursor.offset, limit + 1)
        : await this.source.readAfter(table, key, cursor.last_primary_key, limit + 1);
    const queryTimeMs = this.clock() - queryStart;

    const page = rows.slice(0, limit);
    let emitted = 0;

    for (const row of page) {
      // The first row is always written so every call makes progress.
      if (emitted > 0 && this.clock() - start > timeBudgetMs) {
        break;
      }
      sql += this.writer.insert(table, row);
      emitted++;
      if (key !== null) {
        cursor.last_primary_key = toKeyValue(row[key], table, key);
      }
    }

    if (key === null) {
      cursor.offset += emitted;
    }
    progress.rowsInChunk = emitted;

    if (rows.length <= limit && emitted === page.length) {
      sql += this.writer.closeTable(table);
      progress.tableFinished = true;
      this.advance(cursor);
      if (cursor.is_complete) {
        sql += this.writer.footer();
      }
    }
    progress.tablesCompleted = cursor.table_index;

    const totalTimeMs = this.clock() - start;
    if (this.adaptiveSizing) {
      cursor.chunk_size = nextChunkSize(cursor.chunk_size, totalTimeMs);
    }

    const raw = Buffer.from(sql, "utf8");
    progress.bytesInChunk = raw.length;

    return {
      chunk: compression === "gzip" ? gzipSync(raw, { level: 6 }) : raw,
      cursor,
      isComplete: cursor.is_complete,
      progress,
      performance: {
        queryTimeMs,
        totalTimeMs,
        compression,
        strategy,
        chunkSizeUsed,
        chunkSizeNext: cursor.chunk_size
      }
    };
  }

  /**
   * Looks the primary key up at most once per table and caches the answer in the cursor.
   */
  private async resolveKeysetColumn(table: string, info: TableInfo): Promise<string | null> {
    if (!info.use_keyset) {
      return null;
    }
    if (info.primary_key_column === undefined) {
      const columns = await this.source.primaryKey(table);
      info.primary_key_column = columns.length === 1 ? columns[0] : null;
    }
    return info.primary_key_column ?? null;
  }

  private advance(cursor: Cursor): void {
    cursor.table_index++;
    cursor.offset = 0;
    cursor.last_primary_key = null;
    cursor.schema_sent = false;

    if (cursor.table_index < cursor.tables.length) {
      cursor.table_name = cursor.tables[cursor.table_index];
    } else {
      cursor.table_name = "";
      cursor.is_complete = true;
    }
  }
}
