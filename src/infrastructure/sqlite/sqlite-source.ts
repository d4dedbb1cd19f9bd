/**
 * SQLite TabularSource over better-sqlite3.
 *
 * Reads are synchronous in better-sqlite3; each call is short because the
 * pagination engine bounds every read by its chunk size.
 */
import type { ColumnValue, KeyValue, Row, TableEstimate, TabularSource } from "$core/export/tabular-source";
import { log } from "$lib/log";
import { InternalError, StorageError } from "$shared/errors";
import Database from "better-sqlite3";

/** Used when the dbstat virtual table is not compiled in. */
const FALLBACK_ROW_BYTES = 128;

const quote = (identifier: string): string => `"${identifier.replace(/"/g, '""')}"`;

const toColumnValue = (table: string, column: string, value: unknown): ColumnValue => {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "bigint") {
    return value;
  }
  if (value instanceof Uint8Array) {
    return value;
  }
  throw new InternalError(`Unsupported value in ${table}.${column}`, { type: typeof value });
};

const toRow = (table: string, raw: unknown): Row => {
  if (raw === null || typeof raw !== "object") {
    throw new InternalError(`Unexpected row shape in ${table}`);
  }
  const row: Row = {};
  for (const [column, value] of Object.entries(raw)) {
    row[column] = toColumnValue(table, column, value);
  }
  return row;
};

const numberField = (raw: unknown, field: string): number => {
  if (raw !== null && typeof raw === "object" && field in raw) {
    const value: unknown = Reflect.get(raw, field);
    if (typeof value === "number") {
      return value;
    }
    if (typeof value === "bigint") {
      return Number(value);
    }
  }
  return 0;
};

const stringField = (raw: unknown, field: string): string | undefined => {
  if (raw !== null && typeof raw === "object" && field in raw) {
    const value: unknown = Reflect.get(raw, field);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
};

export class SqliteSource implements TabularSource {
  readonly dialect = "sqlite" as const;
  private readonly db: Database.Database;
  private readonly owned: boolean;

  /**
   * Arguments:
   * - database: A database file, opened read-only, or an open handle the caller keeps owning
   */
  constructor(database: string | Database.Database) {
    if (typeof database === "string") {
      try {
        this.db = new Database(database, { readonly: true, fileMustExist: true });
        this.owned = true;
      } catch (error) {
        throw new StorageError(`Cannot open database ${database}: ${error instanceof Error ? error.message : String(error)}`, {
          database
        });
      }
    } else {
      this.db = database;
      this.owned = false;
    }
  }

  async listTables(): Promise<string[]> {
    return this.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all()
      .map((row) => stringField(row, "name"))
      .filter((name): name is string => name !== undefined);
  }

  async estimate(table: string): Promise<TableEstimate> {
    const rows = numberField(this.db.prepare(`SELECT COUNT(*) AS count FROM ${quote(table)}`).get(), "count");
    let bytes: number;
    try {
      bytes = numberField(this.db.prepare("SELECT SUM(pgsize) AS bytes FROM dbstat WHERE name = ?").get(table), "bytes");
    } catch (error) {
      log.trace("dbstat unavailable, estimating table size from its row count", {
        table,
        reason: error instanceof Error ? error.message : String(error)
      });
      bytes = rows * FALLBACK_ROW_BYTES;
    }
    return { rows, bytes };
  }

  async primaryKey(table: string): Promise<string[]> {
    return this.db
      .prepare(`PRAGMA table_info(${quote(table)})`)
      .all()
      .map((column) => ({ name: stringField(column, "name"), position: numberField(column, "pk") }))
      .filter((column): column is { name: string; position: number } => column.name !== undefined && column.position > 0)
      .sort((a, b) => a.position - b.position)
      .map((column) => column.name);
  }

  async createStatement(table: string): Promise<string> {
    const sql = stringField(this.db.prepare("SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?").get(table), "sql");
    if (sql === undefined) {
      throw new InternalError(`No definition for table ${table}`, { table });
    }
    return sql.trim().replace(/;+$/, "");
  }

  async readOffset(table: string, offset: number, limit: number): Promise<Row[]> {
    return this.db
      .prepare(`SELECT * FROM ${quote(table)} LIMIT ? OFFSET ?`)
      .all(limit, offset)
      .map((row) => toRow(table, row));
  }

  async readAfter(table: string, key: string, after: KeyValue | null, limit: number): Promise<Row[]> {
    const column = quote(key);
    const rows =
      after === null
        ? this.db.prepare(`SELECT * FROM ${quote(table)} ORDER BY ${column} LIMIT ?`).all(limit)
        : this.db.prepare(`SELECT * FROM ${quote(table)} WHERE ${column} > ? ORDER BY ${column} LIMIT ?`).all(after, limit);
    return rows.map((row) => toRow(table, row));
  }

  /**
   * Closes a database this source opened; a handle passed in stays open.
   */
  close(): void {
    if (this.owned) {
      this.db.close();
    }
  }
}
