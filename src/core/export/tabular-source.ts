/**
 * The storage engine behind an export, reduced to tables and rows.
 */

export type ColumnValue = string | number | bigint | boolean | null | Uint8Array;

export type Row = Record<string, ColumnValue>;

export type KeyValue = string | number;

export interface TableEstimate {
  /** Approximate row count. Only used to pick a pagination strategy. */
  rows: number;
  /** Approximate data plus index size in bytes. */
  bytes: number;
}

export interface TabularSource {
  /** SQL flavour of the statements produced by {@link createStatement}. */
  readonly dialect: "mysql" | "sqlite";

  listTables(): Promise<string[]>;
  estimate(table: string): Promise<TableEstimate>;

  /**
   * Primary key columns in key order. Empty when the table has none.
   */
  primaryKey(table: string): Promise<string[]>;

  /**
   * The statement that recreates the table, without a trailing semicolon.
   */
  createStatement(table: string): Promise<string>;

  /**
   * `LIMIT limit OFFSET offset`, in the source's natural order.
   */
  readOffset(table: string, offset: number, limit: number): Promise<Row[]>;

  /**
   * Rows whose `key` column is strictly greater than `after` (all rows when `after` is null),
   * ordered by `key`.
   */
  readAfter(table: string, key: string, after: KeyValue | null, limit: number): Promise<Row[]>;
}
