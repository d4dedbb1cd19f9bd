/**
 * SQL dump text: header, per-table structure, row inserts and footer.
 */
import type { ColumnValue, Row, TabularSource } from "./tabular-source";

export type SqlDialect = TabularSource["dialect"];

export const quoteIdentifier = (identifier: string): string => `\`${identifier.replace(/`/g, "``")}\``;

const MYSQL_ESCAPES: Record<string, string> = {
  "\0": "\\0",
  "\n": "\\n",
  "\r": "\\r",
  "\\": "\\\\",
  "'": "\\'",
  '"': '\\"',
  "\x1a": "\\Z"
};

export const escapeValue = (value: ColumnValue, dialect: SqlDialect): string => {
  if (value === null) {
    return "NULL";
  }
  if (typeof value === "boolean") {
    return value ? "1" : "0";
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "NULL";
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return value.length === 0 ? "''" : `X'${Buffer.from(value).toString("hex")}'`;
  }
  if (dialect === "sqlite") {
    return `'${value.replace(/'/g, "''")}'`;
  }
  return `'${value.replace(/[\0\n\r\\'"\x1a]/g, (char) => MYSQL_ESCAPES[char])}'`;
};

export interface DumpHeaderOptions {
  generatedAt: Date;
  source?: string;
}

/**
 * Formats statements for one dialect. Every method returns complete lines.
 */
export class SqlDumpWriter {
  constructor(readonly dialect: SqlDialect) {}

  header({ generatedAt, source }: DumpHeaderOptions): string {
    let sql = "-- sitepull database export\n";
    sql += `-- Generated: ${generatedAt.toISOString()}\n`;
    if (source) {
      sql += `-- Source: ${source}\n`;
    }
    sql += "\n";

    if (this.dialect === "sqlite") {
      return sql + "PRAGMA foreign_keys = OFF;\nBEGIN TRANSACTION;\n\n";
    }

    sql += "SET SQL_MODE = 'NO_AUTO_VALUE_ON_ZERO';\n";
    sql += "SET time_zone = '+00:00';\n";
    sql += "SET foreign_key_checks = 0;\n\n";
    sql += "/*!40101 SET @OLD_CHARACTER_SET_CLIENT=@@CHARACTER_SET_CLIENT */;\n";
    sql += "/*!40101 SET @OLD_CHARACTER_SET_RESULTS=@@CHARACTER_SET_RESULTS */;\n";
    sql += "/*!40101 SET @OLD_COLLATION_CONNECTION=@@COLLATION_CONNECTION */;\n";
    sql += "/*!40101 SET NAMES utf8mb4 */;\n\n";
    return sql;
  }

  openTable(table: string, createStatement: string): string {
    const name = quoteIdentifier(table);
    let sql = `\n-- Table: ${table}\n`;
    sql += `DROP TABLE IF EXISTS ${name};\n`;
    sql += `${createStatement};\n\n`;

    if (this.dialect === "mysql") {
      sql += `LOCK TABLES ${name} WRITE;\n`;
      sql += `/*!40000 ALTER TABLE ${name} DISABLE KEYS */;\n\n`;
    }
    return sql;
  }

  insert(table: string, row: Row): string {
    const columns = Object.keys(row);
    const columnList = columns.map(quoteIdentifier).join(", ");
    const values = columns.map((column) => escapeValue(row[column], this.dialect)).join(", ");
    return `INSERT INTO ${quoteIdentifier(table)} (${columnList}) VALUES (${values});\n`;
  }

  closeTable(table: string): string {
    if (this.dialect === "sqlite") {
      return "\n";
    }
    return `\n/*!40000 ALTER TABLE ${quoteIdentifier(table)} ENABLE KEYS */;\nUNLOCK TABLES;\n\n`;
  }

  footer(): string {
    if (this.dialect === "sqlite") {
      return "\n-- Export completed\nCOMMIT;\nPRAGMA foreign_keys = ON;\n";
    }

    let sql = "\n-- Export completed\n";
    sql += "SET foreign_key_checks = 1;\n";
    sql += "/*!40101 SET CHARACTER_SET_CLIENT=@OLD_CHARACTER_SET_CLIENT */;\n";
    sql += "/*!40101 SET CHARACTER_SET_RESULTS=@OLD_CHARACTER_SET_RESULTS */;\n";
    sql += "/*!40101 SET COLLATION_CONNECTION=@OLD_COLLATION_CONNECTION */;\n";
    return sql;
  }
}
