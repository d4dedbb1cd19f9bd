/**
 * Cursor Codec
 *
 * The cursor is the whole resume state of a database export. It travels between
 * requests as an opaque token, so the endpoint never has to hold the export in memory.
 */
import { ProtocolError } from "$shared/errors";
import { z } from "zod";

export const CURSOR_VERSION = 1;

const primaryKeyColumnSchema = z.union([z.string().min(1), z.null()]);

export const tableInfoSchema = z
  .object({
    row_count_estimate: z.number().int().nonnegative(),
    byte_size_estimate: z.number().int().nonnegative(),
    use_keyset: z.boolean(),
    /**
     * `undefined` until the primary key has been looked up for the table, then the
     * column name, or `null` when the table has no single-column key.
     */
    primary_key_column: primaryKeyColumnSchema.optional()
  })
  .strict();

export const cursorSchema = z
  .object({
    version: z.literal(CURSOR_VERSION),
    session_id: z.string().min(1),
    tables: z.array(z.string().min(1)),
    table_index: z.number().int().nonnegative(),
    table_name: z.string(),
    offset: z.number().int().nonnegative(),
    last_primary_key: z.union([z.string(), z.number(), z.null()]),
    schema_sent: z.boolean(),
    chunk_size: z.number().int().positive(),
    is_complete: z.boolean(),
    per_table_info: z.record(z.string(), tableInfoSchema)
  })
  .strict()
  .superRefine((cursor, ctx) => {
    if (cursor.table_index > cursor.tables.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["table_index"], message: "table_index is past the table list" });
    }
    if (cursor.table_index < cursor.tables.length && cursor.tables[cursor.table_index] !== cursor.table_name) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["table_name"], message: "table_name does not match table_index" });
    }
    if (cursor.is_complete !== (cursor.table_index === cursor.tables.length)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["is_complete"], message: "is_complete disagrees with table_index" });
    }
    for (const table of cursor.tables) {
      if (!(table in cursor.per_table_info)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["per_table_info", table], message: "missing table info" });
      }
    }
  });

export type TableInfo = z.infer<typeof tableInfoSchema>;
export type Cursor = z.infer<typeof cursorSchema>;
export type PrimaryKeyValue = Cursor["last_primary_key"];

/**
 * Rebuilds the cursor with a fixed key order so that equal cursors always
 * serialize to the same bytes.
 */
const canonicalize = (cursor: Cursor): Cursor => {
  const perTableInfo: Record<string, TableInfo> = {};
  for (const table of Object.keys(cursor.per_table_info).sort()) {
    const info = cursor.per_table_info[table];
    perTableInfo[table] = {
      row_count_estimate: info.row_count_estimate,
      byte_size_estimate: info.byte_size_estimate,
      use_keyset: info.use_keyset,
      ...(info.primary_key_column !== undefined ? { primary_key_column: info.primary_key_column } : {})
    };
  }

  return {
    version: cursor.version,
    session_id: cursor.session_id,
    tables: [...cursor.tables],
    table_index: cursor.table_index,
    table_name: cursor.table_name,
    offset: cursor.offset,
    last_primary_key: cursor.last_primary_key,
    schema_sent: cursor.schema_sent,
    chunk_size: cursor.chunk_size,
    is_complete: cursor.is_complete,
    per_table_info: perTableInfo
  };
};

export const encodeCursor = (cursor: Cursor): string =>
  Buffer.from(JSON.stringify(canonicalize(cursor)), "utf8").toString("base64url");

/**
 * Decodes and validates a cursor token.
 *
 * @throws ProtocolError with code `INVALID_CURSOR` when the token is not a cursor.
 */
export const decodeCursor = (token: string): Cursor => {
  if (typeof token !== "string" || token.length === 0 || !/^[A-Za-z0-9_-]+$/.test(token)) {
    throw new ProtocolError("INVALID_CURSOR", "Invalid cursor: token is not base64url.");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, "base64url").toString("utf8"));
  } catch (error) {
    throw new ProtocolError("INVALID_CURSOR", "Invalid cursor: token is not JSON.", {
      reason: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = cursorSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError("INVALID_CURSOR", "Invalid cursor: structure is corrupt.", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }

  return canonicalize(parsed.data);
};
