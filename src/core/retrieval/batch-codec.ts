/**
 * Batch stream framing.
 *
 * A batch response is a sequence of frames, one per requested file:
 *
 *   {"path":"a/b.txt","size":12}\n<12 raw bytes>
 *   {"path":"missing.txt","error":"not found"}\n
 *
 * The decoder is incremental, so a batch never has to fit in memory.
 */
import { ProtocolError } from "$shared/errors";
import { z } from "zod";

const MAX_HEADER_BYTES = 64 * 1024;
const NEWLINE = 0x0a;

const headerSchema = z.union([
  z.object({ path: z.string().min(1), size: z.number().int().nonnegative() }).strict(),
  z.object({ path: z.string().min(1), error: z.string() }).strict()
]);

export type BatchHeader = z.infer<typeof headerSchema>;

export type BatchEvent =
  | { type: "file"; path: string; size: number }
  | { type: "data"; chunk: Buffer }
  | { type: "end"; path: string }
  | { type: "error"; path: string; message: string };

export const encodeBatchHeader = (header: BatchHeader): Buffer => Buffer.from(`${JSON.stringify(header)}\n`, "utf8");

const invalid = (message: string, context?: Record<string, unknown>) =>
  new ProtocolError("INVALID_RESPONSE", `Invalid batch stream: ${message}`, context);

const parseHeader = (line: Buffer): BatchHeader => {
  let raw: unknown;
  try {
    raw = JSON.parse(line.toString("utf8"));
  } catch (error) {
    throw invalid("header is not JSON", { reason: error instanceof Error ? error.message : String(error) });
  }
  const parsed = headerSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalid("header has the wrong shape", { issues: parsed.error.issues.map((issue) => issue.message) });
  }
  return parsed.data;
};

/**
 * Turns raw response chunks into file events. Every `file` event is followed by
 * its `data` events and exactly one `end`.
 *
 * @throws ProtocolError `INVALID_RESPONSE` on a malformed header or a truncated body.
 */
export async function* decodeBatch(source: AsyncIterable<Buffer | string>): AsyncGenerator<BatchEvent> {
  let pending = Buffer.alloc(0);
  let current: { path: string; remaining: number } | undefined;

  for await (const piece of source) {
    pending = pending.length === 0 ? Buffer.from(piece) : Buffer.concat([pending, Buffer.from(piece)]);

    while (pending.length > 0) {
      if (current) {
        const take = Math.min(current.remaining, pending.length);
        yield { type: "data", chunk: pending.subarray(0, take) };
        pending = pending.subarray(take);
        current.remaining -= take;
        if (current.remaining === 0) {
          yield { type: "end", path: current.path };
          current = undefined;
        }
        continue;
      }

      const newline = pending.indexOf(NEWLINE);
      if (newline === -1) {
        if (pending.length > MAX_HEADER_BYTES) {
          throw invalid("header line too long");
        }
        break;
      }

      const header = parseHeader(pending.subarray(0, newline));
      pending = pending.subarray(newline + 1);

      if ("error" in header) {
        yield { type: "error", path: header.path, message: header.error };
        continue;
      }

      yield { type: "file", path: header.path, size: header.size };
      if (header.size === 0) {
        yield { type: "end", path: header.path };
      } else {
        current = { path: header.path, remaining: header.size };
      }
    }
  }

  if (current) {
    throw invalid("stream ended inside a file body", { path: current.path, missing: current.remaining });
  }
  if (pending.length > 0) {
    throw invalid("stream ended inside a header");
  }
}
