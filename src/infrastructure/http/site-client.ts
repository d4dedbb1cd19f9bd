/**
 * HTTP client for a site endpoint.
 *
 * Every operation is a `POST <base>/sitepull` form request carrying an `action`
 * field and the access key header. JSON answers are validated before use;
 * downloads come back as streams.
 */
import type {
  DbJobInitResponse,
  DbJobProcessResponse,
  ManifestJobInitResponse,
  ManifestJobPageResponse,
  SiteTransport
} from "$core/transport/site-transport";
import { log } from "$lib/log";
import { ErrorFactory, ProtocolError, TransportError, ValidationError } from "$shared/errors";
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import http from "http";
import https from "https";
import { Readable } from "stream";
import { z } from "zod";

export const KEY_HEADER = "x-sitepull-key";
export const ENDPOINT_PATH = "sitepull";

const dbJobInitSchema = z.object({
  job_id: z.string().min(1),
  total_tables: z.number().int().nonnegative(),
  total_rows: z.number().int().nonnegative(),
  bytes_written: z.number().int().nonnegative()
});

const dbJobProcessSchema = z.object({
  bytes_written: z.number().int().nonnegative(),
  completed_tables: z.number().int().nonnegative(),
  total_tables: z.number().int().nonnegative(),
  done: z.boolean()
});

const manifestJobInitSchema = z.object({
  job_id: z.string().min(1),
  total_files: z.number().int().nonnegative(),
  total_bytes: z.number().int().nonnegative()
});

const manifestJobPageSchema = z.object({
  files: z.array(
    z.object({
      path: z.string().min(1),
      size: z.number().int().nonnegative(),
      mtime: z.number().int()
    })
  ),
  total_files: z.number().int().nonnegative(),
  total_bytes: z.number().int().nonnegative()
});

const okSchema = z.object({ ok: z.literal(true) });

export interface HttpSiteClientOptions {
  /** Site root, e.g. `https://example.com/`. */
  baseUrl: string;
  key: string;
  /** Socket timeout per request. */
  timeoutMs?: number;
  /** Replaces the default axios instance. */
  http?: AxiosInstance;
}

/**
 * Resolves the endpoint URL for a site root.
 *
 * @throws ValidationError when `baseUrl` is not an http(s) URL.
 */
export const endpointUrl = (baseUrl: string): string => {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch {
    throw new ValidationError(`Invalid URL: ${baseUrl}`, { url: baseUrl });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError(`Unsupported URL scheme: ${url.protocol}`, { url: baseUrl });
  }
  url.pathname = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
  url.search = "";
  url.hash = "";
  return new URL(ENDPOINT_PATH, url).toString();
};

const readAll = async (stream: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

const parseBody = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

export class HttpSiteClient implements SiteTransport {
  readonly endpoint: string;
  private readonly http: AxiosInstance;

  constructor(private readonly options: HttpSiteClientOptions) {
    if (options.key.length === 0) {
      throw new ValidationError("An access key is required");
    }
    this.endpoint = endpointUrl(options.baseUrl);
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? 60_000,
        httpAgent: new http.Agent({ keepAlive: true }),
        httpsAgent: new https.Agent({ keepAlive: true }),
        maxContentLength: Infinity,
        maxBodyLength: Infinity
      });
  }

  async dbJobInit(): Promise<DbJobInitResponse> {
    const body = await this.json("db_job_init", {}, dbJobInitSchema);
    return {
      jobId: body.job_id,
      totalTables: body.total_tables,
      totalRows: body.total_rows,
      bytesWritten: body.bytes_written
    };
  }

  async dbJobProcess(jobId: string, timeBudgetSeconds?: number): Promise<DbJobProcessResponse> {
    const params: Record<string, string> = { job_id: jobId };
    if (timeBudgetSeconds !== undefined) {
      params.time_budget = String(timeBudgetSeconds);
    }
    const body = await this.json("db_job_process", params, dbJobProcessSchema);
    return {
      bytesWritten: body.bytes_written,
      completedTables: body.completed_tables,
      totalTables: body.total_tables,
      done: body.done
    };
  }

  async dbJobDownload(jobId: string): Promise<Readable> {
    return this.stream("db_job_download", { job_id: jobId });
  }

  async dbJobFinish(jobId: string): Promise<void> {
    await this.json("db_job_finish", { job_id: jobId }, okSchema);
  }

  async manifestJobInit(): Promise<ManifestJobInitResponse> {
    const body = await this.json("manifest_job_init", {}, manifestJobInitSchema);
    return { jobId: body.job_id, totalFiles: body.total_files, totalBytes: body.total_bytes };
  }

  async manifestJobPage(jobId: string, offset: number, limit: number): Promise<ManifestJobPageResponse> {
    const body = await this.json(
      "manifest_job_page",
      { job_id: jobId, offset: String(offset), limit: String(limit) },
      manifestJobPageSchema
    );
    return { files: body.files, totalFiles: body.total_files, totalBytes: body.total_bytes };
  }

  async manifestJobFinish(jobId: string): Promise<void> {
    await this.json("manifest_job_finish", { job_id: jobId }, okSchema);
  }

  async fileFetch(path: string): Promise<Readable> {
    return this.stream("file_fetch", { path });
  }

  async fileBatch(paths: string[]): Promise<Readable> {
    return this.stream("file_batch", { paths: JSON.stringify(paths) });
  }

  private async post(action: string, params: Record<string, string>, responseType: "json" | "stream"): Promise<AxiosResponse<unknown>> {
    const form = new URLSearchParams({ action, ...params });
    log.trace(`POST ${action}`, params);
    try {
      return await this.http.post<unknown>(this.endpoint, form.toString(), {
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          [KEY_HEADER]: this.options.key
        },
        responseType,
        validateStatus: () => true
      });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw ErrorFactory.fromAxiosError(error, action);
      }
      throw new TransportError(`${action} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async json<T>(action: string, params: Record<string, string>, schema: z.ZodType<T>): Promise<T> {
    const response = await this.post(action, params, "json");
    const body = typeof response.data === "string" ? parseBody(response.data) : response.data;
    if (response.status < 200 || response.status >= 300) {
      throw ErrorFactory.fromHttpResponse(response.status, body, action);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError("INVALID_RESPONSE", `${action} returned an unexpected response`, {
        action,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
    }
    return parsed.data;
  }

  private async stream(action: string, params: Record<string, string>): Promise<Readable> {
    const response = await this.post(action, params, "stream");
    const { data } = response;
    if (!(data instanceof Readable)) {
      throw new ProtocolError("INVALID_RESPONSE", `${action} did not return a byte stream`, { action });
    }
    if (response.status < 200 || response.status >= 300) {
      throw ErrorFactory.fromHttpResponse(response.status, parseBody(await readAll(data)), action);
    }
    return data;
  }
}
