/**
 * node:http front for a SiteEndpoint.
 *
 * Accepts `POST <basePath>sitepull` with a form body (query string fields are
 * merged underneath it) and writes the endpoint's answer back as JSON or as an
 * octet stream.
 */
import type { EndpointResponse, SiteEndpoint } from "$infrastructure/site/site-endpoint";
import { log } from "$lib/log";
import http, { type IncomingMessage, type OutgoingHttpHeaders } from "http";
import type { Readable, Writable } from "stream";
import { pipeline } from "stream/promises";
import { ENDPOINT_PATH, KEY_HEADER } from "./site-client";

export const MAX_BODY_BYTES = 8 * 1024 * 1024;

export type RequestSource = Readable & Pick<IncomingMessage, "headers" | "method" | "url">;

export type ResponseSink = Writable & {
  readonly headersSent: boolean;
  writeHead(status: number, headers: OutgoingHttpHeaders): unknown;
};

export interface EndpointServerOptions {
  endpoint: SiteEndpoint;
  /** Path prefix the endpoint is mounted under, e.g. `/blog/`. */
  basePath?: string;
  maxBodyBytes?: number;
}

class BodyTooLarge extends Error {}

const readForm = async (request: RequestSource, limit: number): Promise<URLSearchParams> => {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of request) {
    const piece = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += piece.length;
    if (size > limit) {
      throw new BodyTooLarge(`Request body exceeds ${limit} bytes`);
    }
    chunks.push(piece);
  }
  return new URLSearchParams(Buffer.concat(chunks).toString("utf8"));
};

const headerValue = (value: string | string[] | undefined): string | undefined => (Array.isArray(value) ? value[0] : value);

const sendJson = (response: ResponseSink, status: number, body: unknown): void => {
  const payload = JSON.stringify(body);
  response.writeHead(status, {
    "content-type": "application/json; charset=utf-8",
    "content-length": Buffer.byteLength(payload),
    "cache-control": "no-store"
  });
  response.end(payload);
};

const send = async (response: ResponseSink, answer: EndpointResponse): Promise<void> => {
  if (answer.kind === "json") {
    sendJson(response, answer.status, answer.body);
    return;
  }

  const headers: OutgoingHttpHeaders = { "content-type": "application/octet-stream", "cache-control": "no-store" };
  if (answer.size !== undefined) {
    headers["content-length"] = answer.size;
  }
  response.writeHead(answer.status, headers);
  await pipeline(answer.body, response);
};

/**
 * Serves one request. Resolves once the answer has been written.
 */
export const serveRequest = async (
  options: EndpointServerOptions,
  request: RequestSource,
  response: ResponseSink
): Promise<void> => {
  const url = new URL(request.url ?? "/", "http://localhost");
  const base = options.basePath ?? "/";
  const expected = `${base.endsWith("/") ? base : `${base}/`}${ENDPOINT_PATH}`;

  if (url.pathname !== expected) {
    sendJson(response, 404, { error: "not_found", message: "Not found." });
    return;
  }
  if (request.method !== "POST") {
    sendJson(response, 405, { error: "method_not_allowed", message: "Use POST." });
    return;
  }

  let form: URLSearchParams;
  try {
    form = await readForm(request, options.maxBodyBytes ?? MAX_BODY_BYTES);
  } catch (error) {
    if (error instanceof BodyTooLarge) {
      sendJson(response, 413, { error: "invalid_request", message: error.message });
      return;
    }
    throw error;
  }

  const params = Object.fromEntries(url.searchParams);
  for (const [name, value] of form) {
    params[name] = value;
  }
  const { action = "", ...rest } = params;

  const answer = await options.endpoint.handle({ action, params: rest, key: headerValue(request.headers[KEY_HEADER]) });
  log.trace(`${action} -> ${answer.status}`);
  await send(response, answer);
};

/**
 * An http.Server answering every request through {@link serveRequest}.
 */
export const createEndpointServer = (options: EndpointServerOptions): http.Server =>
  http.createServer((request, response) => {
    serveRequest(options, request, response).catch((error: unknown) => {
      log.error("request failed", { error: error instanceof Error ? error.message : String(error) });
      if (response.headersSent) {
        response.destroy();
      } else {
        sendJson(response, 500, { error: "internal_error", message: "Internal error." });
      }
    });
  });
