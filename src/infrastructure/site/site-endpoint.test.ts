import { decodeBatch, type BatchEvent } from "$core/retrieval/batch-codec";
import { InMemoryKeyValueStore } from "$infrastructure/kv/in-memory-kv-store";
import { InMemorySource } from "$test/in-memory-source";
import { existsSync, promises as fs } from "fs";
import { tmpdir } from "os";
import path from "path";
import type { Readable } from "stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SiteEndpoint, keysMatch, type EndpointResponse, type SiteEndpointOptions } from "./site-endpoint";

const KEY = "test-secret";

const text = async (stream: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
};

const bodyOf = (response: EndpointResponse): unknown => {
  if (response.kind !== "json") {
    throw new Error(`expected a JSON answer, got a stream with status ${response.status}`);
  }
  return response.body;
};

const streamOf = (response: EndpointResponse): Readable => {
  if (response.kind !== "stream") {
    throw new Error(`expected a stream, got ${JSON.stringify(response.body)}`);
  }
  return response.body;
};

describe("keysMatch", () => {
  it("should only accept the exact key", () => {
    expect(keysMatch(KEY, KEY)).toBe(true);
    expect(keysMatch(KEY, "test-secreT")).toBe(false);
    expect(keysMatch(KEY, `${KEY}x`)).toBe(false);
    expect(keysMatch(KEY, "")).toBe(false);
    expect(keysMatch(KEY, undefined)).toBe(false);
  });
});

describe("SiteEndpoint", () => {
  let root: string;
  let work: string;
  let jobs: number;

  const endpoint = (options: Partial<SiteEndpointOptions> = {}) =>
    new SiteEndpoint({
      root,
      key: KEY,
      store: new InMemoryKeyValueStore(),
      workDir: work,
      source: new InMemorySource([InMemorySource.counting("posts", 3), InMemorySource.counting("users", 2500)]),
      pagination: { clock: () => 0, now: () => new Date(Date.UTC(2024, 0, 2)), sessionId: () => "session", adaptiveSizing: false },
      clock: () => 0,
      jobId: () => `job-${++jobs}`,
      ...options
    });

  const call = (site: SiteEndpoint, action: string, params: Record<string, string> = {}) =>
    site.handle({ action, params, key: KEY });

  beforeEach(async () => {
    jobs = 0;
    root = await fs.mkdtemp(path.join(tmpdir(), "sitepull-site-"));
    work = await fs.mkdtemp(path.join(tmpdir(), "sitepull-work-"));
    await fs.mkdir(path.join(root, "wp-content/uploads"), { recursive: true });
    await fs.mkdir(path.join(root, ".git"));
    await fs.writeFile(path.join(root, "index.php"), "<?php");
    await fs.writeFile(path.join(root, "b.txt"), "bravo");
    await fs.writeFile(path.join(root, "wp-content/uploads/a.jpg"), "jpeg-bytes");
    await fs.writeFile(path.join(root, ".git/HEAD"), "ref: refs/heads/main");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(work, { recursive: true, force: true });
  });

  describe("access key", () => {
    it("should reject a wrong or missing key", async () => {
      const site = endpoint();

      const wrong = await site.handle({ action: "manifest_job_init", params: {}, key: "other-secret" });
      const missing = await site.handle({ action: "manifest_job_init", params: {} });

      expect(wrong).toEqual({ kind: "json", status: 403, body: { error: "forbidden", message: "Invalid access key." } });
      expect(missing.status).toBe(403);
    });

    it("should accept the key as a form field", async () => {
      const response = await endpoint().handle({ action: "manifest_job_init", params: { key: KEY } });

      expect(response.status).toBe(200);
    });
  });

  describe("database jobs", () => {
    it("should export in slices that add up to the whole dump", async () => {
      let now = 0;
      const site = endpoint({ clock: () => (now += 1000) });

      const init = bodyOf(await call(site, "db_job_init"));
      const artifact = path.join(work, "job-1.sql");
      expect(init).toEqual({
        job_id: "job-1",
        total_tables: 2,
        total_rows: 2503,
        bytes_written: (await fs.stat(artifact)).size
      });

      const slices: unknown[] = [];
      for (let index = 0; index < 4; index++) {
        slices.push(bodyOf(await call(site, "db_job_process", { job_id: "job-1", time_budget: "1" })));
      }

      const size = (await fs.stat(artifact)).size;
      expect(slices).toMatchObject([
        { completed_tables: 1, total_tables: 2, done: false },
        { completed_tables: 1, total_tables: 2, done: false },
        { completed_tables: 1, total_tables: 2, done: false },
        { completed_tables: 2, total_tables: 2, done: true, bytes_written: size }
      ]);

      const dump = await text(streamOf(await call(site, "db_job_download", { job_id: "job-1" })));
      expect(dump.match(/^INSERT INTO `users`/gm)).toHaveLength(2500);
      expect(dump).toContain("INSERT INTO `posts` (`id`, `name`) VALUES (3, 'posts-3');\n");
      expect(dump).toContain("INSERT INTO `users` (`id`, `name`) VALUES (2500, 'users-2500');\n");
      expect(dump.endsWith("/*!40101 SET COLLATION_CONNECTION=@OLD_COLLATION_CONNECTION */;\n")).toBe(true);
      expect(Buffer.byteLength(dump)).toBe(size);
    });

    it("should finish the export in one request when the budget allows", async () => {
      const site = endpoint();
      await call(site, "db_job_init");

      const progress = bodyOf(await call(site, "db_job_process", { job_id: "job-1" }));

      expect(progress).toMatchObject({ completed_tables: 2, total_tables: 2, done: true });
    });

    it("should answer repeated process calls after completion without writing", async () => {
      const site = endpoint();
      await call(site, "db_job_init");
      const done = bodyOf(await call(site, "db_job_process", { job_id: "job-1" }));

      const again = bodyOf(await call(site, "db_job_process", { job_id: "job-1" }));

      expect(again).toEqual(done);
    });

    it("should refuse to download a running export", async () => {
      const site = endpoint();
      await call(site, "db_job_init");

      const response = await call(site, "db_job_download", { job_id: "job-1" });

      expect(response).toMatchObject({ status: 400, body: { error: "invalid_request" } });
    });

    it("should forget the job and its dump on finish", async () => {
      const site = endpoint();
      await call(site, "db_job_init");

      expect(bodyOf(await call(site, "db_job_finish", { job_id: "job-1" }))).toEqual({ ok: true });
      expect(existsSync(path.join(work, "job-1.sql"))).toBe(false);

      const response = await call(site, "db_job_process", { job_id: "job-1" });
      expect(response).toEqual({
        kind: "json",
        status: 404,
        body: { error: "job_not_found", message: "Database job not found or expired." }
      });
    });

    it("should remove dumps older than the job TTL when a new export starts", async () => {
      const hourAgo = Date.now() / 1000 - 60 * 60;
      await fs.writeFile(path.join(work, "abandoned.sql"), "-- old");
      await fs.utimes(path.join(work, "abandoned.sql"), hourAgo, hourAgo);
      await fs.writeFile(path.join(work, "recent.sql"), "-- new");
      await fs.writeFile(path.join(work, "notes.txt"), "keep");
      await fs.utimes(path.join(work, "notes.txt"), hourAgo, hourAgo);

      await call(endpoint(), "db_job_init");

      expect((await fs.readdir(work)).sort()).toEqual(["job-1.sql", "notes.txt", "recent.sql"]);
    });

    it("should reject malformed parameters", async () => {
      const site = endpoint();

      expect((await call(site, "db_job_process", { job_id: "../../etc" })).status).toBe(400);
      expect((await call(site, "db_job_process", { job_id: "job-1", time_budget: "600" })).status).toBe(400);
      expect((await call(site, "db_job_process", {})).status).toBe(400);
    });

    it("should refuse database actions without a source", async () => {
      const response = await call(endpoint({ source: undefined }), "db_job_init");

      expect(response).toMatchObject({ status: 400, body: { error: "invalid_request" } });
    });
  });

  describe("manifest jobs", () => {
    it("should scan the tree in path order without version control directories", async () => {
      const site = endpoint();

      const init = bodyOf(await call(site, "manifest_job_init"));
      const page = await call(site, "manifest_job_page", { job_id: "job-1", offset: "0" });

      expect(init).toEqual({ job_id: "job-1", total_files: 3, total_bytes: 20 });
      expect(bodyOf(page)).toMatchObject({
        files: [
          { path: "b.txt", size: 5 },
          { path: "index.php", size: 5 },
          { path: "wp-content/uploads/a.jpg", size: 10 }
        ],
        total_files: 3,
        total_bytes: 20
      });
    });

    it("should page with offset and limit", async () => {
      const site = endpoint();
      await call(site, "manifest_job_init");

      const page = bodyOf(await call(site, "manifest_job_page", { job_id: "job-1", offset: "1", limit: "1" }));

      expect(page).toMatchObject({ files: [{ path: "index.php" }], total_files: 3 });
    });

    it("should report a finished job as not found", async () => {
      const site = endpoint();
      await call(site, "manifest_job_init");
      await call(site, "manifest_job_finish", { job_id: "job-1" });

      const response = await call(site, "manifest_job_page", { job_id: "job-1", offset: "0" });

      expect(response).toMatchObject({ status: 404, body: { error: "job_not_found" } });
    });
  });

  describe("files", () => {
    it("should stream a single file with its size", async () => {
      const response = await call(endpoint(), "file_fetch", { path: "wp-content/uploads/a.jpg" });

      expect(response).toMatchObject({ kind: "stream", status: 200, size: 10 });
      expect(await text(streamOf(response))).toBe("jpeg-bytes");
    });

    it("should reject paths outside the root", async () => {
      const site = endpoint();

      for (const unsafe of ["../secret.txt", "/etc/passwd", "a/../../b", ""]) {
        expect(await call(site, "file_fetch", { path: unsafe })).toEqual({
          kind: "json",
          status: 400,
          body: { error: "invalid_path", message: "Invalid path" }
        });
      }
    });

    it("should refuse symlinks that lead out of the root", async () => {
      const outside = await fs.mkdtemp(path.join(tmpdir(), "sitepull-outside-"));
      try {
        await fs.writeFile(path.join(outside, "secret.txt"), "TOP-SECRET");
        await fs.symlink(path.join(outside, "secret.txt"), path.join(root, "link.txt"));
        await fs.symlink(outside, path.join(root, "dirlink"));
        const site = endpoint();

        for (const linked of ["link.txt", "dirlink/secret.txt"]) {
          expect(await call(site, "file_fetch", { path: linked })).toEqual({
            kind: "json",
            status: 400,
            body: { error: "invalid_path", message: "Invalid path" }
          });
        }

        const events: BatchEvent[] = [];
        for await (const event of decodeBatch(streamOf(await call(site, "file_batch", { paths: JSON.stringify(["link.txt", "dirlink/secret.txt"]) })))) {
          events.push(event);
        }
        expect(events).toEqual([
          { type: "error", path: "link.txt", message: "invalid path" },
          { type: "error", path: "dirlink/secret.txt", message: "invalid path" }
        ]);
      } finally {
        await fs.rm(outside, { recursive: true, force: true });
      }
    });

    it("should serve symlinks that stay inside the root", async () => {
      await fs.symlink(path.join(root, "b.txt"), path.join(root, "alias.txt"));

      const response = await call(endpoint(), "file_fetch", { path: "alias.txt" });

      expect(response).toMatchObject({ kind: "stream", status: 200, size: 5 });
      expect(await text(streamOf(response))).toBe("bravo");
    });

    it("should answer 404 for missing files and directories", async () => {
      const site = endpoint();

      expect(await call(site, "file_fetch", { path: "missing.txt" })).toMatchObject({ status: 404, body: { error: "not_found" } });
      expect((await call(site, "file_fetch", { path: "wp-content" })).status).toBe(404);
    });

    it("should frame a batch with per-file errors", async () => {
      const response = await call(endpoint(), "file_batch", { paths: JSON.stringify(["b.txt", "missing.txt", "../x"]) });

      const events: BatchEvent[] = [];
      for await (const event of decodeBatch(streamOf(response))) {
        events.push(event);
      }

      expect(events).toEqual([
        { type: "file", path: "b.txt", size: 5 },
        { type: "data", chunk: Buffer.from("bravo") },
        { type: "end", path: "b.txt" },
        { type: "error", path: "missing.txt", message: "not found" },
        { type: "error", path: "../x", message: "invalid path" }
      ]);
    });

    it("should require a JSON list of paths", async () => {
      const site = endpoint();

      expect((await call(site, "file_batch", { paths: "b.txt" })).status).toBe(400);
      expect((await call(site, "file_batch", { paths: JSON.stringify([1, 2]) })).status).toBe(400);
    });
  });

  it("should reject unknown actions", async () => {
    const response = await call(endpoint(), "drop_tables");

    expect(response).toEqual({ kind: "json", status: 400, body: { error: "invalid_request", message: "Unknown action: drop_tables" } });
  });
});
