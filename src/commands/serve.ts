/**
 * Serve Command
 *
 * Runs the site endpoint over a directory tree and, optionally, a SQLite database.
 */
import { InMemoryKeyValueStore } from "$infrastructure/kv/in-memory-kv-store";
import { createEndpointServer } from "$infrastructure/http/endpoint-server";
import { ENDPOINT_PATH } from "$infrastructure/http/site-client";
import { SiteEndpoint } from "$infrastructure/site/site-endpoint";
import { SqliteSource } from "$infrastructure/sqlite/sqlite-source";
import { BaseCommand } from "$lib/commands/base-command";
import { commandSchemas } from "$lib/config/definitions";
import { createCommandFlags } from "$lib/config/loader";
import { log } from "$lib/log";
import { ConfigurationError } from "$shared/errors";
import { promises as fs } from "fs";
import type { Server } from "http";
import { tmpdir } from "os";
import path from "path";

const listen = (server: Server, port: number, host: string): Promise<void> =>
  new Promise((resolve, reject) => {
    const fail = (error: Error) => reject(new ConfigurationError(`Cannot listen on ${host}:${port}: ${error.message}`, { host, port }));
    server.once("error", fail);
    server.listen(port, host, () => {
      server.off("error", fail);
      resolve();
    });
  });

const shutdownSignal = (): Promise<NodeJS.Signals> =>
  new Promise((resolve) => {
    process.once("SIGINT", resolve);
    process.once("SIGTERM", resolve);
  });

export default class Serve extends BaseCommand {
  static override flags = createCommandFlags("serve");
  static override description = "Serve a site's files and database to the download command";
  static override examples = [
    "<%= config.bin %> <%= command.id %> --root /var/www/site --key $SITEPULL_KEY",
    "<%= config.bin %> <%= command.id %> --root ./public --database ./site.db --host 0.0.0.0 --port 9000"
  ];

  public async run(): Promise<void> {
    const config = (await this.loadConfig(commandSchemas.serve)).rendered;
    const root = path.resolve(config.root);
    const source = config.database === undefined ? undefined : new SqliteSource(path.resolve(config.database));
    const workDir = await fs.mkdtemp(path.join(tmpdir(), "sitepull-serve-"));

    try {
      const endpoint = new SiteEndpoint({ root, key: config.key, store: new InMemoryKeyValueStore(), workDir, source });
      const server = createEndpointServer({ endpoint });
      await listen(server, config.port, config.host);
      log.success(`Serving ${root} at http://${config.host}:${config.port}/${ENDPOINT_PATH}`, { database: config.database ?? "none" });

      const signal = await shutdownSignal();
      log.info(`Received ${signal}, shutting down`);
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    } finally {
      source?.close();
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }
}
