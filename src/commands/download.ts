/**
 * Download Command
 *
 * Pulls a site's database and files through its endpoint into one archive.
 */
import { BaseCommand } from "$lib/commands/base-command";
import { commandSchemas } from "$lib/config/definitions";
import { createCommandFlags } from "$lib/config/loader";
import { handleDownload } from "$lib/download";
import { ExitCode } from "$shared/errors";

export default class Download extends BaseCommand {
  static override flags = createCommandFlags("download");
  static override description = "Pull a site's database and files into a zip archive";
  static override examples = [
    "<%= config.bin %> <%= command.id %> --url https://example.com/ --key $SITEPULL_KEY",
    "<%= config.bin %> <%= command.id %> --url https://example.com/blog/ --output ./backups --concurrency 8",
    "SITEPULL_KEY=... <%= config.bin %> <%= command.id %> --url https://example.com/ --flush --timeout 3600"
  ];

  public async run(): Promise<void> {
    const config = (await this.loadConfig(commandSchemas.download)).rendered;

    const code = await handleDownload(config.url, config.key, config.output, config.concurrency, {
      retries: config.retries,
      timeBudgetSeconds: config["time-budget"],
      timeoutSeconds: config.timeout,
      flush: config.flush
    });
    if (code !== ExitCode.Success) {
      this.exit(code);
    }
  }
}
