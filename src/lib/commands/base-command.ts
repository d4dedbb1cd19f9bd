import { Config } from "$lib/config/config";
import { commandSchemas } from "$lib/config/definitions";
import { createCommandFlags, loadCommandConfig } from "$lib/config/loader";
import { log } from "$lib/log";
import { DomainError, exitCodeFor } from "$shared/errors";
import { Command } from "@oclif/core";
import { z } from "zod";

export abstract class BaseCommand extends Command {
  /**
   * Base flags available to all commands (global flags).
   */
  static baseFlags = createCommandFlags("*");

  protected flags: Record<string, unknown> = {};
  protected args: Record<string, unknown> = {};

  public async init(): Promise<void> {
    await super.init();

    const { args, flags } = await this.parse({
      flags: this.ctor.flags,
      baseFlags: this.ctor.baseFlags,
      args: this.ctor.args,
      strict: this.ctor.strict
    });

    this.flags = flags;
    this.args = args;
  }

  /**
   * Merges `sitepull.yaml`, the environment and the parsed flags into the
   * command's validated configuration.
   *
   * `--verbose` lowers the log level to debug unless LOG_LEVEL pins it.
   */
  protected async loadConfig<Shape extends z.ZodRawShape>(schema: z.ZodObject<Shape>): Promise<Config<z.infer<z.ZodObject<Shape>>>> {
    const config = await loadCommandConfig(schema, this.flags);
    const globals = commandSchemas["*"].safeParse(config.rendered);
    if (globals.success && globals.data.verbose && process.env.LOG_LEVEL === undefined) {
      log.setLevel("debug");
    }
    log.debug(`configuration:\n${config.toYaml()}`);
    return config;
  }

  protected async catch(err: Error & { exitCode?: number }): Promise<unknown> {
    if (err instanceof DomainError) {
      log.error(err.message, log.level() === "debug" || log.level() === "trace" ? err.context : undefined);
      this.exit(exitCodeFor(err));
    }
    return super.catch(err);
  }
}
